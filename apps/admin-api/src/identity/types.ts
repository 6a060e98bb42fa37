/**
 * Provider-side shapes the identity gateway works with. They are kept in the
 * provider's own field naming; mapping to boundary DTOs happens in the gateway.
 */

/** A permission grouping in the identity provider, identified by a stable opaque id */
export interface ExternalRole {
    id: string;
    name: string;
}

export interface ProviderUser {
    user_id?: string;
    email?: string;
    name?: string;
    picture?: string;
    given_name?: string;
    family_name?: string;
    username?: string;
    nickname?: string;
    screen_name?: string;
    connection?: string;
    location?: string;
    last_login?: string;
}

// Only the fields the admin API is allowed to change
export type ProviderUserPatch = Pick<ProviderUser,
    'email' | 'name' | 'picture' | 'given_name' | 'family_name' | 'username' | 'nickname'>;

export interface ProviderPage<T> {
    items: T[];
    total: number;
    hasNext: boolean;
}

/**
 * User and role management API of the external identity provider.
 * Pages are 0-based, as the provider numbers them.
 */
export interface IdentityProvider {
    listUsers(page: number, perPage: number): Promise<ProviderPage<ProviderUser>>;
    getUser(userId: string): Promise<ProviderUser>;
    updateUser(userId: string, patch: ProviderUserPatch): Promise<void>;
    deleteUser(userId: string): Promise<void>;
    listUserRoles(userId: string, page: number, perPage: number): Promise<ProviderPage<ExternalRole>>;
    assignRoles(userId: string, roleIds: string[]): Promise<void>;
    removeRoles(userId: string, roleIds: string[]): Promise<void>;
}

/** Claims of a token that upstream authentication middleware has already validated */
export interface ValidatedClaims {
    sub: string;
    [claim: string]: unknown;
}

/** Request-scoped state handed in by the transport layer */
export interface RequestContext {
    claims?: unknown;
}
