import { ManagementClient } from 'auth0';
import { Auth0Config } from '../config';
import { ExternalRole, IdentityProvider, ProviderPage, ProviderUser, ProviderUserPatch } from './types';

const TAG = '[auth0]';

interface PageRequest {
    page: number;
    per_page: number;
    include_totals: true;
}

/** The user endpoints of the Auth0 Management API that the admin API calls */
export interface Auth0UsersApi {
    getAll(params: PageRequest): Promise<{ data: unknown }>;
    get(params: { id: string }): Promise<{ data: unknown }>;
    update(params: { id: string }, body: ProviderUserPatch): Promise<unknown>;
    delete(params: { id: string }): Promise<unknown>;
    getRoles(params: { id: string } & PageRequest): Promise<{ data: unknown }>;
    assignRoles(params: { id: string }, body: { roles: string[] }): Promise<unknown>;
    deleteRoles(params: { id: string }, body: { roles: string[] }): Promise<unknown>;
}

const USER_FIELDS = [
    'user_id', 'email', 'name', 'picture', 'given_name', 'family_name', 'username',
    'nickname', 'screen_name', 'connection', 'location', 'last_login',
] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(record: Record<string, unknown>, key: string): string | undefined {
    const value = record[key];
    if (typeof value === 'string') return value;
    if (value instanceof Date) return value.toISOString();
    return undefined;
}

export function toProviderUser(raw: unknown): ProviderUser {
    const user: ProviderUser = {};
    if (!isRecord(raw)) return user;

    for (const field of USER_FIELDS) {
        const value = readString(raw, field);
        if (value !== undefined) user[field] = value;
    }
    return user;
}

export function toExternalRole(raw: unknown): ExternalRole | null {
    if (!isRecord(raw)) return null;
    const id = readString(raw, 'id');
    if (!id) return null;
    return { id, name: readString(raw, 'name') ?? '' };
}

/**
 * Reads a paged list response requested with include_totals. The provider
 * has a next page while start + returned < total.
 */
export function readPage(data: unknown, key: 'users' | 'roles', page: number, perPage: number): ProviderPage<unknown> {
    if (Array.isArray(data)) {
        // Totals were not returned; a full page may have a successor
        return { items: data, total: page * perPage + data.length, hasNext: data.length === perPage };
    }
    if (!isRecord(data)) {
        throw new Error(`unexpected ${key} page response from identity provider`);
    }

    const raw = data[key];
    const items: unknown[] = Array.isArray(raw) ? raw : [];
    const start = typeof data.start === 'number' ? data.start : page * perPage;
    const total = typeof data.total === 'number' ? data.total : start + items.length;

    return { items, total, hasNext: start + items.length < total };
}

/** Auth0 expects a bare hostname; configuration may hold the tenant URL */
export function auth0Hostname(domain: string): string {
    return new URL(domain.includes('://') ? domain : `https://${domain}`).hostname;
}

export function createManagementClient(config: Auth0Config): ManagementClient {
    return new ManagementClient({
        domain: auth0Hostname(config.domain),
        clientId: config.clientId,
        clientSecret: config.clientSecret,
    });
}

/**
 * IdentityProvider backed by the Auth0 Management API.
 */
export class Auth0IdentityProvider implements IdentityProvider {
    constructor(private readonly users: Auth0UsersApi) { }

    async listUsers(page: number, perPage: number): Promise<ProviderPage<ProviderUser>> {
        const res = await this.users.getAll({ page, per_page: perPage, include_totals: true });
        const result = readPage(res.data, 'users', page, perPage);
        return { ...result, items: result.items.map(toProviderUser) };
    }

    async getUser(userId: string): Promise<ProviderUser> {
        const res = await this.users.get({ id: userId });
        return toProviderUser(res.data);
    }

    async updateUser(userId: string, patch: ProviderUserPatch): Promise<void> {
        await this.users.update({ id: userId }, patch);
    }

    async deleteUser(userId: string): Promise<void> {
        await this.users.delete({ id: userId });
    }

    async listUserRoles(userId: string, page: number, perPage: number): Promise<ProviderPage<ExternalRole>> {
        const res = await this.users.getRoles({ id: userId, page, per_page: perPage, include_totals: true });
        const result = readPage(res.data, 'roles', page, perPage);

        // Entries without an id stay in the list and map to UNKNOWN downstream
        const roles: ExternalRole[] = [];
        for (const raw of result.items) {
            const role = toExternalRole(raw);
            if (!role) {
                console.warn(`${TAG} role entry without an id on ${userId}:`, raw);
            }
            roles.push(role ?? { id: '', name: '' });
        }
        return { ...result, items: roles };
    }

    async assignRoles(userId: string, roleIds: string[]): Promise<void> {
        await this.users.assignRoles({ id: userId }, { roles: roleIds });
    }

    async removeRoles(userId: string, roleIds: string[]): Promise<void> {
        await this.users.deleteRoles({ id: userId }, { roles: roleIds });
    }
}
