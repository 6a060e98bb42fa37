import { UserDto, UserPage, UserRole } from '@task-admin/contracts';
import { InvalidClaimsError, InvalidIdError, NoAuthContextError } from '../errors';
import { RoleMapper } from './role-mapper';
import { sweepPages } from './pagination';
import { IdentityProvider, ProviderUser, ProviderUserPatch, RequestContext, ValidatedClaims } from './types';

const TAG = '[identity]';

function isValidatedClaims(value: unknown): value is ValidatedClaims {
    return typeof value === 'object'
        && value !== null
        && 'sub' in value
        && typeof value.sub === 'string'
        && value.sub.length > 0;
}

export function toUserDto(user: ProviderUser, roles?: UserRole[]): UserDto {
    return {
        id: user.user_id,
        email: user.email,
        name: user.name,
        picture: user.picture,
        givenName: user.given_name,
        familyName: user.family_name,
        username: user.username,
        nickname: user.nickname,
        screenName: user.screen_name,
        connection: user.connection,
        location: user.location,
        lastLogin: user.last_login,
        roles,
    };
}

// Unset fields are skipped, never cleared
export function toProviderPatch(user: UserDto): ProviderUserPatch {
    const patch: ProviderUserPatch = {};
    if (user.email != null) patch.email = user.email;
    if (user.name != null) patch.name = user.name;
    if (user.picture != null) patch.picture = user.picture;
    if (user.givenName != null) patch.given_name = user.givenName;
    if (user.familyName != null) patch.family_name = user.familyName;
    if (user.username != null) patch.username = user.username;
    if (user.nickname != null) patch.nickname = user.nickname;
    return patch;
}

/**
 * User and role management on top of the external identity provider.
 * Nothing is stored locally; every call goes to the provider, and provider
 * failures are logged and rethrown as they are.
 */
export class IdentityGateway {
    constructor(
        private readonly provider: IdentityProvider,
        private readonly roles: RoleMapper,
    ) { }

    async getUserFromContext(ctx: RequestContext, signal?: AbortSignal): Promise<UserDto> {
        if (ctx.claims === undefined || ctx.claims === null) {
            console.error(`${TAG} no auth context on request`);
            throw new NoAuthContextError();
        }
        if (!isValidatedClaims(ctx.claims)) {
            console.error(`${TAG} claims on request carry no subject`);
            throw new InvalidClaimsError('missing subject');
        }
        return this.getUser(ctx.claims.sub, signal);
    }

    async listUsers(page: number, pageSize: number): Promise<UserPage> {
        const res = await this.call(`list users (page ${page})`, () => this.provider.listUsers(page, pageSize));
        return {
            users: res.items.map((u) => toUserDto(u)),
            total: res.total,
        };
    }

    // Latency grows with the total user count
    async listAllUsers(signal?: AbortSignal): Promise<UserDto[]> {
        const users = await this.call('list all users', () =>
            sweepPages((page, perPage) => this.provider.listUsers(page, perPage), signal));
        return users.map((u) => toUserDto(u));
    }

    async getUser(userId: string, signal?: AbortSignal): Promise<UserDto> {
        const user = await this.call(`get user ${userId}`, () => this.provider.getUser(userId));
        const roles = await this.listUserRoles(userId, signal);
        return toUserDto(user, roles);
    }

    async updateUser(user: UserDto): Promise<void> {
        if (!user.id) {
            console.error(`${TAG} update user called without an id`);
            throw new InvalidIdError('', 'user id');
        }
        const userId = user.id;
        await this.call(`update user ${userId}`, () => this.provider.updateUser(userId, toProviderPatch(user)));
    }

    async deleteUser(userId: string): Promise<void> {
        await this.call(`delete user ${userId}`, () => this.provider.deleteUser(userId));
    }

    async listUserRoles(userId: string, signal?: AbortSignal): Promise<UserRole[]> {
        const external = await this.call(`list roles of ${userId}`, () =>
            sweepPages((page, perPage) => this.provider.listUserRoles(userId, page, perPage), signal));

        return external.map((role) => {
            const local = this.roles.toLocal(role);
            if (local === UserRole.UNKNOWN) {
                console.warn(`${TAG} user ${userId} holds unrecognized role ${role.id} (${role.name})`);
            }
            return local;
        });
    }

    async assignUserRole(userId: string, role: UserRole): Promise<void> {
        const external = this.mapRole(role);
        await this.call(`assign ${role} to ${userId}`, () => this.provider.assignRoles(userId, [external.id]));
    }

    async removeUserRole(userId: string, role: UserRole): Promise<void> {
        const external = this.mapRole(role);
        await this.call(`remove ${role} from ${userId}`, () => this.provider.removeRoles(userId, [external.id]));
    }

    private mapRole(role: UserRole) {
        try {
            return this.roles.toExternal(role);
        } catch (err) {
            console.error(`${TAG} role ${role} has no provider counterpart:`, err);
            throw err;
        }
    }

    private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
        try {
            return await fn();
        } catch (err) {
            console.error(`${TAG} ${operation} failed:`, err);
            throw err;
        }
    }
}
