import { AssignableRole, UserRole } from '@task-admin/contracts';
import { InvalidRoleError } from '../errors';
import { ExternalRole } from './types';

export type RoleCatalog = Record<AssignableRole, ExternalRole>;

/**
 * Translates between the closed local role enum and the provider's open role
 * catalog. Local → external is total over assignable roles; external → local
 * is partial and degrades to UNKNOWN.
 */
export class RoleMapper {
    private readonly byId = new Map<string, AssignableRole>();

    constructor(private readonly catalog: RoleCatalog) {
        for (const role of [UserRole.USER, UserRole.MEMBER, UserRole.ADMIN] as const) {
            const { id } = catalog[role];
            const clash = this.byId.get(id);
            if (clash) {
                throw new Error(`role id ${id} is mapped to both ${clash} and ${role}`);
            }
            this.byId.set(id, role);
        }
    }

    /** Builds a catalog whose provider role names match the local role names */
    static fromRoleIds(roleIds: Record<AssignableRole, string>): RoleMapper {
        return new RoleMapper({
            [UserRole.USER]: { id: roleIds[UserRole.USER], name: UserRole.USER },
            [UserRole.MEMBER]: { id: roleIds[UserRole.MEMBER], name: UserRole.MEMBER },
            [UserRole.ADMIN]: { id: roleIds[UserRole.ADMIN], name: UserRole.ADMIN },
        });
    }

    toExternal(role: UserRole): ExternalRole {
        if (role === UserRole.UNKNOWN) {
            throw new InvalidRoleError(role);
        }
        const external = this.catalog[role];
        if (!external) {
            throw new InvalidRoleError(String(role));
        }
        return external;
    }

    toLocal(role: ExternalRole | string): UserRole {
        const id = typeof role === 'string' ? role : role.id;
        return this.byId.get(id) ?? UserRole.UNKNOWN;
    }
}
