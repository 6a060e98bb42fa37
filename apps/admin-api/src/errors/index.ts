export type AdminErrorCode =
    | 'INVALID_ID'
    | 'INVALID_EXTERNAL_ID'
    | 'INVALID_PAGINATION'
    | 'NOT_FOUND'
    | 'PERSISTENCE_ERROR'
    | 'CACHE_UNAVAILABLE'
    | 'MAPPING_ERROR'
    | 'NO_AUTH_CONTEXT'
    | 'INVALID_CLAIMS'
    | 'INVALID_ROLE'
    | 'INVALID_DEFINITION'
    | 'FORBIDDEN'
    | 'CANCELLED'
    | 'DEADLINE_EXCEEDED';

/**
 * Base class for every failure the admin API reports to its boundary layer.
 * `code` is stable and is what the gRPC layer maps to a status.
 */
export abstract class AdminApiError extends Error {
    abstract readonly code: AdminErrorCode;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

export class InvalidIdError extends AdminApiError {
    readonly code = 'INVALID_ID';

    constructor(public readonly value: string, kind = 'id') {
        super(`invalid ${kind}: "${value}"`);
    }
}

export class InvalidExternalIdError extends AdminApiError {
    readonly code = 'INVALID_EXTERNAL_ID';

    constructor(public readonly value: string) {
        super(`malformed execution instance id: "${value}"`);
    }
}

export class InvalidPaginationError extends AdminApiError {
    readonly code = 'INVALID_PAGINATION';

    constructor(public readonly page: number, public readonly pageSize: number, maxPageSize: number) {
        super(`invalid pagination (page=${page}, pageSize=${pageSize}); page must be >= 1 and pageSize within 1..${maxPageSize}`);
    }
}

export class NotFoundError extends AdminApiError {
    readonly code = 'NOT_FOUND';

    constructor(public readonly entity: string, public readonly id: string) {
        super(`${entity} ${id} not found`);
    }
}

export class PersistenceError extends AdminApiError {
    readonly code = 'PERSISTENCE_ERROR';

    constructor(operation: string, cause: unknown) {
        super(`${operation} failed: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    }
}

export class CacheUnavailableError extends AdminApiError {
    readonly code = 'CACHE_UNAVAILABLE';

    constructor(cause: unknown) {
        super(`task cache unavailable: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    }
}

export class MappingError extends AdminApiError {
    readonly code = 'MAPPING_ERROR';

    constructor(public readonly taskId: string, cause: unknown) {
        super(`failed to resolve status for task ${taskId}: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    }
}

export class NoAuthContextError extends AdminApiError {
    readonly code = 'NO_AUTH_CONTEXT';

    constructor() {
        super('no auth context on request');
    }
}

export class InvalidClaimsError extends AdminApiError {
    readonly code = 'INVALID_CLAIMS';

    constructor(reason: string) {
        super(`invalid claims: ${reason}`);
    }
}

export class InvalidRoleError extends AdminApiError {
    readonly code = 'INVALID_ROLE';

    constructor(public readonly role: string) {
        super(`invalid role ${role}`);
    }
}

export class InvalidDefinitionError extends AdminApiError {
    readonly code = 'INVALID_DEFINITION';

    constructor(reason: string) {
        super(`task definition is not valid JSON: ${reason}`);
    }
}

export class ForbiddenError extends AdminApiError {
    readonly code = 'FORBIDDEN';

    constructor(public readonly required: string) {
        super(`caller lacks the ${required} role`);
    }
}

export class RequestCancelledError extends AdminApiError {
    readonly code = 'CANCELLED';

    constructor() {
        super('request cancelled by the client');
    }
}

export class DeadlineExceededError extends AdminApiError {
    readonly code = 'DEADLINE_EXCEEDED';

    constructor() {
        super('request deadline exceeded');
    }
}
