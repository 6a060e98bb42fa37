import { status } from '@grpc/grpc-js';
import { AdminApiError, AdminErrorCode } from '../errors';

const STATUS_BY_CODE: Record<AdminErrorCode, status> = {
    INVALID_ID: status.INVALID_ARGUMENT,
    INVALID_PAGINATION: status.INVALID_ARGUMENT,
    INVALID_ROLE: status.INVALID_ARGUMENT,
    INVALID_DEFINITION: status.INVALID_ARGUMENT,
    INVALID_EXTERNAL_ID: status.FAILED_PRECONDITION,
    NOT_FOUND: status.NOT_FOUND,
    NO_AUTH_CONTEXT: status.UNAUTHENTICATED,
    INVALID_CLAIMS: status.UNAUTHENTICATED,
    FORBIDDEN: status.PERMISSION_DENIED,
    CANCELLED: status.CANCELLED,
    DEADLINE_EXCEEDED: status.DEADLINE_EXCEEDED,
    PERSISTENCE_ERROR: status.INTERNAL,
    CACHE_UNAVAILABLE: status.INTERNAL,
    MAPPING_ERROR: status.INTERNAL,
};

export interface ServiceErrorResponse {
    code: status;
    message: string;
}

export function toServiceError(error: unknown): ServiceErrorResponse {
    if (error instanceof AdminApiError) {
        return { code: STATUS_BY_CODE[error.code], message: error.message };
    }
    return {
        code: status.INTERNAL,
        message: error instanceof Error ? error.message : 'Unknown error',
    };
}
