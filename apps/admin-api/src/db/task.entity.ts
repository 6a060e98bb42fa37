/**
 * A user-submitted task as stored in Postgres.
 * Tasks are soft-deleted (deleted_at) and never removed.
 */
export interface TaskEntity {
    id: string;  // bigserial, returned by pg as a string
    name: string;
    definition: unknown;  // opaque JSON payload
    owner: string;  // subject of the submitting principal
    created_at: Date;
    updated_at: Date;
    deleted_at: Date | null;
}

export interface NewTask {
    name: string;
    definition: unknown;
}
