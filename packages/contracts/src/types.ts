/**
 * Lifecycle states for a task run.
 * Runs progress: PENDING → RUNNING → SUCCEEDED/FAILED.
 * Transitions belong to the execution system; the admin API only reports them.
 */
export enum TaskRunStatus {
    PENDING = 'Pending',
    RUNNING = 'Running',
    SUCCEEDED = 'Succeeded',
    FAILED = 'Failed'
}

/**
 * Local role model. UNKNOWN is what an unrecognized provider role maps to
 * and can never be assigned.
 */
export enum UserRole {
    UNKNOWN = 'Unknown',
    USER = 'User',
    MEMBER = 'Member',
    ADMIN = 'Admin'
}

export type AssignableRole = Exclude<UserRole, UserRole.UNKNOWN>;

export const ASSIGNABLE_ROLES: readonly AssignableRole[] = [UserRole.USER, UserRole.MEMBER, UserRole.ADMIN];

export interface TaskDto {
    id: string;
    name: string;
    definition: string;
    status: TaskRunStatus;
    owner: string;
    createdAt: Date;
    updatedAt: Date;
    deletedAt: Date | null;
}

export interface TaskRunDto {
    id: string;
    taskId: string;
    status: TaskRunStatus;
    startTime: Date | null;
    endTime: Date | null;
    errorMessage: string | null;
}

export interface TaskRunArtifactDto {
    executionInstanceId: string;
    executionTaskId: string;
    artifactId: string;
    artifactType: string;
    url: string;
    contentType: string;
    contentLength: string;
    statusCode: number;
    additionalData: Record<string, string>;
    createdAt: Date | null;
}

// Profile fields are owned by the identity provider; unset fields are left
// untouched on update.
export interface UserDto {
    id?: string;
    email?: string;
    name?: string;
    picture?: string;
    givenName?: string;
    familyName?: string;
    username?: string;
    nickname?: string;
    screenName?: string;
    connection?: string;
    location?: string;
    lastLogin?: string;
    roles?: UserRole[];
}

export interface UserPage {
    users: UserDto[];
    total: number;
}
