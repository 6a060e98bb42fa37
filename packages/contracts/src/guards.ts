import { TaskDto, TaskRunStatus } from './types';

const STATUSES: ReadonlySet<string> = new Set(Object.values(TaskRunStatus));

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isTaskRunStatus(value: unknown): value is TaskRunStatus {
    return typeof value === 'string' && STATUSES.has(value);
}

export function isTaskDto(value: unknown): value is TaskDto {
    if (!isRecord(value)) return false;

    return typeof value.id === 'string'
        && typeof value.name === 'string'
        && typeof value.definition === 'string'
        && isTaskRunStatus(value.status)
        && typeof value.owner === 'string'
        && value.createdAt instanceof Date
        && value.updatedAt instanceof Date
        && (value.deletedAt === null || value.deletedAt instanceof Date);
}
