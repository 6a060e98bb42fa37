import { validate as isUuid } from 'uuid';
import { TaskDto, TaskRunArtifactDto, TaskRunDto } from '@task-admin/contracts';
import { NewTask, TaskEntity } from '../db/task.entity';
import { TaskRepository } from '../repositories/task.repository';
import { TaskRunRepository } from '../repositories/task-run.repository';
import { ArtifactRepository } from '../repositories/artifact.repository';
import { TaskCache } from '../cache/task.cache';
import {
    AdminApiError,
    CacheUnavailableError,
    InvalidExternalIdError,
    InvalidIdError,
    InvalidPaginationError,
    MappingError,
    NotFoundError,
    PersistenceError,
} from '../errors';
import { toTaskDto, toTaskRunArtifactDto, toTaskRunDto } from './task.mapper';

const TAG = '[task-service]';
const MAX_BIGINT_ID = BigInt('9223372036854775807');

export type TaskStore = Pick<TaskRepository, 'create' | 'findById' | 'findByOwner' | 'update' | 'softDelete'>;
export type TaskRunStore = Pick<TaskRunRepository, 'findById' | 'findLatestForTask' | 'findByTaskId'>;

export interface TaskServiceOptions {
    maxArtifactPageSize: number;
}

/**
 * Parses a caller-supplied identifier of a bigserial row.
 * Only canonical positive integers are accepted: no sign, no leading zeros.
 */
export function parseRowId(value: string, kind = 'task id'): string {
    if (!/^[1-9][0-9]*$/.test(value) || BigInt(value) > MAX_BIGINT_ID) {
        throw new InvalidIdError(value, kind);
    }
    return value;
}

/**
 * Task, run and artifact reads for the admin API.
 *
 * Single-task reads are cache-aside: the derived status is resolved only when
 * a DTO is materialized on a miss, so a cached DTO may lag its latest run by
 * at most the cache TTL. Writes invalidate the cached entry.
 */
export class TaskService {
    constructor(
        private readonly tasks: TaskStore,
        private readonly runs: TaskRunStore,
        private readonly artifacts: ArtifactRepository,
        private readonly cache: TaskCache,
        private readonly options: TaskServiceOptions,
    ) { }

    async getTasksByUser(userId: string): Promise<TaskDto[]> {
        const tasks = await this.persist('find tasks by owner', () => this.tasks.findByOwner(userId));

        // No partial results: the first mapping failure fails the whole call
        const dtos: TaskDto[] = [];
        for (const task of tasks) {
            dtos.push(await this.mapTaskToDto(task));
        }
        return dtos;
    }

    async getTaskById(taskId: string): Promise<TaskDto> {
        const id = this.parseId(taskId);

        const cached = await this.readCache(id);
        if (cached) return cached;

        const task = await this.persist('get task', () => this.tasks.findById(id));
        if (!task) {
            console.error(`${TAG} task ${id} not found`);
            throw new NotFoundError('task', id);
        }

        const dto = await this.mapTaskToDto(task);
        await this.writeCache(dto);
        return dto;
    }

    // Not cached here; the first read populates the cache.
    async createTask(task: NewTask, ownerId: string): Promise<TaskEntity> {
        const created = await this.persist('create task', () => this.tasks.create(task, ownerId));
        console.log(`${TAG} task ${created.id} created for ${ownerId}`);
        return created;
    }

    async updateTask(task: NewTask, ownerId: string, taskId: string): Promise<TaskEntity> {
        const id = this.parseId(taskId);

        const existing = await this.persist('get task', () => this.tasks.findById(id));
        if (!existing) {
            console.error(`${TAG} task ${id} not found, nothing to update`);
            throw new NotFoundError('task', id);
        }

        const updated = await this.persist('update task', () => this.tasks.update(id, task));
        if (!updated) {
            // Soft-deleted between the read and the write
            console.error(`${TAG} task ${id} disappeared before update`);
            throw new NotFoundError('task', id);
        }

        await this.dropCache(id);
        console.log(`${TAG} task ${id} updated by ${ownerId}`);
        return updated;
    }

    async deleteTask(taskId: string, ownerId: string): Promise<void> {
        const id = this.parseId(taskId);

        const deleted = await this.persist('delete task', () => this.tasks.softDelete(id));
        if (!deleted) {
            console.error(`${TAG} task ${id} not found, nothing to delete`);
            throw new NotFoundError('task', id);
        }

        await this.dropCache(id);
        console.log(`${TAG} task ${id} deleted by ${ownerId}`);
    }

    async listTaskRuns(taskId: string): Promise<TaskRunDto[]> {
        const id = this.parseId(taskId);
        const runs = await this.persist('list task runs', () => this.runs.findByTaskId(id));
        return runs.map(toTaskRunDto);
    }

    async getTaskRunArtifacts(taskRunId: string, page: number, pageSize: number): Promise<TaskRunArtifactDto[]> {
        const max = this.options.maxArtifactPageSize;
        if (!Number.isSafeInteger(page) || page < 1 || !Number.isSafeInteger(pageSize) || pageSize < 1 || pageSize > max) {
            console.error(`${TAG} rejected artifact pagination page=${page} pageSize=${pageSize}`);
            throw new InvalidPaginationError(page, pageSize, max);
        }

        const runId = this.parseId(taskRunId, 'task run id');

        const run = await this.persist('get task run', () => this.runs.findById(runId));
        if (!run) {
            console.error(`${TAG} task run ${runId} not found`);
            throw new NotFoundError('task run', runId);
        }

        if (!isUuid(run.execution_instance_id)) {
            console.error(`${TAG} task run ${runId} has malformed execution instance id "${run.execution_instance_id}"`);
            throw new InvalidExternalIdError(run.execution_instance_id);
        }

        const offset = (page - 1) * pageSize;
        const artifacts = await this.persist('list task run artifacts', () =>
            this.artifacts.listByExecutionInstance(run.execution_instance_id, pageSize, offset));

        return artifacts.map(toTaskRunArtifactDto);
    }

    async mapTaskToDto(task: TaskEntity): Promise<TaskDto> {
        try {
            const latest = await this.runs.findLatestForTask(task.id);
            return toTaskDto(task, latest);
        } catch (err) {
            console.error(`${TAG} failed to resolve latest run for task ${task.id}:`, err);
            throw new MappingError(String(task.id), err);
        }
    }

    private parseId(value: string, kind = 'task id'): string {
        try {
            return parseRowId(value, kind);
        } catch (err) {
            console.error(`${TAG} failed to parse ${kind}:`, err);
            throw err;
        }
    }

    private async persist<T>(operation: string, fn: () => Promise<T>): Promise<T> {
        try {
            return await fn();
        } catch (err) {
            console.error(`${TAG} ${operation} failed:`, err);
            if (err instanceof AdminApiError) throw err;
            throw new PersistenceError(operation, err);
        }
    }

    private async readCache(id: string): Promise<TaskDto | null> {
        try {
            return await this.cache.get(id);
        } catch (err) {
            if (!(err instanceof CacheUnavailableError)) throw err;
            console.warn(`${TAG} cache read failed for task ${id}, falling back to db:`, err);
            return null;
        }
    }

    private async writeCache(dto: TaskDto): Promise<void> {
        try {
            await this.cache.set(dto);
        } catch (err) {
            if (!(err instanceof CacheUnavailableError)) throw err;
            console.warn(`${TAG} cache write failed for task ${dto.id}:`, err);
        }
    }

    private async dropCache(id: string): Promise<void> {
        try {
            await this.cache.invalidate(id);
        } catch (err) {
            if (!(err instanceof CacheUnavailableError)) throw err;
            console.warn(`${TAG} cache invalidation failed for task ${id}, entry expires with its TTL:`, err);
        }
    }
}
