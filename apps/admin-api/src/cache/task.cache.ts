import { TaskDto, deserialize, isTaskDto, serialize } from '@task-admin/contracts';
import { CacheUnavailableError } from '../errors';

const TAG = '[task-cache]';
const KEY_PREFIX = 'admin-api:task:';

/** The slice of the ioredis client the cache needs */
export interface CacheStore {
    get(key: string): Promise<string | null>;
    set(key: string, value: string, secondsToken: 'EX', seconds: number): Promise<unknown>;
    del(key: string): Promise<number>;
}

export interface TaskCache {
    /** Resolves null on a clean miss; rejects with CacheUnavailableError when the store fails. */
    get(taskId: string): Promise<TaskDto | null>;
    set(task: TaskDto): Promise<void>;
    invalidate(taskId: string): Promise<void>;
}

/**
 * Read-through cache of materialized task DTOs, one Redis key per task.
 * Entries expire after a fixed TTL; concurrent populates of the same key
 * write the same derived value, so last write wins.
 */
export class RedisTaskCache implements TaskCache {
    constructor(
        private readonly store: CacheStore,
        private readonly ttlSeconds: number,
    ) { }

    static keyFor(taskId: string): string {
        return `${KEY_PREFIX}${taskId}`;
    }

    async get(taskId: string): Promise<TaskDto | null> {
        const key = RedisTaskCache.keyFor(taskId);

        let raw: string | null;
        try {
            raw = await this.store.get(key);
        } catch (err) {
            throw new CacheUnavailableError(err);
        }

        try {
            return deserialize(raw, isTaskDto) ?? null;
        } catch (err) {
            // An unreadable entry is a miss; drop it so the next populate replaces it
            console.warn(`${TAG} discarding unreadable entry ${key}:`, err);
            await this.invalidate(taskId);
            return null;
        }
    }

    async set(task: TaskDto): Promise<void> {
        try {
            await this.store.set(RedisTaskCache.keyFor(task.id), serialize(task), 'EX', this.ttlSeconds);
        } catch (err) {
            throw new CacheUnavailableError(err);
        }
    }

    async invalidate(taskId: string): Promise<void> {
        try {
            await this.store.del(RedisTaskCache.keyFor(taskId));
        } catch (err) {
            throw new CacheUnavailableError(err);
        }
    }
}
