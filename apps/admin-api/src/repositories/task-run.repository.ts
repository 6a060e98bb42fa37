import { Pool } from 'pg';
import { TaskRunEntity } from '../db/task_run.entity';

export class TaskRunRepository {
    constructor(private readonly pool: Pool) { }

    async findById(id: string): Promise<TaskRunEntity | null> {
        const res = await this.pool.query<TaskRunEntity>('SELECT * FROM task_runs WHERE id = $1', [id]);
        return res.rows[0] ?? null;
    }

    // Most recently created run; id breaks ties between runs created in the same instant
    async findLatestForTask(taskId: string): Promise<TaskRunEntity | null> {
        const res = await this.pool.query<TaskRunEntity>(
            'SELECT * FROM task_runs WHERE task_id = $1 ORDER BY created_at DESC, id DESC LIMIT 1',
            [taskId]
        );
        return res.rows[0] ?? null;
    }

    async findByTaskId(taskId: string): Promise<TaskRunEntity[]> {
        const res = await this.pool.query<TaskRunEntity>(
            'SELECT * FROM task_runs WHERE task_id = $1 ORDER BY created_at ASC, id ASC',
            [taskId]
        );
        return res.rows;
    }
}
