import { Pool } from 'pg';
import { NewTask, TaskEntity } from '../db/task.entity';

// Soft-deleted rows are invisible to every read.
export class TaskRepository {
    constructor(private readonly pool: Pool) { }

    async create(task: NewTask, owner: string): Promise<TaskEntity> {
        const res = await this.pool.query<TaskEntity>(
            'INSERT INTO tasks (name, definition, owner) VALUES ($1, $2, $3) RETURNING *',
            [task.name, JSON.stringify(task.definition ?? null), owner]
        );
        return res.rows[0];
    }

    async findById(id: string): Promise<TaskEntity | null> {
        const res = await this.pool.query<TaskEntity>(
            'SELECT * FROM tasks WHERE id = $1 AND deleted_at IS NULL',
            [id]
        );
        return res.rows[0] ?? null;
    }

    async findByOwner(owner: string): Promise<TaskEntity[]> {
        const res = await this.pool.query<TaskEntity>(
            'SELECT * FROM tasks WHERE owner = $1 AND deleted_at IS NULL ORDER BY created_at ASC, id ASC',
            [owner]
        );
        return res.rows;
    }

    async update(id: string, task: NewTask): Promise<TaskEntity | null> {
        const res = await this.pool.query<TaskEntity>(
            `UPDATE tasks
             SET name = $1, definition = $2, updated_at = NOW()
             WHERE id = $3 AND deleted_at IS NULL
             RETURNING *`,
            [task.name, JSON.stringify(task.definition ?? null), id]
        );
        return res.rows[0] ?? null;
    }

    async softDelete(id: string): Promise<boolean> {
        const res = await this.pool.query(
            'UPDATE tasks SET deleted_at = NOW() WHERE id = $1 AND deleted_at IS NULL',
            [id]
        );
        return (res.rowCount ?? 0) > 0;
    }
}
