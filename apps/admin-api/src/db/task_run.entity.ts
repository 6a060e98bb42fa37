import { TaskRunStatus } from '@task-admin/contracts';

/**
 * One execution of a task. Written by the execution system; read-only here.
 */
export interface TaskRunEntity {
    id: string;
    task_id: string;
    status: TaskRunStatus;
    start_time: Date | null;
    end_time: Date | null;
    error_message: string | null;
    execution_instance_id: string;  // correlates with the artifact store
    created_at: Date;
}
