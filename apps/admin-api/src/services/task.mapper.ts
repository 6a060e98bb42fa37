import { TaskDto, TaskRunArtifactDto, TaskRunDto, TaskRunStatus } from '@task-admin/contracts';
import { TaskEntity } from '../db/task.entity';
import { TaskRunEntity } from '../db/task_run.entity';
import { TaskRunArtifactEntity } from '../db/task_run_artifact.entity';

// A task's status is its latest run's status, or PENDING before its first run.
export function deriveTaskStatus(latestRun: TaskRunEntity | null): TaskRunStatus {
    return latestRun ? latestRun.status : TaskRunStatus.PENDING;
}

export function toTaskDto(task: TaskEntity, latestRun: TaskRunEntity | null): TaskDto {
    return {
        id: String(task.id),
        name: task.name,
        definition: JSON.stringify(task.definition ?? null),
        status: deriveTaskStatus(latestRun),
        owner: task.owner,
        createdAt: task.created_at,
        updatedAt: task.updated_at,
        deletedAt: task.deleted_at,
    };
}

export function toTaskRunDto(run: TaskRunEntity): TaskRunDto {
    return {
        id: String(run.id),
        taskId: String(run.task_id),
        status: run.status,
        startTime: run.start_time,
        endTime: run.end_time,
        errorMessage: run.error_message,
    };
}

export function toTaskRunArtifactDto(artifact: TaskRunArtifactEntity): TaskRunArtifactDto {
    return {
        executionInstanceId: artifact.execution_instance_id,
        executionTaskId: artifact.execution_task_id,
        artifactId: artifact.artifact_id,
        artifactType: artifact.artifact_type,
        url: artifact.url,
        contentType: artifact.content_type,
        contentLength: artifact.content_length,
        statusCode: artifact.status_code,
        additionalData: artifact.additional_data,
        createdAt: artifact.created_at,
    };
}
