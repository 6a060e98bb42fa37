/**
 * A row of the Cassandra task_run_artifacts table. Immutable once recorded.
 */
export interface TaskRunArtifactEntity {
    execution_instance_id: string;
    execution_task_id: string;
    artifact_id: string;
    artifact_type: string;
    url: string;
    content_type: string;
    content_length: string;  // bigint, kept as decimal text
    status_code: number;
    additional_data: Record<string, string>;
    created_at: Date | null;
}
