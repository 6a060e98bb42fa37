import { types } from 'cassandra-driver';
import { TaskRunArtifactEntity } from '../db/task_run_artifact.entity';

// Upper bound on rows fetched per round trip while skipping to an offset
const MAX_FETCH_SIZE = 1000;

const SELECT_BY_INSTANCE = `
    SELECT execution_instance_id, execution_task_id, artifact_id, artifact_type, url,
           content_type, content_length, status_code, additional_data, created_at
    FROM task_run_artifacts
    WHERE execution_instance_id = ?
`;

export interface CqlRow {
    get(column: string): unknown;
}

export interface CqlResult {
    rows: CqlRow[];
    pageState?: string | null;
}

export interface CqlQueryOptions {
    prepare: boolean;
    fetchSize: number;
    pageState?: string;
}

/** The slice of the cassandra-driver Client this repository needs */
export interface CqlClient {
    execute(query: string, params: unknown[], options: CqlQueryOptions): Promise<CqlResult>;
}

export interface ArtifactRepository {
    listByExecutionInstance(executionInstanceId: string, limit: number, offset: number): Promise<TaskRunArtifactEntity[]>;
}

/**
 * Reads run artifacts from Cassandra. CQL has no OFFSET, so the driver's
 * paging state is walked until `offset` rows have been skipped.
 */
export class CassandraArtifactRepository implements ArtifactRepository {
    constructor(private readonly client: CqlClient) { }

    async listByExecutionInstance(executionInstanceId: string, limit: number, offset: number): Promise<TaskRunArtifactEntity[]> {
        const artifacts: TaskRunArtifactEntity[] = [];
        if (limit <= 0) return artifacts;

        const params = [types.Uuid.fromString(executionInstanceId)];
        const fetchSize = Math.min(offset + limit, MAX_FETCH_SIZE);
        let skipped = 0;
        let pageState: string | undefined;

        do {
            const res = await this.client.execute(SELECT_BY_INSTANCE, params, { prepare: true, fetchSize, pageState });

            for (const row of res.rows) {
                if (skipped < offset) {
                    skipped++;
                    continue;
                }
                artifacts.push(toEntity(row));
                if (artifacts.length === limit) return artifacts;
            }

            pageState = res.pageState || undefined;
        } while (pageState);

        return artifacts;
    }
}

function text(row: CqlRow, column: string): string {
    const value = row.get(column);
    return value === null || value === undefined ? '' : String(value);
}

function int(row: CqlRow, column: string): number {
    const value = row.get(column);
    if (value === null || value === undefined) return 0;
    return typeof value === 'number' ? value : Number(String(value));
}

// bigint columns come back as Long, which may exceed Number.MAX_SAFE_INTEGER
function bigint(row: CqlRow, column: string): string {
    const value = row.get(column);
    return value === null || value === undefined ? '0' : String(value);
}

function timestamp(row: CqlRow, column: string): Date | null {
    const value = row.get(column);
    if (value instanceof Date) return value;
    if (value === null || value === undefined) return null;
    const parsed = new Date(String(value));
    return Number.isNaN(parsed.getTime()) ? null : parsed;
}

function stringMap(row: CqlRow, column: string): Record<string, string> {
    const value = row.get(column);
    const out: Record<string, string> = {};
    if (typeof value !== 'object' || value === null) return out;

    for (const [key, entry] of Object.entries(value)) {
        if (entry !== null && entry !== undefined) out[key] = String(entry);
    }
    return out;
}

function toEntity(row: CqlRow): TaskRunArtifactEntity {
    return {
        execution_instance_id: text(row, 'execution_instance_id'),
        execution_task_id: text(row, 'execution_task_id'),
        artifact_id: text(row, 'artifact_id'),
        artifact_type: text(row, 'artifact_type'),
        url: text(row, 'url'),
        content_type: text(row, 'content_type'),
        content_length: bigint(row, 'content_length'),
        status_code: int(row, 'status_code'),
        additional_data: stringMap(row, 'additional_data'),
        created_at: timestamp(row, 'created_at'),
    };
}
