import { Pool } from 'pg';

export interface RecordedQuery {
    text: string;
    values: unknown[];
}

/**
 * pg Pool stand-in that records every query and answers from a queue of
 * canned results, one per call.
 */
export class FakePool {
    readonly queries: RecordedQuery[] = [];
    private readonly results: Array<{ rows: unknown[]; rowCount: number | null }> = [];

    respond(rows: unknown[], rowCount: number | null = rows.length): this {
        this.results.push({ rows, rowCount });
        return this;
    }

    async query(text: string, values: unknown[] = []) {
        this.queries.push({ text: text.replace(/\s+/g, ' ').trim(), values });
        return this.results.shift() ?? { rows: [], rowCount: 0 };
    }

    asPool(): Pool {
        return this as unknown as Pool;
    }
}
