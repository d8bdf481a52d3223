// src/spanner_adapter.ts
import { Spanner, protos } from '@google-cloud/spanner';
import type { Database } from '@google-cloud/spanner';
import type { DatabaseTarget } from './tools/types.js';
import type { PlanNodeInput } from './plan/types.js';

type ResultSetStats = protos.google.spanner.v1.IResultSetStats;
type UpdateDatabaseDdlMetadata = protos.google.spanner.admin.database.v1.IUpdateDatabaseDdlMetadata;

// --- Common Types ---
export type AnalyzedQuery = { stats: ResultSetStats; planNodes: PlanNodeInput[]; };
export type DatabaseDdl = { statements: string[]; protoDescriptors: Uint8Array | null; };
export type DdlUpdateResult = { metadata: UpdateDatabaseDdlMetadata; };

// --- Spanner Adapter Interface ---
export interface ISpannerAdapter {
    // Runs the query in PLAN mode: nothing is executed, only the plan is returned.
    analyzeQuery(target: DatabaseTarget, sql: string): Promise<AnalyzedQuery>;
    getDatabaseDdl(target: DatabaseTarget): Promise<DatabaseDdl>;
    // Resolves once the long-running schema update has finished.
    updateDatabaseDdl(target: DatabaseTarget, statements: string[]): Promise<DdlUpdateResult>;
}

export function databasePath(target: DatabaseTarget): string {
    return `projects/${target.project}/instances/${target.instance}/databases/${target.database}`;
}

function toBytes(value: Uint8Array | string | null | undefined): Uint8Array | null {
    if (value === null || value === undefined) return null;
    // Bytes fields may arrive base64-encoded depending on how the response was decoded.
    const bytes = typeof value === 'string' ? Buffer.from(value, 'base64') : value;
    return bytes.length > 0 ? bytes : null;
}

// --- Spanner Adapter Implementation ---
// One client per call, closed when the call settles.
export class SpannerAdapter implements ISpannerAdapter {
    private async withClient<T>(target: DatabaseTarget, fn: (spanner: Spanner) => Promise<T>): Promise<T> {
        const spanner = new Spanner({ projectId: target.project });
        try {
            return await fn(spanner);
        } finally {
            spanner.close();
        }
    }

    // The session pool belongs to the database handle and must be closed before the client.
    private async withDatabase<T>(target: DatabaseTarget, fn: (database: Database) => Promise<T>): Promise<T> {
        return this.withClient(target, async (spanner) => {
            // A single query needs a single session; nothing is created ahead of it.
            const database = spanner.instance(target.instance).database(target.database, { min: 0 });
            try {
                return await fn(database);
            } finally {
                await database.close();
            }
        });
    }

    async analyzeQuery(target: DatabaseTarget, sql: string): Promise<AnalyzedQuery> {
        return this.withDatabase(target, async (database) => {
            console.error(`[spanner] Analyzing query on ${databasePath(target)}...`);
            const [, stats] = await database.run({
                sql,
                queryMode: protos.google.spanner.v1.ExecuteSqlRequest.QueryMode.PLAN,
            });
            return { stats, planNodes: stats?.queryPlan?.planNodes ?? [] };
        });
    }

    async getDatabaseDdl(target: DatabaseTarget): Promise<DatabaseDdl> {
        return this.withClient(target, async (spanner) => {
            const adminClient = spanner.getDatabaseAdminClient();
            console.error(`[spanner] Fetching DDL of ${databasePath(target)}...`);
            const [response] = await adminClient.getDatabaseDdl({
                database: databasePath(target),
            });
            return {
                statements: response.statements ?? [],
                protoDescriptors: toBytes(response.protoDescriptors),
            };
        });
    }

    async updateDatabaseDdl(target: DatabaseTarget, statements: string[]): Promise<DdlUpdateResult> {
        return this.withClient(target, async (spanner) => {
            const adminClient = spanner.getDatabaseAdminClient();
            console.error(`[spanner] Submitting ${statements.length} DDL statement(s) to ${databasePath(target)}...`);
            const [operation] = await adminClient.updateDatabaseDdl({
                database: databasePath(target),
                statements,
            });
            const [, metadata] = await operation.promise();
            console.error(`[spanner] DDL operation ${operation.name} finished.`);
            return { metadata };
        });
    }
}
