// src/tools/utils.ts
import { z } from 'zod';
import { planConfig, spannerConfig } from '../config.js';
import { SpannerAdapter } from '../spanner_adapter.js';
import type { DatabaseTarget, McpToolResponse, ToolContext } from './types.js';

// --- Default Tool Context ---
export function createDefaultToolContext(): ToolContext {
    return {
        getAdapter: () => new SpannerAdapter(),
        defaults: {
            project: spannerConfig.projectId,
            instance: spannerConfig.instanceId,
            database: spannerConfig.databaseId,
        },
        showChildLinks: planConfig.showChildLinks,
    };
}

// --- Target Resolution ---
// Shared by every tool: the database the request goes to.
export const databaseTargetRawInput = {
    project: z.string().optional().describe("Google Cloud project (defaults to SPANNER_PROJECT_ID)."),
    instance: z.string().optional().describe("Spanner instance id (defaults to SPANNER_INSTANCE_ID)."),
    database: z.string().optional().describe("Spanner database id (defaults to SPANNER_DATABASE_ID)."),
};

type TargetArgs = { project?: string; instance?: string; database?: string };

export type TargetResolution =
    | { ok: true; target: DatabaseTarget }
    | { ok: false; response: McpToolResponse };

function missingParameter(name: keyof DatabaseTarget): TargetResolution {
    return {
        ok: false,
        response: {
            isError: true,
            content: [{ type: "text", text: `Missing required parameter '${name}' and no default is configured.` }],
        },
    };
}

/**
 * Fills project/instance/database from configured defaults.
 */
export function resolveDatabaseTarget(args: TargetArgs, defaults: Partial<DatabaseTarget>): TargetResolution {
    const project = args.project || defaults.project;
    const instance = args.instance || defaults.instance;
    const database = args.database || defaults.database;

    if (!project) return missingParameter('project');
    if (!instance) return missingParameter('instance');
    if (!database) return missingParameter('database');
    return { ok: true, target: { project, instance, database } };
}

// --- JSON Rendering ---
/**
 * Pretty JSON for machine-readable tool content. Byte fields become base64 strings.
 */
export function toJsonText(value: unknown): string {
    return JSON.stringify(value, function (this: Record<string, unknown>, key: string, current: unknown) {
        // Buffers have already gone through toJSON here; the holder still has the raw bytes.
        const raw = this[key];
        if (raw instanceof Uint8Array) return Buffer.from(raw).toString('base64');
        return current;
    }, 2);
}

// --- Shared Error Formatting Helper ---
// gRPC status codes surfaced by the Spanner client.
const GRPC_STATUS_MESSAGES: Record<number, string> = {
    3: 'Invalid argument. Check the query or DDL syntax.',
    4: 'Deadline exceeded before the request completed.',
    5: 'Not found. Check that the project, instance and database exist.',
    6: 'Already exists.',
    7: 'Permission denied for the configured credentials.',
    9: 'Failed precondition. The database may be in a state that rejects this request.',
    14: 'Spanner is unavailable. Check network access or the emulator host.',
    16: 'Unauthenticated. Check Application Default Credentials.',
};

function describeError(error: unknown): { code?: number; message: string } {
    if (error instanceof Error) {
        const code = 'code' in error && typeof error.code === 'number' ? error.code : undefined;
        return { code, message: error.message };
    }
    return { message: String(error) };
}

/**
 * Formats an error into the standard McpToolResponse error structure.
 * Logs the full error server-side.
 */
export function formatErrorResponse(
    toolName: string,
    operationDesc: string,
    error: unknown,
    target?: DatabaseTarget,
): McpToolResponse {
    console.error(`[${toolName}] Error ${operationDesc}:`, error); // Log full error server-side

    const baseMessage = target
        ? `Failed to ${operationDesc} on database '${target.database}' (instance '${target.instance}', project '${target.project}').`
        : `Failed to ${operationDesc}.`;

    const { code, message } = describeError(error);
    const specificError = code !== undefined
        ? `Spanner Error: ${GRPC_STATUS_MESSAGES[code] ?? `gRPC status code ${code}.`}`
        : '';

    const text = [baseMessage, specificError].filter(Boolean).join(' ');
    return {
        isError: true,
        content: [{ type: "text", text: `${text}\nServer Details: ${message}` }],
    };
}
