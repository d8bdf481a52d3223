// src/tools/ddl.ts
import { z } from 'zod';
import descriptor from 'protobufjs/ext/descriptor/index.js';
import { defineTool } from './types.js';
import type { ToolContext, ToolDefinition } from './types.js';
import type { DatabaseDdl } from '../spanner_adapter.js';
import { createDefaultToolContext, databaseTargetRawInput, formatErrorResponse, resolveDatabaseTarget, toJsonText } from './utils.js';

// --- Tool: get_ddl ---
const getDdlRawInput = {
  ...databaseTargetRawInput,
  include_proto_descriptors: z.boolean().default(false).describe("Enable only if proto_descriptors is needed."),
};

/**
 * Decodes serialized `google.protobuf.FileDescriptorSet` bytes into plain JSON-ready objects.
 * Enum values are rendered by name; 64-bit integers and bytes as strings.
 */
export function decodeFileDescriptorSet(bytes: Uint8Array): Record<string, unknown> {
  const message = descriptor.FileDescriptorSet.decode(bytes);
  return descriptor.FileDescriptorSet.toObject(message, { enums: String, longs: String, bytes: String });
}

export function createGetDdlTool(context: ToolContext): ToolDefinition {
  return defineTool({
    name: "get_ddl",
    description: "Get DDL of the database. The first content is the whole response, and the second content is the decoded proto descriptors (only when include_proto_descriptors is set).",
    rawInputSchema: getDdlRawInput,
    handler: async (args) => {
      const resolution = resolveDatabaseTarget(args, context.defaults);
      if (!resolution.ok) return resolution.response;
      const { target } = resolution;

      let ddl: DatabaseDdl;
      try {
        ddl = await context.getAdapter().getDatabaseDdl(target);
        console.error(`[get_ddl] Retrieved ${ddl.statements.length} statement(s) from '${target.database}'.`);
      } catch (error: unknown) {
        return formatErrorResponse('get_ddl', 'retrieve DDL', error, target);
      }

      // Malformed descriptors fail the call even when they are not returned.
      let descriptors: Record<string, unknown> | null = null;
      try {
        if (ddl.protoDescriptors) descriptors = decodeFileDescriptorSet(ddl.protoDescriptors);
      } catch (error: unknown) {
        return formatErrorResponse('get_ddl', 'decode proto descriptors', error, target);
      }

      if (!args.include_proto_descriptors) {
        return { content: [{ type: "text", text: toJsonText({ statements: ddl.statements }) }] };
      }

      return {
        content: [
          { type: "text", text: toJsonText(ddl) },
          { type: "text", text: descriptors ? toJsonText(descriptors) : 'The database has no proto descriptors.' },
        ],
      };
    },
  });
}

// --- Tool: update_ddl ---
const updateDdlRawInput = {
  ...databaseTargetRawInput,
  statements: z.array(z.string().min(1)).min(1).describe("DDL statements."),
};

export function createUpdateDdlTool(context: ToolContext): ToolDefinition {
  return defineTool({
    name: "update_ddl",
    description: "Update DDL of the database. Waits for the schema change to complete and returns its operation metadata.",
    rawInputSchema: updateDdlRawInput,
    handler: async (args) => {
      const resolution = resolveDatabaseTarget(args, context.defaults);
      if (!resolution.ok) return resolution.response;
      const { target } = resolution;

      try {
        const result = await context.getAdapter().updateDatabaseDdl(target, args.statements);
        return { content: [{ type: "text", text: toJsonText(result.metadata) }] };
      } catch (error: unknown) {
        return formatErrorResponse('update_ddl', 'update DDL', error, target);
      }
    },
  });
}

const defaultContext = createDefaultToolContext();

export const getDdlTool: ToolDefinition = createGetDdlTool(defaultContext);
export const updateDdlTool: ToolDefinition = createUpdateDdlTool(defaultContext);

// --- Aggregate DDL Tools ---
export const ddlTools: ToolDefinition[] = [
    getDdlTool,
    updateDdlTool,
];
