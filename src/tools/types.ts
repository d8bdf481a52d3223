// src/tools/types.ts
import { z, type ZodRawShape } from 'zod';
import type { ISpannerAdapter } from '../spanner_adapter.js';

/**
 * Defines the standard structure for a successful or error response from an MCP tool.
 */
export type McpToolResponse = {
  // Array of content blocks, typically text for simple responses.
  content: { type: "text"; text: string }[];
  // Optional flag to indicate if the response represents an error state.
  isError?: boolean;
};

/**
 * Defines the structure for a tool definition object used for registration.
 */
export type ToolDefinition = {
    name: string;
    description: string;
    // The raw Zod shape (not the parsed schema), as the MCP SDK expects it.
    rawInputSchema: ZodRawShape;
    // Parses its own arguments, so defaults declared in the shape always apply.
    handler: (args: unknown) => Promise<McpToolResponse>;
};

/**
 * Builds a ToolDefinition whose handler sees arguments typed from its shape.
 */
export function defineTool<Shape extends ZodRawShape>(definition: {
    name: string;
    description: string;
    rawInputSchema: Shape;
    handler: (args: z.objectOutputType<Shape, z.ZodTypeAny, 'strip'>) => Promise<McpToolResponse>;
}): ToolDefinition {
    const schema = z.object(definition.rawInputSchema);
    return {
        name: definition.name,
        description: definition.description,
        rawInputSchema: definition.rawInputSchema,
        handler: async (args) => definition.handler(schema.parse(args)),
    };
}

/**
 * Fully qualified location of a Spanner database.
 */
export type DatabaseTarget = {
    project: string;
    instance: string;
    database: string;
};

/**
 * What a tool needs from the outside world. Tests swap the adapter for a fake.
 */
export type ToolContext = {
    getAdapter: () => ISpannerAdapter;
    defaults: Partial<DatabaseTarget>;
    showChildLinks: boolean;
};
