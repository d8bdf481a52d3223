#!/usr/bin/env node
// src/index.ts
// Import MCP server components
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

// Import the aggregated list of tool definitions
import allTools from './tools/index.js';
import { logConfigSummary } from './config.js';
import type { McpToolResponse, ToolDefinition } from "./tools/types.js";

// --- Create MCP Server Instance ---
const server = new McpServer({
  name: "spanner-mcp",
  version: "0.1.0",
});

// --- Logging Wrapper ---
// Use console.error for logging to avoid interfering with stdout/MCP communication
function withLogging(tool: ToolDefinition): (args: Record<string, unknown>) => Promise<McpToolResponse> {
  return async (args) => {
    console.error(`>>> Received request for tool: ${tool.name}`);
    console.error(`>>> Arguments: ${JSON.stringify(args)}`);
    try {
      const result = await tool.handler(args);
      console.error(`<<< Finished tool: ${tool.name} (Success: ${!result.isError})`);
      return result;
    } catch (error: unknown) {
      console.error(`!!! Uncaught error in handler for tool: ${tool.name}`, error);
      console.error(`<<< Finished tool: ${tool.name} (Uncaught Error)`);
      const message = error instanceof Error ? error.message : String(error);
      return {
        isError: true,
        content: [{ type: "text", text: `Internal server error in tool '${tool.name}': ${message}` }]
      };
    }
  };
}

// --- Register all imported tools with Logging Wrapper ---
console.error(`Registering ${allTools.length} tool(s)...`);
for (const tool of allTools) {
  server.tool(tool.name, tool.description, tool.rawInputSchema, withLogging(tool));
}
console.error("Tool registration complete.");

// --- Main Function to Start the Server ---
async function main() {
  logConfigSummary();

  const transport = new StdioServerTransport();
  console.error("Attempting to connect MCP server to STDIO transport...");
  await server.connect(transport);
  console.error("MCP Server connected via STDIO transport. Waiting for requests...");
}

// --- Run the Main Function ---
main().catch((error: unknown) => {
  console.error("Fatal error starting MCP server:", error);
  process.exit(1);
});
