// src/tools/index.ts
import type { ToolDefinition } from './types.js'; // Import shared type

import { planTool } from './plan.js';
import { ddlTools } from './ddl.js';

// Combine all tool definitions into a single array
const allTools: ToolDefinition[] = [
  planTool,
  ...ddlTools,
];

export default allTools;
