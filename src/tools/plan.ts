// src/tools/plan.ts
import { z } from 'zod';
import { defineTool } from './types.js';
import type { ToolContext, ToolDefinition } from './types.js';
import { createDefaultToolContext, databaseTargetRawInput, formatErrorResponse, resolveDatabaseTarget, toJsonText } from './utils.js';
import { QueryPlan } from '../plan/query_plan.js';
import { processPlan } from '../plan/plan_tree.js';
import { formatPlanReport } from '../plan/plan_formatter.js';

// --- Tool: plan ---
const planRawInput = {
  query: z.string().min(1).describe("Query text of SQL or GQL."),
  ...databaseTargetRawInput,
};

export function createPlanTool(context: ToolContext): ToolDefinition {
  return defineTool({
    name: "plan",
    description: "Get execution plan for the query. The first content is the machine-readable query plan (JSON of the result set stats). The second content is the human-readable rendered query plan.",
    rawInputSchema: planRawInput,
    handler: async (args) => {
      const resolution = resolveDatabaseTarget(args, context.defaults);
      if (!resolution.ok) return resolution.response;
      const { target } = resolution;

      try {
        console.error(`[plan] Requesting plan for query on '${target.database}'...`);
        const analyzed = await context.getAdapter().analyzeQuery(target, args.query);

        const rows = processPlan(new QueryPlan(analyzed.planNodes));
        console.error(`[plan] Plan has ${analyzed.planNodes.length} node(s), ${rows.length} operator row(s).`);
        const report = formatPlanReport(rows, { includeChildLinks: context.showChildLinks });

        return {
          content: [
            { type: "text", text: toJsonText(analyzed.stats) },
            { type: "text", text: report },
          ],
        };
      } catch (error: unknown) {
        return formatErrorResponse('plan', 'analyze query', error, target);
      }
    },
  });
}

export const planTool: ToolDefinition = createPlanTool(createDefaultToolContext());
