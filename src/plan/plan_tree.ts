// src/plan/plan_tree.ts
import { QueryPlan, isRelational, nodeTitle } from './query_plan.js';
import type { PlanNodeInput, PlanRow, ResolvedChildLink } from './types.js';

const SPLIT_RANGE_LINK_TYPE = 'Split Range';

export type PlanRowInit = {
  id: number;
  text: string;
  predicates?: string[];
  childLinks?: Record<string, ResolvedChildLink[]>;
};

/**
 * Creates a plan row. Rows carrying predicates display their ID as `*<id>`.
 */
export function createPlanRow(init: PlanRowInit): PlanRow {
  const predicates = init.predicates ?? [];
  const childLinks = init.childLinks ?? {};
  return {
    id: init.id,
    predicates,
    childLinks,
    formatId: () => `${predicates.length > 0 ? '*' : ''}${init.id}`,
    text: () => init.text,
  };
}

function isPredicateLinkType(type: string): boolean {
  return type.endsWith('Condition') || type === SPLIT_RANGE_LINK_TYPE;
}

/**
 * Linearizes a query plan into display rows, walking relational operators
 * in pre-order from the root (node 0). Each node is emitted at most once, so
 * shared or cyclic relational links cannot repeat an ID.
 */
export function processPlan(plan: QueryPlan): PlanRow[] {
  const root = plan.getNodeByIndex(0);
  if (!root) return [];

  const rows: PlanRow[] = [];
  const visited = new Set<number>();

  const visit = (node: PlanNodeInput, id: number, text: string, indent: string): void => {
    visited.add(id);
    const predicates: string[] = [];
    const childLinks: Record<string, ResolvedChildLink[]> = {};
    const relationalChildren: { node: PlanNodeInput; id: number; type: string }[] = [];

    for (const { link, child } of plan.resolveChildLinks(node)) {
      const type = link.type ?? '';
      const childId = link.childIndex ?? 0;
      if (isRelational(child)) {
        if (!visited.has(childId) && !relationalChildren.some(c => c.id === childId)) {
          relationalChildren.push({ node: child, id: childId, type });
        }
        continue;
      }
      const description = child.shortRepresentation?.description ?? '';
      if (isPredicateLinkType(type)) {
        predicates.push(`${type}: ${description}`);
      } else {
        (childLinks[type] ??= []).push({ variableName: link.variable ?? '', childDescription: description });
      }
    }

    rows.push(createPlanRow({ id, text, predicates, childLinks }));

    relationalChildren.forEach((child, position) => {
      // Reached through an earlier sibling's subtree.
      if (visited.has(child.id)) return;
      const isLast = position === relationalChildren.length - 1;
      const typeLabel = child.type !== '' ? `[${child.type}] ` : '';
      visit(
        child.node,
        child.id,
        `${indent}+- ${typeLabel}${nodeTitle(child.node)}`,
        `${indent}${isLast ? '   ' : '|  '}`,
      );
    });
  };

  visit(root, root.index ?? 0, nodeTitle(root), '');
  return rows;
}
