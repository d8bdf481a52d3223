// src/plan/types.ts

/**
 * A child operator referenced from a plan row, optionally bound to a variable.
 */
export type ResolvedChildLink = {
  variableName: string;
  childDescription: string;
};

/**
 * One display-ready entry of a linearized execution plan.
 * Rows arrive in pre-order (parent before its descendants) and are never reordered.
 */
export interface PlanRow {
  readonly id: number;
  readonly predicates: readonly string[];
  // Keyed by link-type label; the empty string groups untyped links.
  readonly childLinks: Readonly<Record<string, readonly ResolvedChildLink[]>>;
  formatId(): string;
  text(): string;
}

// --- Raw plan nodes (structurally compatible with google.spanner.v1.IPlanNode) ---

export type StructValueLike = {
  nullValue?: unknown;
  numberValue?: number | null;
  stringValue?: string | null;
  boolValue?: boolean | null;
  structValue?: StructLike | null;
  listValue?: { values?: StructValueLike[] | null } | null;
};

export type StructLike = {
  fields?: { [key: string]: StructValueLike } | null;
};

export type PlanNodeLink = {
  childIndex?: number | null;
  type?: string | null;
  variable?: string | null;
};

export type PlanNodeInput = {
  index?: number | null;
  // 'RELATIONAL' | 'SCALAR' when enums are decoded as strings, 1 | 2 otherwise.
  kind?: string | number | null;
  displayName?: string | null;
  childLinks?: PlanNodeLink[] | null;
  shortRepresentation?: { description?: string | null } | null;
  metadata?: StructLike | null;
};
