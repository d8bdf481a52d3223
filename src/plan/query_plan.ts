// src/plan/query_plan.ts
import type { PlanNodeInput, PlanNodeLink, StructLike, StructValueLike } from './types.js';

const RELATIONAL_KIND_NAME = 'RELATIONAL';
const RELATIONAL_KIND_VALUE = 1;

// Metadata keys folded into the operator name or hidden from the property list.
const TITLE_METADATA_KEYS = new Set(['call_type', 'iterator_type', 'scan_type', 'scan_target', 'subquery_cluster_node']);

export type LinkedChild = {
  link: PlanNodeLink;
  child: PlanNodeInput;
};

/**
 * Index over the flat plan-node list returned by a PLAN mode query.
 */
export class QueryPlan {
  private readonly nodesByIndex = new Map<number, PlanNodeInput>();

  constructor(planNodes: readonly PlanNodeInput[]) {
    planNodes.forEach((node, position) => {
      this.nodesByIndex.set(node.index ?? position, node);
    });
  }

  get size(): number {
    return this.nodesByIndex.size;
  }

  getNodeByIndex(index: number): PlanNodeInput | undefined {
    return this.nodesByIndex.get(index);
  }

  /**
   * Resolves each child link of a node to the node it points at.
   * Links to unknown indexes are dropped.
   */
  resolveChildLinks(node: PlanNodeInput): LinkedChild[] {
    const resolved: LinkedChild[] = [];
    for (const link of node.childLinks ?? []) {
      const child = this.nodesByIndex.get(link.childIndex ?? 0);
      if (child) resolved.push({ link, child });
    }
    return resolved;
  }
}

export function isRelational(node: PlanNodeInput): boolean {
  return node.kind === RELATIONAL_KIND_NAME || node.kind === RELATIONAL_KIND_VALUE;
}

function structValueToPlain(value: StructValueLike): unknown {
  if (value.stringValue !== undefined && value.stringValue !== null) return value.stringValue;
  if (value.numberValue !== undefined && value.numberValue !== null) return value.numberValue;
  if (value.boolValue !== undefined && value.boolValue !== null) return value.boolValue;
  if (value.structValue) return structToRecord(value.structValue);
  if (value.listValue) return (value.listValue.values ?? []).map(structValueToPlain);
  return null;
}

/**
 * Converts a protobuf Struct into a plain object.
 */
export function structToRecord(struct: StructLike | null | undefined): Record<string, unknown> {
  const record: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(struct?.fields ?? {})) {
    record[key] = structValueToPlain(value);
  }
  return record;
}

function metadataValueToString(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return JSON.stringify(value);
}

/**
 * Builds the single-line operator label, e.g.
 * `Local Distributed Union` or `Table Scan (Table: Singers, scan_method: Automatic)`.
 */
export function nodeTitle(node: PlanNodeInput): string {
  const metadata = structToRecord(node.metadata);
  const nameParts: string[] = [];
  const properties: string[] = [];

  for (const key of ['call_type', 'iterator_type']) {
    const value = metadata[key];
    if (value !== undefined && value !== null && value !== '') nameParts.push(metadataValueToString(value));
  }

  const scanType = metadata['scan_type'];
  if (typeof scanType === 'string' && scanType !== '') {
    const scanLabel = scanType.replace(/Scan$/, '');
    nameParts.push(scanLabel);
    properties.push(`${scanLabel}: ${metadataValueToString(metadata['scan_target'] ?? '')}`);
  }
  nameParts.push(node.displayName ?? '');

  for (const key of Object.keys(metadata).sort()) {
    if (TITLE_METADATA_KEYS.has(key)) continue;
    properties.push(`${key}: ${metadataValueToString(metadata[key])}`);
  }

  const name = nameParts.filter(part => part !== '').join(' ');
  return properties.length > 0 ? `${name} (${properties.join(', ')})` : name;
}
