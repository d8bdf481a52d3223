// src/plan/plan_formatter.ts
import type { PlanRow, ResolvedChildLink } from './types.js';

const TABLE_HEADER = ['ID', 'Operator'] as const;
const PREDICATES_HEADER = 'Predicates(identified by ID):';
const CHILD_LINKS_HEADER = 'Child Links(identified by ID):';

export type FormatPlanOptions = {
  // Off by default: reports carry the operator table and predicates only.
  includeChildLinks?: boolean;
};

/**
 * Digit count of the largest row ID, shared by every ID column of the report.
 */
export function computeMaxIdLength(rows: readonly PlanRow[]): number {
  let maxIdLength = 0;
  for (const row of rows) {
    maxIdLength = Math.max(maxIdLength, String(row.id).length);
  }
  return maxIdLength;
}

// Widths count code points, so astral characters take one column like any other.
function cellWidth(text: string): number {
  return [...text].length;
}

function padCell(text: string, width: number, align: 'left' | 'right'): string {
  const padding = ' '.repeat(Math.max(0, width - cellWidth(text)));
  return align === 'left' ? `${text}${padding}` : `${padding}${text}`;
}

/**
 * Renders rows as a bordered two-column table. IDs are right-aligned, operator
 * text is left-aligned and never wrapped. No rows, no table.
 */
export function renderTreeTable(rows: readonly PlanRow[]): string {
  if (rows.length === 0) return '';

  const cells: [string, string][] = [];
  for (const row of rows) {
    row.text().split('\n').forEach((line, index) => {
      cells.push([index === 0 ? row.formatId() : '', line]);
    });
  }

  const idWidth = Math.max(cellWidth(TABLE_HEADER[0]), ...cells.map(([id]) => cellWidth(id)));
  const textWidth = Math.max(cellWidth(TABLE_HEADER[1]), ...cells.map(([, text]) => cellWidth(text)));
  const border = `+${'-'.repeat(idWidth + 2)}+${'-'.repeat(textWidth + 2)}+`;

  const lines = [
    border,
    `| ${padCell(TABLE_HEADER[0], idWidth, 'left')} | ${padCell(TABLE_HEADER[1], textWidth, 'left')} |`,
    border,
    ...cells.map(([id, text]) => `| ${padCell(id, idWidth, 'right')} | ${padCell(text, textWidth, 'left')} |`),
    border,
  ];
  return lines.map(line => `${line}\n`).join('');
}

/**
 * `" 3:"` for the first line of a row, blank padding of the same width after that.
 */
export function idPrefix(id: number, maxIdLength: number, isFirstLine: boolean): string {
  return isFirstLine ? `${String(id).padStart(maxIdLength)}:` : ' '.repeat(maxIdLength + 1);
}

export function buildPredicateLines(rows: readonly PlanRow[], maxIdLength: number): string[] {
  const lines: string[] = [];
  for (const row of rows) {
    row.predicates.forEach((predicate, index) => {
      lines.push(`${idPrefix(row.id, maxIdLength, index === 0)} ${predicate}`);
    });
  }
  return lines;
}

export function describeChildLink(link: ResolvedChildLink): string {
  return link.variableName !== ''
    ? `$${link.variableName}=${link.childDescription}`
    : link.childDescription;
}

/**
 * One line per labelled link type of each row, types in sorted order.
 * The untyped group (empty key) is skipped, as is any type whose descriptions join to nothing.
 */
export function buildChildLinkLines(rows: readonly PlanRow[], maxIdLength: number): string[] {
  const lines: string[] = [];
  for (const row of rows) {
    let idShown = false;
    for (const type of Object.keys(row.childLinks).sort()) {
      if (type === '') continue;
      const joined = (row.childLinks[type] ?? []).map(describeChildLink).join(', ');
      if (joined === '') continue;

      lines.push(`${idPrefix(row.id, maxIdLength, !idShown)} ${type}: ${joined}`);
      idShown = true;
    }
  }
  return lines;
}

function renderSection(header: string, lines: readonly string[]): string {
  if (lines.length === 0) return '';
  return `${header}\n${lines.map(line => ` ${line}\n`).join('')}`;
}

/**
 * Composes the plan report: operator table followed by the predicate cross-reference.
 */
export function formatPlanReport(rows: readonly PlanRow[], options: FormatPlanOptions = {}): string {
  const maxIdLength = computeMaxIdLength(rows);

  let report = renderTreeTable(rows);
  report += renderSection(PREDICATES_HEADER, buildPredicateLines(rows, maxIdLength));

  if (options.includeChildLinks) {
    report += renderSection(CHILD_LINKS_HEADER, buildChildLinkLines(rows, maxIdLength));
  }
  return report;
}
