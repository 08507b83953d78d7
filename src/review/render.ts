import { generatedByMarker } from "../providers/commentGuards.js";
import { VIOLATION_KINDS, type Violation, type ViolationKind } from "./findings.js";
import { TABLE_KIND_TITLES, ViolationLedger, normalizeLedgerMessage } from "./ledger.js";

export type RenderReportParams = {
  warnings: Violation[];
  errors: Violation[];
  messages: Violation[];
  markdowns: string[];
  previousLedger: ViolationLedger | null;
  dangerId: string;
};

export type ReportRenderer = (params: RenderReportParams) => string;

const KIND_EMOJI: Record<ViolationKind, string> = {
  errors: ":no_entry_sign:",
  warnings: ":warning:",
  messages: ":book:"
};

const RESOLVED_EMOJI = ":white_check_mark:";

export function pluralize(count: number, noun: string): string {
  return count === 1 ? `1 ${noun}` : `${count} ${noun}s`;
}

export function describeFindings(params: { warnings: readonly unknown[]; errors: readonly unknown[] }): string {
  const parts: string[] = [];
  if (params.errors.length > 0) parts.push(pluralize(params.errors.length, "error"));
  if (params.warnings.length > 0) parts.push(pluralize(params.warnings.length, "warning"));
  return parts.length > 0 ? parts.join(", ") : "All green.";
}

function renderRow(emoji: string, cell: string): string {
  return ["    <tr>", `      <td>${emoji}</td>`, `      ${cell}`, "    </tr>"].join("\n");
}

function renderTable(kind: ViolationKind, current: Violation[], resolved: string[]): string | null {
  if (current.length === 0 && resolved.length === 0) return null;
  const title = TABLE_KIND_TITLES[kind];
  const rows = [
    ...current.map((item) =>
      renderRow(KIND_EMOJI[kind], `<td data-sticky="${item.sticky}">${item.message}</td>`)
    ),
    // Resolved rows are not sticky, so they show once and then fall out of the ledger.
    ...resolved.map((message) => renderRow(RESOLVED_EMOJI, `<td data-sticky="false"><del>${message}</del></td>`))
  ];
  return [
    "<table>",
    "  <thead>",
    "    <tr>",
    '      <th width="50"></th>',
    `      <th width="100%" data-danger-table="true" data-kind="${title}">${pluralize(current.length, title)}</th>`,
    "    </tr>",
    "  </thead>",
    "  <tbody>",
    ...rows,
    "  </tbody>",
    "</table>"
  ].join("\n");
}

function resolvedFor(kind: ViolationKind, current: Violation[], ledger: ViolationLedger | null): string[] {
  if (!ledger) return [];
  const stillReported = new Set(current.map((item) => normalizeLedgerMessage(item.message)));
  return [...new Set(ledger[kind].map(normalizeLedgerMessage))].filter((message) => !stillReported.has(message));
}

export function renderFooter(dangerId: string): string {
  return [
    `<p align="right" data-meta=${generatedByMarker(dangerId)}>`,
    '  Generated by :no_entry_sign: <a href="https://danger.systems/">Danger</a>',
    "</p>"
  ].join("\n");
}

export const renderReport: ReportRenderer = (params) => {
  const current: Record<ViolationKind, Violation[]> = {
    errors: params.errors,
    warnings: params.warnings,
    messages: params.messages
  };
  const sections: string[] = [];
  const hasViolations = params.errors.length + params.warnings.length + params.messages.length > 0;
  if (!hasViolations && params.markdowns.length === 0) {
    sections.push(`${RESOLVED_EMOJI} All green.`);
  }
  for (const kind of VIOLATION_KINDS) {
    const table = renderTable(kind, current[kind], resolvedFor(kind, current[kind], params.previousLedger));
    if (table) sections.push(table);
  }
  sections.push(...params.markdowns);
  sections.push(renderFooter(params.dangerId));
  return sections.join("\n\n");
};
