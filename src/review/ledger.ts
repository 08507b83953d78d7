import type { ViolationKind } from "./findings.js";

export type ViolationLedger = Record<ViolationKind, string[]>;

export const TABLE_KIND_TITLES: Record<ViolationKind, string> = {
  errors: "Error",
  warnings: "Warning",
  messages: "Message"
};

const TABLE_PATTERN = /<table>([\s\S]*?)<\/table>/g;
const TABLE_KIND_PATTERN = /data-danger-table="true"\s+data-kind="(Error|Warning|Message)"/;
const STICKY_ROW_PATTERN = /<td data-sticky="true">(?:<del>)?([\s\S]*?)(?:<\/del>)?\s*<\/td>/g;

function kindFromTitle(title: string): ViolationKind | null {
  if (title === "Error") return "errors";
  if (title === "Warning") return "warnings";
  if (title === "Message") return "messages";
  return null;
}

/** Form a message takes once it has been posted and read back from a report. */
export function normalizeLedgerMessage(message: string): string {
  return message.replace(/\r\n/g, "\n").trim();
}

export function emptyLedger(): ViolationLedger {
  return { errors: [], warnings: [], messages: [] };
}

export function isLedgerEmpty(ledger: ViolationLedger | null): boolean {
  if (!ledger) return true;
  return ledger.errors.length === 0 && ledger.warnings.length === 0 && ledger.messages.length === 0;
}

/**
 * Recovers the sticky violations rendered into a previous report.
 * Returns null when the body holds no report table.
 */
export function parseLedger(body: string | null | undefined): ViolationLedger | null {
  if (!body) return null;
  let ledger: ViolationLedger | null = null;
  for (const table of body.replace(/\r\n/g, "\n").matchAll(TABLE_PATTERN)) {
    const kindMatch = table[1].match(TABLE_KIND_PATTERN);
    const kind = kindMatch ? kindFromTitle(kindMatch[1]) : null;
    if (!kind) continue;
    if (!ledger) ledger = emptyLedger();
    for (const row of table[1].matchAll(STICKY_ROW_PATTERN)) {
      ledger[kind].push(normalizeLedgerMessage(row[1]));
    }
  }
  return ledger;
}
