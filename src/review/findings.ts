import fs from "fs/promises";
import { jsonrepair } from "jsonrepair";
import { z } from "zod";

export const FINDING_KINDS = ["warnings", "errors", "messages", "markdowns"] as const;

export type FindingKind = (typeof FINDING_KINDS)[number];

export type ViolationKind = Exclude<FindingKind, "markdowns">;

export const VIOLATION_KINDS: readonly ViolationKind[] = ["errors", "warnings", "messages"];

// A bare string is a non-sticky violation. Sticky ones are recorded in the report
// and shown as resolved once a later run stops reporting them.
export const ViolationSchema = z.union([
  z.string().transform((message) => ({ message, sticky: false })),
  z.object({
    message: z.string(),
    sticky: z.boolean().default(false)
  })
]);

export type Violation = { message: string; sticky: boolean };

export const FindingSetSchema = z.object({
  warnings: z.array(ViolationSchema).default([]),
  errors: z.array(ViolationSchema).default([]),
  messages: z.array(ViolationSchema).default([]),
  markdowns: z.array(z.string()).default([])
});

export type FindingSet = {
  warnings: Violation[];
  errors: Violation[];
  messages: Violation[];
  markdowns: string[];
};

export function violation(message: string, sticky = false): Violation {
  return { message, sticky };
}

export function emptyFindingSet(): FindingSet {
  return { warnings: [], errors: [], messages: [], markdowns: [] };
}

export function isFindingSetEmpty(findings: FindingSet): boolean {
  return FINDING_KINDS.every((kind) => findings[kind].length === 0);
}

/** Drops warnings and errors the author silenced; messages and markdown notes are kept. */
export function withoutIgnored(findings: FindingSet, ignored: readonly string[]): FindingSet {
  if (ignored.length === 0) return findings;
  const silenced = new Set(ignored);
  return {
    ...findings,
    warnings: findings.warnings.filter((warning) => !silenced.has(warning.message)),
    errors: findings.errors.filter((error) => !silenced.has(error.message))
  };
}

// Malformed JSON (trailing commas, single quotes) is repaired before validation.
export function parseFindings(raw: string): FindingSet {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    parsed = JSON.parse(jsonrepair(raw));
  }
  return FindingSetSchema.parse(parsed);
}

export async function readFindingsFile(filePath: string): Promise<FindingSet> {
  return parseFindings(await fs.readFile(filePath, "utf8"));
}
