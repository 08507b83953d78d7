const IGNORE_DIRECTIVE = />\s*danger\s*:\s*ignore\s*"(.*)"/gi;

/**
 * Collects the tokens of every `> danger: ignore "..."` line in a pull request
 * description. Order and duplicates are kept.
 */
export function scanIgnoredViolations(description: string | null | undefined): string[] {
  if (!description) return [];
  const tokens: string[] = [];
  for (const match of description.replace(/\r?\n$/, "").matchAll(IGNORE_DIRECTIVE)) {
    tokens.push(match[1]);
  }
  return tokens;
}
