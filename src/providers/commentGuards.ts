import type { ProviderIssueComment } from "./types.js";

// Bumping this breaks recognition of every report posted before the bump.
const MARKER_PREFIX = "generated_by_";

export function generatedByMarker(dangerId: string): string {
  return `"${MARKER_PREFIX}${dangerId}"`;
}

export function isGeneratedByDanger(body: string, dangerId: string): boolean {
  return (body || "").includes(generatedByMarker(dangerId));
}

export function selectGeneratedComments<T extends Pick<ProviderIssueComment, "body">>(
  comments: T[],
  dangerId: string
): T[] {
  return comments.filter((comment) => isGeneratedByDanger(comment.body, dangerId));
}
