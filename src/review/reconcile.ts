import { selectGeneratedComments } from "../providers/commentGuards.js";
import type { ProviderClient, ProviderIssueComment } from "../providers/types.js";
import { FindingSet, isFindingSetEmpty } from "./findings.js";
import { isLedgerEmpty, parseLedger } from "./ledger.js";
import { ReportRenderer, renderReport } from "./render.js";

export type ReportAction = "created" | "updated" | "deleted" | "noop";

export type ReportOutcome = {
  action: ReportAction;
  commentId: string | null;
  url: string | null;
  deletedCommentIds: string[];
};

type CommentWriter = Pick<ProviderClient, "createIssueComment" | "updateIssueComment" | "deleteIssueComment">;

async function deleteComments(client: CommentWriter, comments: ProviderIssueComment[]): Promise<string[]> {
  const deleted: string[] = [];
  for (const comment of comments) {
    await client.deleteIssueComment(comment.id);
    deleted.push(comment.id);
  }
  return deleted;
}

/**
 * Converges the pull request on a single report comment for `dangerId`.
 *
 * When neither the previous report nor this run has anything to say, every
 * report for `dangerId` is removed. Otherwise the oldest one is rewritten in
 * place (or a new one posted) and any duplicates are removed.
 */
export async function reconcileReport(params: {
  client: CommentWriter;
  comments: ProviderIssueComment[];
  findings: FindingSet;
  dangerId: string;
  render?: ReportRenderer;
}): Promise<ReportOutcome> {
  const { client, findings, dangerId } = params;
  const render = params.render ?? renderReport;
  const generated = selectGeneratedComments(params.comments, dangerId);
  const existing = generated.length > 0 ? generated[0] : null;
  const previousLedger = existing ? parseLedger(existing.body) : null;

  if (isLedgerEmpty(previousLedger) && isFindingSetEmpty(findings)) {
    const deletedCommentIds = await deleteComments(client, generated);
    return {
      action: deletedCommentIds.length > 0 ? "deleted" : "noop",
      commentId: null,
      url: null,
      deletedCommentIds
    };
  }

  const body = render({
    warnings: findings.warnings,
    errors: findings.errors,
    messages: findings.messages,
    markdowns: findings.markdowns,
    previousLedger,
    dangerId
  });

  if (existing) {
    const updated = await client.updateIssueComment(existing.id, body);
    const deletedCommentIds = await deleteComments(client, generated.slice(1));
    return { action: "updated", commentId: updated.id, url: updated.url || null, deletedCommentIds };
  }

  const created = await client.createIssueComment(body);
  return { action: "created", commentId: created.id, url: created.url || null, deletedCommentIds: [] };
}
