import { StatusPermissionError } from "../providers/errors.js";
import type { CommitState, ProviderClient, RepoVisibility } from "../providers/types.js";
import type { FindingSet } from "./findings.js";
import { describeFindings, pluralize } from "./render.js";

export const DEFAULT_STATUS_CONTEXT = "danger/danger";

export type StatusOutcome =
  | { status: "submitted"; state: CommitState; description: string; context: string; targetUrl: string | null }
  | { status: "skipped"; state: CommitState; description: string }
  | { status: "aborted"; message: string };

export function statusStateFor(findings: Pick<FindingSet, "errors"> & Partial<FindingSet>): CommitState {
  return findings.errors.length === 0 ? "success" : "failure";
}

export function permissionFailureMessage(errorCount: number, visibility: RepoVisibility): string {
  const found = `Found ${pluralize(errorCount, "error")}`;
  if (visibility === "private") {
    return `\nDanger has failed this build. \n${found} and I don't have write access to the PR to set a PR status.`;
  }
  return `\nDanger has failed this build. \n${found}.`;
}

export async function submitPullRequestStatus(params: {
  client: Pick<ProviderClient, "setCommitStatus">;
  findings: FindingSet;
  headSha: string | null | undefined;
  detailsUrl: string | null;
  repoVisibility: RepoVisibility;
  context?: string;
}): Promise<StatusOutcome> {
  const { client, findings, detailsUrl, repoVisibility } = params;
  const context = params.context || DEFAULT_STATUS_CONTEXT;
  const headSha = params.headSha?.trim();
  if (!headSha) {
    return { status: "aborted", message: "Couldn't find a commit to update its status" };
  }

  const state = statusStateFor(findings);
  const description = describeFindings(findings);

  try {
    await client.setCommitStatus({ sha: headSha, state, description, context, targetUrl: detailsUrl });
  } catch (err) {
    if (!(err instanceof StatusPermissionError)) throw err;
    // Read-only credentials are normal on forks of public repositories.
    if (findings.errors.length > 0) {
      return { status: "aborted", message: permissionFailureMessage(findings.errors.length, repoVisibility) };
    }
    console.log(description);
    return { status: "skipped", state, description };
  }

  return { status: "submitted", state, description, context, targetUrl: detailsUrl };
}
