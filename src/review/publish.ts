import type { ProviderClient } from "../providers/types.js";
import type { PullRequestDetails } from "./details.js";
import { FindingSet, withoutIgnored } from "./findings.js";
import { ReportOutcome, reconcileReport } from "./reconcile.js";
import type { ReportRenderer } from "./render.js";
import { StatusOutcome, submitPullRequestStatus } from "./status.js";

export type PublishOutcome =
  | {
      status: "completed";
      report: ReportOutcome;
      commitStatus: Exclude<StatusOutcome, { status: "aborted" }>;
    }
  | {
      status: "aborted";
      message: string;
      report: ReportOutcome;
    };

/**
 * Publishes one review run: reconciles the report comment, then records the
 * outcome as a commit status. Call once per run; a second call in the same run
 * would post against the state the first one just wrote.
 */
export async function publishResults(params: {
  client: ProviderClient;
  details: PullRequestDetails;
  findings: FindingSet;
  dangerId: string;
  statusContext?: string;
  render?: ReportRenderer;
}): Promise<PublishOutcome> {
  const { client, details, dangerId } = params;
  const logPrefix = `[${dangerId} pr#${client.pullRequestNumber}]`;

  const findings = withoutIgnored(params.findings, details.ignoredViolations);
  const silenced =
    params.findings.errors.length + params.findings.warnings.length -
    (findings.errors.length + findings.warnings.length);
  if (silenced > 0) {
    console.log(`${logPrefix} ignoring ${silenced} violation(s) silenced in the pull request description`);
  }

  const comments = await client.listIssueComments();
  const report = await reconcileReport({ client, comments, findings, dangerId, render: params.render });
  console.log(`${logPrefix} report comment ${report.action}${report.url ? `: ${report.url}` : ""}`);
  if (report.deletedCommentIds.length > 0) {
    console.log(`${logPrefix} deleted report comments: ${report.deletedCommentIds.join(", ")}`);
  }

  const commitStatus = await submitPullRequestStatus({
    client,
    findings,
    headSha: details.pullRequest.headSha,
    detailsUrl: report.url,
    repoVisibility: details.pullRequest.visibility,
    context: params.statusContext
  });
  if (commitStatus.status === "aborted") {
    return { status: "aborted", message: commitStatus.message, report };
  }
  if (commitStatus.status === "skipped") {
    console.warn(`${logPrefix} no write access to set a commit status; continuing`, {
      state: commitStatus.state
    });
  } else {
    console.log(`${logPrefix} commit status ${commitStatus.state}: ${commitStatus.description}`);
  }
  return { status: "completed", report, commitStatus };
}
