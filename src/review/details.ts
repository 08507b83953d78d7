import type { ProviderClient, ProviderIssue, ProviderPullRequest } from "../providers/types.js";
import { scanIgnoredViolations } from "./ignores.js";

export type PullRequestDetails = {
  pullRequest: ProviderPullRequest;
  issue: ProviderIssue;
  ignoredViolations: string[];
};

export async function fetchPullRequestDetails(
  client: Pick<ProviderClient, "fetchPullRequest" | "fetchIssue">
): Promise<PullRequestDetails> {
  const pullRequest = await client.fetchPullRequest();
  const issue = await client.fetchIssue();
  return {
    pullRequest,
    issue,
    ignoredViolations: scanIgnoredViolations(pullRequest.body)
  };
}

export function organisationFromIssue(issue: Pick<ProviderIssue, "repositoryUrl">): string | null {
  const match = issue.repositoryUrl?.match(/repos\/(.*)\//);
  return match && match[1] ? match[1] : null;
}

export function fileUrl(params: {
  organisation: string;
  repository: string;
  branch?: string;
  path: string;
  host?: string;
}): string {
  const branch = params.branch || "master";
  const host = params.host || "github.com";
  const root = host === "github.com" ? "https://raw.githubusercontent.com" : `https://${host}/raw`;
  return `${root}/${params.organisation}/${params.repository}/${branch}/${params.path}`;
}
