import type { Octokit } from "@octokit/rest";
import { RepositoryMovedError, StatusPermissionError, httpStatusOf, isPermissionDenied } from "../errors.js";
import {
  ProviderClient,
  ProviderCommitStatus,
  ProviderIssue,
  ProviderIssueComment,
  ProviderPullRequest
} from "../types.js";

// Structural slices of the REST payloads; the full Octokit response types are assignable to these.
type PullRequestData = {
  id: number;
  number: number;
  title?: string | null;
  body?: string | null;
  html_url?: string | null;
  state: string;
  base?: { sha?: string | null; repo?: { full_name?: string | null; private?: boolean | null } | null } | null;
  head?: { sha?: string | null } | null;
};

type IssueData = {
  number: number;
  repository_url?: string | null;
  html_url?: string | null;
};

type IssueCommentData = {
  id: number;
  body?: string | null;
  html_url?: string | null;
  user?: { id: number; login: string } | null;
};

export function splitRepoSlug(repoSlug: string): { owner: string; repo: string } {
  const [owner, repo, ...rest] = repoSlug.split("/");
  if (!owner || !repo || rest.length > 0) {
    throw new Error(`Invalid repository slug "${repoSlug}", expected owner/name`);
  }
  return { owner, repo };
}

function mapPullRequest(data: PullRequestData): ProviderPullRequest {
  return {
    externalId: String(data.id),
    number: data.number,
    title: data.title ?? null,
    body: data.body ?? null,
    url: data.html_url ?? null,
    state: data.state,
    baseSha: data.base?.sha ?? null,
    headSha: data.head?.sha ?? "",
    repoFullName: data.base?.repo?.full_name ?? "",
    visibility: data.base?.repo?.private ? "private" : "public"
  };
}

function mapIssue(data: IssueData): ProviderIssue {
  return {
    number: data.number,
    repositoryUrl: data.repository_url ?? null,
    url: data.html_url ?? null
  };
}

function mapComment(data: IssueCommentData): ProviderIssueComment {
  return {
    id: String(data.id),
    body: data.body || "",
    url: data.html_url || null,
    author: data.user ? { externalId: String(data.user.id), login: data.user.login } : null
  };
}

function isMovedPayload(data: unknown): boolean {
  if (typeof data !== "object" || data === null || !("message" in data)) return false;
  return data.message === "Moved Permanently";
}

function normalizePostedBody(body: string): string {
  return body.replace(/\r\n/g, "\n").trim();
}

export function createGithubClient(params: {
  octokit: Octokit;
  repoSlug: string;
  pullRequestNumber: number;
}): ProviderClient {
  const { octokit, repoSlug, pullRequestNumber } = params;
  const { owner, repo } = splitRepoSlug(repoSlug);

  return {
    repoSlug,
    pullRequestNumber,
    fetchPullRequest: async () => {
      try {
        const response = await octokit.pulls.get({ owner, repo, pull_number: pullRequestNumber });
        if (isMovedPayload(response.data)) {
          throw new RepositoryMovedError();
        }
        return mapPullRequest(response.data);
      } catch (err) {
        if (httpStatusOf(err) === 301) {
          throw new RepositoryMovedError();
        }
        throw err;
      }
    },
    fetchIssue: async () => {
      const response = await octokit.issues.get({ owner, repo, issue_number: pullRequestNumber });
      return mapIssue(response.data);
    },
    listIssueComments: async () => {
      const comments = await octokit.paginate(octokit.issues.listComments, {
        owner,
        repo,
        issue_number: pullRequestNumber,
        per_page: 100
      });
      return comments.map(mapComment);
    },
    createIssueComment: async (body: string) => {
      const created = await octokit.issues.createComment({
        owner,
        repo,
        issue_number: pullRequestNumber,
        body: normalizePostedBody(body)
      });
      return mapComment(created.data);
    },
    updateIssueComment: async (commentId: string, body: string) => {
      const updated = await octokit.issues.updateComment({
        owner,
        repo,
        comment_id: Number(commentId),
        body: normalizePostedBody(body)
      });
      return mapComment(updated.data);
    },
    deleteIssueComment: async (commentId: string) => {
      await octokit.issues.deleteComment({ owner, repo, comment_id: Number(commentId) });
    },
    setCommitStatus: async (status: ProviderCommitStatus) => {
      try {
        await octokit.repos.createCommitStatus({
          owner,
          repo,
          sha: status.sha,
          state: status.state,
          description: status.description,
          context: status.context,
          target_url: status.targetUrl || undefined
        });
      } catch (err) {
        if (isPermissionDenied(err)) {
          throw new StatusPermissionError(
            `No write access to set a commit status on ${repoSlug}`,
            httpStatusOf(err)
          );
        }
        throw err;
      }
    }
  };
}

export const __githubInternals = {
  mapPullRequest,
  mapIssue,
  mapComment,
  isMovedPayload,
  normalizePostedBody
};
