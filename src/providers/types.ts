export type RepoVisibility = "public" | "private";

export type ProviderUser = {
  externalId: string;
  login: string;
};

export type ProviderPullRequest = {
  externalId: string;
  number: number;
  title?: string | null;
  body?: string | null;
  url?: string | null;
  state: string;
  baseSha?: string | null;
  headSha: string;
  repoFullName: string;
  visibility: RepoVisibility;
};

export type ProviderIssue = {
  number: number;
  repositoryUrl?: string | null;
  url?: string | null;
};

export type ProviderIssueComment = {
  id: string;
  body: string;
  url?: string | null;
  author?: ProviderUser | null;
};

export type CommitState = "success" | "failure";

export type ProviderCommitStatus = {
  sha: string;
  state: CommitState;
  description: string;
  context: string;
  targetUrl?: string | null;
};

export type ProviderClient = {
  repoSlug: string;
  pullRequestNumber: number;
  fetchPullRequest: () => Promise<ProviderPullRequest>;
  fetchIssue: () => Promise<ProviderIssue>;
  listIssueComments: () => Promise<ProviderIssueComment[]>;
  createIssueComment: (body: string) => Promise<ProviderIssueComment>;
  updateIssueComment: (commentId: string, body: string) => Promise<ProviderIssueComment>;
  deleteIssueComment: (commentId: string) => Promise<void>;
  /** Throws StatusPermissionError when the credentials cannot write statuses. */
  setCommitStatus: (status: ProviderCommitStatus) => Promise<void>;
};
