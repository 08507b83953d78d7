import test from "node:test";
import assert from "node:assert/strict";
import { Octokit } from "@octokit/rest";
import { RepositoryMovedError, StatusPermissionError, isPermissionDenied } from "../src/providers/errors.js";
import { __githubInternals, createGithubClient, splitRepoSlug } from "../src/providers/github/adapter.js";

type Recorded = { method: string; url: string; body: unknown };

function jsonResponse(status: number, data: unknown, headers: Record<string, string> = {}): Response {
  return new Response(status === 204 ? null : JSON.stringify(data), {
    status,
    headers: { "content-type": "application/json; charset=utf-8", ...headers }
  });
}

function clientWithRoutes(routes: (request: Recorded) => Response) {
  const recorded: Recorded[] = [];
  const octokit = new Octokit({
    auth: "test-token",
    request: {
      fetch: async (url: string, init: { method?: string; body?: string | null }) => {
        const request = {
          method: init.method || "GET",
          url: String(url),
          body: init.body ? JSON.parse(init.body) : null
        };
        recorded.push(request);
        return routes(request);
      }
    }
  });
  return { recorded, client: createGithubClient({ octokit, repoSlug: "acme/widgets", pullRequestNumber: 12 }) };
}

test("splitRepoSlug validates owner/name", () => {
  assert.deepEqual(splitRepoSlug("acme/widgets"), { owner: "acme", repo: "widgets" });
  assert.throws(() => splitRepoSlug("widgets"), /Invalid repository slug/);
  assert.throws(() => splitRepoSlug("acme/widgets/extra"), /Invalid repository slug/);
});

test("mapPullRequest reads head sha and repository visibility", () => {
  const mapped = __githubInternals.mapPullRequest({
    id: 77,
    number: 12,
    title: "Add feature",
    body: null,
    html_url: "https://github.com/acme/widgets/pull/12",
    state: "open",
    base: { sha: "base000", repo: { full_name: "acme/widgets", private: true } },
    head: { sha: "head111" }
  });
  assert.deepEqual(mapped, {
    externalId: "77",
    number: 12,
    title: "Add feature",
    body: null,
    url: "https://github.com/acme/widgets/pull/12",
    state: "open",
    baseSha: "base000",
    headSha: "head111",
    repoFullName: "acme/widgets",
    visibility: "private"
  });
  assert.equal(__githubInternals.mapPullRequest({ id: 1, number: 1, state: "open" }).headSha, "");
});

test("isMovedPayload detects the moved marker only", () => {
  assert.equal(__githubInternals.isMovedPayload({ message: "Moved Permanently" }), true);
  assert.equal(__githubInternals.isMovedPayload({ message: "Not Found" }), false);
  assert.equal(__githubInternals.isMovedPayload("Moved Permanently"), false);
  assert.equal(__githubInternals.isMovedPayload(null), false);
});

test("isPermissionDenied matches auth failures only", () => {
  assert.equal(isPermissionDenied({ status: 403 }), true);
  assert.equal(isPermissionDenied({ status: 404 }), true);
  assert.equal(isPermissionDenied({ status: 500 }), false);
  assert.equal(isPermissionDenied(new Error("offline")), false);
});

test("listIssueComments follows every page", async () => {
  const { client, recorded } = clientWithRoutes((request) => {
    if (request.url.includes("page=2")) {
      return jsonResponse(200, [{ id: 3, body: "third", html_url: "https://github.com/c/3", user: null }]);
    }
    return jsonResponse(
      200,
      [
        { id: 1, body: "first", html_url: "https://github.com/c/1", user: { id: 9, login: "octocat" } },
        { id: 2, body: null, html_url: "https://github.com/c/2", user: null }
      ],
      { link: '<https://api.github.com/repos/acme/widgets/issues/12/comments?per_page=100&page=2>; rel="next"' }
    );
  });
  const comments = await client.listIssueComments();
  assert.deepEqual(comments, [
    { id: "1", body: "first", url: "https://github.com/c/1", author: { externalId: "9", login: "octocat" } },
    { id: "2", body: "", url: "https://github.com/c/2", author: null },
    { id: "3", body: "third", url: "https://github.com/c/3", author: null }
  ]);
  assert.equal(recorded.length, 2);
});

test("comment writes target the pull request's issue", async () => {
  const { client, recorded } = clientWithRoutes((request) => {
    if (request.method === "DELETE") return jsonResponse(204, null);
    return jsonResponse(request.method === "POST" ? 201 : 200, {
      id: 500,
      body: "report",
      html_url: "https://github.com/acme/widgets/pull/12#issuecomment-500",
      user: null
    });
  });
  const created = await client.createIssueComment("report\r\n");
  await client.updateIssueComment("500", "report v2");
  await client.deleteIssueComment("500");

  assert.equal(created.url, "https://github.com/acme/widgets/pull/12#issuecomment-500");
  assert.deepEqual(
    recorded.map((request) => `${request.method} ${new URL(request.url).pathname}`),
    [
      "POST /repos/acme/widgets/issues/12/comments",
      "PATCH /repos/acme/widgets/issues/comments/500",
      "DELETE /repos/acme/widgets/issues/comments/500"
    ]
  );
  assert.deepEqual(recorded[0].body, { body: "report" });
});

test("setCommitStatus turns a forbidden response into StatusPermissionError", async () => {
  const { client, recorded } = clientWithRoutes(() => jsonResponse(403, { message: "Resource not accessible by integration" }));
  await assert.rejects(
    client.setCommitStatus({
      sha: "head111",
      state: "failure",
      description: "1 error",
      context: "danger/danger",
      targetUrl: null
    }),
    (err: unknown) => err instanceof StatusPermissionError && err.status === 403
  );
  assert.equal(new URL(recorded[0].url).pathname, "/repos/acme/widgets/statuses/head111");
  assert.deepEqual(recorded[0].body, { state: "failure", description: "1 error", context: "danger/danger" });
});

test("setCommitStatus lets server errors through", async () => {
  const { client } = clientWithRoutes(() => jsonResponse(500, { message: "Server Error" }));
  await assert.rejects(
    client.setCommitStatus({ sha: "head111", state: "success", description: "All green.", context: "danger/danger" }),
    (err: unknown) => !(err instanceof StatusPermissionError)
  );
});

test("fetchPullRequest reports a moved repository", async () => {
  const { client } = clientWithRoutes(() => jsonResponse(200, { message: "Moved Permanently" }));
  await assert.rejects(client.fetchPullRequest(), RepositoryMovedError);
});
