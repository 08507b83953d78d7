import test from "node:test";
import assert from "node:assert/strict";
import { fetchPullRequestDetails, fileUrl, organisationFromIssue } from "../src/review/details.js";
import { createFakeClient, fakePullRequest } from "./fakes.js";

test("fetchPullRequestDetails collects the pull request, issue and ignore directives", async () => {
  const client = createFakeClient({
    pullRequest: fakePullRequest({ body: '> danger: ignore "Missing docs"', visibility: "private" })
  });
  const details = await fetchPullRequestDetails(client);
  assert.equal(details.pullRequest.headSha, "head111");
  assert.equal(details.pullRequest.visibility, "private");
  assert.equal(details.issue.repositoryUrl, "https://api.github.com/repos/acme/widgets");
  assert.deepEqual(details.ignoredViolations, ["Missing docs"]);
});

test("fetchPullRequestDetails propagates fetch failures", async () => {
  const client = createFakeClient();
  client.fetchPullRequest = async () => {
    throw new Error("Repo moved or renamed, make sure to update the git remote");
  };
  await assert.rejects(fetchPullRequestDetails(client), /Repo moved or renamed/);
});

test("organisationFromIssue reads the owner from the repository url", () => {
  assert.equal(organisationFromIssue({ repositoryUrl: "https://api.github.com/repos/acme/widgets" }), "acme");
  assert.equal(organisationFromIssue({ repositoryUrl: "https://example.test/elsewhere" }), null);
  assert.equal(organisationFromIssue({ repositoryUrl: null }), null);
});

test("fileUrl points at the raw file on a branch", () => {
  assert.equal(
    fileUrl({ organisation: "acme", repository: "widgets", path: "Dangerfile" }),
    "https://raw.githubusercontent.com/acme/widgets/master/Dangerfile"
  );
  assert.equal(
    fileUrl({ organisation: "acme", repository: "widgets", branch: "main", path: "rules/shared.json" }),
    "https://raw.githubusercontent.com/acme/widgets/main/rules/shared.json"
  );
  assert.equal(
    fileUrl({ organisation: "acme", repository: "widgets", path: "Dangerfile", host: "git.example.test" }),
    "https://git.example.test/raw/acme/widgets/master/Dangerfile"
  );
});
