#!/usr/bin/env node
import "dotenv/config";
import fs from "fs";
import { pathToFileURL } from "url";
import { loadEnv, validatesAsApiSource } from "./config/env.js";
import { createGithubOctokit } from "./github/auth.js";
import { createGithubClient } from "./providers/github/adapter.js";
import { fetchPullRequestDetails } from "./review/details.js";
import { readFindingsFile } from "./review/findings.js";
import { publishResults } from "./review/publish.js";

type Options = {
  findingsPath: string;
  repoSlug?: string;
  pullRequestId?: number;
  dangerId?: string;
};

function parseArgs(argv: string[]): Options {
  let findingsPath = "";
  const options: Omit<Options, "findingsPath"> = {};
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    const next = argv[i + 1];
    if (arg === "--repo" && next) {
      options.repoSlug = next;
      i += 1;
    } else if (arg === "--pr" && next) {
      const value = Number(next);
      if (!Number.isInteger(value) || value <= 0) {
        throw new Error(`Invalid pull request number "${next}"`);
      }
      options.pullRequestId = value;
      i += 1;
    } else if (arg === "--danger-id" && next) {
      options.dangerId = next;
      i += 1;
    } else if (arg.startsWith("--")) {
      throw new Error(`Unknown option ${arg}`);
    } else if (!findingsPath) {
      findingsPath = arg;
    }
  }
  if (!findingsPath) {
    throw new Error("Usage: danger-reconcile <findings.json> [--repo owner/name] [--pr number] [--danger-id id]");
  }
  return { findingsPath, ...options };
}

async function main(): Promise<void> {
  const options = parseArgs(process.argv.slice(2));
  const env = loadEnv();
  if (!validatesAsApiSource(env)) {
    throw new Error("No GitHub credentials configured; set DANGER_GITHUB_API_TOKEN or GitHub App credentials");
  }

  const repoSlug = options.repoSlug || env.repoSlug;
  const pullRequestId = options.pullRequestId ?? env.pullRequestId;
  if (!repoSlug || !pullRequestId) {
    throw new Error("Missing pull request: pass --repo and --pr or set DANGER_REPO_SLUG and DANGER_PR_ID");
  }
  const dangerId = options.dangerId || env.dangerId;
  if (env.logLevel === "debug") {
    console.debug(`[${dangerId} pr#${pullRequestId}] publishing to ${env.githubHost}/${repoSlug} via ${env.githubApiUrl || "api.github.com"}`);
  }

  const client = createGithubClient({
    octokit: createGithubOctokit(env, { allowTokenless: env.useLocalGit }),
    repoSlug,
    pullRequestNumber: pullRequestId
  });
  const findings = await readFindingsFile(options.findingsPath);
  const details = await fetchPullRequestDetails(client);
  const outcome = await publishResults({
    client,
    details,
    findings,
    dangerId,
    statusContext: env.statusContext
  });

  if (outcome.status === "aborted") {
    console.error(outcome.message);
    process.exitCode = 1;
  }
}

// npm links bin entries through node_modules/.bin, so argv[1] may be a symlink.
function isDirectInvocation(argvPath: string | undefined, moduleUrl: string): boolean {
  if (!argvPath) return false;
  try {
    return pathToFileURL(fs.realpathSync(argvPath)).href === moduleUrl;
  } catch {
    return false;
  }
}

export const __cliInternals = {
  parseArgs,
  isDirectInvocation
};

if (isDirectInvocation(process.argv[1], import.meta.url)) {
  main().catch((error) => {
    console.error("Publishing review results failed", error);
    process.exitCode = 1;
  });
}
