import { createAppAuth } from "@octokit/auth-app";
import { Octokit } from "@octokit/rest";
import type { Env } from "../config/env.js";

export class MissingCredentialsError extends Error {
  constructor() {
    super("No API token given, please provide one using `DANGER_GITHUB_API_TOKEN`");
    this.name = "MissingCredentialsError";
  }
}

export function createGithubOctokit(env: Env, options: { allowTokenless?: boolean } = {}): Octokit {
  const baseUrl = env.githubApiUrl || undefined;
  if (env.githubToken) {
    return new Octokit({ auth: env.githubToken, baseUrl });
  }
  const { githubAppId, githubInstallationId, githubPrivateKey } = env;
  if (githubAppId && githubInstallationId && githubPrivateKey) {
    return new Octokit({
      baseUrl,
      authStrategy: createAppAuth,
      auth: {
        appId: githubAppId,
        privateKey: githubPrivateKey,
        installationId: githubInstallationId
      }
    });
  }
  if (options.allowTokenless) {
    return new Octokit({ baseUrl });
  }
  throw new MissingCredentialsError();
}
