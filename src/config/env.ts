import { z } from "zod";

const EnvSchema = z.object({
  DANGER_GITHUB_API_TOKEN: z.string().default(""),
  DANGER_GITHUB_HOST: z.string().default("github.com"),
  DANGER_GITHUB_API_HOST: z.string().default(""),
  DANGER_GITHUB_API_BASE_URL: z.string().default(""),
  DANGER_USE_LOCAL_GIT: z.string().default(""),
  GITHUB_APP_ID: z.string().default(""),
  GITHUB_PRIVATE_KEY: z.string().default(""),
  GITHUB_INSTALLATION_ID: z.string().default(""),
  DANGER_REPO_SLUG: z.string().default(""),
  DANGER_PR_ID: z.string().default(""),
  DANGER_ID: z.string().default("danger"),
  DANGER_STATUS_CONTEXT: z.string().default("danger/danger"),
  LOG_LEVEL: z.string().default("info")
});

export type Env = {
  githubToken: string;
  githubHost: string;
  githubApiUrl: string | null;
  useLocalGit: boolean;
  githubAppId: number | null;
  githubPrivateKey: string;
  githubInstallationId: number | null;
  repoSlug: string;
  pullRequestId: number | null;
  dangerId: string;
  statusContext: string;
  logLevel: string;
};

function parsePositiveInt(raw: string): number | null {
  const value = Number(raw.trim());
  return raw.trim() && Number.isInteger(value) && value > 0 ? value : null;
}

// GitHub Enterprise Server serves its REST API under /api/v3 on the instance host.
function enterpriseApiUrl(githubHost: string): string | null {
  return githubHost === "github.com" ? null : `https://${githubHost}/api/v3`;
}

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const parsed = EnvSchema.parse(source);
  const githubHost = parsed.DANGER_GITHUB_HOST.trim() || "github.com";
  // DANGER_GITHUB_API_HOST is the legacy name and still wins when both are set.
  const apiUrl = parsed.DANGER_GITHUB_API_HOST.trim() || parsed.DANGER_GITHUB_API_BASE_URL.trim();
  return {
    githubToken: parsed.DANGER_GITHUB_API_TOKEN.trim(),
    githubHost,
    githubApiUrl: apiUrl || enterpriseApiUrl(githubHost),
    useLocalGit: parsed.DANGER_USE_LOCAL_GIT.trim().length > 0,
    githubAppId: parsePositiveInt(parsed.GITHUB_APP_ID),
    githubPrivateKey: parsed.GITHUB_PRIVATE_KEY.replace(/\\n/g, "\n"),
    githubInstallationId: parsePositiveInt(parsed.GITHUB_INSTALLATION_ID),
    repoSlug: parsed.DANGER_REPO_SLUG.trim(),
    pullRequestId: parsePositiveInt(parsed.DANGER_PR_ID),
    dangerId: parsed.DANGER_ID.trim() || "danger",
    statusContext: parsed.DANGER_STATUS_CONTEXT.trim() || "danger/danger",
    logLevel: parsed.LOG_LEVEL
  };
}

let cached: Env | null = null;

export function loadEnv(): Env {
  if (cached) return cached;
  cached = parseEnv(process.env);
  return cached;
}

export function hasAppCredentials(env: Env): boolean {
  return Boolean(env.githubAppId && env.githubPrivateKey && env.githubInstallationId);
}

export function validatesAsApiSource(env: Env): boolean {
  return env.githubToken.length > 0 || hasAppCredentials(env) || env.useLocalGit;
}
