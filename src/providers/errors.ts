export class StatusPermissionError extends Error {
  readonly status: number | null;

  constructor(message: string, status: number | null = null) {
    super(message);
    this.name = "StatusPermissionError";
    this.status = status;
  }
}

export class RepositoryMovedError extends Error {
  constructor() {
    super("Repo moved or renamed, make sure to update the git remote");
    this.name = "RepositoryMovedError";
  }
}

export function httpStatusOf(err: unknown): number | null {
  if (typeof err !== "object" || err === null || !("status" in err)) return null;
  const status = err.status;
  return typeof status === "number" ? status : null;
}

// GitHub answers 404 instead of 403 when the token cannot see the repository at all.
export function isPermissionDenied(err: unknown): boolean {
  const status = httpStatusOf(err);
  return status === 401 || status === 403 || status === 404;
}
