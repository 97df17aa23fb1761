// src/errors.ts
/**
 * Purpose:
 * - Typed errors that carry their own HTTP mapping.
 * - `errorProblemJson()` reads `status`/`title` from any `HttpError`; everything
 *   else is an unexpected 500.
 */

export class HttpError extends Error {
  public readonly status: number;
  public readonly title: string;

  constructor(status: number, title: string, detail: string) {
    super(detail);
    this.name = new.target.name;
    this.status = status;
    this.title = title;
  }
}

export class UnknownServiceError extends HttpError {
  constructor(service: string) {
    super(404, "Not Found", `Unknown service "${service}"`);
  }
}

export class MethodNotAllowedError extends HttpError {
  public readonly allow: string[];

  constructor(method: string, allow: string[]) {
    super(405, "Method Not Allowed", `Method ${method} is not allowed`);
    this.allow = allow;
  }
}

export class CountUnavailableError extends HttpError {
  constructor(cause: unknown) {
    super(503, "Service Unavailable", "View count is temporarily unavailable");
    this.cause = cause;
  }
}

export class UpstreamTimeoutError extends Error {
  public readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Upstream did not respond within ${timeoutMs}ms`);
    this.name = "UpstreamTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

/** Invalid or missing configuration. Always fatal at startup. */
export class ConfigError extends Error {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}
