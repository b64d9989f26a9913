/**
 * Error taxonomy shared by every layer of the gateway.
 * Each error carries a stable `code` and the HTTP status the tool boundary answers with.
 */

export class GatewayError extends Error {
  readonly code: string;
  readonly statusCode: number;

  constructor(message: string, code: string, statusCode: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.statusCode = statusCode;
  }

  /** Extra fields surfaced to tool callers next to `code` and `message`. */
  details(): Record<string, unknown> | undefined {
    return undefined;
  }
}

export type AuthErrorReason =
  | "unauthenticated"
  | "invalid_state"
  | "invalid_grant"
  | "refresh_failed"
  | "unauthorized";

const AUTH_ERROR_STATUS: Record<AuthErrorReason, number> = {
  unauthenticated: 401,
  invalid_state: 400,
  invalid_grant: 400,
  refresh_failed: 401,
  unauthorized: 401,
};

export class AuthError extends GatewayError {
  readonly reason: AuthErrorReason;

  constructor(reason: AuthErrorReason, message: string, options?: { cause?: unknown }) {
    super(message, reason, AUTH_ERROR_STATUS[reason], options);
    this.reason = reason;
  }
}

export class RateLimitError extends GatewayError {
  readonly retryAfterMs: number | undefined;

  constructor(retryAfterMs: number | undefined, attempts: number, message?: string) {
    super(message ?? `Rate limited by provider after ${attempts} attempts`, "rate_limited", 429);
    this.retryAfterMs = retryAfterMs;
  }

  override details(): Record<string, unknown> {
    return { retryAfterMs: this.retryAfterMs };
  }
}

export class TransientNetworkError extends GatewayError {
  readonly attempts: number;

  constructor(attempts: number, message: string, options?: { cause?: unknown }) {
    super(message, "transient_network_error", 502, options);
    this.attempts = attempts;
  }

  override details(): Record<string, unknown> {
    return { attempts: this.attempts };
  }
}

export class ValidationError extends GatewayError {
  readonly status: number;
  readonly body: unknown;

  constructor(status: number, body: unknown) {
    super(`Provider rejected request: ${status} ${describeBody(body)}`, "validation_error", status);
    this.status = status;
    this.body = body;
  }

  override details(): Record<string, unknown> {
    return { status: this.status, body: this.body };
  }
}

/** A provider response that does not match the documented shape. */
export class MalformedResponseError extends GatewayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "malformed_response", 502, options);
  }
}

export class JobFailedError extends GatewayError {
  readonly jobId: string;
  readonly reason: string;
  readonly providerCode: string | undefined;

  constructor(jobId: string, reason: string, providerCode?: string) {
    super(`Job ${jobId} failed: ${reason}`, "job_failed", 422);
    this.jobId = jobId;
    this.reason = reason;
    this.providerCode = providerCode;
  }

  override details(): Record<string, unknown> {
    return { jobId: this.jobId, reason: this.reason, providerCode: this.providerCode };
  }
}

export class JobTimeoutError extends GatewayError {
  readonly jobId: string | undefined;
  readonly timeoutMs: number;

  constructor(jobId: string | undefined, timeoutMs: number) {
    super(
      jobId ? `Job ${jobId} still in progress after ${timeoutMs}ms` : `Job creation did not finish within ${timeoutMs}ms`,
      "job_timeout",
      504
    );
    this.jobId = jobId;
    this.timeoutMs = timeoutMs;
  }

  override details(): Record<string, unknown> {
    return { jobId: this.jobId, timeoutMs: this.timeoutMs };
  }
}

export class JobCancelledError extends GatewayError {
  readonly jobId: string | undefined;

  constructor(jobId?: string) {
    super(jobId ? `Stopped waiting for job ${jobId}` : "Job submission cancelled", "job_cancelled", 499);
    this.jobId = jobId;
  }

  override details(): Record<string, unknown> {
    return { jobId: this.jobId };
  }
}

export class ConfigError extends GatewayError {
  constructor(message: string) {
    super(message, "config_error", 500);
  }
}

function describeBody(body: unknown): string {
  if (typeof body === "string") return body;
  try {
    return JSON.stringify(body);
  } catch {
    return String(body);
  }
}
