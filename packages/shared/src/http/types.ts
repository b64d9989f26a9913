export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE";

export type QueryValue = string | number | boolean | undefined | null;

export type RequestBody =
  | { type: "json"; value: unknown }
  | { type: "form"; value: URLSearchParams }
  | { type: "binary"; value: Uint8Array; contentType?: string };

export interface GatewayRequest {
  method: HttpMethod;
  /** Path under the gateway's base URL, or an absolute URL. */
  path: string;
  query?: Record<string, QueryValue | QueryValue[]>;
  headers?: Record<string, string>;
  body?: RequestBody;
  /** "none" skips the bearer token (token endpoint, public calls). Defaults to "bearer". */
  auth?: "bearer" | "none";
  /** false disables 429 and 5xx/network retries for requests that must not be replayed. */
  retry?: boolean;
  /** Per-attempt timeout; defaults to the gateway's. Firing counts as a network failure, not a caller abort. */
  timeoutMs?: number;
  /** Epoch ms on the gateway's clock. A rate-limit or backoff wait that would end later raises instead. */
  deadline?: number;
  signal?: AbortSignal;
}

/** Where the gateway gets bearer tokens from. Implemented by TokenManager. */
export interface TokenSource {
  getValidToken(signal?: AbortSignal): Promise<string>;
  forceRefresh(staleToken: string, signal?: AbortSignal): Promise<string>;
}

export interface RetryPolicy {
  maxRateLimitRetries: number;
  maxTransientRetries: number;
  baseDelayMs: number;
  factor: number;
  maxDelayMs: number;
  /** Longest Retry-After the gateway will sit out; anything longer raises RateLimitError. */
  maxRetryAfterMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRateLimitRetries: 3,
  maxTransientRetries: 3,
  baseDelayMs: 1000,
  factor: 2,
  maxDelayMs: 30_000,
  maxRetryAfterMs: 60_000,
};

export function jsonBody(value: unknown): RequestBody {
  return { type: "json", value };
}
