import { AuthError, RateLimitError, TransientNetworkError, ValidationError } from "../errors";
import { componentLogger, type Logger } from "../logger";
import { sleep as defaultSleep, throwIfAborted, withTimeout, type Sleep } from "../utils/abort";
import { computeBackoff, parseRetryAfter } from "./backoff";
import { RateLimitState } from "./rateLimit";
import {
  DEFAULT_RETRY_POLICY,
  type GatewayRequest,
  type RetryPolicy,
  type TokenSource,
} from "./types";

const REQUEST_TIMEOUT_MS = 30_000;

export interface HttpGatewayOptions {
  baseUrl: string;
  tokens?: TokenSource;
  rateLimit?: RateLimitState;
  retry?: Partial<RetryPolicy>;
  requestTimeoutMs?: number;
  logger?: Logger;
  sleep?: Sleep;
  now?: () => number;
  random?: () => number;
}

/**
 * Sends provider requests with the bearer token attached and owns the retry policy:
 * one forced refresh on 401, bounded waits on 429, bounded backoff on 5xx and
 * network failures. Anything else is surfaced unchanged.
 */
export class HttpGateway {
  readonly rateLimit: RateLimitState;
  private readonly baseUrl: string;
  private readonly tokens: TokenSource | undefined;
  private readonly retryPolicy: RetryPolicy;
  private readonly requestTimeoutMs: number;
  private readonly logger: Logger;
  private readonly sleep: Sleep;
  private readonly now: () => number;
  private readonly random: () => number;

  constructor(options: HttpGatewayOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.tokens = options.tokens;
    this.rateLimit = options.rateLimit ?? new RateLimitState();
    this.retryPolicy = { ...DEFAULT_RETRY_POLICY, ...options.retry };
    this.requestTimeoutMs = options.requestTimeoutMs ?? REQUEST_TIMEOUT_MS;
    this.logger = componentLogger("http-gateway", options.logger);
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
    this.random = options.random ?? Math.random;
  }

  /** Execute a request and return its parsed body. */
  async execute(request: GatewayRequest): Promise<unknown> {
    const url = this.buildUrl(request);
    const retryable = request.retry !== false;
    const useBearer = (request.auth ?? "bearer") === "bearer";
    const { signal } = request;

    let forcedRefresh = false;
    let rateLimitAttempts = 0;
    let transientAttempts = 0;

    for (;;) {
      throwIfAborted(signal);
      const holdOff = this.rateLimit.remainingDelay(this.now());
      if (holdOff > 0) {
        if (holdOff > this.retryPolicy.maxRetryAfterMs || this.passesDeadline(request, holdOff)) {
          throw new RateLimitError(
            holdOff,
            rateLimitAttempts,
            `Provider rate limit has ${holdOff}ms left, longer than ${request.method} ${request.path} may wait`
          );
        }
        this.logger.debug({ path: request.path, holdOff }, "Holding request for rate limit");
        await this.sleep(holdOff, signal);
      }

      const token = useBearer ? await this.requireTokens().getValidToken(signal) : undefined;
      const started = this.now();

      // Reading the body belongs to the attempt: a stream reset or the
      // per-attempt timeout there is a network failure like any other.
      let response: Response;
      let body: unknown;
      try {
        response = await fetch(url, this.buildInit(request, token));
        body = await readBody(response);
      } catch (error) {
        if (signal?.aborted) throw signal.reason ?? error;
        transientAttempts += 1;
        const message = error instanceof Error ? error.message : String(error);
        if (!retryable || transientAttempts > this.retryPolicy.maxTransientRetries) {
          throw new TransientNetworkError(
            transientAttempts,
            `Request ${request.method} ${request.path} failed: ${message}`,
            { cause: error }
          );
        }
        await this.backoff(request, transientAttempts, message);
        continue;
      }

      const durationMs = this.now() - started;
      this.logger.debug(
        { method: request.method, path: request.path, status: response.status, durationMs },
        "Provider request"
      );

      if (response.ok) {
        return body;
      }

      if (response.status === 401 && useBearer && token !== undefined) {
        if (forcedRefresh) {
          throw new AuthError("unauthorized", `Provider rejected the refreshed token for ${request.path}`);
        }
        forcedRefresh = true;
        this.logger.info({ path: request.path }, "Got 401, forcing token refresh");
        await this.requireTokens().forceRefresh(token, signal);
        continue;
      }

      if (response.status === 429) {
        rateLimitAttempts += 1;
        const retryAfterMs = parseRetryAfter(response.headers.get("retry-after"), this.now());
        if (!retryable || rateLimitAttempts > this.retryPolicy.maxRateLimitRetries) {
          throw new RateLimitError(retryAfterMs, rateLimitAttempts);
        }
        const delay = retryAfterMs ?? computeBackoff(rateLimitAttempts, this.retryPolicy, this.random);
        this.rateLimit.record(delay, this.now());
        if (delay > this.retryPolicy.maxRetryAfterMs || this.passesDeadline(request, delay)) {
          throw new RateLimitError(
            delay,
            rateLimitAttempts,
            `Provider asked ${request.method} ${request.path} to wait ${delay}ms, longer than it may wait`
          );
        }
        this.logger.warn(
          { path: request.path, retryAfterMs, delay, attempt: rateLimitAttempts },
          "Rate limited by provider"
        );
        continue;
      }

      if (response.status >= 500) {
        transientAttempts += 1;
        if (!retryable || transientAttempts > this.retryPolicy.maxTransientRetries) {
          throw new TransientNetworkError(
            transientAttempts,
            `Provider error ${response.status} for ${request.method} ${request.path}`,
            { cause: new ValidationError(response.status, body) }
          );
        }
        await this.backoff(request, transientAttempts, `status ${response.status}`);
        continue;
      }

      throw new ValidationError(response.status, body);
    }
  }

  get(path: string, query?: GatewayRequest["query"], signal?: AbortSignal): Promise<unknown> {
    return this.execute({ method: "GET", path, query, signal });
  }

  post(path: string, body?: unknown, signal?: AbortSignal): Promise<unknown> {
    return this.execute({
      method: "POST",
      path,
      body: body === undefined ? undefined : { type: "json", value: body },
      signal,
    });
  }

  patch(path: string, body: unknown, signal?: AbortSignal): Promise<unknown> {
    return this.execute({ method: "PATCH", path, body: { type: "json", value: body }, signal });
  }

  delete(path: string, signal?: AbortSignal): Promise<unknown> {
    return this.execute({ method: "DELETE", path, signal });
  }

  private requireTokens(): TokenSource {
    if (!this.tokens) {
      throw new AuthError("unauthenticated", "This gateway has no token source configured");
    }
    return this.tokens;
  }

  private passesDeadline(request: GatewayRequest, delay: number): boolean {
    return request.deadline !== undefined && this.now() + delay > request.deadline;
  }

  private async backoff(request: GatewayRequest, attempt: number, reason: string): Promise<void> {
    const delay = computeBackoff(attempt, this.retryPolicy, this.random);
    if (this.passesDeadline(request, delay)) {
      throw new TransientNetworkError(
        attempt,
        `Request ${request.method} ${request.path} failed (${reason}) with no time left to retry`
      );
    }
    this.logger.warn({ path: request.path, attempt, delay, reason }, "Retrying provider request");
    await this.sleep(delay, request.signal);
  }

  private buildUrl(request: GatewayRequest): string {
    const url = /^https?:\/\//.test(request.path)
      ? new URL(request.path)
      : new URL(`${this.baseUrl}${request.path.startsWith("/") ? "" : "/"}${request.path}`);
    for (const [key, value] of Object.entries(request.query ?? {})) {
      for (const item of Array.isArray(value) ? value : [value]) {
        if (item === undefined || item === null) continue;
        url.searchParams.append(key, String(item));
      }
    }
    return url.toString();
  }

  private buildInit(request: GatewayRequest, token: string | undefined): RequestInit {
    const headers: Record<string, string> = { Accept: "application/json" };
    let body: RequestInit["body"];

    switch (request.body?.type) {
      case "json":
        headers["Content-Type"] = "application/json";
        body = JSON.stringify(request.body.value);
        break;
      case "form":
        headers["Content-Type"] = "application/x-www-form-urlencoded";
        body = request.body.value.toString();
        break;
      case "binary":
        headers["Content-Type"] = request.body.contentType ?? "application/octet-stream";
        body = request.body.value;
        break;
      default:
        body = undefined;
    }

    if (token !== undefined) {
      headers.Authorization = `Bearer ${token}`;
    }

    return {
      method: request.method,
      headers: { ...headers, ...(request.headers || {}) },
      body,
      signal: withTimeout(request.signal, request.timeoutMs ?? this.requestTimeoutMs),
    };
  }
}

/** JSON when it parses, raw text otherwise, null for an empty body. */
async function readBody(response: Response): Promise<unknown> {
  const text = await response.text();
  if (!text) return null;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}
