import type { RetryPolicy } from "./types";

/**
 * Exponential backoff with equal jitter: half of the exponential step is fixed,
 * the other half is random. `attempt` starts at 1.
 */
export function computeBackoff(
  attempt: number,
  policy: Pick<RetryPolicy, "baseDelayMs" | "factor" | "maxDelayMs">,
  random: () => number = Math.random
): number {
  const exponential = Math.min(
    policy.maxDelayMs,
    policy.baseDelayMs * policy.factor ** Math.max(0, attempt - 1)
  );
  return Math.round(exponential / 2 + random() * (exponential / 2));
}

/**
 * Parse a Retry-After header (delta-seconds or HTTP-date) into milliseconds.
 */
export function parseRetryAfter(value: string | null, now: number): number | undefined {
  if (value === null) return undefined;
  const trimmed = value.trim();
  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return Math.ceil(Number(trimmed) * 1000);
  }
  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) return undefined;
  return Math.max(0, date - now);
}
