import pino, { type Logger, type LoggerOptions } from "pino";

export type { Logger } from "pino";

const REDACTED_PATHS = [
  "accessToken",
  "refreshToken",
  "access_token",
  "refresh_token",
  "code_verifier",
  "codeVerifier",
  "client_secret",
  "clientSecret",
  "headers.authorization",
  "req.headers.authorization",
  "*.accessToken",
  "*.refreshToken",
];

/**
 * Build the root logger. The server hands this same instance to fastify so
 * request logs and core logs share one stream.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: "design-gateway",
    level: process.env.LOG_LEVEL || "info",
    redact: { paths: REDACTED_PATHS, censor: "[redacted]" },
    ...options,
  });
}

let rootLogger: Logger | null = null;

export function getLogger(): Logger {
  if (!rootLogger) {
    rootLogger = createLogger();
  }
  return rootLogger;
}

/** Logger for a core component, derived from the given parent or the process root. */
export function componentLogger(component: string, parent?: Logger): Logger {
  return (parent ?? getLogger()).child({ component });
}
