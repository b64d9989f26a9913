import { CredentialStore } from "./auth/credentialStore";
import { AuthorizationFlow } from "./auth/oauth/authorizationCode";
import { TokenEndpointClient } from "./auth/oauth/http";
import { TokenManager } from "./auth/oauth/tokenRefresh";
import type { Credential, OAuthClientConfig } from "./auth/types";
import { HttpGateway } from "./http/gateway";
import { RateLimitState } from "./http/rateLimit";
import type { RetryPolicy } from "./http/types";
import { AsyncJobEngine } from "./jobs/engine";
import type { PollIntervalPolicy } from "./jobs/types";
import { getLogger, type Logger } from "./logger";
import type { Sleep } from "./utils/abort";

export interface GatewayRuntimeConfig extends OAuthClientConfig {
  apiBaseUrl: string;
}

export interface GatewayRuntimeOptions {
  initialCredential?: Credential | null;
  safetyMarginMs?: number;
  retry?: Partial<RetryPolicy>;
  pollInterval?: Partial<PollIntervalPolicy>;
  jobTimeoutMs?: number;
  /** Per-attempt timeout for token endpoint calls. */
  tokenTimeoutMs?: number;
  logger?: Logger;
  sleep?: Sleep;
  now?: () => number;
  random?: () => number;
}

export interface GatewayRuntime {
  config: GatewayRuntimeConfig;
  store: CredentialStore;
  rateLimit: RateLimitState;
  authorization: AuthorizationFlow;
  tokens: TokenManager;
  gateway: HttpGateway;
  jobs: AsyncJobEngine;
  logger: Logger;
  now: () => number;
}

/**
 * Wire the core components for one provider account. The token endpoint gets
 * its own gateway (no bearer, no replays) so the API gateway can depend on the
 * TokenManager without a cycle.
 */
export function createGatewayRuntime(
  config: GatewayRuntimeConfig,
  options: GatewayRuntimeOptions = {}
): GatewayRuntime {
  const logger = options.logger ?? getLogger();
  const timing = { sleep: options.sleep, now: options.now, random: options.random };
  const store = new CredentialStore(options.initialCredential ?? null);
  const rateLimit = new RateLimitState();

  const oauthGateway = new HttpGateway({ baseUrl: config.apiBaseUrl, rateLimit, logger, ...timing });
  const tokenEndpoint = new TokenEndpointClient(oauthGateway, config, options.now, options.tokenTimeoutMs);
  const tokens = new TokenManager(store, tokenEndpoint, {
    safetyMarginMs: options.safetyMarginMs,
    logger,
    now: options.now,
  });
  const authorization = new AuthorizationFlow(config, tokenEndpoint, store, logger, options.now);

  const gateway = new HttpGateway({
    baseUrl: config.apiBaseUrl,
    tokens,
    rateLimit,
    retry: options.retry,
    logger,
    ...timing,
  });
  const jobs = new AsyncJobEngine(gateway, {
    defaultTimeoutMs: options.jobTimeoutMs,
    pollInterval: options.pollInterval,
    logger,
    sleep: options.sleep,
    now: options.now,
  });

  return { config, store, rateLimit, authorization, tokens, gateway, jobs, logger, now: options.now ?? Date.now };
}
