import { AuthError, TransientNetworkError } from "../../errors";
import { TOKEN_SAFETY_MARGIN_MS } from "../../constants";
import { componentLogger, type Logger } from "../../logger";
import type { TokenSource } from "../../http/types";
import { raceAbort } from "../../utils/abort";
import { isCredentialExpiring, type CredentialStore } from "../credentialStore";
import type { Credential } from "../types";
import type { TokenEndpointClient } from "./http";

export interface TokenManagerOptions {
  safetyMarginMs?: number;
  logger?: Logger;
  now?: () => number;
}

/**
 * Hands out non-expired access tokens. Concurrent callers that find the
 * credential expiring share a single refresh request and its outcome.
 */
export class TokenManager implements TokenSource {
  private refreshing: Promise<Credential> | null = null;
  private readonly safetyMarginMs: number;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(
    private readonly store: CredentialStore,
    private readonly tokenEndpoint: TokenEndpointClient,
    options: TokenManagerOptions = {}
  ) {
    this.safetyMarginMs = options.safetyMarginMs ?? TOKEN_SAFETY_MARGIN_MS;
    this.logger = componentLogger("token-manager", options.logger);
    this.now = options.now ?? Date.now;
  }

  async getValidToken(signal?: AbortSignal): Promise<string> {
    const credential = await this.requireCredential();
    if (!isCredentialExpiring(credential, this.safetyMarginMs, this.now())) {
      return credential.accessToken;
    }
    const refreshed = await raceAbort(this.refreshShared(), signal);
    return refreshed.accessToken;
  }

  /**
   * Refresh after the provider rejected `staleToken`. If another caller has
   * already replaced it with a fresh credential, that one is returned instead.
   */
  async forceRefresh(staleToken: string, signal?: AbortSignal): Promise<string> {
    const credential = await this.requireCredential();
    if (
      credential.accessToken !== staleToken &&
      !isCredentialExpiring(credential, this.safetyMarginMs, this.now())
    ) {
      return credential.accessToken;
    }
    const refreshed = await raceAbort(this.refreshShared(), signal);
    return refreshed.accessToken;
  }

  /** Unconditional refresh, still coalesced with any refresh in flight. */
  refresh(signal?: AbortSignal): Promise<Credential> {
    return raceAbort(this.refreshShared(), signal);
  }

  private refreshShared(): Promise<Credential> {
    if (this.refreshing) return this.refreshing;

    const refreshPromise = this.performRefresh().finally(() => {
      this.refreshing = null;
    });
    // Waiters may all have given up; the outcome is still logged, never left unhandled
    refreshPromise.catch((error: unknown) => {
      this.logger.warn({ err: error }, "Token refresh failed");
    });

    this.refreshing = refreshPromise;
    return refreshPromise;
  }

  private async performRefresh(): Promise<Credential> {
    const current = await this.requireCredential();
    this.logger.info("Refreshing access token");

    let next: Credential;
    try {
      next = await this.tokenEndpoint.refresh(current);
    } catch (error) {
      if (error instanceof AuthError && error.reason === "invalid_grant") {
        // The refresh token is dead; only a new authorization can recover.
        // A login that landed meanwhile is left alone.
        const cleared = await this.store.compareAndClear(current);
        if (!cleared) {
          throw new AuthError("unauthenticated", "Credentials were cleared or replaced during refresh", {
            cause: error,
          });
        }
        throw new AuthError("refresh_failed", "Refresh token rejected by provider; re-authorization required", {
          cause: error,
        });
      }
      if (error instanceof TransientNetworkError) {
        throw error;
      }
      throw new AuthError(
        "refresh_failed",
        `Token refresh failed: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }

    const stored = await this.store.compareAndSet(current, next);
    if (!stored) {
      throw new AuthError("unauthenticated", "Credentials were cleared or replaced during refresh");
    }
    this.logger.info({ expiresAt: new Date(next.expiresAt).toISOString() }, "Token refresh successful");
    return next;
  }

  private async requireCredential(): Promise<Credential> {
    const credential = await this.store.get();
    if (!credential) {
      throw new AuthError("unauthenticated", "Not authenticated. Complete the authorization flow first.");
    }
    return credential;
  }
}
