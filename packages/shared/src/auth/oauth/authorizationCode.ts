/**
 * OAuth 2.0 Authorization Code Flow with PKCE
 * The caller keeps the verifier and state between the redirect and the exchange;
 * nothing about a pending authorization is stored here.
 */

import { randomBytes, createHash } from "node:crypto";
import { AuthError } from "../../errors";
import { DEFAULT_SCOPES, PKCE_CHALLENGE_METHOD } from "../../constants";
import { componentLogger, type Logger } from "../../logger";
import type { CredentialStore } from "../credentialStore";
import type {
  AuthorizationRequest,
  Credential,
  ExchangeParams,
  OAuthClientConfig,
  PKCEPair,
} from "../types";
import type { TokenEndpointClient } from "./http";

// 64 random bytes encode to an 86-character base64url verifier (RFC 7636 allows 43-128)
const VERIFIER_BYTES = 64;
const STATE_BYTES = 32;
const CONSUMED_HISTORY_LIMIT = 1000;

export function generateCodeChallenge(codeVerifier: string): string {
  return createHash("sha256").update(codeVerifier).digest("base64url");
}

export function generatePKCE(): PKCEPair {
  const codeVerifier = randomBytes(VERIFIER_BYTES).toString("base64url");
  return { codeVerifier, codeChallenge: generateCodeChallenge(codeVerifier) };
}

export function generateState(): string {
  return randomBytes(STATE_BYTES).toString("base64url");
}

export class AuthorizationFlow {
  private readonly logger: Logger;
  // Challenges of verifiers that already reached the token endpoint
  private readonly consumed = new Set<string>();

  constructor(
    private readonly config: OAuthClientConfig,
    private readonly tokenEndpoint: TokenEndpointClient,
    private readonly store: CredentialStore,
    logger?: Logger,
    private readonly now: () => number = Date.now
  ) {
    this.logger = componentLogger("authorization-flow", logger);
  }

  createAuthorizationUrl(scopes: Iterable<string> = DEFAULT_SCOPES): AuthorizationRequest {
    const requested = [...new Set(scopes)];
    const scope = (requested.length > 0 ? requested : [...DEFAULT_SCOPES]).join(" ");
    const { codeVerifier, codeChallenge } = generatePKCE();
    const state = generateState();

    const params = new URLSearchParams({
      client_id: this.config.clientId,
      response_type: "code",
      redirect_uri: this.config.redirectUri,
      scope,
      code_challenge: codeChallenge,
      code_challenge_method: PKCE_CHALLENGE_METHOD,
      state,
    });

    this.logger.info({ scope, state: `${state.slice(0, 8)}...` }, "Authorization URL created");

    return {
      url: `${this.config.authorizationUrl}?${params.toString()}`,
      codeVerifier,
      codeChallenge,
      state,
      createdAt: this.now(),
    };
  }

  /**
   * Exchange an authorization code for a credential and store it.
   * The verifier is spent on the first attempt that reaches the provider,
   * whatever its outcome; a failed exchange needs a new authorization URL.
   */
  async exchange(params: ExchangeParams, signal?: AbortSignal): Promise<Credential> {
    if (params.receivedState !== params.expectedState) {
      this.logger.warn("Authorization callback state mismatch");
      throw new AuthError("invalid_state", "OAuth state mismatch");
    }

    const challenge = generateCodeChallenge(params.codeVerifier);
    if (this.consumed.has(challenge)) {
      throw new AuthError("invalid_grant", "This code verifier has already been used");
    }
    this.markConsumed(challenge);

    const credential = await this.tokenEndpoint.exchangeCode(params.code, params.codeVerifier, signal);
    await this.store.set(credential);

    this.logger.info(
      { expiresAt: new Date(credential.expiresAt).toISOString(), scopes: [...credential.scopes] },
      "Token exchange successful"
    );
    return credential;
  }

  private markConsumed(challenge: string): void {
    this.consumed.add(challenge);
    if (this.consumed.size > CONSUMED_HISTORY_LIMIT) {
      const oldest = this.consumed.values().next();
      if (!oldest.done) this.consumed.delete(oldest.value);
    }
  }
}
