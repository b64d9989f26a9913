import {
  isCredentialExpiring,
  PKCE_CHALLENGE_METHOD,
  DEFAULT_SCOPES,
  TOKEN_SAFETY_MARGIN_MS,
  type AuthorizationRequest,
  type Credential,
  type GatewayRuntimeConfig,
} from "@design-gateway/shared";

export type AuthStatus = "not_authenticated" | "active" | "expiring" | "expired";

export interface AuthState {
  status: AuthStatus;
  expiresAt: string | null;
  scopes: string[];
}

export function getAuthState(credential: Credential | null, now: number = Date.now()): AuthState {
  if (!credential) {
    return { status: "not_authenticated", expiresAt: null, scopes: [] };
  }
  let status: AuthStatus = "active";
  if (credential.expiresAt <= now) {
    status = "expired";
  } else if (isCredentialExpiring(credential, TOKEN_SAFETY_MARGIN_MS, now)) {
    status = "expiring";
  }
  return {
    status,
    expiresAt: new Date(credential.expiresAt).toISOString(),
    scopes: [...credential.scopes].sort(),
  };
}

/** Public view of the OAuth client configuration; the secret never leaves the server. */
export function describeOAuthConfig(config: GatewayRuntimeConfig) {
  return {
    client_id: config.clientId,
    redirect_uri: config.redirectUri,
    authorization_url: config.authorizationUrl,
    token_url: config.tokenUrl,
    api_base_url: config.apiBaseUrl,
    code_challenge_method: PKCE_CHALLENGE_METHOD,
    default_scopes: [...DEFAULT_SCOPES],
  };
}

/** The caller keeps verifier and state until the redirect comes back. */
export function toAuthorizationPayload(request: AuthorizationRequest) {
  return {
    authorization_url: request.url,
    code_verifier: request.codeVerifier,
    code_challenge: request.codeChallenge,
    state: request.state,
  };
}

export function toTokenPayload(credential: Credential) {
  return {
    token_type: "Bearer",
    expires_at: new Date(credential.expiresAt).toISOString(),
    scopes: [...credential.scopes].sort(),
  };
}
