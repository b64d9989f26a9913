import { AuthError, MalformedResponseError, ValidationError } from "../../errors";
import { DEFAULT_TOKEN_LIFETIME_S, REFRESH_TIMEOUT_MS } from "../../constants";
import type { HttpGateway } from "../../http/gateway";
import {
  oauthErrorSchema,
  tokenResponseSchema,
  type Credential,
  type OAuthClientConfig,
  type OAuthTokenResponse,
} from "../types";

type OAuthFormValue = string | number | boolean | undefined | null;
type OAuthFormParams = Record<string, OAuthFormValue>;

export function buildOAuthFormParams(params: OAuthFormParams): URLSearchParams {
  const form = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value === undefined || value === null) {
      continue;
    }
    form.set(key, String(value));
  }
  return form;
}

export function basicAuthHeader(clientId: string, clientSecret: string): string {
  return `Basic ${Buffer.from(`${clientId}:${clientSecret}`).toString("base64")}`;
}

export function calculateExpiry(expiresIn: number | undefined, issuedAt: number): number {
  return issuedAt + (expiresIn ?? DEFAULT_TOKEN_LIFETIME_S) * 1000;
}

/**
 * Build a Credential from a token response. `issuedAt` is taken before the
 * request went out, so the expiry errs early. Fields the provider omits on
 * refresh (rotated refresh token, scope) fall back to the previous credential.
 */
export function credentialFromTokenResponse(
  response: OAuthTokenResponse,
  issuedAt: number,
  previous?: Credential
): Credential {
  const refreshToken = response.refresh_token ?? previous?.refreshToken;
  if (!refreshToken) {
    throw new MalformedResponseError("Token response did not include a refresh_token");
  }
  const scopes = response.scope
    ? new Set(response.scope.split(/\s+/).filter(Boolean))
    : new Set(previous?.scopes ?? []);

  return {
    accessToken: response.access_token,
    refreshToken,
    expiresAt: calculateExpiry(response.expires_in, issuedAt),
    scopes,
  };
}

function formatOAuthError(prefix: string, error: string, description?: string): string {
  return `${prefix}: ${error}${description ? ` - ${description}` : ""}`;
}

/**
 * Client for the provider's token endpoint. Both grants go out exactly once:
 * an authorization code and its verifier are single-use, and a rotated
 * refresh token must not be replayed.
 */
export class TokenEndpointClient {
  constructor(
    private readonly gateway: HttpGateway,
    private readonly config: OAuthClientConfig,
    private readonly now: () => number = Date.now,
    private readonly timeoutMs: number = REFRESH_TIMEOUT_MS
  ) {}

  async exchangeCode(code: string, codeVerifier: string, signal?: AbortSignal): Promise<Credential> {
    const issuedAt = this.now();
    const response = await this.postTokenForm(
      {
        grant_type: "authorization_code",
        code,
        code_verifier: codeVerifier,
        redirect_uri: this.config.redirectUri,
      },
      "Token exchange failed",
      signal
    );
    return credentialFromTokenResponse(response, issuedAt);
  }

  async refresh(previous: Credential, signal?: AbortSignal): Promise<Credential> {
    const issuedAt = this.now();
    const response = await this.postTokenForm(
      {
        grant_type: "refresh_token",
        refresh_token: previous.refreshToken,
      },
      "Token refresh failed",
      signal
    );
    return credentialFromTokenResponse(response, issuedAt, previous);
  }

  private async postTokenForm(
    params: OAuthFormParams,
    errorPrefix: string,
    signal?: AbortSignal
  ): Promise<OAuthTokenResponse> {
    let body: unknown;
    try {
      body = await this.gateway.execute({
        method: "POST",
        path: this.config.tokenUrl,
        auth: "none",
        retry: false,
        headers: { Authorization: basicAuthHeader(this.config.clientId, this.config.clientSecret) },
        body: { type: "form", value: buildOAuthFormParams(params) },
        timeoutMs: this.timeoutMs,
        signal,
      });
    } catch (error) {
      if (error instanceof ValidationError) {
        const oauthError = oauthErrorSchema.safeParse(error.body);
        if (oauthError.success && oauthError.data.error === "invalid_grant") {
          throw new AuthError(
            "invalid_grant",
            formatOAuthError(errorPrefix, oauthError.data.error, oauthError.data.error_description),
            { cause: error }
          );
        }
      }
      throw error;
    }

    // Some providers answer 200 with an error payload
    const oauthError = oauthErrorSchema.safeParse(body);
    if (oauthError.success) {
      if (oauthError.data.error !== "invalid_grant") {
        throw new ValidationError(200, body);
      }
      throw new AuthError(
        "invalid_grant",
        formatOAuthError(errorPrefix, oauthError.data.error, oauthError.data.error_description)
      );
    }

    const parsed = tokenResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new MalformedResponseError(`${errorPrefix}: unexpected token response`, {
        cause: parsed.error,
      });
    }
    return parsed.data;
  }
}
