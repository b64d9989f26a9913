/**
 * Credential and OAuth wire types
 */

import { z } from "zod";

export interface Credential {
  accessToken: string;
  refreshToken: string;
  expiresAt: number; // Unix timestamp in milliseconds
  scopes: ReadonlySet<string>;
}

// Provider configuration handed over by the host at startup
export interface OAuthClientConfig {
  clientId: string;
  clientSecret: string;
  redirectUri: string;
  authorizationUrl: string;
  tokenUrl: string;
}

// Returned to the caller, who keeps verifier and state until the callback arrives
export interface AuthorizationRequest {
  url: string;
  codeVerifier: string;
  codeChallenge: string;
  state: string;
  createdAt: number;
}

export interface PKCEPair {
  codeVerifier: string;
  codeChallenge: string;
}

export interface ExchangeParams {
  code: string;
  codeVerifier: string;
  expectedState: string;
  receivedState: string;
}

export const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().min(1).optional(),
  token_type: z.string().optional(),
  expires_in: z.number().positive().optional(),
  scope: z.string().optional(),
});

export type OAuthTokenResponse = z.infer<typeof tokenResponseSchema>;

export const oauthErrorSchema = z.object({
  error: z.string(),
  error_description: z.string().optional(),
});
