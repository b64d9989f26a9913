export const CANVA_API_BASE_URL = "https://api.canva.com/rest/v1";
export const CANVA_AUTHORIZATION_URL = "https://www.canva.com/api/oauth/authorize";
export const CANVA_TOKEN_URL = `${CANVA_API_BASE_URL}/oauth/token`;

// Canva expects the lowercase method name
export const PKCE_CHALLENGE_METHOD = "s256";

export const DEFAULT_SCOPES = [
  "asset:read",
  "asset:write",
  "design:meta:read",
  "folder:read",
] as const;

export const TOKEN_SAFETY_MARGIN_MS = 60_000;
export const DEFAULT_TOKEN_LIFETIME_S = 3600;
export const REFRESH_TIMEOUT_MS = 30_000;

export const DEFAULT_JOB_TIMEOUT_MS = 5 * 60 * 1000;
