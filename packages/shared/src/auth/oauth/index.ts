export { generatePKCE, generateCodeChallenge, generateState, AuthorizationFlow } from "./authorizationCode";
export { TokenEndpointClient, buildOAuthFormParams, basicAuthHeader, calculateExpiry, credentialFromTokenResponse } from "./http";
export { TokenManager, type TokenManagerOptions } from "./tokenRefresh";
