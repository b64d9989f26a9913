import { vi } from "vitest";
import type { Credential, GatewayRuntimeConfig } from "@design-gateway/shared";

export const T0 = 1_700_000_000_000;

export const testConfig: GatewayRuntimeConfig = {
  clientId: "test-client",
  clientSecret: "test-secret",
  redirectUri: "http://127.0.0.1:8085/callback",
  authorizationUrl: "https://auth.example.test/authorize",
  tokenUrl: "https://api.example.test/v1/oauth/token",
  apiBaseUrl: "https://api.example.test/v1",
};

/** A clock that only moves when the code under test sleeps or the test advances it. */
export function createClock(start: number = T0) {
  let current = start;
  const sleep = vi.fn(async (ms: number, _signal?: AbortSignal) => {
    current += ms;
  });
  return {
    now: () => current,
    advance: (ms: number) => {
      current += ms;
    },
    sleep,
  };
}

export function makeCredential(overrides: Partial<Credential> = {}): Credential {
  return {
    accessToken: "access-1",
    refreshToken: "refresh-1",
    expiresAt: T0 + 3600_000,
    scopes: new Set(["design:meta:read"]),
    ...overrides,
  };
}

export function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json", ...headers },
  });
}

export function emptyResponse(status: number, headers: Record<string, string> = {}): Response {
  return new Response(null, { status, headers });
}

export function tokenResponse(accessToken: string, refreshToken = "refresh-2", expiresIn = 3600): Response {
  return jsonResponse({
    access_token: accessToken,
    refresh_token: refreshToken,
    token_type: "Bearer",
    expires_in: expiresIn,
    scope: "design:meta:read",
  });
}

/** Replace global fetch with a mock answering from a queue of response factories. */
export function stubFetch(...responses: Array<() => Response>) {
  const queue = [...responses];
  const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit): Promise<Response> => {
    const next = queue.shift();
    if (!next) {
      throw new Error("Unexpected fetch: no response queued");
    }
    return next();
  });
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

export function requestHeaders(init: RequestInit | undefined): Headers {
  return new Headers(init?.headers);
}
