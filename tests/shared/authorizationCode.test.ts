import { describe, it, expect, vi, afterEach } from "vitest";
import {
  AuthError,
  createGatewayRuntime,
  DEFAULT_SCOPES,
  generateCodeChallenge,
  generatePKCE,
  MalformedResponseError,
  TransientNetworkError,
} from "@design-gateway/shared";
import { createClock, jsonResponse, requestHeaders, stubFetch, T0, testConfig, tokenResponse } from "../helpers";

function setup() {
  const clock = createClock();
  const runtime = createGatewayRuntime(testConfig, { sleep: clock.sleep, now: clock.now, random: () => 0.5 });
  return { runtime, clock };
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("PKCE helpers", () => {
  it("derives the challenge as the base64url SHA-256 of the verifier", () => {
    // RFC 7636 appendix B
    expect(generateCodeChallenge("dBjftJeZ4CVP-mB92K27uhbUJU1p1r_wW1gFWFOEjXk")).toBe(
      "E9Melhoa2OwvFrEMTJguCHaoeK1t8URWbuGJSstw-cM"
    );
  });

  it("generates 86-character base64url verifiers", () => {
    const { codeVerifier, codeChallenge } = generatePKCE();
    expect(codeVerifier).toMatch(/^[A-Za-z0-9_-]{86}$/);
    expect(codeChallenge).toBe(generateCodeChallenge(codeVerifier));
  });
});

describe("AuthorizationFlow.createAuthorizationUrl", () => {
  it("builds the provider URL with the PKCE challenge and state", () => {
    const { runtime } = setup();

    const request = runtime.authorization.createAuthorizationUrl();
    const url = new URL(request.url);

    expect(`${url.origin}${url.pathname}`).toBe(testConfig.authorizationUrl);
    expect(Object.fromEntries(url.searchParams)).toEqual({
      client_id: "test-client",
      response_type: "code",
      redirect_uri: testConfig.redirectUri,
      scope: DEFAULT_SCOPES.join(" "),
      code_challenge: request.codeChallenge,
      code_challenge_method: "s256",
      state: request.state,
    });
    expect(generateCodeChallenge(request.codeVerifier)).toBe(url.searchParams.get("code_challenge"));
    expect(request.createdAt).toBe(T0);
  });

  it("uses a fresh, unguessable state every time", () => {
    const { runtime } = setup();
    const states = new Set(
      Array.from({ length: 50 }, () => runtime.authorization.createAuthorizationUrl().state)
    );

    expect(states.size).toBe(50);
    for (const state of states) {
      expect(Buffer.from(state, "base64url").length).toBeGreaterThanOrEqual(16);
    }
  });

  it("de-duplicates requested scopes and falls back to the defaults when none are given", () => {
    const { runtime } = setup();

    const custom = new URL(runtime.authorization.createAuthorizationUrl(["design:content:read", "asset:read", "design:content:read"]).url);
    expect(custom.searchParams.get("scope")).toBe("design:content:read asset:read");

    const empty = new URL(runtime.authorization.createAuthorizationUrl([]).url);
    expect(empty.searchParams.get("scope")).toBe(DEFAULT_SCOPES.join(" "));
  });
});

describe("AuthorizationFlow.exchange", () => {
  it("exchanges the code with client credentials and stores the credential", async () => {
    const fetchMock = stubFetch(() => tokenResponse("access-new", "refresh-new", 7200));
    const { runtime } = setup();
    const { codeVerifier, state } = runtime.authorization.createAuthorizationUrl();

    const credential = await runtime.authorization.exchange({
      code: "auth-code",
      codeVerifier,
      expectedState: state,
      receivedState: state,
    });

    expect(credential).toEqual({
      accessToken: "access-new",
      refreshToken: "refresh-new",
      expiresAt: T0 + 7200 * 1000,
      scopes: new Set(["design:meta:read"]),
    });
    expect(await runtime.store.get()).toBe(credential);

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe(testConfig.tokenUrl);
    expect(init?.method).toBe("POST");
    expect(requestHeaders(init).get("authorization")).toBe(
      `Basic ${Buffer.from("test-client:test-secret").toString("base64")}`
    );
    expect(Object.fromEntries(new URLSearchParams(String(init?.body)))).toEqual({
      grant_type: "authorization_code",
      code: "auth-code",
      code_verifier: codeVerifier,
      redirect_uri: testConfig.redirectUri,
    });
  });

  it("rejects a state mismatch without calling the provider", async () => {
    const fetchMock = stubFetch();
    const { runtime } = setup();
    const { codeVerifier, state } = runtime.authorization.createAuthorizationUrl();

    const error = await runtime.authorization
      .exchange({ code: "auth-code", codeVerifier, expectedState: state, receivedState: "forged" })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AuthError);
    expect(error).toMatchObject({ reason: "invalid_state", statusCode: 400 });
    expect(fetchMock).not.toHaveBeenCalled();
    expect(await runtime.store.get()).toBeNull();
  });

  it("maps an invalid_grant answer to AuthError and stores nothing", async () => {
    stubFetch(() => jsonResponse({ error: "invalid_grant", error_description: "Code expired" }, 400));
    const { runtime } = setup();
    const { codeVerifier, state } = runtime.authorization.createAuthorizationUrl();

    const error = await runtime.authorization
      .exchange({ code: "stale-code", codeVerifier, expectedState: state, receivedState: state })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AuthError);
    expect(error).toMatchObject({
      reason: "invalid_grant",
      message: "Token exchange failed: invalid_grant - Code expired",
    });
    expect(await runtime.store.get()).toBeNull();
  });

  it("refuses to send the same verifier twice", async () => {
    const fetchMock = stubFetch(() => jsonResponse({ error: "invalid_grant" }, 400));
    const { runtime } = setup();
    const { codeVerifier, state } = runtime.authorization.createAuthorizationUrl();
    const params = { code: "auth-code", codeVerifier, expectedState: state, receivedState: state };

    await expect(runtime.authorization.exchange(params)).rejects.toBeInstanceOf(AuthError);
    await expect(runtime.authorization.exchange(params)).rejects.toThrow("This code verifier has already been used");
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("does not spend the verifier on a state mismatch", async () => {
    const fetchMock = stubFetch(() => tokenResponse("access-new"));
    const { runtime } = setup();
    const { codeVerifier, state } = runtime.authorization.createAuthorizationUrl();

    await expect(
      runtime.authorization.exchange({ code: "c", codeVerifier, expectedState: state, receivedState: "forged" })
    ).rejects.toMatchObject({ reason: "invalid_state" });
    await runtime.authorization.exchange({ code: "c", codeVerifier, expectedState: state, receivedState: state });

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect((await runtime.store.get())?.accessToken).toBe("access-new");
  });

  it("treats a token response without a refresh token as malformed", async () => {
    stubFetch(() => jsonResponse({ access_token: "access-new", expires_in: 3600 }));
    const { runtime } = setup();
    const { codeVerifier, state } = runtime.authorization.createAuthorizationUrl();

    await expect(
      runtime.authorization.exchange({ code: "c", codeVerifier, expectedState: state, receivedState: state })
    ).rejects.toBeInstanceOf(MalformedResponseError);
    expect(await runtime.store.get()).toBeNull();
  });

  it("never replays the exchange after a server error", async () => {
    const fetchMock = stubFetch(() => jsonResponse({ message: "unavailable" }, 503));
    const { runtime, clock } = setup();
    const { codeVerifier, state } = runtime.authorization.createAuthorizationUrl();

    await expect(
      runtime.authorization.exchange({ code: "c", codeVerifier, expectedState: state, receivedState: state })
    ).rejects.toBeInstanceOf(TransientNetworkError);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(clock.sleep).not.toHaveBeenCalled();
  });
});
