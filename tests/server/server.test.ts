import { describe, it, expect, vi, afterEach } from "vitest";
import { z } from "zod";
import { createGatewayRuntime, type Credential } from "@design-gateway/shared";
import { createServer } from "@design-gateway/server";
import { defineTool } from "../../packages/server/src/tools/types";
import { createClock, jsonResponse, makeCredential, requestHeaders, stubFetch, T0, testConfig, tokenResponse } from "../helpers";

function setup(options: { credential?: Credential | null; apiKey?: string } = {}) {
  const clock = createClock();
  const runtime = createGatewayRuntime(testConfig, {
    initialCredential: options.credential === undefined ? makeCredential() : options.credential,
    sleep: clock.sleep,
    now: clock.now,
    random: () => 0.5,
  });
  const app = createServer(runtime, { apiKey: options.apiKey });
  return { app, runtime, clock };
}

function callTool(app: ReturnType<typeof createServer>, name: string, args?: Record<string, unknown>) {
  return app.inject({ method: "POST", url: `/tools/${name}`, payload: args ?? {} });
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("routes", () => {
  it("answers /health", async () => {
    const { app } = setup();

    const response = await app.inject({ method: "GET", url: "/health" });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ status: "ok" });
  });

  it("lists every tool with its kind", async () => {
    const { app } = setup();

    const { tools } = (await app.inject({ method: "GET", url: "/tools" })).json<{
      tools: Array<{ name: string; kind: string }>;
    }>();

    expect(tools).toHaveLength(39);
    const kinds = Object.fromEntries(tools.map((tool) => [tool.name, tool.kind]));
    expect(kinds).toMatchObject({
      create_authorization_url: "auth",
      clear_tokens: "auth",
      list_designs: "passthrough",
      move_folder_item: "passthrough",
      create_design_export_job: "job",
      get_design_autofill_job: "job",
      ping_server: "utility",
    });
  });

  it("requires the API key on tool routes when one is configured", async () => {
    const { app } = setup({ apiKey: "test-key" });

    const denied = await callTool(app, "ping_server");
    expect(denied.statusCode).toBe(401);
    expect(denied.json()).toEqual({ error: { code: "unauthorized", message: "Missing or invalid API key" } });

    const allowed = await app.inject({
      method: "POST",
      url: "/tools/ping_server",
      headers: { authorization: "Bearer test-key" },
      payload: {},
    });
    expect(allowed.statusCode).toBe(200);

    expect((await app.inject({ method: "GET", url: "/health" })).statusCode).toBe(200);
  });

  it("answers 404 for an unknown tool", async () => {
    const { app } = setup();

    const response = await callTool(app, "launch_rocket");

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({ error: { code: "unknown_tool", message: "Unknown tool: launch_rocket" } });
  });

  it("rejects invalid tool input with 400", async () => {
    const { app } = setup();

    const response = await callTool(app, "get_design", {});

    expect(response.statusCode).toBe(400);
    expect(response.json().error).toMatchObject({ code: "invalid_input", message: "design_id: Required" });
  });

  it("hides unexpected errors behind internal_error", async () => {
    const clock = createClock();
    const runtime = createGatewayRuntime(testConfig, { now: clock.now, sleep: clock.sleep });
    const broken = defineTool({
      name: "broken",
      description: "Always throws",
      kind: "utility",
      input: z.object({}),
      handler: () => {
        throw new Error("database password is hunter2");
      },
    });
    const app = createServer(runtime, { tools: [broken] });

    const response = await callTool(app, "broken");

    expect(response.statusCode).toBe(500);
    expect(response.json()).toEqual({ error: { code: "internal_error", message: "Internal server error" } });
  });

  it("treats a call without a body as empty arguments", async () => {
    const { app } = setup();

    const response = await app.inject({ method: "POST", url: "/tools/ping_server" });

    expect(response.statusCode).toBe(200);
    expect(response.json().result.message).toBe("pong");
  });
});

describe("passthrough tools", () => {
  it("forwards the call and returns the provider body", async () => {
    const fetchMock = stubFetch(() => jsonResponse({ design: { id: "DAF1", title: "Poster" } }));
    const { app } = setup();

    const response = await callTool(app, "get_design", { design_id: "DAF1" });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ result: { design: { id: "DAF1", title: "Poster" } } });
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe(`${testConfig.apiBaseUrl}/designs/DAF1`);
    expect(requestHeaders(init).get("authorization")).toBe("Bearer access-1");
  });

  it("sends query parameters and JSON bodies", async () => {
    const fetchMock = stubFetch(
      () => jsonResponse({ items: [] }),
      () => jsonResponse({ folder: { id: "FAF2" } })
    );
    const { app } = setup();

    await callTool(app, "list_folder_items", { folder_id: "FAF1", item_types: ["design", "image"] });
    await callTool(app, "create_folder", { name: "Campaign" });

    expect(fetchMock.mock.calls[0][0]).toBe(
      `${testConfig.apiBaseUrl}/folders/FAF1/items?limit=50&item_types=design%2Cimage`
    );
    const [url, init] = fetchMock.mock.calls[1];
    expect(url).toBe(`${testConfig.apiBaseUrl}/folders`);
    expect(JSON.parse(String(init?.body))).toEqual({ name: "Campaign", parent_folder_id: "root" });
  });

  it("reports a missing credential as unauthenticated", async () => {
    const fetchMock = stubFetch();
    const { app } = setup({ credential: null });

    const response = await callTool(app, "get_current_user");

    expect(response.statusCode).toBe(401);
    expect(response.json()).toEqual({
      error: { code: "unauthenticated", message: "Not authenticated. Complete the authorization flow first." },
    });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("passes provider validation errors through with their status", async () => {
    stubFetch(() => jsonResponse({ code: "not_found", message: "Design not found" }, 404));
    const { app } = setup();

    const response = await callTool(app, "get_design", { design_id: "missing" });

    expect(response.statusCode).toBe(404);
    expect(response.json().error).toEqual({
      code: "validation_error",
      message: 'Provider rejected request: 404 {"code":"not_found","message":"Design not found"}',
      details: { status: 404, body: { code: "not_found", message: "Design not found" } },
    });
  });
});

describe("auth tools", () => {
  it("runs the authorization-code flow through the tool boundary", async () => {
    const fetchMock = stubFetch(() => tokenResponse("access-new"));
    const { app, runtime } = setup({ credential: null });

    const started = (await callTool(app, "create_authorization_url", { scopes: ["design:meta:read"] })).json<{
      result: { authorization_url: string; code_verifier: string; code_challenge: string; state: string };
    }>().result;
    expect(new URL(started.authorization_url).searchParams.get("state")).toBe(started.state);

    const exchanged = await callTool(app, "exchange_code_for_token", {
      code: "auth-code",
      code_verifier: started.code_verifier,
      state: started.state,
      received_state: started.state,
    });

    expect(exchanged.statusCode).toBe(200);
    expect(exchanged.json()).toEqual({
      result: {
        authenticated: true,
        token_type: "Bearer",
        expires_at: new Date(T0 + 3600 * 1000).toISOString(),
        scopes: ["design:meta:read"],
      },
    });
    expect((await runtime.store.get())?.accessToken).toBe("access-new");
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("rejects a callback whose state does not match", async () => {
    const fetchMock = stubFetch();
    const { app } = setup({ credential: null });

    const response = await callTool(app, "exchange_code_for_token", {
      code: "auth-code",
      code_verifier: "v".repeat(86),
      state: "expected",
      received_state: "forged",
    });

    expect(response.statusCode).toBe(400);
    expect(response.json().error).toEqual({ code: "invalid_state", message: "OAuth state mismatch" });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("describes the OAuth configuration without the client secret", async () => {
    const { app } = setup();

    const { result } = (await callTool(app, "get_oauth_config")).json<{ result: Record<string, unknown> }>();

    expect(result).toMatchObject({
      client_id: "test-client",
      redirect_uri: testConfig.redirectUri,
      code_challenge_method: "s256",
      auth: {
        status: "active",
        expiresAt: new Date(T0 + 3600_000).toISOString(),
        scopes: ["design:meta:read"],
      },
    });
    expect(JSON.stringify(result)).not.toContain("test-secret");
  });

  it("refreshes on demand", async () => {
    stubFetch(() => tokenResponse("access-2"));
    const { app, runtime } = setup();

    const response = await callTool(app, "refresh_access_token");

    expect(response.json().result).toMatchObject({ refreshed: true });
    expect((await runtime.store.get())?.accessToken).toBe("access-2");
  });

  it("clears the stored credential locally", async () => {
    const fetchMock = stubFetch();
    const { app, runtime } = setup();

    expect((await callTool(app, "clear_tokens")).json()).toEqual({ result: { cleared: true } });
    expect((await callTool(app, "clear_tokens")).json()).toEqual({ result: { cleared: false } });
    expect(await runtime.store.get()).toBeNull();
    expect(fetchMock).not.toHaveBeenCalled();
  });
});

describe("job tools", () => {
  const exportUrl = "https://files.example.test/e1.pdf";

  it("waits for an export to finish by default", async () => {
    stubFetch(
      () => jsonResponse({ job: { id: "e1", status: "in_progress" } }),
      () => jsonResponse({ job: { id: "e1", status: "success", urls: [exportUrl] } })
    );
    const { app, clock } = setup();

    const response = await callTool(app, "create_design_export_job", { design_id: "DAF1", format: "pdf" });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ result: { kind: "export", status: "success", result: [exportUrl] } });
    expect(clock.sleep.mock.calls.map(([ms]) => ms)).toEqual([1000]);
  });

  it("returns the created job when asked not to wait", async () => {
    const fetchMock = stubFetch(() => jsonResponse({ job: { id: "e1", status: "in_progress" } }));
    const { app } = setup();

    const response = await callTool(app, "create_design_export_job", {
      design_id: "DAF1",
      format: { type: "png", width: 800 },
      wait: false,
    });

    expect(response.json()).toEqual({ result: { id: "e1", kind: "export", status: "in_progress" } });
    expect(JSON.parse(String(fetchMock.mock.calls[0][1]?.body))).toEqual({
      design_id: "DAF1",
      format: { type: "png", width: 800 },
    });
  });

  it("reports a failed job with its reason", async () => {
    stubFetch(() => jsonResponse({ job: { id: "e1", status: "failed", error: { message: "Design is empty" } } }));
    const { app } = setup();

    const response = await callTool(app, "create_design_export_job", { design_id: "DAF1", format: "pdf" });

    expect(response.statusCode).toBe(422);
    expect(response.json()).toEqual({
      error: {
        code: "job_failed",
        message: "Job e1 failed: Design is empty",
        details: { jobId: "e1", reason: "Design is empty" },
      },
    });
  });

  it("reports a job still running at timeout_ms", async () => {
    stubFetch(...Array.from({ length: 3 }, () => () => jsonResponse({ job: { id: "e1", status: "in_progress" } })));
    const { app } = setup();

    const response = await callTool(app, "create_design_export_job", {
      design_id: "DAF1",
      format: "pdf",
      timeout_ms: 1500,
    });

    expect(response.statusCode).toBe(504);
    expect(response.json().error).toMatchObject({ code: "job_timeout", details: { jobId: "e1", timeoutMs: 1500 } });
  });

  it("uploads base64 content as raw bytes", async () => {
    const fetchMock = stubFetch(() =>
      jsonResponse({ job: { id: "u1", status: "success", asset: { id: "MAF1", name: "logo.png" } } })
    );
    const { app } = setup();

    const response = await callTool(app, "create_asset_upload_job", {
      name: "logo.png",
      content_base64: Buffer.from("fake image bytes").toString("base64"),
    });

    expect(response.json().result).toEqual({
      kind: "asset_upload",
      status: "success",
      result: { id: "MAF1", name: "logo.png" },
    });
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe(`${testConfig.apiBaseUrl}/asset-uploads`);
    expect(Buffer.from(init?.body instanceof Uint8Array ? init.body : new Uint8Array()).toString()).toBe(
      "fake image bytes"
    );
    expect(requestHeaders(init).get("asset-upload-metadata")).toBe(
      JSON.stringify({ name_base64: Buffer.from("logo.png").toString("base64") })
    );
  });

  it("reads a job's status once", async () => {
    const fetchMock = stubFetch(() => jsonResponse({ job: { id: "f1", status: "in_progress" } }));
    const { app } = setup();

    const response = await callTool(app, "get_design_autofill_job", { job_id: "f1" });

    expect(response.json()).toEqual({ result: { id: "f1", kind: "autofill", status: "in_progress" } });
    expect(fetchMock.mock.calls[0][0]).toBe(`${testConfig.apiBaseUrl}/autofills/f1`);
  });
});

describe("utility tools", () => {
  it("describes the server", async () => {
    const { app } = setup();

    const { result } = (await callTool(app, "get_server_info")).json<{ result: Record<string, unknown> }>();

    expect(result).toMatchObject({ name: "design-gateway", version: "0.1.0", status: "running" });
  });
});
