import { describe, it, expect, afterEach } from "vitest";
import http from "node:http";
import { startCallbackListener, type CallbackListener } from "../../packages/cli/src/utils/callbackServer";

function get(port: number, path: string): Promise<{ status: number; body: string }> {
  return new Promise((resolve, reject) => {
    const req = http.get(`http://127.0.0.1:${port}${path}`, (res) => {
      let body = "";
      res.on("data", (chunk) => (body += chunk));
      res.on("end", () => resolve({ status: res.statusCode ?? 0, body }));
    });
    req.on("error", reject);
  });
}

describe("startCallbackListener", () => {
  let listener: CallbackListener | null = null;

  afterEach(() => {
    listener?.close();
    listener = null;
  });

  it("hands back the code and state from the redirect", async () => {
    listener = await startCallbackListener("http://127.0.0.1:0/callback");
    const callback = listener.waitForCallback();

    const response = await get(listener.port, "/callback?code=abc123&state=xyz789");

    expect(response.status).toBe(200);
    expect(response.body).toContain("Authorization Received");
    await expect(callback).resolves.toEqual({ code: "abc123", state: "xyz789" });
  });

  it("ignores other paths", async () => {
    listener = await startCallbackListener("http://127.0.0.1:0/callback");

    const response = await get(listener.port, "/favicon.ico");

    expect(response.status).toBe(404);
  });

  it("fails on a provider error and escapes its description", async () => {
    listener = await startCallbackListener("http://127.0.0.1:0/callback");
    const callback = listener.waitForCallback();
    callback.catch(() => undefined);

    const response = await get(listener.port, "/callback?error=access_denied&error_description=%3Cb%3Eno%3C%2Fb%3E");

    expect(response.body).toContain("&#60;b&#62;no&#60;/b&#62;");
    await expect(callback).rejects.toThrow("OAuth error: <b>no</b>");
  });

  it("keeps a provider error that arrives before anyone waits", async () => {
    listener = await startCallbackListener("http://127.0.0.1:0/callback");

    await get(listener.port, "/callback?error=access_denied");
    await new Promise((resolve) => setTimeout(resolve, 0));

    await expect(listener.waitForCallback()).rejects.toThrow("OAuth error: access_denied");
  });

  it("fails when the code is missing", async () => {
    listener = await startCallbackListener("http://127.0.0.1:0/callback");
    const callback = listener.waitForCallback();
    callback.catch(() => undefined);

    const response = await get(listener.port, "/callback?state=xyz789");

    expect(response.status).toBe(400);
    await expect(callback).rejects.toThrow("No authorization code received");
  });

  it("times out when no redirect arrives", async () => {
    listener = await startCallbackListener("http://127.0.0.1:0/callback", 20);

    await expect(listener.waitForCallback()).rejects.toThrow("Timed out waiting for the authorization redirect");
  });

  it("only listens on loopback http redirect URIs", async () => {
    await expect(startCallbackListener("https://app.example.test/callback")).rejects.toThrow(
      "Redirect URI must be an http loopback address"
    );
  });
});
