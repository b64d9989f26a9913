/**
 * Loopback listener for the OAuth redirect. It only captures `code` and
 * `state`; comparing the state is left to the gateway's exchange.
 */

import { createServer, type Server } from "node:http";

const FLOW_TIMEOUT_MS = 5 * 60 * 1000;
const LOOPBACK_HOSTS = new Set(["127.0.0.1", "localhost", "[::1]"]);

export interface CallbackResult {
  code: string;
  state: string;
}

export interface CallbackListener {
  port: number;
  waitForCallback(): Promise<CallbackResult>;
  close(): void;
}

const escapeHtml = (value: string) =>
  value.replace(/[&<>"']/g, (ch) => `&#${ch.charCodeAt(0)};`);

const page = (title: string, message: string) =>
  `<html><body><h2>${escapeHtml(title)}</h2><p>${escapeHtml(message)}</p></body></html>`;

export async function startCallbackListener(
  redirectUri: string,
  timeoutMs: number = FLOW_TIMEOUT_MS
): Promise<CallbackListener> {
  const redirect = new URL(redirectUri);
  if (redirect.protocol !== "http:" || !LOOPBACK_HOSTS.has(redirect.hostname)) {
    throw new Error(`Redirect URI must be an http loopback address to receive the callback here: ${redirectUri}`);
  }
  const callbackPath = redirect.pathname;
  const requestedPort = redirect.port ? Number(redirect.port) : 80;

  let resolveCallback: (result: CallbackResult) => void = () => undefined;
  let rejectCallback: (error: Error) => void = () => undefined;
  const callback = new Promise<CallbackResult>((resolve, reject) => {
    resolveCallback = resolve;
    rejectCallback = reject;
  });

  const server: Server = createServer((req, res) => {
    const url = new URL(req.url || "/", redirect.origin);
    if (url.pathname !== callbackPath) {
      res.writeHead(404);
      res.end("Not Found");
      return;
    }

    const error = url.searchParams.get("error");
    const code = url.searchParams.get("code");
    const state = url.searchParams.get("state");

    if (error) {
      const description = url.searchParams.get("error_description") || error;
      res.writeHead(200, { "Content-Type": "text/html" });
      res.end(page("Authorization Failed", `${description}. You can close this window.`));
      rejectCallback(new Error(`OAuth error: ${description}`));
      return;
    }
    if (!code || !state) {
      res.writeHead(400, { "Content-Type": "text/html" });
      res.end(page("Missing Code", "The redirect did not carry an authorization code and state."));
      rejectCallback(new Error("No authorization code received"));
      return;
    }

    res.writeHead(200, { "Content-Type": "text/html" });
    res.end(page("Authorization Received", "You can close this window and return to the terminal."));
    resolveCallback({ code, state });
  });

  await new Promise<void>((resolve, reject) => {
    server.once("error", (err: NodeJS.ErrnoException) => {
      if (err.code === "EADDRINUSE") {
        reject(new Error(`Port ${requestedPort} is already in use. A previous login may still be waiting.`));
      } else {
        reject(err);
      }
    });
    server.listen(requestedPort, redirect.hostname.replace(/^\[|\]$/g, ""), () => resolve());
  });

  const timeout = setTimeout(() => {
    rejectCallback(new Error("Timed out waiting for the authorization redirect"));
  }, timeoutMs);

  const close = () => {
    clearTimeout(timeout);
    server.close();
  };

  // Settles once, whichever comes first. The redirect or the timer may
  // settle it before anyone waits, so a rejection is held for a later waiter.
  const settled = callback.finally(close);
  settled.catch(() => undefined);
  const address = server.address();
  const port = typeof address === "object" && address !== null ? address.port : requestedPort;

  return {
    port,
    waitForCallback: () => settled,
    close,
  };
}
