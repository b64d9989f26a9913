/**
 * dgw auth - OAuth session management against a running gateway.
 *
 * The gateway owns the credential; the CLI only drives the browser half of
 * the authorization-code flow and relays the redirect back to it.
 */

import { execFile } from "node:child_process";
import { z } from "zod";
import { startCallbackListener } from "./callbackServer";
import type { GatewayClient } from "./gatewayClient";

const AUTH_HELP = `
Usage: dgw auth <command>

Commands:
  login [scopes...]   Authorize the gateway with Canva (opens a browser)
  status              Show the stored credential's state
  refresh             Refresh the access token now
  logout              Forget the stored credential

Examples:
  dgw auth login
  dgw auth login design:content:read design:content:write
  dgw auth status
`;

const authorizationSchema = z.object({
  authorization_url: z.string(),
  code_verifier: z.string(),
  state: z.string(),
});

const oauthConfigSchema = z.object({
  redirect_uri: z.string(),
  auth: z.object({
    status: z.string(),
    expiresAt: z.string().nullable(),
    scopes: z.array(z.string()),
  }),
});

const tokenSchema = z.object({
  expires_at: z.string(),
  scopes: z.array(z.string()),
});

function isHelpFlag(value?: string): boolean {
  return !value || value === "--help" || value === "-h";
}

export async function handleAuthCommand(args: string[], client: GatewayClient): Promise<void> {
  const subcommand = args[0];

  if (isHelpFlag(subcommand)) {
    console.log(AUTH_HELP);
    return;
  }

  switch (subcommand) {
    case "login":
      await handleLogin(client, args.slice(1));
      break;
    case "status":
      await handleStatus(client);
      break;
    case "refresh":
      await handleRefresh(client);
      break;
    case "logout":
      await handleLogout(client);
      break;
    default:
      console.log(AUTH_HELP);
      break;
  }
}

async function handleLogin(client: GatewayClient, scopes: string[]): Promise<void> {
  const { redirect_uri } = oauthConfigSchema.parse(await client.call("get_oauth_config"));
  const listener = await startCallbackListener(redirect_uri);

  try {
    const authorization = authorizationSchema.parse(
      await client.call("create_authorization_url", scopes.length > 0 ? { scopes } : {})
    );
    printBrowserInstructions(authorization.authorization_url);

    const callback = await listener.waitForCallback();
    const token = tokenSchema.parse(
      await client.call("exchange_code_for_token", {
        code: callback.code,
        code_verifier: authorization.code_verifier,
        state: authorization.state,
        received_state: callback.state,
      })
    );

    console.log("\nAuthentication successful!");
    console.log(`Token expires: ${new Date(token.expires_at).toLocaleString()}`);
    console.log(`Scopes:        ${token.scopes.join(" ")}`);
  } finally {
    listener.close();
  }
}

async function handleStatus(client: GatewayClient): Promise<void> {
  const { auth } = oauthConfigSchema.parse(await client.call("get_oauth_config"));

  if (auth.status === "not_authenticated") {
    console.log("Not authenticated. Run `dgw auth login` to authorize the gateway.");
    return;
  }

  console.log(`Status:  ${auth.status.toUpperCase()}`);
  if (auth.expiresAt) {
    console.log(`Expires: ${new Date(auth.expiresAt).toLocaleString()}`);
  }
  console.log(`Scopes:  ${auth.scopes.join(" ")}`);
}

async function handleRefresh(client: GatewayClient): Promise<void> {
  const token = tokenSchema.parse(await client.call("refresh_access_token"));
  console.log(`Access token refreshed. Expires: ${new Date(token.expires_at).toLocaleString()}`);
}

async function handleLogout(client: GatewayClient): Promise<void> {
  const { cleared } = z.object({ cleared: z.boolean() }).parse(await client.call("clear_tokens"));
  console.log(cleared ? "Stored credential removed." : "No stored credential.");
}

function printBrowserInstructions(url: string): void {
  console.log("Opening browser for authentication...\n");
  openBrowser(url);
  console.log("If the browser didn't open, visit:");
  console.log(`  ${url}\n`);
  console.log("Waiting for authorization...");
}

export interface BrowserCommand {
  file: string;
  args: string[];
}

/**
 * The program and argument list that open `url` in the default browser.
 * The URL is passed as one argument, never through a shell.
 */
export function browserCommand(url: string, platform: NodeJS.Platform = process.platform): BrowserCommand {
  const { protocol } = new URL(url);
  if (protocol !== "https:" && protocol !== "http:") {
    throw new Error(`Refusing to open a non-web URL: ${url}`);
  }
  if (platform === "win32") {
    return { file: "rundll32", args: ["url.dll,FileProtocolHandler", url] };
  }
  if (platform === "darwin") {
    return { file: "open", args: [url] };
  }
  return { file: "xdg-open", args: [url] };
}

function openBrowser(url: string): void {
  let command: BrowserCommand;
  try {
    command = browserCommand(url);
  } catch (error) {
    console.log(`(Could not open a browser: ${error instanceof Error ? error.message : String(error)})`);
    return;
  }

  execFile(command.file, command.args, (error) => {
    if (error) {
      console.log(`(Could not open a browser: ${error.message})`);
    }
  });
}
