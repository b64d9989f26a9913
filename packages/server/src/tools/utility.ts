import { z } from "zod";
import { defineTool, type Tool } from "./types";

const FEATURES = [
  "OAuth 2.0 authorization code with PKCE",
  "Automatic token refresh",
  "Users",
  "Designs",
  "Assets",
  "Folders",
  "Exports",
  "Brand templates",
  "Autofill",
  "Comments",
];

export const utilityTools: Tool[] = [
  defineTool({
    name: "get_server_info",
    description: "Describe this gateway and how long it has been running.",
    kind: "utility",
    input: z.object({}),
    handler: (_input, { startedAt, version }) => ({
      name: "design-gateway",
      version,
      status: "running",
      uptime_ms: Date.now() - startedAt,
      features: FEATURES,
    }),
  }),
  defineTool({
    name: "ping_server",
    description: "Check that the gateway is answering.",
    kind: "utility",
    input: z.object({}),
    handler: () => ({ message: "pong", timestamp: new Date().toISOString() }),
  }),
];
