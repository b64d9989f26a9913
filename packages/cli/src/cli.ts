#!/usr/bin/env tsx
import { handleAuthCommand } from "./utils/authCommand";
import { handleCallCommand, handleToolsCommand } from "./utils/toolCommand";
import { gatewayClientFromEnv, ToolCallError } from "./utils/gatewayClient";

const HELP = `
Usage: dgw <command> [options]

Commands:
  auth <command>          Manage the gateway's Canva authorization (see dgw auth --help)
  tools                   List the tools the gateway exposes
  call <tool> [json]      Call a tool with a JSON object of arguments
  help                    Show this help

Environment:
  GATEWAY_URL             Gateway address (default http://127.0.0.1:8000)
  GATEWAY_API_KEY         Bearer key, when the gateway requires one
`;

async function run(argv: string[]): Promise<void> {
  const [command, ...rest] = argv;
  const client = gatewayClientFromEnv();

  switch (command) {
    case "auth":
      await handleAuthCommand(rest, client);
      break;
    case "tools":
      await handleToolsCommand(client);
      break;
    case "call":
      await handleCallCommand(rest, client);
      break;
    default:
      console.log(HELP);
      break;
  }
}

run(process.argv.slice(2)).catch((error: unknown) => {
  if (error instanceof ToolCallError) {
    console.error(`Error (${error.code}): ${error.message}`);
  } else {
    console.error(error instanceof Error ? error.message : error);
  }
  process.exit(1);
});
