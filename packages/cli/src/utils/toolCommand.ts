import { z } from "zod";
import type { GatewayClient } from "./gatewayClient";

const argsSchema = z.record(z.unknown());

/** Parse the optional JSON argument of `dgw call`. */
export function parseToolArgs(raw: string | undefined): Record<string, unknown> {
  if (!raw) return {};
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (error) {
    throw new Error(`Tool arguments must be a JSON object: ${error instanceof Error ? error.message : raw}`);
  }
  const parsed = argsSchema.safeParse(value);
  if (!parsed.success) {
    throw new Error("Tool arguments must be a JSON object");
  }
  return parsed.data;
}

export async function handleToolsCommand(client: GatewayClient): Promise<void> {
  const tools = await client.listTools();
  const width = Math.max(...tools.map((tool) => tool.name.length));
  for (const kind of ["auth", "passthrough", "job", "utility"]) {
    const group = tools.filter((tool) => tool.kind === kind);
    if (group.length === 0) continue;
    console.log(`\n${kind}:`);
    for (const tool of group) {
      console.log(`  ${tool.name.padEnd(width)}  ${tool.description}`);
    }
  }
}

export async function handleCallCommand(args: string[], client: GatewayClient): Promise<void> {
  const [tool, raw] = args;
  if (!tool) {
    console.log("Usage: dgw call <tool> [json-args]");
    return;
  }
  const result = await client.call(tool, parseToolArgs(raw));
  console.log(JSON.stringify(result, null, 2));
}
