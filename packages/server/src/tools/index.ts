import { authTools } from "./auth";
import { jobTools } from "./jobs";
import { passthroughTools } from "./passthrough";
import type { Tool } from "./types";
import { utilityTools } from "./utility";

export type { Tool, ToolContext, ToolKind, ToolSummary } from "./types";

export const TOOLS: readonly Tool[] = [...authTools, ...passthroughTools, ...jobTools, ...utilityTools];

export function createToolRegistry(tools: readonly Tool[] = TOOLS): Map<string, Tool> {
  const registry = new Map<string, Tool>();
  for (const tool of tools) {
    if (registry.has(tool.name)) {
      throw new Error(`Duplicate tool name: ${tool.name}`);
    }
    registry.set(tool.name, tool);
  }
  return registry;
}
