import type { FastifyBaseLogger } from "fastify";
import type { z } from "zod";
import type { GatewayRuntime } from "@design-gateway/shared";

export type ToolKind = "auth" | "passthrough" | "job" | "utility";

export interface ToolContext {
  runtime: GatewayRuntime;
  /** Aborted when the caller goes away before the tool finishes. */
  signal: AbortSignal;
  log: FastifyBaseLogger;
  startedAt: number;
  version: string;
}

export interface ToolSummary {
  name: string;
  description: string;
  kind: ToolKind;
}

export interface Tool extends ToolSummary {
  run(args: unknown, context: ToolContext): Promise<unknown>;
}

interface ToolDefinition<S extends z.ZodTypeAny> extends ToolSummary {
  input: S;
  handler(input: z.output<S>, context: ToolContext): unknown;
}

/** Bind a zod input schema to its handler. Arguments are parsed before the handler runs. */
export function defineTool<S extends z.ZodTypeAny>(definition: ToolDefinition<S>): Tool {
  return {
    name: definition.name,
    description: definition.description,
    kind: definition.kind,
    run: async (args, context) => definition.handler(definition.input.parse(args ?? {}), context),
  };
}
