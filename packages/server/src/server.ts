import Fastify from "fastify";
import { ZodError } from "zod";
import { GatewayError, type GatewayRuntime, type Logger } from "@design-gateway/shared";
import { createToolRegistry, TOOLS, type Tool } from "./tools";

export const VERSION = "0.1.0";

export interface ServerOptions {
  /** When set, every route except /health requires `Authorization: Bearer <apiKey>`. */
  apiKey?: string;
  logger?: Logger;
  tools?: readonly Tool[];
  version?: string;
}

export interface ErrorBody {
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
}

export function toErrorResponse(error: unknown): { statusCode: number; body: ErrorBody } {
  if (error instanceof GatewayError) {
    const details = error.details();
    return {
      statusCode: error.statusCode,
      body: { error: { code: error.code, message: error.message, ...(details ? { details } : {}) } },
    };
  }
  if (error instanceof ZodError) {
    return {
      statusCode: 400,
      body: {
        error: {
          code: "invalid_input",
          message: error.issues.map((issue) => `${issue.path.join(".") || "input"}: ${issue.message}`).join("; "),
          details: { issues: error.issues },
        },
      },
    };
  }
  // fastify's own request errors (malformed JSON, body too large)
  if (error instanceof Error && "statusCode" in error && typeof error.statusCode === "number" && error.statusCode < 500) {
    const code = "code" in error && typeof error.code === "string" ? error.code : "bad_request";
    return { statusCode: error.statusCode, body: { error: { code, message: error.message } } };
  }
  return { statusCode: 500, body: { error: { code: "internal_error", message: "Internal server error" } } };
}

export const createServer = (runtime: GatewayRuntime, options: ServerOptions = {}) => {
  const app = Fastify({
    loggerInstance: options.logger ?? runtime.logger,
    bodyLimit: 50 * 1024 * 1024, // 50MB, asset uploads arrive base64-encoded
  });
  const registry = createToolRegistry(options.tools ?? TOOLS);
  const version = options.version ?? VERSION;
  const startedAt = Date.now();

  if (options.apiKey) {
    const expected = `Bearer ${options.apiKey}`;
    app.addHook("onRequest", async (req, reply) => {
      if (req.routeOptions.url === "/health") return;
      if (req.headers.authorization !== expected) {
        return reply
          .status(401)
          .send({ error: { code: "unauthorized", message: "Missing or invalid API key" } } satisfies ErrorBody);
      }
    });
  }

  app.setErrorHandler((error, req, reply) => {
    const { statusCode, body } = toErrorResponse(error);
    if (statusCode >= 500) {
      req.log.error({ err: error }, "Request failed");
    }
    return reply.status(statusCode).send(body);
  });

  app.get("/health", async () => ({ status: "ok" }));

  app.get("/tools", async () => ({
    tools: [...registry.values()].map(({ name, description, kind }) => ({ name, description, kind })),
  }));

  app.post<{ Params: { name: string }; Body: unknown }>("/tools/:name", async (req, reply) => {
    const tool = registry.get(req.params.name);
    if (!tool) {
      throw new GatewayError(`Unknown tool: ${req.params.name}`, "unknown_tool", 404);
    }

    // Cancel whatever the tool is waiting on once the caller is gone
    const controller = new AbortController();
    const onClose = () => {
      if (!reply.raw.writableFinished) {
        controller.abort(new Error("Client disconnected"));
      }
    };
    reply.raw.on("close", onClose);

    const start = Date.now();
    try {
      const result = await tool.run(req.body, {
        runtime,
        signal: controller.signal,
        log: req.log,
        startedAt,
        version,
      });
      req.log.info({ tool: tool.name, outcome: "success", durationMs: Date.now() - start }, "Tool call");
      return { result };
    } catch (error) {
      const code = error instanceof GatewayError ? error.code : error instanceof ZodError ? "invalid_input" : "internal_error";
      req.log.warn({ tool: tool.name, outcome: "error", code, durationMs: Date.now() - start }, "Tool call");
      throw error;
    } finally {
      reply.raw.off("close", onClose);
    }
  });

  return app;
};

export type GatewayServer = ReturnType<typeof createServer>;
