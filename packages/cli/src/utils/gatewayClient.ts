import { z } from "zod";

const DEFAULT_GATEWAY_URL = "http://127.0.0.1:8000";

const errorBodySchema = z.object({
  error: z.object({
    code: z.string(),
    message: z.string(),
    details: z.record(z.unknown()).optional(),
  }),
});

const resultBodySchema = z.object({ result: z.unknown() });

const toolListSchema = z.object({
  tools: z.array(z.object({ name: z.string(), description: z.string(), kind: z.string() })),
});

export type ToolListing = z.infer<typeof toolListSchema>["tools"];

export class ToolCallError extends Error {
  constructor(
    readonly code: string,
    message: string,
    readonly status: number,
    readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "ToolCallError";
  }
}

export interface GatewayClientOptions {
  baseUrl?: string;
  apiKey?: string;
  fetch?: typeof fetch;
}

export function gatewayClientFromEnv(env: NodeJS.ProcessEnv = process.env): GatewayClient {
  return new GatewayClient({ baseUrl: env.GATEWAY_URL || undefined, apiKey: env.GATEWAY_API_KEY || undefined });
}

/** Talks to a running gateway over its tool-call routes. */
export class GatewayClient {
  private readonly baseUrl: string;
  private readonly headers: Record<string, string>;
  private readonly fetchImpl: typeof fetch;

  constructor(options: GatewayClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_GATEWAY_URL).replace(/\/+$/, "");
    this.headers = options.apiKey ? { Authorization: `Bearer ${options.apiKey}` } : {};
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  async listTools(): Promise<ToolListing> {
    const body = await this.request("GET", "/tools");
    return toolListSchema.parse(body).tools;
  }

  async call(tool: string, args: Record<string, unknown> = {}): Promise<unknown> {
    const body = await this.request("POST", `/tools/${encodeURIComponent(tool)}`, args);
    return resultBodySchema.parse(body).result;
  }

  private async request(method: "GET" | "POST", path: string, payload?: unknown): Promise<unknown> {
    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}${path}`, {
        method,
        headers: payload === undefined ? this.headers : { ...this.headers, "Content-Type": "application/json" },
        body: payload === undefined ? undefined : JSON.stringify(payload),
      });
    } catch (error) {
      throw new Error(`Could not reach the gateway at ${this.baseUrl}. Is it running?`, { cause: error });
    }

    const text = await response.text();
    let body: unknown = null;
    if (text) {
      try {
        body = JSON.parse(text);
      } catch (error) {
        throw new ToolCallError("malformed_response", `Gateway answered ${response.status} with a non-JSON body`, response.status, {
          cause: String(error),
        });
      }
    }

    if (!response.ok) {
      const parsed = errorBodySchema.safeParse(body);
      if (parsed.success) {
        const { code, message, details } = parsed.data.error;
        throw new ToolCallError(code, message, response.status, details);
      }
      throw new ToolCallError("http_error", `Gateway answered ${response.status}`, response.status);
    }
    return body;
  }
}
