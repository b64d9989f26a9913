import { z } from "zod";
import {
  CANVA_API_BASE_URL,
  CANVA_AUTHORIZATION_URL,
  CANVA_TOKEN_URL,
  ConfigError,
  type GatewayRuntimeConfig,
} from "@design-gateway/shared";

const REQUIRED_VARIABLES = ["CANVA_CLIENT_ID", "CANVA_CLIENT_SECRET", "CANVA_REDIRECT_URI"] as const;

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() !== "" ? value.trim() : undefined));

const envSchema = z.object({
  CANVA_CLIENT_ID: z.string().min(1),
  CANVA_CLIENT_SECRET: z.string().min(1),
  CANVA_REDIRECT_URI: z.string().url(),
  CANVA_API_BASE_URL: z.string().url().default(CANVA_API_BASE_URL),
  CANVA_AUTHORIZATION_URL: z.string().url().default(CANVA_AUTHORIZATION_URL),
  CANVA_TOKEN_URL: z.string().url().default(CANVA_TOKEN_URL),
  GATEWAY_HOST: z.string().min(1).default("127.0.0.1"),
  GATEWAY_PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  GATEWAY_API_KEY: optionalString,
  CREDENTIALS_FILE: optionalString,
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
});

export interface GatewayConfig {
  runtime: GatewayRuntimeConfig;
  host: string;
  port: number;
  apiKey?: string;
  credentialsFile?: string;
  logLevel: string;
}

/**
 * Read the process environment once. Missing required variables are reported
 * together; malformed values are reported with the variable that held them.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): GatewayConfig {
  const missing = REQUIRED_VARIABLES.filter((name) => !env[name] || env[name]?.trim() === "");
  if (missing.length > 0) {
    throw new ConfigError(`Missing required environment variables: ${missing.join(", ")}`);
  }

  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${problems.join("; ")}`);
  }

  const values = parsed.data;
  return {
    runtime: {
      clientId: values.CANVA_CLIENT_ID,
      clientSecret: values.CANVA_CLIENT_SECRET,
      redirectUri: values.CANVA_REDIRECT_URI,
      authorizationUrl: values.CANVA_AUTHORIZATION_URL,
      tokenUrl: values.CANVA_TOKEN_URL,
      apiBaseUrl: values.CANVA_API_BASE_URL.replace(/\/+$/, ""),
    },
    host: values.GATEWAY_HOST,
    port: values.GATEWAY_PORT,
    apiKey: values.GATEWAY_API_KEY,
    credentialsFile: values.CREDENTIALS_FILE,
    logLevel: values.LOG_LEVEL,
  };
}
