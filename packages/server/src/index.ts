#!/usr/bin/env tsx
import {
  createGatewayRuntime,
  createLogger,
  persistCredentials,
  readCredentialFile,
} from "@design-gateway/shared";
import { loadConfig } from "./config";
import { createServer, VERSION } from "./server";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel });

  const initialCredential = config.credentialsFile ? await readCredentialFile(config.credentialsFile) : null;
  const runtime = createGatewayRuntime(config.runtime, { initialCredential, logger });
  const stopPersisting = config.credentialsFile
    ? persistCredentials(runtime.store, config.credentialsFile, logger)
    : () => undefined;

  const app = createServer(runtime, { apiKey: config.apiKey, logger });

  let closing = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (closing) return;
    closing = true;
    logger.info({ signal }, "Shutting down");
    stopPersisting();
    app.close().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error({ err: error }, "Error while closing server");
        process.exit(1);
      }
    );
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);

  await app.listen({ host: config.host, port: config.port });
  logger.info(
    {
      version: VERSION,
      apiBaseUrl: config.runtime.apiBaseUrl,
      authenticated: initialCredential !== null,
      apiKeyRequired: Boolean(config.apiKey),
    },
    "Design gateway started"
  );
}

main().catch((error: unknown) => {
  // The logger may not exist yet when configuration is invalid
  console.error(error instanceof Error ? error.message : error);
  process.exit(1);
});
