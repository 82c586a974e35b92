#!/usr/bin/env node
import { logError, logInfo } from "./common";
import { loadGatewayConfig } from "./config";
import { createGatewayContext } from "./gateway";
import { startServer } from "./server/node_server";

async function main(): Promise<void> {
  const loaded = loadGatewayConfig();
  if (!loaded.ok) {
    logError(undefined, loaded.error);
    process.exitCode = 1;
    return;
  }
  const config = loaded.config;
  const ctx = createGatewayContext(config);
  const server = await startServer(ctx);
  logInfo(undefined, `Model mapping: ${JSON.stringify(config.modelMapping)}`);
  if (!config.apiKey) logInfo(undefined, "API_KEY not set, inbound auth disabled");

  let stopping = false;
  const shutdown = (signal: string) => {
    if (stopping) return;
    stopping = true;
    logInfo(undefined, `Received ${signal}, shutting down`);
    server.close().then(
      () => process.exit(0),
      (err: unknown) => {
        logError(undefined, "Shutdown failed", err instanceof Error ? err.message : String(err));
        process.exit(1);
      },
    );
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err: unknown) => {
  logError(undefined, "Fatal error", err instanceof Error ? err.stack : String(err));
  process.exit(1);
});
