import { Server } from "http";
import { createApp } from "./app";
import { buildServices, Services } from "./bootstrap";
import { config } from "./config";
import { logger } from "./services/logger";

let server: Server | undefined;
let services: Services | undefined;

// Startup
async function start(): Promise<void> {
  try {
    services = await buildServices(config);

    const app = createApp({
      orchestrator: services.orchestrator,
      registry: services.registry,
      broadcaster: services.broadcaster,
      system: {
        platform: services.platform,
        elevated: services.elevated,
        runner: services.runner,
      },
      apiKey: config.auth.apiKey,
      corsOrigin: config.cors.origin,
      rateLimitPerMinute: config.remediation.rateLimitPerMinute,
    });

    if (!services.elevated) {
      logger.warn(
        "Not running with administrator/root privileges; some remediation tactics will be skipped",
      );
    }

    server = app.listen(config.server.port, config.server.host, () => {
      logger.info(
        `Port Warden listening on ${config.server.host}:${config.server.port}`,
      );
    });
  } catch (error) {
    logger.error("Failed to start server", {
      error: error instanceof Error ? error.message : String(error),
    });
    process.exit(1);
  }
}

// Graceful shutdown
async function shutdown(signal: string): Promise<void> {
  logger.info(`Received ${signal}, shutting down gracefully`);
  const current = server;
  if (current) {
    const closed = new Promise<void>((resolve) => current.close(() => resolve()));
    // Open SSE streams would otherwise hold close() forever
    current.closeAllConnections();
    await closed;
  }
  if (services) {
    await services.binder.releaseAll();
  }
  process.exit(0);
}

process.on("SIGTERM", () => {
  void shutdown("SIGTERM");
});

process.on("SIGINT", () => {
  void shutdown("SIGINT");
});

void start();
