/**
 * Express application wiring. Everything the routes need is passed in, so
 * tests can build an app around fakes.
 */

import express from "express";
import cors from "cors";
import rateLimit from "express-rate-limit";
import { SystemInfo } from "./controllers/systemController";
import { requireApiKey } from "./middleware/apiKey";
import { PortWardenError } from "./models/errors";
import { createActionRoutes } from "./routes/actions";
import { createEventRoutes } from "./routes/events";
import { createLogRoutes } from "./routes/logs";
import { createOperationRoutes } from "./routes/operations";
import { createScanRoutes } from "./routes/scans";
import { createSystemRoutes } from "./routes/system";
import { LogStream, logEvents } from "./services/logEvents";
import { logger } from "./services/logger";
import { OperationRegistry } from "./services/operationRegistry";
import { Orchestrator } from "./services/orchestrator";
import { ProgressBroadcaster } from "./services/progressBroadcaster";

export const SERVICE_NAME = "port-warden";
export const SERVICE_VERSION = "1.0.0";

export interface AppDeps {
  orchestrator: Orchestrator;
  registry: OperationRegistry;
  broadcaster: ProgressBroadcaster;
  system: SystemInfo;
  logStream?: LogStream;
  apiKey: string;
  corsOrigin: string[];
  rateLimitPerMinute: number;
}

export function createApp(deps: AppDeps): express.Express {
  const app = express();

  // Middleware
  app.use(cors({ origin: deps.corsOrigin }));
  app.use(express.json());

  // Remediation runs commands on the host: cap how fast it can be triggered
  const actionLimiter = rateLimit({
    windowMs: 60 * 1000, // 1 minute
    max: deps.rateLimitPerMinute,
    message: { error: "Too many requests. Please try again later." },
    standardHeaders: true,
    legacyHeaders: false,
  });
  const apiKey = requireApiKey(deps.apiKey);

  app.get("/", (req, res) => {
    res.json({ name: SERVICE_NAME, version: SERVICE_VERSION });
  });

  app.get("/health", (req, res) => {
    res.json({ status: "healthy", timestamp: new Date().toISOString() });
  });

  app.use("/system", createSystemRoutes(deps.system));

  // API routes
  app.use(
    "/api/scans",
    createScanRoutes(deps.orchestrator, [apiKey, actionLimiter]),
  );
  app.use("/api", createActionRoutes(deps.orchestrator, [apiKey, actionLimiter]));
  app.use("/api/operations", createOperationRoutes(deps.registry, [apiKey]));
  app.use("/api/events", createEventRoutes(deps.broadcaster));
  app.use("/api/logs", createLogRoutes(deps.logStream ?? logEvents));

  app.use((req, res) => {
    res.status(404).json({ error: "Not found" });
  });

  // Error handler
  app.use(
    (
      err: Error,
      req: express.Request,
      res: express.Response,
      _next: express.NextFunction,
    ) => {
      if (err instanceof PortWardenError) {
        res.status(err.status).json(err.toJSON());
        return;
      }
      if (err instanceof SyntaxError) {
        res.status(400).json({ error: "Malformed JSON body" });
        return;
      }
      logger.error("Unhandled error", { error: err.message, stack: err.stack });
      res.status(500).json({ error: "Internal server error" });
    },
  );

  return app;
}
