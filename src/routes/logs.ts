/**
 * Log routes. Both accept `level` (minimum) and `operation_id` filters.
 */

import { Router } from "express";
import {
  createLogController,
  logFilterValidation,
  recentLogsValidation,
} from "../controllers/logController";
import { LogStream } from "../services/logEvents";

export function createLogRoutes(stream: LogStream): Router {
  const router = Router();
  const controller = createLogController(stream);

  router.get("/stream", logFilterValidation, controller.streamLogs);

  // count defaults to 50, capped at 100
  router.get("/recent", recentLogsValidation, controller.getRecentLogs);

  return router;
}
