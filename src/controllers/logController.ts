/**
 * Log endpoints over the in-process log buffer
 */

import { Request, Response } from "express";
import { query, validationResult } from "express-validator";
import {
  isLogLevel,
  LOG_LEVELS,
  LogEntry,
  LogFilter,
  LogStream,
} from "../services/logEvents";
import { logger } from "../services/logger";
import { rejectInvalid } from "./respond";
import { openEventStream } from "./sse";

export const MAX_RECENT_LOGS = 100;
const REPLAY_COUNT = 50;

export const logFilterValidation = [
  query("level")
    .optional()
    .customSanitizer((value: unknown) =>
      typeof value === "string" ? value.toUpperCase() : value,
    )
    .isIn([...LOG_LEVELS])
    .withMessage(`level must be one of ${LOG_LEVELS.join(", ")}`),
  query("operation_id")
    .optional()
    .isUUID()
    .withMessage("operation_id must be a UUID"),
];

export const recentLogsValidation = [
  query("count")
    .optional()
    .isInt({ min: 0 })
    .withMessage("count must be a non-negative integer")
    .toInt(),
  ...logFilterValidation,
];

function filterFrom(req: Request): LogFilter {
  const filter: LogFilter = {};
  if (isLogLevel(req.query.level)) {
    filter.minLevel = req.query.level;
  }
  if (typeof req.query.operation_id === "string") {
    filter.operationId = req.query.operation_id;
  }
  return filter;
}

export function createLogController(stream: LogStream) {
  // GET /api/logs/stream - SSE of log entries, replaying recent history first
  async function streamLogs(req: Request, res: Response): Promise<void> {
    if (rejectInvalid(res, validationResult(req))) {
      return;
    }
    const filter = filterFrom(req);
    const events = openEventStream(req, res, "Log");

    for (const entry of stream.getRecentLogs(REPLAY_COUNT, filter)) {
      events.send("log", entry);
    }

    const unsubscribe = stream.subscribe((entry: LogEntry) => {
      try {
        events.send("log", entry);
      } catch (err) {
        // Drop the subscription first so this entry is not written back here
        unsubscribe();
        logger.error("Error writing log SSE event", { error: err });
      }
    }, filter);
    events.onClose(unsubscribe);
  }

  // GET /api/logs/recent - Buffered entries (non-SSE)
  async function getRecentLogs(req: Request, res: Response): Promise<void> {
    if (rejectInvalid(res, validationResult(req))) {
      return;
    }
    const requested = Number(req.query.count ?? REPLAY_COUNT);
    const logs = stream.getRecentLogs(
      Math.min(requested, MAX_RECENT_LOGS),
      filterFrom(req),
    );
    res.json({ logs, count: logs.length });
  }

  return { streamLogs, getRecentLogs };
}
