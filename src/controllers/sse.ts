/**
 * Shared plumbing for the SSE endpoints: headers, the opening "connected"
 * event, a heartbeat, and teardown when the client goes away.
 */

import { Request, Response } from "express";
import { logger } from "../services/logger";

export const HEARTBEAT_INTERVAL = 15000; // 15 seconds

export interface EventStream {
  send(event: string, data: unknown): void;
  /** Runs once, on disconnect or connection error */
  onClose(cleanup: () => void): void;
}

export function formatEvent(event: string, data: unknown): string {
  return `event: ${event}\ndata: ${JSON.stringify(data)}\n\n`;
}

export function openEventStream(
  req: Request,
  res: Response,
  label: string,
): EventStream {
  res.setHeader("Content-Type", "text/event-stream");
  res.setHeader("Cache-Control", "no-cache");
  res.setHeader("Connection", "keep-alive");
  res.setHeader("X-Accel-Buffering", "no"); // Disable nginx buffering
  res.flushHeaders();

  logger.info(`${label} SSE client connected`, {
    ip: req.ip,
    userAgent: req.get("User-Agent"),
  });

  const send = (event: string, data: unknown): void => {
    res.write(formatEvent(event, data));
  };
  send("connected", { timestamp: new Date().toISOString() });

  const cleanups: Array<() => void> = [];
  let closed = false;

  const heartbeatInterval = setInterval(() => {
    try {
      send("heartbeat", { timestamp: new Date().toISOString() });
    } catch (err) {
      logger.error("Error writing heartbeat", { error: err });
      clearInterval(heartbeatInterval);
    }
  }, HEARTBEAT_INTERVAL);

  const close = (): void => {
    if (closed) {
      return;
    }
    closed = true;
    clearInterval(heartbeatInterval);
    for (const cleanup of cleanups) {
      cleanup();
    }
  };

  req.on("close", () => {
    logger.info(`${label} SSE client disconnected`);
    close();
  });

  req.on("error", (err) => {
    logger.error(`${label} SSE connection error`, { error: err.message });
    close();
  });

  return {
    send,
    onClose(cleanup) {
      cleanups.push(cleanup);
    },
  };
}
