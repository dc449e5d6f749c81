/**
 * Shared-secret check for the routes that start work on the host.
 * An empty key turns the check off (local use).
 */

import crypto from "crypto";
import { NextFunction, Request, Response, RequestHandler } from "express";
import { logger } from "../services/logger";

export const API_KEY_HEADER = "x-api-key";

export function requireApiKey(apiKey: string): RequestHandler {
  const expected = Buffer.from(apiKey);

  return (req: Request, res: Response, next: NextFunction): void => {
    if (apiKey.length === 0) {
      next();
      return;
    }

    const provided = Buffer.from(req.get(API_KEY_HEADER) ?? "");
    if (
      provided.length !== expected.length ||
      !crypto.timingSafeEqual(provided, expected)
    ) {
      logger.warn("Rejected request with invalid API key", {
        path: req.path,
        ip: req.ip,
      });
      res.status(401).json({ error: "Invalid or missing API key" });
      return;
    }

    next();
  };
}
