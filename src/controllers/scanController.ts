/**
 * Scan endpoints. A scan runs in the background; the response only
 * carries the operation id to poll or follow over SSE.
 */

import { Request, Response } from "express";
import { body, validationResult } from "express-validator";
import { Orchestrator } from "../services/orchestrator";
import { isValidTarget } from "../services/scan/scanDriver";
import { rejectInvalid, sendFailure } from "./respond";

export const DEFAULT_SCAN_TARGET = "127.0.0.1";

/**
 * POST /api/scans
 */
export const startScanValidation = [
  body("target")
    .optional()
    .isString()
    .trim()
    .custom((value: string) => isValidTarget(value))
    .withMessage("target must be a hostname or IP address"),
  body("automated_mode")
    .optional()
    .isBoolean()
    .withMessage("automated_mode must be a boolean")
    .toBoolean(),
];

export function createScanController(orchestrator: Orchestrator) {
  async function startScan(req: Request, res: Response): Promise<void> {
    if (rejectInvalid(res, validationResult(req))) {
      return;
    }

    const target: string =
      typeof req.body.target === "string" && req.body.target.length > 0
        ? req.body.target
        : DEFAULT_SCAN_TARGET;
    const automatedMode = req.body.automated_mode === true;

    try {
      const operationId = orchestrator.startScan(target, automatedMode);
      res.status(202).json({
        operation_id: operationId,
        status: "started",
        message: automatedMode
          ? `Automated scan started for ${target}`
          : `Scan started for ${target}`,
        timestamp: new Date().toISOString(),
      });
    } catch (err) {
      sendFailure(res, err, "start scan");
    }
  }

  return { startScan };
}
