/**
 * Remediation endpoints: run an action on one port, or retry a failed
 * operation's port.
 */

import { Request, Response } from "express";
import { body, validationResult } from "express-validator";
import { isRemediationAction, REMEDIATION_ACTIONS } from "../models/operation";
import { Orchestrator } from "../services/orchestrator";
import { rejectInvalid, sendFailure } from "./respond";

const portRule = (field: string) =>
  body(field)
    .isInt({ min: 1, max: 65535 })
    .withMessage(`${field} must be an integer between 1 and 65535`)
    .toInt();

/**
 * POST /api/actions
 */
export const executeActionValidation = [
  portRule("port"),
  body("service")
    .isString()
    .trim()
    .notEmpty()
    .withMessage("service is required"),
  body("action")
    .isIn([...REMEDIATION_ACTIONS])
    .withMessage(`action must be one of ${REMEDIATION_ACTIONS.join(", ")}`),
  body("operation_id")
    .optional()
    .isString()
    .trim()
    .notEmpty()
    .withMessage("operation_id must be a non-empty string"),
];

/**
 * POST /api/rollback
 */
export const rollbackValidation = [
  body("operation_id")
    .isString()
    .trim()
    .notEmpty()
    .withMessage("operation_id is required"),
  portRule("port"),
];

export function createActionController(orchestrator: Orchestrator) {
  async function executeAction(req: Request, res: Response): Promise<void> {
    if (rejectInvalid(res, validationResult(req))) {
      return;
    }

    const { port, service, action, operation_id: parentId } = req.body;
    if (!isRemediationAction(action)) {
      res.status(400).json({ error: "Invalid action" });
      return;
    }

    try {
      const operationId = orchestrator.executeAction(
        Number(port),
        String(service),
        action,
        typeof parentId === "string" ? parentId : undefined,
      );
      res.status(202).json({
        operation_id: operationId,
        status: "started",
        message: `${action} started for port ${port}`,
        timestamp: new Date().toISOString(),
      });
    } catch (err) {
      sendFailure(res, err, "start remediation");
    }
  }

  async function rollback(req: Request, res: Response): Promise<void> {
    if (rejectInvalid(res, validationResult(req))) {
      return;
    }

    const { operation_id: operationId, port } = req.body;

    try {
      const rollbackId = orchestrator.rollback(String(operationId), Number(port));
      res.status(202).json({
        rollback_id: rollbackId,
        status: "started",
        message: `Rollback started for port ${port}`,
        timestamp: new Date().toISOString(),
      });
    } catch (err) {
      sendFailure(res, err, "start rollback");
    }
  }

  return { executeAction, rollback };
}
