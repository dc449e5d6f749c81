/**
 * Operation ledger endpoints
 */

import { Request, Response } from "express";
import { query, validationResult } from "express-validator";
import {
  isOperationKind,
  isOperationStatus,
  OPERATION_KINDS,
  OPERATION_STATUSES,
} from "../models/operation";
import { logger } from "../services/logger";
import { OperationFilter, OperationRegistry } from "../services/operationRegistry";
import { rejectInvalid, sendFailure } from "./respond";

export const listOperationsValidation = [
  query("kind")
    .optional()
    .isIn([...OPERATION_KINDS])
    .withMessage(`kind must be one of ${OPERATION_KINDS.join(", ")}`),
  query("status")
    .optional()
    .isIn([...OPERATION_STATUSES])
    .withMessage(`status must be one of ${OPERATION_STATUSES.join(", ")}`),
];

export function createOperationController(registry: OperationRegistry) {
  /**
   * GET /api/operations
   */
  async function listOperations(req: Request, res: Response): Promise<void> {
    if (rejectInvalid(res, validationResult(req))) {
      return;
    }

    const filter: OperationFilter = {};
    if (isOperationKind(req.query.kind)) {
      filter.kind = req.query.kind;
    }
    if (isOperationStatus(req.query.status)) {
      filter.status = req.query.status;
    }

    try {
      res.json({ operations: registry.list(filter) });
    } catch (err) {
      sendFailure(res, err, "list operations");
    }
  }

  /**
   * GET /api/operations/:id
   * Any id the registry does not hold, well-formed or not, is a 404
   */
  async function getOperation(req: Request, res: Response): Promise<void> {
    const operation = registry.get(req.params.id);
    if (!operation) {
      res.status(404).json({ error: "Operation not found" });
      return;
    }
    res.json(operation);
  }

  /**
   * DELETE /api/operations/:id
   */
  async function deleteOperation(req: Request, res: Response): Promise<void> {
    if (!registry.delete(req.params.id)) {
      res.status(404).json({ error: "Operation not found" });
      return;
    }
    logger.info("Operation deleted", { operationId: req.params.id });
    res.json({ message: "Operation deleted" });
  }

  return { listOperations, getOperation, deleteOperation };
}
