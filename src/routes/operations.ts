/**
 * Operation ledger routes
 */

import { RequestHandler, Router } from "express";
import {
  createOperationController,
  listOperationsValidation,
} from "../controllers/operationController";
import { OperationRegistry } from "../services/operationRegistry";

export function createOperationRoutes(
  registry: OperationRegistry,
  guards: RequestHandler[],
): Router {
  const router = Router();
  const controller = createOperationController(registry);

  // GET /api/operations - All operations, optionally by kind and status
  router.get("/", listOperationsValidation, controller.listOperations);

  // GET /api/operations/:id - One operation
  router.get("/:id", controller.getOperation);

  // DELETE /api/operations/:id - Drop an operation from the ledger
  router.delete("/:id", ...guards, controller.deleteOperation);

  return router;
}
