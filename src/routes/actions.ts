/**
 * Remediation routes
 */

import { RequestHandler, Router } from "express";
import {
  createActionController,
  executeActionValidation,
  rollbackValidation,
} from "../controllers/actionController";
import { Orchestrator } from "../services/orchestrator";

export function createActionRoutes(
  orchestrator: Orchestrator,
  guards: RequestHandler[],
): Router {
  const router = Router();
  const controller = createActionController(orchestrator);

  // POST /api/actions - Update, close or auto-remediate one port
  router.post(
    "/actions",
    ...guards,
    executeActionValidation,
    controller.executeAction,
  );

  // POST /api/rollback - Retry a failed operation's port with "auto"
  router.post("/rollback", ...guards, rollbackValidation, controller.rollback);

  return router;
}
