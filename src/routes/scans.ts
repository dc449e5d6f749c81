/**
 * Scan routes
 */

import { RequestHandler, Router } from "express";
import {
  createScanController,
  startScanValidation,
} from "../controllers/scanController";
import { Orchestrator } from "../services/orchestrator";

export function createScanRoutes(
  orchestrator: Orchestrator,
  guards: RequestHandler[],
): Router {
  const router = Router();
  const controller = createScanController(orchestrator);

  // POST /api/scans - Start a background scan (202 + operation id)
  router.post("/", ...guards, startScanValidation, controller.startScan);

  return router;
}
