import { Router } from "express";
import {
  createSystemController,
  SystemInfo,
} from "../controllers/systemController";

export function createSystemRoutes(info: SystemInfo): Router {
  const router = Router();
  const controller = createSystemController(info);

  // GET /system/status - Privileges, platform and firewall state
  router.get("/status", controller.getSystemStatus);

  return router;
}
