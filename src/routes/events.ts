import { Router } from "express";
import { createEventsController } from "../controllers/eventsController";
import { ProgressBroadcaster } from "../services/progressBroadcaster";

export function createEventRoutes(broadcaster: ProgressBroadcaster): Router {
  const router = Router();
  const controller = createEventsController(broadcaster);

  // GET /api/events - SSE stream of progress events
  router.get("/", controller.streamEvents);

  return router;
}
