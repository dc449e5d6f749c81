/**
 * SSE stream of operation progress
 * GET /api/events
 */

import { Request, Response } from "express";
import {
  ProgressBroadcaster,
  ProgressEvent,
} from "../services/progressBroadcaster";
import { openEventStream } from "./sse";

export function createEventsController(broadcaster: ProgressBroadcaster) {
  async function streamEvents(req: Request, res: Response): Promise<void> {
    const stream = openEventStream(req, res, "Progress");

    // A write that throws drops this observer from the broadcaster
    const handle = broadcaster.subscribe((event: ProgressEvent) => {
      stream.send(event.type, event);
    });
    stream.onClose(() => handle.unsubscribe());
  }

  return { streamEvents };
}
