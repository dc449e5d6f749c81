/**
 * Progress broadcaster: fans operation updates out to live observers
 * (SSE clients, the CLI). In-process only; a subscriber that joins late
 * gets no replay and should read the registry instead.
 */

import { v4 as uuidv4 } from "uuid";
import { errorMessage } from "../models/errors";
import {
  OperationKind,
  OperationResult,
  OperationStatus,
} from "../models/operation";
import { logger } from "./logger";

export type ProgressEventType =
  | "scan_update"
  | "scan_complete"
  | "action_update"
  | "action_complete";

export interface ProgressEvent {
  type: ProgressEventType;
  operation_id: string;
  kind: OperationKind;
  status: OperationStatus;
  progress: number;
  message: string;
  timestamp: string;
  result?: OperationResult;
  success?: boolean;
}

export type ProgressObserver = (event: ProgressEvent) => void;

export interface ObserverHandle {
  id: string;
  unsubscribe(): void;
}

export class ProgressBroadcaster {
  // Map iteration follows insertion order, which is subscription order
  private readonly observers = new Map<string, ProgressObserver>();

  subscribe(observer: ProgressObserver): ObserverHandle {
    const id = uuidv4();
    this.observers.set(id, observer);
    logger.debug("Progress subscriber added", { id });
    return {
      id,
      unsubscribe: () => this.unsubscribe(id),
    };
  }

  unsubscribe(handle: ObserverHandle | string): boolean {
    const id = typeof handle === "string" ? handle : handle.id;
    const removed = this.observers.delete(id);
    if (removed) {
      logger.debug("Progress subscriber removed", { id });
    }
    return removed;
  }

  publish(event: ProgressEvent): void {
    for (const [id, observer] of [...this.observers]) {
      try {
        observer(event);
      } catch (err) {
        this.observers.delete(id);
        logger.warn("Dropping progress subscriber after delivery error", {
          id,
          error: errorMessage(err),
        });
      }
    }
  }

  subscriberCount(): number {
    return this.observers.size;
  }
}
