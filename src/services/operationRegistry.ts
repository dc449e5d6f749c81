/**
 * Operation registry: the in-memory ledger of scans, actions and
 * rollbacks. One instance per app, injected wherever it is needed.
 *
 * Node runs handlers on a single thread, so each method below completes
 * without interleaving; concurrent tasks touching different ids never
 * observe each other's half-written records.
 */

import { v4 as uuidv4 } from "uuid";
import {
  InvalidTransitionError,
  OperationNotFoundError,
} from "../models/errors";
import {
  canTransition,
  Operation,
  OperationContext,
  OperationKind,
  OperationStatus,
  OperationUpdate,
} from "../models/operation";
import { logger } from "./logger";

export interface OperationFilter {
  kind?: OperationKind;
  status?: OperationStatus;
}

function snapshot(operation: Operation): Operation {
  return structuredClone(operation);
}

export class OperationRegistry {
  private readonly operations = new Map<string, Operation>();

  create(context: OperationContext): Operation {
    const now = new Date().toISOString();
    const operation: Operation = {
      id: uuidv4(),
      kind: context.kind,
      status: "pending",
      progress: 0,
      message: "Queued",
      context,
      created_at: now,
      updated_at: now,
    };
    this.operations.set(operation.id, operation);
    logger.debug("Operation created", { id: operation.id, kind: operation.kind });
    return snapshot(operation);
  }

  update(id: string, change: OperationUpdate): Operation {
    const current = this.operations.get(id);
    if (!current) {
      throw new OperationNotFoundError(id);
    }
    if (!canTransition(current.status, change.status)) {
      throw new InvalidTransitionError(
        `Cannot move operation ${id} from ${current.status} to ${change.status}`,
      );
    }

    const next: Operation = {
      ...current,
      status: change.status,
      progress: Math.min(100, Math.max(current.progress, change.progress)),
      message: change.message,
      result: change.result ?? current.result,
      success: change.success ?? current.success,
      updated_at: new Date().toISOString(),
    };
    this.operations.set(id, next);
    return snapshot(next);
  }

  get(id: string): Operation | undefined {
    const operation = this.operations.get(id);
    return operation ? snapshot(operation) : undefined;
  }

  require(id: string): Operation {
    const operation = this.get(id);
    if (!operation) {
      throw new OperationNotFoundError(id);
    }
    return operation;
  }

  list(filter: OperationFilter = {}): Record<string, Operation> {
    const out: Record<string, Operation> = {};
    for (const [id, operation] of this.operations) {
      if (filter.kind && operation.kind !== filter.kind) continue;
      if (filter.status && operation.status !== filter.status) continue;
      out[id] = snapshot(operation);
    }
    return out;
  }

  delete(id: string): boolean {
    const removed = this.operations.delete(id);
    if (removed) {
      logger.debug("Operation deleted", { id });
    }
    return removed;
  }

  get size(): number {
    return this.operations.size;
  }
}
