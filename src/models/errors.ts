/**
 * Error types raised by the operation ledger and orchestrator.
 *
 * Tactic and scan failures are not here: they travel as values
 * (TacticResult, ScanOutcome) and end up in an operation's message.
 */

export const ErrorCode = {
  OPERATION_NOT_FOUND: "OPERATION_NOT_FOUND",
  INVALID_TRANSITION: "INVALID_TRANSITION",
  INVALID_CATALOG: "INVALID_CATALOG",
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

export class PortWardenError extends Error {
  public readonly status: number;
  public readonly code: ErrorCodeType;

  constructor(status: number, code: ErrorCodeType, message: string) {
    super(message);
    this.name = "PortWardenError";
    this.status = status;
    this.code = code;
  }

  toJSON() {
    return { error: this.message, code: this.code };
  }
}

export class OperationNotFoundError extends PortWardenError {
  constructor(public readonly operationId: string) {
    super(404, ErrorCode.OPERATION_NOT_FOUND, "Operation not found");
    this.name = "OperationNotFoundError";
  }
}

export class InvalidTransitionError extends PortWardenError {
  constructor(message: string) {
    super(409, ErrorCode.INVALID_TRANSITION, message);
    this.name = "InvalidTransitionError";
  }
}

export class CatalogError extends PortWardenError {
  constructor(message: string) {
    super(500, ErrorCode.INVALID_CATALOG, message);
    this.name = "CatalogError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
