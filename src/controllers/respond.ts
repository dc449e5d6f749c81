import { Response } from "express";
import { Result, ValidationError } from "express-validator";
import { errorMessage, PortWardenError } from "../models/errors";
import { logger } from "../services/logger";

/**
 * Answer 400 with the validator's errors. Returns true when it did.
 */
export function rejectInvalid(
  res: Response,
  errors: Result<ValidationError>,
): boolean {
  if (errors.isEmpty()) {
    return false;
  }
  res.status(400).json({ errors: errors.array() });
  return true;
}

/**
 * Domain errors carry their own status; anything else is a 500
 */
export function sendFailure(res: Response, err: unknown, action: string): void {
  if (err instanceof PortWardenError) {
    res.status(err.status).json(err.toJSON());
    return;
  }
  logger.error(`Failed to ${action}`, { error: errorMessage(err) });
  res.status(500).json({ error: `Failed to ${action}` });
}
