/**
 * Response helpers shared by the routes and middleware
 */

import type { Response } from "express";
import type { ErrorResponse } from "@visit-counter/types";
import { errorMessage, SerializationError } from "./errors";
import type { Logger } from "./logger";

/**
 * Encode `data` as JSON and send it. Throws `SerializationError` before
 * anything is written when the value cannot be encoded, so the caller can
 * still answer with an error status.
 */
export function sendJson<T>(res: Response, data: T, status = 200): void {
  let body: string | undefined;
  try {
    body = JSON.stringify(data);
  } catch (err) {
    throw new SerializationError(`failed to encode response: ${errorMessage(err)}`, { cause: err });
  }
  if (body === undefined) {
    throw new SerializationError("failed to encode response: value has no JSON representation");
  }
  res.status(status).type("application/json").send(body);
}

/**
 * Send error response
 */
export function sendError(res: Response, status: number, message: string): void {
  const payload: ErrorResponse = { error: message };
  res.status(status).type("application/json").send(JSON.stringify(payload));
}

/**
 * `sendJson` with 200, falling back to a 500 `{"error"}` body when the
 * value cannot be encoded. Other errors propagate.
 */
export function sendJsonOrError<T>(res: Response, data: T, logger: Logger): void {
  try {
    sendJson(res, data);
  } catch (err) {
    if (!(err instanceof SerializationError)) throw err;
    logger.error({ err }, "Error encoding response");
    sendError(res, 500, "Failed to encode response");
  }
}
