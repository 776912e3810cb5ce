/**
 * Global Hono error handler for the relay's HTTP surface.
 *
 * HTTPExceptions keep their status; anything else is a 500. The body always
 * names the service and the request so a display client can report it.
 */
import type { ErrorHandler } from "hono";
import { HTTPException } from "hono/http-exception";
import { config } from "../config.js";
import { createLogger, logOperationFailed } from "../logger.js";

const log = createLogger("api");

export type ErrorBody = Readonly<{
  error: string;
  service: string;
  requestId: string;
}>;

export const errorHandler: ErrorHandler = (err, c) => {
  const requestId = c.get("requestId") ?? "unknown";
  const context = { requestId, method: c.req.method, path: c.req.path };

  if (err instanceof HTTPException) {
    log.warn({ ...context, status: err.status }, err.message);

    const body: ErrorBody = {
      error: err.message,
      service: config.APP_NAME,
      requestId,
    };
    return c.json(body, err.status);
  }

  logOperationFailed(log, "request", err, { ...context, stack: err.stack });

  const body: ErrorBody = {
    error:
      config.NODE_ENV === "production" ? "Internal server error" : err.message,
    service: config.APP_NAME,
    requestId,
  };
  return c.json(body, 500);
};
