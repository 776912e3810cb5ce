/**
 * Tags every request with an id that the error handler and route logs carry.
 *
 * A caller-supplied x-request-id is reused when it looks like an id; any other
 * value is replaced so it never reaches the logs.
 */
import { randomUUID } from "node:crypto";
import type { MiddlewareHandler } from "hono";
import { createLogger } from "../../logger.js";

const log = createLogger("middleware");

const REQUEST_ID_PATTERN = /^[\w.-]{1,64}$/;

export function resolveRequestId(header: string | undefined): string {
  return header !== undefined && REQUEST_ID_PATTERN.test(header)
    ? header
    : randomUUID();
}

export const requestIdMiddleware: MiddlewareHandler = async (c, next) => {
  const requestId = resolveRequestId(c.req.header("x-request-id"));

  c.set("requestId", requestId);
  c.header("x-request-id", requestId);

  const start = Date.now();
  await next();

  // /api/events stays open; only its setup time is measured here.
  log.debug(
    {
      requestId,
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Date.now() - start,
    },
    `${c.req.method} ${c.req.path} → ${c.res.status}`,
  );
};

declare module "hono" {
  interface ContextVariableMap {
    requestId: string;
  }
}
