// backend/services/shared/src/middleware/requestId.ts
/**
 * Why:
 * - Every inbound request carries a stable correlation key so that request
 *   logs and error logs for one call can be tied together.
 *
 * Notes:
 * - Must run before the http logger, otherwise log records lack the id.
 * - Never overwrites a caller-supplied id. Headers honored: `x-request-id`,
 *   `x-correlation-id`, `x-amzn-trace-id`; `x-request-id` is echoed back.
 */

import type { RequestHandler } from "express";
import { randomUUID } from "node:crypto";

const ID_HEADERS = ["x-request-id", "x-correlation-id", "x-amzn-trace-id"];

export function pickRequestId(
  headers: Record<string, string | string[] | undefined>
): string | undefined {
  for (const name of ID_HEADERS) {
    const v = headers[name];
    const first = Array.isArray(v) ? v[0] : v;
    if (first && first.trim()) return first.trim();
  }
  return undefined;
}

export function requestIdMiddleware(): RequestHandler {
  return (req, res, next) => {
    const id = pickRequestId(req.headers) ?? randomUUID();
    req.id = id;
    res.setHeader("x-request-id", id);
    next();
  };
}
