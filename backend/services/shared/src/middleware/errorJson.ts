// backend/services/shared/src/middleware/errorJson.ts
/**
 * Why:
 * - Every error response uses the same `{ "error": "<message>" }` body so
 *   clients and tests can rely on one shape.
 * - Only HttpError messages reach the client. Anything else is logged with
 *   its request context and rendered as a generic 500.
 */

import type {
  ErrorRequestHandler,
  Request,
  RequestHandler,
  Response,
} from "express";
import { HttpError } from "../http/HttpError";
import { writeError } from "../http/respond";
import { extractLogContext, logger } from "../utils/logger";

export function notFoundJson(): RequestHandler {
  return (_req: Request, res: Response) => {
    writeError(res, 404, "not found");
  };
}

export function errorJson(): ErrorRequestHandler {
  return (err: unknown, req, res, next) => {
    if (res.headersSent) {
      next(err);
      return;
    }

    if (err instanceof HttpError) {
      writeError(res, err.status, err.message);
      return;
    }

    (req.log ?? logger).error(
      { err, ...extractLogContext(req) },
      "unhandled request error"
    );
    writeError(res, 500, "internal error");
  };
}
