// backend/services/shared/src/middleware/jsonBody.ts
/**
 * Route-level JSON body reader.
 *
 * - Parses every content type as JSON (strict: top level must be object/array).
 * - Empty body, body over `limit`, malformed JSON, or an unreadable stream
 *   → HttpError(400, "invalid request body").
 * - A valid value followed by more data → HttpError(400, "unexpected trailing data").
 *
 * Mounted per route (after the method gate) instead of app-wide, so a wrong
 * method is answered before any body is read.
 */

import express, { type RequestHandler } from "express";
import { HttpError } from "../http/HttpError";
import { hasTrailingData } from "../http/jsonFraming";

export type JsonBodyOptions = {
  /** Byte cap in body-parser notation, e.g. "1mb" (1 MiB). */
  limit: string | number;
};

type BodyParserError = Error & { type: string; body?: unknown };

function isBodyParserError(err: unknown): err is BodyParserError {
  return (
    err instanceof Error &&
    "type" in err &&
    typeof err.type === "string"
  );
}

export function toBodyHttpError(err: unknown): HttpError {
  if (
    isBodyParserError(err) &&
    err.type === "entity.parse.failed" &&
    typeof err.body === "string" &&
    hasTrailingData(err.body)
  ) {
    return new HttpError(400, "unexpected trailing data", { cause: err });
  }
  return new HttpError(400, "invalid request body", { cause: err });
}

export function jsonBody(opts: JsonBodyOptions): RequestHandler {
  // body-parser turns an empty body into {}; track which requests had bytes
  const nonEmpty = new WeakSet<object>();
  const parse = express.json({
    limit: opts.limit,
    strict: true,
    type: () => true,
    verify: (req, _res, buf) => {
      if (buf.length > 0) nonEmpty.add(req);
    },
  });

  return (req, res, next) => {
    parse(req, res, (err?: unknown) => {
      if (err) {
        next(toBodyHttpError(err));
        return;
      }
      if (!nonEmpty.has(req)) {
        next(new HttpError(400, "invalid request body"));
        return;
      }
      next();
    });
  };
}
