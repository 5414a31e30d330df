// backend/services/shared/src/middleware/httpLogger.ts
/**
 * Why:
 * - Consistent, structured request logs across services so ops can aggregate
 *   by `service` and correlate by `reqId` end-to-end.
 * - Telemetry only. It never blocks a request.
 *
 * Order:
 * - Mount immediately after `requestIdMiddleware` so `req.id` is populated.
 *
 * Notes:
 * - Severity mapping: 2xx/3xx=info, 4xx=warn, 5xx/error=error.
 * - Health probes and favicons are not logged.
 */

import pinoHttp from "pino-http";
import { randomUUID } from "node:crypto";
import type { IncomingMessage, ServerResponse } from "node:http";
import { logger as rootLogger } from "../utils/logger";
import { pickRequestId } from "./requestId";

const QUIET_URLS = new Set([
  "/health/live",
  "/health/ready",
  "/favicon.ico",
]);

export function makeHttpLogger(serviceName: string) {
  const logger = rootLogger.child({ service: serviceName });

  return pinoHttp({
    logger,

    // Reuse the id minted by requestIdMiddleware; mint only when run standalone.
    genReqId: (req: IncomingMessage, res: ServerResponse) => {
      if (typeof req.id === "string" && req.id) return req.id;
      const id = pickRequestId(req.headers) ?? randomUUID();
      res.setHeader("x-request-id", id);
      return id;
    },

    customLogLevel: (
      _req: IncomingMessage,
      res: ServerResponse,
      err?: Error
    ) => {
      if (err) return "error";
      if (res.statusCode >= 500) return "error";
      if (res.statusCode >= 400) return "warn";
      return "info";
    },

    customProps: (req: IncomingMessage) => ({
      service: serviceName,
      reqId: req.id,
    }),

    autoLogging: {
      ignore: (req: IncomingMessage) => QUIET_URLS.has(req.url ?? ""),
    },

    serializers: {
      req(req: { id: unknown; method: string; url: string }) {
        return { id: req.id, method: req.method, url: req.url };
      },
      res(res: { statusCode: number }) {
        return { statusCode: res.statusCode };
      },
      err(err: Error) {
        return { type: err.name, msg: err.message };
      },
    },
  });
}
