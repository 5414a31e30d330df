// backend/services/shared/src/app/createServiceApp.ts
/**
 * Why:
 * - One builder assembles the internal stack for every service:
 *   requestId → http logger → health (open) → routes → 404 → error tail.
 *
 * Notes:
 * - No app-wide body parsers. Routes mount `jsonBody()` themselves, after
 *   their method gate, so each route owns its framing limits.
 */

import express, { type Express } from "express";
import { requestIdMiddleware } from "../middleware/requestId";
import { makeHttpLogger } from "../middleware/httpLogger";
import { notFoundJson, errorJson } from "../middleware/errorJson";
import { createHealthRouter, type ReadinessFn } from "../health";

export type CreateServiceAppOptions = {
  /** Service slug (e.g., "signup"). Used in logs. */
  serviceName: string;
  /** API base path (e.g., "/" or "/api"). */
  apiPrefix: string;
  /** Mounts the service's routes onto the provided Router. */
  mountRoutes: (router: express.Router) => void;
  /** Health readiness hook (optional). */
  readiness?: ReadinessFn;
};

export function createServiceApp(opts: CreateServiceAppOptions): Express {
  const { serviceName, apiPrefix, mountRoutes, readiness } = opts;

  const app = express();
  app.disable("x-powered-by");

  // ── Transport & Telemetry ───────────────────────────────────────────────────
  app.use(requestIdMiddleware());
  app.use(makeHttpLogger(serviceName));

  // ── Health (public, no auth) ────────────────────────────────────────────────
  app.use(createHealthRouter({ service: serviceName, readiness }));

  // ── Routes ──────────────────────────────────────────────────────────────────
  const api = express.Router();
  mountRoutes(api);
  app.use(apiPrefix, api);

  // ── Tails: 404 + error formatter ────────────────────────────────────────────
  app.use(notFoundJson());
  app.use(errorJson());

  return app;
}
