// backend/services/shared/src/health.ts
/**
 * Why:
 * - Liveness and readiness are predictable across services and public.
 * - Liveness answers "is the process up?" (cheap, no dependencies).
 * - Readiness answers "can this instance take traffic?" (fast, bounded checks).
 *
 * Exposes:
 *   GET /health/live    -> liveness
 *   GET /health/ready   -> readiness (503 when the hook throws)
 */

import express, { type Request, type Response } from "express";

export type ReadinessDetails = Record<string, unknown>;
export type ReadinessFn = () => Promise<ReadinessDetails> | ReadinessDetails;

type Options = {
  service: string;
  env?: string;
  /** Optional, fast readiness checker. Keep bounded and dependency-aware. */
  readiness?: ReadinessFn;
};

function reqIdOf(req: Request): string | undefined {
  return typeof req.id === "string" ? req.id : undefined;
}

export function createHealthRouter(opts: Options): express.Router {
  const router = express.Router();

  const base = {
    service: opts.service,
    env: opts.env ?? process.env.NODE_ENV,
  };

  router.get("/health/live", (req: Request, res: Response) => {
    res.json({ ...base, ok: true, requestId: reqIdOf(req) });
  });

  router.get("/health/ready", async (req: Request, res: Response) => {
    try {
      const details = opts.readiness ? await opts.readiness() : {};
      res.json({ ...base, ok: true, requestId: reqIdOf(req), ...details });
    } catch (err) {
      res.status(503).json({
        ...base,
        ok: false,
        requestId: reqIdOf(req),
        error: err instanceof Error ? err.message : String(err),
      });
    }
  });

  return router;
}
