// backend/services/shared/src/utils/logger.ts
/**
 * Shared Logger (authoritative)
 *
 * Each service MUST call `initLogger(SERVICE_NAME)` at bootstrap BEFORE
 * creating any request loggers (e.g., pino-http).
 *
 * Usage:
 *   import { initLogger } from "@acct/shared/src/utils/logger";
 *   initLogger("signup");
 */

import type { Request } from "express";
import pino, {
  type Logger,
  type LoggerOptions,
  type LevelWithSilent,
  stdTimeFunctions,
} from "pino";

function requireEnv(name: string): string {
  const v = process.env[name];
  if (!v || v.trim() === "")
    throw new Error(`Missing required env var: ${name}`);
  return v.trim();
}

const validLevels: ReadonlySet<string> = new Set<LevelWithSilent>([
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
]);

function isLevel(v: string): v is LevelWithSilent {
  return validLevels.has(v);
}

const LOG_LEVEL = requireEnv("LOG_LEVEL");
if (!isLevel(LOG_LEVEL)) throw new Error(`Invalid LOG_LEVEL: "${LOG_LEVEL}"`);

// NOTE: no base.service until initLogger() runs; avoids "service":"unknown".
let SERVICE_NAME = "";

const pinoOptions: LoggerOptions = {
  level: LOG_LEVEL,
  base: {},
  timestamp: stdTimeFunctions.isoTime,
  redact: {
    paths: [
      "password",
      "*.password",
      "req.headers.authorization",
      "req.headers.cookie",
    ],
    censor: "[REDACTED]",
  },
};

export let logger: Logger = pino(pinoOptions);

/** Initialize the shared logger for this running service. Call once at bootstrap. */
export function initLogger(serviceName: string): void {
  SERVICE_NAME = String(serviceName || "").trim();
  if (!SERVICE_NAME) throw new Error("initLogger requires serviceName");
  logger = pino({ ...pinoOptions, base: { service: SERVICE_NAME } });
}

export type LogContext = {
  requestId: string | null;
  path: string;
  method: string;
  ip: string | undefined;
  service: string | undefined;
};

export function extractLogContext(req: Request): LogContext {
  const hdr = req.headers["x-request-id"] ?? req.headers["x-correlation-id"];
  const hdrId = Array.isArray(hdr) ? hdr[0] : hdr;
  return {
    requestId: (req.id !== undefined ? String(req.id) : hdrId) ?? null,
    path: req.originalUrl,
    method: req.method,
    ip: req.ip,
    service: SERVICE_NAME || undefined,
  };
}
