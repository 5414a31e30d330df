// backend/services/signup/src/config.ts

/**
 * - No dotenv loading here (bootstrap.ts loads env).
 * - Fail fast when a required var is missing or invalid.
 * - Read lazily so tests can import the app without a full env.
 */

import { requireEnv, requireNumber } from "@acct/shared/src/env";

export type SignupConfig = {
  env: string | undefined;
  host: string;
  port: number;
  mongoUri: string;
  logLevel: string;
};

export function loadConfig(): SignupConfig {
  return {
    // pass-through (optional)
    env: process.env.NODE_ENV,
    host: process.env.SIGNUP_HOST?.trim() || "0.0.0.0",

    // required
    port: requireNumber("SIGNUP_PORT"),
    mongoUri: requireEnv("SIGNUP_MONGO_URI"),
    logLevel: requireEnv("LOG_LEVEL"),
  };
}
