// backend/services/signup/src/bootstrap.ts
/**
 * Side-effect module: load envs via the shared cascade (repo → service,
 * later wins) and assert the minimum required variables.
 * Import FIRST in the entrypoint, before anything that reads process.env.
 */

import path from "node:path";
import { loadEnvCascade, assertEnv } from "@acct/shared/src/env";

const SERVICE_DIR = path.resolve(__dirname, "..");

export const loadedEnvFiles = loadEnvCascade(SERVICE_DIR);

assertEnv(["LOG_LEVEL", "SIGNUP_MONGO_URI", "SIGNUP_PORT"]);
