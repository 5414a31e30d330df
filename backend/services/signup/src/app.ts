// backend/services/signup/src/app.ts
/**
 * Assembles the signup service on the shared builder:
 *   requestId → httpLogger → health (open) → /signup → 404 → error tail.
 *
 * Dependencies come in from the entrypoint (or tests); nothing here connects
 * to the database or reads config.
 */

import type { Express } from "express";
import { createServiceApp } from "@acct/shared/src/app/createServiceApp";
import type { ReadinessFn } from "@acct/shared/src/health";
import { signupRouter } from "./routes/signupRoutes";
import type { UserRegistrationService } from "./services/registrationService";

export const SERVICE_NAME = "signup" as const;

export type CreateSignupAppOptions = {
  users: UserRegistrationService;
  readiness?: ReadinessFn;
};

export function createSignupApp(opts: CreateSignupAppOptions): Express {
  return createServiceApp({
    serviceName: SERVICE_NAME,
    apiPrefix: "/",
    readiness: opts.readiness,
    mountRoutes: (api) => {
      api.use(signupRouter(opts.users));
    },
  });
}
