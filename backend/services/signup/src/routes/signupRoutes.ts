// backend/services/signup/src/routes/signupRoutes.ts
import { Router, type Request, type Response } from "express";
import { asyncHandler } from "@acct/shared/src/middleware/asyncHandler";
import { jsonBody } from "@acct/shared/src/middleware/jsonBody";
import { writeError } from "@acct/shared/src/http/respond";
import { makeSignupHandler } from "../controllers/signup.controller";
import type { UserRegistrationService } from "../services/registrationService";

/** 1 MiB */
export const MAX_BODY_BYTES = 1 << 20;

function methodNotAllowed(_req: Request, res: Response): void {
  res.setHeader("Allow", "POST");
  writeError(res, 405, "method not allowed");
}

/**
 * Policy:
 * - POST /signup only; every other method is 405 before the body is read.
 * - Body framing (size cap, trailing data) is enforced by jsonBody().
 */
export function signupRouter(users: UserRegistrationService): Router {
  const router = Router();

  router
    .route("/signup")
    .post(
      jsonBody({ limit: MAX_BODY_BYTES }),
      asyncHandler(makeSignupHandler(users))
    )
    .all(methodNotAllowed);

  return router;
}
