// backend/services/signup/src/controllers/signup.controller.ts
/**
 * POST /signup
 *
 * Flow: schema → normalize → validate → register → respond.
 *
 * Responses:
 * - 201 { message: "account created" }
 * - 400 { error: "invalid request body" | <validation message> }
 * - 409 { error: "account exists, please sign in" }
 * - 500 { error: "signup unavailable" }  (cause logged, never sent)
 */

import type { Request, Response } from "express";
import { writeError, writeJSON } from "@acct/shared/src/http/respond";
import { requestSignal } from "@acct/shared/src/util/deadline";
import {
  normalizeSignUpRequest,
  toSignUpRequest,
  zSignUpBody,
} from "../contracts/signup.contract";
import { validateSignUpRequest } from "../validators/signup.validate";
import { AccountExistsError } from "../services/registration.errors";
import type { UserRegistrationService } from "../services/registrationService";

export function makeSignupHandler(users: UserRegistrationService) {
  return async function signup(req: Request, res: Response): Promise<void> {
    const parsed = zSignUpBody.safeParse(req.body);
    if (!parsed.success) {
      writeError(res, 400, "invalid request body");
      return;
    }

    const payload = toSignUpRequest(parsed.data);
    normalizeSignUpRequest(payload);

    const invalid = validateSignUpRequest(payload);
    if (invalid) {
      writeError(res, 400, invalid.message);
      return;
    }

    try {
      await users.registerUser(requestSignal(res), payload);
    } catch (err) {
      if (err instanceof AccountExistsError) {
        writeError(res, 409, "account exists, please sign in");
        return;
      }
      req.log.error(
        { err, username: payload.username },
        "[signup] registration failed"
      );
      writeError(res, 500, "signup unavailable");
      return;
    }

    req.log.info({ username: payload.username }, "[signup] account created");
    writeJSON(res, 201, { message: "account created" });
  };
}
