// backend/services/signup/src/contracts/signup.contract.ts
/**
 * Purpose:
 * - Wire contract for POST /signup and its canonical in-process form.
 *
 * Notes:
 * - The wire schema is strict: unknown keys are a framing error (400
 *   "invalid request body"), not a validation message.
 * - Empty strings stand for absent optional fields after mapping; a JSON
 *   null string field counts as absent. A null password is still rejected.
 */

import { z } from "zod";
import { Secret } from "@acct/shared/src/security/Secret";

export const zSecret = z.unknown().transform((value, ctx) => {
  try {
    return Secret.fromJSON(value);
  } catch (err) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: err instanceof Error ? err.message : "invalid secret",
    });
    return z.NEVER;
  }
});

export const zSignUpBody = z
  .object({
    username: z.string().nullish(),
    password: zSecret.optional(),
    email: z.string().nullish(),
    first_name: z.string().nullish(),
    last_name: z.string().nullish(),
  })
  .strict();

export type SignUpBody = z.infer<typeof zSignUpBody>;

export interface SignUpRequest {
  username: string;
  password: Secret;
  email: string;
  firstName: string;
  lastName: string;
}

export function toSignUpRequest(body: SignUpBody): SignUpRequest {
  return {
    username: body.username ?? "",
    password: body.password ?? new Secret(""),
    email: body.email ?? "",
    firstName: body.first_name ?? "",
    lastName: body.last_name ?? "",
  };
}

/** Trims and lowercases fields in place so storage is consistent. Idempotent. */
export function normalizeSignUpRequest(req: SignUpRequest): void {
  req.firstName = req.firstName.trim();
  req.lastName = req.lastName.trim();
  req.username = req.username.trim().toLowerCase();
  req.email = req.email.trim().toLowerCase();
}
