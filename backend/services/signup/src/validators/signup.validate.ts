// backend/services/signup/src/validators/signup.validate.ts
/**
 * Validates a normalized SignUpRequest. Returns the first failure, or null.
 * Normalize first: the username pattern and email check assume canonical form.
 */

import emailAddresses from "email-addresses";
import type { SignUpRequest } from "../contracts/signup.contract";

export const USERNAME_PATTERN = /^[A-Za-z0-9_]{3,64}$/;
export const MIN_PASSWORD_LENGTH = 12;
export const MAX_NAME_LENGTH = 128;
export const MAX_EMAIL_LENGTH = 254;

const NAME_FORBIDDEN = /[<>{}\n\r\t]/;

/**
 * RFC 5322 addr-spec (RFC 6532 UTF-8 allowed): quoted local parts, the full
 * atext set, dotless hosts. Display-name and angle-bracket forms are rejected
 * since the value is stored as given.
 */
export function isEmailAddress(input: string): boolean {
  if (input.length > MAX_EMAIL_LENGTH) return false;
  const parsed = emailAddresses.parseOneAddress({ input, rfc6532: true });
  if (!parsed || parsed.type !== "mailbox") return false;
  return !parsed.name && !input.endsWith(">");
}

export class SignupValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SignupValidationError";
  }
}

// code points, so "é" counts once
const charLength = (s: string) => Array.from(s).length;

export function validateSignUpRequest(
  payload: SignUpRequest
): SignupValidationError | null {
  if (!USERNAME_PATTERN.test(payload.username)) {
    return new SignupValidationError(
      "username must be 3-64 characters and use letters, digits, or underscores"
    );
  }

  if (charLength(payload.password.reveal()) < MIN_PASSWORD_LENGTH) {
    return new SignupValidationError(
      `password must be at least ${MIN_PASSWORD_LENGTH} characters`
    );
  }

  if (payload.email !== "" && !isEmailAddress(payload.email)) {
    return new SignupValidationError("invalid email address");
  }

  return validateName(payload.firstName) ?? validateName(payload.lastName);
}

function validateName(name: string): SignupValidationError | null {
  if (name === "") return null;
  if (charLength(name) > MAX_NAME_LENGTH) {
    return new SignupValidationError(
      `names must be fewer than ${MAX_NAME_LENGTH} characters`
    );
  }
  if (NAME_FORBIDDEN.test(name)) {
    return new SignupValidationError("names contain unsupported characters");
  }
  return null;
}
