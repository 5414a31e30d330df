// backend/services/shared/src/security/Secret.ts
/**
 * Purpose:
 * - Wrap credential material so it cannot leak through logging, string
 *   formatting, or JSON encoding.
 *
 * Invariants:
 * - String conversion and util.inspect render `[REDACTED]`.
 * - JSON encoding (JSON.stringify, pino) renders `***redacted***`.
 * - The raw value is reachable only through `reveal()`.
 */

import { inspect } from "node:util";

export const SECRET_REDACTED = "[REDACTED]";
export const SECRET_REDACTED_JSON = "***redacted***";

export class SecretDecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SecretDecodeError";
  }
}

export class Secret {
  readonly #value: string;

  constructor(value: string) {
    this.#value = value;
  }

  /** Decode a wire value; rejects non-strings and the empty string. */
  public static fromJSON(value: unknown): Secret {
    if (typeof value !== "string") {
      throw new SecretDecodeError("secret value must be a string");
    }
    if (value === "") {
      throw new SecretDecodeError("secret value must not be empty");
    }
    return new Secret(value);
  }

  /** Returns the raw secret value. Guard access carefully. */
  public reveal(): string {
    return this.#value;
  }

  public toString(): string {
    return SECRET_REDACTED;
  }

  public toJSON(): string {
    return SECRET_REDACTED_JSON;
  }

  public [Symbol.toPrimitive](): string {
    return SECRET_REDACTED;
  }

  public [inspect.custom](): string {
    return SECRET_REDACTED;
  }
}
