// backend/services/shared/src/db/dupKeyError.ts
/**
 * Purpose:
 * - Recognize Mongo duplicate-key (E11000) failures from the driver or mongoose.
 * - Provide a standard DuplicateKeyError usable across services.
 */

function readField(err: object, name: string): unknown {
  return name in err ? Reflect.get(err, name) : undefined;
}

export function isDuplicateKeyError(err: unknown): boolean {
  if (!err || typeof err !== "object") return false;
  const code = readField(err, "code") ?? readField(err, "errorCode");
  if (code === 11000) return true;
  const message = readField(err, "message");
  return typeof message === "string" && /E11000 duplicate key error/i.test(message);
}

export class DuplicateKeyError extends Error {
  constructor(message: string, original?: unknown) {
    super(message, { cause: original });
    this.name = "DuplicateKeyError";
  }
}
