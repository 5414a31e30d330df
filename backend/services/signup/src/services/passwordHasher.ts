import bcrypt from "bcrypt";

/** Fixed cost; matches bcrypt's default work factor. */
export const BCRYPT_COST = 10;

/** bcrypt ignores input past this many bytes. */
export const BCRYPT_MAX_BYTES = 72;

export class PasswordTooLongError extends Error {
  constructor() {
    super(`password exceeds ${BCRYPT_MAX_BYTES} bytes`);
    this.name = "PasswordTooLongError";
  }
}

export interface PasswordHasher {
  hash(plaintext: string): Promise<string>;
}

export class BcryptHasher implements PasswordHasher {
  constructor(private readonly cost: number = BCRYPT_COST) {}

  public async hash(plaintext: string): Promise<string> {
    // longer inputs would hash the same as their first 72 bytes
    if (Buffer.byteLength(plaintext, "utf8") > BCRYPT_MAX_BYTES) {
      throw new PasswordTooLongError();
    }
    return bcrypt.hash(plaintext, this.cost);
  }
}
