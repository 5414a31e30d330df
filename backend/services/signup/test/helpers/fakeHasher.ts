// backend/services/signup/test/helpers/fakeHasher.ts
import type { PasswordHasher } from "../../src/services/passwordHasher";

/** Deterministic, fast stand-in for bcrypt. Records what it was asked to hash. */
export class FakeHasher implements PasswordHasher {
  public readonly seen: string[] = [];
  public fail?: unknown;

  public async hash(plaintext: string): Promise<string> {
    this.seen.push(plaintext);
    if (this.fail !== undefined) throw this.fail;
    return `hashed:${plaintext.length}`;
  }
}
