// backend/services/signup/src/services/registrationService.ts
/**
 * Flow: deadline → duplicate pre-check → bcrypt hash → create.
 *
 * Invariants:
 * - Never log the cleartext password; `reveal()` is called only for hashing.
 * - The pre-check and the create share one deadline signal.
 * - A duplicate-key rejection from create (lost race) is the same
 *   AccountExistsError as the pre-check hit.
 */

import { DuplicateKeyError } from "@acct/shared/src/db/dupKeyError";
import { deadlineSignal } from "@acct/shared/src/util/deadline";
import type { SignUpRequest } from "../contracts/signup.contract";
import type {
  CreateUserParams,
  UserRecord,
  UserRepo,
} from "../repo/userRepo";
import type { PasswordHasher } from "./passwordHasher";
import { AccountExistsError, RegistrationError } from "./registration.errors";

export const REGISTRATION_TIMEOUT_MS = 5_000;

export interface UserRegistrationService {
  registerUser(signal: AbortSignal, payload: SignUpRequest): Promise<void>;
}

export type RegistrationServiceDeps = {
  repo: UserRepo;
  hasher: PasswordHasher;
  timeoutMs?: number;
};

export class RegistrationService implements UserRegistrationService {
  private readonly repo: UserRepo;
  private readonly hasher: PasswordHasher;
  private readonly timeoutMs: number;

  constructor(deps: RegistrationServiceDeps) {
    this.repo = deps.repo;
    this.hasher = deps.hasher;
    this.timeoutMs = deps.timeoutMs ?? REGISTRATION_TIMEOUT_MS;
  }

  public async registerUser(
    parent: AbortSignal,
    payload: SignUpRequest
  ): Promise<void> {
    const signal = deadlineSignal(parent, this.timeoutMs);
    if (signal.aborted) {
      throw new RegistrationError("request canceled", signal.reason);
    }

    let existing: UserRecord | null;
    try {
      existing = await this.repo.findByUsername(payload.username, { signal });
    } catch (err) {
      throw new RegistrationError("lookup existing user", err);
    }
    if (existing) throw new AccountExistsError();

    let passwordHash: string;
    try {
      passwordHash = await this.hasher.hash(payload.password.reveal());
    } catch (err) {
      throw new RegistrationError("hash password", err);
    }

    const params: CreateUserParams = {
      username: payload.username,
      passwordHash,
    };
    if (payload.email !== "") params.email = payload.email;
    if (payload.firstName !== "") params.firstName = payload.firstName;
    if (payload.lastName !== "") params.lastName = payload.lastName;

    try {
      await this.repo.create(params, { signal });
    } catch (err) {
      if (err instanceof DuplicateKeyError) throw new AccountExistsError();
      throw new RegistrationError("create user", err);
    }
  }
}
