// backend/services/signup/src/repo/userRepo.ts
import UserModel from "../models/user.model";
import {
  DuplicateKeyError,
  isDuplicateKeyError,
} from "@acct/shared/src/db/dupKeyError";
import { raceWithSignal } from "@acct/shared/src/util/deadline";

/** Public view of a stored user; never carries the password hash. */
export type UserRecord = {
  username: string;
  email?: string;
  firstName?: string;
  lastName?: string;
};

/** Optional keys are left out entirely when the value is absent. */
export type CreateUserParams = {
  username: string;
  passwordHash: string;
  email?: string;
  firstName?: string;
  lastName?: string;
};

export type RepoCallOptions = { signal: AbortSignal };

export interface UserRepo {
  /** Exact match on the canonical username; null when absent. */
  findByUsername(
    username: string,
    opts: RepoCallOptions
  ): Promise<UserRecord | null>;
  /** Rejects with DuplicateKeyError when the username is already stored. */
  create(params: CreateUserParams, opts: RepoCallOptions): Promise<void>;
}

// Server-side cap; the caller's signal usually fires first.
export const QUERY_MAX_TIME_MS = 5_000;

const PUBLIC_FIELDS = {
  _id: 0,
  username: 1,
  email: 1,
  firstName: 1,
  lastName: 1,
} as const;

export class MongoUserRepo implements UserRepo {
  public async findByUsername(
    username: string,
    { signal }: RepoCallOptions
  ): Promise<UserRecord | null> {
    const query = UserModel.findOne({ username }, PUBLIC_FIELDS)
      .maxTimeMS(QUERY_MAX_TIME_MS)
      .lean<UserRecord>()
      .exec();
    return raceWithSignal(query, signal, "user.findByUsername");
  }

  public async create(
    params: CreateUserParams,
    { signal }: RepoCallOptions
  ): Promise<void> {
    const { passwordHash, ...fields } = params;
    try {
      await raceWithSignal(
        UserModel.create({ ...fields, password: passwordHash }),
        signal,
        "user.create"
      );
    } catch (err) {
      if (isDuplicateKeyError(err)) {
        throw new DuplicateKeyError(`username already stored: ${fields.username}`, err);
      }
      throw err;
    }
  }
}
