// backend/services/signup/src/services/registration.errors.ts

/** The username is already registered. The only error the boundary tells apart. */
export class AccountExistsError extends Error {
  constructor() {
    super("user already exists");
    this.name = "AccountExistsError";
  }
}

/** Infrastructure failure with its step attached; rendered generically to clients. */
export class RegistrationError extends Error {
  public readonly step: string;

  constructor(step: string, cause: unknown) {
    super(`${step}: ${cause instanceof Error ? cause.message : String(cause)}`, {
      cause,
    });
    this.name = "RegistrationError";
    this.step = step;
  }
}
