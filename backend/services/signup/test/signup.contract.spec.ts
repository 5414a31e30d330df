// backend/services/signup/test/signup.contract.spec.ts
import { describe, it, expect } from "vitest";
import { Secret } from "@acct/shared/src/security/Secret";
import {
  normalizeSignUpRequest,
  toSignUpRequest,
  zSignUpBody,
  type SignUpRequest,
} from "../src/contracts/signup.contract";

function plainOf(req: SignUpRequest) {
  return {
    username: req.username,
    password: req.password.reveal(),
    email: req.email,
    firstName: req.firstName,
    lastName: req.lastName,
  };
}

describe("zSignUpBody", () => {
  it("accepts the documented fields", () => {
    const r = zSignUpBody.safeParse({
      username: "bob12345",
      password: "supersecretpw",
      email: "bob@example.com",
      first_name: "Bob",
      last_name: "Builder",
    });
    expect(r.success).toBe(true);
    if (!r.success) return;
    expect(r.data.password).toBeInstanceOf(Secret);
    expect(r.data.password?.reveal()).toBe("supersecretpw");
  });

  it("rejects unknown fields", () => {
    const r = zSignUpBody.safeParse({
      username: "bob",
      password: "xxxxxxxxxxxx",
      admin: true,
    });
    expect(r.success).toBe(false);
  });

  it("rejects an empty password at decode time", () => {
    expect(zSignUpBody.safeParse({ username: "bob", password: "" }).success).toBe(
      false
    );
  });

  it("rejects a non-string password", () => {
    expect(zSignUpBody.safeParse({ username: "bob", password: 1234 }).success).toBe(
      false
    );
    expect(zSignUpBody.safeParse({ username: "bob", password: null }).success).toBe(
      false
    );
  });

  it("treats null string fields as absent", () => {
    const r = zSignUpBody.safeParse({
      username: null,
      password: "supersecretpw",
      email: null,
      first_name: null,
      last_name: null,
    });
    expect(r.success).toBe(true);
    if (!r.success) return;
    expect(plainOf(toSignUpRequest(r.data))).toEqual({
      username: "",
      password: "supersecretpw",
      email: "",
      firstName: "",
      lastName: "",
    });
  });

  it("rejects non-object bodies", () => {
    expect(zSignUpBody.safeParse([]).success).toBe(false);
    expect(zSignUpBody.safeParse("bob").success).toBe(false);
  });

  it("leaves missing fields to validation", () => {
    expect(zSignUpBody.safeParse({}).success).toBe(true);
  });
});

describe("toSignUpRequest", () => {
  it("maps wire names and fills absent strings with empty ones", () => {
    const req = toSignUpRequest({ username: "Bob", first_name: "B" });
    expect(plainOf(req)).toEqual({
      username: "Bob",
      password: "",
      email: "",
      firstName: "B",
      lastName: "",
    });
  });
});

describe("normalizeSignUpRequest", () => {
  it("trims all text fields and lowercases username and email", () => {
    const req = toSignUpRequest({
      username: "  Alice_01 ",
      password: new Secret("  keep my spaces  "),
      email: " Alice@Example.COM ",
      first_name: "  Alice ",
      last_name: " Liddell  ",
    });
    normalizeSignUpRequest(req);
    expect(plainOf(req)).toEqual({
      username: "alice_01",
      password: "  keep my spaces  ",
      email: "alice@example.com",
      firstName: "Alice",
      lastName: "Liddell",
    });
  });

  it("keeps first and last name case", () => {
    const req = toSignUpRequest({ first_name: "McDonald", last_name: "O'Neil" });
    normalizeSignUpRequest(req);
    expect(req.firstName).toBe("McDonald");
    expect(req.lastName).toBe("O'Neil");
  });

  it("is idempotent", () => {
    const req = toSignUpRequest({
      username: " Bob12345 ",
      password: new Secret("supersecretpw"),
      email: " BOB@example.com",
      first_name: " Bob",
    });
    normalizeSignUpRequest(req);
    const once = plainOf(req);
    normalizeSignUpRequest(req);
    expect(plainOf(req)).toEqual(once);
  });
});
