// backend/services/shared/test/createServiceApp.spec.ts
import { describe, it, expect } from "vitest";
import request from "supertest";
import { createServiceApp } from "../src/app/createServiceApp";
import { HttpError } from "../src/http/HttpError";

function makeApp(readiness?: () => Record<string, unknown>) {
  return createServiceApp({
    serviceName: "probe",
    apiPrefix: "/api",
    readiness,
    mountRoutes: (api) => {
      api.get("/ok", (_req, res) => {
        res.json({ ok: true });
      });
      api.get("/teapot", (_req, _res, next) => {
        next(new HttpError(418, "short and stout"));
      });
      api.get("/boom", () => {
        throw new Error("internal detail");
      });
    },
  });
}

describe("createServiceApp", () => {
  it("mounts routes under the prefix", async () => {
    const res = await request(makeApp()).get("/api/ok");
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ ok: true });
  });

  it("echoes a caller-supplied request id", async () => {
    const res = await request(makeApp())
      .get("/api/ok")
      .set("x-request-id", "req-123");
    expect(res.headers["x-request-id"]).toBe("req-123");
  });

  it("mints a request id when none is supplied", async () => {
    const res = await request(makeApp()).get("/api/ok");
    expect(res.headers["x-request-id"]).toMatch(
      /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/
    );
  });

  it("renders unknown routes as JSON 404", async () => {
    const res = await request(makeApp()).get("/api/missing");
    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: "not found" });
  });

  it("renders HttpError with its status and message", async () => {
    const res = await request(makeApp()).get("/api/teapot");
    expect(res.status).toBe(418);
    expect(res.body).toEqual({ error: "short and stout" });
  });

  it("hides details of unexpected errors", async () => {
    const res = await request(makeApp()).get("/api/boom");
    expect(res.status).toBe(500);
    expect(res.body).toEqual({ error: "internal error" });
  });

  describe("health", () => {
    it("liveness is always ok", async () => {
      const res = await request(makeApp()).get("/health/live");
      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({ service: "probe", ok: true });
    });

    it("readiness merges the hook's details", async () => {
      const res = await request(makeApp(() => ({ mongo: "ok" }))).get(
        "/health/ready"
      );
      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({ ok: true, mongo: "ok" });
    });

    it("readiness is 503 when the hook throws", async () => {
      const res = await request(
        makeApp(() => {
          throw new Error("mongo not connected (state=0)");
        })
      ).get("/health/ready");
      expect(res.status).toBe(503);
      expect(res.body).toMatchObject({
        ok: false,
        error: "mongo not connected (state=0)",
      });
    });
  });
});
