// tests/http/tokens.test.ts
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { signTestAccessToken } from "../support/fakes.js";
import { buildTestApp, type TestApp } from "../support/app.js";

let ctx: TestApp;

function seedTokens() {
  const now = Date.now();
  const base = {
    userId: "user-1",
    email: "user@example.com",
    requestIp: null,
    userAgent: null,
  };

  return Promise.all([
    ctx.store.createToken({
      ...base,
      tokenHash: "a".repeat(64),
      flowType: "password_reset",
      createdAt: new Date(now - 60_000),
      expiresAt: new Date(now + 14 * 60_000),
    }),
    ctx.store.createToken({
      ...base,
      tokenHash: "b".repeat(64),
      flowType: "email_verification",
      createdAt: new Date(now - 3 * 24 * 60 * 60_000),
      expiresAt: new Date(now - 24 * 60 * 60_000),
    }),
  ]);
}

describe("Token maintenance endpoints", () => {
  beforeEach(async () => {
    ctx = await buildTestApp();
    await seedTokens();
  });

  afterEach(async () => {
    await ctx.app.close();
  });

  it("GET /stats requires authentication", async () => {
    const res = await ctx.app.inject({ method: "GET", url: "/auth/tokens/stats" });

    expect(res.statusCode).toBe(401);
    expect(res.json().error.code).toBe("MISSING_TOKEN");
  });

  it("GET /stats requires the admin scope", async () => {
    const bearer = await signTestAccessToken("user-1", { scope: "profile" });

    const res = await ctx.app.inject({
      method: "GET",
      url: "/auth/tokens/stats",
      headers: { authorization: `Bearer ${bearer}` },
    });

    expect(res.statusCode).toBe(403);
    expect(res.json().error).toEqual({
      code: "PERMISSION_DENIED",
      message: "Missing required permission.",
    });
  });

  it("GET /stats counts active tokens per flow", async () => {
    const bearer = await signTestAccessToken("admin-1", { scope: "tokens:admin" });

    const res = await ctx.app.inject({
      method: "GET",
      url: "/auth/tokens/stats",
      headers: { authorization: `Bearer ${bearer}` },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      active_tokens: { password_reset: 1, email_verification: 0, magic_link: 0 },
      expired_tokens: 1,
    });
  });

  it("POST /cleanup deletes expired tokens", async () => {
    const bearer = await signTestAccessToken("admin-1", { scope: "tokens:admin" });

    const res = await ctx.app.inject({
      method: "POST",
      url: "/auth/tokens/cleanup",
      headers: { authorization: `Bearer ${bearer}` },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ ok: true, deleted: 1 });
    expect(ctx.store.list().map((r) => r.flowType)).toEqual(["password_reset"]);
  });
});
