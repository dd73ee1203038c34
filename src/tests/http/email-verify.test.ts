// tests/http/email-verify.test.ts
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { signTestAccessToken } from "../support/fakes.js";
import { buildTestApp, type TestApp } from "../support/app.js";

let ctx: TestApp;

async function requestVerification(bearer: string | null, payload: Record<string, unknown>) {
  return ctx.app.inject({
    method: "POST",
    url: "/auth/email/verify/request",
    headers: bearer ? { authorization: `Bearer ${bearer}` } : {},
    payload,
  });
}

async function confirm(token: string) {
  return ctx.app.inject({
    method: "GET",
    url: `/auth/email/verify/confirm?token=${encodeURIComponent(token)}`,
  });
}

describe("Email verification endpoints", () => {
  beforeEach(async () => {
    ctx = await buildTestApp();
  });

  afterEach(async () => {
    vi.useRealTimers();
    await ctx.app.close();
  });

  it("POST /verify/request requires a bearer token", async () => {
    const res = await requestVerification(null, { email: "user@example.com" });

    expect(res.statusCode).toBe(401);
    expect(res.headers["www-authenticate"]).toBe('Bearer realm="token-service"');
    expect(res.json().error.code).toBe("MISSING_TOKEN");
    expect(ctx.notifier.verifications).toHaveLength(0);
  });

  it("POST /verify/request rejects a bearer token signed with another secret", async () => {
    const bearer = await signTestAccessToken("user-1", {}, "test-secret-other");

    const res = await requestVerification(bearer, { email: "user@example.com" });

    expect(res.statusCode).toBe(401);
    expect(res.json().error).toEqual({ code: "UNAUTHORIZED", message: "Invalid bearer token." });
  });

  it("POST /verify/request sends a link for the authenticated user", async () => {
    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(new Date("2026-04-10T08:00:00.000Z"));
    const bearer = await signTestAccessToken("user-1");

    const res = await requestVerification(bearer, { email: "User@Example.com", name: "Sam" });

    expect(res.statusCode).toBe(202);
    expect(res.json()).toEqual({
      requestAccepted: true,
      expires_at: "2026-04-12T08:00:00.000Z",
    });

    const sent = ctx.notifier.verifications[0];
    expect(sent?.to).toBe("user@example.com");
    expect(sent?.name).toBe("Sam");
    expect(sent?.verificationUrl.startsWith("https://app.example.com/verify-email?token=")).toBe(
      true,
    );
    expect(ctx.store.list()[0]?.userId).toBe("user-1");
  });

  it("GET /verify/confirm marks the user verified once", async () => {
    ctx.store.addUser("user@example.com", "user-1");
    const bearer = await signTestAccessToken("user-1");
    await requestVerification(bearer, { email: "user@example.com" });
    const token = ctx.notifier.lastVerificationToken();

    const first = await confirm(token);
    expect(first.statusCode).toBe(200);
    expect(first.json()).toEqual({ verified: true, user_id: "user-1", already_verified: false });
    expect(ctx.store.getUser("user-1")?.emailVerifiedAt).toBeInstanceOf(Date);

    const second = await confirm(token);
    expect(second.statusCode).toBe(400);
    expect(second.json().error.code).toBe("INVALID_TOKEN");
  });

  it("GET /verify/confirm reports already verified accounts", async () => {
    ctx.store.addUser("user@example.com", "user-1");
    const bearer = await signTestAccessToken("user-1");

    await requestVerification(bearer, { email: "user@example.com" });
    const firstToken = ctx.notifier.lastVerificationToken();
    await requestVerification(bearer, { email: "user@example.com" });
    const secondToken = ctx.notifier.lastVerificationToken();

    expect((await confirm(firstToken)).json().already_verified).toBe(false);
    expect((await confirm(secondToken)).json()).toEqual({
      verified: true,
      user_id: "user-1",
      already_verified: true,
    });
  });

  it("GET /verify/confirm answers 410 for an expired link", async () => {
    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(new Date("2026-04-10T08:00:00.000Z"));
    const bearer = await signTestAccessToken("user-1");
    await requestVerification(bearer, { email: "user@example.com" });
    const token = ctx.notifier.lastVerificationToken();

    vi.setSystemTime(new Date("2026-04-12T08:00:00.000Z"));
    const res = await confirm(token);

    expect(res.statusCode).toBe(410);
    expect(res.json().error).toEqual({ code: "TOKEN_EXPIRED", message: "Token has expired" });
  });

  it("GET /verify/confirm rejects unknown and missing tokens", async () => {
    const unknown = await confirm("a".repeat(43));
    expect(unknown.statusCode).toBe(400);
    expect(unknown.json().error.code).toBe("INVALID_TOKEN");

    const missing = await ctx.app.inject({ method: "GET", url: "/auth/email/verify/confirm" });
    expect(missing.statusCode).toBe(400);
    expect(missing.json().error.code).toBe("VALIDATION_FAILED");
  });
});
