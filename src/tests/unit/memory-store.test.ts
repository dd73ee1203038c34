import { describe, expect, it } from "vitest";
import { InMemoryTokenStore } from "../../modules/tokens/memory-store.js";
import type { NewTokenRecord } from "../../modules/tokens/types.js";

const T0 = new Date("2026-03-01T08:00:00.000Z");
const minutes = (n: number) => new Date(T0.getTime() + n * 60_000);

function newRecord(overrides: Partial<NewTokenRecord> = {}): NewTokenRecord {
  return {
    tokenHash: "a".repeat(64),
    userId: "user-1",
    email: "user@example.com",
    flowType: "password_reset",
    createdAt: T0,
    expiresAt: minutes(15),
    requestIp: null,
    userAgent: null,
    ...overrides,
  };
}

describe("InMemoryTokenStore", () => {
  it("rejects records whose expiry is not after creation", async () => {
    const store = new InMemoryTokenStore();
    await expect(store.createToken(newRecord({ expiresAt: T0 }))).rejects.toThrow(
      "expires_at must be later than created_at",
    );
  });

  it("returns the most recently created unused record for an email", async () => {
    const store = new InMemoryTokenStore();
    await store.createToken(newRecord({ tokenHash: "1".repeat(64), createdAt: T0 }));
    const second = await store.createToken(
      newRecord({ tokenHash: "2".repeat(64), createdAt: minutes(1), expiresAt: minutes(16) }),
    );

    const latest = await store.findLatestUnusedByEmail("user@example.com", "password_reset");
    expect(latest?.id).toBe(second.id);

    await store.markUsed(second.id);
    const fallback = await store.findLatestUnusedByEmail("user@example.com", "password_reset");
    expect(fallback?.tokenHash).toBe("1".repeat(64));
  });

  it("flips used exactly once", async () => {
    const store = new InMemoryTokenStore();
    const record = await store.createToken(newRecord());

    const results = await Promise.all([store.markUsed(record.id), store.markUsed(record.id)]);
    expect(results.filter(Boolean)).toHaveLength(1);
    expect(await store.markUsed("missing")).toBe(false);
  });

  it("finds email-verification records by hash only while unused", async () => {
    const store = new InMemoryTokenStore();
    const record = await store.createToken(
      newRecord({ flowType: "email_verification", tokenHash: "f".repeat(64) }),
    );

    expect(await store.findUnusedByTokenHash("f".repeat(64), "password_reset")).toBeNull();
    expect((await store.findUnusedByTokenHash("f".repeat(64), "email_verification"))?.id).toBe(
      record.id,
    );

    await store.markUsed(record.id);
    expect(await store.findUnusedByTokenHash("f".repeat(64), "email_verification")).toBeNull();
  });

  it("consumes a verification token and marks the user in one step", async () => {
    const store = new InMemoryTokenStore();
    const user = store.addUser("User@Example.com");
    const record = await store.createToken(
      newRecord({ flowType: "email_verification", userId: user.id, expiresAt: minutes(60) }),
    );

    expect(await store.findUserIdByEmail("user@example.com")).toBe(user.id);
    expect(await store.consumeEmailVerification(record.id, user.id, T0)).toEqual({
      claimed: true,
      newlyVerified: true,
    });
    expect(await store.consumeEmailVerification(record.id, user.id, minutes(5))).toEqual({
      claimed: false,
      newlyVerified: false,
    });
    expect(store.list()[0]?.used).toBe(true);
    expect(store.getUser(user.id)?.emailVerifiedAt).toEqual(T0);
  });

  it("keeps the first verified timestamp for a second token", async () => {
    const store = new InMemoryTokenStore();
    const user = store.addUser("user@example.com");
    const first = await store.createToken(
      newRecord({ flowType: "email_verification", userId: user.id, tokenHash: "1".repeat(64) }),
    );
    const second = await store.createToken(
      newRecord({ flowType: "email_verification", userId: user.id, tokenHash: "2".repeat(64) }),
    );

    await store.consumeEmailVerification(first.id, user.id, T0);
    expect(await store.consumeEmailVerification(second.id, user.id, minutes(5))).toEqual({
      claimed: true,
      newlyVerified: false,
    });
    expect(store.getUser(user.id)?.emailVerifiedAt).toEqual(T0);
  });

  it("counts issuance attempts after the cutoff", async () => {
    const store = new InMemoryTokenStore();
    await store.recordIssuance("user@example.com", "password_reset", T0);
    await store.recordIssuance("user@example.com", "password_reset", minutes(10));
    await store.recordIssuance("user@example.com", "email_verification", minutes(20));

    expect(await store.countIssuedSince("user@example.com", "password_reset", T0)).toBe(1);
    expect(await store.countIssuedSince("user@example.com", "password_reset", minutes(-1))).toBe(2);
    expect(await store.countIssuedSince("other@example.com", "password_reset", minutes(-1))).toBe(0);
    expect(store.list()).toHaveLength(0);
  });

  it("prunes issuance attempts older than the used cutoff", async () => {
    const store = new InMemoryTokenStore();
    await store.recordIssuance("user@example.com", "password_reset", T0);
    await store.recordIssuance("user@example.com", "password_reset", minutes(90));

    expect(await store.deleteExpiredOrStale(minutes(120), minutes(60))).toBe(0);
    expect(await store.countIssuedSince("user@example.com", "password_reset", minutes(-1))).toBe(1);
  });

  it("deletes expired and stale used records only", async () => {
    const store = new InMemoryTokenStore();
    const now = minutes(60 * 24 * 8);
    const usedBefore = minutes(60 * 24);

    const expired = await store.createToken(newRecord({ createdAt: T0, expiresAt: minutes(15) }));
    const valid = await store.createToken(
      newRecord({ createdAt: minutes(60 * 24 * 8 - 1), expiresAt: minutes(60 * 24 * 8 + 14) }),
    );
    const staleUsed = await store.createToken(
      newRecord({
        flowType: "email_verification",
        createdAt: minutes(60),
        expiresAt: minutes(60 * 24 * 30),
      }),
    );
    await store.markUsed(staleUsed.id);
    const recentUsed = await store.createToken(
      newRecord({
        flowType: "email_verification",
        createdAt: minutes(60 * 24 * 2),
        expiresAt: minutes(60 * 24 * 30),
      }),
    );
    await store.markUsed(recentUsed.id);

    expect(await store.deleteExpiredOrStale(now, usedBefore)).toBe(2);
    const remaining = store.list().map((r) => r.id);
    expect(remaining).toEqual([valid.id, recentUsed.id]);
    expect(remaining).not.toContain(expired.id);
  });

  it("reports active counts per flow type and expired total", async () => {
    const store = new InMemoryTokenStore();
    await store.createToken(newRecord({ createdAt: T0, expiresAt: minutes(15) }));
    await store.createToken(newRecord({ createdAt: T0, expiresAt: minutes(30) }));
    const used = await store.createToken(
      newRecord({ flowType: "email_verification", createdAt: T0, expiresAt: minutes(60) }),
    );
    await store.markUsed(used.id);

    expect(await store.getStats(minutes(15))).toEqual({
      activeTokens: { password_reset: 1, email_verification: 0, magic_link: 0 },
      expiredTokens: 1,
    });
  });
});
