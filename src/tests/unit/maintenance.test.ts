import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { StoreError } from "../../modules/tokens/errors.js";
import { scheduleTokenCleanup, TokenMaintenance } from "../../modules/tokens/maintenance.js";
import { InMemoryTokenStore } from "../../modules/tokens/memory-store.js";
import type { NewTokenRecord } from "../../modules/tokens/types.js";
import { silentLogger } from "../support/fakes.js";

const NOW = new Date("2026-05-20T00:00:00.000Z");
const DAY = 24 * 60 * 60 * 1000;

function at(offsetMs: number): Date {
  return new Date(NOW.getTime() + offsetMs);
}

function record(overrides: Partial<NewTokenRecord>): NewTokenRecord {
  return {
    tokenHash: "c".repeat(64),
    userId: "user-1",
    email: "user@example.com",
    flowType: "password_reset",
    createdAt: at(-60_000),
    expiresAt: at(14 * 60_000),
    requestIp: null,
    userAgent: null,
    ...overrides,
  };
}

describe("TokenMaintenance", () => {
  beforeEach(() => {
    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(NOW);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("removes only expired and stale used records", async () => {
    const store = new InMemoryTokenStore();
    const valid = await store.createToken(record({}));
    await store.createToken(record({ createdAt: at(-DAY), expiresAt: at(-DAY + 15 * 60_000) }));

    const staleUsed = await store.createToken(
      record({ flowType: "email_verification", createdAt: at(-8 * DAY), expiresAt: at(DAY) }),
    );
    await store.markUsed(staleUsed.id);

    const recentUsed = await store.createToken(
      record({ flowType: "email_verification", createdAt: at(-DAY), expiresAt: at(DAY) }),
    );
    await store.markUsed(recentUsed.id);

    const maintenance = new TokenMaintenance({ store, logger: silentLogger });

    await expect(maintenance.cleanupExpiredTokens()).resolves.toBe(2);
    expect(store.list().map((r) => r.id)).toEqual([valid.id, recentUsed.id]);
  });

  it("uses the configured retention window", async () => {
    const deleteExpiredOrStale = vi.fn().mockResolvedValue(0);
    const maintenance = new TokenMaintenance({
      store: { deleteExpiredOrStale, getStats: vi.fn() },
      logger: silentLogger,
      usedRetentionMs: DAY,
    });

    await maintenance.cleanupExpiredTokens();

    expect(deleteExpiredOrStale).toHaveBeenCalledWith(NOW, at(-DAY));
  });

  it("reports stats with every flow type present", async () => {
    const store = new InMemoryTokenStore();
    await store.createToken(record({}));
    await store.createToken(record({ createdAt: at(-DAY), expiresAt: at(-DAY + 60_000) }));

    const maintenance = new TokenMaintenance({ store, logger: silentLogger });

    await expect(maintenance.getTokenStats()).resolves.toEqual({
      activeTokens: { password_reset: 1, email_verification: 0, magic_link: 0 },
      expiredTokens: 1,
    });
    expect(store.list()).toHaveLength(2);
  });

  it("wraps store failures", async () => {
    const maintenance = new TokenMaintenance({
      store: {
        deleteExpiredOrStale: vi.fn().mockRejectedValue(new Error("timeout")),
        getStats: vi.fn().mockRejectedValue(new Error("timeout")),
      },
      logger: silentLogger,
    });

    await expect(maintenance.cleanupExpiredTokens()).rejects.toBeInstanceOf(StoreError);
    await expect(maintenance.getTokenStats()).rejects.toBeInstanceOf(StoreError);
  });
});

describe("scheduleTokenCleanup", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("runs on every interval until stopped and logs failures", async () => {
    vi.useFakeTimers();
    const cleanupExpiredTokens = vi
      .fn()
      .mockResolvedValueOnce(3)
      .mockRejectedValueOnce(new StoreError("Token store failed: deleteExpiredOrStale"));
    const logger = silentLogger.child({});
    const error = vi.spyOn(logger, "error");

    const schedule = scheduleTokenCleanup({ cleanupExpiredTokens }, { intervalMs: 1000, logger });

    await vi.advanceTimersByTimeAsync(1000);
    expect(cleanupExpiredTokens).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(1000);
    expect(cleanupExpiredTokens).toHaveBeenCalledTimes(2);
    await vi.waitFor(() => expect(error).toHaveBeenCalledTimes(1));

    schedule.stop();
    await vi.advanceTimersByTimeAsync(5000);
    expect(cleanupExpiredTokens).toHaveBeenCalledTimes(2);
  });
});
