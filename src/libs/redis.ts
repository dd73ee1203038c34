// ============================================================================
// src/libs/redis.ts
// ----------------------------------------------------------------------------
// Redis-Integration (ioredis v5)
// - Client wird explizit erzeugt (server.ts), kein Modul-Singleton
// - genutzt von @fastify/rate-limit und vom Fixed-Window-Issuance-Limiter
// ============================================================================
import { Redis } from "ioredis";
import type { Logger } from "pino";

export type RedisClient = Redis;

// -----------------------------
// Client-Erzeugung
// -----------------------------
export function createRedisClient(
  url: string,
  opts: { password?: string; logger?: Logger } = {},
): RedisClient {
  const client = new Redis(url, {
    password: opts.password,
    lazyConnect: true,
    enableReadyCheck: true,
    enableAutoPipelining: true,
    maxRetriesPerRequest: 3,
    retryStrategy: (times: number) => Math.min(1000 * times, 10_000),
  });

  const log = opts.logger?.child({ module: "redis" });
  client.on("ready", () => log?.info("redis_ready"));
  client.on("error", (err: Error) => log?.error({ err }, "redis_error"));
  client.on("end", () => log?.info("redis_end"));

  return client;
}

// -----------------------------
// Health & Lifecycle
// -----------------------------
export async function ensureRedis(client: RedisClient): Promise<void> {
  if (client.status === "wait" || client.status === "end") {
    await client.connect();
  }
  await client.ping();
}

export async function redisHealth(client: RedisClient): Promise<{ ok: boolean; error?: string }> {
  try {
    const pong = await client.ping();
    return { ok: pong === "PONG" };
  } catch (err: unknown) {
    return { ok: false, error: err instanceof Error ? err.message : "unknown redis error" };
  }
}

export async function quitRedis(client: RedisClient): Promise<void> {
  try {
    await client.quit();
  } catch {
    client.disconnect();
  }
}
