// src/server.ts
// ============================================================================
// Bootstrap für den Token-Service
// ----------------------------------------------------------------------------
// Aufgaben:
//  - Abhängigkeiten aus env.ts bauen (Store, Notifier, Limiter, Verifier)
//  - buildApp() + listen()
//  - Periodischer Token-Cleanup (TOKEN_CLEANUP_INTERVAL_SEC)
//  - Prozessweite Fehlerwächter (unhandledRejection / uncaughtException)
//  - Geordneter Shutdown mit Timeout-Guard (SIGINT, SIGTERM, SIGUSR2)
// ============================================================================

import type { FastifyInstance } from "fastify";
import { buildApp, type HealthCheck } from "./app.js";
import { checkDb, createPool, dbHealth, type DbPool } from "./libs/db.js";
import { env, envSummary } from "./libs/env.js";
import { createAccessTokenVerifier } from "./libs/jwt.js";
import { createLogger } from "./libs/logger.js";
import { createMailTransport, mailHealth } from "./libs/mail.js";
import { createRedisClient, ensureRedis, quitRedis, redisHealth, type RedisClient } from "./libs/redis.js";
import { scheduleTokenCleanup, TokenMaintenance, type CleanupSchedule } from "./modules/tokens/maintenance.js";
import { InMemoryTokenStore } from "./modules/tokens/memory-store.js";
import { SmtpNotifier } from "./modules/tokens/notifier.js";
import { RedisRateLimiter, StoreRateLimiter, type IssuanceRateLimiter } from "./modules/tokens/rate-limiter.js";
import { PgTokenStore } from "./modules/tokens/repository.js";
import { TokenManager } from "./modules/tokens/service.js";
import type { TokenStore } from "./modules/tokens/types.js";
import { createVerificationUrlBuilder } from "./modules/tokens/verification-url.js";

// Maximale Wartezeit für geordnetes Beenden, bevor hart terminiert wird.
const SHUTDOWN_TIMEOUT_MS = 10_000;

const log = createLogger(env.LOG_LEVEL);

// Doppel-Start/Mehrfach-Shutdown verhindern
let app: FastifyInstance | undefined;
let shuttingDown = false;

// ============================================================================
// Prozessweite Fehlerwächter
// ============================================================================

process.on("unhandledRejection", (reason) => {
  log.error({ reason }, "unhandled_rejection");
  // Kein harter Exit → Shutdown wird über Signal ausgelöst.
});

process.on("uncaughtException", (err) => {
  log.error({ err }, "uncaught_exception");
  void shutdown("uncaughtException");
});

// ============================================================================
// Abhängigkeiten
// ============================================================================

interface Resources {
  store: TokenStore;
  pool?: DbPool;
  redis?: RedisClient;
  healthChecks: Record<string, HealthCheck>;
}

async function createResources(): Promise<Resources> {
  const healthChecks: Record<string, HealthCheck> = {};

  let store: TokenStore;
  let pool: DbPool | undefined;

  if (env.STORE_DRIVER === "postgres" && env.DATABASE_URL) {
    const db = createPool(env.DATABASE_URL);
    pool = db;
    db.on("error", (err) => log.error({ err }, "db_pool_error"));
    await checkDb(db);
    store = new PgTokenStore(db);
    healthChecks.db = () => dbHealth(db);
  } else {
    log.warn("token_store_memory: Daten gehen beim Neustart verloren");
    store = new InMemoryTokenStore();
  }

  let redis: RedisClient | undefined;
  if (env.REDIS_URL) {
    const client = createRedisClient(env.REDIS_URL, { password: env.REDIS_PASSWORD, logger: log });
    redis = client;
    await ensureRedis(client);
    healthChecks.redis = () => redisHealth(client);
  }

  return { store, pool, redis, healthChecks };
}

function createRateLimiter(store: TokenStore, redis: RedisClient | undefined): IssuanceRateLimiter {
  const options = { max: env.TOKEN_ISSUE_MAX, windowMs: env.TOKEN_ISSUE_WINDOW_SEC * 1000 };

  if (env.TOKEN_RATE_LIMIT_STRATEGY === "fixed" && redis) {
    return new RedisRateLimiter(redis, env.REDIS_NAMESPACE, options);
  }
  return new StoreRateLimiter(store, options);
}

// ============================================================================
// Start & Listen
// ============================================================================

async function start() {
  log.info({ env: envSummary() }, "token_service_config");

  const { store, pool, redis, healthChecks } = await createResources();

  const transport = createMailTransport({
    host: env.SMTP_HOST,
    port: env.SMTP_PORT,
    secure: env.SMTP_SECURE,
    user: env.SMTP_USER,
    pass: env.SMTP_PASS,
  });
  healthChecks.smtp = async () => {
    const { ok, reason } = await mailHealth(transport);
    return { ok, error: reason };
  };

  const tokenManager = new TokenManager({
    store,
    notifier: new SmtpNotifier(transport, { from: env.SMTP_FROM, appName: env.MAIL_APP_NAME }),
    verificationUrl: createVerificationUrlBuilder(env.VERIFICATION_BASE_URL),
    rateLimiter: createRateLimiter(store, redis),
    logger: log,
    policy: {
      resetCodeLength: env.PASSWORD_RESET_CODE_LENGTH,
      resetCodeTtlMs: env.PASSWORD_RESET_TTL_SEC * 1000,
      verificationTtlMs: env.EMAIL_VERIFY_TTL_SEC * 1000,
      pepper: env.TOKEN_PEPPER,
      blockedEmailDomains: env.EMAIL_BLOCKED_DOMAINS,
    },
  });

  const maintenance = new TokenMaintenance({
    store,
    logger: log,
    usedRetentionMs: env.USED_TOKEN_RETENTION_SEC * 1000,
  });

  let cleanup: CleanupSchedule | undefined;
  if (env.TOKEN_CLEANUP_INTERVAL_SEC > 0) {
    cleanup = scheduleTokenCleanup(maintenance, {
      intervalMs: env.TOKEN_CLEANUP_INTERVAL_SEC * 1000,
      logger: log,
    });
  }

  const verifyAccessToken = createAccessTokenVerifier({
    activeSecret: env.JWT_SECRET_ACTIVE ?? "",
    previousSecret: env.JWT_SECRET_PREVIOUS,
    issuer: env.JWT_ISSUER,
    audience: env.JWT_AUDIENCE,
    clockToleranceSec: env.JWT_CLOCK_SKEW_SEC,
  });

  const instance = await buildApp({
    tokenManager,
    maintenance,
    verifyAccessToken,
    healthChecks,
    softDependencies: ["smtp"],
    redis,
  });
  app = instance;

  // Graceful Shutdown Hooks (werden via app.close() getriggert)
  instance.addHook("onClose", async () => {
    cleanup?.stop();
    transport.close();

    if (redis) {
      await quitRedis(redis);
      log.info("redis_closed");
    }

    if (pool) {
      try {
        await pool.end();
        log.info("db_pool_closed");
      } catch (err) {
        log.warn({ err }, "db_shutdown_failed");
      }
    }
  });

  await instance.listen({ host: env.HOST, port: env.PORT });
  log.info({ address: instance.server.address() }, "token_service_listening");
}

// ============================================================================
// Geordneter Shutdown
// ============================================================================

async function shutdown(reason: string) {
  if (shuttingDown) return;
  shuttingDown = true;

  // Fail-Safe: falls irgendwas hängt, nach Timeout hart beenden
  const killTimer = setTimeout(() => {
    log.error({ timeoutMs: SHUTDOWN_TIMEOUT_MS, reason }, "shutdown_forced_exit");
    process.exit(1);
  }, SHUTDOWN_TIMEOUT_MS);
  killTimer.unref();

  try {
    log.info({ reason }, "shutdown_received");

    // HTTP-Server schließen; /readyz meldet ab preClose "starting"
    if (app) {
      await app.close();
      log.info("server_closed");
    }

    clearTimeout(killTimer);
    process.exit(0);
  } catch (err) {
    log.error({ err }, "shutdown_error");
    clearTimeout(killTimer);
    process.exit(1);
  }
}

// ============================================================================
// Signal-Handler (einmalig registriert)
// ============================================================================
// SIGINT  = Ctrl+C / `docker stop`
// SIGTERM = Standard-Stop in Docker/Kubernetes
// SIGUSR2 = häufig von nodemon im Dev-Modus genutzt

process.once("SIGINT", () => void shutdown("SIGINT"));
process.once("SIGTERM", () => void shutdown("SIGTERM"));
process.once("SIGUSR2", () => void shutdown("SIGUSR2"));

// ============================================================================
// Bootstrap
// ============================================================================

start().catch((err: unknown) => {
  // Startfehler → Exit, damit Orchestrator (Docker/K8s) neu starten kann.
  log.fatal({ err }, "server_start_failed");
  process.exitCode = 1;
  setTimeout(() => process.exit(1), 50);
});
