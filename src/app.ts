// src/app.ts
// ============================================================================
// Token-Service (Fastify)
// ----------------------------------------------------------------------------
// Verantwortlichkeiten:
//  - Zentrales Fastify-Setup (Logger, Timeouts, CORS, Rate-Limit)
//  - /health, /healthz, /readyz
//  - Registrierung der Token-Routen mit Auth-/Scope-Prüfung
//  - Fehler-Mapping auf { status, error: { code, message } }
//
// Alle Abhängigkeiten (TokenManager, Wartung, Verifier, Redis) werden von
// server.ts bzw. Tests übergeben; app.ts baut selbst keine Verbindungen auf.
// ============================================================================

import Fastify, { type FastifyInstance, type FastifyServerOptions } from "fastify";
import cors from "@fastify/cors";
import { randomUUID } from "node:crypto";

import rateLimitPlugin from "./plugins/rate-limit.js";
import authPlugin from "./plugins/auth.js";
import authorizationPlugin from "./plugins/authorization.js";

import { env } from "./libs/env.js";
import { apiError } from "./libs/error-response.js";
import type { AccessTokenVerifier } from "./libs/jwt.js";
import type { RedisClient } from "./libs/redis.js";

import passwordRoutes from "./modules/password/routes.js";
import emailVerifyRoutes from "./modules/email-verify/routes.js";
import tokenRoutes from "./modules/tokens/routes.js";
import type { TokenMaintenance } from "./modules/tokens/maintenance.js";
import type { TokenManager } from "./modules/tokens/service.js";

// ---------------------------------------------------------------------------
// Optionen
// ---------------------------------------------------------------------------

export type HealthCheck = () => Promise<{ ok: boolean; error?: string }>;

export type AppOptions = Omit<FastifyServerOptions, "logger"> & {
  tokenManager: TokenManager;
  maintenance: TokenMaintenance;
  verifyAccessToken: AccessTokenVerifier;
  /** Abhängigkeiten für /health und /readyz, z.B. { db, redis, smtp } */
  healthChecks?: Record<string, HealthCheck>;
  /** Komponenten, deren Ausfall nur "degraded" bedeutet (z.B. smtp) */
  softDependencies?: string[];
  redis?: RedisClient;
  logLevel?: string;
  enableCors?: boolean;
  corsOrigin?: string;
  rateLimit?: { max: number; windowSec: number } | false;
  verifyMaxPerMinute?: number;
};

type ComponentStatus = "ok" | "degraded" | "down";

// ---------------------------------------------------------------------------
// Health-Routen
// ---------------------------------------------------------------------------

async function runHealthChecks(
  app: FastifyInstance,
  checks: Record<string, HealthCheck>,
  soft: Set<string>,
): Promise<{ overall: ComponentStatus; services: Record<string, ComponentStatus> }> {
  const services: Record<string, ComponentStatus> = {};
  let overall: ComponentStatus = "ok";

  for (const [name, check] of Object.entries(checks)) {
    let ok = false;
    try {
      const result = await check();
      ok = result.ok;
      if (!ok) app.log.warn({ component: name, error: result.error }, "health_check_failed");
    } catch (err) {
      app.log.error({ err, component: name }, "health_check_failed");
    }

    if (ok) {
      services[name] = "ok";
    } else if (soft.has(name)) {
      services[name] = "degraded";
      if (overall === "ok") overall = "degraded";
    } else {
      services[name] = "down";
      overall = "down";
    }
  }

  return { overall, services };
}

function registerHealthRoutes(
  app: FastifyInstance,
  checks: Record<string, HealthCheck>,
  soft: Set<string>,
  isReady: () => boolean,
) {
  // Liveness-Check – lebt der Prozess?
  app.get("/healthz", async () => ({ status: "alive", pid: process.pid }));

  // Zentrales Health-Aggregat – Docker-Healthcheck hängt an /health
  app.get("/health", async (_req, reply) => {
    const { overall, services } = await runHealthChecks(app, checks, soft);

    return reply.code(overall === "down" ? 503 : 200).send({
      status: overall,
      env: env.NODE_ENV,
      ready: isReady(),
      services,
      ts: new Date().toISOString(),
    });
  });

  // Readiness – für Loadbalancer/K8s
  app.get("/readyz", async (_req, reply) => {
    if (!isReady()) {
      return reply.code(503).send({ status: "starting", ready: false });
    }

    const { overall, services } = await runHealthChecks(app, checks, soft);
    if (overall === "down") {
      return reply.code(503).send({ status: "degraded", ready: false, services });
    }

    return reply.send({ status: "ready", ready: true });
  });
}

// ---------------------------------------------------------------------------
// Haupt-Fabrikfunktion: baut eine Fastify-Instanz
// ---------------------------------------------------------------------------

export async function buildApp(opts: AppOptions): Promise<FastifyInstance> {
  const {
    tokenManager,
    maintenance,
    verifyAccessToken,
    healthChecks = {},
    softDependencies = [],
    redis,
    logLevel = env.LOG_LEVEL,
    enableCors = true,
    corsOrigin = env.CORS_ORIGIN,
    rateLimit = { max: env.RATE_LIMIT_MAX, windowSec: env.RATE_LIMIT_WINDOW },
    verifyMaxPerMinute,
    ...rest
  } = opts;

  const app = Fastify({
    logger: {
      level: logLevel,
      redact: {
        paths: ["req.headers.authorization", "req.query.token"],
        censor: "[redacted]",
      },
    },
    trustProxy: env.TRUST_PROXY,
    requestIdHeader: env.REQUEST_ID_HEADER,
    requestIdLogLabel: "request_id",
    genReqId: () => randomUUID(),
    requestTimeout: 30_000,
    connectionTimeout: 10_000,
    keepAliveTimeout: 65_000,
    ...rest,
  });

  let ready = false;

  app.addHook("onRequest", async (request, reply) => {
    reply.header(env.REQUEST_ID_HEADER, request.id);
  });

  app.addHook("onSend", async (_request, reply, payload) => {
    // Baseline Security Headers
    reply.header("X-Content-Type-Options", "nosniff");
    reply.header("Referrer-Policy", "no-referrer");
    reply.header("X-Frame-Options", "DENY");
    reply.header("Cache-Control", "no-store");
    return payload;
  });

  // Basis-Plugins (CORS, Rate-Limit)
  if (enableCors) {
    const allowAll = corsOrigin === "*";
    const allowlist = corsOrigin
      .split(",")
      .map((o) => o.trim())
      .filter(Boolean);

    await app.register(cors, {
      origin: allowAll ? true : allowlist,
      methods: ["GET", "POST", "OPTIONS"],
      credentials: !allowAll,
      maxAge: 86_400,
    });
  }

  if (rateLimit) {
    await app.register(rateLimitPlugin, { ...rateLimit, redis });
  }

  await app.register(authPlugin, { verifyAccessToken });
  await app.register(authorizationPlugin);

  // Routen
  await app.register(passwordRoutes, {
    prefix: "/auth/password",
    tokenManager,
    verifyMaxPerMinute,
  });
  await app.register(emailVerifyRoutes, { prefix: "/auth/email", tokenManager });
  await app.register(tokenRoutes, { prefix: "/auth/tokens", maintenance });

  // Health
  registerHealthRoutes(app, healthChecks, new Set(softDependencies), () => ready);

  app.addHook("onReady", async () => {
    ready = true;
  });
  app.addHook("preClose", async () => {
    ready = false;
  });

  // Error-/NotFound-Handler
  app.setErrorHandler((err, req, reply) => {
    const status = err.statusCode ?? (err.validation ? 400 : 500);

    if (status >= 500) {
      req.log.error({ err }, "unhandled_error");
    } else {
      req.log.info({ err: { message: err.message, code: err.code } }, "request_failed");
    }

    const code =
      status === 400
        ? "VALIDATION_FAILED"
        : status === 401
          ? "UNAUTHORIZED"
          : status === 403
            ? "FORBIDDEN"
            : status === 404
              ? "NOT_FOUND"
              : status === 413
                ? "PAYLOAD_TOO_LARGE"
                : status === 415
                  ? "UNSUPPORTED_MEDIA_TYPE"
                  : status === 429
                    ? "RATE_LIMITED"
                    : "INTERNAL";
    const message = status >= 500 ? "Internal server error." : err.message || "Request failed.";

    return reply
      .code(status)
      .type("application/json")
      .send(apiError(status, code, message, err.validation));
  });

  app.setNotFoundHandler((req, reply) => {
    return reply
      .code(404)
      .send(apiError(404, "NOT_FOUND", `Route ${req.method}:${req.url} not found`));
  });

  return app;
}
