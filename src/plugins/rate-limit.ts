// ============================================================================
// src/plugins/rate-limit.ts
// ----------------------------------------------------------------------------
// HTTP-Rate-Limiting pro IP (@fastify/rate-limit)
// - mit Redis-Client: clusterweit gemeinsamer Zähler
// - ohne: In-Memory-Store der Instanz (Tests, lokale Entwicklung)
// - einzelne Routen verschärfen über config.rateLimit
// - unabhängig vom Issuance-Limit pro E-Mail (modules/tokens/rate-limiter.ts)
// ============================================================================
import fp from "fastify-plugin";
import rateLimit from "@fastify/rate-limit";
import type { FastifyInstance, FastifyRequest } from "fastify";
import { isHealthPath } from "../libs/http.js";
import type { RedisClient } from "../libs/redis.js";

export interface RateLimitPluginOptions {
  max: number;
  windowSec: number;
  redis?: RedisClient;
  /** Exakte IPs ohne Limit, z.B. interne Healthchecker */
  allowList?: string[];
}

export default fp<RateLimitPluginOptions>(
  async function rateLimitPlugin(app: FastifyInstance, opts: RateLimitPluginOptions) {
    const allowSet = new Set(opts.allowList ?? []);

    await app.register(rateLimit, {
      max: opts.max,
      timeWindow: `${opts.windowSec}s`,
      redis: opts.redis,
      nameSpace: "token-service-ratelimit-",

      keyGenerator: (req: FastifyRequest) => `ip:${req.ip}`,

      allowList: (req: FastifyRequest) => isHealthPath(req) || allowSet.has(req.ip),

      // wird geworfen und landet im Error-Handler von app.ts
      errorResponseBuilder: (_req, context) => ({
        statusCode: context.statusCode,
        code: "RATE_LIMITED",
        message: `Too many requests, retry in ${context.after}.`,
      }),

      addHeaders: {
        "x-ratelimit-limit": true,
        "x-ratelimit-remaining": true,
        "x-ratelimit-reset": true,
        "retry-after": true,
      },
    });

    app.log.info(
      {
        max: opts.max,
        windowSec: opts.windowSec,
        store: opts.redis ? "redis" : "memory",
        allowListCount: allowSet.size,
      },
      "rate_limit_enabled",
    );
  },
  { name: "rate-limit-plugin" },
);
