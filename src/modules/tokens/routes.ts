// src/modules/tokens/routes.ts
// ============================================================================
// Admin-Routen für Token-Wartung (Scope tokens:admin)
// ----------------------------------------------------------------------------
// - GET  /auth/tokens/stats     → aktive Tokens pro Typ + abgelaufene gesamt
// - POST /auth/tokens/cleanup   → abgelaufene/alte benutzte Tokens löschen
// ============================================================================

import type { FastifyInstance, FastifyPluginOptions } from "fastify";
import { sendTokenServiceError } from "../../libs/error-response.js";
import type { TokenMaintenance } from "./maintenance.js";

export const TOKENS_ADMIN_SCOPE = "tokens:admin";

export interface TokenRoutesOptions extends FastifyPluginOptions {
  maintenance: Pick<TokenMaintenance, "cleanupExpiredTokens" | "getTokenStats">;
}

export default async function tokenRoutes(app: FastifyInstance, opts: TokenRoutesOptions) {
  const { maintenance } = opts;
  const config = { auth: true, permission: TOKENS_ADMIN_SCOPE };

  app.get("/stats", { config }, async (_req, reply) => {
    try {
      const stats = await maintenance.getTokenStats();
      return reply.send({
        active_tokens: stats.activeTokens,
        expired_tokens: stats.expiredTokens,
      });
    } catch (err) {
      if (sendTokenServiceError(reply, err)) return reply;
      throw err;
    }
  });

  app.post("/cleanup", { config }, async (req, reply) => {
    try {
      const deleted = await maintenance.cleanupExpiredTokens();
      req.log.info({ deleted, sub: req.user?.sub }, "token_cleanup_requested");
      return reply.send({ ok: true, deleted });
    } catch (err) {
      if (sendTokenServiceError(reply, err)) return reply;
      throw err;
    }
  });
}
