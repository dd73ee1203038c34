// src/plugins/auth.ts
// ============================================================================
// Auth-Plugin (Fastify)
// ----------------------------------------------------------------------------
// - Für Routes mit config.auth === true:
//   - Bearer Token extrahieren
//   - Access Token über den injizierten Verifier prüfen
//   - req.user setzen (Auth-Context)
// - Health/System-Pfade bleiben immer ohne Auth möglich
// ============================================================================

import fp from "fastify-plugin";
import type { FastifyPluginAsync } from "fastify";
import { extractBearerToken, isHealthPath } from "../libs/http.js";
import type { AccessTokenVerifier } from "../libs/jwt.js";
import { sendApiError } from "../libs/error-response.js";

export interface AuthPluginOptions {
  verifyAccessToken: AccessTokenVerifier;
}

const authPlugin: FastifyPluginAsync<AuthPluginOptions> = async (app, opts) => {
  app.decorateRequest("user", undefined);

  app.addHook("preHandler", async (req, reply) => {
    // 1) Health niemals blockieren
    if (isHealthPath(req)) return;

    // 2) Nur Routen mit auth=true absichern
    if (req.routeOptions.config.auth !== true) return;

    // 3) Token aus Authorization Header
    const token = extractBearerToken(req.headers.authorization);

    if (!token) {
      reply.header("WWW-Authenticate", 'Bearer realm="token-service"');
      return sendApiError(reply, 401, "MISSING_TOKEN", "Missing bearer token.");
    }

    try {
      req.user = await opts.verifyAccessToken(token);
    } catch (err) {
      // Keine internen Fehler nach außen leaken
      req.log.debug({ err }, "bearer_token_rejected");
      reply.header("WWW-Authenticate", 'Bearer error="invalid_token"');
      return sendApiError(reply, 401, "UNAUTHORIZED", "Invalid bearer token.");
    }
  });
};

export default fp(authPlugin, { name: "auth" });
