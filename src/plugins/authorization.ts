// src/plugins/authorization.ts
// ============================================================================
// Scope-Prüfung für Routen mit config.permission (läuft nach plugins/auth.ts)
// ============================================================================

import fp from "fastify-plugin";
import type { FastifyPluginAsync } from "fastify";
import { isHealthPath } from "../libs/http.js";
import { hasScope } from "../libs/jwt.js";
import { sendApiError } from "../libs/error-response.js";

const authorizationPlugin: FastifyPluginAsync = async (app) => {
  app.addHook("preHandler", async (request, reply) => {
    if (isHealthPath(request)) return;

    const required = request.routeOptions.config.permission?.trim();
    if (!required) return;

    if (!request.user) {
      return sendApiError(reply, 401, "UNAUTHORIZED", "Missing auth context.");
    }

    if (!hasScope(request.user, required)) {
      request.log.info({ sub: request.user.sub, required }, "permission_denied");
      return sendApiError(reply, 403, "PERMISSION_DENIED", "Missing required permission.");
    }
  });
};

export default fp(authorizationPlugin, { name: "authorization", dependencies: ["auth"] });
