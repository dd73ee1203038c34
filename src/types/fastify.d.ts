// src/types/fastify.d.ts
// ============================================================================
// Fastify Type Augmentation
// ----------------------------------------------------------------------------
// - request.user: verifiziertes JWT (AccessTokenPayload), gesetzt von plugins/auth.ts
// - Route Config: config.auth / config.permission
//
// Hinweis:
// - Sie sollte KEINE Runtime-Imports auslösen (nur Type-Imports).
// ============================================================================

import "fastify";

declare module "fastify" {
  interface FastifyContextConfig {
    /** Wenn true: Authorization Bearer Token Pflicht (plugins/auth.ts) */
    auth?: boolean;

    /** Erforderlicher Scope im Access-Token (plugins/authorization.ts) */
    permission?: string;
  }

  interface FastifyRequest {
    /**
     * Verifizierter JWT-Payload (nur vorhanden, wenn Route config.auth === true
     * und plugins/auth.ts den Token akzeptiert hat).
     */
    user?: import("../libs/jwt.js").AccessTokenPayload;
  }
}
