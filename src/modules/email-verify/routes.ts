// src/modules/email-verify/routes.ts
// ============================================================================
// E-Mail-Verifikations-Routen als Fastify-Plugin
// ----------------------------------------------------------------------------
// - POST /auth/email/verify/request   → Verify-Mail anstoßen (Bearer Pflicht)
// - GET  /auth/email/verify/confirm   → Verify-Token einlösen
//
// Sicherheit / Datenschutz:
// - user_id kommt aus dem verifizierten JWT, nie aus dem Body
// - Tokens werden nicht geloggt
// ============================================================================

import type { FastifyInstance, FastifyPluginOptions } from "fastify";
import { z } from "zod";

import { sendApiError, sendTokenServiceError } from "../../libs/error-response.js";
import { userAgentOf } from "../../libs/http.js";
import type { TokenManager } from "../tokens/service.js";

// ---------------------------------------------------------------------------
// Zod-Schemas
// ---------------------------------------------------------------------------

// POST /auth/email/verify/request
const VerifyRequestBodySchema = z.object({
  email: z.string().min(1, "E-Mail ist Pflicht.").max(320),
  name: z.string().trim().min(1).max(120).optional(),
});

type VerifyRequestBody = z.infer<typeof VerifyRequestBodySchema>;

// GET /auth/email/verify/confirm?token=...
const VerifyConfirmQuerySchema = z.object({
  token: z.string().min(1, "Token ist Pflicht.").max(512),
});

type VerifyConfirmQuery = z.infer<typeof VerifyConfirmQuerySchema>;

export interface EmailVerifyRoutesOptions extends FastifyPluginOptions {
  tokenManager: Pick<TokenManager, "requestEmailVerification" | "verifyEmailToken">;
}

// ---------------------------------------------------------------------------
// Routen-Plugin
// ---------------------------------------------------------------------------
//
// Registrierung in app.ts:
//
//   await app.register(emailVerifyRoutes, { prefix: "/auth/email", tokenManager });
// ---------------------------------------------------------------------------

export default async function emailVerifyRoutes(
  app: FastifyInstance,
  opts: EmailVerifyRoutesOptions,
) {
  const { tokenManager } = opts;

  // -------------------------------------------------------------------------
  // POST /auth/email/verify/request
  // -------------------------------------------------------------------------
  app.post<{ Body: VerifyRequestBody }>(
    "/verify/request",
    { config: { auth: true } },
    async (req, reply) => {
      const parsed = VerifyRequestBodySchema.safeParse(req.body);
      if (!parsed.success) {
        return sendApiError(
          reply,
          400,
          "VALIDATION_FAILED",
          "Ungültige Eingabe für E-Mail-Verifikation.",
          parsed.error.flatten(),
        );
      }

      try {
        const result = await tokenManager.requestEmailVerification({
          userId: req.user?.sub ?? "",
          email: parsed.data.email,
          name: parsed.data.name,
          requestIp: req.ip,
          userAgent: userAgentOf(req),
        });

        return reply.code(202).send({
          requestAccepted: result.requestAccepted,
          expires_at: result.expiresAt.toISOString(),
        });
      } catch (err) {
        if (sendTokenServiceError(reply, err)) return reply;
        throw err;
      }
    },
  );

  // -------------------------------------------------------------------------
  // GET /auth/email/verify/confirm?token=...
  // -------------------------------------------------------------------------
  app.get<{ Querystring: VerifyConfirmQuery }>("/verify/confirm", async (req, reply) => {
    const parsed = VerifyConfirmQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return sendApiError(
        reply,
        400,
        "VALIDATION_FAILED",
        "Ungültiger Verifikations-Link.",
        parsed.error.flatten(),
      );
    }

    try {
      const result = await tokenManager.verifyEmailToken(parsed.data.token);
      return reply.send({
        verified: true,
        user_id: result.userId,
        already_verified: result.alreadyVerified,
      });
    } catch (err) {
      if (sendTokenServiceError(reply, err)) return reply;
      throw err;
    }
  });
}
