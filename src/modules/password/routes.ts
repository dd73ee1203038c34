// src/modules/password/routes.ts
// ============================================================================
// Fastify-Routen für den Passwort-Reset-Code
// ----------------------------------------------------------------------------
// - POST /auth/password/forgot    → 6-stelligen Code anfordern
// - POST /auth/password/verify    → Code einlösen
//
// Sicherheit / Datenschutz:
// - Strikte Eingabevalidierung mit Zod
// - Keine Aussage, ob eine E-Mail existiert (bei /forgot immer 202, auch wenn
//   der Versand scheitert: nur bekannte E-Mails lösen einen Versand aus)
// - /verify unterscheidet nicht zwischen falschem und abgelaufenem Code
// - Codes werden nicht geloggt
// ============================================================================

import type { FastifyInstance, FastifyPluginOptions } from "fastify";
import { z } from "zod";

import { sendApiError, sendTokenServiceError } from "../../libs/error-response.js";
import { userAgentOf } from "../../libs/http.js";
import { InvalidTokenError, NotifyError, TokenExpiredError } from "../tokens/errors.js";
import type { TokenManager } from "../tokens/service.js";

// ---------------------------------------------------------------------------
// Zod-Schemas
// ---------------------------------------------------------------------------

// POST /auth/password/forgot
const ForgotPasswordBodySchema = z.object({
  email: z.string().min(1, "E-Mail ist Pflicht.").max(320),
});

type ForgotPasswordBody = z.infer<typeof ForgotPasswordBodySchema>;

// POST /auth/password/verify
const VerifyCodeBodySchema = z.object({
  email: z.string().min(1, "E-Mail ist Pflicht.").max(320),
  code: z
    .string()
    .trim()
    .regex(/^\d{1,10}$/, "Code muss aus Ziffern bestehen."),
});

type VerifyCodeBody = z.infer<typeof VerifyCodeBodySchema>;

export interface PasswordRoutesOptions extends FastifyPluginOptions {
  tokenManager: Pick<TokenManager, "requestPasswordReset" | "verifyPasswordResetCode">;
  /** Versuche pro IP und Minute auf /verify */
  verifyMaxPerMinute?: number;
}

// ---------------------------------------------------------------------------
// Routen-Plugin
// ---------------------------------------------------------------------------
//
// Registrierung in app.ts:
//
//   await app.register(passwordRoutes, { prefix: "/auth/password", tokenManager });
// ---------------------------------------------------------------------------

export default async function passwordRoutes(app: FastifyInstance, opts: PasswordRoutesOptions) {
  const { tokenManager } = opts;

  // -------------------------------------------------------------------------
  // POST /auth/password/forgot
  // -------------------------------------------------------------------------
  app.post<{ Body: ForgotPasswordBody }>("/forgot", async (req, reply) => {
    const parsed = ForgotPasswordBodySchema.safeParse(req.body);
    if (!parsed.success) {
      return sendApiError(
        reply,
        400,
        "VALIDATION_FAILED",
        "Ungültige Eingabe für Passwort-Reset.",
        parsed.error.flatten(),
      );
    }

    try {
      const result = await tokenManager.requestPasswordReset({
        email: parsed.data.email,
        requestIp: req.ip,
        userAgent: userAgentOf(req),
      });
      return reply.code(202).send(result);
    } catch (err) {
      if (err instanceof NotifyError) {
        req.log.error({ err }, "password_reset_notify_failed");
        return reply.code(202).send({ requestAccepted: true });
      }
      if (sendTokenServiceError(reply, err)) return reply;
      throw err;
    }
  });

  // -------------------------------------------------------------------------
  // POST /auth/password/verify
  // -------------------------------------------------------------------------
  app.post<{ Body: VerifyCodeBody }>(
    "/verify",
    {
      config: {
        rateLimit: { max: opts.verifyMaxPerMinute ?? 10, timeWindow: "1 minute" },
      },
    },
    async (req, reply) => {
      const parsed = VerifyCodeBodySchema.safeParse(req.body);
      if (!parsed.success) {
        return sendApiError(
          reply,
          400,
          "VALIDATION_FAILED",
          "Ungültige Eingabe für Code-Prüfung.",
          parsed.error.flatten(),
        );
      }

      try {
        const result = await tokenManager.verifyPasswordResetCode(parsed.data);
        return reply.send({ verified: true, user_id: result.userId });
      } catch (err) {
        // falsch und abgelaufen sehen von außen gleich aus
        if (err instanceof InvalidTokenError || err instanceof TokenExpiredError) {
          req.log.info({ reason: err.code }, "password_reset_verify_rejected");
          return sendApiError(reply, 400, "INVALID_TOKEN", "Invalid or expired code.");
        }
        if (sendTokenServiceError(reply, err)) return reply;
        throw err;
      }
    },
  );
}
