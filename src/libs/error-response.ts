// src/libs/error-response.ts
// ============================================================================
// Einheitliches Fehlerformat: { status, error: { code, message }, details? }
// ============================================================================

import type { FastifyReply } from "fastify";
import { TokenServiceError } from "../modules/tokens/errors.js";

export type ApiErrorBody = {
  status: number;
  error: {
    code: string;
    message: string;
  };
  details?: unknown;
};

export function apiError(
  status: number,
  code: string,
  message: string,
  details?: unknown,
): ApiErrorBody {
  const base: ApiErrorBody = {
    status,
    error: {
      code,
      message,
    },
  };

  if (details !== undefined) {
    base.details = details;
  }

  return base;
}

export function sendApiError(
  reply: FastifyReply,
  status: number,
  code: string,
  message: string,
  details?: unknown,
) {
  return reply.code(status).send(apiError(status, code, message, details));
}

/**
 * Antwortet für bekannte Fehler der Token-Domäne.
 * Liefert false für alles andere, das dann beim Fastify-Error-Handler landet.
 */
export function sendTokenServiceError(reply: FastifyReply, err: unknown): boolean {
  if (!(err instanceof TokenServiceError)) {
    return false;
  }

  if (err.retryable) {
    reply.header("Retry-After", "5");
  }

  // Ursachen (Store/SMTP) bleiben im Log
  const message = err.statusCode >= 500 ? "Service temporarily unavailable." : err.message;
  void sendApiError(reply, err.statusCode, err.code, message);
  return true;
}
