// src/libs/jwt.ts
// ============================================================================
// JWT-Prüfung (JOSE) für Bearer-Tokens
// ----------------------------------------------------------------------------
// Design:
// - HS256 Symmetric Key, Rotation über aktiven + vorherigen Secret
// - typ="access", sub Pflicht, issuer/audience/exp werden von jose geprüft
// - Dieser Dienst stellt keine Access-Tokens aus, er prüft sie nur
// ============================================================================

import { jwtVerify, type JWTPayload } from "jose";

// ---------------------------------------------------------------------------
// Typdefinition Access-Token Payload
// ---------------------------------------------------------------------------

export interface AccessTokenPayload extends JWTPayload {
  sub: string;
  typ: "access";
  /** Leerzeichen-getrennte Scopes, z.B. "tokens:admin" */
  scope?: string;
}

export type AccessTokenVerifier = (token: string) => Promise<AccessTokenPayload>;

export interface AccessTokenVerifierOptions {
  activeSecret: string;
  previousSecret?: string;
  issuer: string;
  audience: string;
  clockToleranceSec?: number;
}

function toAccessTokenPayload(payload: JWTPayload): AccessTokenPayload {
  // typ muss stimmen
  if (payload.typ !== "access") {
    throw new Error("invalid_token_type");
  }

  const { sub } = payload;
  if (!sub) {
    throw new Error("sub_missing");
  }

  const scope = typeof payload.scope === "string" ? payload.scope : undefined;
  if (payload.scope !== undefined && scope === undefined) {
    throw new Error("scope_invalid");
  }

  return { ...payload, sub, typ: "access", scope };
}

// ---------------------------------------------------------------------------
// Verifier-Fabrik
// ---------------------------------------------------------------------------

export function createAccessTokenVerifier(opts: AccessTokenVerifierOptions): AccessTokenVerifier {
  const activeSecret = new TextEncoder().encode(opts.activeSecret);
  const previousSecret = opts.previousSecret
    ? new TextEncoder().encode(opts.previousSecret)
    : undefined;

  const verifyOptions = {
    issuer: opts.issuer,
    audience: opts.audience,
    algorithms: ["HS256"],
    clockTolerance: opts.clockToleranceSec ?? 0,
  };

  return async (token) => {
    let payload: JWTPayload;
    try {
      const verified = await jwtVerify(token, activeSecret, verifyOptions);
      payload = verified.payload;
    } catch (activeError) {
      if (!previousSecret) {
        throw activeError;
      }
      const verified = await jwtVerify(token, previousSecret, verifyOptions);
      payload = verified.payload;
    }

    return toAccessTokenPayload(payload);
  };
}

export function hasScope(payload: AccessTokenPayload, scope: string): boolean {
  return (payload.scope ?? "").split(/\s+/).includes(scope);
}
