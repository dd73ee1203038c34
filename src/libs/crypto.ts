// src/libs/crypto.ts
// ============================================================================
// Secret-Erzeugung, Hashing & Vergleich
// ----------------------------------------------------------------------------
// - generateNumericCode(): n-stelliger Zifferncode (Passwort-Reset)
// - generateOpaqueToken(): URL-sicheres Token mit >= 256 Bit (Link-Tokens)
// - hashSecret(): SHA-256 bzw. HMAC-SHA-256 mit Pepper, nie Klartext speichern
// - constantTimeEqual(): Vergleich ohne Timing-Seitenkanal
// ============================================================================

import { createHash, createHmac, randomBytes, randomInt, timingSafeEqual } from "node:crypto";
import { GenerationError } from "../modules/tokens/errors.js";

export const MIN_CODE_LENGTH = 1;
export const MAX_CODE_LENGTH = 10;
export const MIN_TOKEN_BYTES = 32; // 256 Bit

// ---------------------------------------------------------------------------
// Numerischer Code
// ---------------------------------------------------------------------------

/**
 * Gleichverteilt über [0, 10^length), links mit Nullen aufgefüllt.
 * randomInt nutzt das CSPRNG des Betriebssystems (kein Seed, keine Uhrzeit).
 */
export function generateNumericCode(length: number): string {
  if (!Number.isInteger(length) || length < MIN_CODE_LENGTH || length > MAX_CODE_LENGTH) {
    throw new GenerationError(
      `Code length must be an integer between ${MIN_CODE_LENGTH} and ${MAX_CODE_LENGTH}`,
    );
  }

  let value: number;
  try {
    value = randomInt(0, 10 ** length);
  } catch (err) {
    throw new GenerationError("Failed to generate numeric code", { cause: err });
  }

  return String(value).padStart(length, "0");
}

// ---------------------------------------------------------------------------
// Opaque-Token
// ---------------------------------------------------------------------------

export function generateOpaqueToken(bytes: number = MIN_TOKEN_BYTES): string {
  if (!Number.isInteger(bytes) || bytes < MIN_TOKEN_BYTES) {
    throw new GenerationError(`Opaque tokens need at least ${MIN_TOKEN_BYTES} random bytes`);
  }

  try {
    return randomBytes(bytes).toString("base64url");
  } catch (err) {
    throw new GenerationError("Failed to generate opaque token", { cause: err });
  }
}

// ---------------------------------------------------------------------------
// Hashing
// ---------------------------------------------------------------------------

export function hashSecret(secret: string, pepper?: string): string {
  if (pepper && pepper.length > 0) {
    return createHmac("sha256", pepper).update(secret, "utf8").digest("hex");
  }
  return createHash("sha256").update(secret, "utf8").digest("hex");
}

// ---------------------------------------------------------------------------
// Constant-Time-Vergleich
// ---------------------------------------------------------------------------

export function constantTimeEqual(a: string, b: string): boolean {
  const left = Buffer.from(a, "utf8");
  const right = Buffer.from(b, "utf8");

  if (left.length !== right.length) {
    // gleiche Arbeit wie im Erfolgsfall, Ergebnis bleibt false
    timingSafeEqual(left, left);
    return false;
  }

  return timingSafeEqual(left, right);
}
