// ============================================================================
// src/libs/http.ts
// ----------------------------------------------------------------------------
// HTTP-Hilfsfunktionen
// ============================================================================
import type { FastifyRequest } from "fastify";

const HEALTH_PATHS = new Set(["/health", "/healthz", "/readyz"]);

/** Ermittelt, ob die Anfrage einen Health-Endpoint adressiert. */
export function isHealthPath(req: FastifyRequest): boolean {
  const path = (req.raw.url ?? "").split("?")[0] ?? "";
  return HEALTH_PATHS.has(path) || path.startsWith("/health/");
}

export function extractBearerToken(authHeader: string | string[] | undefined): string | null {
  // Fastify Header kann string|string[]|undefined sein
  const raw = Array.isArray(authHeader) ? authHeader[0] : authHeader;
  if (!raw) return null;

  // toleriert: "Bearer <token>", "bearer <token>", extra spaces
  const m = raw.match(/^\s*Bearer\s+(.+?)\s*$/i);
  const token = m?.[1]?.trim();
  return token && token.length > 0 ? token : null;
}

/** User-Agent als einzelner String, gekürzt für die Datenbank. */
export function userAgentOf(req: FastifyRequest, maxLength = 512): string | undefined {
  const ua = req.headers["user-agent"];
  return ua ? ua.slice(0, maxLength) : undefined;
}
