// src/libs/logger.ts
// ============================================================================
// Logger für Kern-Module (pino, gleiche Engine wie der Fastify-Logger)
// - Fastify baut seinen Request-Logger selbst (buildApp({ logLevel }))
// - Codes, Tokens, Passwörter tauchen in keinem Log-Feld auf
// ============================================================================

import { pino, type Logger, type LevelWithSilent } from "pino";

export type { Logger };

export function createLogger(level: LevelWithSilent = "info", name = "token-service"): Logger {
  return pino({
    name,
    level,
    redact: {
      paths: ["code", "token", "password", "*.token", "*.password"],
      censor: "[redacted]",
    },
  });
}
