// src/scripts/run-housekeeping.ts
// ============================================================================
// Einmaliger Wartungslauf für auth.email_tokens (Cronjob-tauglich)
// - löscht abgelaufene + alte benutzte Tokens und alte Ausgabe-Versuche
// - gibt danach die Token-Statistik aus
//
// Aufruf: node dist/scripts/run-housekeeping.js [--retention-days=7] [--stats-only]
// ENV:    MAINTENANCE_DATABASE_URL (sonst DATABASE_URL), LOG_LEVEL,
//         USED_TOKEN_RETENTION_SEC
// ============================================================================

import { createPool } from "../libs/db.js";
import { createLogger } from "../libs/logger.js";
import { TokenMaintenance } from "../modules/tokens/maintenance.js";
import { PgTokenStore } from "../modules/tokens/repository.js";
import { parseHousekeepingConfig } from "./housekeeping-config.js";

async function main() {
  const config = parseHousekeepingConfig();
  const log = createLogger(config.logLevel, "token-housekeeping");

  const pool = createPool(config.connectionString);
  const maintenance = new TokenMaintenance({
    store: new PgTokenStore(pool),
    logger: log,
    usedRetentionMs: config.usedRetentionMs,
  });

  try {
    if (!config.statsOnly) {
      await maintenance.cleanupExpiredTokens();
    }

    const stats = await maintenance.getTokenStats();
    log.info({ stats }, "token_stats");
  } finally {
    await pool.end();
  }
}

main().catch((err: unknown) => {
  console.error("housekeeping_failed", err);
  process.exit(1);
});
