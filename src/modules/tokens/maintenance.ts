// src/modules/tokens/maintenance.ts
// ============================================================================
// Wartung für auth.email_tokens
// ----------------------------------------------------------------------------
// - cleanupExpiredTokens(): abgelaufene + alte benutzte Datensätze löschen
// - getTokenStats(): rein lesend
// - scheduleTokenCleanup(): Intervall im Prozess (server.ts), alternativ
//   src/scripts/run-housekeeping.ts als Cronjob
// ============================================================================

import type { Logger } from "pino";
import { StoreError } from "./errors.js";
import type { TokenStats, TokenStore } from "./types.js";

export const DEFAULT_USED_RETENTION_MS = 7 * 24 * 60 * 60 * 1000;

export interface TokenMaintenanceDeps {
  store: Pick<TokenStore, "deleteExpiredOrStale" | "getStats">;
  logger: Logger;
  /** Wie lange benutzte Tokens für Audits liegen bleiben */
  usedRetentionMs?: number;
}

export class TokenMaintenance {
  private readonly store: TokenMaintenanceDeps["store"];
  private readonly log: Logger;
  private readonly usedRetentionMs: number;

  constructor(deps: TokenMaintenanceDeps) {
    this.store = deps.store;
    this.log = deps.logger.child({ module: "tokens.maintenance" });
    this.usedRetentionMs = deps.usedRetentionMs ?? DEFAULT_USED_RETENTION_MS;
  }

  async cleanupExpiredTokens(): Promise<number> {
    const now = new Date();
    const usedBefore = new Date(now.getTime() - this.usedRetentionMs);

    let deleted: number;
    try {
      deleted = await this.store.deleteExpiredOrStale(now, usedBefore);
    } catch (err) {
      throw new StoreError("Token store failed: deleteExpiredOrStale", { cause: err });
    }

    this.log.info({ deleted }, "token_cleanup_done");
    return deleted;
  }

  async getTokenStats(): Promise<TokenStats> {
    try {
      return await this.store.getStats(new Date());
    } catch (err) {
      throw new StoreError("Token store failed: getStats", { cause: err });
    }
  }
}

// ---------------------------------------------------------------------------
// Zeitgesteuerte Bereinigung
// ---------------------------------------------------------------------------

export interface CleanupSchedule {
  stop(): void;
}

export function scheduleTokenCleanup(
  maintenance: Pick<TokenMaintenance, "cleanupExpiredTokens">,
  options: { intervalMs: number; logger: Logger },
): CleanupSchedule {
  let running = false;

  const tick = async (): Promise<void> => {
    // Läufe überlappen nicht
    if (running) return;
    running = true;
    try {
      await maintenance.cleanupExpiredTokens();
    } catch (err) {
      options.logger.error({ err }, "token_cleanup_failed");
    } finally {
      running = false;
    }
  };

  const timer = setInterval(() => {
    void tick();
  }, options.intervalMs);
  timer.unref();

  return {
    stop() {
      clearInterval(timer);
    },
  };
}
