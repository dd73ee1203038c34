// src/libs/db.ts
// ============================================================================
// PostgreSQL Connector
// - Pool wird explizit erzeugt (server.ts / Scripts) und weitergereicht,
//   kein Modul-Singleton
// - Healthcheck-Funktionen für /health & Startup-Checks
// ============================================================================

import pg from "pg";

const { Pool } = pg;

// ============================================================================
// Typen
// ============================================================================

export type DbPool = pg.Pool;

/**
 * Minimale Query-Schnittstelle, die Repositories brauchen.
 * Pool und PoolClient erfüllen sie, Tests können sie mit vi.fn() bedienen.
 */
export type SqlExecutor = Pick<pg.Pool, "query">;

/** Wie SqlExecutor, plus eigener Client für Transaktionen (BEGIN/COMMIT) */
export type SqlPool = Pick<pg.Pool, "query" | "connect">;

export type SqlClient = pg.PoolClient;

// ============================================================================
// Connection-Pool
// ============================================================================

/**
 * Hinweise:
 * - max: maximale Anzahl gleichzeitiger Verbindungen im Pool
 * - idleTimeoutMillis: wie lange ein ungenutzter Client offen bleibt
 * - connectionTimeoutMillis: Timeout für Verbindungsaufbau
 */
export function createPool(connectionString: string): DbPool {
  return new Pool({
    connectionString,
    max: 10,
    idleTimeoutMillis: 10_000,
    connectionTimeoutMillis: 5_000,
  });
}

// ============================================================================
// Healthcheck für /health
// ============================================================================

export async function dbHealth(db: SqlExecutor): Promise<{ ok: boolean; error?: string }> {
  try {
    await db.query("SELECT 1;");
    return { ok: true };
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : "unknown database error";

    return {
      ok: false,
      error: message,
    };
  }
}

/**
 * @throws Error wenn die Datenbank nicht erreichbar ist
 */
export async function checkDb(db: SqlExecutor): Promise<void> {
  const { ok, error } = await dbHealth(db);
  if (!ok) {
    throw new Error(`[DB] Healthcheck failed: ${error ?? "unknown"}`);
  }
}
