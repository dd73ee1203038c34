// src/scripts/housekeeping-config.ts
// ============================================================================
// Konfiguration für den Wartungslauf (Cronjob / Einmal-Container)
// ----------------------------------------------------------------------------
// Liest nur die Variablen, die der Lauf braucht, direkt aus process.env.
// Die Service-Pflichtwerte (JWT-Secret, SMTP, ...) spielen hier keine Rolle.
// ============================================================================

import type { LevelWithSilent } from "pino";
import { z } from "zod";

const DAY_MS = 24 * 60 * 60 * 1000;

const HousekeepingEnvSchema = z.object({
  MAINTENANCE_DATABASE_URL: z.string().min(1).optional(),
  DATABASE_URL: z.string().min(1).optional(),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  USED_TOKEN_RETENTION_SEC: z.coerce.number().int().positive().default(7 * 24 * 60 * 60),
});

export interface HousekeepingConfig {
  connectionString: string;
  logLevel: LevelWithSilent;
  usedRetentionMs: number;
  statsOnly: boolean;
}

function readArg(argv: readonly string[], name: string): string | undefined {
  const prefix = `--${name}=`;
  const arg = argv.find((value) => value.startsWith(prefix));
  return arg ? arg.slice(prefix.length) : undefined;
}

export function parseHousekeepingConfig(
  argv: readonly string[] = process.argv,
  source: Record<string, string | undefined> = process.env,
): HousekeepingConfig {
  const env = HousekeepingEnvSchema.parse(source);

  const connectionString = env.MAINTENANCE_DATABASE_URL ?? env.DATABASE_URL;
  if (!connectionString) {
    throw new Error("Missing MAINTENANCE_DATABASE_URL or DATABASE_URL for housekeeping run.");
  }

  const retentionDays = readArg(argv, "retention-days");
  const usedRetentionMs =
    retentionDays === undefined ? env.USED_TOKEN_RETENTION_SEC * 1000 : Number(retentionDays) * DAY_MS;
  if (!Number.isFinite(usedRetentionMs) || usedRetentionMs < 0) {
    throw new Error(`Invalid --retention-days: ${retentionDays ?? ""}`);
  }

  return {
    connectionString,
    logLevel: env.LOG_LEVEL,
    usedRetentionMs,
    statsOnly: argv.includes("--stats-only"),
  };
}
