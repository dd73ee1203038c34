// src/libs/env.ts
// ============================================================================
// Zentrale Umgebungsvariablen-Verwaltung (Docker + Secrets-first) mit Zod
// ----------------------------------------------------------------------------
// Ziele
// - Keine .env-Abhängigkeit (kein dotenv)
// - Secrets bevorzugt aus *_FILE (Docker secrets) lesen
// - Fail-fast nur beim echten Service-Start (nicht bei Test-Imports)
// - Keine Secret-Werte loggen (nur [set]/[unset])
//
// Hinweise
// - In PROD STARTUP_VALIDATE_ENV=1 setzen, damit fehlende kritische Variablen
//   sofort auffallen.
// - TOKEN_PEPPER sollte in PROD immer gesetzt sein: 6-stellige Codes sind
//   ohne Pepper bei einem DB-Leak offline durchprobierbar.
// ============================================================================

import { readFileSync } from "node:fs";
import { z } from "zod";

// ----------------------------------------------------------------------------
// Helpers: Secrets lesen
// ----------------------------------------------------------------------------

/**
 * Liest ein Secret aus einer Datei (Docker secrets: /run/secrets/*).
 * - trimmt Whitespace
 * - entfernt trailing newlines
 * - wirft Fehler, wenn Datei nicht lesbar / leer
 */
function readSecretFile(filePath: string | undefined, label: string): string | undefined {
  if (!filePath) return undefined;

  let value: string;
  try {
    value = readFileSync(filePath, "utf8");
  } catch (err) {
    throw new Error(`${label} nicht lesbar: ${filePath}`, { cause: err });
  }

  const trimmed = value.replace(/\r?\n+$/, "").trim();
  if (!trimmed) throw new Error(`${label} ist leer: ${filePath}`);

  return trimmed;
}

/**
 * Entscheidet: *_FILE wird bevorzugt gelesen, ENV ist Fallback.
 */
function resolveFromFileOrEnv(opts: {
  envValue?: string;
  filePath?: string;
  label: string;
}): string | undefined {
  const fromFile = readSecretFile(opts.filePath, opts.label);
  if (fromFile && fromFile.trim() !== "") return fromFile;
  if (opts.envValue && opts.envValue.trim() !== "") return opts.envValue;
  return undefined;
}

/**
 * Maskiert sensible Werte für Logs.
 */
function mask(value: unknown): string {
  if (value === undefined || value === null || value === "") return "[unset]";
  return "[set]";
}

// z.coerce.boolean() macht aus "false" ein true → explizit parsen
const booleanFlag = z
  .union([z.boolean(), z.string()])
  .transform((value) => {
    if (typeof value === "boolean") return value;
    return ["1", "true", "yes", "on"].includes(value.trim().toLowerCase());
  });

const csvList = z
  .string()
  .default("")
  .transform((value) =>
    value
      .split(",")
      .map((item) => item.trim().toLowerCase())
      .filter(Boolean),
  );

// ----------------------------------------------------------------------------
// Schema: erwartet ENV + optional *_FILE
// ----------------------------------------------------------------------------

const EnvSchema = z.object({
  // --------------------------------------------------------------------------
  // Laufzeit / Server
  // --------------------------------------------------------------------------
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  HOST: z.string().default("0.0.0.0"),
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  CORS_ORIGIN: z.string().default("*"),
  REQUEST_ID_HEADER: z.string().default("x-request-id"),
  TRUST_PROXY: booleanFlag.default(true),

  // --------------------------------------------------------------------------
  // Store
  // - postgres: auth.email_tokens + auth.users (sql/001_email_tokens.sql)
  // - memory: nur für lokale Entwicklung, Daten gehen beim Neustart verloren
  // --------------------------------------------------------------------------
  STORE_DRIVER: z.enum(["postgres", "memory"]).default("postgres"),
  DATABASE_URL: z.string().optional(),

  // --------------------------------------------------------------------------
  // Redis (optional)
  // - HTTP-Rate-Limit clusterweit
  // - Fixed-Window-Zähler für Token-Ausgabe (TOKEN_RATE_LIMIT_STRATEGY=fixed)
  // --------------------------------------------------------------------------
  REDIS_URL: z.string().optional(),
  REDIS_PASSWORD: z.string().optional(),
  REDIS_NAMESPACE: z.string().default("tokens"),

  // --------------------------------------------------------------------------
  // HTTP-Rate-Limit (pro IP)
  // --------------------------------------------------------------------------
  RATE_LIMIT_WINDOW: z.coerce.number().int().positive().default(60),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(60),

  // --------------------------------------------------------------------------
  // Token-Policy
  // --------------------------------------------------------------------------
  TOKEN_RATE_LIMIT_STRATEGY: z.enum(["sliding", "fixed"]).default("sliding"),
  TOKEN_ISSUE_MAX: z.coerce.number().int().positive().default(3),
  TOKEN_ISSUE_WINDOW_SEC: z.coerce.number().int().positive().default(60 * 60),
  PASSWORD_RESET_CODE_LENGTH: z.coerce.number().int().min(1).max(10).default(6),
  PASSWORD_RESET_TTL_SEC: z.coerce.number().int().positive().default(15 * 60),
  EMAIL_VERIFY_TTL_SEC: z.coerce.number().int().positive().default(48 * 60 * 60),
  USED_TOKEN_RETENTION_SEC: z.coerce.number().int().positive().default(7 * 24 * 60 * 60),
  // 0 = kein periodischer Cleanup im Prozess (z. B. wenn ein Cronjob läuft)
  TOKEN_CLEANUP_INTERVAL_SEC: z.coerce.number().int().min(0).default(60 * 60),
  TOKEN_PEPPER: z.string().optional(),
  EMAIL_BLOCKED_DOMAINS: csvList,
  VERIFICATION_BASE_URL: z.string().url().default("http://localhost:5173/verify-email"),

  // --------------------------------------------------------------------------
  // SMTP / Mail (in DEV kann Mailpit laufen)
  // --------------------------------------------------------------------------
  SMTP_HOST: z.string().default("localhost"),
  SMTP_PORT: z.coerce.number().int().default(1025),
  SMTP_SECURE: booleanFlag.default(false),
  SMTP_USER: z.string().optional(),
  SMTP_PASS: z.string().optional(),
  SMTP_FROM: z.string().default("Token Service <no-reply@localhost.test>"),
  MAIL_APP_NAME: z.string().default("Token Service"),

  // --------------------------------------------------------------------------
  // JWT (nur Verifikation von Bearer-Tokens; Ausstellung macht der Identity-Service)
  // - active/previous erlaubt Secret-Rotation ohne Downtime
  // --------------------------------------------------------------------------
  JWT_SECRET_ACTIVE: z.string().optional(),
  JWT_SECRET_PREVIOUS: z.string().optional(),
  JWT_ISSUER: z.string().default("identity"),
  JWT_AUDIENCE: z.string().default("app-client"),
  JWT_CLOCK_SKEW_SEC: z.coerce.number().int().min(0).max(300).default(60),

  // --------------------------------------------------------------------------
  // Startup-Validation Switch (nur als String; wir interpretieren unten)
  // --------------------------------------------------------------------------
  STARTUP_VALIDATE_ENV: z.string().optional(),
});

export type Env = z.infer<typeof EnvSchema>;

type EnvSource = Record<string, string | undefined>;

// ----------------------------------------------------------------------------
// Parse: *_FILE → konkrete Werte, danach Schema
// ----------------------------------------------------------------------------

export function parseEnv(source: EnvSource = process.env): Env {
  return EnvSchema.parse({
    ...source,
    DATABASE_URL: resolveFromFileOrEnv({
      envValue: source.DATABASE_URL,
      filePath: source.DATABASE_URL_FILE,
      label: "DATABASE_URL_FILE",
    }),
    REDIS_PASSWORD: resolveFromFileOrEnv({
      envValue: source.REDIS_PASSWORD,
      filePath: source.REDIS_PASSWORD_FILE,
      label: "REDIS_PASSWORD_FILE",
    }),
    SMTP_USER: resolveFromFileOrEnv({
      envValue: source.SMTP_USER,
      filePath: source.SMTP_USER_FILE,
      label: "SMTP_USER_FILE",
    }),
    SMTP_PASS: resolveFromFileOrEnv({
      envValue: source.SMTP_PASS,
      filePath: source.SMTP_PASS_FILE,
      label: "SMTP_PASS_FILE",
    }),
    TOKEN_PEPPER: resolveFromFileOrEnv({
      envValue: source.TOKEN_PEPPER,
      filePath: source.TOKEN_PEPPER_FILE,
      label: "TOKEN_PEPPER_FILE",
    }),
    JWT_SECRET_ACTIVE: resolveFromFileOrEnv({
      envValue: source.JWT_SECRET_ACTIVE,
      filePath: source.JWT_SECRET_ACTIVE_FILE,
      label: "JWT_SECRET_ACTIVE_FILE",
    }),
    JWT_SECRET_PREVIOUS: resolveFromFileOrEnv({
      envValue: source.JWT_SECRET_PREVIOUS,
      filePath: source.JWT_SECRET_PREVIOUS_FILE,
      label: "JWT_SECRET_PREVIOUS_FILE",
    }),
  });
}

/**
 * Prüft die Kombinationen, die das Schema allein nicht ausdrücken kann.
 * Wirft beim ersten Problem.
 */
export function assertStartupEnv(value: Env): void {
  if (value.STORE_DRIVER === "postgres" && !value.DATABASE_URL) {
    throw new Error("DATABASE_URL fehlt: setze DATABASE_URL oder DATABASE_URL_FILE.");
  }

  if (value.TOKEN_RATE_LIMIT_STRATEGY === "fixed" && !value.REDIS_URL) {
    throw new Error("TOKEN_RATE_LIMIT_STRATEGY=fixed braucht REDIS_URL.");
  }

  if (!value.JWT_SECRET_ACTIVE) {
    throw new Error("JWT Secret fehlt: setze JWT_SECRET_ACTIVE oder JWT_SECRET_ACTIVE_FILE.");
  }

  if (value.NODE_ENV === "production" && value.STORE_DRIVER === "memory") {
    throw new Error("STORE_DRIVER=memory ist in Production nicht erlaubt.");
  }

  if (value.NODE_ENV === "production" && !value.TOKEN_PEPPER) {
    // eslint-disable-next-line no-console
    console.warn("[env] WARNUNG: TOKEN_PEPPER ist in Production nicht gesetzt.");
  }
}

export const env = parseEnv();

// ----------------------------------------------------------------------------
// Fail-fast: nur wenn Service wirklich startet
// ----------------------------------------------------------------------------
//
// Vitest importiert Module, bevor Setup-Dateien laufen → nicht in test crashen.
//
// Schalter:
// - STARTUP_VALIDATE_ENV=1 -> immer validieren (typisch im Container)
// - sonst: validate in development/production, nicht in test
//
const shouldValidate =
  process.env.STARTUP_VALIDATE_ENV === "1" ? true : env.NODE_ENV !== "test";

if (shouldValidate) {
  assertStartupEnv(env);
}

// ----------------------------------------------------------------------------
// Debug-Ausgabe ohne Secrets
// ----------------------------------------------------------------------------

export function envSummary(value: Env = env): Record<string, unknown> {
  return {
    NODE_ENV: value.NODE_ENV,
    HOST: value.HOST,
    PORT: value.PORT,
    LOG_LEVEL: value.LOG_LEVEL,
    TRUST_PROXY: value.TRUST_PROXY,

    STORE_DRIVER: value.STORE_DRIVER,
    DATABASE_URL: mask(value.DATABASE_URL),
    REDIS_URL: mask(value.REDIS_URL),
    REDIS_NAMESPACE: value.REDIS_NAMESPACE,

    RATE_LIMIT_WINDOW: value.RATE_LIMIT_WINDOW,
    RATE_LIMIT_MAX: value.RATE_LIMIT_MAX,

    TOKEN_RATE_LIMIT_STRATEGY: value.TOKEN_RATE_LIMIT_STRATEGY,
    TOKEN_ISSUE_MAX: value.TOKEN_ISSUE_MAX,
    TOKEN_ISSUE_WINDOW_SEC: value.TOKEN_ISSUE_WINDOW_SEC,
    PASSWORD_RESET_TTL_SEC: value.PASSWORD_RESET_TTL_SEC,
    EMAIL_VERIFY_TTL_SEC: value.EMAIL_VERIFY_TTL_SEC,
    USED_TOKEN_RETENTION_SEC: value.USED_TOKEN_RETENTION_SEC,
    TOKEN_CLEANUP_INTERVAL_SEC: value.TOKEN_CLEANUP_INTERVAL_SEC,
    TOKEN_PEPPER: mask(value.TOKEN_PEPPER),
    EMAIL_BLOCKED_DOMAINS: value.EMAIL_BLOCKED_DOMAINS.length,
    VERIFICATION_BASE_URL: value.VERIFICATION_BASE_URL,

    SMTP_HOST: value.SMTP_HOST,
    SMTP_PORT: value.SMTP_PORT,
    SMTP_SECURE: value.SMTP_SECURE,
    SMTP_USER: mask(value.SMTP_USER),
    SMTP_PASS: mask(value.SMTP_PASS),
    SMTP_FROM: value.SMTP_FROM,

    JWT_SECRET_ACTIVE: mask(value.JWT_SECRET_ACTIVE),
    JWT_SECRET_PREVIOUS: mask(value.JWT_SECRET_PREVIOUS),
    JWT_ISSUER: value.JWT_ISSUER,
    JWT_AUDIENCE: value.JWT_AUDIENCE,
    JWT_CLOCK_SKEW_SEC: value.JWT_CLOCK_SKEW_SEC,
  };
}
