// src/libs/mail.ts
// ============================================================================
// SMTP / Mailpit-Integration
// ----------------------------------------------------------------------------
// - Transporter wird explizit aus der Konfiguration gebaut (kein Singleton)
// - Healthcheck via transporter.verify()
// ============================================================================

import nodemailer, { type Transporter } from "nodemailer";

export interface SmtpOptions {
  host: string;
  port: number;
  secure: boolean;
  user?: string;
  pass?: string;
}

export type MailTransport = Transporter;

export function createMailTransport(opts: SmtpOptions): MailTransport {
  return nodemailer.createTransport({
    host: opts.host,
    port: opts.port,
    secure: opts.secure,
    auth:
      opts.user && opts.pass
        ? {
            user: opts.user,
            pass: opts.pass,
          }
        : undefined,
  });
}

// Health-Check für /health
export async function mailHealth(transport: MailTransport): Promise<{
  ok: boolean;
  reason?: string;
}> {
  try {
    await transport.verify();
    return { ok: true };
  } catch (err: unknown) {
    return {
      ok: false,
      reason: err instanceof Error ? err.message : "smtp_verify_failed",
    };
  }
}
