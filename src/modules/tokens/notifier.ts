// src/modules/tokens/notifier.ts
// ============================================================================
// SMTP-Notifier (nodemailer)
// ----------------------------------------------------------------------------
// - Reiner Text, kein HTML-Templating
// - Fehler gehen unverändert nach oben, kein Retry an dieser Stelle
// - Header gegen Auto-Responder (Abwesenheitsnotizen etc.)
// ============================================================================

import type { MailTransport } from "../../libs/mail.js";
import type {
  EmailVerificationNotification,
  Notifier,
  PasswordResetNotification,
} from "./types.js";

export interface SmtpNotifierOptions {
  from: string;
  appName: string;
}

const AUTH_MAIL_HEADERS = {
  "X-Auto-Response-Suppress": "All",
  "Auto-Submitted": "auto-generated",
};

function minutesUntil(expiresAt: Date, from: Date): number {
  return Math.max(1, Math.round((expiresAt.getTime() - from.getTime()) / 60_000));
}

export class SmtpNotifier implements Notifier {
  constructor(
    private readonly transport: MailTransport,
    private readonly options: SmtpNotifierOptions,
  ) {}

  async sendPasswordResetCode(message: PasswordResetNotification): Promise<void> {
    const { context } = message;
    const validMinutes = minutesUntil(message.expiresAt, context.requestedAt);

    const text = [
      `Your ${this.options.appName} password reset code is: ${message.code}`,
      "",
      `The code is valid for ${validMinutes} minutes and can be used once.`,
      "",
      "Request details:",
      `  Time: ${context.requestedAt.toISOString()}`,
      `  IP address: ${context.requestIp ?? "unknown"}`,
      `  Device: ${context.userAgent ?? "unknown"}`,
      "",
      "If you did not request a password reset, you can ignore this email.",
    ].join("\n");

    await this.transport.sendMail({
      from: this.options.from,
      to: message.to,
      subject: `${this.options.appName}: password reset code`,
      text,
      headers: AUTH_MAIL_HEADERS,
    });
  }

  async sendEmailVerification(message: EmailVerificationNotification): Promise<void> {
    const greeting = message.name ? `Hello ${message.name},` : "Hello,";

    const text = [
      greeting,
      "",
      `please confirm your email address for ${this.options.appName}:`,
      "",
      message.verificationUrl,
      "",
      `The link expires at ${message.expiresAt.toISOString()}.`,
    ].join("\n");

    await this.transport.sendMail({
      from: this.options.from,
      to: message.to,
      subject: `${this.options.appName}: confirm your email address`,
      text,
      headers: AUTH_MAIL_HEADERS,
    });
  }
}
