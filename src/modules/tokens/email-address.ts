// src/modules/tokens/email-address.ts
// ============================================================================
// E-Mail-Validierung & Normalisierung
// ----------------------------------------------------------------------------
// - Syntax via Zod, danach trim + lowercase (Rate-Limit-Key & Lookup)
// - CR/LF → Header-Injection in Mails verhindern
// - Nicht routbare / interne Domains und IP-Literale werden abgelehnt
// ============================================================================

import { isIP } from "node:net";
import { z } from "zod";
import { InvalidEmailError } from "./errors.js";

const EmailSchema = z.string().trim().toLowerCase().max(254).email();

const BLOCKED_DOMAIN_SUFFIXES = [
  "localhost",
  "localdomain",
  "local",
  "internal",
  "intranet",
  "lan",
  "home.arpa",
  "invalid",
] as const;

export function isBlockedEmailDomain(
  domain: string,
  extraBlocked: readonly string[] = [],
): boolean {
  const host = domain.trim().toLowerCase().replace(/^\[/, "").replace(/\]$/, "");
  if (isIP(host) !== 0) return true;

  return [...BLOCKED_DOMAIN_SUFFIXES, ...extraBlocked].some(
    (blocked) => host === blocked || host.endsWith(`.${blocked}`),
  );
}

/**
 * Liefert die normalisierte Adresse oder wirft InvalidEmailError.
 */
export function normalizeEmail(raw: string, extraBlocked: readonly string[] = []): string {
  if (/[\r\n]/.test(raw)) {
    throw new InvalidEmailError("Invalid email address: contains line breaks");
  }

  const parsed = EmailSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidEmailError();
  }

  const email = parsed.data;
  const domain = email.slice(email.lastIndexOf("@") + 1);
  if (isBlockedEmailDomain(domain, extraBlocked)) {
    throw new InvalidEmailError("Email domain is not allowed");
  }

  return email;
}
