// src/modules/tokens/types.ts
// ============================================================================
// Typen & Kollaborateur-Verträge für Einmal-Tokens (auth.email_tokens)
// ============================================================================

export const FLOW_TYPES = ["password_reset", "email_verification", "magic_link"] as const;

export type FlowType = (typeof FLOW_TYPES)[number];

export function isFlowType(value: string): value is FlowType {
  return FLOW_TYPES.some((type) => type === value);
}

// ---------------------------------------------------------------------------
// Datensatz
// ---------------------------------------------------------------------------

export interface TokenRecord {
  id: string;
  /** SHA-256/HMAC-Hex des Codes bzw. Tokens, niemals Klartext */
  tokenHash: string;
  userId: string;
  email: string;
  flowType: FlowType;
  expiresAt: Date;
  used: boolean;
  createdAt: Date;
  requestIp: string | null;
  userAgent: string | null;
}

export type NewTokenRecord = Omit<TokenRecord, "id" | "used">;

export interface TokenStats {
  activeTokens: Record<FlowType, number>;
  expiredTokens: number;
}

export function emptyFlowCounts(): Record<FlowType, number> {
  return { password_reset: 0, email_verification: 0, magic_link: 0 };
}

export interface EmailVerificationClaim {
  /** false: ein anderer Aufrufer hat den Token bereits verbraucht */
  claimed: boolean;
  /** true: email_verified_at wurde durch diesen Aufruf gesetzt */
  newlyVerified: boolean;
}

// ---------------------------------------------------------------------------
// Store-Vertrag
// ---------------------------------------------------------------------------

export interface TokenStore {
  createToken(input: NewTokenRecord): Promise<TokenRecord>;

  /** Jüngster unbenutzter Datensatz (Passwort-Reset: Lookup über E-Mail) */
  findLatestUnusedByEmail(email: string, flowType: FlowType): Promise<TokenRecord | null>;

  /** Unbenutzter Datensatz über den Token-Hash (E-Mail-Verifikation) */
  findUnusedByTokenHash(tokenHash: string, flowType: FlowType): Promise<TokenRecord | null>;

  /**
   * used: false → true, atomar pro Datensatz.
   * true nur für genau den Aufrufer, der den Übergang vollzogen hat.
   */
  markUsed(id: string): Promise<boolean>;

  /**
   * E-Mail-Verifikation in einer Transaktion: Token verbrauchen und
   * email_verified_at setzen (nur wenn noch leer). Scheitert ein Schritt,
   * bleibt der Token unbenutzt.
   */
  consumeEmailVerification(id: string, userId: string, at: Date): Promise<EmailVerificationClaim>;

  /**
   * Löscht abgelaufene sowie benutzte Datensätze, die vor usedBefore erstellt
   * wurden, und Ausgabe-Versuche vor usedBefore. Liefert die Zahl gelöschter Tokens.
   */
  deleteExpiredOrStale(now: Date, usedBefore: Date): Promise<number>;

  /** Ausgabe-Versuch protokollieren, unabhängig davon, ob ein Account existiert */
  recordIssuance(email: string, flowType: FlowType, at: Date): Promise<void>;

  /** Versuche seit since (exklusiv) für (E-Mail, Flow) */
  countIssuedSince(email: string, flowType: FlowType, since: Date): Promise<number>;

  findUserIdByEmail(email: string): Promise<string | null>;

  getStats(now: Date): Promise<TokenStats>;
}

// ---------------------------------------------------------------------------
// Notifier-Vertrag
// ---------------------------------------------------------------------------

export interface SecurityContext {
  requestIp: string | null;
  userAgent: string | null;
  requestedAt: Date;
}

export interface PasswordResetNotification {
  to: string;
  code: string;
  expiresAt: Date;
  context: SecurityContext;
}

export interface EmailVerificationNotification {
  to: string;
  name?: string;
  verificationUrl: string;
  expiresAt: Date;
}

export interface Notifier {
  sendPasswordResetCode(message: PasswordResetNotification): Promise<void>;
  sendEmailVerification(message: EmailVerificationNotification): Promise<void>;
}

export type VerificationUrlBuilder = (token: string) => string;

// ---------------------------------------------------------------------------
// Ein-/Ausgaben der Flows
// ---------------------------------------------------------------------------

export interface PasswordResetRequestInput {
  email: string;
  requestIp?: string;
  userAgent?: string;
}

export interface PasswordResetRequestResult {
  requestAccepted: true;
}

export interface PasswordResetVerifyInput {
  email: string;
  code: string;
}

export interface PasswordResetVerifyResult {
  tokenId: string;
  userId: string;
  email: string;
}

export interface EmailVerificationRequestInput {
  userId: string;
  email: string;
  name?: string;
  requestIp?: string;
  userAgent?: string;
}

export interface EmailVerificationRequestResult {
  requestAccepted: true;
  expiresAt: Date;
}

export interface EmailVerificationResult {
  tokenId: string;
  userId: string;
  email: string;
  alreadyVerified: boolean;
}

// ---------------------------------------------------------------------------
// Policy
// ---------------------------------------------------------------------------

export interface TokenPolicy {
  resetCodeLength: number;
  resetCodeTtlMs: number;
  verificationTtlMs: number;
  /** HMAC-Key für hashSecret(); leer = reines SHA-256 */
  pepper?: string;
  blockedEmailDomains: string[];
}

export const DEFAULT_TOKEN_POLICY: TokenPolicy = {
  resetCodeLength: 6,
  resetCodeTtlMs: 15 * 60 * 1000,
  verificationTtlMs: 48 * 60 * 60 * 1000,
  blockedEmailDomains: [],
};
