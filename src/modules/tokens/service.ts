// src/modules/tokens/service.ts
// ============================================================================
// Business-Logik für Einmal-Tokens (Passwort-Reset & E-Mail-Verifikation)
// ----------------------------------------------------------------------------
// Ausgabe:  validieren → Rate-Limit → erzeugen → hashen → speichern → zustellen
// Prüfung:  lookup → Ablauf → Constant-Time-Vergleich → used=true → Seiteneffekt
//
// - Zustandslos: alles Dauerhafte liegt im TokenStore
// - Store/Notifier/URL-Builder werden im Konstruktor übergeben (server.ts)
// - Jeder Einstiegspunkt wirft genau einen TokenServiceError, keine Retries
// - Ein Zustellfehler nach dem Speichern invalidiert das Token nicht
// ============================================================================

import type { Logger } from "pino";
import { constantTimeEqual, generateNumericCode, generateOpaqueToken, hashSecret } from "../../libs/crypto.js";
import { hashEmailForLog, hashIpForLog } from "../../libs/pii.js";
import { normalizeEmail } from "./email-address.js";
import {
  InvalidTokenError,
  MissingUserError,
  NotifyError,
  StoreError,
  TokenExpiredError,
} from "./errors.js";
import { StoreRateLimiter, type IssuanceRateLimiter } from "./rate-limiter.js";
import {
  DEFAULT_TOKEN_POLICY,
  type EmailVerificationRequestInput,
  type EmailVerificationRequestResult,
  type EmailVerificationResult,
  type Notifier,
  type PasswordResetRequestInput,
  type PasswordResetRequestResult,
  type PasswordResetVerifyInput,
  type PasswordResetVerifyResult,
  type TokenPolicy,
  type TokenRecord,
  type TokenStore,
  type VerificationUrlBuilder,
} from "./types.js";

export interface TokenManagerDeps {
  store: TokenStore;
  notifier: Notifier;
  verificationUrl: VerificationUrlBuilder;
  logger: Logger;
  /** Standard: Sliding Window über den Store */
  rateLimiter?: IssuanceRateLimiter;
  policy?: Partial<TokenPolicy>;
}

function isExpired(record: TokenRecord, now: Date): boolean {
  return now.getTime() >= record.expiresAt.getTime();
}

/**
 * Wickelt Store-Aufrufe ein: jeder Persistenzfehler wird zu StoreError.
 */
async function storeCall<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    throw new StoreError(`Token store failed: ${operation}`, { cause: err });
  }
}

export class TokenManager {
  private readonly store: TokenStore;
  private readonly notifier: Notifier;
  private readonly verificationUrl: VerificationUrlBuilder;
  private readonly rateLimiter: IssuanceRateLimiter;
  private readonly policy: TokenPolicy;
  private readonly log: Logger;

  constructor(deps: TokenManagerDeps) {
    this.store = deps.store;
    this.notifier = deps.notifier;
    this.verificationUrl = deps.verificationUrl;
    this.rateLimiter = deps.rateLimiter ?? new StoreRateLimiter(deps.store);
    this.policy = { ...DEFAULT_TOKEN_POLICY, ...deps.policy };
    this.log = deps.logger.child({ module: "tokens" });
  }

  private hash(secret: string): string {
    return hashSecret(secret, this.policy.pepper);
  }

  private normalizeEmail(raw: string): string {
    return normalizeEmail(raw, this.policy.blockedEmailDomains);
  }

  // -------------------------------------------------------------------------
  // Passwort-Reset: Ausgabe
  // -------------------------------------------------------------------------

  async requestPasswordReset(input: PasswordResetRequestInput): Promise<PasswordResetRequestResult> {
    const email = this.normalizeEmail(input.email);
    const emailHash = hashEmailForLog(email);

    await this.rateLimiter.check(email, "password_reset");

    const code = generateNumericCode(this.policy.resetCodeLength);
    const tokenHash = this.hash(code);

    await this.rateLimiter.record(email, "password_reset");

    const userId = await storeCall("findUserIdByEmail", () => this.store.findUserIdByEmail(email));
    if (!userId) {
      // Gleiche Antwort wie im Erfolgsfall, kein Datensatz, keine Mail
      this.log.info({ email_hash: emailHash }, "password_reset_unknown_email");
      return { requestAccepted: true };
    }

    const createdAt = new Date();
    const expiresAt = new Date(createdAt.getTime() + this.policy.resetCodeTtlMs);
    const record = await storeCall("createToken", () =>
      this.store.createToken({
        tokenHash,
        userId,
        email,
        flowType: "password_reset",
        expiresAt,
        createdAt,
        requestIp: input.requestIp ?? null,
        userAgent: input.userAgent ?? null,
      }),
    );

    this.log.info(
      {
        token_id: record.id,
        email_hash: emailHash,
        ip_hash: hashIpForLog(input.requestIp),
        expires_at: expiresAt.toISOString(),
      },
      "password_reset_issued",
    );

    try {
      await this.notifier.sendPasswordResetCode({
        to: email,
        code,
        expiresAt,
        context: {
          requestIp: input.requestIp ?? null,
          userAgent: input.userAgent ?? null,
          requestedAt: createdAt,
        },
      });
    } catch (err) {
      // Token bleibt gültig: Sicherheitszustand und Zustellung sind getrennt
      this.log.error({ err, token_id: record.id }, "password_reset_notify_failed");
      throw new NotifyError("Failed to deliver password reset code", { cause: err });
    }

    return { requestAccepted: true };
  }

  // -------------------------------------------------------------------------
  // Passwort-Reset: Prüfung
  // -------------------------------------------------------------------------

  async verifyPasswordResetCode(input: PasswordResetVerifyInput): Promise<PasswordResetVerifyResult> {
    const email = this.normalizeEmail(input.email);
    const code = input.code.trim();
    if (!code) {
      throw new InvalidTokenError("Empty password reset code");
    }

    const record = await storeCall("findLatestUnusedByEmail", () =>
      this.store.findLatestUnusedByEmail(email, "password_reset"),
    );
    if (!record) {
      throw new InvalidTokenError();
    }

    if (isExpired(record, new Date())) {
      throw new TokenExpiredError();
    }

    if (!constantTimeEqual(this.hash(code), record.tokenHash)) {
      this.log.info({ token_id: record.id }, "password_reset_code_mismatch");
      throw new InvalidTokenError();
    }

    const claimed = await storeCall("markUsed", () => this.store.markUsed(record.id));
    if (!claimed) {
      // paralleler Verifizierer war schneller
      throw new InvalidTokenError();
    }

    this.log.info({ token_id: record.id, user_id: record.userId }, "password_reset_verified");

    return {
      tokenId: record.id,
      userId: record.userId,
      email: record.email,
    };
  }

  // -------------------------------------------------------------------------
  // E-Mail-Verifikation: Ausgabe
  // -------------------------------------------------------------------------

  async requestEmailVerification(
    input: EmailVerificationRequestInput,
  ): Promise<EmailVerificationRequestResult> {
    const userId = input.userId.trim();
    if (!userId) {
      throw new MissingUserError();
    }

    const email = this.normalizeEmail(input.email);

    await this.rateLimiter.check(email, "email_verification");

    const token = generateOpaqueToken();
    const tokenHash = this.hash(token);

    await this.rateLimiter.record(email, "email_verification");

    const createdAt = new Date();
    const expiresAt = new Date(createdAt.getTime() + this.policy.verificationTtlMs);
    const record = await storeCall("createToken", () =>
      this.store.createToken({
        tokenHash,
        userId,
        email,
        flowType: "email_verification",
        expiresAt,
        createdAt,
        requestIp: input.requestIp ?? null,
        userAgent: input.userAgent ?? null,
      }),
    );

    this.log.info(
      { token_id: record.id, user_id: userId, email_hash: hashEmailForLog(email) },
      "email_verification_issued",
    );

    try {
      await this.notifier.sendEmailVerification({
        to: email,
        name: input.name,
        verificationUrl: this.verificationUrl(token),
        expiresAt,
      });
    } catch (err) {
      this.log.error({ err, token_id: record.id }, "email_verification_notify_failed");
      throw new NotifyError("Failed to deliver email verification link", { cause: err });
    }

    return { requestAccepted: true, expiresAt };
  }

  // -------------------------------------------------------------------------
  // E-Mail-Verifikation: Prüfung
  // -------------------------------------------------------------------------

  async verifyEmailToken(rawToken: string): Promise<EmailVerificationResult> {
    const token = rawToken.trim();
    if (!token) {
      throw new InvalidTokenError("Empty verification token");
    }

    const tokenHash = this.hash(token);
    const record = await storeCall("findUnusedByTokenHash", () =>
      this.store.findUnusedByTokenHash(tokenHash, "email_verification"),
    );
    if (!record) {
      throw new InvalidTokenError();
    }

    const now = new Date();
    if (isExpired(record, now)) {
      throw new TokenExpiredError();
    }

    if (!constantTimeEqual(tokenHash, record.tokenHash)) {
      throw new InvalidTokenError();
    }

    // Token verbrauchen + User markieren in einer Transaktion:
    // schlägt das fehl, bleibt der Link für einen erneuten Versuch gültig
    const { claimed, newlyVerified } = await storeCall("consumeEmailVerification", () =>
      this.store.consumeEmailVerification(record.id, record.userId, now),
    );
    if (!claimed) {
      throw new InvalidTokenError();
    }

    this.log.info(
      { token_id: record.id, user_id: record.userId, newly_verified: newlyVerified },
      "email_verified",
    );

    return {
      tokenId: record.id,
      userId: record.userId,
      email: record.email,
      alreadyVerified: !newlyVerified,
    };
  }
}
