// src/modules/tokens/errors.ts
// ============================================================================
// Fehler-Taxonomie für Ausgabe & Prüfung von Einmal-Tokens
// ----------------------------------------------------------------------------
// - Jeder Einstiegspunkt wirft genau eine dieser Klassen (oder reicht einen
//   unerwarteten Fehler unverändert durch)
// - code ist stabil und landet im API-Response, statusCode für Fastify
// - Keine internen Retries: StoreError ist für den Aufrufer retrybar,
//   GenerationError nicht
// ============================================================================

export type TokenErrorCode =
  | "INVALID_EMAIL"
  | "INVALID_TOKEN"
  | "TOKEN_EXPIRED"
  | "RATE_LIMITED"
  | "MISSING_USER"
  | "STORE_UNAVAILABLE"
  | "NOTIFY_FAILED"
  | "GENERATION_FAILED";

export abstract class TokenServiceError extends Error {
  abstract readonly code: TokenErrorCode;
  abstract readonly statusCode: number;
  readonly retryable: boolean = false;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidEmailError extends TokenServiceError {
  readonly code = "INVALID_EMAIL";
  readonly statusCode = 400;

  constructor(message = "Invalid email address") {
    super(message);
  }
}

// Deckt "kein Datensatz" und "Hash passt nicht" ab → kein Orakel für Angreifer
export class InvalidTokenError extends TokenServiceError {
  readonly code = "INVALID_TOKEN";
  readonly statusCode = 400;

  constructor(message = "Invalid token") {
    super(message);
  }
}

export class TokenExpiredError extends TokenServiceError {
  readonly code = "TOKEN_EXPIRED";
  readonly statusCode = 410;

  constructor(message = "Token has expired") {
    super(message);
  }
}

export class RateLimitExceededError extends TokenServiceError {
  readonly code = "RATE_LIMITED";
  readonly statusCode = 429;

  constructor(message = "Too many requests, try again later") {
    super(message);
  }
}

export class MissingUserError extends TokenServiceError {
  readonly code = "MISSING_USER";
  readonly statusCode = 401;

  constructor(message = "Authenticated user id is required") {
    super(message);
  }
}

export class StoreError extends TokenServiceError {
  readonly code = "STORE_UNAVAILABLE";
  readonly statusCode = 503;
  override readonly retryable = true;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
  }
}

export class NotifyError extends TokenServiceError {
  readonly code = "NOTIFY_FAILED";
  readonly statusCode = 502;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
  }
}

export class GenerationError extends TokenServiceError {
  readonly code = "GENERATION_FAILED";
  readonly statusCode = 500;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
  }
}
