// src/modules/tokens/rate-limiter.ts
// ============================================================================
// Rate-Limit für die Token-Ausgabe pro (Identität, Flow)
// ----------------------------------------------------------------------------
// Zwei Strategien:
// - StoreRateLimiter (sliding): zählt protokollierte Ausgabe-Versuche im
//   gleitenden Fenster. Mehr-Instanz-fähig, kostet einen Read und einen Write
//   pro Anfrage.
// - RedisRateLimiter (fixed): Zähler je Stunden-Bucket in Redis, O(1)-Writes,
//   dafür Ungenauigkeit an der Bucket-Grenze.
//
// Beide zählen jede angenommene Anfrage, auch für E-Mails ohne Account:
// ein 429 verrät damit nicht, ob die Adresse registriert ist.
//
// Check und Insert sind kein atomarer Block: ein Rennen kann eine Ausgabe
// über dem Limit erlauben.
// ============================================================================

import { sha256 } from "../../libs/pii.js";
import { RateLimitExceededError, StoreError } from "./errors.js";
import type { FlowType, TokenStore } from "./types.js";

export interface IssuanceRateLimiter {
  /** wirft RateLimitExceededError bzw. StoreError */
  check(identity: string, flowType: FlowType): Promise<void>;
  record(identity: string, flowType: FlowType): Promise<void>;
}

export interface RateLimitOptions {
  max: number;
  windowMs: number;
}

export const DEFAULT_RATE_LIMIT: RateLimitOptions = {
  max: 3,
  windowMs: 60 * 60 * 1000,
};

// ---------------------------------------------------------------------------
// Sliding Window über den Store
// ---------------------------------------------------------------------------

export class StoreRateLimiter implements IssuanceRateLimiter {
  private readonly options: RateLimitOptions;

  constructor(
    private readonly store: Pick<TokenStore, "countIssuedSince" | "recordIssuance">,
    options: Partial<RateLimitOptions> = {},
  ) {
    this.options = { ...DEFAULT_RATE_LIMIT, ...options };
  }

  async check(identity: string, flowType: FlowType): Promise<void> {
    const since = new Date(Date.now() - this.options.windowMs);

    let count: number;
    try {
      count = await this.store.countIssuedSince(identity, flowType, since);
    } catch (err) {
      throw new StoreError("Failed to check rate limit", { cause: err });
    }

    if (count >= this.options.max) {
      throw new RateLimitExceededError();
    }
  }

  async record(identity: string, flowType: FlowType): Promise<void> {
    try {
      await this.store.recordIssuance(identity, flowType, new Date());
    } catch (err) {
      throw new StoreError("Failed to record issuance", { cause: err });
    }
  }
}

// ---------------------------------------------------------------------------
// Fixed Window in Redis
// ---------------------------------------------------------------------------

/** Teilmenge von ioredis, die der Zähler braucht */
export interface RateLimitCounterClient {
  get(key: string): Promise<string | null>;
  incr(key: string): Promise<number>;
  pexpire(key: string, milliseconds: number): Promise<number>;
}

export class RedisRateLimiter implements IssuanceRateLimiter {
  private readonly options: RateLimitOptions;

  constructor(
    private readonly redis: RateLimitCounterClient,
    private readonly namespace: string,
    options: Partial<RateLimitOptions> = {},
  ) {
    this.options = { ...DEFAULT_RATE_LIMIT, ...options };
  }

  keyFor(identity: string, flowType: FlowType, at: number = Date.now()): string {
    const bucket = Math.floor(at / this.options.windowMs);
    return [this.namespace, "issue", flowType, sha256(identity), bucket].join(":");
  }

  async check(identity: string, flowType: FlowType): Promise<void> {
    let raw: string | null;
    try {
      raw = await this.redis.get(this.keyFor(identity, flowType));
    } catch (err) {
      throw new StoreError("Failed to check rate limit", { cause: err });
    }

    const count = raw === null ? 0 : Number.parseInt(raw, 10);
    if (Number.isFinite(count) && count >= this.options.max) {
      throw new RateLimitExceededError();
    }
  }

  async record(identity: string, flowType: FlowType): Promise<void> {
    const key = this.keyFor(identity, flowType);
    try {
      const count = await this.redis.incr(key);
      if (count === 1) {
        await this.redis.pexpire(key, this.options.windowMs);
      }
    } catch (err) {
      throw new StoreError("Failed to record issuance", { cause: err });
    }
  }
}
