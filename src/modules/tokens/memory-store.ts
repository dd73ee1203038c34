// src/modules/tokens/memory-store.ts
// ============================================================================
// In-Memory-Store (lokale Entwicklung & Tests)
// ----------------------------------------------------------------------------
// - Gleiche Semantik wie PgTokenStore
// - markUsed()/consumeEmailVerification() sind synchron zwischen Prüfen und
//   Setzen → atomar pro Datensatz
// - Rückgaben sind Kopien, Aufrufer können den Zustand nicht verändern
// ============================================================================

import { randomUUID } from "node:crypto";
import {
  emptyFlowCounts,
  type EmailVerificationClaim,
  type FlowType,
  type NewTokenRecord,
  type TokenRecord,
  type TokenStats,
  type TokenStore,
} from "./types.js";

export interface MemoryUser {
  id: string;
  email: string;
  emailVerifiedAt: Date | null;
}

interface IssuanceEntry {
  email: string;
  flowType: FlowType;
  at: Date;
}

function copy(record: TokenRecord): TokenRecord {
  return {
    ...record,
    expiresAt: new Date(record.expiresAt),
    createdAt: new Date(record.createdAt),
  };
}

export class InMemoryTokenStore implements TokenStore {
  private readonly tokens = new Map<string, TokenRecord>();
  private readonly users = new Map<string, MemoryUser>();
  private issuances: IssuanceEntry[] = [];

  // -------------------------------------------------------------------------
  // Users
  // -------------------------------------------------------------------------

  addUser(email: string, id: string = randomUUID()): MemoryUser {
    const user: MemoryUser = { id, email: email.trim().toLowerCase(), emailVerifiedAt: null };
    this.users.set(id, user);
    return { ...user };
  }

  getUser(id: string): MemoryUser | null {
    const user = this.users.get(id);
    return user ? { ...user } : null;
  }

  async findUserIdByEmail(email: string): Promise<string | null> {
    const wanted = email.toLowerCase();
    for (const user of this.users.values()) {
      if (user.email === wanted) return user.id;
    }
    return null;
  }

  // -------------------------------------------------------------------------
  // Tokens
  // -------------------------------------------------------------------------

  /** Snapshot aller Datensätze in Einfügereihenfolge */
  list(): TokenRecord[] {
    return [...this.tokens.values()].map(copy);
  }

  async createToken(input: NewTokenRecord): Promise<TokenRecord> {
    if (input.expiresAt.getTime() <= input.createdAt.getTime()) {
      throw new Error("expires_at must be later than created_at");
    }

    const record: TokenRecord = { ...input, id: randomUUID(), used: false };
    this.tokens.set(record.id, copy(record));
    return copy(record);
  }

  async findLatestUnusedByEmail(email: string, flowType: FlowType): Promise<TokenRecord | null> {
    let latest: TokenRecord | null = null;
    for (const record of this.tokens.values()) {
      if (record.email !== email || record.flowType !== flowType || record.used) continue;
      // >= : bei gleichem Zeitstempel gewinnt der später eingefügte
      if (!latest || record.createdAt.getTime() >= latest.createdAt.getTime()) {
        latest = record;
      }
    }
    return latest ? copy(latest) : null;
  }

  async findUnusedByTokenHash(tokenHash: string, flowType: FlowType): Promise<TokenRecord | null> {
    for (const record of this.tokens.values()) {
      if (record.tokenHash === tokenHash && record.flowType === flowType && !record.used) {
        return copy(record);
      }
    }
    return null;
  }

  async markUsed(id: string): Promise<boolean> {
    const record = this.tokens.get(id);
    if (!record || record.used) return false;
    record.used = true;
    return true;
  }

  async consumeEmailVerification(
    id: string,
    userId: string,
    at: Date,
  ): Promise<EmailVerificationClaim> {
    // synchron → kein anderer Aufrufer sieht einen Zwischenzustand
    const record = this.tokens.get(id);
    if (!record || record.used) return { claimed: false, newlyVerified: false };
    record.used = true;

    const user = this.users.get(userId);
    if (!user || user.emailVerifiedAt) return { claimed: true, newlyVerified: false };
    user.emailVerifiedAt = new Date(at);
    return { claimed: true, newlyVerified: true };
  }

  async deleteExpiredOrStale(now: Date, usedBefore: Date): Promise<number> {
    this.issuances = this.issuances.filter(
      (entry) => entry.at.getTime() >= usedBefore.getTime(),
    );

    let deleted = 0;
    for (const [id, record] of this.tokens) {
      const expired = record.expiresAt.getTime() < now.getTime();
      const stale = record.used && record.createdAt.getTime() < usedBefore.getTime();
      if (expired || stale) {
        this.tokens.delete(id);
        deleted += 1;
      }
    }
    return deleted;
  }

  async recordIssuance(email: string, flowType: FlowType, at: Date): Promise<void> {
    this.issuances.push({ email, flowType, at: new Date(at) });
  }

  async countIssuedSince(email: string, flowType: FlowType, since: Date): Promise<number> {
    return this.issuances.filter(
      (entry) =>
        entry.email === email &&
        entry.flowType === flowType &&
        entry.at.getTime() > since.getTime(),
    ).length;
  }

  async getStats(now: Date): Promise<TokenStats> {
    const activeTokens = emptyFlowCounts();
    let expiredTokens = 0;

    for (const record of this.tokens.values()) {
      if (record.expiresAt.getTime() <= now.getTime()) {
        expiredTokens += 1;
      } else if (!record.used) {
        activeTokens[record.flowType] += 1;
      }
    }

    return { activeTokens, expiredTokens };
  }
}
