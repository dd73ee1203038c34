// src/modules/tokens/repository.ts
// ============================================================================
// Token-Repository (PostgreSQL)
// ----------------------------------------------------------------------------
// - Tabelle: auth.email_tokens (sql/001_email_tokens.sql)
// - token_hash enthält nur SHA-256/HMAC-Hex, nie den Klartext
// - Single-Use über "UPDATE ... WHERE used = false": Postgres sperrt die Zeile,
//   der zweite Verifizierer sieht used = true und bekommt rowCount 0
// - E-Mail-Verifikation: Token verbrauchen + User markieren in einer Transaktion
// - Ausgabe-Versuche liegen in auth.token_issuance_attempts (Rate-Limit zählt
//   auch E-Mails ohne Account)
// - Zeitstempel kommen aus der Anwendung (gleiche Uhr wie Ablaufprüfung)
// ============================================================================

import type { SqlClient, SqlPool } from "../../libs/db.js";
import {
  emptyFlowCounts,
  type EmailVerificationClaim,
  isFlowType,
  type FlowType,
  type NewTokenRecord,
  type TokenRecord,
  type TokenStats,
  type TokenStore,
} from "./types.js";

interface EmailTokenRow {
  id: string;
  token_hash: string;
  user_id: string;
  email: string;
  type: string;
  expires_at: Date;
  used: boolean;
  created_at: Date;
  request_ip: string | null;
  user_agent: string | null;
}

const TOKEN_COLUMNS = `
  id,
  token_hash,
  user_id,
  email,
  type,
  expires_at,
  used,
  created_at,
  request_ip,
  user_agent
`;

function toRecord(row: EmailTokenRow): TokenRecord {
  if (!isFlowType(row.type)) {
    throw new Error(`Unknown token type in auth.email_tokens: ${row.type}`);
  }

  return {
    id: String(row.id),
    tokenHash: row.token_hash,
    userId: String(row.user_id),
    email: row.email,
    flowType: row.type,
    expiresAt: row.expires_at,
    used: row.used,
    createdAt: row.created_at,
    requestIp: row.request_ip,
    userAgent: row.user_agent,
  };
}

/** ROLLBACK ohne den ursprünglichen Fehler zu verdecken; liefert den Rollback-Fehler */
async function rollback(client: SqlClient): Promise<Error | undefined> {
  try {
    await client.query("ROLLBACK");
    return undefined;
  } catch (err) {
    return err instanceof Error ? err : new Error("ROLLBACK failed");
  }
}

export class PgTokenStore implements TokenStore {
  constructor(private readonly db: SqlPool) {}

  async findUserIdByEmail(email: string): Promise<string | null> {
    const { rows } = await this.db.query<{ id: string }>(
      `
        SELECT id
        FROM auth.users
        WHERE lower(email) = $1
        LIMIT 1;
      `,
      [email.toLowerCase()],
    );

    return rows[0] ? String(rows[0].id) : null;
  }

  async createToken(input: NewTokenRecord): Promise<TokenRecord> {
    const { rows } = await this.db.query<EmailTokenRow>(
      `
        INSERT INTO auth.email_tokens (
          token_hash,
          user_id,
          email,
          type,
          expires_at,
          used,
          created_at,
          request_ip,
          user_agent
        )
        VALUES ($1, $2, $3, $4, $5, false, $6, $7, $8)
        RETURNING ${TOKEN_COLUMNS};
      `,
      [
        input.tokenHash,
        input.userId,
        input.email,
        input.flowType,
        input.expiresAt,
        input.createdAt,
        input.requestIp,
        input.userAgent,
      ],
    );

    if (!rows[0]) {
      throw new Error("Insert into auth.email_tokens returned no row");
    }

    return toRecord(rows[0]);
  }

  async findLatestUnusedByEmail(email: string, flowType: FlowType): Promise<TokenRecord | null> {
    const { rows } = await this.db.query<EmailTokenRow>(
      `
        SELECT ${TOKEN_COLUMNS}
        FROM auth.email_tokens
        WHERE email = $1
          AND type = $2
          AND used = false
        ORDER BY created_at DESC, id DESC
        LIMIT 1;
      `,
      [email, flowType],
    );

    return rows[0] ? toRecord(rows[0]) : null;
  }

  async findUnusedByTokenHash(tokenHash: string, flowType: FlowType): Promise<TokenRecord | null> {
    const { rows } = await this.db.query<EmailTokenRow>(
      `
        SELECT ${TOKEN_COLUMNS}
        FROM auth.email_tokens
        WHERE token_hash = $1
          AND type = $2
          AND used = false
        LIMIT 1;
      `,
      [tokenHash, flowType],
    );

    return rows[0] ? toRecord(rows[0]) : null;
  }

  async markUsed(id: string): Promise<boolean> {
    const { rowCount } = await this.db.query(
      `
        UPDATE auth.email_tokens
        SET used = true
        WHERE id = $1
          AND used = false;
      `,
      [id],
    );

    return (rowCount ?? 0) === 1;
  }

  async consumeEmailVerification(
    id: string,
    userId: string,
    at: Date,
  ): Promise<EmailVerificationClaim> {
    const client = await this.db.connect();
    let releaseError: Error | undefined;

    try {
      await client.query("BEGIN");

      const consumed = await client.query(
        `
          UPDATE auth.email_tokens
          SET used = true
          WHERE id = $1
            AND used = false;
        `,
        [id],
      );

      if ((consumed.rowCount ?? 0) !== 1) {
        await client.query("ROLLBACK");
        return { claimed: false, newlyVerified: false };
      }

      const verified = await client.query(
        `
          UPDATE auth.users
          SET email_verified_at = $2
          WHERE id = $1
            AND email_verified_at IS NULL;
        `,
        [userId, at],
      );

      await client.query("COMMIT");
      return { claimed: true, newlyVerified: (verified.rowCount ?? 0) === 1 };
    } catch (err) {
      // Verbindung mit gescheitertem Rollback wird verworfen, nicht recycelt
      releaseError = await rollback(client);
      throw err;
    } finally {
      client.release(releaseError);
    }
  }

  async deleteExpiredOrStale(now: Date, usedBefore: Date): Promise<number> {
    const { rowCount } = await this.db.query(
      `
        DELETE FROM auth.email_tokens
        WHERE expires_at < $1
           OR (used = true AND created_at < $2);
      `,
      [now, usedBefore],
    );

    await this.db.query(
      `
        DELETE FROM auth.token_issuance_attempts
        WHERE created_at < $1;
      `,
      [usedBefore],
    );

    return rowCount ?? 0;
  }

  async recordIssuance(email: string, flowType: FlowType, at: Date): Promise<void> {
    await this.db.query(
      `
        INSERT INTO auth.token_issuance_attempts (email, type, created_at)
        VALUES ($1, $2, $3);
      `,
      [email, flowType, at],
    );
  }

  async countIssuedSince(email: string, flowType: FlowType, since: Date): Promise<number> {
    const { rows } = await this.db.query<{ count: number }>(
      `
        SELECT COUNT(*)::int AS count
        FROM auth.token_issuance_attempts
        WHERE email = $1
          AND type = $2
          AND created_at > $3;
      `,
      [email, flowType, since],
    );

    return rows[0]?.count ?? 0;
  }

  async getStats(now: Date): Promise<TokenStats> {
    const { rows: activeRows } = await this.db.query<{ type: string; count: number }>(
      `
        SELECT type, COUNT(*)::int AS count
        FROM auth.email_tokens
        WHERE expires_at > $1
          AND used = false
        GROUP BY type;
      `,
      [now],
    );

    const activeTokens = emptyFlowCounts();
    for (const row of activeRows) {
      if (isFlowType(row.type)) {
        activeTokens[row.type] = row.count;
      }
    }

    const { rows: expiredRows } = await this.db.query<{ count: number }>(
      `
        SELECT COUNT(*)::int AS count
        FROM auth.email_tokens
        WHERE expires_at <= $1;
      `,
      [now],
    );

    return {
      activeTokens,
      expiredTokens: expiredRows[0]?.count ?? 0,
    };
  }
}
