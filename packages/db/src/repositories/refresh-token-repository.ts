import { type NewRefreshToken, type RefreshToken, type RefreshTokenRepository } from '@bookwell/domain';
import { clientOf } from '../client';
import { firstRow } from './rows';

type RefreshTokenRow = {
  id: string;
  user_id: string;
  token_hash: string;
  family_id: string;
  rotated_from: string | null;
  issued_at: Date;
  expires_at: Date;
  used_at: Date | null;
  revoked_at: Date | null;
  reuse_detected_at: Date | null;
  user_agent: string | null;
  ip: string | null;
};

const TOKEN_COLUMNS = `id, user_id, token_hash, family_id, rotated_from, issued_at, expires_at,
  used_at, revoked_at, reuse_detected_at, user_agent, ip`;

export class PgRefreshTokenRepository implements RefreshTokenRepository {
  async create(tx: unknown, token: NewRefreshToken): Promise<RefreshToken> {
    const client = clientOf(tx);
    const result = await client.query<RefreshTokenRow>(
      `INSERT INTO refresh_tokens
         (id, user_id, token_hash, family_id, rotated_from, issued_at, expires_at, user_agent, ip)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
       RETURNING ${TOKEN_COLUMNS}`,
      [
        token.id,
        token.userId,
        token.tokenHash,
        token.familyId,
        token.rotatedFrom,
        token.issuedAt,
        token.expiresAt,
        token.userAgent,
        token.ip,
      ],
    );
    return mapRefreshRow(firstRow(result.rows));
  }

  async findByTokenHash(tx: unknown, tokenHash: string): Promise<RefreshToken | null> {
    const client = clientOf(tx);
    const result = await client.query<RefreshTokenRow>(
      `SELECT ${TOKEN_COLUMNS}
       FROM refresh_tokens
       WHERE token_hash = $1`,
      [tokenHash],
    );
    return result.rows[0] ? mapRefreshRow(result.rows[0]) : null;
  }

  async lockByTokenHash(tx: unknown, tokenHash: string): Promise<RefreshToken | null> {
    const client = clientOf(tx);
    const result = await client.query<RefreshTokenRow>(
      `SELECT ${TOKEN_COLUMNS}
       FROM refresh_tokens
       WHERE token_hash = $1
       FOR UPDATE`,
      [tokenHash],
    );
    return result.rows[0] ? mapRefreshRow(result.rows[0]) : null;
  }

  async hasReuseInFamily(tx: unknown, familyId: string): Promise<boolean> {
    const client = clientOf(tx);
    const result = await client.query<{ exists: boolean }>(
      `SELECT EXISTS (
         SELECT 1 FROM refresh_tokens WHERE family_id = $1 AND reuse_detected_at IS NOT NULL
       ) AS exists`,
      [familyId],
    );
    return result.rows[0]?.exists ?? false;
  }

  async markRotated(tx: unknown, id: string, at: Date): Promise<void> {
    const client = clientOf(tx);
    await client.query(
      `UPDATE refresh_tokens
       SET used_at = $2, revoked_at = COALESCE(revoked_at, $2)
       WHERE id = $1`,
      [id, at],
    );
  }

  async markReuseDetected(tx: unknown, id: string, at: Date): Promise<void> {
    const client = clientOf(tx);
    await client.query(
      `UPDATE refresh_tokens SET reuse_detected_at = COALESCE(reuse_detected_at, $2) WHERE id = $1`,
      [id, at],
    );
  }

  async revoke(tx: unknown, id: string, at: Date): Promise<boolean> {
    const client = clientOf(tx);
    const result = await client.query(
      `UPDATE refresh_tokens SET revoked_at = $2 WHERE id = $1 AND revoked_at IS NULL`,
      [id, at],
    );
    return (result.rowCount ?? 0) > 0;
  }

  async revokeFamily(tx: unknown, familyId: string, at: Date): Promise<number> {
    const client = clientOf(tx);
    const result = await client.query(
      `UPDATE refresh_tokens SET revoked_at = $2 WHERE family_id = $1 AND revoked_at IS NULL`,
      [familyId, at],
    );
    return result.rowCount ?? 0;
  }

  async revokeAllForUser(tx: unknown, userId: string, at: Date): Promise<number> {
    const client = clientOf(tx);
    const result = await client.query(
      `UPDATE refresh_tokens SET revoked_at = $2 WHERE user_id = $1 AND revoked_at IS NULL`,
      [userId, at],
    );
    return result.rowCount ?? 0;
  }

  /** Keeps the `keep` most recently issued records of the user and deletes the rest. */
  async pruneForUser(tx: unknown, userId: string, keep: number): Promise<number> {
    const client = clientOf(tx);
    const result = await client.query(
      `DELETE FROM refresh_tokens
       WHERE id IN (
         SELECT id FROM refresh_tokens
         WHERE user_id = $1
         ORDER BY issued_at DESC, id DESC
         OFFSET $2
       )`,
      [userId, keep],
    );
    return result.rowCount ?? 0;
  }

  /** Expired and revoked rows both outlive their end by `retentionDays`. */
  async deleteExpired(tx: unknown, retentionDays: number): Promise<number> {
    const client = clientOf(tx);
    const result = await client.query(
      `DELETE FROM refresh_tokens
       WHERE expires_at < NOW() - make_interval(days => $1)
          OR (revoked_at IS NOT NULL AND revoked_at < NOW() - make_interval(days => $1))`,
      [retentionDays],
    );
    return result.rowCount ?? 0;
  }
}

function mapRefreshRow(row: RefreshTokenRow): RefreshToken {
  return {
    id: String(row.id),
    userId: String(row.user_id),
    tokenHash: row.token_hash,
    familyId: String(row.family_id),
    rotatedFrom: row.rotated_from === null ? null : String(row.rotated_from),
    issuedAt: row.issued_at,
    expiresAt: row.expires_at,
    usedAt: row.used_at,
    revokedAt: row.revoked_at,
    reuseDetectedAt: row.reuse_detected_at,
    userAgent: row.user_agent,
    ip: row.ip,
  };
}
