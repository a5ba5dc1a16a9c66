import {
  type NewVerificationCode,
  type VerificationCode,
  type VerificationCodeRepository,
} from '@bookwell/domain';
import { clientOf } from '../client';
import { firstRow } from './rows';

type VerificationCodeRow = {
  id: string;
  user_id: string;
  email: string;
  code_hash: string;
  attempts: number;
  expires_at: Date;
  used_at: Date | null;
  created_at: Date;
};

const CODE_COLUMNS = 'id, user_id, email, code_hash, attempts, expires_at, used_at, created_at';

export class PgVerificationCodeRepository implements VerificationCodeRepository {
  async create(tx: unknown, code: NewVerificationCode): Promise<VerificationCode> {
    const client = clientOf(tx);
    const result = await client.query<VerificationCodeRow>(
      `INSERT INTO email_verification_codes (id, user_id, email, code_hash, expires_at, created_at)
       VALUES ($1, $2, $3, $4, $5, $6)
       RETURNING ${CODE_COLUMNS}`,
      [code.id, code.userId, code.email, code.codeHash, code.expiresAt, code.createdAt],
    );
    return mapCodeRow(firstRow(result.rows));
  }

  async findLatestByEmail(tx: unknown, email: string): Promise<VerificationCode | null> {
    const client = clientOf(tx);
    const result = await client.query<VerificationCodeRow>(
      `SELECT ${CODE_COLUMNS}
       FROM email_verification_codes
       WHERE email = $1
       ORDER BY created_at DESC, id DESC
       LIMIT 1`,
      [email],
    );
    return result.rows[0] ? mapCodeRow(result.rows[0]) : null;
  }

  async supersedeOutstanding(tx: unknown, email: string, at: Date): Promise<number> {
    const client = clientOf(tx);
    const result = await client.query(
      `UPDATE email_verification_codes SET used_at = $2 WHERE email = $1 AND used_at IS NULL`,
      [email, at],
    );
    return result.rowCount ?? 0;
  }

  async markUsed(tx: unknown, id: string, at: Date): Promise<boolean> {
    const client = clientOf(tx);
    const result = await client.query(
      `UPDATE email_verification_codes SET used_at = $2 WHERE id = $1 AND used_at IS NULL`,
      [id, at],
    );
    return (result.rowCount ?? 0) > 0;
  }

  async incrementAttempts(tx: unknown, id: string): Promise<number> {
    const client = clientOf(tx);
    const result = await client.query<{ attempts: number }>(
      `UPDATE email_verification_codes SET attempts = attempts + 1 WHERE id = $1 RETURNING attempts`,
      [id],
    );
    return result.rows[0]?.attempts ?? 0;
  }

  async deleteExpired(tx: unknown): Promise<number> {
    const client = clientOf(tx);
    const result = await client.query(
      `DELETE FROM email_verification_codes WHERE used_at IS NOT NULL OR expires_at < NOW()`,
    );
    return result.rowCount ?? 0;
  }
}

function mapCodeRow(row: VerificationCodeRow): VerificationCode {
  return {
    id: String(row.id),
    userId: String(row.user_id),
    email: row.email,
    codeHash: row.code_hash,
    attempts: row.attempts,
    expiresAt: row.expires_at,
    usedAt: row.used_at,
    createdAt: row.created_at,
  };
}
