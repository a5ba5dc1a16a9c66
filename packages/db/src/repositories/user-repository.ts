import {
  AuthError,
  normalizeEmail,
  type NewUser,
  type StudioStatus,
  type User,
  type UserPatch,
  type UserRepository,
  type UserRole,
} from '@bookwell/domain';
import { clientOf, sqlStateOf } from '../client';
import { firstRow } from './rows';

type UserRow = {
  id: string;
  email: string;
  password_hash: string;
  name: string;
  phone: string | null;
  role: UserRole;
  studio_status: StudioStatus | null;
  email_verified: boolean;
  email_verified_at: Date | null;
  is_banned: boolean;
  banned_at: Date | null;
  ban_reason: string | null;
  failed_login_attempts: number;
  locked_until: Date | null;
  created_at: Date;
  updated_at: Date;
};

const USER_COLUMNS = `id, email, password_hash, name, phone, role, studio_status,
  email_verified, email_verified_at, is_banned, banned_at, ban_reason,
  failed_login_attempts, locked_until, created_at, updated_at`;

const PATCH_COLUMNS: ReadonlyArray<readonly [keyof UserPatch, string]> = [
  ['passwordHash', 'password_hash'],
  ['name', 'name'],
  ['phone', 'phone'],
  ['emailVerified', 'email_verified'],
  ['emailVerifiedAt', 'email_verified_at'],
  ['failedLoginAttempts', 'failed_login_attempts'],
  ['lockedUntil', 'locked_until'],
];

export class PgUserRepository implements UserRepository {
  async create(tx: unknown, user: NewUser): Promise<User> {
    const client = clientOf(tx);
    try {
      const result = await client.query<UserRow>(
        `INSERT INTO users (id, email, password_hash, name, phone, role, studio_status)
         VALUES ($1, $2, $3, $4, $5, $6, $7)
         RETURNING ${USER_COLUMNS}`,
        [
          user.id,
          normalizeEmail(user.email),
          user.passwordHash,
          user.name,
          user.phone,
          user.role,
          user.studioStatus,
        ],
      );
      return mapUserRow(firstRow(result.rows));
    } catch (err) {
      if (sqlStateOf(err) === '23505') {
        throw new AuthError('DUPLICATE_EMAIL', 'Email is already registered');
      }
      throw err;
    }
  }

  async findByEmail(tx: unknown, email: string): Promise<User | null> {
    const client = clientOf(tx);
    const result = await client.query<UserRow>(
      `SELECT ${USER_COLUMNS}
       FROM users
       WHERE lower(email) = $1`,
      [normalizeEmail(email)],
    );
    return result.rows[0] ? mapUserRow(result.rows[0]) : null;
  }

  async lockByEmail(tx: unknown, email: string): Promise<User | null> {
    const client = clientOf(tx);
    const result = await client.query<UserRow>(
      `SELECT ${USER_COLUMNS}
       FROM users
       WHERE lower(email) = $1
       FOR UPDATE`,
      [normalizeEmail(email)],
    );
    return result.rows[0] ? mapUserRow(result.rows[0]) : null;
  }

  async findById(tx: unknown, id: string): Promise<User | null> {
    const client = clientOf(tx);
    const result = await client.query<UserRow>(
      `SELECT ${USER_COLUMNS}
       FROM users
       WHERE id = $1`,
      [id],
    );
    return result.rows[0] ? mapUserRow(result.rows[0]) : null;
  }

  async existsByEmail(tx: unknown, email: string): Promise<boolean> {
    const client = clientOf(tx);
    const result = await client.query<{ exists: boolean }>(
      `SELECT EXISTS (SELECT 1 FROM users WHERE lower(email) = $1) AS exists`,
      [normalizeEmail(email)],
    );
    return result.rows[0]?.exists ?? false;
  }

  /** Writes only the columns present in the patch, leaving ban state and the rest alone. */
  async update(tx: unknown, id: string, patch: UserPatch): Promise<void> {
    const client = clientOf(tx);
    const assignments: string[] = [];
    const values: unknown[] = [id];

    for (const [key, column] of PATCH_COLUMNS) {
      const value = patch[key];
      if (value === undefined) continue;
      values.push(value);
      assignments.push(`${column} = $${values.length}`);
    }
    if (assignments.length === 0) return;

    await client.query(
      `UPDATE users SET ${assignments.join(', ')}, updated_at = NOW() WHERE id = $1`,
      values,
    );
  }
}

function mapUserRow(row: UserRow): User {
  return {
    id: String(row.id),
    email: row.email,
    passwordHash: row.password_hash,
    name: row.name,
    phone: row.phone,
    role: row.role,
    studioStatus: row.studio_status,
    emailVerified: row.email_verified,
    emailVerifiedAt: row.email_verified_at,
    isBanned: row.is_banned,
    bannedAt: row.banned_at,
    banReason: row.ban_reason,
    failedLoginAttempts: row.failed_login_attempts,
    lockedUntil: row.locked_until,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}
