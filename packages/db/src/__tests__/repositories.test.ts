import { describe, it, expect, vi } from 'vitest';
import { AuthError } from '@bookwell/domain';
import { PgUserRepository } from '../repositories/user-repository';
import { PgRefreshTokenRepository } from '../repositories/refresh-token-repository';
import { PgVerificationCodeRepository } from '../repositories/verification-code-repository';

const T0 = new Date('2026-03-02T10:00:00.000Z');

function createFakeClient(result: { rows?: unknown[]; rowCount?: number } = {}) {
  return {
    query: vi.fn(async (_text: string, _values?: unknown[]) => ({ rows: [], rowCount: 0, ...result })),
    release: vi.fn(),
  };
}

function sqlOf(client: ReturnType<typeof createFakeClient>, call = 0): string {
  return (client.query.mock.calls[call]?.[0] ?? '').replace(/\s+/g, ' ').trim();
}

function valuesOf(client: ReturnType<typeof createFakeClient>, call = 0): unknown[] | undefined {
  return client.query.mock.calls[call]?.[1];
}

const userRow = {
  id: '1001',
  email: 'alice@example.com',
  password_hash: '$argon2id$placeholder',
  name: 'Alice',
  phone: null,
  role: 'studio_owner',
  studio_status: 'pending',
  email_verified: false,
  email_verified_at: null,
  is_banned: false,
  banned_at: null,
  ban_reason: null,
  failed_login_attempts: 2,
  locked_until: null,
  created_at: T0,
  updated_at: T0,
};

describe('PgUserRepository', () => {
  const repo = new PgUserRepository();

  it('maps a row to a user', async () => {
    const client = createFakeClient({ rows: [userRow] });

    const user = await repo.findById(client, '1001');

    expect(user).toEqual({
      id: '1001',
      email: 'alice@example.com',
      passwordHash: '$argon2id$placeholder',
      name: 'Alice',
      phone: null,
      role: 'studio_owner',
      studioStatus: 'pending',
      emailVerified: false,
      emailVerifiedAt: null,
      isBanned: false,
      bannedAt: null,
      banReason: null,
      failedLoginAttempts: 2,
      lockedUntil: null,
      createdAt: T0,
      updatedAt: T0,
    });
  });

  it('returns null when no row matches', async () => {
    await expect(repo.findByEmail(createFakeClient(), 'nobody@example.com')).resolves.toBeNull();
  });

  it('looks emails up case-insensitively', async () => {
    const client = createFakeClient();

    await repo.findByEmail(client, ' Alice@Example.COM ');

    expect(sqlOf(client)).toContain('WHERE lower(email) = $1');
    expect(valuesOf(client)).toEqual(['alice@example.com']);
  });

  it('locks the account row by normalized email', async () => {
    const client = createFakeClient({ rows: [userRow] });

    const user = await repo.lockByEmail(client, ' Alice@Example.COM ');

    expect(sqlOf(client)).toMatch(/WHERE lower\(email\) = \$1 FOR UPDATE$/);
    expect(valuesOf(client)).toEqual(['alice@example.com']);
    expect(user?.id).toBe('1001');
  });

  it('maps a unique violation on insert to DUPLICATE_EMAIL', async () => {
    const client = createFakeClient();
    client.query.mockRejectedValueOnce(
      Object.assign(new Error('duplicate key value violates unique constraint'), { code: '23505' }),
    );

    const err = await repo
      .create(client, {
        id: '1002',
        email: 'alice@example.com',
        passwordHash: 'h',
        name: 'Alice',
        phone: null,
        role: 'client',
        studioStatus: null,
      })
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(AuthError);
    expect(err).toMatchObject({ kind: 'DUPLICATE_EMAIL' });
  });

  it('lets other insert failures through', async () => {
    const client = createFakeClient();
    client.query.mockRejectedValueOnce(new Error('connection reset'));

    await expect(
      repo.create(client, {
        id: '1002',
        email: 'alice@example.com',
        passwordHash: 'h',
        name: 'Alice',
        phone: null,
        role: 'client',
        studioStatus: null,
      }),
    ).rejects.toThrow('connection reset');
  });

  it('updates only the columns in the patch', async () => {
    const client = createFakeClient({ rowCount: 1 });

    await repo.update(client, '1001', { failedLoginAttempts: 0, lockedUntil: null });

    expect(sqlOf(client)).toBe(
      'UPDATE users SET failed_login_attempts = $2, locked_until = $3, updated_at = NOW() WHERE id = $1',
    );
    expect(valuesOf(client)).toEqual(['1001', 0, null]);
  });

  it('skips the write for an empty patch', async () => {
    const client = createFakeClient();

    await repo.update(client, '1001', {});

    expect(client.query).not.toHaveBeenCalled();
  });

  it('reads existence from the EXISTS column', async () => {
    await expect(repo.existsByEmail(createFakeClient({ rows: [{ exists: true }] }), 'a@b.co')).resolves.toBe(true);
  });
});

describe('PgRefreshTokenRepository', () => {
  const repo = new PgRefreshTokenRepository();

  it('locks the presented row', async () => {
    const client = createFakeClient();

    await repo.lockByTokenHash(client, 'abc');

    expect(sqlOf(client)).toMatch(/WHERE token_hash = \$1 FOR UPDATE$/);
  });

  it('maps a row, including the chain link', async () => {
    const client = createFakeClient({
      rows: [
        {
          id: '2002',
          user_id: '1001',
          token_hash: 'f'.repeat(64),
          family_id: '3001',
          rotated_from: '2001',
          issued_at: T0,
          expires_at: new Date('2026-03-09T10:00:00.000Z'),
          used_at: null,
          revoked_at: null,
          reuse_detected_at: null,
          user_agent: 'vitest',
          ip: '127.0.0.1',
        },
      ],
    });

    const token = await repo.findByTokenHash(client, 'f'.repeat(64));

    expect(token).toMatchObject({ id: '2002', familyId: '3001', rotatedFrom: '2001', usedAt: null });
  });

  it('reports whether a revoke changed anything', async () => {
    await expect(repo.revoke(createFakeClient({ rowCount: 1 }), '2001', T0)).resolves.toBe(true);
    await expect(repo.revoke(createFakeClient({ rowCount: 0 }), '2001', T0)).resolves.toBe(false);
  });

  it('revokes only active members of a family', async () => {
    const client = createFakeClient({ rowCount: 3 });

    await expect(repo.revokeFamily(client, '3001', T0)).resolves.toBe(3);
    expect(sqlOf(client)).toBe(
      'UPDATE refresh_tokens SET revoked_at = $2 WHERE family_id = $1 AND revoked_at IS NULL',
    );
    expect(valuesOf(client)).toEqual(['3001', T0]);
  });

  it('prunes past the newest records', async () => {
    const client = createFakeClient({ rowCount: 2 });

    await expect(repo.pruneForUser(client, '1001', 10)).resolves.toBe(2);
    expect(sqlOf(client)).toContain('ORDER BY issued_at DESC, id DESC OFFSET $2');
    expect(valuesOf(client)).toEqual(['1001', 10]);
  });

  it('passes the retention window to the cleanup', async () => {
    const client = createFakeClient({ rowCount: 7 });

    await expect(repo.deleteExpired(client, 30)).resolves.toBe(7);
    expect(sqlOf(client)).toBe(
      'DELETE FROM refresh_tokens WHERE expires_at < NOW() - make_interval(days => $1) ' +
        'OR (revoked_at IS NOT NULL AND revoked_at < NOW() - make_interval(days => $1))',
    );
    expect(valuesOf(client)).toEqual([30]);
  });
});

describe('PgVerificationCodeRepository', () => {
  const repo = new PgVerificationCodeRepository();

  it('claims a code only while it is unused', async () => {
    const client = createFakeClient({ rowCount: 0 });

    await expect(repo.markUsed(client, '4001', T0)).resolves.toBe(false);
    expect(sqlOf(client)).toBe(
      'UPDATE email_verification_codes SET used_at = $2 WHERE id = $1 AND used_at IS NULL',
    );
  });

  it('returns the incremented attempt count', async () => {
    await expect(
      repo.incrementAttempts(createFakeClient({ rows: [{ attempts: 3 }] }), '4001'),
    ).resolves.toBe(3);
  });

  it('finds the newest code for an address', async () => {
    const client = createFakeClient();

    await expect(repo.findLatestByEmail(client, 'alice@example.com')).resolves.toBeNull();
    expect(sqlOf(client)).toContain('ORDER BY created_at DESC, id DESC LIMIT 1');
  });
});
