import { describe, it, expect, beforeEach, vi } from 'vitest';
import { createAuthHarness, T0, type AuthHarness } from './fakes';

const MINUTE = 60 * 1000;

describe('VerificationGate', () => {
  let h: AuthHarness;
  let userId: string;

  function codes() {
    return [...h.store.tables.verificationCodes.values()];
  }

  beforeEach(() => {
    h = createAuthHarness();
    userId = h.seedUser({ emailVerified: false, emailVerifiedAt: null }).id;
  });

  describe('requestCode', () => {
    it('stores a hashed code and mails the raw one', async () => {
      const result = await h.verificationGate.requestCode(' Alice@Example.com ');

      expect(result).toEqual({ issuedAt: T0 });
      expect(h.mailer.sent).toEqual([{ email: 'alice@example.com', code: 'code-1' }]);
      expect(codes()).toMatchObject([
        {
          userId,
          email: 'alice@example.com',
          codeHash: 'pepper:code-1',
          attempts: 0,
          usedAt: null,
          expiresAt: new Date(T0.getTime() + 5 * MINUTE),
        },
      ]);
    });

    it('answers an unknown address the same way without sending anything', async () => {
      await expect(h.verificationGate.requestCode('nobody@example.com')).resolves.toEqual({ issuedAt: T0 });
      expect(h.mailer.sendVerificationCode).not.toHaveBeenCalled();
      expect(codes()).toHaveLength(0);
    });

    it('answers a verified account without sending anything', async () => {
      h.userById(userId).emailVerified = true;

      await expect(h.verificationGate.requestCode('alice@example.com')).resolves.toEqual({ issuedAt: T0 });
      expect(h.mailer.sendVerificationCode).not.toHaveBeenCalled();
    });

    it('refuses a resend inside the cooldown', async () => {
      await h.verificationGate.requestCode('alice@example.com');
      h.clock.advance(30_000);

      await expect(h.verificationGate.requestCode('alice@example.com')).rejects.toMatchObject({
        kind: 'RESEND_TOO_SOON',
        safeMeta: { retryAfterSeconds: 30 },
      });
      expect(h.mailer.sent).toHaveLength(1);
    });

    it('locks the account row before reading the latest code', async () => {
      const lock = vi.spyOn(h.userRepo, 'lockByEmail');
      const latest = vi.spyOn(h.verificationCodeRepo, 'findLatestByEmail');

      await h.verificationGate.requestCode('alice@example.com');

      expect(lock).toHaveBeenCalledWith(expect.anything(), 'alice@example.com');
      expect(lock.mock.invocationCallOrder[0]).toBeLessThan(latest.mock.invocationCallOrder[0] ?? 0);
    });

    it('issues one code when two requests for the same address race', async () => {
      const results = await Promise.allSettled([
        h.verificationGate.requestCode('alice@example.com'),
        h.verificationGate.requestCode('alice@example.com'),
      ]);

      expect(results.map((r) => r.status)).toEqual(['fulfilled', 'rejected']);
      expect(results[1]).toMatchObject({ reason: { kind: 'RESEND_TOO_SOON' } });
      expect(h.mailer.sent).toHaveLength(1);
      expect(codes()).toHaveLength(1);
    });

    it('supersedes the outstanding code once the cooldown has passed', async () => {
      await h.verificationGate.requestCode('alice@example.com');
      h.clock.advance(MINUTE);

      await h.verificationGate.requestCode('alice@example.com');

      const [first, second] = codes();
      expect(first?.usedAt).toEqual(new Date(T0.getTime() + MINUTE));
      expect(second?.usedAt).toBeNull();
      expect(h.mailer.sent.map((m) => m.code)).toEqual(['code-1', 'code-2']);
    });

    it('rolls the code back when delivery fails so the caller can retry at once', async () => {
      vi.mocked(h.mailer.sendVerificationCode).mockRejectedValueOnce(new Error('smtp unavailable'));

      await expect(h.verificationGate.requestCode('alice@example.com')).rejects.toMatchObject({
        kind: 'INTERNAL',
      });
      expect(codes()).toHaveLength(0);

      await h.verificationGate.requestCode('alice@example.com');
      expect(h.mailer.sent).toEqual([{ email: 'alice@example.com', code: 'code-2' }]);
    });
  });

  describe('confirm', () => {
    beforeEach(async () => {
      await h.verificationGate.requestCode('alice@example.com');
      h.clock.advance(10_000);
    });

    it('marks the email verified and consumes the code', async () => {
      await h.verificationGate.confirm('ALICE@example.com', 'code-1');

      const verifiedAt = new Date(T0.getTime() + 10_000);
      expect(h.userById(userId)).toMatchObject({ emailVerified: true, emailVerifiedAt: verifiedAt });
      expect(codes()[0]?.usedAt).toEqual(verifiedAt);
    });

    it('accepts a code only once', async () => {
      await h.verificationGate.confirm('alice@example.com', 'code-1');

      await expect(h.verificationGate.confirm('alice@example.com', 'code-1')).rejects.toMatchObject({
        kind: 'CODE_INVALID',
      });
    });

    it('counts wrong guesses and burns the code at the limit', async () => {
      for (let i = 0; i < 4; i++) {
        await expect(h.verificationGate.confirm('alice@example.com', '000000')).rejects.toMatchObject({
          kind: 'CODE_INVALID',
        });
      }
      expect(codes()[0]?.attempts).toBe(4);

      await expect(h.verificationGate.confirm('alice@example.com', '000000')).rejects.toMatchObject({
        kind: 'TOO_MANY_ATTEMPTS',
      });
      await expect(h.verificationGate.confirm('alice@example.com', 'code-1')).rejects.toMatchObject({
        kind: 'TOO_MANY_ATTEMPTS',
      });
      expect(h.userById(userId).emailVerified).toBe(false);
    });

    it('holds the attempt cap when wrong guesses arrive together', async () => {
      const lock = vi.spyOn(h.userRepo, 'lockByEmail');

      const results = await Promise.allSettled(
        Array.from({ length: 7 }, () => h.verificationGate.confirm('alice@example.com', '000000')),
      );

      const kinds = results.map((r) => (r.status === 'rejected' ? r.reason.kind : 'ok'));
      expect(kinds).toEqual([
        'CODE_INVALID',
        'CODE_INVALID',
        'CODE_INVALID',
        'CODE_INVALID',
        'TOO_MANY_ATTEMPTS',
        'TOO_MANY_ATTEMPTS',
        'TOO_MANY_ATTEMPTS',
      ]);
      expect(codes()[0]?.attempts).toBe(5);
      expect(lock).toHaveBeenCalledTimes(7);
    });

    it('rejects an expired code', async () => {
      h.clock.advance(5 * MINUTE);

      await expect(h.verificationGate.confirm('alice@example.com', 'code-1')).rejects.toMatchObject({
        kind: 'CODE_INVALID',
      });
      expect(h.userById(userId).emailVerified).toBe(false);
    });

    it('rejects a code that a newer one superseded', async () => {
      h.clock.advance(MINUTE);
      await h.verificationGate.requestCode('alice@example.com');

      await expect(h.verificationGate.confirm('alice@example.com', 'code-1')).rejects.toMatchObject({
        kind: 'CODE_INVALID',
      });
      await h.verificationGate.confirm('alice@example.com', 'code-2');
      expect(h.userById(userId).emailVerified).toBe(true);
    });

    it('rejects an address with no account', async () => {
      await expect(h.verificationGate.confirm('nobody@example.com', 'code-1')).rejects.toMatchObject({
        kind: 'CODE_INVALID',
      });
    });
  });
});
