import { describe, it, expect, vi } from 'vitest';
import { type TransactionRunner } from '@bookwell/domain';
import { runAuthCleanupJob } from '../jobs/auth-cleanup';

function createLogger() {
  const logger = {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    fatal: vi.fn(),
    child: vi.fn(),
  };
  logger.child.mockReturnValue(logger);
  return logger;
}

const withTransaction: TransactionRunner = (fn) => fn('tx');

describe('runAuthCleanupJob', () => {
  it('deletes expired tokens and codes and reports the counts', async () => {
    const logger = createLogger();
    const refreshTokenRepo = { deleteExpired: vi.fn().mockResolvedValue(4) };
    const verificationCodeRepo = { deleteExpired: vi.fn().mockResolvedValue(2) };

    const result = await runAuthCleanupJob({
      withTransaction,
      refreshTokenRepo,
      verificationCodeRepo,
      retentionDays: 30,
      logger,
    });

    expect(result).toEqual({ deletedTokens: 4, deletedCodes: 2 });
    expect(refreshTokenRepo.deleteExpired).toHaveBeenCalledWith('tx', 30);
    expect(verificationCodeRepo.deleteExpired).toHaveBeenCalledWith('tx');
    expect(logger.info).toHaveBeenCalledWith({ count: 4 }, 'Cleaned up expired refresh tokens');
    expect(logger.info).toHaveBeenCalledWith({ count: 2 }, 'Cleaned up expired verification codes');
  });

  it('stays quiet about empty sweeps', async () => {
    const logger = createLogger();

    const result = await runAuthCleanupJob({
      withTransaction,
      refreshTokenRepo: { deleteExpired: vi.fn().mockResolvedValue(0) },
      verificationCodeRepo: { deleteExpired: vi.fn().mockResolvedValue(0) },
      retentionDays: 7,
      logger,
    });

    expect(result).toEqual({ deletedTokens: 0, deletedCodes: 0 });
    expect(logger.info).toHaveBeenCalledTimes(2);
    expect(logger.info).toHaveBeenLastCalledWith({}, 'Auth cleanup completed');
  });

  it('propagates a store failure', async () => {
    const verificationCodeRepo = { deleteExpired: vi.fn() };

    await expect(
      runAuthCleanupJob({
        withTransaction,
        refreshTokenRepo: { deleteExpired: vi.fn().mockRejectedValue(new Error('connection lost')) },
        verificationCodeRepo,
        retentionDays: 30,
        logger: createLogger(),
      }),
    ).rejects.toThrow('connection lost');
    expect(verificationCodeRepo.deleteExpired).not.toHaveBeenCalled();
  });
});
