import { loadConfig, WorkerConfigSchema, createLogger, errorMessage, startHealthBeat } from '@bookwell/shared';
import {
  initPool,
  closePool,
  withTransaction,
  PgRefreshTokenRepository,
  PgVerificationCodeRepository,
} from '@bookwell/db';
import { runAuthCleanupJob } from './jobs/auth-cleanup';

const logger = createLogger({ name: 'worker' });

async function main() {
  const config = loadConfig(WorkerConfigSchema);

  initPool({ connectionString: config.DATABASE_URL });

  const healthBeat = startHealthBeat(5000, config.WORKER_HEALTHCHECK_PATH, (err) => {
    logger.warn({ err: errorMessage(err) }, 'Health file write failed');
  });

  const cleanupDeps = {
    withTransaction,
    refreshTokenRepo: new PgRefreshTokenRepository(),
    verificationCodeRepo: new PgVerificationCodeRepository(),
    retentionDays: config.REVOKED_TOKEN_RETENTION_DAYS,
    logger: logger.child({ job: 'auth-cleanup' }),
  };

  const runCleanup = () => {
    runAuthCleanupJob(cleanupDeps).catch(logJobError('auth-cleanup'));
  };
  runCleanup();
  const jobIntervals = [setInterval(runCleanup, config.AUTH_CLEANUP_INTERVAL_MS)];

  logger.info({}, 'Worker started');

  const shutdown = async () => {
    logger.info({}, 'Shutting down worker');
    healthBeat.stop();
    for (const interval of jobIntervals) clearInterval(interval);
    await closePool();
    process.exit(0);
  };

  process.on('SIGTERM', () => {
    void shutdown();
  });
  process.on('SIGINT', () => {
    void shutdown();
  });
}

function logJobError(jobName: string) {
  return (err: unknown) => {
    logger.error(
      { err: errorMessage(err), job: jobName },
      'Job failed',
    );
  };
}

main().catch((err) => {
  logger.fatal({ err: errorMessage(err) }, 'Failed to start worker');
  process.exit(1);
});
