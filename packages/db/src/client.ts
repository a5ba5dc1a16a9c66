import { Pool, type PoolConfig, type PoolClient } from 'pg';
import { createLogger, errorMessage } from '@bookwell/shared';
import { type TransactionOptions, type TransactionRunner } from '@bookwell/domain';

const logger = createLogger({ name: 'db' });

// serialization_failure, deadlock_detected
const RETRYABLE_SQLSTATES = new Set(['40001', '40P01']);
const MAX_SERIALIZABLE_ATTEMPTS = 3;

/** The part of a pg client a transaction needs; satisfied by `PoolClient`. */
export interface TxClient {
  query(text: string, values?: unknown[]): Promise<unknown>;
  release(err?: boolean | Error): void;
}

export interface ConnectionSource {
  connect(): Promise<TxClient>;
}

let pool: Pool | null = null;

export function getPool(): Pool {
  if (!pool) throw new Error('Database pool not initialized. Call initPool first.');
  return pool;
}

export function initPool(config: PoolConfig): Pool {
  pool = new Pool(config);
  pool.on('error', (err) => {
    logger.error({ err: err.message }, 'Unexpected database pool error');
  });
  logger.info({}, 'Database pool initialized');
  return pool;
}

export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
    logger.info({}, 'Database pool closed');
  }
}

export async function pingDatabase(): Promise<boolean> {
  try {
    await getPool().query('SELECT 1');
    return true;
  } catch (err) {
    logger.warn({ err: errorMessage(err) }, 'Database ping failed');
    return false;
  }
}

function isPoolClient(tx: unknown): tx is PoolClient {
  return (
    typeof tx === 'object' &&
    tx !== null &&
    'query' in tx &&
    typeof tx.query === 'function' &&
    'release' in tx &&
    typeof tx.release === 'function'
  );
}

/** Narrows the opaque transaction handle the domain passes around. */
export function clientOf(tx: unknown): PoolClient {
  if (!isPoolClient(tx)) {
    throw new Error('Repository called outside a database transaction');
  }
  return tx;
}

export function sqlStateOf(err: unknown): string | null {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return null;
}

function isRetryable(err: unknown): boolean {
  const state = sqlStateOf(err);
  return state !== null && RETRYABLE_SQLSTATES.has(state);
}

async function runOnce<T>(
  source: ConnectionSource,
  fn: (tx: unknown) => Promise<T>,
  options: TransactionOptions,
): Promise<T> {
  options.signal?.throwIfAborted();
  const client = await source.connect();
  let broken = false;
  try {
    await client.query(options.isolation === 'serializable' ? 'BEGIN ISOLATION LEVEL SERIALIZABLE' : 'BEGIN');
    const result = await fn(client);
    options.signal?.throwIfAborted();
    await client.query('COMMIT');
    return result;
  } catch (err) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackErr) {
      broken = true;
      logger.error(
        { err: errorMessage(rollbackErr) },
        'Rollback failed; discarding connection',
      );
    }
    throw err;
  } finally {
    client.release(broken);
  }
}

/**
 * Serializable transactions are retried on serialization failures and
 * deadlocks, so `fn` must be safe to run more than once.
 */
export function createTransactionRunner(source: ConnectionSource): TransactionRunner {
  return async <T>(fn: (tx: unknown) => Promise<T>, options: TransactionOptions = {}): Promise<T> => {
    const attempts = options.isolation === 'serializable' ? MAX_SERIALIZABLE_ATTEMPTS : 1;
    for (let attempt = 1; ; attempt++) {
      try {
        return await runOnce(source, fn, options);
      } catch (err) {
        if (attempt >= attempts || !isRetryable(err)) throw err;
        logger.warn({ attempt, sqlState: sqlStateOf(err) }, 'Retrying transaction after serialization failure');
      }
    }
  };
}

export const withTransaction: TransactionRunner = createTransactionRunner({
  connect: () => getPool().connect(),
});
