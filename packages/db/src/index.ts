export {
  initPool,
  closePool,
  getPool,
  pingDatabase,
  withTransaction,
  createTransactionRunner,
  clientOf,
  sqlStateOf,
  type TxClient,
  type ConnectionSource,
} from './client';
export {
  applyMigrations,
  directorySource,
  MIGRATIONS_DIR,
  type MigrationClient,
  type MigrationSource,
} from './migrator';
export { PgUserRepository } from './repositories/user-repository';
export { PgRefreshTokenRepository } from './repositories/refresh-token-repository';
export { PgVerificationCodeRepository } from './repositories/verification-code-repository';
