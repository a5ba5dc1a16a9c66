import { buildServer, createServerDeps } from './server';
import { loadConfig, ApiConfigSchema, createLogger, errorMessage } from '@bookwell/shared';
import { initPool, closePool } from '@bookwell/db';

const logger = createLogger({ name: 'api' });

async function main() {
  const config = loadConfig(ApiConfigSchema);
  const appLogger = createLogger({ name: 'api', level: config.LOG_LEVEL });

  initPool({ connectionString: config.DATABASE_URL });

  const app = await buildServer(createServerDeps(config, appLogger));

  await app.listen({ host: config.API_HOST, port: config.API_PORT });
  appLogger.info({ port: config.API_PORT }, 'API server started');

  const shutdown = async () => {
    appLogger.info({}, 'Shutting down API server');
    await app.close();
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

main().catch((err) => {
  logger.fatal({ err: errorMessage(err) }, 'Failed to start API');
  process.exit(1);
});
