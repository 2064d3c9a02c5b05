import { buildApp } from './app.js';
import { env } from './config/env.js';
import { pool } from './db/client.js';
import { logger } from './utils/logger.js';

async function start() {
  const app = await buildApp();

  app.addHook('onClose', async () => {
    await pool.end();
  });

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      logger.info({ signal }, 'Shutting down');
      app.close().then(
        () => process.exit(0),
        (err: unknown) => {
          logger.error(err, 'Error during shutdown');
          process.exit(1);
        },
      );
    });
  }

  try {
    await app.listen({ port: env.PORT, host: '0.0.0.0' });
    logger.info(`Server listening on port ${env.PORT}`);
  } catch (err) {
    logger.error(err, 'Failed to start server');
    process.exit(1);
  }
}

start().catch((err: unknown) => {
  logger.error(err, 'Failed to start server');
  process.exit(1);
});
