// Server entry point

import { createConsoleLogger, createInMemoryPayoutGateway } from '@quire/runtime';
import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { openStorage } from './db.js';
import { createHttpServer } from './server.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createConsoleLogger(config.logLevel);
  const storage = openStorage(config);

  // Payouts are credited to in-process balances; a deployment that moves
  // real value supplies its own PayoutGateway.
  const app = createApp({
    repos: storage.repos,
    payouts: createInMemoryPayoutGateway(),
    contentFormat: config.contentFormat,
    logger,
  });

  const server = createHttpServer(app);
  server.listen(config.port, () => {
    logger.info('Server listening', { port: config.port, storage: storage.kind });
  });

  const shutdown = () => {
    logger.info('Shutting down');
    server.close(() => {
      storage.close().then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error('Failed to close storage', {
            error: error instanceof Error ? error.message : String(error),
          });
          process.exit(1);
        }
      );
    });
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
