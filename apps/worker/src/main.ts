import { Logger } from '@propscan/logger';
import { PropscanError } from '@propscan/shared';
import dotenv from 'dotenv';

import { loadConfig } from './lib/config/config-loader';
import { createWorker } from './lib/worker';

dotenv.config();

async function main(): Promise<void> {
  const loaded = loadConfig();
  const logger = Logger.console(loaded.config.logLevel);
  const { ingestor, scheduler } = createWorker({ logger, loaded });

  logger.info(`[Worker] Config loaded from ${loaded.configPath}`);

  for (const file of process.argv.slice(2)) {
    try {
      const { document, duplicate } = await ingestor.ingest(file);
      if (duplicate) {
        logger.info(`[Worker] ${file} already stored as document ${document.id}`);
      }
    } catch (error) {
      logger.error(
        `[Worker] Skipping ${file}: ${PropscanError.getErrorMessage(error)}`,
      );
    }
  }

  let shuttingDown = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (shuttingDown) {
      logger.warn(`[Worker] Received ${signal} again, exiting without drain`);
      process.exit(1);
    }
    shuttingDown = true;
    logger.info(`[Worker] Received ${signal}, draining...`);
    scheduler.stop().then(
      () => logger.info('[Worker] Shutdown complete'),
      (error: unknown) => {
        logger.error(
          `[Worker] Shutdown failed: ${PropscanError.getErrorMessage(error)}`,
        );
        process.exitCode = 1;
      },
    );
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  scheduler.start();
}

main().catch((error: unknown) => {
  console.error(`[Worker] ${PropscanError.getErrorMessage(error)}`);
  process.exitCode = 1;
});
