// =============================================================================
// Node entry point
// =============================================================================

import dotenv from 'dotenv';
import { serve } from '@hono/node-server';
import { loadConfig } from './config';
import { createLogger } from './logger';
import { createApp } from './index';
import { SyntheticMarketDataGenerator } from './synthetic-gen';
import { createRandomSource } from './random';
import { MockMarketDataProvider } from './provider';
import { BondService } from './service';
import { MemoryBondStore } from './store';

function main(): void {
  dotenv.config();
  const config = loadConfig(process.env);
  const logger = createLogger({ level: config.logLevel, base: { env: config.environment } });

  const generator = new SyntheticMarketDataGenerator({
    random: createRandomSource(config.randomSeed),
  });
  const store = new MemoryBondStore();
  const service = new BondService({
    generator,
    store,
    provider: new MockMarketDataProvider(generator),
    logger,
    batchSize: config.bondBatchSize,
  });
  const app = createApp({ config, service, generator, logger });

  const server = serve({ fetch: app.fetch, port: config.port, hostname: config.host }, (info) => {
    logger.info(
      { port: info.port, source: service.source, vendorKey: Boolean(config.marketDataApiKey) },
      `Bond dashboard API listening on http://${config.host}:${info.port}`
    );
  });

  const shutdown = (signal: string) => {
    logger.info({ signal }, 'Shutting down');
    // server.close() waits for every open response, event streams included
    app.close();
    server.close((error) => {
      if (error) {
        logger.error({ err: error }, 'Error while closing HTTP server');
      }
      store.close();
      process.exit(error ? 1 : 0);
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

if (require.main === module) {
  try {
    main();
  } catch (error) {
    console.error('Fatal error starting bond dashboard:', error);
    process.exit(1);
  }
}
