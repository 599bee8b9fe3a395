// ===========================================
// AIRHEALTH QUERY ENGINE - MAIN ENTRY POINT
// ===========================================

import type { Server } from 'node:http';
import { appConfig } from './config/index.js';
import { logger } from './utils/logger.js';
import { createQueryEngine } from './bootstrap.js';
import type { QueryEngine } from './modules/query-engine.js';
import { createApp } from './server/app.js';

// ============ STARTUP ============

/**
 * Print startup diagnostic summary
 */
function printStartupDiagnostics(engine: QueryEngine): void {
  const divider = '='.repeat(55);
  const status = engine.status();

  logger.info(divider);
  logger.info('         AIRHEALTH QUERY ENGINE STARTUP DIAGNOSTICS');
  logger.info(divider);

  logger.info('');
  logger.info('ENVIRONMENT');
  logger.info(`   Mode: ${appConfig.nodeEnv.toUpperCase()}`);
  logger.info(`   Log Level: ${appConfig.logLevel}`);
  logger.info(`   Reference Year: ${status.referenceYear}`);

  logger.info('');
  logger.info('REFERENCE DATA');
  logger.info(`   Data Dir: ${appConfig.data.dataDir}`);
  logger.info(`   Countries: ${status.countryCount} | Regions: ${status.regionCount}`);
  logger.info(
    `   Health Detail: ${status.detailSource === 'loaded' ? 'LOADED (age-band records)' : 'NOT SET - aggregated baselines'}`
  );

  logger.info('');
  logger.info('FORECAST MODEL');
  logger.info(`   Kind: ${status.modelKind} | Version: ${status.modelVersion}`);

  logger.info('');
  logger.info(divider);
  logger.info(`              LISTENING ON PORT ${appConfig.port}`);
  logger.info(divider);
  logger.info('');
}

async function main(): Promise<void> {
  logger.info({ env: appConfig.nodeEnv }, 'Starting up...');

  const engine = createQueryEngine(appConfig, logger);
  const app = createApp(engine, logger);

  const server: Server = app.listen(appConfig.port, '0.0.0.0', () => {
    printStartupDiagnostics(engine);
  });

  server.on('error', (error) => {
    logger.error({ error, port: appConfig.port }, 'HTTP server error');
    process.exit(1);
  });

  // Handle graceful shutdown
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Shutdown signal received');

    await new Promise<void>((resolve) => {
      server.close(() => {
        logger.info('HTTP server stopped');
        resolve();
      });
    });

    logger.info('Shutdown complete');
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
}

// ============ RUN ============

main().catch((error) => {
  logger.error({ error }, 'Fatal error during startup');
  process.exit(1);
});
