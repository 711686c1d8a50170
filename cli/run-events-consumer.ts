/**
 * CLI: Run Events Consumer
 * Drains the broker-event queue into the account / price / candle groups
 * until SIGINT or SIGTERM.
 */

import * as dotenv from 'dotenv';
import { LoggerFactory } from '../logging/logger';
import { loadSettings, Settings } from '../config/settings';
import { ConfigurationError } from '../connectors/errors';
import { ConnectorServices } from '../services/ConnectorServices';

dotenv.config();

const logger = LoggerFactory.getLogger('run-events-consumer');

async function main() {
  let settings: Settings;
  try {
    settings = loadSettings();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(`Error: ${error.message}`);
      error.issues.forEach((issue) => console.error(`  - ${issue}`));
      process.exit(1);
    }
    throw error;
  }

  const services = new ConnectorServices(settings);
  const consumer = services.createEventsConsumer();

  let shuttingDown = false;
  const shutdown = async (signal: string, exitCode = 0) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`${signal} received, stopping consumer...`);
    try {
      await consumer.stop();
      await services.shutdown();
    } catch (error) {
      logger.error('Error during shutdown', error);
      exitCode = 1;
    }
    LoggerFactory.closeAll();
    process.exit(exitCode);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((error: unknown) => {
      console.error('Shutdown failed:', error);
      process.exit(1);
    });
  };
  process.on('SIGINT', () => onSignal('SIGINT'));
  process.on('SIGTERM', () => onSignal('SIGTERM'));

  consumer.on('closed', () => {
    shutdown('connection closed', 1).catch((error: unknown) => {
      console.error('Shutdown failed:', error);
      process.exit(1);
    });
  });

  await consumer.start();
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
