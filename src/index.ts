#!/usr/bin/env node
import { createLogger } from './core/Logger';
import { ConfigLoader } from './config';
import { Orchestrator } from './core/Orchestrator';
import { ConfigValidationError, StartupError } from './core/errors';
import { InfluxDB2Sink } from './plugins/outputs';

const VERSION = '1.0.0';
const logger = createLogger('Main');

async function main(): Promise<void> {
  logger.info(`pihole-influxdb-exporter v${VERSION} starting...`);

  const config = new ConfigLoader().load();
  logger.debug('Configuration loaded');

  const orchestrator = new Orchestrator(config, {
    sink: new InfluxDB2Sink(config.influxdb),
  });
  orchestrator.setupSignalHandlers();

  await orchestrator.start();

  logger.info('Exporter is running. Press Ctrl+C to stop.');
}

main().catch((error: unknown) => {
  if (error instanceof ConfigValidationError || error instanceof StartupError) {
    logger.error(error.message);
  } else {
    const message = error instanceof Error ? error.stack || error.message : String(error);
    logger.error(`Fatal error: ${message}`);
  }
  process.exit(1);
});
