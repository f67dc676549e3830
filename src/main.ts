import 'dotenv/config';
import { createServer } from './api/server';
import { loadConfig, toNtripClientOptions } from './config';
import type { AppConfig } from './config';
import { CorrectionBroker } from './services/CorrectionBroker';
import { NtripClient } from './sources/NtripClient';
import { ReplaySource } from './sources/ReplaySource';
import { ConfigError } from './utils/errors';
import { logger, setLogLevel } from './utils/logger';

let config: AppConfig;
try {
  config = loadConfig();
} catch (error) {
  if (error instanceof ConfigError) {
    logger.fatal({ error: error.message }, 'Invalid configuration');
    process.exit(1);
  }
  throw error;
}
setLogLevel(config.logLevel);

logger.info('Starting gnss-toolkit');

const broker = new CorrectionBroker();

if (config.ntrip) {
  const { connection } = config.ntrip;
  logger.info(
    { host: connection.host, port: connection.port, mountpoint: connection.mountpoint, protocol: connection.protocolVersion },
    'Enabling NTRIP caster source',
  );
  broker.registerSource(new NtripClient(toNtripClientOptions(config.ntrip)));
}

if (config.replay) {
  logger.info({ file: config.replay.filePath, loop: config.replay.loop }, 'Enabling replay source');
  broker.registerSource(new ReplaySource(config.replay));
}

await broker.initialize();

const app = createServer(broker);

const server = app.listen(config.apiPort, () => {
  logger.info({ port: config.apiPort }, `Status API on http://localhost:${config.apiPort}`);
  logger.info('   GET  /health              - Health check');
  logger.info('   GET  /api/sources         - Correction source statistics');
  logger.info('   GET  /api/stations        - Reference stations seen (1005/1006)');
  logger.info('   GET  /api/messages/stats  - Message counts per type');
  logger.info('   GET  /api/stream          - Real-time SSE stream of decoded messages');
});

// Graceful shutdown
const shutdown = async () => {
  logger.info('Shutting down');
  await broker.cleanup();
  server.close(() => {
    logger.info('Server closed');
    process.exit(0);
  });
};

const onSignal = () => {
  shutdown().catch((error: unknown) => {
    logger.error({ error }, 'Shutdown failed');
    process.exit(1);
  });
};

process.on('SIGTERM', onSignal);
process.on('SIGINT', onSignal);
