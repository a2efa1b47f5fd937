import { createLogger, loadRelayConfig } from 'agentlink-protocol';
import { createRelayServer } from './server.js';

const config = loadRelayConfig();
const logger = createLogger('agentlink-relay', config.logLevel);
const server = createRelayServer({ config, logger });

server.listening
  .then((port) => {
    logger.info(`agentlink relay running on ws://${config.host}:${port}`);
    logger.info(`Status: http://${config.host}:${port}/status`);
  })
  .catch((err: unknown) => {
    logger.fatal({ err }, 'failed to start relay');
    process.exit(1);
  });

function stop(signal: string): void {
  logger.info({ signal }, 'shutting down');
  server
    .close()
    .then(() => process.exit(0))
    .catch((err: unknown) => {
      logger.error({ err }, 'shutdown failed');
      process.exit(1);
    });
}

process.on('SIGINT', () => stop('SIGINT'));
process.on('SIGTERM', () => stop('SIGTERM'));
