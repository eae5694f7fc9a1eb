import { loadConfig } from '../../lib/config';
import { createLogger } from '../../lib/logger';
import { createRecommendationService } from '../../lib/runtime';
import { createApp } from './app';

const config = loadConfig();
const logger = createLogger('server', config.logging);

process.on('uncaughtException', (err) => {
  logger.error('uncaughtException', err);
});
process.on('unhandledRejection', (err) => {
  logger.error('unhandledRejection', err);
});

const { service, close } = createRecommendationService(config, logger);
const app = createApp({ service, logger });

const server = app.listen(config.port, () => {
  logger.info('Server listening on port %d', config.port);
});

function shutdown(signal: string): void {
  logger.info('%s received, shutting down', signal);
  server.close(() => {
    close()
      .catch((err: unknown) => logger.warn('Error while closing cache connection', err))
      .finally(() => process.exit(0));
  });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
