import type { FastifyInstance } from 'fastify';
import { client } from '@/database/client.js';
import { logger } from '@shared/utils/logger.js';

export function gracefulShutdown(server: FastifyInstance) {
  const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

  signals.forEach((signal) => {
    process.on(signal, async () => {
      logger.info(`Received ${signal}, shutting down gracefully...`);

      try {
        await server.close();
        await client.close();
        logger.info('Server closed');
        process.exit(0);
      } catch (error) {
        logger.error({ err: error }, 'Error during shutdown');
        process.exit(1);
      }
    });
  });
}
