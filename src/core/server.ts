import Fastify from 'fastify';
import { sql } from 'drizzle-orm';
import {
  serializerCompiler,
  validatorCompiler,
  type ZodTypeProvider,
} from 'fastify-type-provider-zod';
import { registerPlugins } from './plugins.js';
import { registerHooks } from './hooks.js';
import { errorHandler } from '@shared/middleware/error.middleware.js';
import { db } from '@/database/client.js';
import { logger } from '@shared/utils/logger.js';
import { authRoutes } from '@identity';
import { participantsRoutes } from '@participants';
import { eventsRoutes } from '@events';
import { registrationsRoutes } from '@registrations';
import { reportsRoutes } from '@reports';
import type { AppInstance } from '@shared/types/fastify.js';

export async function buildServer(): Promise<AppInstance> {
  const app = Fastify({
    loggerInstance: logger,
  }).withTypeProvider<ZodTypeProvider>();

  app.setValidatorCompiler(validatorCompiler);
  app.setSerializerCompiler(serializerCompiler);

  // Register plugins (CORS, Helmet, Rate Limit)
  await registerPlugins(app);

  // Register lifecycle hooks
  registerHooks(app);

  // Health check with database connectivity
  app.get('/health', async (_request, reply) => {
    const checks: Record<string, 'connected' | 'disconnected'> = {
      database: 'disconnected',
    };

    try {
      await db.execute(sql`SELECT 1`);
      checks.database = 'connected';
    } catch (error) {
      logger.warn({ err: error }, 'Database health check failed');
    }

    const allHealthy = Object.values(checks).every((v) => v === 'connected');
    const status = allHealthy ? 'ok' : 'degraded';
    const statusCode = allHealthy ? 200 : 503;

    return reply.status(statusCode).send({
      status,
      timestamp: new Date().toISOString(),
      checks,
    });
  });

  // Register module routes
  await app.register(authRoutes, { prefix: '/api/auth' });
  await app.register(participantsRoutes, { prefix: '/api/participants' });
  await app.register(eventsRoutes, { prefix: '/api/events' });
  await app.register(registrationsRoutes, { prefix: '/api/events' });
  await app.register(reportsRoutes, { prefix: '/api/registrations' });

  // Global error handler
  app.setErrorHandler(errorHandler);

  return app;
}
