import { randomUUID } from 'crypto';
import type { AppInstance } from '@shared/types/fastify.js';

export function registerHooks(app: AppInstance) {
  // Propagate or assign a request ID
  app.addHook('onRequest', async (request) => {
    const incoming = request.headers['x-request-id'];
    request.id = typeof incoming === 'string' && incoming ? incoming : randomUUID();
  });

  // Add response headers
  app.addHook('onSend', async (request, reply) => {
    reply.header('x-request-id', request.id);
  });
}
