import type { FastifyInstance } from 'fastify';
import type { ZodTypeProvider } from 'fastify-type-provider-zod';
import type { User } from '../../database/schema.js';

/**
 * Extended Fastify instance type with Zod type provider.
 * Uses generic parameters to be compatible with any logger type.
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type AppInstance = FastifyInstance<any, any, any, any, ZodTypeProvider>;

/**
 * A user as exposed past the auth layer: never carries the password hash.
 */
export type AuthUser = Omit<User, 'passwordHash'>;

declare module 'fastify' {
  interface FastifyRequest {
    user?: AuthUser;
  }
}
