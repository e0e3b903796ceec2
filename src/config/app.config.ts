import { z } from 'zod';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().default(3000),
  // PGlite data directory; "memory://" keeps everything in process
  DATABASE_URL: z.string().min(1).default('./data/community'),
  CORS_ORIGIN: z.string().default('*'),
  // Auth
  JWT_SECRET: z.string().min(8),
  JWT_EXPIRES_IN_SECONDS: z.coerce.number().int().positive().default(12 * 60 * 60),
  BCRYPT_ROUNDS: z.coerce.number().int().min(4).max(15).default(10),
  // Account sign-up
  STAFF_ACCESS_CODE: z.string().min(1),
  CAREGIVER_ACCESS_CODE: z.string().min(1).optional(),
});

const env = envSchema.parse(process.env);

export const config = {
  ...env,
  isDevelopment: env.NODE_ENV === 'development',
  isProduction: env.NODE_ENV === 'production',
  isTest: env.NODE_ENV === 'test',
  database: {
    dataDir: env.DATABASE_URL,
  },
  security: {
    rateLimit: {
      max: env.NODE_ENV === 'production' ? 100 : 1000,
      timeWindow: '1 minute',
    },
  },
  auth: {
    jwtSecret: env.JWT_SECRET,
    jwtExpiresInSeconds: env.JWT_EXPIRES_IN_SECONDS,
    bcryptRounds: env.BCRYPT_ROUNDS,
    issuer: 'community-registrations',
    staffAccessCode: env.STAFF_ACCESS_CODE,
    caregiverAccessCode: env.CAREGIVER_ACCESS_CODE,
  },
};
