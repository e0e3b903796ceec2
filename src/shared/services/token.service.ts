import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { config } from '@config/app.config.js';
import { UserRole } from '@modules/identity/permissions.js';

const TokenClaimsSchema = z.object({
  sub: z.string().regex(/^\d+$/),
  role: z.enum([UserRole.ADMIN, UserRole.CAREGIVER]),
});

export interface TokenClaims {
  userId: number;
  role: z.infer<typeof TokenClaimsSchema>['role'];
}

/**
 * Sign a bearer token for a user.
 */
export function issueToken(user: { id: number; role: TokenClaims['role'] }): string {
  return jwt.sign({ role: user.role }, config.auth.jwtSecret, {
    subject: String(user.id),
    issuer: config.auth.issuer,
    expiresIn: config.auth.jwtExpiresInSeconds,
    algorithm: 'HS256',
  });
}

/**
 * Verify a bearer token and return its claims. Throws on a bad signature,
 * expiry or unexpected payload.
 */
export function verifyToken(token: string): TokenClaims {
  const payload = jwt.verify(token, config.auth.jwtSecret, {
    issuer: config.auth.issuer,
    algorithms: ['HS256'],
  });
  const claims = TokenClaimsSchema.parse(payload);
  return { userId: Number(claims.sub), role: claims.role };
}
