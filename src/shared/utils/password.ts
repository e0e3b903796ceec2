import bcrypt from 'bcryptjs';
import { config } from '@config/app.config.js';

/**
 * Hash a password with bcrypt at the configured cost.
 */
export function hashPassword(password: string): Promise<string> {
  return bcrypt.hash(password, config.auth.bcryptRounds);
}

/**
 * Check a password against a stored bcrypt hash. Anything that is not a
 * bcrypt hash never matches.
 */
export function verifyPassword(password: string, stored: string): Promise<boolean> {
  return bcrypt.compare(password, stored);
}
