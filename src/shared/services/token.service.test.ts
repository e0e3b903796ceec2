import { describe, it, expect } from 'vitest';
import jwt from 'jsonwebtoken';
import { issueToken, verifyToken } from './token.service.js';
import { config } from '@config/app.config.js';

describe('Token Service', () => {
  it('should issue a token that verifies to the same user and role', () => {
    const token = issueToken({ id: 42, role: 'admin' });

    expect(verifyToken(token)).toEqual({ userId: 42, role: 'admin' });
  });

  it('should reject a token from another issuer', () => {
    const token = jwt.sign({ role: 'admin' }, config.auth.jwtSecret, {
      subject: '42',
      issuer: 'someone-else',
    });

    expect(() => verifyToken(token)).toThrow();
  });

  it('should reject a token with an unknown role', () => {
    const token = jwt.sign({ role: 'owner' }, config.auth.jwtSecret, {
      subject: '42',
      issuer: config.auth.issuer,
    });

    expect(() => verifyToken(token)).toThrow();
  });
});
