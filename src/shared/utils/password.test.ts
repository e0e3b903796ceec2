import { describe, it, expect } from 'vitest';
import { hashPassword, verifyPassword } from './password.js';

describe('password hashing', () => {
  it('should produce a salted bcrypt hash at the configured cost', async () => {
    const a = await hashPassword('test-password');
    const b = await hashPassword('test-password');

    expect(a).toMatch(/^\$2[ab]\$04\$[./A-Za-z0-9]{53}$/);
    expect(a).not.toBe(b);
  });

  it('should verify the right password only', async () => {
    const stored = await hashPassword('test-password');

    expect(await verifyPassword('test-password', stored)).toBe(true);
    expect(await verifyPassword('other-password', stored)).toBe(false);
  });

  it('should refuse a hash in an unknown format', async () => {
    expect(await verifyPassword('test-password', 'plain-text')).toBe(false);
    expect(await verifyPassword('test-password', 'scrypt$aa$bb')).toBe(false);
  });
});
