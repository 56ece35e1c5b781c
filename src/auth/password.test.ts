import { describe, it, expect } from 'vitest';
import { hashPassword, isValid } from './password.js';

// Lowest bcrypt cost keeps the suite fast
const ROUNDS = 4;

describe('password hashing', () => {
  it('produces a different digest for each call', async () => {
    const first = await hashPassword('test-password', ROUNDS);
    const second = await hashPassword('test-password', ROUNDS);

    expect(first).not.toBe(second);
    expect(await isValid(first, 'test-password')).toBe(true);
    expect(await isValid(second, 'test-password')).toBe(true);
  });

  it('never returns the plain password', async () => {
    const digest = await hashPassword('test-password', ROUNDS);

    expect(digest).not.toContain('test-password');
    expect(digest.startsWith('$2b$04$')).toBe(true);
  });

  it('rejects a wrong password', async () => {
    const digest = await hashPassword('test-password', ROUNDS);

    expect(await isValid(digest, 'other-password')).toBe(false);
  });
});
