import bcrypt from 'bcrypt';
import { describe, it, expect } from 'vitest';
import { comparePassword, hashPassword, needsRehash, validatePasswordStrength } from '../passwords';

describe('validatePasswordStrength', () => {
  it('accepts letters plus digits of at least 8 characters', () => {
    expect(validatePasswordStrength('placeholder1')).toBeNull();
  });

  it.each([
    ['short1', 'Password must be at least 8 characters'],
    ['a1'.repeat(65), 'Password must be less than 128 characters'],
    ['12345678', 'Password must contain at least one letter'],
    ['abcdefgh', 'Password must contain at least one number'],
    ['', 'Password must be at least 8 characters'],
  ])('rejects %s', (password, message) => {
    expect(validatePasswordStrength(password)).toBe(message);
  });
});

describe('hashPassword', () => {
  it('produces a hash that only matches its own plaintext', async () => {
    const hash = await hashPassword('placeholder1');

    expect(hash).not.toBe('placeholder1');
    expect(await comparePassword('placeholder1', hash)).toBe(true);
    expect(await comparePassword('placeholder2', hash)).toBe(false);
  });
});

describe('needsRehash', () => {
  it('is false for a hash at the configured cost', async () => {
    expect(needsRehash(await hashPassword('placeholder1'))).toBe(false);
  });

  it('is true for a hash at another cost', async () => {
    expect(needsRehash(await bcrypt.hash('placeholder1', 5))).toBe(true);
  });

  it('is true for something that is not a bcrypt hash', () => {
    expect(needsRehash('not-a-hash')).toBe(true);
  });
});
