/**
 * Account passwords: bcrypt hashes at the configured cost, and the
 * rules a new password must pass at registration and on profile update.
 */

import bcrypt from 'bcrypt';
import { getAuthConfig } from './config';

export const PASSWORD_MIN_LENGTH = 8;
export const PASSWORD_MAX_LENGTH = 128;

interface PasswordRule {
  passes(password: string): boolean;
  message: string;
}

// Checked in order; the first failing rule is reported
const PASSWORD_RULES: readonly PasswordRule[] = [
  {
    passes: (p) => p.length >= PASSWORD_MIN_LENGTH,
    message: `Password must be at least ${PASSWORD_MIN_LENGTH} characters`,
  },
  {
    passes: (p) => p.length <= PASSWORD_MAX_LENGTH,
    message: `Password must be less than ${PASSWORD_MAX_LENGTH} characters`,
  },
  { passes: (p) => /[a-zA-Z]/.test(p), message: 'Password must contain at least one letter' },
  { passes: (p) => /[0-9]/.test(p), message: 'Password must contain at least one number' },
];

export async function hashPassword(plaintext: string): Promise<string> {
  return bcrypt.hash(plaintext, getAuthConfig().bcryptRounds);
}

export function comparePassword(plaintext: string, hash: string): Promise<boolean> {
  return bcrypt.compare(plaintext, hash);
}

/** True when the hash was made at a cost other than BCRYPT_ROUNDS. */
export function needsRehash(hash: string): boolean {
  try {
    return bcrypt.getRounds(hash) !== getAuthConfig().bcryptRounds;
  } catch {
    // Not a bcrypt hash at all
    return true;
  }
}

/** First rule the password breaks, or null. */
export function validatePasswordStrength(password: string): string | null {
  const broken = PASSWORD_RULES.find((rule) => !rule.passes(password));
  return broken ? broken.message : null;
}
