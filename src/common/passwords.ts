/**
 * Password hashing.
 *
 * bcrypt only reads the first 72 bytes of its input, so longer passwords are SHA-256 digested
 * (hex) first and the digest is bcrypt-hashed. If bcrypt itself fails, the hash falls back to a
 * salted SHA-256 string of the form `sha256:<salt>:<hex>`. verifyPassword() accepts both forms.
 */

import * as crypto from 'crypto';
import bcrypt from 'bcryptjs';

/** bcrypt input ceiling, in UTF-8 bytes */
export const BCRYPT_MAX_BYTES = 72;

const BCRYPT_ROUNDS = 12;
const FALLBACK_PREFIX = 'sha256:';

function sha256Hex(value: string): string {
  return crypto.createHash('sha256').update(value, 'utf8').digest('hex');
}

/** The string actually fed to bcrypt for this password. */
function bcryptInput(password: string): string {
  return Buffer.byteLength(password, 'utf8') > BCRYPT_MAX_BYTES ? sha256Hex(password) : password;
}

export function fallbackHash(password: string, salt: string = crypto.randomBytes(16).toString('hex')): string {
  return `${FALLBACK_PREFIX}${salt}:${sha256Hex(password + salt)}`;
}

export async function hashPassword(password: string): Promise<string> {
  try {
    return await bcrypt.hash(bcryptInput(password), BCRYPT_ROUNDS);
  } catch (error) {
    console.error('bcrypt hashing failed, using salted sha256 fallback:', error);
    return fallbackHash(password);
  }
}

/**
 * Never throws: an unrecognised or malformed hash verifies false.
 */
export async function verifyPassword(password: string, hash: string): Promise<boolean> {
  if (hash.startsWith(FALLBACK_PREFIX)) {
    const parts = hash.split(':');
    if (parts.length !== 3) {
      return false;
    }
    const expected = Buffer.from(parts[2], 'utf8');
    const actual = Buffer.from(sha256Hex(password + parts[1]), 'utf8');
    return expected.length === actual.length && crypto.timingSafeEqual(expected, actual);
  }
  try {
    return await bcrypt.compare(bcryptInput(password), hash);
  } catch (error) {
    return false;
  }
}
