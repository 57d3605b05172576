/**
 * src/shared/security/salt.ts
 *
 * WHY:
 * - Secure hashers without a configured salt need one that cannot be derived from
 *   process state.
 *
 * HOW TO USE:
 * - const salt = generateSecureSalt()   // 32 random bytes = 256 bits, hex encoded
 *
 * NOTE:
 * - Nothing persists the result. A salt generated here lives as long as the hasher
 *   holding it; hashes it produced cannot be decoded after a restart.
 */

import { randomBytes } from 'node:crypto';

export const SECURE_SALT_BYTES = 32;

export function generateSecureSalt(bytes: number = SECURE_SALT_BYTES): string {
  return randomBytes(bytes).toString('hex');
}
