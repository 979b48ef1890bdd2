import { randomBytes } from 'crypto';

const UID_CHARS = 'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789-_';

/**
 * Generate a 9-character block UID in Roam's format.
 */
export function generateBlockUid(): string {
  const bytes = randomBytes(9);
  let uid = '';
  for (let i = 0; i < 9; i++) {
    uid += UID_CHARS[bytes[i] % 64];
  }
  return uid;
}
