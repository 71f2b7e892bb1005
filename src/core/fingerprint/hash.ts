import { createHash } from 'node:crypto';

/**
 * Hash k-gram text to a 48-bit unsigned integer (the leading bytes of its
 * SHA-256 digest). 48 bits keeps the value an exact JavaScript number.
 */
export function hashKGram(text: string): number {
  return createHash('sha256').update(text).digest().readUIntBE(0, 6);
}
