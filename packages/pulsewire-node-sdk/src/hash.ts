import { createHash } from 'node:crypto';

/**
 * SHA-1 hash of a string's UTF-8 bytes, returned as lowercase hex.
 */
export function pulseSha1Hex(input: string): string {
  return createHash('sha1').update(input, 'utf8').digest('hex');
}
