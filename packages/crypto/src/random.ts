/**
 * Random token generation
 */

import { base64urlEncode } from './base64.js';
import type { CryptoBackend } from './backend.js';
import { CryptoError } from './errors.js';
import { nodeCryptoBackend } from './node.js';

/**
 * Create a URL-safe random string carrying `bytes` bytes of entropy.
 *
 * The result is base64url without padding, so it is longer than `bytes`.
 *
 * @throws CryptoError CRYPTO_RANDOM_FAILURE if the backend cannot supply randomness
 */
export function randomString(bytes: number, backend: CryptoBackend = nodeCryptoBackend): string {
  let buffer: Uint8Array;
  try {
    buffer = backend.randomBytes(bytes);
  } catch (err) {
    throw new CryptoError('CRYPTO_RANDOM_FAILURE', 'Cannot create random string', { cause: err });
  }
  if (buffer.length !== bytes) {
    throw new CryptoError(
      'CRYPTO_RANDOM_FAILURE',
      `Backend returned ${buffer.length} random bytes, expected ${bytes}`
    );
  }
  return base64urlEncode(buffer);
}
