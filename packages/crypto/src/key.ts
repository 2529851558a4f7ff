/**
 * Hawk keys and credentials
 *
 * Key material handling:
 * - The secret lives in a private field and is copied on construction
 * - Only `sign()` ever touches it; there is no accessor
 * - JavaScript cannot guarantee memory zeroization; callers should not
 *   keep the raw secret around after building a Key
 */

import {
  callBackend,
  DIGEST_LENGTHS,
  parseDigestAlgorithm,
  type CryptoBackend,
  type DigestAlgorithm,
} from './backend.js';
import { nodeCryptoBackend } from './node.js';

/**
 * A shared secret bound to one digest algorithm and one backend.
 */
export class Key {
  readonly algorithm: DigestAlgorithm;
  readonly backend: CryptoBackend;
  readonly #secret: Uint8Array;

  constructor(
    secret: Uint8Array | string,
    algorithm: DigestAlgorithm,
    backend: CryptoBackend = nodeCryptoBackend
  ) {
    this.#secret =
      typeof secret === 'string' ? new TextEncoder().encode(secret) : new Uint8Array(secret);
    this.algorithm = algorithm;
    this.backend = backend;
  }

  /** HMAC output length in bytes */
  get digestLength(): number {
    return DIGEST_LENGTHS[this.algorithm];
  }

  sign(data: Uint8Array): Uint8Array {
    return callBackend(this.backend, 'hmac', () =>
      this.backend.hmac(this.algorithm, this.#secret, data)
    );
  }

  toJSON(): { algorithm: DigestAlgorithm; backend: string } {
    return { algorithm: this.algorithm, backend: this.backend.name };
  }
}

/**
 * Hawk credentials: a principal id and its key.
 */
export interface Credentials {
  readonly id: string;
  readonly key: Key;
}

/**
 * @param algorithm - Digest name such as "sha256" or "SHA-256"
 * @throws CryptoError CRYPTO_UNSUPPORTED_ALGORITHM for any other digest
 */
export function createCredentials(
  id: string,
  secret: Uint8Array | string,
  algorithm: DigestAlgorithm | string,
  backend: CryptoBackend = nodeCryptoBackend
): Credentials {
  return Object.freeze({
    id,
    key: new Key(secret, parseDigestAlgorithm(algorithm), backend),
  });
}
