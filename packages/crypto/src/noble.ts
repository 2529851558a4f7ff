/**
 * CryptoBackend on top of @noble/hashes
 *
 * Pure JavaScript, so it runs anywhere `crypto.getRandomValues()` exists
 * (Node.js, browsers, edge workers). Produces byte-identical output to
 * the Node.js backend.
 */

import { hmac } from '@noble/hashes/hmac';
import { sha256, sha384, sha512 } from '@noble/hashes/sha2';
import { randomBytes } from '@noble/hashes/utils';
import type { CHash } from '@noble/hashes/utils';
import type { CryptoBackend, DigestAlgorithm, DigestContext } from './backend.js';

const HASHES: Readonly<Record<DigestAlgorithm, CHash>> = {
  sha256,
  sha384,
  sha512,
};

export const nobleBackend: CryptoBackend = {
  name: 'noble',

  hmac(algorithm: DigestAlgorithm, key: Uint8Array, data: Uint8Array): Uint8Array {
    return hmac(HASHES[algorithm], key, data);
  },

  createDigest(algorithm: DigestAlgorithm): DigestContext {
    const hash = HASHES[algorithm].create();
    return {
      update(data: Uint8Array): void {
        hash.update(data);
      },
      digest(): Uint8Array {
        return hash.digest();
      },
    };
  },

  randomBytes(length: number): Uint8Array {
    return randomBytes(length);
  },

  timingSafeEqual(a: Uint8Array, b: Uint8Array): boolean {
    if (a.length !== b.length) {
      return false;
    }
    let diff = 0;
    for (let i = 0; i < a.length; i++) {
      diff |= a[i] ^ b[i];
    }
    return diff === 0;
  },
};
