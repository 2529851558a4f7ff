/**
 * CryptoBackend on top of Node.js `crypto`
 */

import {
  createHash,
  createHmac,
  randomBytes as nodeRandomBytes,
  timingSafeEqual as nodeTimingSafeEqual,
} from 'node:crypto';
import type { CryptoBackend, DigestAlgorithm, DigestContext } from './backend.js';

export const nodeCryptoBackend: CryptoBackend = {
  name: 'node',

  hmac(algorithm: DigestAlgorithm, key: Uint8Array, data: Uint8Array): Uint8Array {
    return new Uint8Array(createHmac(algorithm, key).update(data).digest());
  },

  createDigest(algorithm: DigestAlgorithm): DigestContext {
    const hash = createHash(algorithm);
    return {
      update(data: Uint8Array): void {
        hash.update(data);
      },
      digest(): Uint8Array {
        return new Uint8Array(hash.digest());
      },
    };
  },

  randomBytes(length: number): Uint8Array {
    return new Uint8Array(nodeRandomBytes(length));
  },

  timingSafeEqual(a: Uint8Array, b: Uint8Array): boolean {
    // node:crypto throws on a length mismatch
    if (a.length !== b.length) {
      return false;
    }
    return nodeTimingSafeEqual(a, b);
  },
};
