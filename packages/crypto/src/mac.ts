/**
 * Message authentication code value
 *
 * Equality is only available through `equals()`, which compares in
 * constant time. Never compare `bytes` with a loop or Buffer.equals().
 */

import { base64Decode, base64Encode } from './base64.js';
import { callBackend, type CryptoBackend } from './backend.js';
import { nodeCryptoBackend } from './node.js';

export class Mac {
  readonly bytes: Uint8Array;

  constructor(bytes: Uint8Array) {
    this.bytes = new Uint8Array(bytes);
  }

  static fromBase64(value: string): Mac {
    return new Mac(base64Decode(value));
  }

  get length(): number {
    return this.bytes.length;
  }

  equals(other: Mac, backend: CryptoBackend = nodeCryptoBackend): boolean {
    return timingSafeEqualBytes(this.bytes, other.bytes, backend);
  }

  toBase64(): string {
    return base64Encode(this.bytes);
  }

  toString(): string {
    return this.toBase64();
  }
}

/**
 * Constant-time comparison of byte arrays of possibly different lengths.
 *
 * Lengths are public (digest size), so a length mismatch returns early.
 */
export function timingSafeEqualBytes(
  a: Uint8Array,
  b: Uint8Array,
  backend: CryptoBackend = nodeCryptoBackend
): boolean {
  if (a.length !== b.length) {
    return false;
  }
  return callBackend(backend, 'timingSafeEqual', () => backend.timingSafeEqual(a, b));
}
