/**
 * Cryptographic backend contract
 *
 * Everything above this package talks to HMAC, digests, randomness and
 * constant-time comparison only through a CryptoBackend value. Backends
 * are passed explicitly; there is no process-wide registration.
 *
 * All methods are synchronous and CPU-bound, and implementations must be
 * safe to share between concurrent callers.
 *
 * @packageDocumentation
 */

import { CryptoError } from './errors.js';

/** Digest algorithms Hawk credentials may use */
export type DigestAlgorithm = 'sha256' | 'sha384' | 'sha512';

/** Output length in bytes of each digest algorithm */
export const DIGEST_LENGTHS: Readonly<Record<DigestAlgorithm, number>> = {
  sha256: 32,
  sha384: 48,
  sha512: 64,
};

/**
 * Incremental digest state. `digest()` may be called once.
 */
export interface DigestContext {
  update(data: Uint8Array): void;
  digest(): Uint8Array;
}

export interface CryptoBackend {
  /** Short backend name for diagnostics */
  readonly name: string;
  hmac(algorithm: DigestAlgorithm, key: Uint8Array, data: Uint8Array): Uint8Array;
  createDigest(algorithm: DigestAlgorithm): DigestContext;
  /** Fill a fresh buffer from a CSPRNG */
  randomBytes(length: number): Uint8Array;
  /** Constant-time equality of two equal-length byte arrays */
  timingSafeEqual(a: Uint8Array, b: Uint8Array): boolean;
}

export function isDigestAlgorithm(value: string): value is DigestAlgorithm {
  return Object.prototype.hasOwnProperty.call(DIGEST_LENGTHS, value);
}

/**
 * Normalize an algorithm name such as "SHA-256" or "sha256".
 *
 * @throws CryptoError CRYPTO_UNSUPPORTED_ALGORITHM
 */
export function parseDigestAlgorithm(value: string): DigestAlgorithm {
  const normalized = value.toLowerCase().replace('-', '');
  if (!isDigestAlgorithm(normalized)) {
    throw new CryptoError('CRYPTO_UNSUPPORTED_ALGORITHM', `Unsupported digest algorithm: ${value}`);
  }
  return normalized;
}

/**
 * Run a backend call, wrapping anything it throws as CRYPTO_BACKEND_FAILURE.
 */
export function callBackend<T>(backend: CryptoBackend, operation: string, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    if (err instanceof CryptoError) {
      throw err;
    }
    throw new CryptoError(
      'CRYPTO_BACKEND_FAILURE',
      `${backend.name} backend failed during ${operation}`,
      { cause: err }
    );
  }
}
