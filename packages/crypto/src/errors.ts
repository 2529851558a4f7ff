/**
 * Typed errors for @hawkline/crypto
 *
 * These codes are internal to the crypto adapter. @hawkline/hawk maps
 * decoding failures onto its own E_* protocol codes; backend failures
 * propagate unchanged.
 */

/**
 * Internal error codes for crypto operations
 */
export type CryptoErrorCode =
  | 'CRYPTO_UNSUPPORTED_ALGORITHM'
  | 'CRYPTO_BACKEND_FAILURE'
  | 'CRYPTO_RANDOM_FAILURE'
  | 'CRYPTO_INVALID_BASE64'
  | 'CRYPTO_HASHER_FINISHED';

/**
 * Typed error for crypto operations
 *
 * Use `err.code` to handle errors programmatically without message parsing.
 */
export class CryptoError extends Error {
  readonly code: CryptoErrorCode;

  constructor(code: CryptoErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CryptoError';
    this.code = code;
    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, CryptoError.prototype);
  }
}
