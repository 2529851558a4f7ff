/**
 * Base64 encoding/decoding (RFC 4648 §4 and §5)
 *
 * Hawk uses the standard padded alphabet for `mac` and `hash` values and
 * the URL-safe alphabet without padding for bewit tokens. Decoding is
 * strict: Buffer.from() silently skips bad characters, so input is
 * checked against the alphabet first.
 */

import { CryptoError } from './errors.js';

const STANDARD_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;
const URL_SAFE_PATTERN = /^[A-Za-z0-9_-]*$/;

/**
 * Encode bytes to standard base64 (with padding)
 */
export function base64Encode(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('base64');
}

/**
 * Decode standard base64 (with padding) to bytes
 */
export function base64Decode(str: string): Uint8Array {
  if (!STANDARD_PATTERN.test(str)) {
    throw new CryptoError('CRYPTO_INVALID_BASE64', 'Invalid base64 string');
  }
  return new Uint8Array(Buffer.from(str, 'base64'));
}

/**
 * Encode bytes to base64url string (no padding)
 */
export function base64urlEncode(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('base64url');
}

/**
 * Decode base64url string (no padding) to bytes
 */
export function base64urlDecode(str: string): Uint8Array {
  // A single trailing character can never encode a whole byte
  if (!URL_SAFE_PATTERN.test(str) || str.length % 4 === 1) {
    throw new CryptoError('CRYPTO_INVALID_BASE64', 'Invalid base64url string');
  }
  return new Uint8Array(Buffer.from(str, 'base64url'));
}

/**
 * Encode UTF-8 string to base64url
 */
export function base64urlEncodeString(str: string): string {
  return base64urlEncode(new TextEncoder().encode(str));
}
