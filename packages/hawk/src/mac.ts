/**
 * Canonical MAC engine.
 *
 * The normalized string is the exact byte sequence Hawk signs. Two
 * implementations that build different bytes for the same request cannot
 * interoperate, so nothing here normalizes its inputs: method case, host
 * case and the query string are the caller's responsibility.
 */

import { base64Encode, Mac, type Key } from '@hawkline/crypto';
import { HAWK_TAGS } from './constants.js';
import { toSeconds } from './config.js';

/**
 * Which first line the normalized string carries. A MAC computed for one
 * kind never validates as the other.
 */
export type MacKind = 'header' | 'response';

/**
 * Inputs of the normalized string, besides its kind.
 */
export interface MacInput {
  /** Unix seconds; any fraction is dropped */
  ts: number;
  nonce: string;
  method: string;
  host: string;
  port: number;
  /** Path including any query string */
  path: string;
  hash?: Uint8Array;
  ext?: string;
}

/**
 * Build the normalized string for a MAC.
 *
 * Format (each line newline-terminated):
 *   hawk.1.<kind>, ts, nonce, method, path, host, port, base64(hash), ext
 */
export function buildNormalizedString(kind: MacKind, input: MacInput): string {
  const lines = [
    HAWK_TAGS[kind],
    String(toSeconds(input.ts)),
    input.nonce,
    input.method,
    input.path,
    input.host,
    String(input.port),
    input.hash !== undefined ? base64Encode(input.hash) : '',
    input.ext ?? '',
  ];
  return lines.map((line) => `${line}\n`).join('');
}

/**
 * Compute the MAC of a normalized string with `key`.
 *
 * @throws CryptoError if the key's backend fails
 */
export function computeMac(kind: MacKind, key: Key, input: MacInput): Mac {
  const normalized = new TextEncoder().encode(buildNormalizedString(kind, input));
  return new Mac(key.sign(normalized));
}
