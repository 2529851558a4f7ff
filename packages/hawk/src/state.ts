/**
 * Per-request nonce and timestamp.
 */

import { nodeCryptoBackend, randomString, type CryptoBackend } from '@hawkline/crypto';
import { nowSeconds, parseConfig, requestStateOptionsSchema, toSeconds } from './config.js';
import { ErrorCodes, HawkError } from './errors.js';
import type { Header } from './header.js';

export interface RequestState {
  readonly nonce: string;
  /** Unix seconds */
  readonly ts: number;
}

export interface RequestStateOptions {
  /** Override the clock (Unix seconds) */
  now?: number;
  /** Nonce entropy in bytes, at least 10 */
  nonceBytes?: number;
  backend?: CryptoBackend;
}

/**
 * Generate a fresh nonce and timestamp for one request attempt.
 */
export function createRequestState(options: RequestStateOptions = {}): RequestState {
  const { backend = nodeCryptoBackend, ...rest } = options;
  const { now, nonceBytes } = parseConfig(requestStateOptionsSchema, rest, 'request state options');
  return Object.freeze({
    nonce: randomString(nonceBytes, backend),
    ts: toSeconds(now ?? nowSeconds()),
  });
}

/**
 * Recover the state a client used from its request header, so a server
 * can sign the matching response.
 *
 * @throws HawkError E_MISSING_ATTRIBUTES without both ts and nonce
 */
export function stateFromHeader(header: Header): RequestState {
  if (header.ts === undefined || header.nonce === undefined) {
    throw new HawkError(ErrorCodes.MISSING_ATTRIBUTES, 'Request header lacks ts or nonce');
  }
  return Object.freeze({ nonce: header.nonce, ts: header.ts });
}
