/**
 * Response signing and validation (`Server-Authorization`).
 *
 * A response MAC reuses the nonce and timestamp of the request it answers,
 * so both sides derive them from state they already hold rather than from
 * the response header.
 */

import type { Key, Mac } from '@hawkline/crypto';
import { z } from 'zod';
import { fieldValueSchema, parseConfig } from './config.js';
import { Header } from './header.js';
import { computeMac } from './mac.js';
import { checkHash, type HawkRequest } from './request.js';
import type { RequestState } from './state.js';

export interface HawkResponse {
  readonly request: HawkRequest;
  readonly state: RequestState;
  readonly hash?: Uint8Array;
  readonly ext?: string;
}

export interface ResponseOptions {
  hash?: Uint8Array;
  ext?: string;
}

const responseOptionsSchema = z.object({
  hash: z.instanceof(Uint8Array).optional(),
  ext: fieldValueSchema.optional(),
});

/**
 * @throws HawkError E_INVALID_REQUEST if ext contains `"`
 */
export function createResponse(
  request: HawkRequest,
  state: RequestState,
  options: ResponseOptions = {}
): HawkResponse {
  const { hash, ext } = parseConfig(responseOptionsSchema, options, 'response options');
  return Object.freeze({
    request,
    state,
    hash: hash !== undefined ? new Uint8Array(hash) : undefined,
    ext,
  });
}

function responseMac(response: HawkResponse, key: Key, hash?: Uint8Array, ext?: string): Mac {
  const { request, state } = response;
  return computeMac('response', key, {
    ts: state.ts,
    nonce: state.nonce,
    method: request.method,
    host: request.host,
    port: request.port,
    path: request.path,
    hash,
    ext,
  });
}

/**
 * Produce the `Server-Authorization` header. Only mac, ext and hash are
 * populated.
 */
export function signResponse(response: HawkResponse, key: Key): Header {
  return new Header({
    mac: responseMac(response, key, response.hash, response.ext),
    ext: response.ext,
    hash: response.hash,
  });
}

/**
 * Validate a parsed `Server-Authorization` header.
 *
 * Checks the MAC, then the payload hash. There is no freshness check: the
 * timestamp was generated locally.
 */
export function validateResponseHeader(response: HawkResponse, header: Header, key: Key): boolean {
  if (header.mac === undefined) {
    return false;
  }

  const expected = responseMac(response, key, header.hash, header.ext);
  if (!expected.equals(header.mac, key.backend)) {
    return false;
  }

  return checkHash(response.hash, header.hash, key);
}
