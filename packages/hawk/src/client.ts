/**
 * Client-side helpers: sign outgoing requests, check server responses,
 * and mint bewit URLs.
 */

import type { Credentials } from '@hawkline/crypto';
import { z } from 'zod';
import { nowSeconds, parseConfig, toSeconds } from './config.js';
import { BEWIT_PARAM } from './constants.js';
import { createBewit } from './bewit.js';
import { formatAuthorization, parseAuthorization, type Header } from './header.js';
import { hashPayload, normalizeContentType, type PayloadChunk } from './payload.js';
import { requestFromUrl, signRequest, type HawkRequest } from './request.js';
import { createResponse, validateResponseHeader } from './response.js';
import { createRequestState, type RequestState } from './state.js';

export interface AuthorizationOptions {
  ext?: string;
  /** Precomputed payload hash; wins over `payload` */
  hash?: Uint8Array;
  /** Body to hash with the credentials' algorithm */
  payload?: PayloadChunk;
  contentType?: string;
  app?: string;
  dlg?: string;
  /** Override the clock (Unix seconds) */
  now?: number;
  /** Fixed nonce instead of a random one */
  nonce?: string;
  nonceBytes?: number;
}

export interface ClientAuthorization {
  /** Full `Authorization` header value */
  header: string;
  request: HawkRequest;
  state: RequestState;
  artifacts: Header;
}

function payloadHash(
  credentials: Credentials,
  options: { hash?: Uint8Array; payload?: PayloadChunk; contentType?: string }
): Uint8Array | undefined {
  if (options.hash !== undefined || options.payload === undefined) {
    return options.hash;
  }
  return hashPayload(
    normalizeContentType(options.contentType),
    credentials.key.algorithm,
    options.payload,
    credentials.key.backend
  );
}

/**
 * Sign a request for `url` and return the `Authorization` header value
 * together with what is needed to check the response later.
 */
export function createAuthorization(
  method: string,
  url: string | URL,
  credentials: Credentials,
  options: AuthorizationOptions = {}
): ClientAuthorization {
  const request = requestFromUrl(method, url, {
    ext: options.ext,
    hash: payloadHash(credentials, options),
    app: options.app,
    dlg: options.dlg,
  });

  const state: RequestState =
    options.nonce !== undefined
      ? Object.freeze({ nonce: options.nonce, ts: toSeconds(options.now ?? nowSeconds()) })
      : createRequestState({
          now: options.now,
          nonceBytes: options.nonceBytes,
          backend: credentials.key.backend,
        });

  const artifacts = signRequest(request, credentials, state);
  return { header: formatAuthorization(artifacts), request, state, artifacts };
}

export interface ResponseCheckOptions {
  /** Response body; when given the server must have declared its hash */
  payload?: PayloadChunk;
  contentType?: string;
}

/**
 * Check a `Server-Authorization` value against the request it answers.
 *
 * @returns false when the MAC or declared hash do not match
 * @throws HawkError when the header cannot be parsed
 */
export function authenticateResponse(
  authorization: Pick<ClientAuthorization, 'request' | 'state'>,
  serverAuthorization: string,
  credentials: Credentials,
  options: ResponseCheckOptions = {}
): boolean {
  const header = parseAuthorization(serverAuthorization);
  const response = createResponse(authorization.request, authorization.state, {
    hash: payloadHash(credentials, options),
  });
  return validateResponseHeader(response, header, credentials.key);
}

const ttlSchema = z.number().int().positive('TTL must be positive');

/**
 * Append a bewit valid for `ttlSeconds` to a GET URL.
 */
export function getBewitUrl(
  url: string | URL,
  credentials: Credentials,
  ttlSeconds: number,
  options: { ext?: string; now?: number } = {}
): string {
  const ttl = parseConfig(ttlSchema, ttlSeconds, 'bewit TTL');
  const request = requestFromUrl('GET', url, { ext: options.ext });
  const exp = toSeconds(options.now ?? nowSeconds()) + ttl;
  const bewit = createBewit(request, credentials, exp);

  // An empty query ("?") is not part of the signed path
  const target = new URL(url);
  target.hash = '';
  const base = target.search ? target.href : target.href.replace(/\?$/, '');
  const separator = target.search ? '&' : '?';
  return `${base}${separator}${BEWIT_PARAM}=${bewit.toString()}`;
}
