/**
 * Request signing and validation.
 */

import { timingSafeEqualBytes, type Credentials, type Key } from '@hawkline/crypto';
import {
  nowSeconds,
  parseConfig,
  requestConfigSchema,
  validationOptionsSchema,
  type RequestConfig,
} from './config.js';
import { DEFAULT_PORTS } from './constants.js';
import { ErrorCodes, HawkError } from './errors.js';
import { Header } from './header.js';
import { computeMac } from './mac.js';
import type { RequestState } from './state.js';

/**
 * Everything about a request that its MAC covers, plus app/dlg.
 * Built once by {@link createRequest}; never mutated.
 */
export interface HawkRequest {
  readonly method: string;
  readonly host: string;
  readonly port: number;
  /** Path including query string */
  readonly path: string;
  readonly hash?: Uint8Array;
  readonly ext?: string;
  readonly app?: string;
  readonly dlg?: string;
}

export interface ValidationOptions {
  /** Override the clock (Unix seconds) */
  now?: number;
  /** Allowed clock drift in seconds (default 60) */
  skewSeconds?: number;
}

/**
 * Validate request facts and freeze them.
 *
 * @throws HawkError E_INVALID_REQUEST
 */
export function createRequest(config: RequestConfig): HawkRequest {
  const parsed = parseConfig(requestConfigSchema, config, 'request');
  return Object.freeze({
    ...parsed,
    hash: parsed.hash !== undefined ? new Uint8Array(parsed.hash) : undefined,
  });
}

/**
 * Build a request from a URL. The port falls back to the scheme default
 * and the path keeps the query string. IPv6 hosts are signed without
 * their brackets (`::1`, not `[::1]`).
 *
 * @throws HawkError E_INVALID_URL
 */
export function requestFromUrl(
  method: string,
  url: string | URL,
  options: Omit<RequestConfig, 'method' | 'host' | 'port' | 'path'> = {}
): HawkRequest {
  let parsed: URL;
  try {
    parsed = typeof url === 'string' ? new URL(url) : url;
  } catch (err) {
    throw new HawkError(ErrorCodes.INVALID_URL, `Cannot parse URL: ${String(url)}`, { cause: err });
  }

  if (!parsed.hostname) {
    throw new HawkError(ErrorCodes.INVALID_URL, `URL ${parsed.href} has no host`);
  }
  const port = parsed.port ? Number(parsed.port) : DEFAULT_PORTS[parsed.protocol];
  if (port === undefined) {
    throw new HawkError(ErrorCodes.INVALID_URL, `URL ${parsed.href} has no port`);
  }

  return createRequest({
    ...options,
    method,
    host: parsed.hostname.replace(/^\[(.*)\]$/, '$1'),
    port,
    path: `${parsed.pathname}${parsed.search}`,
  });
}

/**
 * Produce the `Authorization` header for a request.
 */
export function signRequest(
  request: HawkRequest,
  credentials: Credentials,
  state: RequestState
): Header {
  const mac = computeMac('header', credentials.key, {
    ts: state.ts,
    nonce: state.nonce,
    method: request.method,
    host: request.host,
    port: request.port,
    path: request.path,
    hash: request.hash,
    ext: request.ext,
  });

  return new Header({
    id: credentials.id,
    ts: state.ts,
    nonce: state.nonce,
    mac,
    ext: request.ext,
    hash: request.hash,
    app: request.app,
    dlg: request.dlg,
  });
}

/**
 * Check a local payload hash against the one a peer declared.
 *
 * Without a local hash any declared value (or none) passes: the local
 * side never asked for the body to be checked.
 */
export function checkHash(
  localHash: Uint8Array | undefined,
  remoteHash: Uint8Array | undefined,
  key: Key
): boolean {
  if (localHash === undefined) {
    return true;
  }
  if (remoteHash === undefined) {
    return false;
  }
  return timingSafeEqualBytes(localHash, remoteHash, key.backend);
}

/**
 * Validate a parsed `Authorization` header against the local view of the
 * request.
 *
 * Checks, in order: ts/nonce/mac present, MAC, payload hash, timestamp
 * freshness. Method, host, port and path always come from `request`;
 * ext and hash come from the header because the MAC covers them.
 *
 * @returns true only if every check passes
 */
export function validateRequestHeader(
  request: HawkRequest,
  header: Header,
  key: Key,
  options: ValidationOptions = {}
): boolean {
  const { now, skewSeconds } = parseConfig(validationOptionsSchema, options, 'validation options');

  if (header.ts === undefined || header.nonce === undefined || header.mac === undefined) {
    return false;
  }

  const expected = computeMac('header', key, {
    ts: header.ts,
    nonce: header.nonce,
    method: request.method,
    host: request.host,
    port: request.port,
    path: request.path,
    hash: header.hash,
    ext: header.ext,
  });
  if (!expected.equals(header.mac, key.backend)) {
    return false;
  }

  if (!checkHash(request.hash, header.hash, key)) {
    return false;
  }

  return Math.abs((now ?? nowSeconds()) - header.ts) <= skewSeconds;
}
