/**
 * Bewit: a URL-embedded, time-limited credential for one GET request.
 *
 * Token format, before URL-safe base64 (no padding):
 *
 *   id \ exp \ base64(mac) \ ext
 *
 * An empty ext field decodes to no ext (undefined), never to ''.
 */

import {
  base64Decode,
  base64urlDecode,
  base64urlEncodeString,
  type Credentials,
  type Key,
  Mac,
} from '@hawkline/crypto';
import { BEWIT_PARAM } from './constants.js';
import { nowSeconds, parseConfig, validationOptionsSchema } from './config.js';
import { ErrorCodes, HawkError, type ErrorCode } from './errors.js';
import { computeMac } from './mac.js';
import type { HawkRequest, ValidationOptions } from './request.js';

const BACKSLASH = 0x5c;
const DECIMAL = /^\d+$/;

export interface BewitFields {
  id: string;
  /** Absolute expiry, Unix seconds */
  exp: number;
  mac: Mac;
  ext?: string;
}

export class Bewit implements BewitFields {
  readonly id: string;
  readonly exp: number;
  readonly mac: Mac;
  readonly ext?: string;

  /**
   * @throws HawkError E_INVALID_HEADER_VALUE if id or ext contains a backslash
   * @throws HawkError E_INVALID_REQUEST if exp is not a non-negative integer
   */
  constructor(fields: BewitFields) {
    if (fields.id.includes('\\') || fields.ext?.includes('\\')) {
      throw new HawkError(
        ErrorCodes.INVALID_HEADER_VALUE,
        'Bewit id and ext cannot contain a backslash'
      );
    }
    if (!Number.isSafeInteger(fields.exp) || fields.exp < 0) {
      throw new HawkError(ErrorCodes.INVALID_REQUEST, `Invalid bewit expiry: ${fields.exp}`);
    }
    this.id = fields.id;
    this.exp = fields.exp;
    this.mac = fields.mac;
    this.ext = fields.ext;
  }

  /** Encoded token, suitable as the value of `bewit=` */
  toString(): string {
    return encodeBewit(this);
  }
}

export function encodeBewit(bewit: Bewit): string {
  return base64urlEncodeString(
    `${bewit.id}\\${bewit.exp}\\${bewit.mac.toBase64()}\\${bewit.ext ?? ''}`
  );
}

function splitFields(bytes: Uint8Array): Uint8Array[] {
  const fields: Uint8Array[] = [];
  let start = 0;
  for (let i = 0; i < bytes.length; i++) {
    if (bytes[i] === BACKSLASH) {
      fields.push(bytes.subarray(start, i));
      start = i + 1;
    }
  }
  fields.push(bytes.subarray(start));
  return fields;
}

function decodeText(bytes: Uint8Array, code: ErrorCode, field: string): string {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch (err) {
    throw new HawkError(code, `Bewit ${field} is not valid UTF-8`, { cause: err });
  }
}

/**
 * Decode a bewit token.
 *
 * @throws HawkError E_BASE64_DECODE, E_INVALID_BEWIT_FORMAT,
 *   E_INVALID_BEWIT_ID/EXP/MAC/EXT
 */
export function decodeBewit(token: string): Bewit {
  let raw: Uint8Array;
  try {
    raw = base64urlDecode(token);
  } catch (err) {
    throw new HawkError(ErrorCodes.BASE64_DECODE, 'Bewit is not valid base64url', { cause: err });
  }

  const fields = splitFields(raw);
  if (fields.length !== 4) {
    throw new HawkError(
      ErrorCodes.INVALID_BEWIT_FORMAT,
      `Bewit must have 4 fields, found ${fields.length}`
    );
  }
  const [idBytes, expBytes, macBytes, extBytes] = fields;

  const id = decodeText(idBytes, ErrorCodes.INVALID_BEWIT_ID, 'id');

  const expText = decodeText(expBytes, ErrorCodes.INVALID_BEWIT_EXP, 'exp');
  const exp = DECIMAL.test(expText) ? Number(expText) : NaN;
  if (!Number.isSafeInteger(exp)) {
    throw new HawkError(ErrorCodes.INVALID_BEWIT_EXP, 'Bewit exp is not an unsigned integer');
  }

  const macText = decodeText(macBytes, ErrorCodes.INVALID_BEWIT_MAC, 'mac');
  let mac: Mac;
  try {
    mac = new Mac(base64Decode(macText));
  } catch (err) {
    throw new HawkError(ErrorCodes.INVALID_BEWIT_MAC, 'Bewit mac is not valid base64', {
      cause: err,
    });
  }

  const ext =
    extBytes.length > 0 ? decodeText(extBytes, ErrorCodes.INVALID_BEWIT_EXT, 'ext') : undefined;

  return new Bewit({ id, exp, mac, ext });
}

export interface ExtractedBewit {
  bewit: Bewit;
  /** The path and query with the bewit component removed */
  path: string;
}

/**
 * Find and remove the `bewit=` component of a path and query.
 *
 * Only isolates the token: other components are neither decoded nor
 * reordered.
 *
 * @returns null when there is no bewit (the path is left as is)
 * @throws HawkError E_MULTIPLE_BEWITS, or any decodeBewit error
 */
export function extractBewit(pathAndQuery: string): ExtractedBewit | null {
  const prefix = `${BEWIT_PARAM}=`;
  const tokens: string[] = [];
  const kept: string[] = [];

  for (const component of pathAndQuery.split(/[&?]/)) {
    if (component.startsWith(prefix)) {
      tokens.push(component.slice(prefix.length));
    } else {
      kept.push(component);
    }
  }

  if (tokens.length === 0) {
    return null;
  }
  if (tokens.length > 1) {
    throw new HawkError(ErrorCodes.MULTIPLE_BEWITS, 'Multiple bewit parameters');
  }

  const bewit = decodeBewit(tokens[0]);
  const [base, ...query] = kept;
  return {
    bewit,
    path: query.length > 0 ? `${base}?${query.join('&')}` : base,
  };
}

/**
 * Create a bewit authorizing `request` until `exp` (Unix seconds).
 *
 * The MAC is a header MAC with ts = exp and an empty nonce; the request's
 * ext travels inside the bewit.
 */
export function createBewit(request: HawkRequest, credentials: Credentials, exp: number): Bewit {
  const mac = computeMac('header', credentials.key, {
    ts: exp,
    nonce: '',
    method: request.method,
    host: request.host,
    port: request.port,
    path: request.path,
    hash: request.hash,
    ext: request.ext,
  });
  return new Bewit({ id: credentials.id, exp, mac, ext: request.ext });
}

/**
 * Validate a bewit against the local view of the request. `request.path`
 * must be the path with the bewit already removed (see
 * {@link extractBewit}).
 *
 * Checks the MAC, then `now <= exp`. `skewSeconds` does not apply.
 */
export function validateBewit(
  request: HawkRequest,
  bewit: Bewit,
  key: Key,
  options: Pick<ValidationOptions, 'now'> = {}
): boolean {
  const { now } = parseConfig(validationOptionsSchema, options, 'validation options');

  const expected = computeMac('header', key, {
    ts: bewit.exp,
    nonce: '',
    method: request.method,
    host: request.host,
    port: request.port,
    path: request.path,
    hash: request.hash,
    ext: bewit.ext,
  });
  if (!expected.equals(bewit.mac, key.backend)) {
    return false;
  }

  return (now ?? nowSeconds()) <= bewit.exp;
}
