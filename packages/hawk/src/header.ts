/**
 * Header codec for `Authorization` and `Server-Authorization` values.
 *
 * Grammar: comma/whitespace separated `name="value"` pairs. Values are
 * delimited by double quotes with no escape mechanism, so a value can
 * never contain `"`. Unknown names are rejected rather than ignored.
 */

import { base64Decode, base64Encode, CryptoError, Mac } from '@hawkline/crypto';
import { HEADER_ATTRIBUTES, SCHEME, type HeaderAttribute } from './constants.js';
import { toSeconds } from './config.js';
import { ErrorCodes, HawkError } from './errors.js';

export interface HeaderFields {
  id?: string;
  /** Unix seconds; any fraction is dropped */
  ts?: number;
  nonce?: string;
  mac?: Mac;
  ext?: string;
  hash?: Uint8Array;
  app?: string;
  dlg?: string;
}

export interface ParseHeaderOptions {
  /** Attributes whose absence is an E_MISSING_ATTRIBUTES error */
  required?: readonly HeaderAttribute[];
}

function checkField(name: HeaderAttribute, value: string | undefined): string | undefined {
  if (value !== undefined && value.includes('"')) {
    throw new HawkError(
      ErrorCodes.INVALID_HEADER_VALUE,
      `Hawk header attribute "${name}" cannot contain a double quote`
    );
  }
  return value;
}

/**
 * Parsed or to-be-formatted Hawk header. Every attribute is optional.
 */
export class Header implements HeaderFields {
  readonly id?: string;
  readonly ts?: number;
  readonly nonce?: string;
  readonly mac?: Mac;
  readonly ext?: string;
  readonly hash?: Uint8Array;
  readonly app?: string;
  readonly dlg?: string;

  /**
   * @throws HawkError E_INVALID_HEADER_VALUE if a string field contains `"`
   *   or `ts` is not finite
   */
  constructor(fields: HeaderFields = {}) {
    if (fields.ts !== undefined && !Number.isFinite(fields.ts)) {
      throw new HawkError(ErrorCodes.INVALID_HEADER_VALUE, 'Hawk header ts must be finite');
    }
    this.id = checkField('id', fields.id);
    this.ts = fields.ts !== undefined ? toSeconds(fields.ts) : undefined;
    this.nonce = checkField('nonce', fields.nonce);
    this.mac = fields.mac;
    this.ext = checkField('ext', fields.ext);
    this.hash = fields.hash !== undefined ? new Uint8Array(fields.hash) : undefined;
    this.app = checkField('app', fields.app);
    this.dlg = checkField('dlg', fields.dlg);
  }

  has(name: HeaderAttribute): boolean {
    return this[name] !== undefined;
  }

  toString(): string {
    return formatHeader(this);
  }
}

function formatValue(header: Header, name: HeaderAttribute): string | undefined {
  switch (name) {
    case 'ts':
      return header.ts !== undefined ? String(header.ts) : undefined;
    case 'mac':
      return header.mac?.toBase64();
    case 'hash':
      return header.hash !== undefined ? base64Encode(header.hash) : undefined;
    default:
      return header[name];
  }
}

/**
 * Serialize the attributes that are present, in wire order.
 *
 * The result does not include the `Hawk ` scheme prefix.
 */
export function formatHeader(header: Header): string {
  const parts: string[] = [];
  for (const name of HEADER_ATTRIBUTES) {
    const value = formatValue(header, name);
    if (value !== undefined) {
      parts.push(`${name}="${value}"`);
    }
  }
  return parts.join(', ');
}

/**
 * Serialize a header including the `Hawk ` scheme prefix.
 */
export function formatAuthorization(header: Header): string {
  return `${SCHEME} ${formatHeader(header)}`;
}

// --- Parsing ---

const LEADING_SEPARATORS = /^[\s,]+/;
const TOKEN = /^[!#$%&'*+.^_`|~0-9A-Za-z-]+$/;
const INTEGER = /^-?\d+$/;

function isHeaderAttribute(name: string): name is HeaderAttribute {
  return (HEADER_ATTRIBUTES as readonly string[]).includes(name);
}

function parseError(message: string): HawkError {
  return new HawkError(ErrorCodes.HEADER_PARSE, message);
}

/**
 * Split the attribute list into raw name/value pairs.
 */
function splitAttributes(text: string): Map<HeaderAttribute, string> {
  const attributes = new Map<HeaderAttribute, string>();
  let rest = text;

  for (;;) {
    rest = rest.replace(LEADING_SEPARATORS, '');
    if (rest.length === 0) {
      return attributes;
    }

    const eqIndex = rest.indexOf('=');
    if (eqIndex === -1) {
      throw parseError('Expected name="value" attribute');
    }
    const name = rest.slice(0, eqIndex).trim();
    rest = rest.slice(eqIndex + 1).trimStart();

    if (!TOKEN.test(name)) {
      throw parseError('Attribute name is not a token');
    }
    if (!rest.startsWith('"')) {
      throw parseError(`Value of "${name}" must be quoted`);
    }
    const closeIndex = rest.indexOf('"', 1);
    if (closeIndex === -1) {
      throw parseError(`Unterminated value for "${name}"`);
    }
    const value = rest.slice(1, closeIndex);
    rest = rest.slice(closeIndex + 1);

    if (rest.length > 0 && !LEADING_SEPARATORS.test(rest)) {
      throw parseError(`Expected separator after "${name}"`);
    }
    if (!isHeaderAttribute(name)) {
      throw new HawkError(ErrorCodes.UNKNOWN_ATTRIBUTE, `Unknown Hawk attribute: ${name}`);
    }
    if (attributes.has(name)) {
      throw parseError(`Duplicate attribute: ${name}`);
    }
    attributes.set(name, value);
  }
}

function parseTimestamp(value: string): number {
  const ts = INTEGER.test(value) ? Number(value) : NaN;
  if (!Number.isSafeInteger(ts)) {
    throw new HawkError(ErrorCodes.INVALID_TIMESTAMP, `Invalid timestamp: ${value}`);
  }
  return ts;
}

function decodeBase64(name: HeaderAttribute, value: string): Uint8Array {
  try {
    return base64Decode(value);
  } catch (err) {
    if (err instanceof CryptoError) {
      throw new HawkError(ErrorCodes.BASE64_DECODE, `Attribute "${name}" is not valid base64`, {
        cause: err,
      });
    }
    throw err;
  }
}

/**
 * Parse an attribute list (the part after `Hawk `) into a Header.
 *
 * Empty input yields a Header with no attributes.
 *
 * @throws HawkError E_HEADER_PARSE, E_UNKNOWN_ATTRIBUTE, E_INVALID_TIMESTAMP,
 *   E_BASE64_DECODE, E_MISSING_ATTRIBUTES
 */
export function parseHeader(text: string, options: ParseHeaderOptions = {}): Header {
  const raw = splitAttributes(text);

  const ts = raw.get('ts');
  const mac = raw.get('mac');
  const hash = raw.get('hash');

  const header = new Header({
    id: raw.get('id'),
    ts: ts !== undefined ? parseTimestamp(ts) : undefined,
    nonce: raw.get('nonce'),
    mac: mac !== undefined ? new Mac(decodeBase64('mac', mac)) : undefined,
    ext: raw.get('ext'),
    hash: hash !== undefined ? decodeBase64('hash', hash) : undefined,
    app: raw.get('app'),
    dlg: raw.get('dlg'),
  });

  const missing = (options.required ?? []).filter((name) => !header.has(name));
  if (missing.length > 0) {
    throw new HawkError(
      ErrorCodes.MISSING_ATTRIBUTES,
      `Missing required attributes: ${missing.join(', ')}`
    );
  }

  return header;
}

/**
 * Parse a full header value such as `Hawk id="...", ...`.
 *
 * The scheme token is matched case-insensitively.
 */
export function parseAuthorization(value: string, options: ParseHeaderOptions = {}): Header {
  const match = /^(\S+)(?:\s+([\s\S]*))?$/.exec(value.trim());
  if (!match || match[1].toLowerCase() !== SCHEME.toLowerCase()) {
    throw parseError('Authorization scheme is not Hawk');
  }
  return parseHeader(match[2] ?? '', options);
}
