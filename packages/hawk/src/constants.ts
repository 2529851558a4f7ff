/**
 * Hawk protocol constants
 */

/**
 * Protocol version tags. Each is the first line of the string it labels.
 */
export const HAWK_TAGS = {
  header: 'hawk.1.header',
  response: 'hawk.1.response',
  payload: 'hawk.1.payload',
} as const;

/** Authentication scheme token */
export const SCHEME = 'Hawk' as const;

/**
 * HTTP header names (lower-case, as Node.js exposes them)
 */
export const HEADERS = {
  authorization: 'authorization' as const,
  serverAuthorization: 'server-authorization' as const,
  contentType: 'content-type' as const,
} as const;

/**
 * Header attributes in wire order
 */
export const HEADER_ATTRIBUTES = ['id', 'ts', 'nonce', 'mac', 'ext', 'hash', 'app', 'dlg'] as const;

export type HeaderAttribute = (typeof HEADER_ATTRIBUTES)[number];

/**
 * Attributes a request `Authorization` header must carry
 */
export const REQUEST_REQUIRED_ATTRIBUTES: readonly HeaderAttribute[] = ['id', 'ts', 'nonce', 'mac'];

/** Query parameter carrying a bewit */
export const BEWIT_PARAM = 'bewit' as const;

export const DEFAULTS = {
  /** Allowed clock drift between signer and verifier */
  skewSeconds: 60,
  /** Nonce entropy before encoding */
  nonceBytes: 12,
  minNonceBytes: 10,
} as const;

/**
 * Default ports for URL schemes without an explicit port
 */
export const DEFAULT_PORTS: Readonly<Partial<Record<string, number>>> = {
  'http:': 80,
  'https:': 443,
};
