/**
 * Hawk error codes.
 */

export const ErrorCodes = {
  /** Attribute list does not follow the name="value" grammar */
  HEADER_PARSE: 'E_HEADER_PARSE',
  /** Attribute name outside id/ts/nonce/mac/ext/hash/app/dlg */
  UNKNOWN_ATTRIBUTE: 'E_UNKNOWN_ATTRIBUTE',
  /** A required attribute is absent */
  MISSING_ATTRIBUTES: 'E_MISSING_ATTRIBUTES',
  /** ts is not a base-10 integer */
  INVALID_TIMESTAMP: 'E_INVALID_TIMESTAMP',
  /** mac, hash or bewit token is not valid base64 */
  BASE64_DECODE: 'E_BASE64_DECODE',
  /** Bewit does not split into exactly four fields */
  INVALID_BEWIT_FORMAT: 'E_INVALID_BEWIT_FORMAT',
  INVALID_BEWIT_ID: 'E_INVALID_BEWIT_ID',
  INVALID_BEWIT_EXP: 'E_INVALID_BEWIT_EXP',
  INVALID_BEWIT_MAC: 'E_INVALID_BEWIT_MAC',
  INVALID_BEWIT_EXT: 'E_INVALID_BEWIT_EXT',
  /** More than one bewit= component in a query */
  MULTIPLE_BEWITS: 'E_MULTIPLE_BEWITS',
  /** host, port or path cannot be derived from a URL */
  INVALID_URL: 'E_INVALID_URL',
  /** Header or bewit field contains its own delimiter (caller bug) */
  INVALID_HEADER_VALUE: 'E_INVALID_HEADER_VALUE',
  /** Request configuration or options failed validation (caller bug) */
  INVALID_REQUEST: 'E_INVALID_REQUEST',
  /** Authentication failed; the specific reason is never disclosed */
  UNAUTHORIZED: 'E_UNAUTHORIZED',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * HTTP status codes for each error.
 */
export const ErrorHttpStatus: Record<ErrorCode, number> = {
  [ErrorCodes.HEADER_PARSE]: 400,
  [ErrorCodes.UNKNOWN_ATTRIBUTE]: 400,
  [ErrorCodes.MISSING_ATTRIBUTES]: 400,
  [ErrorCodes.INVALID_TIMESTAMP]: 400,
  [ErrorCodes.BASE64_DECODE]: 400,
  [ErrorCodes.INVALID_BEWIT_FORMAT]: 400,
  [ErrorCodes.INVALID_BEWIT_ID]: 400,
  [ErrorCodes.INVALID_BEWIT_EXP]: 400,
  [ErrorCodes.INVALID_BEWIT_MAC]: 400,
  [ErrorCodes.INVALID_BEWIT_EXT]: 400,
  [ErrorCodes.MULTIPLE_BEWITS]: 400,
  [ErrorCodes.INVALID_URL]: 400,
  [ErrorCodes.INVALID_HEADER_VALUE]: 500,
  [ErrorCodes.INVALID_REQUEST]: 500,
  [ErrorCodes.UNAUTHORIZED]: 401,
};

/**
 * Hawk error with code and HTTP status.
 */
export class HawkError extends Error {
  readonly code: ErrorCode;
  readonly httpStatus: number;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'HawkError';
    this.code = code;
    this.httpStatus = ErrorHttpStatus[code];
  }
}

export function isHawkError(err: unknown): err is HawkError {
  return err instanceof HawkError;
}
