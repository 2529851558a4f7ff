/**
 * Server-side helpers: authenticate incoming requests (header or bewit)
 * and sign responses.
 *
 * Credentials come from a caller-supplied lookup; nonce replay tracking is
 * left to the caller, who receives the parsed artifacts on success.
 */

import type { Credentials } from '@hawkline/crypto';
import { extractBewit, validateBewit, type Bewit } from './bewit.js';
import { HEADERS, REQUEST_REQUIRED_ATTRIBUTES } from './constants.js';
import { ErrorCodes, HawkError, type ErrorCode } from './errors.js';
import { formatAuthorization, Header, parseAuthorization } from './header.js';
import { logger } from './logger.js';
import { hashPayload, normalizeContentType, type PayloadChunk } from './payload.js';
import {
  createRequest,
  validateRequestHeader,
  type HawkRequest,
  type ValidationOptions,
} from './request.js';
import { createResponse, signResponse } from './response.js';
import { stateFromHeader, type RequestState } from './state.js';

/**
 * Resolve the credentials for an id, or null if the id is unknown.
 */
export type CredentialLookup = (id: string) => Promise<Credentials | null>;

/**
 * Transport-neutral view of an incoming request.
 * Header names are matched case-insensitively.
 */
export interface IncomingRequest {
  method: string;
  /** Path and query as received */
  url: string;
  host: string;
  port: number;
  headers: Record<string, string | string[] | undefined>;
  /** Body; when given its hash must match the one the client declared */
  payload?: PayloadChunk;
}

export type AuthenticationResult =
  | {
      valid: true;
      credentials: Credentials;
      request: HawkRequest;
      /** Parsed Authorization header (request auth only) */
      artifacts?: Header;
      /** Decoded bewit (bewit auth only) */
      bewit?: Bewit;
    }
  | {
      valid: false;
      errorCode: ErrorCode;
      errorMessage: string;
    };

/**
 * Get header value by name (case-insensitive).
 *
 * @throws HawkError E_HEADER_PARSE if the header is repeated
 */
function getHeader(headers: IncomingRequest['headers'], name: string): string | undefined {
  const lowerName = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() !== lowerName || value === undefined) {
      continue;
    }
    if (Array.isArray(value)) {
      if (value.length !== 1) {
        throw new HawkError(ErrorCodes.HEADER_PARSE, `Repeated ${name} header`);
      }
      return value[0];
    }
    return value;
  }
  return undefined;
}

/**
 * Every authentication failure looks the same to the peer; the reason is
 * only logged.
 */
function unauthorized(reason: string, id?: string): HawkError {
  logger.debug({ reason, id }, 'Hawk authentication rejected');
  return new HawkError(ErrorCodes.UNAUTHORIZED, 'Unauthorized');
}

async function lookupCredentials(lookup: CredentialLookup, id: string): Promise<Credentials> {
  const credentials = await lookup(id);
  if (!credentials) {
    throw unauthorized('unknown credentials', id);
  }
  return credentials;
}

function toFailure(error: unknown): AuthenticationResult {
  if (error instanceof HawkError) {
    return { valid: false, errorCode: error.code, errorMessage: error.message };
  }
  throw error;
}

/**
 * Authenticate a request carrying a Hawk `Authorization` header.
 *
 * Malformed headers report their parse error code; every other failure
 * reports E_UNAUTHORIZED. Errors that are not HawkErrors propagate.
 */
export async function authenticateRequest(
  req: IncomingRequest,
  lookup: CredentialLookup,
  options: ValidationOptions = {}
): Promise<AuthenticationResult> {
  try {
    const authorization = getHeader(req.headers, HEADERS.authorization);
    if (authorization === undefined) {
      throw unauthorized('missing authorization header');
    }

    const artifacts = parseAuthorization(authorization, { required: REQUEST_REQUIRED_ATTRIBUTES });
    if (artifacts.id === undefined) {
      throw unauthorized('missing id');
    }
    const credentials = await lookupCredentials(lookup, artifacts.id);

    const hash =
      req.payload !== undefined
        ? hashPayload(
            normalizeContentType(getHeader(req.headers, HEADERS.contentType)),
            credentials.key.algorithm,
            req.payload,
            credentials.key.backend
          )
        : undefined;

    const request = createRequest({
      method: req.method,
      host: req.host,
      port: req.port,
      path: req.url,
      hash,
    });

    if (!validateRequestHeader(request, artifacts, credentials.key, options)) {
      throw unauthorized('mac, hash or timestamp mismatch', artifacts.id);
    }

    logger.debug({ id: credentials.id }, 'Hawk request authenticated');
    return { valid: true, credentials, request, artifacts };
  } catch (error) {
    return toFailure(error);
  }
}

/**
 * Authenticate a GET or HEAD request carrying a `bewit` query parameter.
 */
export async function authenticateBewit(
  req: IncomingRequest,
  lookup: CredentialLookup,
  options: Pick<ValidationOptions, 'now'> = {}
): Promise<AuthenticationResult> {
  try {
    const method = req.method.toUpperCase();
    if (method !== 'GET' && method !== 'HEAD') {
      throw unauthorized(`bewit used with ${method}`);
    }
    if (getHeader(req.headers, HEADERS.authorization) !== undefined) {
      throw unauthorized('bewit combined with authorization header');
    }

    const extracted = extractBewit(req.url);
    if (!extracted) {
      throw unauthorized('missing bewit');
    }
    const { bewit, path } = extracted;
    const credentials = await lookupCredentials(lookup, bewit.id);

    // Bewits are always minted for GET
    const request = createRequest({ method: 'GET', host: req.host, port: req.port, path });

    if (!validateBewit(request, bewit, credentials.key, options)) {
      throw unauthorized('bewit mac mismatch or expired', bewit.id);
    }

    logger.debug({ id: credentials.id }, 'Hawk bewit authenticated');
    return { valid: true, credentials, request, bewit };
  } catch (error) {
    return toFailure(error);
  }
}

export interface ServerAuthorizationOptions {
  ext?: string;
  /** Precomputed response payload hash; wins over `payload` */
  hash?: Uint8Array;
  payload?: PayloadChunk;
  contentType?: string;
}

/**
 * Build the `Server-Authorization` header value for a response to an
 * authenticated request.
 *
 * @param artifacts - The request's parsed Authorization header, or its state
 */
export function createServerAuthorization(
  request: HawkRequest,
  artifacts: Header | RequestState,
  credentials: Credentials,
  options: ServerAuthorizationOptions = {}
): string {
  const state = artifacts instanceof Header ? stateFromHeader(artifacts) : artifacts;

  const hash =
    options.hash ??
    (options.payload !== undefined
      ? hashPayload(
          normalizeContentType(options.contentType),
          credentials.key.algorithm,
          options.payload,
          credentials.key.backend
        )
      : undefined);

  const response = createResponse(request, state, { hash, ext: options.ext });
  return formatAuthorization(signResponse(response, credentials.key));
}
