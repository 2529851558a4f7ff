/**
 * @hawkline/hawk
 *
 * Hawk HTTP authentication: MAC computation, header and bewit codecs,
 * payload hashing, request/response validation. Transport-neutral; the
 * client and server helpers take plain values, not a specific HTTP library.
 */

// Constants
export {
  HAWK_TAGS,
  SCHEME,
  HEADERS,
  HEADER_ATTRIBUTES,
  REQUEST_REQUIRED_ATTRIBUTES,
  BEWIT_PARAM,
  DEFAULTS,
  DEFAULT_PORTS,
} from './constants.js';
export type { HeaderAttribute } from './constants.js';

// Errors
export { ErrorCodes, ErrorHttpStatus, HawkError, isHawkError } from './errors.js';
export type { ErrorCode } from './errors.js';

// Configuration
export { nowSeconds, toSeconds } from './config.js';
export type { RequestConfig } from './config.js';

// MAC engine
export { buildNormalizedString, computeMac } from './mac.js';
export type { MacKind, MacInput } from './mac.js';

// Payload hashing
export { PayloadHasher, hashPayload, normalizeContentType } from './payload.js';
export type { PayloadChunk } from './payload.js';

// Header codec
export {
  Header,
  formatHeader,
  formatAuthorization,
  parseHeader,
  parseAuthorization,
} from './header.js';
export type { HeaderFields, ParseHeaderOptions } from './header.js';

// Bewit codec
export {
  Bewit,
  encodeBewit,
  decodeBewit,
  extractBewit,
  createBewit,
  validateBewit,
} from './bewit.js';
export type { BewitFields, ExtractedBewit } from './bewit.js';

// Request / response
export { createRequestState, stateFromHeader } from './state.js';
export type { RequestState, RequestStateOptions } from './state.js';
export {
  createRequest,
  requestFromUrl,
  signRequest,
  validateRequestHeader,
  checkHash,
} from './request.js';
export type { HawkRequest, ValidationOptions } from './request.js';
export { createResponse, signResponse, validateResponseHeader } from './response.js';
export type { HawkResponse, ResponseOptions } from './response.js';

// Client / server helpers
export { createAuthorization, authenticateResponse, getBewitUrl } from './client.js';
export type { AuthorizationOptions, ClientAuthorization, ResponseCheckOptions } from './client.js';
export {
  authenticateRequest,
  authenticateBewit,
  createServerAuthorization,
} from './server.js';
export type {
  CredentialLookup,
  IncomingRequest,
  AuthenticationResult,
  ServerAuthorizationOptions,
} from './server.js';

// Re-export credentials so callers need a single import
export { createCredentials, Key, Mac, nodeCryptoBackend, nobleBackend } from '@hawkline/crypto';
export type { Credentials, CryptoBackend, DigestAlgorithm } from '@hawkline/crypto';
