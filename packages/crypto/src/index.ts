/**
 * Hawkline Crypto Package
 *
 * Pluggable cryptographic backend (HMAC, digest, CSPRNG, constant-time
 * compare), Hawk keys and credentials, MAC values and base64 codecs.
 *
 * @packageDocumentation
 */

export * from './backend.js';
export * from './base64.js';
export * from './errors.js';
export * from './key.js';
export * from './mac.js';
export * from './node.js';
export * from './noble.js';
export * from './random.js';
