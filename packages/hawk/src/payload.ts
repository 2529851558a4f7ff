/**
 * Payload hashing.
 *
 * The digest covers "hawk.1.payload\n", the content type, "\n", the body
 * and a final "\n", so a hash made under one content type never matches
 * a body served under another. Other Hawk implementations append the
 * final newline too; without it digests do not interoperate.
 */

import {
  callBackend,
  CryptoError,
  nodeCryptoBackend,
  type CryptoBackend,
  type DigestAlgorithm,
  type DigestContext,
} from '@hawkline/crypto';
import { HAWK_TAGS } from './constants.js';

export type PayloadChunk = Uint8Array | string;

const encoder = new TextEncoder();

function toBytes(chunk: PayloadChunk): Uint8Array {
  return typeof chunk === 'string' ? encoder.encode(chunk) : chunk;
}

/**
 * Streaming payload hash. Feed body chunks in arrival order, then call
 * `finish()` once.
 */
export class PayloadHasher {
  readonly algorithm: DigestAlgorithm;
  readonly #backend: CryptoBackend;
  readonly #context: DigestContext;
  #finished = false;

  /**
   * @param contentType - Lower-case media type without parameters
   *   (see {@link normalizeContentType})
   */
  constructor(
    contentType: string,
    algorithm: DigestAlgorithm,
    backend: CryptoBackend = nodeCryptoBackend
  ) {
    this.algorithm = algorithm;
    this.#backend = backend;
    this.#context = callBackend(backend, 'createDigest', () => backend.createDigest(algorithm));
    this.#feed(`${HAWK_TAGS.payload}\n`);
    this.#feed(contentType);
    this.#feed('\n');
  }

  update(chunk: PayloadChunk): this {
    if (this.#finished) {
      throw new CryptoError('CRYPTO_HASHER_FINISHED', 'PayloadHasher already finished');
    }
    this.#feed(chunk);
    return this;
  }

  finish(): Uint8Array {
    if (this.#finished) {
      throw new CryptoError('CRYPTO_HASHER_FINISHED', 'PayloadHasher already finished');
    }
    this.#feed('\n');
    this.#finished = true;
    return callBackend(this.#backend, 'digest', () => this.#context.digest());
  }

  #feed(chunk: PayloadChunk): void {
    const bytes = toBytes(chunk);
    callBackend(this.#backend, 'digest update', () => this.#context.update(bytes));
  }
}

/**
 * Hash a complete payload in one call.
 */
export function hashPayload(
  contentType: string,
  algorithm: DigestAlgorithm,
  payload: PayloadChunk,
  backend: CryptoBackend = nodeCryptoBackend
): Uint8Array {
  return new PayloadHasher(contentType, algorithm, backend).update(payload).finish();
}

/**
 * Reduce a Content-Type header value to the form payload hashes use:
 * parameters removed, trimmed, lower-case.
 *
 * "Text/Plain; charset=utf-8" -> "text/plain"
 */
export function normalizeContentType(value: string | undefined): string {
  if (value === undefined) {
    return '';
  }
  const semicolon = value.indexOf(';');
  const mediaType = semicolon === -1 ? value : value.slice(0, semicolon);
  return mediaType.trim().toLowerCase();
}
