/**
 * Shared test keys and requests
 */

import { createCredentials, Key } from '@hawkline/crypto';

export const REFERENCE_KEY_BYTES = new Uint8Array([
  11, 19, 228, 209, 79, 189, 200, 59, 166, 47, 86, 254, 235, 184, 120, 197, 75, 152, 201, 79, 115,
  61, 111, 242, 219, 187, 173, 14, 227, 108, 60, 232,
]);

export const referenceKey = (): Key => new Key(REFERENCE_KEY_BYTES, 'sha256');

export const REFERENCE_MAC_INPUT = {
  ts: 1000,
  nonce: 'nonny',
  method: 'POST',
  host: 'mysite.com',
  port: 443,
  path: '/v1/api',
};

export const SHARED_SECRET = 'werxhqb98rpaxn39848xrunpaw3489ruxnpa98w4rxn';

export const credentials = createCredentials('dh37fgj492je', SHARED_SECRET, 'sha256');

export const NOW = 1353832234;
