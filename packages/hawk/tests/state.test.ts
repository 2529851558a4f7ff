import { describe, it, expect } from 'vitest';
import { nobleBackend, type CryptoBackend } from '@hawkline/crypto';
import {
  nowSeconds,
  parseConfig,
  requestConfigSchema,
  toSeconds,
  validationOptionsSchema,
} from '../src/config.js';
import { ErrorCodes, ErrorHttpStatus, HawkError, isHawkError } from '../src/errors.js';
import { Header } from '../src/header.js';
import { createRequestState, stateFromHeader } from '../src/state.js';

const URL_SAFE = /^[A-Za-z0-9_-]+$/;

describe('createRequestState', () => {
  it('creates a 12-byte url-safe nonce by default', () => {
    const { nonce } = createRequestState();
    expect(nonce).toHaveLength(16);
    expect(nonce).toMatch(URL_SAFE);
  });

  it('creates a different nonce each time', () => {
    expect(createRequestState().nonce).not.toBe(createRequestState().nonce);
  });

  it('honors nonceBytes', () => {
    expect(createRequestState({ nonceBytes: 32 }).nonce).toHaveLength(43);
  });

  it('rejects short nonces', () => {
    expect(() => createRequestState({ nonceBytes: 9 })).toThrow(
      'Invalid request state options: nonceBytes: Nonce must carry at least 10 bytes'
    );
  });

  it('truncates the clock override', () => {
    expect(createRequestState({ now: 1000.7 }).ts).toBe(1000);
  });

  it('uses the current time by default', () => {
    const before = nowSeconds();
    const { ts } = createRequestState();
    expect(ts).toBeGreaterThanOrEqual(before);
    expect(ts).toBeLessThanOrEqual(nowSeconds());
  });

  it('draws randomness from the given backend', () => {
    const fixed: CryptoBackend = {
      ...nobleBackend,
      name: 'fixed',
      randomBytes: (length) => new Uint8Array(length).fill(0xff),
    };
    expect(createRequestState({ backend: fixed, nonceBytes: 12 }).nonce).toBe('_'.repeat(16));
  });

  it('is frozen', () => {
    expect(Object.isFrozen(createRequestState())).toBe(true);
  });
});

describe('stateFromHeader', () => {
  it('reads ts and nonce', () => {
    expect(stateFromHeader(new Header({ ts: 5, nonce: 'n' }))).toEqual({ ts: 5, nonce: 'n' });
  });

  it('requires both', () => {
    expect(() => stateFromHeader(new Header({ ts: 5 }))).toThrow(HawkError);
    try {
      stateFromHeader(new Header({ nonce: 'n' }));
      expect.unreachable();
    } catch (err) {
      expect(err).toHaveProperty('code', ErrorCodes.MISSING_ATTRIBUTES);
    }
  });
});

describe('parseConfig', () => {
  it('returns parsed data with defaults', () => {
    expect(parseConfig(validationOptionsSchema, {}, 'options')).toEqual({ skewSeconds: 60 });
  });

  it('reports issues without a path', () => {
    expect(() => parseConfig(requestConfigSchema, 'nope', 'request')).toThrow(
      /^Invalid request: /
    );
  });

  it('throws E_INVALID_REQUEST', () => {
    try {
      parseConfig(validationOptionsSchema, { skewSeconds: Number.POSITIVE_INFINITY }, 'options');
      expect.unreachable();
    } catch (err) {
      expect(isHawkError(err)).toBe(true);
      expect(err).toHaveProperty('code', ErrorCodes.INVALID_REQUEST);
      expect(err).toHaveProperty('httpStatus', 500);
    }
  });
});

describe('toSeconds', () => {
  it('truncates toward zero', () => {
    expect(toSeconds(12.9)).toBe(12);
    expect(toSeconds(-1.5)).toBe(-1);
  });
});

describe('ErrorHttpStatus', () => {
  it('maps parse errors to 400, caller bugs to 500 and auth failures to 401', () => {
    expect(ErrorHttpStatus[ErrorCodes.HEADER_PARSE]).toBe(400);
    expect(ErrorHttpStatus[ErrorCodes.INVALID_BEWIT_EXP]).toBe(400);
    expect(ErrorHttpStatus[ErrorCodes.INVALID_HEADER_VALUE]).toBe(500);
    expect(ErrorHttpStatus[ErrorCodes.UNAUTHORIZED]).toBe(401);
  });

  it('is attached to every HawkError', () => {
    const err = new HawkError(ErrorCodes.MULTIPLE_BEWITS, 'x');
    expect(err.httpStatus).toBe(400);
    expect(err.name).toBe('HawkError');
    expect(err).toBeInstanceOf(Error);
  });
});
