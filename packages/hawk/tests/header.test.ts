import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { Mac } from '@hawkline/crypto';
import { REQUEST_REQUIRED_ATTRIBUTES } from '../src/constants.js';
import { ErrorCodes, HawkError } from '../src/errors.js';
import {
  formatAuthorization,
  formatHeader,
  Header,
  parseAuthorization,
  parseHeader,
} from '../src/header.js';

const MAC_BYTES = new Uint8Array([
  8, 35, 182, 149, 42, 111, 33, 192, 19, 22, 94, 43, 118, 176, 65, 69, 86, 4, 156, 184, 85, 107,
  249, 242, 172, 200, 66, 209, 57, 63, 38, 83,
]);
const MAC_BASE64 = 'CCO2lSpvIcATFl4rdrBBRVYEnLhVa/nyrMhC0Tk/JlM=';

function fullHeader(): Header {
  return new Header({
    id: 'dh37fgj492je',
    ts: 1353832234,
    nonce: 'j4h3g2',
    mac: new Mac(MAC_BYTES),
    ext: 'some-app-ext-data',
    hash: new Uint8Array([1, 2, 3, 4]),
    app: 'my-app',
    dlg: 'my-authority',
  });
}

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof HawkError) {
      return err.code;
    }
    throw err;
  }
  return undefined;
}

describe('formatHeader', () => {
  it('writes attributes in wire order', () => {
    expect(formatHeader(fullHeader())).toBe(
      `id="dh37fgj492je", ts="1353832234", nonce="j4h3g2", mac="${MAC_BASE64}", ` +
        'ext="some-app-ext-data", hash="AQIDBA==", app="my-app", dlg="my-authority"'
    );
  });

  it('skips absent attributes', () => {
    expect(formatHeader(new Header({ mac: new Mac(MAC_BYTES), ext: 'x' }))).toBe(
      `mac="${MAC_BASE64}", ext="x"`
    );
  });

  it('formats an empty header as an empty string', () => {
    expect(formatHeader(new Header())).toBe('');
  });

  it('keeps empty string values', () => {
    expect(formatHeader(new Header({ ext: '' }))).toBe('ext=""');
  });

  it('prefixes the scheme for Authorization values', () => {
    expect(formatAuthorization(new Header({ id: 'a' }))).toBe('Hawk id="a"');
  });
});

describe('Header', () => {
  it('rejects values containing a double quote', () => {
    expect(codeOf(() => new Header({ ext: 'say "hi"' }))).toBe(ErrorCodes.INVALID_HEADER_VALUE);
    expect(codeOf(() => new Header({ id: '"' }))).toBe(ErrorCodes.INVALID_HEADER_VALUE);
  });

  it('truncates fractional timestamps', () => {
    expect(new Header({ ts: 1000.9 }).ts).toBe(1000);
  });

  it('rejects non-finite timestamps', () => {
    expect(codeOf(() => new Header({ ts: Number.NaN }))).toBe(ErrorCodes.INVALID_HEADER_VALUE);
  });

  it('copies the hash', () => {
    const hash = new Uint8Array([1, 2]);
    const header = new Header({ hash });
    hash[0] = 9;
    expect(Array.from(header.hash ?? [])).toEqual([1, 2]);
  });

  it('reports which attributes are present', () => {
    const header = new Header({ id: 'a', ext: '' });
    expect(header.has('id')).toBe(true);
    expect(header.has('ext')).toBe(true);
    expect(header.has('mac')).toBe(false);
  });
});

describe('parseHeader', () => {
  it('parses every attribute', () => {
    const header = parseHeader(formatHeader(fullHeader()));
    expect(header.id).toBe('dh37fgj492je');
    expect(header.ts).toBe(1353832234);
    expect(header.nonce).toBe('j4h3g2');
    expect(header.mac?.toBase64()).toBe(MAC_BASE64);
    expect(header.ext).toBe('some-app-ext-data');
    expect(Array.from(header.hash ?? [])).toEqual([1, 2, 3, 4]);
    expect(header.app).toBe('my-app');
    expect(header.dlg).toBe('my-authority');
  });

  it('tolerates irregular whitespace and separators', () => {
    const header = parseHeader('  id = "a" ,ts="12"  nonce="n",,\t ext="x y" ,');
    expect(header.id).toBe('a');
    expect(header.ts).toBe(12);
    expect(header.nonce).toBe('n');
    expect(header.ext).toBe('x y');
  });

  it('accepts values with commas and equals signs', () => {
    expect(parseHeader('ext="a=b, c"').ext).toBe('a=b, c');
  });

  it('returns an empty header for empty input', () => {
    expect(formatHeader(parseHeader(''))).toBe('');
    expect(formatHeader(parseHeader(' , '))).toBe('');
  });

  it('accepts negative timestamps', () => {
    expect(parseHeader('ts="-5"').ts).toBe(-5);
  });

  it('rejects unknown attributes', () => {
    expect(codeOf(() => parseHeader('id="a", bogus="b"'))).toBe(ErrorCodes.UNKNOWN_ATTRIBUTE);
  });

  it('rejects duplicate attributes', () => {
    expect(codeOf(() => parseHeader('id="a", id="b"'))).toBe(ErrorCodes.HEADER_PARSE);
  });

  it.each([
    ['missing equals sign', 'id'],
    ['unquoted value', 'id=a'],
    ['unterminated value', 'id="a'],
    ['text after a closing quote', 'id="a"x, ts="1"'],
    ['non-token name', 'i d="a"'],
    ['empty name', '="a"'],
  ])('rejects %s', (_label, input) => {
    expect(codeOf(() => parseHeader(input))).toBe(ErrorCodes.HEADER_PARSE);
  });

  it.each(['abc', '1.5', '', '1e3', '99999999999999999999'])(
    'rejects timestamp %j',
    (ts) => {
      expect(codeOf(() => parseHeader(`ts="${ts}"`))).toBe(ErrorCodes.INVALID_TIMESTAMP);
    }
  );

  it('rejects invalid base64 in mac and hash', () => {
    expect(codeOf(() => parseHeader('mac="not base64!"'))).toBe(ErrorCodes.BASE64_DECODE);
    expect(codeOf(() => parseHeader('hash="AQ"'))).toBe(ErrorCodes.BASE64_DECODE);
  });

  it('lists missing required attributes', () => {
    expect(() =>
      parseHeader('id="a", ts="1"', { required: REQUEST_REQUIRED_ATTRIBUTES })
    ).toThrow('Missing required attributes: nonce, mac');
    expect(
      codeOf(() => parseHeader('id="a"', { required: REQUEST_REQUIRED_ATTRIBUTES }))
    ).toBe(ErrorCodes.MISSING_ATTRIBUTES);
  });
});

describe('parseAuthorization', () => {
  it('strips the scheme case-insensitively', () => {
    expect(parseAuthorization('hawk id="a"').id).toBe('a');
    expect(parseAuthorization('HAWK   id="a"').id).toBe('a');
  });

  it('accepts a bare scheme', () => {
    expect(formatHeader(parseAuthorization('Hawk'))).toBe('');
  });

  it('rejects other schemes', () => {
    expect(() => parseAuthorization('Bearer abc')).toThrow('Authorization scheme is not Hawk');
    expect(codeOf(() => parseAuthorization('Hawkish id="a"'))).toBe(ErrorCodes.HEADER_PARSE);
  });
});

describe('format/parse round trip', () => {
  const value = fc.string().filter((s) => !s.includes('"'));

  it('preserves every field', () => {
    fc.assert(
      fc.property(
        fc.record(
          {
            id: value,
            ts: fc.integer({ min: -(2 ** 40), max: 2 ** 40 }),
            nonce: value,
            mac: fc.uint8Array({ minLength: 1, maxLength: 64 }),
            ext: value,
            hash: fc.uint8Array({ maxLength: 64 }),
            app: value,
            dlg: value,
          },
          { requiredKeys: [] }
        ),
        (fields) => {
          const header = new Header({
            ...fields,
            mac: fields.mac !== undefined ? new Mac(fields.mac) : undefined,
          });
          const parsed = parseHeader(formatHeader(header));
          expect(formatHeader(parsed)).toBe(formatHeader(header));
          expect(parsed.id).toBe(header.id);
          expect(parsed.ts).toBe(header.ts);
          expect(parsed.ext).toBe(header.ext);
        }
      )
    );
  });
});
