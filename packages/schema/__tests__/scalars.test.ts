/**
 * Validated scalar tests
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import {
  DECODE_ERROR_CODES,
  EncodeError,
  METADATA_LIMITS,
  decodeMetadata,
  decodeNonnegInt,
  decodePosInt,
  encodeMetadata,
  inWireOrder,
  metadata,
  metadataGet,
  nonnegInt,
  posInt,
} from '../src/index.js';
import type { JsonObject } from '../src/index.js';
import { failure, unwrap } from './fixtures.js';

function metadataWith(count: number): JsonObject {
  const out: JsonObject = {};
  for (let i = 0; i < count; i++) {
    out[`key${i}`] = 'value';
  }
  return out;
}

// -----------------------------------------------------------------------------
// PosInt / NonnegInt
// -----------------------------------------------------------------------------

describe('PosInt', () => {
  it('accepts 1', () => {
    expect(unwrap(decodePosInt(1))).toBe(1);
  });

  it('rejects 0 and -1', () => {
    expect(failure(decodePosInt(0)).code).toBe(DECODE_ERROR_CODES.E_VALIDATION_FAILED);
    expect(failure(decodePosInt(-1)).code).toBe(DECODE_ERROR_CODES.E_VALIDATION_FAILED);
  });

  it('reports the path as value', () => {
    expect(failure(decodePosInt(0)).path).toBe('value');
  });

  it('rejects non-integers and strings as type mismatches', () => {
    expect(failure(decodePosInt(1.5)).code).toBe(DECODE_ERROR_CODES.E_TYPE_MISMATCH);
    expect(failure(decodePosInt('1')).code).toBe(DECODE_ERROR_CODES.E_TYPE_MISMATCH);
  });

  it('decodes every positive integer', () => {
    fc.assert(fc.property(fc.integer({ min: 1 }), (n) => decodePosInt(n).ok));
  });

  it('rejects every integer below 1', () => {
    fc.assert(fc.property(fc.integer({ max: 0 }), (n) => !decodePosInt(n).ok));
  });

  it('posInt() throws EncodeError for 0', () => {
    expect(() => posInt(0)).toThrow(EncodeError);
    expect(posInt(7)).toBe(7);
  });
});

describe('NonnegInt', () => {
  it('accepts 0', () => {
    expect(unwrap(decodeNonnegInt(0))).toBe(0);
  });

  it('rejects -1', () => {
    const error = failure(decodeNonnegInt(-1));
    expect(error.code).toBe(DECODE_ERROR_CODES.E_VALIDATION_FAILED);
    expect(error.path).toBe('value');
  });

  it('decodes every non-negative integer', () => {
    fc.assert(fc.property(fc.nat(), (n) => decodeNonnegInt(n).ok));
  });

  it('nonnegInt() throws EncodeError for -1', () => {
    expect(() => nonnegInt(-1)).toThrow(EncodeError);
    expect(nonnegInt(0)).toBe(0);
  });
});

// -----------------------------------------------------------------------------
// Metadata
// -----------------------------------------------------------------------------

describe('Metadata', () => {
  it('accepts exactly the key limit', () => {
    expect(unwrap(decodeMetadata(metadataWith(METADATA_LIMITS.maxKeys)))).toHaveLength(10);
  });

  it('rejects one key over the limit', () => {
    const error = failure(decodeMetadata(metadataWith(11)));
    expect(error.code).toBe(DECODE_ERROR_CODES.E_VALIDATION_FAILED);
    expect(error.path).toBe('metadata');
    expect(error.message).toBe('Metadata is limited to 10 keys');
  });

  it('accepts a 40 character key and rejects a 41 character key', () => {
    const ok = 'k'.repeat(40);
    const tooLong = 'k'.repeat(41);
    expect(unwrap(decodeMetadata({ [ok]: 'v' }))).toEqual([[ok, 'v']]);

    const error = failure(decodeMetadata({ [tooLong]: 'v' }));
    expect(error.code).toBe(DECODE_ERROR_CODES.E_VALIDATION_FAILED);
    expect(error.path).toBe(`metadata.${tooLong}`);
  });

  it('accepts a 500 character value and rejects a 501 character value', () => {
    expect(decodeMetadata({ note: 'v'.repeat(500) }).ok).toBe(true);

    const error = failure(decodeMetadata({ note: 'v'.repeat(501) }));
    expect(error.code).toBe(DECODE_ERROR_CODES.E_VALIDATION_FAILED);
    expect(error.path).toBe('metadata.note');
    expect(error.message).toBe('Metadata values are limited to 500 characters');
  });

  it('rejects non-string values', () => {
    const error = failure(decodeMetadata({ count: 3 }));
    expect(error.code).toBe(DECODE_ERROR_CODES.E_TYPE_MISMATCH);
    expect(error.path).toBe('metadata.count');
  });

  it('keeps wire key order', () => {
    expect(unwrap(decodeMetadata({ b: '2', a: '1' }))).toEqual([
      ['b', '2'],
      ['a', '1'],
    ]);
  });

  it('encodes pairs back to the wire object', () => {
    expect(encodeMetadata([['order', '6735']])).toEqual({ order: '6735' });
  });

  it('refuses to encode a repeated key', () => {
    try {
      encodeMetadata([
        ['a', '1'],
        ['a', '2'],
      ]);
      expect.unreachable('should have thrown');
    } catch (err) {
      expect(err).toBeInstanceOf(EncodeError);
      if (err instanceof EncodeError) {
        expect(err.code).toBe(DECODE_ERROR_CODES.E_VALIDATION_FAILED);
        expect(err.path).toBe('metadata[1][0]');
      }
    }
  });

  it('metadata() validates limits', () => {
    const pairs = Array.from({ length: 11 }, (_, i): [string, string] => [`k${i}`, 'v']);
    expect(() => metadata(pairs)).toThrow(EncodeError);
    expect(metadata(pairs.slice(0, 10))).toHaveLength(10);
  });

  it('metadataGet() finds a value by key', () => {
    const entries = metadata([
      ['order', '6735'],
      ['plan', 'gold'],
    ]);
    expect(metadataGet(entries, 'plan')).toBe('gold');
    expect(metadataGet(entries, 'missing')).toBeUndefined();
  });

  it('keeps array-index keys first, as a JSON object lists them', () => {
    expect(unwrap(decodeMetadata(JSON.parse('{"b":"1","10":"x","2":"y"}')))).toEqual([
      ['2', 'y'],
      ['10', 'x'],
      ['b', '1'],
    ]);
  });

  it('metadata() puts pairs in wire order', () => {
    const entries = metadata([
      ['b', '1'],
      ['10', 'x'],
      ['01', 'z'],
    ]);
    expect(entries).toEqual([
      ['10', 'x'],
      ['b', '1'],
      ['01', 'z'],
    ]);
    expect(unwrap(decodeMetadata(encodeMetadata(entries)))).toEqual(entries);
  });

  it('refuses to encode pairs out of wire order', () => {
    expect(() =>
      encodeMetadata([
        ['b', '1'],
        ['10', 'x'],
      ])
    ).toThrow('Cannot encode metadata.b: Metadata key "b" is out of wire order');
  });

  it('inWireOrder() sorts array-index keys numerically', () => {
    expect(
      inWireOrder([
        ['z', '1'],
        ['10', '2'],
        ['9', '3'],
        ['4294967295', '4'],
      ])
    ).toEqual([
      ['9', '3'],
      ['10', '2'],
      ['z', '1'],
      ['4294967295', '4'],
    ]);
  });

  it('rejects a __proto__ key on decode', () => {
    const error = failure(decodeMetadata(JSON.parse('{"__proto__":"x"}')));
    expect(error.code).toBe(DECODE_ERROR_CODES.E_VALIDATION_FAILED);
    expect(error.path).toBe('metadata.__proto__');
    expect(error.message).toBe('Metadata key "__proto__" is reserved');
  });

  it('rejects a __proto__ key on encode', () => {
    expect(() => metadata([['__proto__', 'x']])).toThrow(EncodeError);
    expect(() => encodeMetadata([['__proto__', 'x']])).toThrow(EncodeError);
  });

  it('round-trips any metadata within limits', () => {
    const keys = fc
      .oneof(
        fc.stringMatching(/^[a-z][a-z0-9_]{0,39}$/),
        fc.nat({ max: 99999 }).map(String),
        fc.string({ maxLength: 40 })
      )
      .filter((key) => key !== '__proto__');
    const pairs = fc.uniqueArray(fc.tuple(keys, fc.string({ maxLength: 500 })), {
      maxLength: METADATA_LIMITS.maxKeys,
      selector: ([key]) => key,
    });
    fc.assert(
      fc.property(pairs, (generated) => {
        const entries = metadata(generated);
        const wire = encodeMetadata(entries);
        expect(Object.entries(wire)).toEqual(entries);
        expect(unwrap(decodeMetadata(wire))).toEqual(entries);
      })
    );
  });
});
