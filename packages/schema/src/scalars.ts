/**
 * Validated scalars
 *
 * Predicates are checked on decode and, through the codec facade, on
 * encode: an invalid PosInt can neither be read nor sent.
 */

import { z } from 'zod';
import {
  assertWith,
  decodeWith,
  EncodeError,
  DECODE_ERROR_CODES,
  type DecodeResult,
} from './errors.js';
import type { JsonObject } from './json.js';

/**
 * Integer strictly greater than zero
 */
export const PosIntSchema = z.number().int().positive().brand<'PosInt'>();
export type PosInt = z.infer<typeof PosIntSchema>;

/**
 * Integer greater than or equal to zero
 */
export const NonnegIntSchema = z.number().int().nonnegative().brand<'NonnegInt'>();
export type NonnegInt = z.infer<typeof NonnegIntSchema>;

/**
 * Unix timestamp in seconds
 */
export const TimestampSchema = z.number().int();
export type Timestamp = z.infer<typeof TimestampSchema>;

/**
 * Signed integer amount in the currency's minor unit (balances, totals)
 */
export const SignedAmountSchema = z.number().int();

/**
 * Currency code as the API sends it (lowercase ISO 4217, not checked
 * against the list)
 */
export const CurrencySchema = z.string().min(1);

// -----------------------------------------------------------------------------
// Metadata
// -----------------------------------------------------------------------------

export const METADATA_LIMITS = {
  /** Maximum number of key/value pairs */
  maxKeys: 10,
  /** Maximum key length in characters */
  maxKeyLength: 40,
  /** Maximum value length in characters */
  maxValueLength: 500,
} as const;

export type MetadataEntry = readonly [key: string, value: string];

/**
 * Ordered key/value pairs attached to most entities.
 *
 * The wire form is a JSON object, whose keys always enumerate with
 * array-index keys ("0", "10") first in ascending order, then the rest in
 * insertion order. Decoded metadata comes in that order; `metadata()`
 * puts built pairs into it, and encoding refuses pairs out of it.
 */
export type Metadata = ReadonlyArray<MetadataEntry>;

/** Key that a plain object cannot hold as an own property */
export const RESERVED_METADATA_KEY = '__proto__';

const MetadataKeySchema = z
  .string()
  .max(METADATA_LIMITS.maxKeyLength, `Metadata keys are limited to ${METADATA_LIMITS.maxKeyLength} characters`)
  .refine((key) => key !== RESERVED_METADATA_KEY, {
    message: `Metadata key ${JSON.stringify(RESERVED_METADATA_KEY)} is reserved`,
  });

const MetadataValueSchema = z
  .string()
  .max(
    METADATA_LIMITS.maxValueLength,
    `Metadata values are limited to ${METADATA_LIMITS.maxValueLength} characters`
  );

const tooManyKeys = `Metadata is limited to ${METADATA_LIMITS.maxKeys} keys`;

/**
 * Wire form: flat string-to-string object
 */
export const MetadataWireSchema = z
  .record(MetadataKeySchema, MetadataValueSchema)
  .refine((obj) => Object.keys(obj).length <= METADATA_LIMITS.maxKeys, { message: tooManyKeys });

export const MetadataSchema = MetadataWireSchema.transform(
  (obj): Metadata => Object.entries(obj)
);

/**
 * Metadata field as it appears on entities: absent decodes to no pairs.
 */
export const DefaultedMetadataSchema = MetadataSchema.default({});

/**
 * In-memory form: ordered pairs with unique keys
 */
export const MetadataEntriesSchema = z
  .array(z.tuple([MetadataKeySchema, MetadataValueSchema]))
  .max(METADATA_LIMITS.maxKeys, tooManyKeys)
  .superRefine((entries, ctx) => {
    const seen = new Set<string>();
    entries.forEach(([key], index) => {
      if (seen.has(key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate metadata key ${JSON.stringify(key)}`,
          path: [index, 0],
        });
      }
      seen.add(key);
    });
  });

const ARRAY_INDEX_KEY = /^(?:0|[1-9][0-9]{0,9})$/;

function isArrayIndexKey(key: string): boolean {
  return ARRAY_INDEX_KEY.test(key) && Number(key) < 2 ** 32 - 1;
}

/**
 * Reorder pairs into the order a JSON object enumerates their keys.
 */
export function inWireOrder(entries: Metadata): Metadata {
  const indexKeys = entries
    .filter(([key]) => isArrayIndexKey(key))
    .sort(([a], [b]) => Number(a) - Number(b));
  return [...indexKeys, ...entries.filter(([key]) => !isArrayIndexKey(key))];
}

function metadataEncodeError(key: string, message: string): EncodeError {
  const issue = { code: DECODE_ERROR_CODES.E_VALIDATION_FAILED, path: `metadata.${key}`, message };
  return new EncodeError({ ...issue, issues: [issue] });
}

/**
 * Write metadata pairs as the wire object.
 *
 * @throws EncodeError on a duplicate or reserved key, or pairs out of wire
 * order (limits are checked by the entity codec)
 */
export function metadataToWire(entries: Metadata): JsonObject {
  const out: JsonObject = {};
  for (const [key, value] of entries) {
    if (key === RESERVED_METADATA_KEY) {
      throw metadataEncodeError(key, `Metadata key ${JSON.stringify(key)} is reserved`);
    }
    if (Object.prototype.hasOwnProperty.call(out, key)) {
      throw metadataEncodeError(key, `Duplicate metadata key ${JSON.stringify(key)}`);
    }
    out[key] = value;
  }
  const expected = Object.keys(out);
  entries.forEach(([key], index) => {
    if (expected[index] !== key) {
      throw metadataEncodeError(key, `Metadata key ${JSON.stringify(key)} is out of wire order`);
    }
  });
  return out;
}

/**
 * Look up a metadata value by key.
 */
export function metadataGet(entries: Metadata, key: string): string | undefined {
  return entries.find(([k]) => k === key)?.[1];
}

// -----------------------------------------------------------------------------
// Decoders and factories
// -----------------------------------------------------------------------------

export function decodePosInt(input: unknown): DecodeResult<PosInt> {
  return decodeWith('value', PosIntSchema, input);
}

export function decodeNonnegInt(input: unknown): DecodeResult<NonnegInt> {
  return decodeWith('value', NonnegIntSchema, input);
}

export function decodeMetadata(input: unknown): DecodeResult<Metadata> {
  return decodeWith('metadata', MetadataSchema, input);
}

/**
 * Validate and write metadata pairs.
 *
 * @throws EncodeError when limits are exceeded or a key repeats
 */
export function encodeMetadata(entries: Metadata): JsonObject {
  assertWith('metadata', MetadataEntriesSchema, entries);
  return metadataToWire(entries);
}

/**
 * Build a PosInt for an outgoing value.
 *
 * @throws EncodeError unless n is an integer > 0
 */
export function posInt(n: number): PosInt {
  return assertWith('value', PosIntSchema, n);
}

/**
 * Build a NonnegInt for an outgoing value.
 *
 * @throws EncodeError unless n is an integer >= 0
 */
export function nonnegInt(n: number): NonnegInt {
  return assertWith('value', NonnegIntSchema, n);
}

/**
 * Build metadata pairs for an outgoing value, in wire order.
 *
 * @throws EncodeError when limits are exceeded or a key repeats
 */
export function metadata(pairs: Iterable<readonly [string, string]>): Metadata {
  const entries: MetadataEntry[] = Array.from(pairs, ([key, value]): MetadataEntry => [key, value]);
  assertWith('metadata', MetadataEntriesSchema, entries);
  return inWireOrder(entries);
}
