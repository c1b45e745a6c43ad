/**
 * Entity codec facade
 *
 * A codec pairs a zod wire schema (decode) with a wire builder (encode).
 * Encoding re-runs the decoder's schema over the produced JSON, so an
 * outgoing value is held to exactly the validators an incoming one is.
 */

import {
  assertWith,
  decodeWith,
  upstreamError,
  type DecodeError,
  type DecodeResult,
  type WireSchema,
} from './errors.js';
import { isJsonRecord, type JsonObject } from './json.js';
import { ErrorResponseSchema } from './responses.js';

export interface DecodeOptions {
  /**
   * Reject documented-but-unenforced API invariants as well (coupon
   * amount_off/percent_off, customer sources/cards, line item subscription).
   * Off by default: the API itself does not reject these shapes.
   */
  strict?: boolean;
}

export interface EncodeOptions {
  /**
   * Keep embedded objects in expandable fields. By default every
   * expandable reference is written as its identifier, the only form
   * request bodies accept.
   */
  preserveExpanded?: boolean;
}

export type ToWire<T> = (value: T, options: EncodeOptions) => JsonObject;

export interface EntityCodec<T> {
  /** Wire name of the entity, used as the root of error paths */
  readonly name: string;
  readonly schema: WireSchema<T>;
  /** Same as `schema` for entities without strict-only checks */
  readonly strictSchema: WireSchema<T>;
  decode(input: unknown, options?: DecodeOptions): DecodeResult<T>;
  encode(value: T, options?: EncodeOptions): JsonObject;
}

export interface CodecDefinition<T> {
  name: string;
  schema: WireSchema<T>;
  /** Schema applied instead of `schema` when decoding with `strict: true` */
  strictSchema?: WireSchema<T>;
  toWire: ToWire<T>;
  /** Report `{ error: ... }` bodies as E_UPSTREAM_ERROR (default true) */
  detectErrorBody?: boolean;
}

/**
 * Classify a payload as an API error body.
 *
 * Uses key presence: an `error` key without an `object` tag. Entity
 * payloads always carry `object`.
 */
export function isErrorBody(input: unknown): input is { error: unknown } {
  return isJsonRecord(input) && 'error' in input && !('object' in input);
}

/**
 * Failure to report for an API error body, or undefined when the input
 * is not one.
 */
export function checkErrorBody(root: string, input: unknown): { ok: false; error: DecodeError } | undefined {
  if (!isErrorBody(input)) {
    return undefined;
  }
  const upstream = decodeWith('', ErrorResponseSchema, input);
  if (!upstream.ok) {
    return upstream;
  }
  return { ok: false, error: upstreamError(root, upstream.value.error) };
}

/**
 * Define a codec for one entity.
 */
export function createCodec<T>(definition: CodecDefinition<T>): EntityCodec<T> {
  const { name, schema, toWire, detectErrorBody = true } = definition;
  const strictSchema = definition.strictSchema ?? schema;

  return {
    name,
    schema,
    strictSchema,
    decode(input: unknown, options: DecodeOptions = {}): DecodeResult<T> {
      const failure = detectErrorBody ? checkErrorBody(name, input) : undefined;
      if (failure) {
        return failure;
      }
      return decodeWith(name, options.strict ? strictSchema : schema, input);
    },
    encode(value: T, options: EncodeOptions = {}): JsonObject {
      const wire = toWire(value, options);
      assertWith(name, schema, wire);
      return wire;
    },
  };
}
