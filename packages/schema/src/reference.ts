/**
 * Expandable references
 *
 * Some relational fields come back either as a bare identifier or, when
 * the request asked for it, as the full embedded object. The payload does
 * not say which was requested, so decoding goes by shape: an object is
 * decoded as the embedded entity, a string as an identifier.
 */

import { z } from 'zod';
import type { WireSchema } from './errors.js';
import { isJsonRecord, type JsonValue } from './json.js';
import type { EncodeOptions } from './codec.js';
import { parseNested } from './wire.js';

export type Reference<T> =
  | { readonly kind: 'id'; readonly id: string }
  | { readonly kind: 'embedded'; readonly value: T };

export function idReference<T>(id: string): Reference<T> {
  return { kind: 'id', id };
}

export function embeddedReference<T>(value: T): Reference<T> {
  return { kind: 'embedded', value };
}

export function isEmbedded<T>(ref: Reference<T>): ref is { readonly kind: 'embedded'; readonly value: T } {
  return ref.kind === 'embedded';
}

/**
 * Identifier of the referenced object, whichever form was decoded.
 */
export function referenceId<T extends { readonly id: string }>(ref: Reference<T>): string {
  return ref.kind === 'id' ? ref.id : ref.value.id;
}

/**
 * Schema for an expandable field whose embedded form is `embedded`.
 */
export function expandable<T>(embedded: WireSchema<T>): WireSchema<Reference<T>> {
  return z.unknown().transform((input, ctx): Reference<T> => {
    if (isJsonRecord(input)) {
      const nested = parseNested(embedded, input, [], ctx);
      return nested.ok ? embeddedReference(nested.value) : z.NEVER;
    }
    if (typeof input === 'string') {
      return idReference(input);
    }
    ctx.addIssue({
      code: z.ZodIssueCode.invalid_type,
      expected: z.ZodParsedType.string,
      received: z.getParsedType(input),
      message: 'Expected an identifier string or an embedded object',
    });
    return z.NEVER;
  });
}

/**
 * Write an expandable field. Request bodies take identifiers only, so the
 * embedded form is kept only when asked for.
 */
export function referenceToWire<T extends { readonly id: string }>(
  ref: Reference<T>,
  toWire: (value: T) => JsonValue,
  options: EncodeOptions
): JsonValue {
  if (ref.kind === 'embedded' && options.preserveExpanded) {
    return toWire(ref.value);
  }
  return referenceId(ref);
}
