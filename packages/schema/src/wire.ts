/**
 * Shared wire helpers for entity schemas and encoders
 */

import { z } from 'zod';
import type { WireSchema } from './errors.js';
import type { JsonObject, JsonValue } from './json.js';

/**
 * Field the API may omit or send as null; both states are kept apart.
 */
export function maybe<T extends z.ZodTypeAny>(schema: T) {
  return schema.nullable().optional();
}

/**
 * Parse a nested value inside a transform, re-reporting its issues below
 * `path` so the caller's error paths stay complete.
 */
export function parseNested<T>(
  schema: WireSchema<T>,
  input: unknown,
  path: ReadonlyArray<string | number>,
  ctx: z.RefinementCtx
): { ok: true; value: T } | { ok: false } {
  const result = schema.safeParse(input);
  if (result.success) {
    return { ok: true, value: result.data };
  }
  for (const issue of result.error.issues) {
    ctx.addIssue({ ...issue, path: [...path, ...issue.path] });
  }
  return { ok: false };
}

/**
 * Drop `undefined` entries so absent fields stay absent on the wire.
 */
export function compact(fields: Record<string, JsonValue | undefined>): JsonObject {
  const out: JsonObject = {};
  for (const [key, value] of Object.entries(fields)) {
    if (value !== undefined) {
      out[key] = value;
    }
  }
  return out;
}

/**
 * Encode an optional nested value, keeping null and absent apart.
 */
export function optionalToWire<T extends {}>(
  value: T | null | undefined,
  toWire: (value: T) => JsonValue
): JsonValue | undefined {
  if (value === undefined || value === null) {
    return value;
  }
  return toWire(value);
}

/**
 * True when an optional nullable field carries a value.
 */
export function isPresent<T>(value: T | null | undefined): value is T {
  return value !== undefined && value !== null;
}
