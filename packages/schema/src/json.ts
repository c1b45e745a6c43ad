/**
 * JSON value types and schemas
 *
 * Decoders take structured JSON that an external parser already produced;
 * encoders return the same shapes. Numbers must be finite: JSON.stringify
 * turns NaN and Infinity into null.
 */

import { z } from 'zod';

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonArray | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

export type JsonArray = JsonValue[];

/**
 * JSON primitive schema - string, finite number, boolean, null
 */
export const JsonPrimitiveSchema = z.union([z.string(), z.number().finite(), z.boolean(), z.null()]);

/**
 * JSON value schema - recursive type for any valid JSON value
 */
export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([JsonPrimitiveSchema, z.array(JsonValueSchema), z.record(z.string(), JsonValueSchema)])
);

/**
 * JSON object schema - string keys and JSON values
 */
export const JsonObjectSchema: z.ZodType<JsonObject> = z.record(z.string(), JsonValueSchema);

/**
 * Check if value is a plain JSON object (not an array, not null)
 */
export function isJsonRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
