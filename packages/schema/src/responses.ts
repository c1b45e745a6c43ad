/**
 * Bodies that are not entities: API error responses and delete
 * confirmations.
 */

import { z } from 'zod';
import type { WireSchema } from './errors.js';
import { ApiErrorTypeSchema } from './enums.js';
import type { JsonObject } from './json.js';
import type { DeletedObject, ErrorResponse } from './types.js';
import { compact } from './wire.js';

/**
 * `{ error: { type, message, code?, param? } }`
 *
 * `code` and `decline_code` are open-ended strings: the API adds codes
 * more often than error types.
 */
export const ErrorResponseSchema: WireSchema<ErrorResponse> = z.object({
  error: z.object({
    type: ApiErrorTypeSchema,
    message: z.string(),
    code: z.string().optional(),
    param: z.string().optional(),
    decline_code: z.string().optional(),
    charge: z.string().optional(),
  }),
});

export const DeletedObjectSchema: WireSchema<DeletedObject> = z.object({
  id: z.string(),
  deleted: z.literal(true),
});

export function errorResponseToWire(response: ErrorResponse): JsonObject {
  return { error: compact({ ...response.error }) };
}

export function deletedObjectToWire(deleted: DeletedObject): JsonObject {
  return { id: deleted.id, deleted: deleted.deleted };
}
