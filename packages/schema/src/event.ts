/**
 * Event envelope
 *
 * `type` is decoded as a plain string, never a closed enum: the API adds
 * event types over time and an unmodelled type must still decode. Callers
 * pick the payload decoder from the type, which `probeEventType` reads
 * without touching the payload.
 */

import { z } from 'zod';
import { checkErrorBody } from './codec.js';
import { decodeWith, type DecodeResult, type WireSchema } from './errors.js';
import { JsonObjectSchema, type JsonObject, type JsonValue } from './json.js';
import { NonnegIntSchema, TimestampSchema } from './scalars.js';
import type { Event } from './types.js';
import { compact, maybe, parseNested } from './wire.js';

const EventEnvelopeSchema = z.object({
  object: z.literal('event'),
  id: z.string(),
  created: TimestampSchema,
  livemode: z.boolean().optional(),
  type: z.string(),
  data: z.object({
    object: z.unknown(),
    previous_attributes: JsonObjectSchema.optional(),
  }),
  pending_webhooks: NonnegIntSchema,
  api_version: maybe(z.string()),
  request: maybe(z.string()),
});

/**
 * Event schema for a given payload schema.
 */
export function eventSchema<T>(payload: WireSchema<T>): WireSchema<Event<T>> {
  return EventEnvelopeSchema.transform(({ object: _tag, data, ...event }, ctx): Event<T> => {
    const nested = parseNested(payload, data.object, ['data', 'object'], ctx);
    if (!nested.ok) {
      return z.NEVER;
    }
    return {
      ...event,
      data:
        data.previous_attributes === undefined
          ? { object: nested.value }
          : { object: nested.value, previous_attributes: data.previous_attributes },
    };
  });
}

export function eventToWire<T>(event: Event<T>, payloadToWire: (payload: T) => JsonValue): JsonObject {
  return compact({
    object: 'event',
    ...event,
    data: compact({
      object: payloadToWire(event.data.object),
      previous_attributes: event.data.previous_attributes,
    }),
  });
}

// -----------------------------------------------------------------------------
// Type-only probe
// -----------------------------------------------------------------------------

export interface EventProbe {
  readonly id: string;
  readonly type: string;
}

const EventProbeSchema = z
  .object({
    object: z.literal('event'),
    id: z.string(),
    type: z.string(),
  })
  .transform(({ id, type }): EventProbe => ({ id, type }));

/**
 * Read an event's id and type without decoding its payload.
 */
export function probeEventType(input: unknown): DecodeResult<EventProbe> {
  return checkErrorBody('event', input) ?? decodeWith('event', EventProbeSchema, input);
}
