/**
 * Plans
 */

import { z } from 'zod';
import type { WireSchema } from './errors.js';
import { PlanIntervalSchema } from './enums.js';
import type { JsonObject } from './json.js';
import {
  CurrencySchema,
  DefaultedMetadataSchema,
  NonnegIntSchema,
  PosIntSchema,
  TimestampSchema,
  metadataToWire,
} from './scalars.js';
import type { Plan } from './types.js';
import { compact, maybe } from './wire.js';

export const PlanSchema: WireSchema<Plan> = z
  .object({
    object: z.literal('plan'),
    id: z.string(),
    livemode: z.boolean(),
    /** Price per interval in the currency's minor unit */
    amount: NonnegIntSchema,
    created: TimestampSchema,
    currency: CurrencySchema,
    interval: PlanIntervalSchema,
    /** Number of intervals between billings */
    interval_count: NonnegIntSchema,
    name: z.string(),
    trial_period_days: maybe(PosIntSchema),
    statement_descriptor: maybe(z.string()),
    metadata: DefaultedMetadataSchema,
  })
  .transform(({ object: _tag, ...plan }) => plan);

export function planToWire(plan: Plan): JsonObject {
  return compact({ object: 'plan', ...plan, metadata: metadataToWire(plan.metadata) });
}
