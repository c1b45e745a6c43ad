/**
 * Subscriptions
 */

import { z } from 'zod';
import { DiscountSchema, StrictDiscountSchema, discountToWire } from './coupon.js';
import type { WireSchema } from './errors.js';
import { SubscriptionStatusSchema } from './enums.js';
import type { JsonObject } from './json.js';
import { PlanSchema, planToWire } from './plan.js';
import { DefaultedMetadataSchema, PosIntSchema, TimestampSchema, metadataToWire } from './scalars.js';
import type { Discount, Subscription } from './types.js';
import { compact, maybe, optionalToWire } from './wire.js';

const PercentSchema = z.number().finite();

function subscriptionSchema(discount: WireSchema<Discount>): WireSchema<Subscription> {
  return z
    .object({
      object: z.literal('subscription'),
      id: z.string(),
      plan: PlanSchema,
      customer: z.string(),
      status: SubscriptionStatusSchema,
      start: TimestampSchema,
      cancel_at_period_end: z.boolean(),
      current_period_start: TimestampSchema,
      current_period_end: TimestampSchema,
      quantity: PosIntSchema,
      ended_at: maybe(TimestampSchema),
      trial_start: maybe(TimestampSchema),
      trial_end: maybe(TimestampSchema),
      canceled_at: maybe(TimestampSchema),
      application_fee_percent: maybe(PercentSchema),
      tax_percent: maybe(PercentSchema),
      discount: maybe(discount),
      metadata: DefaultedMetadataSchema,
    })
    .transform(({ object: _tag, ...subscription }) => subscription);
}

export const SubscriptionSchema = subscriptionSchema(DiscountSchema);

/**
 * Subscription whose discount coupon is decoded strictly
 */
export const StrictSubscriptionSchema = subscriptionSchema(StrictDiscountSchema);

export function subscriptionToWire(subscription: Subscription): JsonObject {
  return compact({
    object: 'subscription',
    ...subscription,
    plan: planToWire(subscription.plan),
    discount: optionalToWire(subscription.discount, discountToWire),
    metadata: metadataToWire(subscription.metadata),
  });
}
