/**
 * Coupons and the discounts that apply them
 */

import { z } from 'zod';
import type { WireSchema } from './errors.js';
import { CouponDurationSchema } from './enums.js';
import type { JsonObject } from './json.js';
import {
  CurrencySchema,
  DefaultedMetadataSchema,
  NonnegIntSchema,
  PosIntSchema,
  TimestampSchema,
  metadataToWire,
} from './scalars.js';
import type { Coupon, Discount } from './types.js';
import { compact, isPresent, maybe } from './wire.js';

export const CouponSchema: WireSchema<Coupon> = z
  .object({
    object: z.literal('coupon'),
    id: z.string(),
    livemode: z.boolean(),
    created: TimestampSchema,
    duration: CouponDurationSchema,
    amount_off: maybe(PosIntSchema),
    percent_off: maybe(PosIntSchema),
    currency: maybe(CurrencySchema),
    /** Set when duration is 'repeating' */
    duration_in_months: maybe(PosIntSchema),
    max_redemptions: maybe(PosIntSchema),
    redeem_by: maybe(TimestampSchema),
    times_redeemed: NonnegIntSchema,
    valid: z.boolean(),
    metadata: DefaultedMetadataSchema,
  })
  .transform(({ object: _tag, ...coupon }) => coupon);

/**
 * Coupon that also rejects amount_off together with percent_off
 */
export const StrictCouponSchema: WireSchema<Coupon> = CouponSchema.superRefine((coupon, ctx) => {
  if (isPresent(coupon.amount_off) && isPresent(coupon.percent_off)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'amount_off and percent_off are mutually exclusive',
      path: ['percent_off'],
    });
  }
});

function discountSchema(coupon: WireSchema<Coupon>): WireSchema<Discount> {
  return z
    .object({
      object: z.literal('discount'),
      coupon,
      customer: z.string(),
      start: TimestampSchema,
      end: maybe(TimestampSchema),
      subscription: maybe(z.string()),
    })
    .transform(({ object: _tag, ...discount }) => discount);
}

export const DiscountSchema = discountSchema(CouponSchema);

/**
 * Discount whose coupon is decoded strictly
 */
export const StrictDiscountSchema = discountSchema(StrictCouponSchema);

export function couponToWire(coupon: Coupon): JsonObject {
  return compact({ object: 'coupon', ...coupon, metadata: metadataToWire(coupon.metadata) });
}

export function discountToWire(discount: Discount): JsonObject {
  return compact({ object: 'discount', ...discount, coupon: couponToWire(discount.coupon) });
}
