/**
 * Charges and refunds
 */

import { z } from 'zod';
import { ShallowCardSchema, shallowCardToWire } from './customer.js';
import type { WireSchema } from './errors.js';
import { ChargeStatusSchema, RefundReasonSchema } from './enums.js';
import type { JsonObject } from './json.js';
import { listToWire, paginatedList } from './list.js';
import {
  CurrencySchema,
  DefaultedMetadataSchema,
  NonnegIntSchema,
  TimestampSchema,
  metadataToWire,
} from './scalars.js';
import type { Charge, Refund } from './types.js';
import { compact, maybe } from './wire.js';

export const RefundSchema: WireSchema<Refund> = z
  .object({
    object: z.literal('refund'),
    id: z.string(),
    amount: NonnegIntSchema,
    currency: CurrencySchema,
    created: TimestampSchema,
    charge: z.string(),
    balance_transaction: maybe(z.string()),
    reason: maybe(RefundReasonSchema),
    receipt_number: maybe(z.string()),
    metadata: DefaultedMetadataSchema,
  })
  .transform(({ object: _tag, ...refund }) => refund);

export const ChargeSchema: WireSchema<Charge> = z
  .object({
    object: z.literal('charge'),
    id: z.string(),
    livemode: z.boolean(),
    amount: NonnegIntSchema,
    amount_refunded: NonnegIntSchema,
    captured: z.boolean(),
    created: TimestampSchema,
    currency: CurrencySchema,
    paid: z.boolean(),
    refunded: z.boolean(),
    refunds: paginatedList(RefundSchema),
    source: ShallowCardSchema,
    status: ChargeStatusSchema,
    balance_transaction: maybe(z.string()),
    customer: maybe(z.string()),
    description: maybe(z.string()),
    failure_code: maybe(z.string()),
    failure_message: maybe(z.string()),
    invoice: maybe(z.string()),
    receipt_email: maybe(z.string()),
    receipt_number: maybe(z.string()),
    statement_descriptor: maybe(z.string()),
    metadata: DefaultedMetadataSchema,
  })
  .transform(({ object: _tag, ...charge }) => charge);

export function refundToWire(refund: Refund): JsonObject {
  return compact({ object: 'refund', ...refund, metadata: metadataToWire(refund.metadata) });
}

export function chargeToWire(charge: Charge): JsonObject {
  return compact({
    object: 'charge',
    ...charge,
    refunds: listToWire(charge.refunds, refundToWire),
    source: shallowCardToWire(charge.source),
    metadata: metadataToWire(charge.metadata),
  });
}
