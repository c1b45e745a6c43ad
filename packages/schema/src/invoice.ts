/**
 * Invoices, their line items, and standalone invoice items
 */

import { z } from 'zod';
import { DiscountSchema, StrictDiscountSchema, discountToWire } from './coupon.js';
import type { WireSchema } from './errors.js';
import { LineItemTypeSchema } from './enums.js';
import type { JsonObject } from './json.js';
import { listToWire, paginatedList } from './list.js';
import { PlanSchema, planToWire } from './plan.js';
import {
  CurrencySchema,
  DefaultedMetadataSchema,
  NonnegIntSchema,
  PosIntSchema,
  SignedAmountSchema,
  TimestampSchema,
  metadataToWire,
} from './scalars.js';
import type { Discount, Invoice, InvoiceItem, InvoiceLineItem, Period } from './types.js';
import { compact, isPresent, maybe, optionalToWire } from './wire.js';

export const PeriodSchema: WireSchema<Period> = z.object({
  start: TimestampSchema,
  end: TimestampSchema,
});

// -----------------------------------------------------------------------------
// Line items
// -----------------------------------------------------------------------------

export const InvoiceLineItemSchema: WireSchema<InvoiceLineItem> = z
  .object({
    object: z.literal('line_item'),
    id: z.string(),
    livemode: z.boolean(),
    amount: SignedAmountSchema,
    currency: CurrencySchema,
    discountable: z.boolean(),
    proration: z.boolean(),
    period: PeriodSchema,
    type: LineItemTypeSchema,
    quantity: maybe(PosIntSchema),
    plan: maybe(PlanSchema),
    description: maybe(z.string()),
    subscription: maybe(z.string()),
    metadata: DefaultedMetadataSchema,
  })
  .transform(({ object: _tag, ...line }) => line);

/**
 * Line item that also rejects a `subscription` reference on lines of type
 * 'subscription' (the line's own id names the subscription there)
 */
export const StrictInvoiceLineItemSchema: WireSchema<InvoiceLineItem> =
  InvoiceLineItemSchema.superRefine((line, ctx) => {
    if (line.type === 'subscription' && isPresent(line.subscription)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "subscription is only set on lines of type 'invoiceitem'",
        path: ['subscription'],
      });
    }
  });

// -----------------------------------------------------------------------------
// Invoices
// -----------------------------------------------------------------------------

function invoiceFields(discount: WireSchema<Discount>) {
  return {
    object: z.literal('invoice'),
    id: z.string(),
    livemode: z.boolean(),
    amount_due: SignedAmountSchema,
    attempt_count: NonnegIntSchema,
    attempted: z.boolean(),
    closed: z.boolean(),
    currency: CurrencySchema,
    customer: z.string(),
    date: TimestampSchema,
    forgiven: z.boolean().default(false),
    paid: z.boolean(),
    period_start: TimestampSchema,
    period_end: TimestampSchema,
    starting_balance: SignedAmountSchema,
    subtotal: SignedAmountSchema,
    total: SignedAmountSchema,
    application_fee: maybe(SignedAmountSchema),
    charge: maybe(z.string()),
    description: maybe(z.string()),
    discount: maybe(discount),
    ending_balance: maybe(SignedAmountSchema),
    next_payment_attempt: maybe(TimestampSchema),
    receipt_number: maybe(z.string()),
    statement_descriptor: maybe(z.string()),
    subscription: maybe(z.string()),
    tax: maybe(SignedAmountSchema),
    tax_percent: maybe(z.number().finite()),
    webhooks_delivered_at: maybe(TimestampSchema),
    metadata: DefaultedMetadataSchema,
  };
}

export const InvoiceSchema: WireSchema<Invoice> = z
  .object({ ...invoiceFields(DiscountSchema), lines: paginatedList(InvoiceLineItemSchema) })
  .transform(({ object: _tag, ...invoice }) => invoice);

/**
 * Invoice whose lines and discount coupon are decoded strictly
 */
export const StrictInvoiceSchema: WireSchema<Invoice> = z
  .object({
    ...invoiceFields(StrictDiscountSchema),
    lines: paginatedList(StrictInvoiceLineItemSchema),
  })
  .transform(({ object: _tag, ...invoice }) => invoice);

// -----------------------------------------------------------------------------
// Invoice items
// -----------------------------------------------------------------------------

export const InvoiceItemSchema: WireSchema<InvoiceItem> = z
  .object({
    object: z.literal('invoiceitem'),
    id: z.string(),
    livemode: z.boolean(),
    amount: SignedAmountSchema,
    currency: CurrencySchema,
    customer: z.string(),
    date: TimestampSchema,
    discountable: z.boolean(),
    proration: z.boolean(),
    period: PeriodSchema,
    description: maybe(z.string()),
    invoice: maybe(z.string()),
    plan: maybe(PlanSchema),
    quantity: maybe(PosIntSchema),
    subscription: maybe(z.string()),
    metadata: DefaultedMetadataSchema,
  })
  .transform(({ object: _tag, ...item }) => item);

// -----------------------------------------------------------------------------
// Encoding
// -----------------------------------------------------------------------------

export function periodToWire(period: Period): JsonObject {
  return { start: period.start, end: period.end };
}

export function invoiceLineItemToWire(line: InvoiceLineItem): JsonObject {
  return compact({
    object: 'line_item',
    ...line,
    period: periodToWire(line.period),
    plan: optionalToWire(line.plan, planToWire),
    metadata: metadataToWire(line.metadata),
  });
}

export function invoiceToWire(invoice: Invoice): JsonObject {
  return compact({
    object: 'invoice',
    ...invoice,
    lines: listToWire(invoice.lines, invoiceLineItemToWire),
    discount: optionalToWire(invoice.discount, discountToWire),
    metadata: metadataToWire(invoice.metadata),
  });
}

export function invoiceItemToWire(item: InvoiceItem): JsonObject {
  return compact({
    object: 'invoiceitem',
    ...item,
    period: periodToWire(item.period),
    plan: optionalToWire(item.plan, planToWire),
    metadata: metadataToWire(item.metadata),
  });
}
