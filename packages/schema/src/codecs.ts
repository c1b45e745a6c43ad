/**
 * Per-entity decode/encode entry points
 */

import { ChargeSchema, RefundSchema, chargeToWire, refundToWire } from './charge.js';
import { createCodec, type DecodeOptions, type EncodeOptions, type EntityCodec } from './codec.js';
import {
  CouponSchema,
  DiscountSchema,
  StrictCouponSchema,
  StrictDiscountSchema,
  couponToWire,
  discountToWire,
} from './coupon.js';
import {
  CardSchema,
  CustomerSchema,
  StrictCardSchema,
  StrictCustomerSchema,
  cardToWireExpandable,
  customerToWireExpandable,
} from './customer.js';
import { mapResult, type DecodeResult } from './errors.js';
import { eventSchema, eventToWire, probeEventType } from './event.js';
import {
  InvoiceItemSchema,
  InvoiceLineItemSchema,
  InvoiceSchema,
  PeriodSchema,
  StrictInvoiceLineItemSchema,
  StrictInvoiceSchema,
  invoiceItemToWire,
  invoiceLineItemToWire,
  invoiceToWire,
  periodToWire,
} from './invoice.js';
import { JsonObjectSchema, type JsonObject } from './json.js';
import { listToWire, paginatedList } from './list.js';
import { PlanSchema, planToWire } from './plan.js';
import {
  DeletedObjectSchema,
  ErrorResponseSchema,
  deletedObjectToWire,
  errorResponseToWire,
} from './responses.js';
import { StrictSubscriptionSchema, SubscriptionSchema, subscriptionToWire } from './subscription.js';
import type {
  Card,
  Charge,
  Coupon,
  Customer,
  Discount,
  Event,
  Invoice,
  InvoiceItem,
  PaginatedList,
  Plan,
  Subscription,
} from './types.js';

// -----------------------------------------------------------------------------
// Entity codecs
// -----------------------------------------------------------------------------

export const PeriodCodec = createCodec({ name: 'period', schema: PeriodSchema, toWire: periodToWire });

export const PlanCodec = createCodec({ name: 'plan', schema: PlanSchema, toWire: planToWire });

export const CouponCodec = createCodec({
  name: 'coupon',
  schema: CouponSchema,
  strictSchema: StrictCouponSchema,
  toWire: couponToWire,
});

export const DiscountCodec = createCodec({
  name: 'discount',
  schema: DiscountSchema,
  strictSchema: StrictDiscountSchema,
  toWire: discountToWire,
});

export const SubscriptionCodec = createCodec({
  name: 'subscription',
  schema: SubscriptionSchema,
  strictSchema: StrictSubscriptionSchema,
  toWire: subscriptionToWire,
});

export const CardCodec = createCodec({
  name: 'card',
  schema: CardSchema,
  strictSchema: StrictCardSchema,
  toWire: cardToWireExpandable,
});

export const CustomerCodec = createCodec({
  name: 'customer',
  schema: CustomerSchema,
  strictSchema: StrictCustomerSchema,
  toWire: customerToWireExpandable,
});

export const RefundCodec = createCodec({ name: 'refund', schema: RefundSchema, toWire: refundToWire });

export const ChargeCodec = createCodec({ name: 'charge', schema: ChargeSchema, toWire: chargeToWire });

export const InvoiceLineItemCodec = createCodec({
  name: 'line_item',
  schema: InvoiceLineItemSchema,
  strictSchema: StrictInvoiceLineItemSchema,
  toWire: invoiceLineItemToWire,
});

export const InvoiceCodec = createCodec({
  name: 'invoice',
  schema: InvoiceSchema,
  strictSchema: StrictInvoiceSchema,
  toWire: invoiceToWire,
});

export const InvoiceItemCodec = createCodec({
  name: 'invoiceitem',
  schema: InvoiceItemSchema,
  toWire: invoiceItemToWire,
});

export const DeletedObjectCodec = createCodec({
  name: 'deleted',
  schema: DeletedObjectSchema,
  toWire: deletedObjectToWire,
});

/**
 * Codec for the error body itself; it does not report its own input as
 * an upstream error.
 */
export const ErrorResponseCodec = createCodec({
  name: 'error_response',
  schema: ErrorResponseSchema,
  toWire: errorResponseToWire,
  detectErrorBody: false,
});

// -----------------------------------------------------------------------------
// Generic containers
// -----------------------------------------------------------------------------

/**
 * Codec for one page of `item`s.
 */
export function listCodec<T>(item: EntityCodec<T>): EntityCodec<PaginatedList<T>> {
  return createCodec({
    name: 'list',
    schema: paginatedList(item.schema),
    strictSchema: paginatedList(item.strictSchema),
    toWire: (list, options) => listToWire(list, (element) => item.encode(element, options)),
  });
}

/**
 * Codec for events carrying a `payload`.
 */
export function eventCodec<T>(payload: EntityCodec<T>): EntityCodec<Event<T>> {
  return createCodec({
    name: 'event',
    schema: eventSchema(payload.schema),
    strictSchema: eventSchema(payload.strictSchema),
    toWire: (event, options) => eventToWire(event, (object) => payload.encode(object, options)),
  });
}

/**
 * Event whose payload is any JSON object
 */
export const UntypedEventCodec = createCodec({
  name: 'event',
  schema: eventSchema(JsonObjectSchema),
  toWire: (event: Event<JsonObject>) => eventToWire(event, (object) => object),
});

export function decodeList<T>(
  input: unknown,
  item: EntityCodec<T>,
  options?: DecodeOptions
): DecodeResult<PaginatedList<T>> {
  return listCodec(item).decode(input, options);
}

export function encodeList<T>(
  list: PaginatedList<T>,
  item: EntityCodec<T>,
  options?: EncodeOptions
): JsonObject {
  return listCodec(item).encode(list, options);
}

export function decodeEvent<T>(
  input: unknown,
  payload: EntityCodec<T>,
  options?: DecodeOptions
): DecodeResult<Event<T>> {
  return eventCodec(payload).decode(input, options);
}

export function encodeEvent<T>(
  event: Event<T>,
  payload: EntityCodec<T>,
  options?: EncodeOptions
): JsonObject {
  return eventCodec(payload).encode(event, options);
}

// -----------------------------------------------------------------------------
// Event payload dispatch
// -----------------------------------------------------------------------------

export type EventPayloadName =
  | 'charge'
  | 'card'
  | 'customer'
  | 'subscription'
  | 'discount'
  | 'invoice'
  | 'invoiceitem'
  | 'plan'
  | 'coupon';

/**
 * Event type prefixes, most specific first. A `null` target marks a family
 * whose payload is not modelled here.
 */
export const EVENT_PAYLOAD_ROUTES: ReadonlyArray<readonly [string, EventPayloadName | null]> = [
  ['charge.dispute.', null],
  ['charge.', 'charge'],
  ['customer.source.', 'card'],
  ['customer.card.', 'card'],
  ['customer.subscription.', 'subscription'],
  ['customer.discount.', 'discount'],
  ['customer.', 'customer'],
  ['invoiceitem.', 'invoiceitem'],
  ['invoice.', 'invoice'],
  ['plan.', 'plan'],
  ['coupon.', 'coupon'],
];

/**
 * Payload entity for an event type, or undefined when not modelled.
 */
export function eventPayloadFor(type: string): EventPayloadName | undefined {
  const route = EVENT_PAYLOAD_ROUTES.find(([prefix]) => type.startsWith(prefix));
  return route?.[1] ?? undefined;
}

export type KnownEvent =
  | { readonly payload: 'charge'; readonly event: Event<Charge> }
  | { readonly payload: 'card'; readonly event: Event<Card> }
  | { readonly payload: 'customer'; readonly event: Event<Customer> }
  | { readonly payload: 'subscription'; readonly event: Event<Subscription> }
  | { readonly payload: 'discount'; readonly event: Event<Discount> }
  | { readonly payload: 'invoice'; readonly event: Event<Invoice> }
  | { readonly payload: 'invoiceitem'; readonly event: Event<InvoiceItem> }
  | { readonly payload: 'plan'; readonly event: Event<Plan> }
  | { readonly payload: 'coupon'; readonly event: Event<Coupon> }
  | { readonly payload: 'unknown'; readonly event: Event<JsonObject> };

/**
 * Probe the event type, then decode the payload with the matching codec.
 * Event types without a modelled payload decode with a JSON object payload.
 */
export function decodeKnownEvent(input: unknown, options?: DecodeOptions): DecodeResult<KnownEvent> {
  const probe = probeEventType(input);
  if (!probe.ok) {
    return probe;
  }

  switch (eventPayloadFor(probe.value.type)) {
    case 'charge':
      return mapResult(
        decodeEvent(input, ChargeCodec, options),
        (event): KnownEvent => ({ payload: 'charge', event })
      );
    case 'card':
      return mapResult(
        decodeEvent(input, CardCodec, options),
        (event): KnownEvent => ({ payload: 'card', event })
      );
    case 'customer':
      return mapResult(
        decodeEvent(input, CustomerCodec, options),
        (event): KnownEvent => ({ payload: 'customer', event })
      );
    case 'subscription':
      return mapResult(
        decodeEvent(input, SubscriptionCodec, options),
        (event): KnownEvent => ({ payload: 'subscription', event })
      );
    case 'discount':
      return mapResult(
        decodeEvent(input, DiscountCodec, options),
        (event): KnownEvent => ({ payload: 'discount', event })
      );
    case 'invoice':
      return mapResult(
        decodeEvent(input, InvoiceCodec, options),
        (event): KnownEvent => ({ payload: 'invoice', event })
      );
    case 'invoiceitem':
      return mapResult(
        decodeEvent(input, InvoiceItemCodec, options),
        (event): KnownEvent => ({ payload: 'invoiceitem', event })
      );
    case 'plan':
      return mapResult(
        decodeEvent(input, PlanCodec, options),
        (event): KnownEvent => ({ payload: 'plan', event })
      );
    case 'coupon':
      return mapResult(
        decodeEvent(input, CouponCodec, options),
        (event): KnownEvent => ({ payload: 'coupon', event })
      );
    case undefined:
      return mapResult(
        UntypedEventCodec.decode(input, options),
        (event): KnownEvent => ({ payload: 'unknown', event })
      );
  }
}

// -----------------------------------------------------------------------------
// Registry
// -----------------------------------------------------------------------------

/**
 * Codecs by entity wire name
 */
export const ENTITY_CODECS = {
  period: PeriodCodec,
  plan: PlanCodec,
  coupon: CouponCodec,
  discount: DiscountCodec,
  subscription: SubscriptionCodec,
  card: CardCodec,
  customer: CustomerCodec,
  refund: RefundCodec,
  charge: ChargeCodec,
  line_item: InvoiceLineItemCodec,
  invoice: InvoiceCodec,
  invoiceitem: InvoiceItemCodec,
  deleted: DeletedObjectCodec,
  error_response: ErrorResponseCodec,
  event: UntypedEventCodec,
} as const;

export type EntityName = keyof typeof ENTITY_CODECS;

const codecsByName: ReadonlyMap<string, EntityCodec<unknown>> = new Map<string, EntityCodec<unknown>>(
  Object.entries(ENTITY_CODECS)
);

/**
 * Look up a codec by entity wire name.
 */
export function findCodec(name: string): EntityCodec<unknown> | undefined {
  return codecsByName.get(name);
}

// -----------------------------------------------------------------------------
// Function entry points
// -----------------------------------------------------------------------------

export const decodePeriod = PeriodCodec.decode;
export const encodePeriod = PeriodCodec.encode;
export const decodePlan = PlanCodec.decode;
export const encodePlan = PlanCodec.encode;
export const decodeCoupon = CouponCodec.decode;
export const encodeCoupon = CouponCodec.encode;
export const decodeDiscount = DiscountCodec.decode;
export const encodeDiscount = DiscountCodec.encode;
export const decodeSubscription = SubscriptionCodec.decode;
export const encodeSubscription = SubscriptionCodec.encode;
export const decodeCard = CardCodec.decode;
export const encodeCard = CardCodec.encode;
export const decodeCustomer = CustomerCodec.decode;
export const encodeCustomer = CustomerCodec.encode;
export const decodeRefund = RefundCodec.decode;
export const encodeRefund = RefundCodec.encode;
export const decodeCharge = ChargeCodec.decode;
export const encodeCharge = ChargeCodec.encode;
export const decodeInvoiceLineItem = InvoiceLineItemCodec.decode;
export const encodeInvoiceLineItem = InvoiceLineItemCodec.encode;
export const decodeInvoice = InvoiceCodec.decode;
export const encodeInvoice = InvoiceCodec.encode;
export const decodeInvoiceItem = InvoiceItemCodec.decode;
export const encodeInvoiceItem = InvoiceItemCodec.encode;
export const decodeDeletedObject = DeletedObjectCodec.decode;
export const encodeDeletedObject = DeletedObjectCodec.encode;
export const decodeErrorResponse = ErrorResponseCodec.decode;
export const encodeErrorResponse = ErrorResponseCodec.encode;
