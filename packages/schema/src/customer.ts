/**
 * Customers and cards
 *
 * The two entities reference each other through expandable fields: a
 * customer's default source may be a card identifier or the embedded card,
 * and a card's owner may be a customer identifier or the embedded customer.
 * An embedded object is always shallow in its back-reference (an embedded
 * card names its customer by identifier only), so the graph stops after
 * one level.
 *
 * Card<CustomerId> and Customer<CardId> are the shallow forms, used when
 * embedded; Card and Customer are the expandable forms returned by the
 * public decoders. Strict variants sit beside the forms they refine.
 */

import { z } from 'zod';
import { DiscountSchema, StrictDiscountSchema, discountToWire } from './coupon.js';
import type { WireSchema } from './errors.js';
import type { JsonObject, JsonValue } from './json.js';
import { listToWire, paginatedList } from './list.js';
import { expandable, referenceToWire } from './reference.js';
import type { EncodeOptions } from './codec.js';
import {
  CurrencySchema,
  DefaultedMetadataSchema,
  PosIntSchema,
  SignedAmountSchema,
  TimestampSchema,
  metadataToWire,
} from './scalars.js';
import { StrictSubscriptionSchema, SubscriptionSchema, subscriptionToWire } from './subscription.js';
import type { Card, CardId, Customer, CustomerId, Discount, Subscription } from './types.js';
import { compact, isPresent, maybe, optionalToWire } from './wire.js';

// -----------------------------------------------------------------------------
// Cards
// -----------------------------------------------------------------------------

const cardFields = {
  object: z.literal('card'),
  id: z.string(),
  brand: z.string(),
  last4: z.string(),
  exp_month: PosIntSchema,
  exp_year: PosIntSchema,
  fingerprint: z.string(),
  funding: z.string(),
  country: maybe(z.string()),
  name: maybe(z.string()),
  address_line1: maybe(z.string()),
  address_line2: maybe(z.string()),
  address_city: maybe(z.string()),
  address_state: maybe(z.string()),
  address_zip: maybe(z.string()),
  address_country: maybe(z.string()),
  cvc_check: maybe(z.string()),
  address_line1_check: maybe(z.string()),
  address_zip_check: maybe(z.string()),
  metadata: DefaultedMetadataSchema,
};

/**
 * Card whose owner is a customer identifier
 */
export const ShallowCardSchema: WireSchema<Card<CustomerId>> = z
  .object({ ...cardFields, customer: z.string().nullable() })
  .transform(({ object: _tag, ...card }) => card);

// -----------------------------------------------------------------------------
// Customers
// -----------------------------------------------------------------------------

const CardListSchema = paginatedList(ShallowCardSchema);

function customerFields(discount: WireSchema<Discount>, subscription: WireSchema<Subscription>) {
  return {
    object: z.literal('customer'),
    id: z.string(),
    livemode: z.boolean(),
    created: TimestampSchema,
    /** Credit (negative) or amount owed (positive) carried to the next invoice */
    balance: SignedAmountSchema,
    currency: maybe(CurrencySchema),
    delinquent: z.boolean().default(false),
    description: maybe(z.string()),
    email: maybe(z.string()),
    discount: maybe(discount),
    sources: CardListSchema.optional(),
    cards: CardListSchema.optional(),
    subscriptions: paginatedList(subscription).optional(),
    metadata: DefaultedMetadataSchema,
  };
}

const laxFields = customerFields(DiscountSchema, SubscriptionSchema);
const strictFields = customerFields(StrictDiscountSchema, StrictSubscriptionSchema);

function rejectSourcesWithCards(
  customer: { readonly sources?: unknown; readonly cards?: unknown },
  ctx: z.RefinementCtx
): void {
  if (isPresent(customer.sources) && isPresent(customer.cards)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'sources and cards are mutually exclusive',
      path: ['cards'],
    });
  }
}

/**
 * Customer whose default card is an identifier
 */
export const ShallowCustomerSchema: WireSchema<Customer<CardId>> = z
  .object({
    ...laxFields,
    default_source: maybe(z.string()),
    default_card: maybe(z.string()),
  })
  .transform(({ object: _tag, ...customer }) => customer);

const StrictShallowCustomerSchema: WireSchema<Customer<CardId>> = z
  .object({
    ...strictFields,
    default_source: maybe(z.string()),
    default_card: maybe(z.string()),
  })
  .transform(({ object: _tag, ...customer }) => customer)
  .superRefine(rejectSourcesWithCards);

const CardReferenceSchema = expandable(ShallowCardSchema);

/**
 * Customer whose default card may be embedded
 */
export const CustomerSchema: WireSchema<Customer> = z
  .object({
    ...laxFields,
    default_source: maybe(CardReferenceSchema),
    default_card: maybe(CardReferenceSchema),
  })
  .transform(({ object: _tag, ...customer }) => customer);

/**
 * Customer that also rejects `sources` together with `cards`, and decodes
 * nested coupons and subscriptions strictly
 */
export const StrictCustomerSchema: WireSchema<Customer> = z
  .object({
    ...strictFields,
    default_source: maybe(CardReferenceSchema),
    default_card: maybe(CardReferenceSchema),
  })
  .transform(({ object: _tag, ...customer }) => customer)
  .superRefine(rejectSourcesWithCards);

/**
 * Card whose owner may be embedded
 */
export const CardSchema: WireSchema<Card> = z
  .object({ ...cardFields, customer: expandable(ShallowCustomerSchema).nullable() })
  .transform(({ object: _tag, ...card }) => card);

/**
 * Card whose embedded owner is decoded strictly
 */
export const StrictCardSchema: WireSchema<Card> = z
  .object({ ...cardFields, customer: expandable(StrictShallowCustomerSchema).nullable() })
  .transform(({ object: _tag, ...card }) => card);

// -----------------------------------------------------------------------------
// Encoding
// -----------------------------------------------------------------------------

function cardToWire<U>(card: Card<U>, ownerToWire: (owner: U) => JsonValue): JsonObject {
  return compact({
    object: 'card',
    ...card,
    customer: card.customer === null ? null : ownerToWire(card.customer),
    metadata: metadataToWire(card.metadata),
  });
}

function customerToWire<C extends {}>(customer: Customer<C>, sourceToWire: (source: C) => JsonValue): JsonObject {
  const cardsToWire = (list: NonNullable<Customer<C>['sources']>) => listToWire(list, shallowCardToWire);
  return compact({
    object: 'customer',
    ...customer,
    default_source: optionalToWire(customer.default_source, sourceToWire),
    default_card: optionalToWire(customer.default_card, sourceToWire),
    discount: optionalToWire(customer.discount, discountToWire),
    sources: optionalToWire(customer.sources, cardsToWire),
    cards: optionalToWire(customer.cards, cardsToWire),
    subscriptions: optionalToWire(customer.subscriptions, (list) =>
      listToWire(list, subscriptionToWire)
    ),
    metadata: metadataToWire(customer.metadata),
  });
}

export function shallowCardToWire(card: Card<CustomerId>): JsonObject {
  return cardToWire(card, (id) => id);
}

export function shallowCustomerToWire(customer: Customer<CardId>): JsonObject {
  return customerToWire(customer, (id) => id);
}

export function cardToWireExpandable(card: Card, options: EncodeOptions): JsonObject {
  return cardToWire(card, (owner) => referenceToWire(owner, shallowCustomerToWire, options));
}

export function customerToWireExpandable(customer: Customer, options: EncodeOptions): JsonObject {
  return customerToWire(customer, (source) => referenceToWire(source, shallowCardToWire, options));
}
