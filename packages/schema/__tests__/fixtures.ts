/**
 * Wire fixtures
 *
 * Each builder returns a complete wire object holding only fields the
 * schemas know, so `encode(decode(wire))` must reproduce it exactly.
 */

import type { DecodeError, DecodeResult } from '../src/errors.js';
import type { JsonObject, JsonValue } from '../src/json.js';

export const CREATED = 1400000000;
export const PERIOD_END = 1402592000;

export function without(wire: JsonObject, ...keys: string[]): JsonObject {
  const out: JsonObject = { ...wire };
  for (const key of keys) {
    delete out[key];
  }
  return out;
}

export function listWire(data: JsonValue[], url: string): JsonObject {
  return { object: 'list', data, has_more: false, url, total_count: data.length };
}

export function planWire(overrides: JsonObject = {}): JsonObject {
  return {
    object: 'plan',
    id: 'gold',
    livemode: false,
    amount: 2000,
    created: CREATED,
    currency: 'usd',
    interval: 'month',
    interval_count: 1,
    name: 'Gold Special',
    trial_period_days: null,
    statement_descriptor: null,
    metadata: {},
    ...overrides,
  };
}

export function couponWire(overrides: JsonObject = {}): JsonObject {
  return {
    object: 'coupon',
    id: '25OFF',
    livemode: false,
    created: CREATED,
    duration: 'repeating',
    amount_off: null,
    percent_off: 25,
    currency: null,
    duration_in_months: 3,
    max_redemptions: null,
    redeem_by: null,
    times_redeemed: 0,
    valid: true,
    metadata: {},
    ...overrides,
  };
}

export function discountWire(overrides: JsonObject = {}): JsonObject {
  return {
    object: 'discount',
    coupon: couponWire(),
    customer: 'cus_TEST1',
    start: CREATED,
    end: 1407776000,
    subscription: null,
    ...overrides,
  };
}

export function subscriptionWire(overrides: JsonObject = {}): JsonObject {
  return {
    object: 'subscription',
    id: 'sub_TEST1',
    plan: planWire(),
    customer: 'cus_TEST1',
    status: 'active',
    start: CREATED,
    cancel_at_period_end: false,
    current_period_start: CREATED,
    current_period_end: PERIOD_END,
    quantity: 1,
    ended_at: null,
    trial_start: null,
    trial_end: null,
    canceled_at: null,
    application_fee_percent: null,
    tax_percent: null,
    discount: null,
    metadata: {},
    ...overrides,
  };
}

export function cardWire(overrides: JsonObject = {}): JsonObject {
  return {
    object: 'card',
    id: 'card_ABC123',
    brand: 'Visa',
    last4: '4242',
    exp_month: 8,
    exp_year: 2030,
    fingerprint: 'fp_test',
    funding: 'credit',
    customer: 'cus_TEST1',
    country: 'US',
    cvc_check: 'pass',
    metadata: {},
    ...overrides,
  };
}

export function customerWire(overrides: JsonObject = {}): JsonObject {
  return {
    object: 'customer',
    id: 'cus_TEST1',
    livemode: false,
    created: CREATED,
    balance: 0,
    currency: 'usd',
    default_source: 'card_ABC123',
    delinquent: false,
    description: null,
    email: 'jenny@example.com',
    discount: null,
    sources: listWire([cardWire()], '/v1/customers/cus_TEST1/sources'),
    subscriptions: listWire([subscriptionWire()], '/v1/customers/cus_TEST1/subscriptions'),
    metadata: { order: '6735' },
    ...overrides,
  };
}

export function refundWire(overrides: JsonObject = {}): JsonObject {
  return {
    object: 'refund',
    id: 're_TEST1',
    amount: 500,
    currency: 'usd',
    created: CREATED + 100,
    charge: 'ch_TEST1',
    balance_transaction: 'txn_TEST2',
    reason: 'requested_by_customer',
    receipt_number: null,
    metadata: {},
    ...overrides,
  };
}

export function chargeWire(overrides: JsonObject = {}): JsonObject {
  return {
    object: 'charge',
    id: 'ch_TEST1',
    livemode: false,
    amount: 2000,
    amount_refunded: 500,
    captured: true,
    created: CREATED,
    currency: 'usd',
    paid: true,
    refunded: false,
    refunds: listWire([refundWire()], '/v1/charges/ch_TEST1/refunds'),
    source: cardWire(),
    status: 'succeeded',
    balance_transaction: 'txn_TEST1',
    customer: 'cus_TEST1',
    description: null,
    failure_code: null,
    failure_message: null,
    invoice: null,
    receipt_email: null,
    receipt_number: null,
    statement_descriptor: null,
    metadata: {},
    ...overrides,
  };
}

export function lineItemWire(overrides: JsonObject = {}): JsonObject {
  return {
    object: 'line_item',
    id: 'sub_TEST1',
    livemode: false,
    amount: 2000,
    currency: 'usd',
    discountable: true,
    proration: false,
    period: { start: CREATED, end: PERIOD_END },
    type: 'subscription',
    quantity: 1,
    plan: planWire(),
    description: null,
    metadata: {},
    ...overrides,
  };
}

export function invoiceWire(overrides: JsonObject = {}): JsonObject {
  return {
    object: 'invoice',
    id: 'in_TEST1',
    livemode: false,
    amount_due: 2000,
    attempt_count: 1,
    attempted: true,
    closed: true,
    currency: 'usd',
    customer: 'cus_TEST1',
    date: CREATED,
    forgiven: false,
    lines: listWire([lineItemWire()], '/v1/invoices/in_TEST1/lines'),
    paid: true,
    period_start: CREATED,
    period_end: CREATED,
    starting_balance: 0,
    subtotal: 2000,
    total: 2000,
    application_fee: null,
    charge: 'ch_TEST1',
    description: null,
    discount: null,
    ending_balance: 0,
    next_payment_attempt: null,
    receipt_number: null,
    statement_descriptor: null,
    subscription: 'sub_TEST1',
    tax: null,
    tax_percent: null,
    webhooks_delivered_at: CREATED + 100,
    metadata: {},
    ...overrides,
  };
}

export function invoiceItemWire(overrides: JsonObject = {}): JsonObject {
  return {
    object: 'invoiceitem',
    id: 'ii_TEST1',
    livemode: false,
    amount: 1000,
    currency: 'usd',
    customer: 'cus_TEST1',
    date: CREATED,
    discountable: true,
    proration: false,
    period: { start: CREATED, end: CREATED },
    description: 'One-time setup fee',
    invoice: null,
    plan: null,
    quantity: null,
    subscription: null,
    metadata: {},
    ...overrides,
  };
}

export function eventWire(type: string, object: JsonValue, overrides: JsonObject = {}): JsonObject {
  return {
    object: 'event',
    id: 'evt_TEST1',
    created: CREATED + 200,
    livemode: false,
    type,
    data: { object },
    pending_webhooks: 1,
    api_version: '2014-12-22',
    request: 'req_TEST1',
    ...overrides,
  };
}

export function errorBody(overrides: JsonObject = {}): JsonObject {
  return {
    error: {
      type: 'card_error',
      message: 'Your card was declined.',
      code: 'card_declined',
      ...overrides,
    },
  };
}

// -----------------------------------------------------------------------------
// Result helpers
// -----------------------------------------------------------------------------

export function unwrap<T>(result: DecodeResult<T>): T {
  if (!result.ok) {
    throw new Error(`Expected decode to succeed, got ${result.error.code} at ${result.error.path}`);
  }
  return result.value;
}

export function failure<T>(result: DecodeResult<T>): DecodeError {
  if (result.ok) {
    throw new Error('Expected decode to fail');
  }
  return result.error;
}
