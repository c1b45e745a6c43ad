/**
 * Entity model
 *
 * Every entity is immutable once decoded. Field names are the API's wire
 * names; the `object` tag each wire object carries is implied by the type
 * and is written back by the encoder.
 *
 * Optional fields distinguish absent (`undefined`, key not sent) from
 * `null` (key sent with no value) wherever the API draws that distinction.
 */

import type {
  ApiErrorType,
  ChargeStatus,
  CouponDuration,
  LineItemType,
  PlanInterval,
  RefundReason,
  SubscriptionStatus,
} from './enums.js';
import type { JsonObject } from './json.js';
import type { Reference } from './reference.js';
import type { Metadata, NonnegInt, PosInt, Timestamp } from './scalars.js';

export type CustomerId = string;
export type CardId = string;
export type ChargeId = string;

/**
 * Expandable card field: identifier, or an embedded card whose own
 * `customer` is an identifier.
 */
export type CardReference = Reference<Card<CustomerId>>;

/**
 * Expandable customer field: identifier, or an embedded customer whose
 * own default source is an identifier.
 */
export type CustomerReference = Reference<Customer<CardId>>;

// -----------------------------------------------------------------------------
// Generic containers
// -----------------------------------------------------------------------------

/**
 * One page of a list endpoint. `data` keeps server order.
 */
export interface PaginatedList<T> {
  readonly data: readonly T[];
  readonly has_more: boolean;
  readonly url: string;
  readonly total_count?: NonnegInt;
}

export interface EventData<T> {
  readonly object: T;
  /** Changed fields and their previous values, on `*.updated` events */
  readonly previous_attributes?: JsonObject;
}

/**
 * Webhook/event envelope. `type` is a free-form string so that event types
 * this library does not model still decode.
 */
export interface Event<T> {
  readonly id: string;
  readonly created: Timestamp;
  /** Not sent on every envelope */
  readonly livemode?: boolean;
  readonly type: string;
  readonly data: EventData<T>;
  readonly pending_webhooks: NonnegInt;
  readonly api_version?: string | null;
  readonly request?: string | null;
}

// -----------------------------------------------------------------------------
// Billing catalogue
// -----------------------------------------------------------------------------

export interface Period {
  readonly start: Timestamp;
  readonly end: Timestamp;
}

export interface Plan {
  readonly id: string;
  readonly livemode: boolean;
  readonly amount: NonnegInt;
  readonly created: Timestamp;
  readonly currency: string;
  readonly interval: PlanInterval;
  readonly interval_count: NonnegInt;
  readonly name: string;
  readonly trial_period_days?: PosInt | null;
  readonly statement_descriptor?: string | null;
  readonly metadata: Metadata;
}

/**
 * At most one of `amount_off` / `percent_off` is set by the API; only
 * strict decoding checks it.
 */
export interface Coupon {
  readonly id: string;
  readonly livemode: boolean;
  readonly created: Timestamp;
  readonly duration: CouponDuration;
  readonly amount_off?: PosInt | null;
  readonly percent_off?: PosInt | null;
  readonly currency?: string | null;
  readonly duration_in_months?: PosInt | null;
  readonly max_redemptions?: PosInt | null;
  readonly redeem_by?: Timestamp | null;
  readonly times_redeemed: NonnegInt;
  readonly valid: boolean;
  readonly metadata: Metadata;
}

export interface Discount {
  readonly coupon: Coupon;
  readonly customer: CustomerId;
  readonly start: Timestamp;
  readonly end?: Timestamp | null;
  readonly subscription?: string | null;
}

export interface Subscription {
  readonly id: string;
  readonly plan: Plan;
  readonly customer: CustomerId;
  readonly status: SubscriptionStatus;
  readonly start: Timestamp;
  readonly cancel_at_period_end: boolean;
  readonly current_period_start: Timestamp;
  readonly current_period_end: Timestamp;
  readonly quantity: PosInt;
  readonly ended_at?: Timestamp | null;
  readonly trial_start?: Timestamp | null;
  readonly trial_end?: Timestamp | null;
  readonly canceled_at?: Timestamp | null;
  readonly application_fee_percent?: number | null;
  readonly tax_percent?: number | null;
  readonly discount?: Discount | null;
  readonly metadata: Metadata;
}

// -----------------------------------------------------------------------------
// Customers and cards
// -----------------------------------------------------------------------------

/**
 * A payment card. `U` is the representation of the owning customer:
 * `CustomerId`, or `CustomerReference` where the API may expand it.
 */
export interface Card<U = CustomerReference> {
  readonly id: CardId;
  readonly brand: string;
  readonly last4: string;
  readonly exp_month: PosInt;
  readonly exp_year: PosInt;
  readonly fingerprint: string;
  readonly funding: string;
  readonly customer: U | null;
  readonly country?: string | null;
  readonly name?: string | null;
  readonly address_line1?: string | null;
  readonly address_line2?: string | null;
  readonly address_city?: string | null;
  readonly address_state?: string | null;
  readonly address_zip?: string | null;
  readonly address_country?: string | null;
  readonly cvc_check?: string | null;
  readonly address_line1_check?: string | null;
  readonly address_zip_check?: string | null;
  readonly metadata: Metadata;
}

/**
 * A customer. `C` is the representation of the default card: `CardId`, or
 * `CardReference` where the API may expand it.
 *
 * `sources` (current API versions) and `cards` (older ones) are never both
 * populated; only strict decoding checks it.
 */
export interface Customer<C = CardReference> {
  readonly id: CustomerId;
  readonly livemode: boolean;
  readonly created: Timestamp;
  readonly balance: number;
  readonly currency?: string | null;
  readonly default_source?: C | null;
  readonly default_card?: C | null;
  readonly delinquent: boolean;
  readonly description?: string | null;
  readonly email?: string | null;
  readonly discount?: Discount | null;
  readonly sources?: PaginatedList<Card<CustomerId>>;
  readonly cards?: PaginatedList<Card<CustomerId>>;
  readonly subscriptions?: PaginatedList<Subscription>;
  readonly metadata: Metadata;
}

// -----------------------------------------------------------------------------
// Charges and refunds
// -----------------------------------------------------------------------------

export interface Refund {
  readonly id: string;
  readonly amount: NonnegInt;
  readonly currency: string;
  readonly created: Timestamp;
  readonly charge: ChargeId;
  readonly balance_transaction?: string | null;
  readonly reason?: RefundReason | null;
  readonly receipt_number?: string | null;
  readonly metadata: Metadata;
}

/**
 * `amount_refunded <= amount` holds on the API side and is not re-checked.
 */
export interface Charge {
  readonly id: ChargeId;
  readonly livemode: boolean;
  readonly amount: NonnegInt;
  readonly amount_refunded: NonnegInt;
  readonly captured: boolean;
  readonly created: Timestamp;
  readonly currency: string;
  readonly paid: boolean;
  readonly refunded: boolean;
  readonly refunds: PaginatedList<Refund>;
  readonly source: Card<CustomerId>;
  readonly status: ChargeStatus;
  readonly balance_transaction?: string | null;
  readonly customer?: CustomerId | null;
  readonly description?: string | null;
  readonly failure_code?: string | null;
  readonly failure_message?: string | null;
  readonly invoice?: string | null;
  readonly receipt_email?: string | null;
  readonly receipt_number?: string | null;
  readonly statement_descriptor?: string | null;
  readonly metadata: Metadata;
}

// -----------------------------------------------------------------------------
// Invoicing
// -----------------------------------------------------------------------------

/**
 * One line of an invoice. `subscription` is set only on lines of type
 * `invoiceitem`; only strict decoding checks it.
 */
export interface InvoiceLineItem {
  readonly id: string;
  readonly livemode: boolean;
  readonly amount: number;
  readonly currency: string;
  readonly discountable: boolean;
  readonly proration: boolean;
  readonly period: Period;
  readonly type: LineItemType;
  readonly quantity?: PosInt | null;
  readonly plan?: Plan | null;
  readonly description?: string | null;
  readonly subscription?: string | null;
  readonly metadata: Metadata;
}

/**
 * `total` is `subtotal` less discounts as computed by the API; it is not
 * recomputed here.
 */
export interface Invoice {
  readonly id: string;
  readonly livemode: boolean;
  readonly amount_due: number;
  readonly attempt_count: NonnegInt;
  readonly attempted: boolean;
  readonly closed: boolean;
  readonly currency: string;
  readonly customer: CustomerId;
  readonly date: Timestamp;
  readonly forgiven: boolean;
  readonly lines: PaginatedList<InvoiceLineItem>;
  readonly paid: boolean;
  readonly period_start: Timestamp;
  readonly period_end: Timestamp;
  readonly starting_balance: number;
  readonly subtotal: number;
  readonly total: number;
  readonly application_fee?: number | null;
  readonly charge?: ChargeId | null;
  readonly description?: string | null;
  readonly discount?: Discount | null;
  readonly ending_balance?: number | null;
  readonly next_payment_attempt?: Timestamp | null;
  readonly receipt_number?: string | null;
  readonly statement_descriptor?: string | null;
  readonly subscription?: string | null;
  readonly tax?: number | null;
  readonly tax_percent?: number | null;
  readonly webhooks_delivered_at?: Timestamp | null;
  readonly metadata: Metadata;
}

export interface InvoiceItem {
  readonly id: string;
  readonly livemode: boolean;
  readonly amount: number;
  readonly currency: string;
  readonly customer: CustomerId;
  readonly date: Timestamp;
  readonly discountable: boolean;
  readonly proration: boolean;
  readonly period: Period;
  readonly description?: string | null;
  readonly invoice?: string | null;
  readonly plan?: Plan | null;
  readonly quantity?: PosInt | null;
  readonly subscription?: string | null;
  readonly metadata: Metadata;
}

// -----------------------------------------------------------------------------
// Responses without an entity
// -----------------------------------------------------------------------------

/**
 * Body of a successful delete call
 */
export interface DeletedObject {
  readonly id: string;
  readonly deleted: true;
}

/**
 * Request-level failure reported by the API
 */
export interface ApiError {
  readonly type: ApiErrorType;
  readonly message: string;
  readonly code?: string;
  readonly param?: string;
  readonly decline_code?: string;
  readonly charge?: string;
}

export interface ErrorResponse {
  readonly error: ApiError;
}
