/**
 * @tillwire/schema
 *
 * Validated data model for a payments API: decode raw JSON into immutable
 * entities (or a structured DecodeError), encode entities back into wire
 * JSON.
 */

// Error model
export {
  DECODE_ERROR_CODES,
  EncodeError,
  isEncodeError,
  classifyIssue,
  formatPath,
  mapResult,
} from './errors.js';
export type { DecodeError, DecodeErrorCode, DecodeIssue, DecodeResult, WireSchema } from './errors.js';

// Codec facade
export { createCodec, isErrorBody } from './codec.js';
export type { CodecDefinition, DecodeOptions, EncodeOptions, EntityCodec, ToWire } from './codec.js';

// JSON
export { JsonValueSchema, JsonObjectSchema } from './json.js';
export type { JsonValue, JsonObject, JsonArray, JsonPrimitive } from './json.js';

// Validated scalars
export {
  METADATA_LIMITS,
  PosIntSchema,
  NonnegIntSchema,
  MetadataSchema,
  decodePosInt,
  decodeNonnegInt,
  decodeMetadata,
  encodeMetadata,
  inWireOrder,
  posInt,
  nonnegInt,
  metadata,
  metadataGet,
} from './scalars.js';
export type { PosInt, NonnegInt, Timestamp, Metadata, MetadataEntry } from './scalars.js';

// Closed enumerations
export {
  CHARGE_STATUSES,
  REFUND_REASONS,
  SUBSCRIPTION_STATUSES,
  LINE_ITEM_TYPES,
  COUPON_DURATIONS,
  PLAN_INTERVALS,
  API_ERROR_TYPES,
  ChargeStatusSchema,
  RefundReasonSchema,
  SubscriptionStatusSchema,
  LineItemTypeSchema,
  CouponDurationSchema,
  PlanIntervalSchema,
  ApiErrorTypeSchema,
  decodeChargeStatus,
  decodeRefundReason,
  decodeSubscriptionStatus,
  decodeLineItemType,
} from './enums.js';
export type {
  ChargeStatus,
  RefundReason,
  SubscriptionStatus,
  LineItemType,
  CouponDuration,
  PlanInterval,
  ApiErrorType,
} from './enums.js';

// Expandable references
export { idReference, embeddedReference, isEmbedded, referenceId, expandable } from './reference.js';
export type { Reference } from './reference.js';

// Generic containers
export { paginatedList } from './list.js';
export { eventSchema, probeEventType } from './event.js';
export type { EventProbe } from './event.js';

// Entity schemas
export { PlanSchema } from './plan.js';
export { CouponSchema, DiscountSchema } from './coupon.js';
export { SubscriptionSchema } from './subscription.js';
export { CardSchema, CustomerSchema, ShallowCardSchema, ShallowCustomerSchema } from './customer.js';
export { ChargeSchema, RefundSchema } from './charge.js';
export { InvoiceSchema, InvoiceLineItemSchema, InvoiceItemSchema, PeriodSchema } from './invoice.js';
export { ErrorResponseSchema, DeletedObjectSchema } from './responses.js';

// Entity codecs and entry points
export * from './codecs.js';

// Entity types
export type * from './types.js';
