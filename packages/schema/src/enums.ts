/**
 * Closed enumerations
 *
 * Each enum is a fixed set of wire tags. An unrecognised tag is a hard
 * decode failure (E_UNKNOWN_ENUM_TAG). Fields the API extends over time,
 * such as an event's `type`, are plain strings and do not live here.
 */

import { z } from 'zod';
import { decodeWith, type DecodeResult } from './errors.js';

// -----------------------------------------------------------------------------
// Charge status
// -----------------------------------------------------------------------------

export const CHARGE_STATUSES = ['succeeded', 'failed'] as const;
export const ChargeStatusSchema = z.enum(CHARGE_STATUSES);
export type ChargeStatus = z.infer<typeof ChargeStatusSchema>;

// -----------------------------------------------------------------------------
// Refund reason
// -----------------------------------------------------------------------------

export const REFUND_REASONS = ['duplicate', 'fraudulent', 'requested_by_customer'] as const;
export const RefundReasonSchema = z.enum(REFUND_REASONS);
export type RefundReason = z.infer<typeof RefundReasonSchema>;

// -----------------------------------------------------------------------------
// Subscription status
// -----------------------------------------------------------------------------

/**
 * - 'trialing': inside the plan's trial period
 * - 'active': paid up
 * - 'past_due': latest invoice payment failed, retries pending
 * - 'canceled': ended, either explicitly or after retries ran out
 * - 'unpaid': retries ran out, subscription left open
 */
export const SUBSCRIPTION_STATUSES = [
  'trialing',
  'active',
  'past_due',
  'canceled',
  'unpaid',
] as const;
export const SubscriptionStatusSchema = z.enum(SUBSCRIPTION_STATUSES);
export type SubscriptionStatus = z.infer<typeof SubscriptionStatusSchema>;

// -----------------------------------------------------------------------------
// Invoice line item source
// -----------------------------------------------------------------------------

/**
 * Where an invoice line came from: a one-off invoice item or a
 * subscription's recurring charge.
 */
export const LINE_ITEM_TYPES = ['invoiceitem', 'subscription'] as const;
export const LineItemTypeSchema = z.enum(LINE_ITEM_TYPES);
export type LineItemType = z.infer<typeof LineItemTypeSchema>;

// -----------------------------------------------------------------------------
// Coupon duration, plan interval
// -----------------------------------------------------------------------------

export const COUPON_DURATIONS = ['forever', 'once', 'repeating'] as const;
export const CouponDurationSchema = z.enum(COUPON_DURATIONS);
export type CouponDuration = z.infer<typeof CouponDurationSchema>;

export const PLAN_INTERVALS = ['day', 'week', 'month', 'year'] as const;
export const PlanIntervalSchema = z.enum(PLAN_INTERVALS);
export type PlanInterval = z.infer<typeof PlanIntervalSchema>;

// -----------------------------------------------------------------------------
// API error type
// -----------------------------------------------------------------------------

export const API_ERROR_TYPES = [
  'api_connection_error',
  'api_error',
  'authentication_error',
  'card_error',
  'invalid_request_error',
  'rate_limit_error',
] as const;
export const ApiErrorTypeSchema = z.enum(API_ERROR_TYPES);
export type ApiErrorType = z.infer<typeof ApiErrorTypeSchema>;

// -----------------------------------------------------------------------------
// Standalone decoders
// -----------------------------------------------------------------------------

export function decodeChargeStatus(input: unknown): DecodeResult<ChargeStatus> {
  return decodeWith('status', ChargeStatusSchema, input);
}

export function decodeRefundReason(input: unknown): DecodeResult<RefundReason> {
  return decodeWith('reason', RefundReasonSchema, input);
}

export function decodeSubscriptionStatus(input: unknown): DecodeResult<SubscriptionStatus> {
  return decodeWith('status', SubscriptionStatusSchema, input);
}

export function decodeLineItemType(input: unknown): DecodeResult<LineItemType> {
  return decodeWith('type', LineItemTypeSchema, input);
}
