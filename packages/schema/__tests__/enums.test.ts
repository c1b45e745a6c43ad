/**
 * Closed enumeration tests
 */

import { describe, it, expect } from 'vitest';
import {
  DECODE_ERROR_CODES,
  SUBSCRIPTION_STATUSES,
  decodeChargeStatus,
  decodeLineItemType,
  decodeRefundReason,
  decodeSubscription,
  decodeSubscriptionStatus,
} from '../src/index.js';
import { failure, subscriptionWire, unwrap } from './fixtures.js';

describe('SubscriptionStatus', () => {
  it('decodes every documented status', () => {
    for (const status of SUBSCRIPTION_STATUSES) {
      expect(unwrap(decodeSubscriptionStatus(status))).toBe(status);
    }
  });

  it('rejects an unknown tag', () => {
    const error = failure(decodeSubscriptionStatus('frozen'));
    expect(error.code).toBe(DECODE_ERROR_CODES.E_UNKNOWN_ENUM_TAG);
    expect(error.path).toBe('status');
    expect(error.message).toBe(
      'Unknown tag "frozen", expected one of "trialing", "active", "past_due", "canceled", "unpaid"'
    );
  });

  it('rejects a non-string as a type mismatch', () => {
    expect(failure(decodeSubscriptionStatus(3)).code).toBe(DECODE_ERROR_CODES.E_TYPE_MISMATCH);
  });

  it('reports an unknown status inside a subscription with its field path', () => {
    const error = failure(decodeSubscription(subscriptionWire({ status: 'frozen' })));
    expect(error.code).toBe(DECODE_ERROR_CODES.E_UNKNOWN_ENUM_TAG);
    expect(error.path).toBe('subscription.status');
  });

  it('is case sensitive', () => {
    expect(failure(decodeSubscriptionStatus('Active')).code).toBe(
      DECODE_ERROR_CODES.E_UNKNOWN_ENUM_TAG
    );
  });
});

describe('ChargeStatus', () => {
  it('decodes succeeded and failed', () => {
    expect(unwrap(decodeChargeStatus('succeeded'))).toBe('succeeded');
    expect(unwrap(decodeChargeStatus('failed'))).toBe('failed');
  });

  it('rejects pending', () => {
    expect(failure(decodeChargeStatus('pending')).code).toBe(DECODE_ERROR_CODES.E_UNKNOWN_ENUM_TAG);
  });
});

describe('RefundReason', () => {
  it('decodes requested_by_customer', () => {
    expect(unwrap(decodeRefundReason('requested_by_customer'))).toBe('requested_by_customer');
  });

  it('reports the path as reason', () => {
    expect(failure(decodeRefundReason('changed_mind')).path).toBe('reason');
  });
});

describe('LineItemType', () => {
  it('decodes invoiceitem and subscription', () => {
    expect(unwrap(decodeLineItemType('invoiceitem'))).toBe('invoiceitem');
    expect(unwrap(decodeLineItemType('subscription'))).toBe('subscription');
  });

  it('rejects other tags', () => {
    expect(failure(decodeLineItemType('line_item')).code).toBe(DECODE_ERROR_CODES.E_UNKNOWN_ENUM_TAG);
  });
});
