import type { LevelWithSilent } from 'pino';
import { createLogger } from '../src/logger.js';

/**
 * Logger writing into an array instead of stderr
 */
export function captureLogger(level: LevelWithSilent = 'debug') {
  const lines: string[] = [];
  const logger = createLogger(level, {
    write(msg: string) {
      lines.push(msg);
    },
  });
  return { logger, records: () => lines.map((line): unknown => JSON.parse(line)) };
}

export const plan = {
  object: 'plan',
  id: 'gold',
  livemode: false,
  amount: 2000,
  created: 1400000000,
  currency: 'usd',
  interval: 'month',
  interval_count: 1,
  name: 'Gold Special',
  metadata: {},
};

export const card = {
  object: 'card',
  id: 'card_1',
  brand: 'Visa',
  last4: '4242',
  exp_month: 8,
  exp_year: 2030,
  fingerprint: 'fp_test',
  funding: 'credit',
  customer: 'cus_1',
  metadata: {},
};

export const customer = {
  object: 'customer',
  id: 'cus_1',
  livemode: false,
  created: 1400000000,
  balance: 0,
  default_source: card,
  delinquent: false,
  metadata: {},
};

export function event(type: string, object: unknown) {
  return {
    object: 'event',
    id: 'evt_1',
    created: 1400000000,
    livemode: false,
    type,
    data: { object },
    pending_webhooks: 0,
  };
}
