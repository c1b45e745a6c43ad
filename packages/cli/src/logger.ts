/**
 * Structured logging
 *
 * JSON lines on stderr so stdout carries only command output.
 */

import pino, { type DestinationStream, type LevelWithSilent, type Logger } from 'pino';

export type { Logger };

export function createLogger(
  level: LevelWithSilent,
  destination: DestinationStream = pino.destination(2)
): Logger {
  return pino({ name: 'tillwire', level }, destination);
}
