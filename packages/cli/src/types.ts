/**
 * Types for the tillwire CLI
 */

import type { DecodeIssue, JsonObject } from '@tillwire/schema';

export const EXIT_CODES = {
  OK: 0,
  /** Input was read but did not decode (or re-encode) */
  DECODE_FAILED: 1,
  /** Unreadable file, invalid JSON, unknown entity, bad configuration */
  BAD_INPUT: 2,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export interface CLIOptions {
  json?: boolean;
  strict?: boolean;
  preserveExpanded?: boolean;
}

export type CommandData =
  | { kind: 'decoded'; entity: string; value: unknown }
  | { kind: 'encoded'; entity: string; wire: JsonObject }
  | { kind: 'event'; id: string; type: string; payload: string }
  | { kind: 'entities'; names: string[] };

export type CommandResult =
  | { success: true; data: CommandData }
  | { success: false; error: string; exitCode: ExitCode; issues?: DecodeIssue[] };
