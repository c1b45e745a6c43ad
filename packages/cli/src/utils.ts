/**
 * CLI utilities and formatting
 */

import chalk from 'chalk';
import { readFile } from 'node:fs/promises';
import { EncodeError, findCodec, type DecodeError, type EntityCodec } from '@tillwire/schema';
import { ConfigError, InputError } from './errors.js';
import { EXIT_CODES, type CommandData, type CommandResult, type ExitCode } from './types.js';

export function formatOutput(result: CommandResult, json = false): string {
  if (json) {
    return JSON.stringify(result, null, 2);
  }

  if (!result.success) {
    const lines = [chalk.red(`Error: ${result.error}`)];
    for (const issue of result.issues ?? []) {
      lines.push(`  ${chalk.yellow(issue.code)} ${issue.path}: ${issue.message}`);
    }
    return lines.join('\n');
  }

  return formatData(result.data);
}

function formatData(data: CommandData): string {
  switch (data.kind) {
    case 'decoded':
      return [`${chalk.green('Decoded')} ${chalk.bold(data.entity)}`, JSON.stringify(data.value, null, 2)].join(
        '\n'
      );
    case 'encoded':
      // Plain wire JSON so the output can be piped
      return JSON.stringify(data.wire, null, 2);
    case 'event':
      return [`Event: ${data.id}`, `Type: ${chalk.blue(data.type)}`, `Payload: ${data.payload}`].join('\n');
    case 'entities':
      return data.names.join('\n');
  }
}

export function exitCodeOf(result: CommandResult): ExitCode {
  return result.success ? EXIT_CODES.OK : result.exitCode;
}

export function createExitHandler() {
  return (code: number) => {
    process.exit(code);
  };
}

export function decodeFailure(error: DecodeError): CommandResult {
  return {
    success: false,
    error: `${error.code} at ${error.path}: ${error.message}`,
    exitCode: EXIT_CODES.DECODE_FAILED,
    issues: error.issues,
  };
}

/**
 * Turn an expected error into a failed result; anything else propagates.
 */
export function handleError(error: unknown): CommandResult {
  if (error instanceof EncodeError) {
    return decodeFailure(error.error);
  }
  if (error instanceof InputError || error instanceof ConfigError) {
    return { success: false, error: error.message, exitCode: EXIT_CODES.BAD_INPUT };
  }
  throw error;
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * @throws InputError on malformed JSON
 */
export function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new InputError(`Invalid JSON: ${messageOf(error)}`);
  }
}

/**
 * @throws InputError for an entity name the registry does not know
 */
export function resolveCodec(name: string): EntityCodec<unknown> {
  const codec = findCodec(name);
  if (codec === undefined) {
    throw new InputError(`Unknown entity "${name}". Run "tillwire entities" for the list.`);
  }
  return codec;
}

/**
 * Read command input from a file, or from stdin when no file (or `-`) is given.
 */
export async function readInput(file?: string): Promise<string> {
  if (file === undefined || file === '-') {
    const chunks: Buffer[] = [];
    for await (const chunk of process.stdin) {
      chunks.push(Buffer.from(chunk));
    }
    return Buffer.concat(chunks).toString('utf-8');
  }

  try {
    return await readFile(file, 'utf-8');
  } catch (error) {
    throw new InputError(`Cannot read ${file}: ${messageOf(error)}`);
  }
}
