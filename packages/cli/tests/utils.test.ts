import { describe, it, expect, beforeAll } from 'vitest';
import chalk from 'chalk';
import { EncodeError } from '@tillwire/schema';
import { ConfigError, InputError } from '../src/errors.js';
import { EXIT_CODES, type CommandResult } from '../src/types.js';
import { formatOutput, handleError, parseJson, readInput, resolveCodec } from '../src/utils.js';

beforeAll(() => {
  chalk.level = 0;
});

describe('formatOutput', () => {
  const failed: CommandResult = {
    success: false,
    error: 'E_MISSING_FIELD at plan.amount: Missing required field',
    exitCode: EXIT_CODES.DECODE_FAILED,
    issues: [{ code: 'E_MISSING_FIELD', path: 'plan.amount', message: 'Missing required field' }],
  };

  it('prints a failure with its issues', () => {
    expect(formatOutput(failed)).toBe(
      'Error: E_MISSING_FIELD at plan.amount: Missing required field\n' +
        '  E_MISSING_FIELD plan.amount: Missing required field'
    );
  });

  it('prints the whole result as JSON with --json', () => {
    expect(JSON.parse(formatOutput(failed, true))).toEqual(failed);
  });

  it('prints a probed event', () => {
    const result: CommandResult = {
      success: true,
      data: { kind: 'event', id: 'evt_1', type: 'plan.created', payload: 'plan' },
    };
    expect(formatOutput(result)).toBe('Event: evt_1\nType: plan.created\nPayload: plan');
  });

  it('prints encoded wire JSON undecorated', () => {
    const result: CommandResult = {
      success: true,
      data: { kind: 'encoded', entity: 'deleted', wire: { id: 'cus_1', deleted: true } },
    };
    expect(formatOutput(result)).toBe('{\n  "id": "cus_1",\n  "deleted": true\n}');
  });

  it('prints a decoded value under a heading', () => {
    const result: CommandResult = {
      success: true,
      data: { kind: 'decoded', entity: 'period', value: { start: 1, end: 2 } },
    };
    expect(formatOutput(result)).toBe('Decoded period\n{\n  "start": 1,\n  "end": 2\n}');
  });

  it('prints entity names one per line', () => {
    const result: CommandResult = { success: true, data: { kind: 'entities', names: ['plan', 'coupon'] } };
    expect(formatOutput(result)).toBe('plan\ncoupon');
  });
});

describe('handleError', () => {
  it('maps input and configuration errors to exit code 2', () => {
    expect(handleError(new InputError('bad'))).toEqual({
      success: false,
      error: 'bad',
      exitCode: EXIT_CODES.BAD_INPUT,
    });
    expect(handleError(new ConfigError(['LOG_LEVEL'], ['LOG_LEVEL: bad']))).toMatchObject({
      exitCode: EXIT_CODES.BAD_INPUT,
    });
  });

  it('maps an EncodeError to exit code 1', () => {
    const issue = { code: 'E_VALIDATION_FAILED' as const, path: 'plan.metadata', message: 'Too many' };
    expect(handleError(new EncodeError({ ...issue, issues: [issue] }))).toEqual({
      success: false,
      error: 'E_VALIDATION_FAILED at plan.metadata: Too many',
      exitCode: EXIT_CODES.DECODE_FAILED,
      issues: [issue],
    });
  });

  it('rethrows anything else', () => {
    expect(() => handleError(new TypeError('boom'))).toThrow('boom');
  });
});

describe('input helpers', () => {
  it('parses JSON', () => {
    expect(parseJson('{"a":1}')).toEqual({ a: 1 });
    expect(() => parseJson('nope')).toThrow(InputError);
  });

  it('resolves codecs by name', () => {
    expect(resolveCodec('charge').name).toBe('charge');
    expect(() => resolveCodec('dispute')).toThrow('Unknown entity "dispute"');
  });

  it('reports an unreadable file as InputError', async () => {
    await expect(readInput('/nonexistent/tillwire-input.json')).rejects.toThrow(
      'Cannot read /nonexistent/tillwire-input.json'
    );
    await expect(readInput('/nonexistent/tillwire-input.json')).rejects.toBeInstanceOf(InputError);
  });
});
