/**
 * Decode/encode error model
 *
 * Every failed decode yields one structured DecodeError. Zod issues are
 * folded into the taxonomy below, each with a dotted field path rooted at
 * the entity's wire name, e.g. `customer.sources.data[2].exp_year`.
 */

import { z, type ZodError, type ZodIssue } from 'zod';
import type { ApiError } from './types.js';

/**
 * Decode error codes
 */
export const DECODE_ERROR_CODES = {
  /** Required field absent */
  E_MISSING_FIELD: 'E_MISSING_FIELD',
  /** Field present with the wrong wire type (or the wrong `object` tag) */
  E_TYPE_MISMATCH: 'E_TYPE_MISMATCH',
  /** Well-typed value violating a scalar or structural predicate */
  E_VALIDATION_FAILED: 'E_VALIDATION_FAILED',
  /** String tag outside a closed enumeration */
  E_UNKNOWN_ENUM_TAG: 'E_UNKNOWN_ENUM_TAG',
  /** The API answered with an error body instead of the expected object */
  E_UPSTREAM_ERROR: 'E_UPSTREAM_ERROR',
} as const;

export type DecodeErrorCode = (typeof DECODE_ERROR_CODES)[keyof typeof DECODE_ERROR_CODES];

/**
 * A single failing field
 */
export interface DecodeIssue {
  code: DecodeErrorCode;
  /** Rendered field path, e.g. `charge.refunds.data[0].amount` */
  path: string;
  message: string;
}

/**
 * Structured decode failure
 *
 * `code`, `path` and `message` describe the first failing field; `issues`
 * carries all of them in the order they were found.
 */
export interface DecodeError extends DecodeIssue {
  issues: DecodeIssue[];
  /** Set when code is E_UPSTREAM_ERROR */
  upstream?: ApiError;
}

export type DecodeResult<T> = { ok: true; value: T } | { ok: false; error: DecodeError };

/**
 * Schema type taking arbitrary JSON input
 */
export type WireSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

/**
 * Render a zod path below a root name.
 */
export function formatPath(root: string, segments: ReadonlyArray<string | number>): string {
  let out = root;
  for (const segment of segments) {
    if (typeof segment === 'number') {
      out += `[${segment}]`;
    } else {
      out += out.length > 0 ? `.${segment}` : segment;
    }
  }
  return out;
}

/**
 * Map one zod issue onto the decode error taxonomy.
 */
export function classifyIssue(issue: ZodIssue): DecodeErrorCode {
  switch (issue.code) {
    case z.ZodIssueCode.invalid_type:
      return issue.received === z.ZodParsedType.undefined
        ? DECODE_ERROR_CODES.E_MISSING_FIELD
        : DECODE_ERROR_CODES.E_TYPE_MISMATCH;
    case z.ZodIssueCode.invalid_literal:
    case z.ZodIssueCode.invalid_union:
    case z.ZodIssueCode.invalid_union_discriminator:
      return DECODE_ERROR_CODES.E_TYPE_MISMATCH;
    case z.ZodIssueCode.invalid_enum_value:
      return DECODE_ERROR_CODES.E_UNKNOWN_ENUM_TAG;
    default:
      return DECODE_ERROR_CODES.E_VALIDATION_FAILED;
  }
}

function describeIssue(code: DecodeErrorCode, issue: ZodIssue): string {
  if (code === DECODE_ERROR_CODES.E_MISSING_FIELD) {
    return 'Missing required field';
  }
  if (issue.code === z.ZodIssueCode.invalid_enum_value) {
    return `Unknown tag ${JSON.stringify(issue.received)}, expected one of ${issue.options
      .map((o) => JSON.stringify(o))
      .join(', ')}`;
  }
  return issue.message;
}

/**
 * Build a DecodeError from a ZodError.
 */
export function fromZodError(root: string, error: ZodError): DecodeError {
  const issues = error.issues.map((issue): DecodeIssue => {
    const code = classifyIssue(issue);
    return { code, path: formatPath(root, issue.path), message: describeIssue(code, issue) };
  });
  const first = issues[0] ?? {
    code: DECODE_ERROR_CODES.E_VALIDATION_FAILED,
    path: root,
    message: error.message,
  };
  return { ...first, issues };
}

/**
 * Build the DecodeError reported when the payload is an API error body.
 */
export function upstreamError(root: string, upstream: ApiError): DecodeError {
  const issue: DecodeIssue = {
    code: DECODE_ERROR_CODES.E_UPSTREAM_ERROR,
    path: root,
    message: `API returned ${upstream.type}: ${upstream.message}`,
  };
  return { ...issue, issues: [issue], upstream };
}

/**
 * Parse input with a schema, folding failures into a DecodeError.
 */
export function decodeWith<T>(root: string, schema: WireSchema<T>, input: unknown): DecodeResult<T> {
  const result = schema.safeParse(input);
  if (result.success) {
    return { ok: true, value: result.data };
  }
  return { ok: false, error: fromZodError(root, result.error) };
}

/**
 * Parse input with a schema, throwing EncodeError on failure.
 */
export function assertWith<T>(root: string, schema: WireSchema<T>, input: unknown): T {
  const result = decodeWith(root, schema, input);
  if (!result.ok) {
    throw new EncodeError(result.error);
  }
  return result.value;
}

/**
 * Thrown by encoders when an outgoing value fails the same validators
 * the decoder applies.
 */
export class EncodeError extends Error {
  readonly code: DecodeErrorCode;
  readonly path: string;
  readonly error: DecodeError;

  constructor(error: DecodeError) {
    super(`Cannot encode ${error.path}: ${error.message}`);
    this.name = 'EncodeError';
    this.code = error.code;
    this.path = error.path;
    this.error = error;
    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, EncodeError.prototype);
  }
}

/**
 * Type guard for EncodeError
 */
export function isEncodeError(error: unknown): error is EncodeError {
  return error instanceof EncodeError;
}

/**
 * Transform the value of a successful result.
 */
export function mapResult<T, U>(result: DecodeResult<T>, f: (value: T) => U): DecodeResult<U> {
  return result.ok ? { ok: true, value: f(result.value) } : result;
}
