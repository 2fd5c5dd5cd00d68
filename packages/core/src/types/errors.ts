/**
 * Error hierarchy for abiseed
 * Provides structured error handling with context the caller can log
 * before discarding the offending input.
 */

import {
  ErrorCode,
  type Severity,
  getExitCode as _getExitCode,
} from '../errors/codes.js';

/**
 * Typed error context shared across error types
 */
export interface ErrorContext {
  path?: string; // Value path (e.g., '$.2.owner')
  typeKey?: string; // Canonical ABI type of the offending node (e.g., 'uint8[5]')
  fieldIndex?: number; // Tuple field or array element index
  setting?: string; // Configuration key (e.g., 'bytesLength')
  valueExcerpt?: string; // Safe excerpt of the offending value
  expected?: string;
  actual?: string;
}

export interface SerializedError {
  name: string;
  message: string;
  errorCode: ErrorCode;
  severity: Severity;
  context?: ErrorContext;
  stack?: string;
  cause?: { name: string; message: string } | undefined;
}

export interface ErrorParams<C extends ErrorContext = ErrorContext> {
  message: string;
  errorCode?: ErrorCode;
  severity?: Severity;
  context?: C;
  cause?: Error;
}

/**
 * Base error class for all abiseed errors
 */
export abstract class AbiSeedError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly severity: Severity;
  public readonly context?: ErrorContext;
  public override readonly cause?: Error;

  constructor(params: ErrorParams & { errorCode: ErrorCode }) {
    const { message, errorCode, severity = 'error', context, cause } = params;
    super(message, { cause });
    this.name = this.constructor.name;
    this.errorCode = errorCode;
    this.severity = severity;
    this.context = context;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error to JSON for logging and debugging
   * - dev: includes stack and full context
   * - prod: excludes stack and the value excerpt
   */
  toJSON(env: 'dev' | 'prod' = 'dev'): SerializedError {
    const base: SerializedError = {
      name: this.name,
      message: this.message,
      errorCode: this.errorCode,
      severity: this.severity,
      context: env === 'prod' ? this.#redactContext(this.context) : this.context,
      cause: this.cause
        ? { name: this.cause.name, message: this.cause.message }
        : undefined,
    };

    if (env !== 'prod') {
      base.stack = this.stack;
    }
    return base;
  }

  /** Resolve the process exit code associated with this error */
  getExitCode(): number {
    return _getExitCode(this.errorCode);
  }

  // Corpus values can be arbitrary user data; keep them out of prod logs
  #redactContext(context?: ErrorContext): ErrorContext | undefined {
    if (!context || context.valueExcerpt === undefined) return context;
    return { ...context, valueExcerpt: '[REDACTED]' };
  }
}

/**
 * Generator or mutator configuration errors (bounds with min > max, bias
 * outside [0, 1], negative rounds)
 */
export class ConfigError extends AbiSeedError {
  constructor(params: ErrorParams<ErrorContext & { setting: string }>) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.CONFIGURATION_ERROR,
    });
  }

  get setting(): string | undefined {
    return this.context?.setting;
  }
}

/**
 * A value whose runtime shape disagrees with its type descriptor
 */
export class ShapeMismatchError extends AbiSeedError {
  constructor(params: ErrorParams<ErrorContext & { path: string }>) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.SHAPE_MISMATCH,
    });
  }

  get path(): string | undefined {
    return this.context?.path;
  }
}

export type DecodeErrorReason =
  | 'malformed-hex'
  | 'length-mismatch'
  | 'integer-out-of-range'
  | 'arity-mismatch'
  | 'type-mismatch'
  | 'unknown-kind'
  | 'malformed-json';

const DECODE_ERROR_CODES = {
  'malformed-hex': ErrorCode.MALFORMED_HEX,
  'length-mismatch': ErrorCode.LENGTH_MISMATCH,
  'integer-out-of-range': ErrorCode.INTEGER_OUT_OF_RANGE,
  'arity-mismatch': ErrorCode.ARITY_MISMATCH,
  'type-mismatch': ErrorCode.IR_TYPE_MISMATCH,
  'unknown-kind': ErrorCode.UNKNOWN_TYPE_KIND,
  'malformed-json': ErrorCode.MALFORMED_JSON,
} satisfies Record<DecodeErrorReason, ErrorCode>;

/**
 * Codec decode failures. The reason discriminates the family member.
 */
export class DecodeError extends AbiSeedError {
  public readonly reason: DecodeErrorReason;

  constructor(
    params: Omit<ErrorParams<ErrorContext & { path: string }>, 'errorCode'> & {
      reason: DecodeErrorReason;
    }
  ) {
    super({ ...params, errorCode: DECODE_ERROR_CODES[params.reason] });
    this.reason = params.reason;
  }

  get path(): string | undefined {
    return this.context?.path;
  }
}

/**
 * Untrusted descriptor JSON that does not describe a valid ABI type
 */
export class DescriptorError extends AbiSeedError {
  public readonly issues: readonly string[];

  constructor(
    params: ErrorParams<ErrorContext> & { issues?: readonly string[] }
  ) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.INVALID_TYPE_DESCRIPTOR,
    });
    this.issues = params.issues ?? [];
  }
}

export function isAbiSeedError(error: unknown): error is AbiSeedError {
  return error instanceof AbiSeedError;
}

/**
 * Short, single-line excerpt of a value for error context
 */
export function excerpt(value: unknown, max = 64): string {
  let text: string;
  try {
    text =
      typeof value === 'string'
        ? JSON.stringify(value)
        : (JSON.stringify(value, (_key, v: unknown) =>
            typeof v === 'bigint' ? v.toString() : v
          ) ?? String(value));
  } catch {
    text = String(value);
  }
  return text.length > max ? `${text.slice(0, max - 1)}…` : text;
}
