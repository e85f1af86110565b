/**
 * Error hierarchy for rowsmith
 * Provides structured error handling with context and suggestions
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
  column?: string; // Column name the error relates to
  path?: string; // JSON Pointer into the offending input document
  value?: unknown; // Problematic value (may contain PII)
  valueExcerpt?: string; // Safe excerpt of value
  suggestion?: string;
  [key: string]: unknown;
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

export interface UserError {
  message: string;
  code: ErrorCode;
  severity: Severity;
  column?: string;
  path?: string;
}

export interface RowsmithErrorParams {
  message: string;
  errorCode: ErrorCode;
  severity?: Severity;
  context?: ErrorContext;
  cause?: Error;
}

/**
 * Base error class for all rowsmith errors
 */
export abstract class RowsmithError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly severity: Severity;
  public readonly context?: ErrorContext;
  public override readonly cause?: Error;

  public suggestions?: string[];

  constructor(params: RowsmithErrorParams) {
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
   * - prod: excludes stack and context.value; valueExcerpt stays
   */
  toJSON(env: 'dev' | 'prod' = 'dev'): SerializedError {
    const base: SerializedError = {
      name: this.name,
      message: this.message,
      errorCode: this.errorCode,
      severity: this.severity,
      context:
        env === 'prod' ? this.#redactContext(this.context) : this.context,
      cause: this.cause
        ? { name: this.cause.name, message: this.cause.message }
        : undefined,
    };

    if (env !== 'prod') {
      base.stack = this.stack;
    }
    return base;
  }

  /** Return a minimal, safe structure for external exposure */
  toUserError(): UserError {
    return {
      message: this.message,
      code: this.errorCode,
      severity: this.severity,
      column: this.context?.column,
      path: this.context?.path,
    };
  }

  /** Resolve the process exit code associated with this error */
  getExitCode(): number {
    return _getExitCode(this.errorCode);
  }

  // context.value is user input; prod keeps only its excerpt
  #redactContext(context?: ErrorContext): ErrorContext | undefined {
    if (!context || !('value' in context)) return context;
    const { value: _value, ...rest } = context;
    return rest;
  }
}

/**
 * Input document errors (table schema or hint table failed validation)
 */
export class SchemaError extends RowsmithError {
  constructor(params: {
    message: string;
    errorCode?:
      | ErrorCode.INVALID_TABLE_SCHEMA
      | ErrorCode.INVALID_HINT_TABLE
      | ErrorCode.DUPLICATE_COLUMN;
    context?: ErrorContext;
    cause?: Error;
  }) {
    super({
      message: params.message,
      errorCode: params.errorCode ?? ErrorCode.INVALID_TABLE_SCHEMA,
      context: params.context,
      cause: params.cause,
    });
  }

  get path(): string | undefined {
    return this.context?.path;
  }
}

/**
 * Malformed payload inside a recognized hint (bad ISO date, inverted bounds, ...)
 */
export class HintError extends RowsmithError {
  constructor(params: {
    message: string;
    column: string;
    value?: unknown;
    suggestion?: string;
    cause?: Error;
  }) {
    super({
      message: params.message,
      errorCode: ErrorCode.INVALID_HINT,
      context: {
        column: params.column,
        value: params.value,
        valueExcerpt:
          params.value === undefined ? undefined : excerpt(params.value),
        suggestion: params.suggestion,
      },
      cause: params.cause,
    });
  }

  get column(): string | undefined {
    return this.context?.column;
  }

  get suggestion(): string | undefined {
    return this.context?.suggestion;
  }
}

/**
 * Invalid generator options or CLI flags
 */
export class ConfigError extends RowsmithError {
  constructor(message: string, context?: ErrorContext) {
    super({
      message,
      errorCode: ErrorCode.CONFIGURATION_ERROR,
      context,
    });
  }

  get option(): string | undefined {
    const option = this.context?.option;
    return typeof option === 'string' ? option : undefined;
  }
}

/**
 * Unreadable input or invalid JSON text
 */
export class ParseError extends RowsmithError {
  constructor(params: {
    message: string;
    file?: string;
    cause?: Error;
  }) {
    super({
      message: params.message,
      errorCode: ErrorCode.PARSE_ERROR,
      context: { file: params.file },
      cause: params.cause,
    });
  }
}

/**
 * A value could not be encoded for output under the selected policy
 */
export class EncodingError extends RowsmithError {
  constructor(message: string, column: string) {
    super({
      message,
      errorCode: ErrorCode.ENCODING_ERROR,
      context: {
        column,
        suggestion: "Use --encoding-bigint-json 'string' or 'number'",
      },
    });
  }
}

export function isRowsmithError(error: unknown): error is RowsmithError {
  return error instanceof RowsmithError;
}

function excerpt(value: unknown): string {
  const text =
    typeof value === 'string'
      ? value
      : JSON.stringify(value, (_k, v: unknown) =>
          typeof v === 'bigint' ? v.toString() : v
        );
  if (text === undefined) return String(value);
  return text.length > 64 ? `${text.slice(0, 61)}...` : text;
}
