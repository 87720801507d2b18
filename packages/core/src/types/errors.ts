/**
 * Error hierarchy for formcodec
 * Provides structured error handling with context and suggestions
 */

import {
  ErrorCode,
  type ErrorKind,
  type Severity,
  getErrorKind,
  getExitCode as _getExitCode,
} from '../errors/codes.js';

/**
 * Typed error context shared across error types
 */
export interface ErrorContext {
  key?: string; // raw flat key being decoded (e.g. 'address[city]')
  path?: string; // rendered path of the offending slot
  field?: string; // wire name of a record field or mapping key
  targetType?: string; // descriptor label of the target slot
  value?: unknown; // offending leaf (may contain PII)
  position?: number; // character offset inside a raw key or payload
  suggestion?: string;
  limit?: number;
  actual?: number;
}

export interface SerializedError {
  name: string;
  message: string;
  errorCode: ErrorCode;
  kind: ErrorKind;
  severity: Severity;
  context?: ErrorContext;
  stack?: string;
  cause?: { name: string; message: string } | undefined;
}

export interface UserError {
  message: string;
  code: ErrorCode;
  kind: ErrorKind;
  severity: Severity;
  key?: string;
  path?: string;
}

export interface FormCodecErrorParams {
  message: string;
  errorCode: ErrorCode;
  severity?: Severity;
  context?: ErrorContext;
  cause?: Error;
}

// Leaf values under these field names never leave the process in prod output
const SENSITIVE_FIELDS = new Set([
  'password',
  'passwd',
  'apikey',
  'api_key',
  'secret',
  'token',
  'ssn',
  'creditcard',
  'credit_card',
]);

/**
 * Base error class for all formcodec errors
 */
// Errors raised by caller code (codec hooks) and handed back unchanged
const callerOwned = new WeakSet<object>();

export abstract class FormCodecError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly kind: ErrorKind;
  public readonly severity: Severity;
  public readonly context: ErrorContext;
  public override readonly cause?: Error;

  public suggestions?: string[];

  constructor(params: FormCodecErrorParams) {
    const { message, errorCode, severity = 'error', context, cause } = params;
    super(message, { cause });
    this.name = this.constructor.name;
    this.errorCode = errorCode;
    this.kind = getErrorKind(errorCode);
    this.severity = severity;
    this.context = compactContext(context);
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Fill in context fields that are still unset. The engines use this to
   * attach the raw key once the failing pair is known.
   */
  annotate(extra: ErrorContext): this {
    if (callerOwned.has(this)) return this;
    for (const [name, value] of Object.entries(extra)) {
      if (value !== undefined && !(name in this.context)) {
        Object.assign(this.context, { [name]: value });
      }
    }
    return this;
  }

  /**
   * Serialize error to JSON for logging and debugging
   * - dev: includes stack and full context
   * - prod: excludes stack and redacts leaf values of sensitive fields
   */
  toJSON(env: 'dev' | 'prod' = 'dev'): SerializedError {
    const base: SerializedError = {
      name: this.name,
      message: this.message,
      errorCode: this.errorCode,
      kind: this.kind,
      severity: this.severity,
      context: env === 'prod' ? redactContext(this.context) : this.context,
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
      kind: this.kind,
      severity: this.severity,
      key: this.context.key,
      path: this.context.path,
    };
  }

  /** Resolve the process exit code associated with this error */
  getExitCode(): number {
    return _getExitCode(this.errorCode);
  }
}

function compactContext(context: ErrorContext | undefined): ErrorContext {
  const out: ErrorContext = {};
  for (const [name, value] of Object.entries(context ?? {})) {
    if (value !== undefined) Object.assign(out, { [name]: value });
  }
  return out;
}

/**
 * Mark an error thrown by caller code. `annotate` leaves it untouched, since
 * the same instance may be thrown again for another key.
 */
export function markCallerOwned<E extends FormCodecError>(error: E): E {
  callerOwned.add(error);
  return error;
}

function redactContext(context: ErrorContext): ErrorContext {
  if (!('value' in context)) return context;
  return isSensitiveLocation(context)
    ? { ...context, value: '[REDACTED]' }
    : context;
}

export function isSensitiveName(name: string): boolean {
  return SENSITIVE_FIELDS.has(name.toLowerCase());
}

function isSensitiveLocation(context: ErrorContext): boolean {
  if (context.field !== undefined && isSensitiveName(context.field)) {
    return true;
  }
  const key = context.key ?? context.path;
  if (key === undefined) return false;
  // Any bracket group or leading name of the key counts.
  return key
    .split(/[[\]]/)
    .filter((part) => part.length > 0)
    .some(isSensitiveName);
}

/**
 * Malformed bracket syntax inside a flat key
 */
export class PathSyntaxError extends FormCodecError {
  constructor(params: {
    message: string;
    context: ErrorContext & { key: string; position: number };
  }) {
    super({
      message: params.message,
      errorCode: ErrorCode.INVALID_PATH_SYNTAX,
      context: params.context,
    });
  }

  get position(): number | undefined {
    return this.context.position;
  }
}

/**
 * The flat payload itself could not be turned into key/value pairs
 */
export class FormDataError extends FormCodecError {
  constructor(params: {
    message: string;
    errorCode?: ErrorCode.INVALID_FORM_DATA | ErrorCode.EMPTY_INPUT;
    context?: ErrorContext;
    cause?: Error;
  }) {
    super({
      message: params.message,
      errorCode: params.errorCode ?? ErrorCode.INVALID_FORM_DATA,
      context: params.context,
      cause: params.cause,
    });
  }
}

/**
 * A named segment that matches no (non-ignored) field of a record
 */
export class UnknownFieldError extends FormCodecError {
  constructor(params: {
    field: string;
    targetType: string;
    knownFields: readonly string[];
    suggestions?: string[];
  }) {
    super({
      message: `unknown field "${params.field}" in record ${params.targetType}`,
      errorCode: ErrorCode.UNKNOWN_FIELD,
      context: {
        field: params.field,
        targetType: params.targetType,
        suggestion:
          params.suggestions && params.suggestions.length > 0
            ? `Did you mean "${params.suggestions[0]}"?`
            : undefined,
      },
    });
    this.suggestions = params.suggestions;
    this.knownFields = params.knownFields;
  }

  public readonly knownFields: readonly string[];
}

/**
 * Top-level value is neither a record nor a string-keyed mapping
 */
export class InvalidRootError extends FormCodecError {
  constructor(params: { targetType: string }) {
    super({
      message: `top-level value must be a record or map, got ${params.targetType}`,
      errorCode: ErrorCode.INVALID_ROOT,
      context: { targetType: params.targetType },
    });
  }
}

export class UnsupportedMapKeyError extends FormCodecError {
  constructor(params: { keyType: string; path?: string }) {
    super({
      message: `map keys must be strings, got ${params.keyType}`,
      errorCode: ErrorCode.UNSUPPORTED_MAP_KEY,
      context: { targetType: `map<${params.keyType}, …>`, path: params.path },
    });
  }
}

/**
 * A sequence addressed by a named segment instead of `[]`
 */
export class SequenceSegmentError extends FormCodecError {
  constructor(params: { segment: string; targetType: string }) {
    super({
      message: `expected sequence index "[]", got "[${params.segment}]"`,
      errorCode: ErrorCode.SEQUENCE_EXPECTS_INDEX,
      context: { field: params.segment, targetType: params.targetType },
    });
  }
}

/**
 * A leaf string that cannot be coerced into the target scalar
 */
export class CoercionError extends FormCodecError {
  constructor(params: {
    message: string;
    targetType: string;
    value: string;
    cause?: Error;
  }) {
    super({
      message: params.message,
      errorCode: ErrorCode.SCALAR_COERCION_FAILED,
      context: { targetType: params.targetType, value: params.value },
      cause: params.cause,
    });
  }
}

/**
 * A value kind the flat encoding cannot express (functions, symbols, a leaf
 * written into a composite slot)
 */
export class UnsupportedKindError extends FormCodecError {
  constructor(params: { message: string; targetType: string; path?: string }) {
    super({
      message: params.message,
      errorCode: ErrorCode.UNSUPPORTED_KIND,
      context: { targetType: params.targetType, path: params.path },
    });
  }
}

/**
 * A custom codec hook threw something that is not a FormCodecError
 */
export class CodecHookError extends FormCodecError {
  constructor(params: {
    hook: 'toString' | 'fromString';
    targetType: string;
    cause: Error;
    value?: string;
  }) {
    super({
      message: params.cause.message,
      errorCode: ErrorCode.CODEC_HOOK_FAILED,
      context: { targetType: params.targetType, value: params.value },
      cause: params.cause,
    });
    this.hook = params.hook;
  }

  public readonly hook: 'toString' | 'fromString';
}

/**
 * decodeInto was handed something it cannot write into
 */
export class InvalidTargetError extends FormCodecError {
  constructor(params: { received: string }) {
    super({
      message:
        params.received === 'null' || params.received === 'undefined'
          ? `decode target must be an object, got ${params.received}`
          : `decode target must be a non-null object, got ${params.received}`,
      errorCode: ErrorCode.INVALID_TARGET,
      context: { targetType: params.received },
    });
  }
}

/**
 * Configuration and setup errors
 */
export class ConfigError extends FormCodecError {
  constructor(params: {
    message: string;
    errorCode?: ErrorCode.CONFIGURATION_ERROR | ErrorCode.INVALID_DESCRIPTOR_DOCUMENT;
    setting?: string;
    details?: string[];
    cause?: Error;
  }) {
    super({
      message: params.message,
      errorCode: params.errorCode ?? ErrorCode.CONFIGURATION_ERROR,
      context: { field: params.setting },
      cause: params.cause,
    });
    this.details = params.details ?? [];
  }

  public readonly details: string[];

  get setting(): string | undefined {
    return this.context.field;
  }
}

/**
 * A configured guard (payload size, pair count, path depth) was exceeded
 */
export class InputLimitError extends FormCodecError {
  constructor(params: {
    guard: 'maxInputBytes' | 'maxPairs' | 'maxPathDepth';
    limit: number;
    actual: number;
    key?: string;
  }) {
    super({
      message: `input exceeds guards.${params.guard} (${params.actual} > ${params.limit})`,
      errorCode: ErrorCode.INPUT_LIMIT_EXCEEDED,
      context: { limit: params.limit, actual: params.actual, key: params.key },
    });
    this.guard = params.guard;
  }

  public readonly guard: 'maxInputBytes' | 'maxPairs' | 'maxPathDepth';
}

/**
 * Wraps a non-formcodec failure that escaped an engine
 */
export class InternalError extends FormCodecError {
  constructor(message: string, cause?: Error) {
    super({ message, errorCode: ErrorCode.INTERNAL_ERROR, cause });
  }
}

export function isFormCodecError(error: unknown): error is FormCodecError {
  return error instanceof FormCodecError;
}
