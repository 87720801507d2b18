/**
 * Error Code Infrastructure
 * Stable error codes, exit codes, and HTTP status mappings.
 */

// Severity levels used across the system
export type Severity = 'info' | 'warn' | 'error';

/**
 * Coarse error taxonomy. Every code belongs to exactly one kind.
 */
export type ErrorKind =
  | 'syntax'
  | 'structural'
  | 'type'
  | 'invalid-call'
  | 'config'
  | 'limit'
  | 'internal';

// Stable error codes grouped by kind
export enum ErrorCode {
  // Syntax Errors (E001–E099)
  INVALID_PATH_SYNTAX = 'E001',
  INVALID_FORM_DATA = 'E002',
  EMPTY_INPUT = 'E003',

  // Structural Errors (E100–E199)
  UNKNOWN_FIELD = 'E100',
  INVALID_ROOT = 'E101',
  UNSUPPORTED_MAP_KEY = 'E102',
  SEQUENCE_EXPECTS_INDEX = 'E103',

  // Type Errors (E200–E299)
  SCALAR_COERCION_FAILED = 'E200',
  UNSUPPORTED_KIND = 'E201',
  CODEC_HOOK_FAILED = 'E202',

  // Invalid-call Errors (E300–E399)
  INVALID_TARGET = 'E300',

  // Configuration Errors (E400–E499)
  CONFIGURATION_ERROR = 'E400',
  INVALID_DESCRIPTOR_DOCUMENT = 'E401',

  // Limit Errors (E500–E599)
  INPUT_LIMIT_EXCEEDED = 'E500',

  // Internal Errors (E900–E999)
  INTERNAL_ERROR = 'E900',
}

export const ERROR_KIND_BY_CODE = {
  [ErrorCode.INVALID_PATH_SYNTAX]: 'syntax',
  [ErrorCode.INVALID_FORM_DATA]: 'syntax',
  [ErrorCode.EMPTY_INPUT]: 'syntax',
  [ErrorCode.UNKNOWN_FIELD]: 'structural',
  [ErrorCode.INVALID_ROOT]: 'structural',
  [ErrorCode.UNSUPPORTED_MAP_KEY]: 'structural',
  [ErrorCode.SEQUENCE_EXPECTS_INDEX]: 'structural',
  [ErrorCode.SCALAR_COERCION_FAILED]: 'type',
  [ErrorCode.UNSUPPORTED_KIND]: 'type',
  [ErrorCode.CODEC_HOOK_FAILED]: 'type',
  [ErrorCode.INVALID_TARGET]: 'invalid-call',
  [ErrorCode.CONFIGURATION_ERROR]: 'config',
  [ErrorCode.INVALID_DESCRIPTOR_DOCUMENT]: 'config',
  [ErrorCode.INPUT_LIMIT_EXCEEDED]: 'limit',
  [ErrorCode.INTERNAL_ERROR]: 'internal',
} satisfies Record<ErrorCode, ErrorKind>;

// CLI exit codes mapping
export const EXIT_CODES = {
  [ErrorCode.INVALID_PATH_SYNTAX]: 10,
  [ErrorCode.INVALID_FORM_DATA]: 11,
  [ErrorCode.EMPTY_INPUT]: 12,
  [ErrorCode.UNKNOWN_FIELD]: 20,
  [ErrorCode.INVALID_ROOT]: 21,
  [ErrorCode.UNSUPPORTED_MAP_KEY]: 22,
  [ErrorCode.SEQUENCE_EXPECTS_INDEX]: 23,
  [ErrorCode.SCALAR_COERCION_FAILED]: 30,
  [ErrorCode.UNSUPPORTED_KIND]: 31,
  [ErrorCode.CODEC_HOOK_FAILED]: 32,
  [ErrorCode.INVALID_TARGET]: 40,
  [ErrorCode.CONFIGURATION_ERROR]: 50,
  [ErrorCode.INVALID_DESCRIPTOR_DOCUMENT]: 51,
  [ErrorCode.INPUT_LIMIT_EXCEEDED]: 60,
  [ErrorCode.INTERNAL_ERROR]: 99,
} satisfies Record<ErrorCode, number>;

// HTTP status mapping for API responses
export const HTTP_STATUS_BY_CODE = {
  [ErrorCode.INVALID_PATH_SYNTAX]: 400,
  [ErrorCode.INVALID_FORM_DATA]: 400,
  [ErrorCode.EMPTY_INPUT]: 400,
  [ErrorCode.UNKNOWN_FIELD]: 422,
  [ErrorCode.INVALID_ROOT]: 500,
  [ErrorCode.UNSUPPORTED_MAP_KEY]: 500,
  [ErrorCode.SEQUENCE_EXPECTS_INDEX]: 422,
  [ErrorCode.SCALAR_COERCION_FAILED]: 422,
  [ErrorCode.UNSUPPORTED_KIND]: 500,
  [ErrorCode.CODEC_HOOK_FAILED]: 422,
  [ErrorCode.INVALID_TARGET]: 500,
  [ErrorCode.CONFIGURATION_ERROR]: 500,
  [ErrorCode.INVALID_DESCRIPTOR_DOCUMENT]: 500,
  [ErrorCode.INPUT_LIMIT_EXCEEDED]: 413,
  [ErrorCode.INTERNAL_ERROR]: 500,
} satisfies Record<ErrorCode, number>;

export function getErrorKind(code: ErrorCode): ErrorKind {
  return ERROR_KIND_BY_CODE[code];
}

export function getExitCode(code: ErrorCode): number {
  return EXIT_CODES[code];
}

export function getHttpStatus(code: ErrorCode): number {
  return HTTP_STATUS_BY_CODE[code];
}
