/**
 * Error Code Infrastructure
 * Stable error codes and process exit codes.
 */

export type Severity = 'info' | 'warn' | 'error';

// Stable error codes grouped by domain
export enum ErrorCode {
  // Input document errors (E010–E019)
  INVALID_TABLE_SCHEMA = 'E010',
  INVALID_HINT_TABLE = 'E011',
  DUPLICATE_COLUMN = 'E012',

  // Hint payload errors (E020–E029)
  INVALID_HINT = 'E020',

  // Configuration errors (E300–E399)
  CONFIGURATION_ERROR = 'E300',

  // Parse and encoding errors (E400–E499)
  PARSE_ERROR = 'E400',
  ENCODING_ERROR = 'E410',

  // Internal errors (E500–E599)
  INTERNAL_ERROR = 'E500',
}

// CLI exit codes mapping
export const EXIT_CODES = {
  [ErrorCode.INVALID_TABLE_SCHEMA]: 20,
  [ErrorCode.INVALID_HINT_TABLE]: 21,
  [ErrorCode.DUPLICATE_COLUMN]: 22,
  [ErrorCode.INVALID_HINT]: 23,
  [ErrorCode.CONFIGURATION_ERROR]: 50,
  [ErrorCode.PARSE_ERROR]: 60,
  [ErrorCode.ENCODING_ERROR]: 61,
  [ErrorCode.INTERNAL_ERROR]: 99,
} satisfies Record<ErrorCode, number>;

export function getExitCode(code: ErrorCode): number {
  return EXIT_CODES[code];
}
