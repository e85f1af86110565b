/**
 * Warning codes for recoverable generation conditions.
 * A warning never stops generation; each code names its fallback.
 */
export const WARNING_CODES = {
  /** Hint shape not recognized; the column is generated from its type */
  UNRECOGNIZED_HINT: 'UNRECOGNIZED_HINT',
  /** Base type has no registered generator; the column yields null */
  UNKNOWN_COLUMN_TYPE: 'UNKNOWN_COLUMN_TYPE',
} as const;

export type WarningCode = (typeof WARNING_CODES)[keyof typeof WARNING_CODES];

export function isWarningCode(value: string): value is WarningCode {
  return Object.values<string>(WARNING_CODES).includes(value);
}
