/**
 * Column hint types
 *
 * Hints arrive in one of two spellings. The tagged forms name their kind
 * explicitly; the untagged forms are the shorthand hint files have always
 * used (`[..]` for a value set, `{ start, end }` for a date range).
 */

export type EnumValue = string | number | boolean | null;

export interface EnumHint {
  kind: 'enum';
  values: readonly EnumValue[];
}

export interface DateRangeHint {
  kind: 'dateRange';
  /** ISO-8601 date or date-time; no offset means UTC */
  start: string;
  end: string;
}

export interface NumericRangeHint {
  kind: 'numericRange';
  low: number;
  high: number;
}

export type TaggedHint = EnumHint | DateRangeHint | NumericRangeHint;

export type UntaggedHint =
  | readonly EnumValue[]
  | { readonly start: string; readonly end: string };

/** The hint shapes RowGenerator recognizes */
export type ColumnHint = TaggedHint | UntaggedHint;

/**
 * Column name → hint. Values are typed `unknown` because hint tables usually
 * come from JSON: a value matching no ColumnHint shape is classified as
 * unrecognized and degrades to a warning.
 */
export type HintTable = Readonly<Record<string, unknown>>;

/** Hint after classification, computed once per column at construction */
export type ResolvedHint =
  | { kind: 'enum'; values: readonly EnumValue[] }
  | { kind: 'dateRange'; startMs: number; spanSeconds: number; dateOnly: boolean }
  | { kind: 'numericRange'; low: number; high: number; float: boolean }
  | { kind: 'unrecognized'; reason: string };

export type DrawableHint = Exclude<ResolvedHint, { kind: 'unrecognized' }>;
