/**
 * Table schema and generated row types
 */

/** One column of a table schema, e.g. `{ name: 'id', type: 'UInt32' }` */
export interface ColumnSpec {
  readonly name: string;
  /** Declared type, possibly parametric: `LowCardinality(String)`, `DateTime64(3)` */
  readonly type: string;
}

/** Ordered columns; order is the field order of every generated row */
export type TableSchema = readonly ColumnSpec[];

/**
 * A single generated value.
 * - number: 8/16/32-bit integers and floats
 * - bigint: UInt64 / Int64
 * - string: String, and Date as a `YYYY-MM-DD` calendar date
 * - Date: DateTime / DateTime64, whole seconds
 * - null: column type without a registered generator
 */
export type ColumnValue = string | number | bigint | boolean | Date | null;

/**
 * Column name → value in schema order. A Map keeps integer-like names such
 * as `2024` in place and takes `__proto__` as an ordinary key.
 */
export type GeneratedRow = Map<string, ColumnValue>;
