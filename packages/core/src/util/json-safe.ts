import { EncodingError } from '../types/errors.js';
import type { ColumnValue } from '../types/column.js';

export type BigintJsonEncoding = 'string' | 'number' | 'error';

export type JsonScalar = string | number | boolean | null;

export interface JsonSafeOptions {
  /** How to encode bigint values (default: 'string') */
  bigint?: BigintJsonEncoding;
}

export function jsonSafeReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

/**
 * Format a timestamp as `YYYY-MM-DD hh:mm:ss` in UTC, the text form
 * DateTime columns accept in JSONEachRow input.
 */
export function formatDateTime(value: Date): string {
  const iso = value.toISOString();
  return `${iso.slice(0, 10)} ${iso.slice(11, 19)}`;
}

export function toJsonSafeValue(
  value: ColumnValue,
  column: string,
  options: JsonSafeOptions = {}
): JsonScalar {
  if (value instanceof Date) return formatDateTime(value);
  if (typeof value !== 'bigint') return value;

  const policy = options.bigint ?? 'string';
  switch (policy) {
    case 'string':
      return value.toString();
    case 'number':
      return Number(value);
    case 'error':
      throw new EncodingError(
        `Column '${column}' holds a 64-bit integer that JSON cannot carry as a number`,
        column
      );
  }
}

export type JsonSafeRow = Map<string, JsonScalar>;

export function toJsonSafeRow(
  row: ReadonlyMap<string, ColumnValue>,
  options: JsonSafeOptions = {}
): JsonSafeRow {
  const out: JsonSafeRow = new Map();
  for (const [column, value] of row) {
    out.set(column, toJsonSafeValue(value, column, options));
  }
  return out;
}

/**
 * Serialize a row as a JSON object whose members follow the row's order.
 * With `indent`, one member per line, as `JSON.stringify(value, null, indent)`
 * lays out an object nested at `prefix`.
 */
export function stringifyJsonRow(
  row: ReadonlyMap<string, JsonScalar>,
  indent = '',
  prefix = ''
): string {
  if (row.size === 0) return '{}';
  const separator = indent ? ': ' : ':';
  const members = Array.from(row, ([column, value]) =>
    [JSON.stringify(column), JSON.stringify(value)].join(separator)
  );
  if (!indent) return `{${members.join(',')}}`;
  const inner = prefix + indent;
  return `{\n${members.map((member) => inner + member).join(',\n')}\n${prefix}}`;
}
