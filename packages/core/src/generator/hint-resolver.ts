/**
 * Hint classification and drawing
 *
 * A raw hint is classified once, when the generator is built, into one of
 * enum | dateRange | numericRange | unrecognized. Shapes that match no kind
 * are reported as unrecognized (the caller warns and falls back to type
 * generation); a recognized kind with a broken payload raises HintError.
 */

import type { ColumnValue } from '../types/column.js';
import { HintError } from '../types/errors.js';
import type {
  DrawableHint,
  EnumValue,
  ResolvedHint,
} from '../types/hints.js';
import {
  MS_PER_SECOND,
  formatCalendarDate,
  parseIsoDateTime,
} from '../util/time.js';
import type { GeneratorContext } from './type-registry.js';

// Base types whose range-hint values are coerced to a calendar date
const DATE_ONLY_TYPES = new Set(['Date', 'Date32']);

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isEnumValue(value: unknown): value is EnumValue {
  return (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  );
}

function unrecognized(reason: string): ResolvedHint {
  return { kind: 'unrecognized', reason };
}

export function resolveHint(
  column: string,
  baseType: string,
  hint: unknown
): ResolvedHint {
  if (Array.isArray(hint)) {
    return resolveEnum(hint);
  }
  if (!isPlainObject(hint)) {
    return unrecognized(`expected an array or an object, got ${describeValue(hint)}`);
  }

  if (!('kind' in hint)) {
    if (typeof hint.start === 'string' && typeof hint.end === 'string') {
      return resolveDateRange(column, baseType, hint.start, hint.end);
    }
    return unrecognized('object hint without kind needs string start and end');
  }

  switch (hint.kind) {
    case 'enum':
      return Array.isArray(hint.values)
        ? resolveEnum(hint.values)
        : unrecognized('enum hint needs a values array');
    case 'dateRange':
      return typeof hint.start === 'string' && typeof hint.end === 'string'
        ? resolveDateRange(column, baseType, hint.start, hint.end)
        : unrecognized('dateRange hint needs string start and end');
    case 'numericRange':
      return typeof hint.low === 'number' && typeof hint.high === 'number'
        ? resolveNumericRange(column, baseType, hint.low, hint.high)
        : unrecognized('numericRange hint needs numeric low and high');
    default:
      return unrecognized(`unknown hint kind ${describeValue(hint.kind)}`);
  }
}

function resolveEnum(values: readonly unknown[]): ResolvedHint {
  if (values.length === 0) {
    return unrecognized('value set is empty');
  }
  const scalars: EnumValue[] = [];
  for (const value of values) {
    if (!isEnumValue(value)) {
      return unrecognized('value set may only hold strings, numbers, booleans or null');
    }
    scalars.push(value);
  }
  return { kind: 'enum', values: scalars };
}

function resolveDateRange(
  column: string,
  baseType: string,
  start: string,
  end: string
): ResolvedHint {
  const startMs = parseIsoDateTime(start);
  if (startMs === undefined) {
    throw new HintError({
      message: `Range start for column '${column}' is not an ISO-8601 date/time`,
      column,
      value: start,
      suggestion: 'Use a value such as 2020-01-01 or 2020-01-01T00:00:00',
    });
  }
  const endMs = parseIsoDateTime(end);
  if (endMs === undefined) {
    throw new HintError({
      message: `Range end for column '${column}' is not an ISO-8601 date/time`,
      column,
      value: end,
      suggestion: 'Use a value such as 2020-01-02 or 2020-01-02T00:00:00',
    });
  }
  if (endMs < startMs) {
    throw new HintError({
      message: `Range end for column '${column}' is before its start`,
      column,
      value: { start, end },
    });
  }
  return {
    kind: 'dateRange',
    startMs,
    spanSeconds: Math.floor((endMs - startMs) / MS_PER_SECOND),
    dateOnly: DATE_ONLY_TYPES.has(baseType),
  };
}

function resolveNumericRange(
  column: string,
  baseType: string,
  low: number,
  high: number
): ResolvedHint {
  if (!Number.isFinite(low) || !Number.isFinite(high)) {
    throw new HintError({
      message: `Numeric range for column '${column}' must have finite bounds`,
      column,
      value: { low, high },
    });
  }
  if (low > high) {
    throw new HintError({
      message: `Numeric range for column '${column}' has low > high`,
      column,
      value: { low, high },
      suggestion: 'Swap the bounds',
    });
  }

  if (baseType.includes('Float')) {
    return { kind: 'numericRange', low, high, float: true };
  }

  const intLow = Math.ceil(low);
  const intHigh = Math.floor(high);
  if (intLow > intHigh) {
    throw new HintError({
      message: `Numeric range for column '${column}' contains no integer`,
      column,
      value: { low, high },
    });
  }
  if (!Number.isSafeInteger(intLow) || !Number.isSafeInteger(intHigh)) {
    throw new HintError({
      message: `Numeric range for column '${column}' exceeds the safe integer range`,
      column,
      value: { low, high },
    });
  }
  return { kind: 'numericRange', low: intLow, high: intHigh, float: false };
}

export function drawFromHint(
  hint: DrawableHint,
  { faker }: GeneratorContext
): ColumnValue {
  switch (hint.kind) {
    case 'enum':
      return faker.helpers.arrayElement(hint.values);
    case 'dateRange': {
      const offset = faker.number.int({ min: 0, max: hint.spanSeconds });
      const ms = hint.startMs + offset * MS_PER_SECOND;
      return hint.dateOnly ? formatCalendarDate(ms) : new Date(ms);
    }
    case 'numericRange':
      return hint.float
        ? faker.number.float({ min: hint.low, max: hint.high })
        : faker.number.int({ min: hint.low, max: hint.high });
  }
}

function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value === 'string') return `'${value}'`;
  return typeof value;
}
