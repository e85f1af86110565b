import {
  ConfigError,
  isUint32,
  parseIsoDateTime,
  type BigintJsonEncoding,
} from '@rowsmith/core';

export type OutputFormat = 'json' | 'ndjson';

export const DEFAULT_ROW_COUNT = 10;
export const DEFAULT_SEED = 424242;

/**
 * CLI options interface matching Commander.js option structure
 */
export interface CliOptions {
  schema?: string;
  hints?: string;
  count?: string | number;
  rows?: string | number;
  n?: string | number;
  seed?: string | number;
  now?: string;
  out?: string;
  encodingBigintJson?: string;
  printConfig?: boolean;
  // Allow additional CLI options that we don't process
  [key: string]: unknown;
}

/**
 * Resolve --rows/--count/--n into a single positive row count.
 * The aliases may be combined only when they agree.
 */
export function resolveRowCount(
  options: Pick<CliOptions, 'rows' | 'count' | 'n'>
): number {
  const rawValues: Array<[string, unknown]> = [
    ['rows', options.rows],
    ['count', options.count],
    ['n', options.n],
  ];

  const provided = rawValues.filter(([, value]) => value !== undefined);
  if (provided.length === 0) {
    return DEFAULT_ROW_COUNT;
  }

  const parsed: Array<[string, number]> = provided.map(([name, value]) => {
    const num = typeof value === 'number' ? value : Number(String(value));
    if (!Number.isSafeInteger(num) || num <= 0) {
      throw new ConfigError(
        `Invalid ${name} value "${String(value)}". Expected a positive integer.`,
        { option: name, value }
      );
    }
    return [name, num];
  });

  const [first, ...rest] = parsed;
  if (!first) return DEFAULT_ROW_COUNT;
  if (rest.some(([, value]) => value !== first[1])) {
    const names = parsed.map(([n]) => `--${n}`).join(', ');
    throw new ConfigError(
      `Conflicting row count flags (${names}) with different values.`,
      { option: 'count' }
    );
  }
  return first[1];
}

export function resolveSeed(value: unknown): number {
  if (value === undefined) return DEFAULT_SEED;
  const seed = typeof value === 'number' ? value : Number(String(value));
  if (!isUint32(seed) || String(value).trim() === '') {
    throw new ConfigError(
      `Invalid --seed value "${String(value)}". Expected an integer in [0, 4294967295].`,
      { option: 'seed', value }
    );
  }
  return seed;
}

/**
 * Resolve --now into a reference time; undefined keeps the wall clock.
 */
export function resolveNow(value: unknown): Date | undefined {
  if (value === undefined) return undefined;
  const ms = parseIsoDateTime(String(value));
  if (ms === undefined) {
    throw new ConfigError(
      `Invalid --now value "${String(value)}". Expected an ISO-8601 date or date-time.`,
      {
        option: 'now',
        value,
        suggestion: 'Use a value such as 2024-06-15T12:00:00Z',
      }
    );
  }
  return new Date(ms);
}

/**
 * Resolve output format flag into a known format or throw.
 */
export function resolveOutputFormat(value: unknown): OutputFormat {
  if (value === undefined || value === null || value === '') {
    return 'json';
  }
  const raw = String(value).toLowerCase();
  if (raw === 'json' || raw === 'ndjson') {
    return raw;
  }
  throw new ConfigError(
    `Invalid --out value "${String(
      value
    )}". Supported formats are "json" and "ndjson".`,
    { option: 'out', value }
  );
}

export function resolveBigintEncoding(value: unknown): BigintJsonEncoding {
  if (value === undefined || value === null || value === '') {
    return 'string';
  }
  const raw = String(value).toLowerCase();
  if (raw === 'string' || raw === 'number' || raw === 'error') {
    return raw;
  }
  throw new ConfigError(
    `Invalid --encoding-bigint-json value "${String(
      value
    )}". Expected "string", "number" or "error".`,
    { option: 'encodingBigintJson', value }
  );
}
