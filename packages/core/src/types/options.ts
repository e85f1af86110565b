/**
 * Configuration options for RowGenerator
 *
 * All options are optional. resolveOptions() merges them over
 * DEFAULT_OPTIONS and validates the result.
 */

import { randomInt } from 'node:crypto';

import { consoleWarningLogger, type WarningLogger } from '../diag/logger.js';
import type { TypeRegistry } from '../generator/type-registry.js';
import { defaultTypeRegistry } from '../generator/types/index.js';
import { ConfigError } from './errors.js';
import type { HintTable } from './hints.js';

export interface RowGeneratorOptions {
  /** Per-column hints keyed by column name (default: none) */
  hints?: HintTable;
  /**
   * Seed for the random source. Same schema, hints, seed and reference time
   * produce the same rows. An integer in [0, 2^32); omitted, one is drawn
   * at random.
   */
  seed?: number;
  /**
   * Reference time anchoring the default Date/DateTime windows
   * (the 365 days before it). A function is called at each draw.
   * Default: the wall clock.
   */
  now?: Date | (() => Date);
  /** Receives non-fatal warnings (default: console.warn) */
  logger?: WarningLogger;
  /** Base type → generator table (default: defaultTypeRegistry) */
  registry?: TypeRegistry;
}

export interface ResolvedOptions {
  hints: HintTable;
  seed: number;
  clock: () => number;
  logger: WarningLogger;
  registry: TypeRegistry;
}

export const DEFAULT_OPTIONS: Omit<ResolvedOptions, 'seed'> = {
  hints: {},
  clock: () => Date.now(),
  logger: consoleWarningLogger,
  registry: defaultTypeRegistry,
};

export function resolveOptions(
  options: RowGeneratorOptions = {}
): ResolvedOptions {
  const resolved: ResolvedOptions = {
    hints: options.hints ?? DEFAULT_OPTIONS.hints,
    seed: options.seed ?? randomInt(SEED_LIMIT),
    clock: resolveClock(options.now) ?? DEFAULT_OPTIONS.clock,
    logger: options.logger ?? DEFAULT_OPTIONS.logger,
    registry: options.registry ?? DEFAULT_OPTIONS.registry,
  };
  validateOptions(resolved);
  return resolved;
}

function resolveClock(now: RowGeneratorOptions['now']): (() => number) | undefined {
  if (now === undefined) return undefined;
  if (now instanceof Date) {
    const ms = now.getTime();
    if (Number.isNaN(ms)) {
      throw new ConfigError('now must be a valid Date', { option: 'now' });
    }
    return () => ms;
  }
  return () => {
    const ms = now().getTime();
    if (Number.isNaN(ms)) {
      throw new ConfigError('now() returned an invalid Date', { option: 'now' });
    }
    return ms;
  };
}

// The random source keeps 32 bits of state
const SEED_LIMIT = 0x100000000;

export function isUint32(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value < SEED_LIMIT;
}

function validateOptions(options: ResolvedOptions): void {
  if (!isUint32(options.seed)) {
    throw new ConfigError(`seed must be an integer in [0, 2^32), got ${options.seed}`, {
      option: 'seed',
      value: options.seed,
    });
  }
  if (
    typeof options.hints !== 'object' ||
    options.hints === null ||
    Array.isArray(options.hints)
  ) {
    throw new ConfigError('hints must be an object keyed by column name', {
      option: 'hints',
    });
  }
  if (typeof options.logger.warn !== 'function') {
    throw new ConfigError('logger must provide a warn() function', {
      option: 'logger',
    });
  }
}
