/**
 * Row Generator
 *
 * Produces rows for a table schema one at a time. Every column is planned
 * once at construction: a recognized hint wins, otherwise the registered
 * generator for the column's base type, otherwise null. Warnings for
 * unrecognized hints and unknown types are emitted while planning, so a
 * generator emits each of them once however many rows it produces.
 */

import { SimpleFaker } from '@faker-js/faker';

import { WARNING_CODES } from '../diag/codes.js';
import type { WarningLogger } from '../diag/logger.js';
import type {
  ColumnSpec,
  ColumnValue,
  GeneratedRow,
  TableSchema,
} from '../types/column.js';
import { ConfigError } from '../types/errors.js';
import type { DrawableHint } from '../types/hints.js';
import {
  resolveOptions,
  type ResolvedOptions,
  type RowGeneratorOptions,
} from '../types/options.js';
import { SplitMix64, XorShift32 } from '../util/rng.js';
import { drawFromHint, resolveHint } from './hint-resolver.js';
import type { GeneratorContext, TypeGenerator } from './type-registry.js';

// Stream label mixed into the seed; keeps row sequences apart from any other
// consumer of the same seed
const ROW_STREAM = 'rows';
const WIDE_STREAM = 'rows:wide';

type ColumnPlan =
  | { column: ColumnSpec; baseType: string; source: 'hint'; hint: DrawableHint }
  | {
      column: ColumnSpec;
      baseType: string;
      source: 'type';
      generator: TypeGenerator;
    }
  | { column: ColumnSpec; baseType: string; source: 'null' };

export interface ColumnPlanSummary {
  name: string;
  type: string;
  baseType: string;
  /** hint kind, 'type' for registry generation, 'null' for unknown types */
  source: DrawableHint['kind'] | 'type' | 'null';
}

export class RowGenerator {
  readonly schema: TableSchema;
  /** Effective seed; pass it back to reproduce this generator's rows */
  readonly seed: number;

  private readonly options: ResolvedOptions;
  private readonly context: GeneratorContext;
  private readonly plans: readonly ColumnPlan[];

  constructor(schema: TableSchema, options: RowGeneratorOptions = {}) {
    this.options = resolveOptions(options);
    this.schema = Object.freeze(schema.slice());
    this.seed = this.options.seed;

    const random = new XorShift32(this.seed, ROW_STREAM);
    this.context = {
      faker: new SimpleFaker({ randomizer: random }),
      random,
      wide: new SplitMix64(this.seed, WIDE_STREAM),
      now: this.options.clock,
    };
    this.plans = this.schema.map((column) => this.planColumn(column));
  }

  private get logger(): WarningLogger {
    return this.options.logger;
  }

  /**
   * Generate one row: one entry per column, in schema order.
   * Never throws for unknown types or unrecognized hints.
   */
  generateRow(): GeneratedRow {
    const row: GeneratedRow = new Map();
    for (const plan of this.plans) {
      row.set(plan.column.name, this.generateColumn(plan));
    }
    return row;
  }

  /**
   * Generate a value for a declared column type, ignoring hints.
   * Unknown base types log a warning and yield null.
   */
  generateByType(typeString: string): ColumnValue {
    const { baseType, generator } = this.options.registry.lookup(typeString);
    if (generator) {
      return generator.generate(this.context);
    }
    this.warnUnknownType(typeString, baseType);
    return null;
  }

  /** Lazily yield `count` successive rows */
  *rows(count: number): IterableIterator<GeneratedRow> {
    if (!Number.isSafeInteger(count) || count < 0) {
      throw new ConfigError(
        `Row count must be a non-negative integer, got ${count}`,
        { option: 'count', value: count }
      );
    }
    for (let i = 0; i < count; i++) {
      yield this.generateRow();
    }
  }

  /** How each column will be generated */
  describeColumns(): ColumnPlanSummary[] {
    return this.plans.map((plan) => ({
      name: plan.column.name,
      type: plan.column.type,
      baseType: plan.baseType,
      source: plan.source === 'hint' ? plan.hint.kind : plan.source,
    }));
  }

  private generateColumn(plan: ColumnPlan): ColumnValue {
    switch (plan.source) {
      case 'hint':
        return drawFromHint(plan.hint, this.context);
      case 'type':
        return plan.generator.generate(this.context);
      case 'null':
        return null;
    }
  }

  private planColumn(column: ColumnSpec): ColumnPlan {
    const { baseType, generator } = this.options.registry.lookup(column.type);
    const hints = this.options.hints;

    if (Object.hasOwn(hints, column.name)) {
      const hint = resolveHint(column.name, baseType, hints[column.name]);
      if (hint.kind !== 'unrecognized') {
        return { column, baseType, source: 'hint', hint };
      }
      this.logger.warn({
        code: WARNING_CODES.UNRECOGNIZED_HINT,
        column: column.name,
        message: `Unrecognized hint for column '${column.name}' (${hint.reason}); generating by type`,
        details: { reason: hint.reason },
      });
    }

    if (generator) {
      return { column, baseType, source: 'type', generator };
    }
    this.warnUnknownType(column.type, baseType, column.name);
    return { column, baseType, source: 'null' };
  }

  private warnUnknownType(
    typeString: string,
    baseType: string,
    column?: string
  ): void {
    const target = column === undefined ? '' : ` for column '${column}'`;
    this.logger.warn({
      code: WARNING_CODES.UNKNOWN_COLUMN_TYPE,
      column,
      message: `Unknown column type '${typeString}'${target}; yielding null`,
      details: { type: typeString, baseType },
    });
  }
}
