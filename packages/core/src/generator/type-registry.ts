/**
 * Type Registry
 * Maps column base type names (`UInt32`, `String`, `DateTime64`, ...) to the
 * generator that produces values for them.
 */

import type { SimpleFaker } from '@faker-js/faker';

import type { ColumnValue } from '../types/column.js';
import type { SplitMix64, XorShift32 } from '../util/rng.js';

/**
 * Per-generator state, shared by every column of one RowGenerator
 */
export interface GeneratorContext {
  /** faker facade drawing from `random` */
  faker: SimpleFaker;
  /** The underlying seeded source, for draws faker does not offer */
  random: XorShift32;
  /** Separate 64-bit source for UInt64/Int64 */
  wide: SplitMix64;
  /** Reference time in epoch milliseconds */
  now: () => number;
}

export interface TypeGenerator {
  /** Base type name this generator is registered under */
  readonly type: string;
  generate(context: GeneratorContext): ColumnValue;
}

// Wrappers that decorate an inner type without changing its value domain
const TRANSPARENT_WRAPPERS = new Set(['LowCardinality', 'Nullable']);

/**
 * Reduce a declared column type to its base type name:
 * transparent wrappers are unwrapped, then any parametric suffix is dropped.
 *
 *   LowCardinality(String)         -> String
 *   Nullable(LowCardinality(Int8)) -> Int8
 *   DateTime64(3, 'UTC')           -> DateTime64
 *   Array(UInt8)                   -> Array
 */
export function resolveBaseType(typeString: string): string {
  let current = typeString.trim();
  for (;;) {
    const open = current.indexOf('(');
    if (open < 0) return current;

    const head = current.slice(0, open).trim();
    if (!TRANSPARENT_WRAPPERS.has(head) || !current.endsWith(')')) {
      return head;
    }
    current = current.slice(open + 1, -1).trim();
  }
}

export interface TypeLookup {
  baseType: string;
  generator: TypeGenerator | undefined;
}

export class TypeRegistry {
  private readonly generators = new Map<string, TypeGenerator>();

  register(generator: TypeGenerator): this {
    this.generators.set(generator.type, generator);
    return this;
  }

  /** Generator for a base type name (not a full type string) */
  get(baseType: string): TypeGenerator | undefined {
    return this.generators.get(baseType);
  }

  has(baseType: string): boolean {
    return this.generators.has(baseType);
  }

  /** Resolve a declared column type and look up its generator */
  lookup(typeString: string): TypeLookup {
    const baseType = resolveBaseType(typeString);
    return { baseType, generator: this.generators.get(baseType) };
  }

  /** Registered base type names in registration order */
  types(): string[] {
    return Array.from(this.generators.keys());
  }

  /** Independent copy, for extending the defaults without touching them */
  clone(): TypeRegistry {
    const copy = new TypeRegistry();
    for (const generator of this.generators.values()) copy.register(generator);
    return copy;
  }
}
