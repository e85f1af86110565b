/**
 * Integer Generators
 * Fixed-width integers: 8/16/32-bit as number, 64-bit as bigint
 */

import type { GeneratorContext, TypeGenerator } from '../type-registry.js';

export class IntegerGenerator implements TypeGenerator {
  constructor(
    readonly type: string,
    private readonly min: number,
    private readonly max: number
  ) {}

  generate({ faker }: GeneratorContext): number {
    return faker.number.int({ min: this.min, max: this.max });
  }
}

const TWO_POW_32 = 0x100000000n;
const TWO_POW_64 = TWO_POW_32 * TWO_POW_32;

/**
 * 64-bit integers exceed Number.MAX_SAFE_INTEGER, so values are bigint drawn
 * from the context's 64-bit source. A full 2^64 span takes the draw as is;
 * narrower spans fold by modulo.
 */
export class BigIntegerGenerator implements TypeGenerator {
  private readonly span: bigint;

  constructor(
    readonly type: string,
    private readonly min: bigint,
    private readonly max: bigint
  ) {
    this.span = max - min + 1n;
  }

  generate({ wide }: GeneratorContext): bigint {
    const bits = wide.nextUint64();
    return this.span === TWO_POW_64
      ? this.min + bits
      : this.min + (bits % this.span);
  }
}

export function unsignedInteger(bits: 8 | 16 | 32): IntegerGenerator {
  return new IntegerGenerator(`UInt${bits}`, 0, 2 ** bits - 1);
}

export function signedInteger(bits: 8 | 16 | 32): IntegerGenerator {
  return new IntegerGenerator(
    `Int${bits}`,
    -(2 ** (bits - 1)),
    2 ** (bits - 1) - 1
  );
}

export const UINT64_MAX = TWO_POW_64 - 1n;
export const INT64_MIN = -(TWO_POW_64 / 2n);
export const INT64_MAX = TWO_POW_64 / 2n - 1n;
