import type { GeneratorContext, TypeGenerator } from '../type-registry.js';

export type FloatPrecision = 'single' | 'double';

/**
 * Uniform reals in [min, max]. Single precision values are rounded with
 * Math.fround so they survive a Float32 column unchanged.
 */
export class FloatGenerator implements TypeGenerator {
  constructor(
    readonly type: string,
    private readonly min: number,
    private readonly max: number,
    private readonly precision: FloatPrecision
  ) {}

  generate({ faker }: GeneratorContext): number {
    const value = faker.number.float({ min: this.min, max: this.max });
    return this.precision === 'single' ? Math.fround(value) : value;
  }
}
