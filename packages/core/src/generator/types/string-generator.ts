import type { GeneratorContext, TypeGenerator } from '../type-registry.js';

export const STRING_MIN_LENGTH = 5;
export const STRING_MAX_LENGTH = 15;

/** Random `[A-Za-z0-9]` strings with a uniformly drawn length */
export class StringGenerator implements TypeGenerator {
  readonly type = 'String';

  generate({ faker }: GeneratorContext): string {
    return faker.string.alphanumeric({
      length: { min: STRING_MIN_LENGTH, max: STRING_MAX_LENGTH },
      casing: 'mixed',
    });
  }
}
