import type { GeneratorContext, TypeGenerator } from '../type-registry.js';

export class BooleanGenerator implements TypeGenerator {
  readonly type = 'Bool';

  generate({ faker }: GeneratorContext): boolean {
    return faker.datatype.boolean();
  }
}
