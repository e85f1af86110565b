/**
 * Type-specific generators
 * The default registry covers the primitive column types.
 */

import { TypeRegistry } from '../type-registry.js';
import { BooleanGenerator } from './boolean-generator.js';
import { DateGenerator, DateTimeGenerator } from './date-generator.js';
import { FloatGenerator } from './float-generator.js';
import {
  BigIntegerGenerator,
  INT64_MAX,
  INT64_MIN,
  UINT64_MAX,
  signedInteger,
  unsignedInteger,
} from './integer-generator.js';
import { StringGenerator } from './string-generator.js';

export { BooleanGenerator } from './boolean-generator.js';
export {
  DEFAULT_WINDOW_DAYS,
  DateGenerator,
  DateTimeGenerator,
} from './date-generator.js';
export { FloatGenerator, type FloatPrecision } from './float-generator.js';
export {
  BigIntegerGenerator,
  IntegerGenerator,
  INT64_MAX,
  INT64_MIN,
  UINT64_MAX,
} from './integer-generator.js';
export {
  STRING_MAX_LENGTH,
  STRING_MIN_LENGTH,
  StringGenerator,
} from './string-generator.js';

export function createDefaultTypeRegistry(): TypeRegistry {
  return new TypeRegistry()
    .register(unsignedInteger(8))
    .register(unsignedInteger(16))
    .register(unsignedInteger(32))
    .register(new BigIntegerGenerator('UInt64', 0n, UINT64_MAX))
    .register(signedInteger(8))
    .register(signedInteger(16))
    .register(signedInteger(32))
    .register(new BigIntegerGenerator('Int64', INT64_MIN, INT64_MAX))
    .register(new FloatGenerator('Float32', -1e3, 1e3, 'single'))
    .register(new FloatGenerator('Float64', -1e6, 1e6, 'double'))
    .register(new StringGenerator())
    .register(new DateGenerator())
    .register(new DateTimeGenerator('DateTime'))
    .register(new DateTimeGenerator('DateTime64'))
    .register(new BooleanGenerator());
}

export const defaultTypeRegistry = createDefaultTypeRegistry();
