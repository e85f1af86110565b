/**
 * Date and DateTime Generators
 * Draw from the window of DEFAULT_WINDOW_DAYS days ending at the context's
 * reference time.
 */

import {
  MS_PER_DAY,
  MS_PER_SECOND,
  SECONDS_PER_DAY,
  formatCalendarDate,
  truncateToSeconds,
} from '../../util/time.js';
import type { GeneratorContext, TypeGenerator } from '../type-registry.js';

export const DEFAULT_WINDOW_DAYS = 365;

/** Calendar dates as `YYYY-MM-DD` (UTC calendar) */
export class DateGenerator implements TypeGenerator {
  readonly type = 'Date';

  generate({ faker, now }: GeneratorContext): string {
    const start = now() - DEFAULT_WINDOW_DAYS * MS_PER_DAY;
    const days = faker.number.int({ min: 0, max: DEFAULT_WINDOW_DAYS });
    return formatCalendarDate(start + days * MS_PER_DAY);
  }
}

/** Timestamps with whole-second precision */
export class DateTimeGenerator implements TypeGenerator {
  constructor(readonly type: 'DateTime' | 'DateTime64') {}

  generate({ faker, now }: GeneratorContext): Date {
    const end = truncateToSeconds(now());
    const start = end - DEFAULT_WINDOW_DAYS * MS_PER_DAY;
    const seconds = faker.number.int({
      min: 0,
      max: DEFAULT_WINDOW_DAYS * SECONDS_PER_DAY,
    });
    return new Date(start + seconds * MS_PER_SECOND);
  }
}
