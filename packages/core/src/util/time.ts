export const MS_PER_SECOND = 1000;
export const SECONDS_PER_DAY = 86_400;
export const MS_PER_DAY = SECONDS_PER_DAY * MS_PER_SECOND;

// date, optional time (T or space separated), optional fraction, optional offset
const ISO_DATE_TIME =
  /^(\d{4}-\d{2}-\d{2})(?:[T ](\d{2}:\d{2}(?::\d{2}(?:\.\d{1,9})?)?))?(Z|[+-]\d{2}(?::?\d{2})?)?$/;

/**
 * Parse an ISO-8601 date or date-time into epoch milliseconds.
 * Text without an offset is read as UTC, so results do not depend on the
 * host time zone. Returns undefined for text that is not ISO-8601 or names
 * an impossible calendar date.
 */
export function parseIsoDateTime(text: string): number | undefined {
  const match = ISO_DATE_TIME.exec(text.trim());
  if (!match) return undefined;

  const [, datePart, timePart, offsetPart] = match;
  if (datePart === undefined) return undefined;

  let time = timePart ?? '00:00:00';
  if (time.length === 5) time += ':00';
  // Date.parse accepts at most millisecond fractions
  time = time.replace(/(\.\d{3})\d+$/, '$1');

  let offset = offsetPart ?? 'Z';
  if (offset !== 'Z') {
    const digits = offset.slice(1).replace(':', '');
    offset = `${offset[0]}${digits.slice(0, 2)}:${digits.slice(2, 4) || '00'}`;
  }

  if (!isCalendarDate(datePart)) return undefined;

  const ms = Date.parse(`${datePart}T${time}${offset}`);
  return Number.isNaN(ms) ? undefined : ms;
}

// Date.parse rolls 2021-02-30 over to March; reject instead
function isCalendarDate(datePart: string): boolean {
  const ms = Date.parse(`${datePart}T00:00:00Z`);
  return !Number.isNaN(ms) && formatCalendarDate(ms) === datePart;
}

/** `YYYY-MM-DD` of the UTC calendar day containing `ms` */
export function formatCalendarDate(ms: number): string {
  return new Date(ms).toISOString().slice(0, 10);
}

export function truncateToSeconds(ms: number): number {
  return Math.floor(ms / MS_PER_SECOND) * MS_PER_SECOND;
}
