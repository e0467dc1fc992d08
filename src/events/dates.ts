const CALENDAR_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const MS_PER_DAY = 86_400_000;

/** Calendar day (`YYYY-MM-DD`) of `now` as observed in `timeZone`. */
export function calendarDateInTimeZone(now: Date, timeZone: string): string {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  }).formatToParts(now);

  const pick = (type: Intl.DateTimeFormatPartTypes): string => parts.find((part) => part.type === type)?.value ?? '';
  return `${pick('year')}-${pick('month')}-${pick('day')}`;
}

/**
 * Day number (days since the Unix epoch) for a `YYYY-MM-DD` string, or null
 * when the string is not in that format or names a day that does not exist.
 */
export function parseCalendarDate(value: string): number | null {
  const match = CALENDAR_DATE_PATTERN.exec(value);
  if (!match) {
    return null;
  }
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const ms = Date.UTC(year, month - 1, day);
  const roundTrip = new Date(ms);
  if (roundTrip.getUTCFullYear() !== year || roundTrip.getUTCMonth() !== month - 1 || roundTrip.getUTCDate() !== day) {
    return null;
  }
  return ms / MS_PER_DAY;
}

/**
 * First day of the season containing `today`. A season opens on the first of
 * `startMonth`; before that month the season began the previous year.
 */
export function seasonStartDate(today: string, startMonth: number): string {
  const dayNumber = parseCalendarDate(today);
  if (dayNumber === null) {
    throw new Error(`Invalid calendar date: ${today}`);
  }
  const date = new Date(dayNumber * MS_PER_DAY);
  const year = date.getUTCMonth() + 1 < startMonth ? date.getUTCFullYear() - 1 : date.getUTCFullYear();
  return `${year}-${String(startMonth).padStart(2, '0')}-01`;
}
