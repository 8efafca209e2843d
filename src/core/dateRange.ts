import { format, isAfter, isValid, parse, startOfDay, startOfWeek } from 'date-fns';
import { DateRangeError, FormatError } from '../lib/errors.js';

/** date-fns pattern for `--start` / `--end` values and file names. */
export const FLAG_DATE_FORMAT = 'yyyy-MM-dd';
/** The same format as users read it in error messages. */
export const FLAG_DATE_DISPLAY = 'YYYY-MM-DD';

const FLAG_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export type DateFlag = '--start' | '--end';

/** Inclusive span of calendar days, both ends at local midnight. */
export interface DateRange {
  readonly start: Date;
  readonly end: Date;
}

export interface DateRangeInput {
  start?: string;
  end?: string;
}

export function parseFlagDate(flag: DateFlag, value: string): Date {
  // date-fns accepts single-digit months and days for `MM`/`dd`; the flag format does not.
  if (!FLAG_DATE_PATTERN.test(value)) {
    throw new FormatError(flag, value, FLAG_DATE_DISPLAY);
  }
  const parsed = parse(value, FLAG_DATE_FORMAT, new Date());
  if (!isValid(parsed)) {
    throw new FormatError(flag, value, FLAG_DATE_DISPLAY);
  }
  return startOfDay(parsed);
}

export function formatFlagDate(date: Date): string {
  return format(date, FLAG_DATE_FORMAT);
}

/**
 * Resolves the effective range from optional flag values.
 *
 * A missing end is today; a missing start is the Monday on or before the
 * end. Empty strings count as missing.
 */
export function resolveDateRange(input: DateRangeInput, now: Date = new Date()): DateRange {
  const end = input.end ? parseFlagDate('--end', input.end) : startOfDay(now);
  const start = input.start ? parseFlagDate('--start', input.start) : startOfWeek(end, { weekStartsOn: 1 });

  if (isAfter(start, end)) {
    throw new DateRangeError(formatFlagDate(start), formatFlagDate(end));
  }

  return { start, end };
}
