import { addDays, format, isAfter, isWeekend, setHours, startOfDay } from 'date-fns';
import type { DateRange } from './dateRange.js';

export const BASE_START_HOUR = 8;
export const DEFAULT_HOURS = 8;
export const DEFAULT_JOB_NAME = 'Work Time';

export const CSV_DATE_FORMAT = 'dd-MMM-yyyy';
export const CSV_TIME_FORMAT = 'hh:mm aaa';

export interface TimesheetConfig {
  /** Daily duration in whole hours, applied to every row. */
  hours: number;
  jobName: string;
}

export const DEFAULT_TIMESHEET_CONFIG: TimesheetConfig = {
  hours: DEFAULT_HOURS,
  jobName: DEFAULT_JOB_NAME,
};

export interface WorkDayRecord {
  readonly date: string;
  readonly jobName: string;
  readonly startTime: string;
  readonly endTime: string;
  readonly hours: number;
}

const CLOCK_ANCHOR = new Date(2000, 0, 1);

// Hours wrap around the clock face, so 8 + 20 reads as 04:00 am.
export function formatClockHour(hour: number): string {
  const onClock = ((hour % 24) + 24) % 24;
  return format(setHours(CLOCK_ANCHOR, onClock), CSV_TIME_FORMAT);
}

/**
 * Lazy, restartable sequence of work-day rows for an inclusive range.
 * Every call to the iterator walks the range again from its start.
 */
export class WorkDaySequence implements Iterable<WorkDayRecord> {
  readonly range: DateRange;
  readonly config: TimesheetConfig;
  private readonly startTime: string;
  private readonly endTime: string;

  constructor(range: DateRange, config: TimesheetConfig = DEFAULT_TIMESHEET_CONFIG) {
    this.range = { start: startOfDay(range.start), end: startOfDay(range.end) };
    this.config = { ...config };
    this.startTime = formatClockHour(BASE_START_HOUR);
    this.endTime = formatClockHour(BASE_START_HOUR + config.hours);
  }

  *[Symbol.iterator](): Iterator<WorkDayRecord> {
    for (let day = this.range.start; !isAfter(day, this.range.end); day = addDays(day, 1)) {
      if (isWeekend(day)) continue;
      yield {
        date: format(day, CSV_DATE_FORMAT),
        jobName: this.config.jobName,
        startTime: this.startTime,
        endTime: this.endTime,
        hours: this.config.hours,
      };
    }
  }

  toArray(): WorkDayRecord[] {
    return Array.from(this);
  }
}

export function buildWorkDays(range: DateRange, config: TimesheetConfig = DEFAULT_TIMESHEET_CONFIG): WorkDaySequence {
  return new WorkDaySequence(range, config);
}
