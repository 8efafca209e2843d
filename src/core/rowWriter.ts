import Papa from 'papaparse';
import { IOError } from '../lib/errors.js';
import type { WorkDayRecord } from './workDays.js';

export const CSV_HEADER = ['Date', 'Job Name', 'From time', 'To time', 'Hours'] as const;

/** Destination for CSV text. Implementations throw when a write is rejected. */
export interface RowSink {
  write(chunk: string): void;
}

type CsvRow = [string, string, string, string, number];

export function toCsvRow(record: WorkDayRecord): CsvRow {
  return [record.date, record.jobName, record.startTime, record.endTime, record.hours];
}

function toCsvLine(fields: readonly (string | number)[]): string {
  return `${Papa.unparse([fields], { newline: '\n' })}\n`;
}

/**
 * Writes the header and one line per record, returning the number of data
 * rows written. Lines already handed to the sink stay there if a later write
 * fails.
 */
export function writeTimesheetCsv(sink: RowSink, records: Iterable<WorkDayRecord>): number {
  try {
    sink.write(toCsvLine(CSV_HEADER));
  } catch (err) {
    throw new IOError('could not write header', err);
  }

  let rows = 0;
  for (const record of records) {
    try {
      sink.write(toCsvLine(toCsvRow(record)));
    } catch (err) {
      throw new IOError(`could not write row ${rows + 1}`, err, { date: record.date });
    }
    rows++;
  }
  return rows;
}
