import { closeSync, mkdirSync, openSync, writeSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { IOError } from '../lib/errors.js';
import { formatFlagDate, type DateRange } from './dateRange.js';
import type { RowSink } from './rowWriter.js';

export interface FileSink extends RowSink {
  readonly path: string;
  close(): void;
}

function ensureDir(p: string) {
  mkdirSync(p, { recursive: true });
}

export function timesheetFileName(range: DateRange): string {
  return `${formatFlagDate(range.start)}.${formatFlagDate(range.end)}.csv`;
}

export function timesheetFilePath(outDir: string, range: DateRange): string {
  return join(outDir, timesheetFileName(range));
}

/**
 * Creates (or truncates) the file at `path` and returns a synchronous sink
 * over it. `close` is idempotent.
 */
export function createFileSink(path: string): FileSink {
  let fd: number;
  try {
    ensureDir(dirname(path));
    fd = openSync(path, 'w');
  } catch (err) {
    throw new IOError(`could not create file "${path}"`, err, { path });
  }

  let open = true;
  return {
    path,
    write(chunk: string) {
      if (!open) throw new Error(`file "${path}" is already closed`);
      writeSync(fd, chunk, null, 'utf8');
    },
    close() {
      if (!open) return;
      open = false;
      closeSync(fd);
    },
  };
}
