import { Command } from 'commander';
import { parseTimesheetOptions, optionDefaults, type TimesheetOptions } from '../core/config.js';
import { formatFlagDate, resolveDateRange, type DateRange } from '../core/dateRange.js';
import { createFileSink, timesheetFilePath } from '../core/fs.js';
import { writeTimesheetCsv } from '../core/rowWriter.js';
import { buildWorkDays } from '../core/workDays.js';
import { describeError } from '../lib/errors.js';
import { createLogger, type Logger } from '../lib/logger.js';

export type GenerateDeps = {
  logger: Logger;
  now?: Date;
};

export type GenerateResult = {
  outputPath: string;
  range: DateRange;
  rows: number;
};

export function generateTimesheet(options: TimesheetOptions, deps: GenerateDeps): GenerateResult {
  const { logger } = deps;
  const range = resolveDateRange({ start: options.start, end: options.end }, deps.now);

  logger.info(`Start: ${formatFlagDate(range.start)}`);
  logger.info(`End:   ${formatFlagDate(range.end)}`);

  const days = buildWorkDays(range, { hours: options.hours, jobName: options.job });
  const outputPath = timesheetFilePath(options.outDir, range);
  logger.debug(`[generate] writing ${outputPath}`);

  const sink = createFileSink(outputPath);
  let rows: number;
  try {
    rows = writeTimesheetCsv(sink, days);
  } finally {
    sink.close();
  }

  logger.info(`Wrote ${rows} days to ${outputPath}`);
  return { outputPath, range, rows };
}

export function registerGenerateCommand(program: Command, env: NodeJS.ProcessEnv = process.env) {
  const defaults = optionDefaults(env);
  program
    .option('--start <date>', 'start date in YYYY-MM-DD format, defaults to the Monday on or before --end')
    .option('--end <date>', 'end date in YYYY-MM-DD format, defaults to today')
    .option('--hours <int>', 'number of hours per day', defaults.hours)
    .option('--job <name>', 'job name', defaults.job)
    .option('--out-dir <path>', 'directory to write the CSV file into', defaults.outDir)
    .option('--verbose', 'Enable verbose logging', false)
    .action((raw: Record<string, unknown>) => {
      const logger = createLogger(raw.verbose === true, env);
      try {
        const options = parseTimesheetOptions(raw);
        generateTimesheet(options, { logger });
      } catch (e) {
        logger.error(describeError(e));
        process.exitCode = 1;
      }
    });
}
