import { z } from 'zod';
import { ConfigError } from '../lib/errors.js';
import { DEFAULT_HOURS, DEFAULT_JOB_NAME } from './workDays.js';

export const timesheetOptionsSchema = z.object({
  start: z.string().optional(),
  end: z.string().optional(),
  hours: z
    .string()
    .trim()
    .regex(/^[+-]?\d+$/, 'must be a whole number of hours')
    .transform(Number),
  job: z.string(),
  outDir: z.string().min(1, 'must not be empty'),
  verbose: z.boolean().default(false),
});

export type TimesheetOptions = z.infer<typeof timesheetOptionsSchema>;

export type OptionDefaults = {
  hours: string;
  job: string;
  outDir: string;
};

/**
 * Defaults for the CLI options. Environment variables override the built-in
 * values; explicit flags override both.
 */
export function optionDefaults(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): OptionDefaults {
  return {
    hours: env.TIMESHEET_HOURS || String(DEFAULT_HOURS),
    job: env.TIMESHEET_JOB || DEFAULT_JOB_NAME,
    outDir: env.TIMESHEET_OUT_DIR || cwd,
  };
}

const FLAG_NAMES: Record<string, string> = {
  start: '--start',
  end: '--end',
  hours: '--hours',
  job: '--job',
  outDir: '--out-dir',
  verbose: '--verbose',
};

export function parseTimesheetOptions(raw: unknown): TimesheetOptions {
  const result = timesheetOptionsSchema.safeParse(raw);
  if (result.success) {
    return result.data;
  }

  const issues = result.error.issues.map((issue) => {
    const key = String(issue.path[0] ?? '');
    return `${FLAG_NAMES[key] ?? key}: ${issue.message}`;
  });
  throw new ConfigError(`invalid options (${issues.join('; ')})`, { issues });
}
