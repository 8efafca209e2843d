import { describe, it, expect } from 'vitest';
import { ConfigError } from '../lib/errors.js';
import { optionDefaults, parseTimesheetOptions } from './config.js';

describe('optionDefaults', () => {
  it('falls back to the built-in values', () => {
    expect(optionDefaults({}, '/work')).toEqual({ hours: '8', job: 'Work Time', outDir: '/work' });
  });

  it('prefers environment values', () => {
    const env = { TIMESHEET_HOURS: '6', TIMESHEET_JOB: 'Consulting', TIMESHEET_OUT_DIR: '/exports' };

    expect(optionDefaults(env, '/work')).toEqual({ hours: '6', job: 'Consulting', outDir: '/exports' });
  });

  it('ignores empty environment values', () => {
    expect(optionDefaults({ TIMESHEET_JOB: '' }, '/work').job).toBe('Work Time');
  });
});

describe('parseTimesheetOptions', () => {
  it('coerces hours from the flag string', () => {
    const options = parseTimesheetOptions({ hours: '6', job: 'Work Time', outDir: '/work', start: '2024-01-01' });

    expect(options).toEqual({ hours: 6, job: 'Work Time', outDir: '/work', start: '2024-01-01', verbose: false });
  });

  it('accepts hour counts that run past midnight', () => {
    expect(parseTimesheetOptions({ hours: '20', job: 'Night', outDir: '/work' }).hours).toBe(20);
    expect(parseTimesheetOptions({ hours: '3000000000', job: 'Night', outDir: '/work' }).hours).toBe(3_000_000_000);
    expect(parseTimesheetOptions({ hours: '-2', job: 'Short', outDir: '/work' }).hours).toBe(-2);
  });

  it('accepts surrounding whitespace and an explicit sign', () => {
    expect(parseTimesheetOptions({ hours: ' 7 ', job: 'Work Time', outDir: '/work' }).hours).toBe(7);
    expect(parseTimesheetOptions({ hours: '+5', job: 'Work Time', outDir: '/work' }).hours).toBe(5);
  });

  it('rejects hours that are not a number', () => {
    expect(() => parseTimesheetOptions({ hours: 'eight', job: 'Work Time', outDir: '/work' })).toThrow(ConfigError);
    expect(() => parseTimesheetOptions({ hours: 'eight', job: 'Work Time', outDir: '/work' })).toThrow(
      'invalid options (--hours: must be a whole number of hours)',
    );
  });

  it.each(['', '   ', '1e1', '0x10'])('rejects %j as an hour count', (hours) => {
    expect(() => parseTimesheetOptions({ hours, job: 'Work Time', outDir: '/work' })).toThrow(
      'invalid options (--hours: must be a whole number of hours)',
    );
  });

  it('rejects fractional hours', () => {
    expect(() => parseTimesheetOptions({ hours: '7.5', job: 'Work Time', outDir: '/work' })).toThrow(
      'invalid options (--hours: must be a whole number of hours)',
    );
  });

  it('rejects an empty output directory', () => {
    expect(() => parseTimesheetOptions({ hours: '8', job: 'Work Time', outDir: '' })).toThrow(
      'invalid options (--out-dir: must not be empty)',
    );
  });
});
