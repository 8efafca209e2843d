import { createLogger as createWinstonLogger, format, transports } from 'winston';

/**
 * Minimal logging surface the timesheet code depends on. A winston logger
 * satisfies it; tests pass plain spies.
 */
export type Logger = {
  info: (message: string) => void;
  error: (message: string) => void;
  debug: (message: string) => void;
};

const LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'];

export function resolveLogLevel(verbose: boolean, env: NodeJS.ProcessEnv = process.env): string {
  if (verbose) return 'debug';
  const fromEnv = env.LOG_LEVEL?.trim().toLowerCase();
  return fromEnv && LEVELS.includes(fromEnv) ? fromEnv : 'info';
}

// Status lines go to stderr so nothing but data could ever land on stdout.
export function createLogger(verbose = false, env: NodeJS.ProcessEnv = process.env): Logger {
  return createWinstonLogger({
    level: resolveLogLevel(verbose, env),
    format: format.combine(
      format.errors({ stack: true }),
      format.printf(({ level, message }) => (level === 'info' ? String(message) : `${level}: ${String(message)}`)),
    ),
    transports: [
      new transports.Console({
        stderrLevels: LEVELS,
      }),
    ],
  });
}
