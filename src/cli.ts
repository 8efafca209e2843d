#!/usr/bin/env node
import { readFileSync, realpathSync } from 'node:fs';
import { pathToFileURL } from 'node:url';
import { Command } from 'commander';
import dotenv from 'dotenv';
import { z } from 'zod';
import { registerGenerateCommand } from './commands/generate.js';

const packageInfoSchema = z.object({
  name: z.string(),
  version: z.string(),
  description: z.string().optional(),
});

function readPackageInfo() {
  const raw: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf8'));
  return packageInfoSchema.parse(raw);
}

export function buildProgram(env: NodeJS.ProcessEnv = process.env): Command {
  const pkg = readPackageInfo();
  const program = new Command();
  program
    .name('workday-timesheet')
    .description(pkg.description || 'Generate a weekday timesheet CSV')
    .version(pkg.version);

  registerGenerateCommand(program, env);
  return program;
}

export async function runCLI(argv: string[], env: NodeJS.ProcessEnv = process.env) {
  await buildProgram(env).parseAsync(argv);
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return pathToFileURL(realpathSync(entry)).href === import.meta.url;
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  dotenv.config();
  runCLI(process.argv).catch((err: unknown) => {
    console.error(err instanceof Error ? err.stack || err.message : String(err));
    process.exit(1);
  });
}
