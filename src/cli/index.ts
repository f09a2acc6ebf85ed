#!/usr/bin/env node
/**
 * tutor-command - Command-line interface for the Tutor Command Center
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import { startCommand } from './commands/start.js';
import { runCommand } from './commands/run.js';
import { sendCommand } from './commands/send.js';
import { configCommand } from './commands/config.js';
import { logsCommand } from './commands/logs.js';

function readVersion(): string {
  // src/cli when run from sources, dist/src/cli once built
  const here = dirname(fileURLToPath(import.meta.url));
  for (const candidate of [join(here, '../../package.json'), join(here, '../../../package.json')]) {
    try {
      const pkg: unknown = JSON.parse(readFileSync(candidate, 'utf-8'));
      if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
        return pkg.version;
      }
    } catch {
      continue;
    }
  }
  return '0.0.0';
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('tutor-command')
    .description('Carry out tutor instructions written in plain language against student records')
    .version(readVersion(), '-v, --version', 'Display version number');

  program.addCommand(startCommand());
  program.addCommand(runCommand());
  program.addCommand(sendCommand());
  program.addCommand(configCommand());
  program.addCommand(logsCommand());

  return program;
}

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : String(error));
    process.exit(1);
  });
