#!/usr/bin/env node

/**
 * statuswatch — Command Line Interface
 *
 * @module cli
 */

import { realpathSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { Command } from 'commander';
import { registerRunCommands, type CommandDeps } from './commands/run.js';
import { registerTestEmailCommand } from './commands/test-email.js';

export function createProgram(deps: CommandDeps = {}): Command {
  const program = new Command();

  program
    .name('statuswatch')
    .description('Watch network map dashboards and email once per transition into error')
    .version('1.0.0');

  registerRunCommands(program, deps);
  registerTestEmailCommand(program, deps);

  return program;
}

function invokedDirectly(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return realpathSync(entry) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

if (invokedDirectly()) {
  createProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      process.stderr.write(`Error: ${error instanceof Error ? error.message : String(error)}\n`);
      process.exitCode = 1;
    });
}
