#!/usr/bin/env node
/**
 * termcoder CLI - Terminal coding assistant with file tools
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';

import { chatCommand } from './commands/chat.js';
import { configCommand } from './commands/config.js';
import { logsCommand } from './commands/logs.js';

const packagePath = join(dirname(fileURLToPath(import.meta.url)), '../../package.json');

function readVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(packagePath, 'utf-8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

/**
 * Creates and configures the CLI program; without a subcommand it starts a chat
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('termcoder')
    .description('Terminal coding assistant that can read, list and edit files')
    .version(readVersion(), '-v, --version', 'Display version number');

  chatCommand(program);
  program.addCommand(configCommand());
  program.addCommand(logsCommand());

  return program;
}

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  });
