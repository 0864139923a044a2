#!/usr/bin/env tsx

import { Command } from 'commander';

import { createServeCommand } from './commands/serve.js';
import { createListCommand } from './commands/list.js';
import { createExportCommand } from './commands/export.js';
import { createImportCommand } from './commands/import.js';

// Build the CLI program
const program = new Command()
  .name('tasklane')
  .description('Single-user task manager: HTTP API and local tools')
  .version('0.1.0')
  .option('--config <path>', 'Config file (default: $TASKLANE_CONFIG, ./config.yaml, ./config.yaml.example)')
  .option('--db <path>', 'Database file (overrides the config)');

// Register commands
program.addCommand(createServeCommand());
program.addCommand(createListCommand());
program.addCommand(createExportCommand());
program.addCommand(createImportCommand());

await program.parseAsync();
