#!/usr/bin/env tsx
/**
 * smerge CLI
 *
 * Entry point for the `smerge` command: tenant schema reconciliation,
 * view generation and consolidation tracking.
 *
 * @module packages/cli/bin/smerge
 */

import 'dotenv/config';
import { Command } from 'commander';
import { registerCommands } from '../commands/index.js';

const program = new Command();

program
  .name('smerge')
  .description('Reconcile tenant table schemas and consolidate them into central views')
  .version('0.1.0');

registerCommands(program);

// Commander suggests the nearest command name on a typo
program.showSuggestionAfterError(true);

await program.parseAsync();
