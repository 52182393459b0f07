/**
 * CLI Commands Registry
 *
 * Registers global options and every command with the main program.
 *
 * @module packages/cli/commands
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import { registerConsolidationCommands } from './consolidation/index.js';
import { shouldUseColor } from './consolidation/utils.js';

/**
 * Registers all commands with the program
 *
 * @param program - Commander program instance
 */
export function registerCommands(program: Command): void {
  program
    .option('--no-color', 'Disable colored output')
    .option('-q, --quiet', 'Suppress non-essential output')
    .hook('preAction', (thisCommand) => {
      const opts = thisCommand.optsWithGlobals();
      // --no-color, NO_COLOR, TERM=dumb or non-TTY
      if (opts.color === false || !shouldUseColor()) {
        chalk.level = 0;
      }
    })
    .addHelpText(
      'after',
      `
Examples:
  $ smerge migrate                         Create the control-plane tables
  $ smerge plan invoices                   Show layout and SQL of a table
  $ smerge run                             Process every pending pair and publish
  $ smerge run --shard 0/4 --resume        Process one shard, resuming its checkpoint
  $ smerge run --table invoices --table jobs
  $ smerge publish invoices                Republish one central view
  $ smerge status --json                   Completion per table as JSON
  $ smerge ls --status ERROR               Failed pairs with their messages
  $ smerge reset --table invoices --yes    Rebuild every tenant view of a table
`
    );

  registerConsolidationCommands(program);
}

export { registerConsolidationCommands };
