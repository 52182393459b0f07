/**
 * Reset Command - smerge reset
 *
 * Moves consolidation records back to PENDING so the next run rebuilds
 * their tenant views.
 *
 * @module packages/cli/commands/consolidation/reset
 */

import chalk from 'chalk';
import * as readline from 'readline';
import {
  closeConsolidationContext,
  getConsolidationContext,
  handleError,
  isInteractive,
} from './utils.js';

export interface ResetCommandOptions {
  table?: string;
  yes?: boolean;
  json?: boolean;
  quiet?: boolean;
}

/**
 * Prompts for confirmation
 */
async function confirm(message: string): Promise<boolean> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  return new Promise((resolve) => {
    rl.question(`${message} [y/N] `, (answer) => {
      rl.close();
      resolve(answer.toLowerCase() === 'y' || answer.toLowerCase() === 'yes');
    });
  });
}

/**
 * Executes the reset command
 */
export async function resetCommand(options: ResetCommandOptions): Promise<void> {
  try {
    const scope = options.table ? `table ${options.table}` : 'ALL tables';

    if (!options.yes) {
      if (options.json || !isInteractive()) {
        throw new Error('Refusing to reset without confirmation. Pass --yes.');
      }
      const confirmed = await confirm(`Reset consolidation records of ${scope} to PENDING?`);
      if (!confirmed) {
        console.log(chalk.yellow('Reset cancelled.'));
        return;
      }
    }

    const { orchestrator } = getConsolidationContext(options.quiet);
    const count = await orchestrator.tracker.reset({ tableName: options.table });

    if (options.json) {
      console.log(JSON.stringify({ success: true, reset: count, table: options.table ?? null }, null, 2));
    } else if (!options.quiet) {
      console.log(chalk.green(`✓ Reset ${count} record(s) of ${scope}`));
    }
  } catch (error) {
    await closeConsolidationContext();
    handleError(error, options.json);
  }

  await closeConsolidationContext();
}
