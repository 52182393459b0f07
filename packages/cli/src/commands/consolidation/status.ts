/**
 * Status Command - smerge status
 *
 * Per-table completion summary from the consolidation tracker.
 *
 * @module packages/cli/commands/consolidation/status
 */

import chalk from 'chalk';
import Table from 'cli-table3';
import type { TableCompletion } from '@silvermerge/core/domain';
import {
  closeConsolidationContext,
  formatRate,
  getConsolidationContext,
  handleError,
} from './utils.js';

export interface StatusCommandOptions {
  table?: string;
  json?: boolean;
  quiet?: boolean;
}

function rateColor(completion: TableCompletion): string {
  const rate = formatRate(completion.completionRate);
  if (completion.isFullyConsolidated) {
    return chalk.green(rate);
  }
  return completion.errored > 0 ? chalk.red(rate) : chalk.yellow(rate);
}

/**
 * Executes the status command
 */
export async function statusCommand(options: StatusCommandOptions): Promise<void> {
  try {
    const { orchestrator } = getConsolidationContext(options.quiet);
    const summaries = await orchestrator.tracker.summarize(options.table);

    if (options.json) {
      console.log(JSON.stringify({ success: true, count: summaries.length, tables: summaries }, null, 2));
    } else if (summaries.length === 0) {
      if (!options.quiet) {
        console.log(chalk.yellow('No consolidation records found.'));
        console.log(chalk.dim('Start a run with: smerge run'));
      }
    } else {
      const table = new Table({
        head: [
          chalk.bold('Table'),
          chalk.bold('Total'),
          chalk.bold('Completed'),
          chalk.bold('Pending'),
          chalk.bold('Errored'),
          chalk.bold('Absent'),
          chalk.bold('Rate'),
        ],
        style: { head: [], border: [] },
      });

      for (const summary of summaries) {
        table.push([
          summary.tableName,
          String(summary.total),
          String(summary.completed),
          String(summary.pending),
          String(summary.errored),
          String(summary.absent),
          rateColor(summary),
        ]);
      }

      console.log(table.toString());
    }
  } catch (error) {
    await closeConsolidationContext();
    handleError(error, options.json);
  }

  await closeConsolidationContext();
}
