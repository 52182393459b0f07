/**
 * Run Command - smerge run
 *
 * Processes the shard's share of the (table, tenant) work set and, for
 * unsharded runs, publishes central views of settled tables.
 *
 * @module packages/cli/commands/consolidation/run
 */

import chalk from 'chalk';
import ora from 'ora';
import Table from 'cli-table3';
import type { BatchSummary } from '@silvermerge/core/domain';
import type { RunOptions } from '@silvermerge/consolidation';
import {
  closeConsolidationContext,
  formatDuration,
  getConsolidationContext,
  handleError,
  isInteractive,
  parseShard,
} from './utils.js';

/**
 * Options for run command
 */
export interface RunCommandOptions {
  from?: string;
  shard?: string;
  resume?: boolean;
  table?: string[];
  publish?: boolean;
  json?: boolean;
  quiet?: boolean;
}

/**
 * Translate CLI flags into orchestrator options
 */
export function toRunOptions(options: RunCommandOptions): RunOptions {
  const runOptions: RunOptions = {
    resume: options.resume ?? false,
  };
  if (options.from) {
    runOptions.startMarker = options.from;
  }
  if (options.shard) {
    Object.assign(runOptions, parseShard(options.shard));
  }
  if (options.table && options.table.length > 0) {
    runOptions.tables = options.table;
  }
  if (options.publish !== undefined) {
    runOptions.publish = options.publish;
  }
  return runOptions;
}

function printSummary(summary: BatchSummary): void {
  console.log(chalk.green(`✓ Run ${summary.runId} finished in ${formatDuration(summary.durationMs)}`));
  console.log(
    `  Completed: ${chalk.green(summary.completed)}  Errored: ${chalk.red(summary.errored)}  ` +
      `Skipped: ${summary.skipped}  Absent: ${chalk.dim(summary.absent)}`
  );
  console.log(`  Tables:    ${summary.tablesProcessed.length}`);

  if (summary.published.length === 0) {
    return;
  }

  const table = new Table({
    head: [chalk.bold('Table'), chalk.bold('Outcome'), chalk.bold('Tenants'), chalk.bold('Reason')],
    style: { head: [], border: [] },
  });
  for (const result of summary.published) {
    const outcome =
      result.outcome === 'published'
        ? chalk.green(result.outcome)
        : result.outcome === 'failed'
          ? chalk.red(result.outcome)
          : chalk.yellow(result.outcome);
    table.push([result.tableName, outcome, String(result.tenantIds.length), result.reason ?? '-']);
  }
  console.log();
  console.log(table.toString());
}

/**
 * Executes the run command
 */
export async function runCommand(options: RunCommandOptions): Promise<void> {
  const spinner = isInteractive() && !options.json && !options.quiet ? ora() : null;

  try {
    const runOptions = toRunOptions(options);
    const { orchestrator } = getConsolidationContext(options.quiet);

    spinner?.start('Consolidating tenant tables...');
    const summary = await orchestrator.run(runOptions);
    spinner?.stop();

    if (options.json) {
      console.log(JSON.stringify({ success: true, summary }, null, 2));
    } else if (!options.quiet) {
      printSummary(summary);
    }
  } catch (error) {
    spinner?.fail('Consolidation run failed');
    await closeConsolidationContext();
    handleError(error, options.json);
  }

  await closeConsolidationContext();
}
