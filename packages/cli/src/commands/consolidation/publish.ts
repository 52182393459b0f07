/**
 * Publish Command - smerge publish
 *
 * Publishes central views and consolidated tables without processing
 * tenant pairs.
 *
 * @module packages/cli/commands/consolidation/publish
 */

import chalk from 'chalk';
import ora from 'ora';
import {
  closeConsolidationContext,
  getConsolidationContext,
  handleError,
  isInteractive,
} from './utils.js';

export interface PublishCommandOptions {
  json?: boolean;
  quiet?: boolean;
}

/**
 * Executes the publish command
 *
 * @param tables - Tables to publish (every active table when empty)
 */
export async function publishCommand(
  tables: string[],
  options: PublishCommandOptions
): Promise<void> {
  const spinner = isInteractive() && !options.json && !options.quiet ? ora() : null;

  try {
    const { orchestrator } = getConsolidationContext(options.quiet);

    spinner?.start('Publishing central views...');
    const results = await orchestrator.publish(tables.length > 0 ? tables : undefined);
    spinner?.stop();

    if (options.json) {
      console.log(JSON.stringify({ success: true, results }, null, 2));
    } else {
      for (const result of results) {
        if (result.outcome === 'published') {
          console.log(
            chalk.green(`✓ ${result.tableName}`) + chalk.dim(` (${result.tenantIds.length} tenants)`)
          );
        } else if (!options.quiet || result.outcome === 'failed') {
          const color = result.outcome === 'failed' ? chalk.red : chalk.yellow;
          console.log(color(`- ${result.tableName}: ${result.outcome} (${result.reason ?? 'unknown'})`));
        }
      }
    }

    if (results.some((result) => result.outcome === 'failed')) {
      process.exitCode = 1;
    }
  } catch (error) {
    spinner?.fail('Publication failed');
    await closeConsolidationContext();
    handleError(error, options.json);
  }

  await closeConsolidationContext();
}
