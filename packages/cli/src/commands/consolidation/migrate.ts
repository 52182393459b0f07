/**
 * Migrate Command - smerge migrate
 *
 * Creates (or drops) the control-plane tables.
 *
 * @module packages/cli/commands/consolidation/migrate
 */

import chalk from 'chalk';
import { migrateConsolidation, rollbackConsolidation } from '@silvermerge/adapters/storage';
import {
  closeConsolidationContext,
  getConsolidationContext,
  handleError,
} from './utils.js';

export interface MigrateCommandOptions {
  rollback?: boolean;
  json?: boolean;
  quiet?: boolean;
}

/**
 * Executes the migrate command
 */
export async function migrateCommand(options: MigrateCommandOptions): Promise<void> {
  try {
    const { sql, logger } = getConsolidationContext(options.quiet);

    if (options.rollback) {
      await rollbackConsolidation(sql, logger);
    } else {
      await migrateConsolidation(sql, logger);
    }

    const action = options.rollback ? 'rolled back' : 'applied';
    if (options.json) {
      console.log(JSON.stringify({ success: true, migration: '001_consolidation', action }, null, 2));
    } else if (!options.quiet) {
      console.log(chalk.green(`✓ Migration 001_consolidation ${action}`));
    }
  } catch (error) {
    await closeConsolidationContext();
    handleError(error, options.json);
  }

  await closeConsolidationContext();
}
