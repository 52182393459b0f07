/**
 * Consolidation Commands
 *
 * Registers the smerge subcommands on the root program. Each subcommand
 * loads its implementation lazily.
 *
 * @module packages/cli/commands/consolidation
 */

import type { Command } from 'commander';
import type { RunCommandOptions } from './run.js';
import type { PublishCommandOptions } from './publish.js';
import type { PlanCommandOptions } from './plan.js';
import type { StatusCommandOptions } from './status.js';
import type { ListCommandOptions } from './ls.js';
import type { ResetCommandOptions } from './reset.js';
import type { MigrateCommandOptions } from './migrate.js';
import { collect } from './utils.js';

/**
 * Quiet flag of the root program
 */
function isQuiet(parent: Command): boolean {
  return parent.optsWithGlobals().quiet === true;
}

/**
 * Registers every consolidation subcommand
 */
export function registerConsolidationCommands(parent: Command): void {
  registerRunCommand(parent);
  registerPublishCommand(parent);
  registerPlanCommand(parent);
  registerStatusCommand(parent);
  registerLsCommand(parent);
  registerResetCommand(parent);
  registerMigrateCommand(parent);
}

/**
 * Registers the 'run' subcommand
 */
function registerRunCommand(parent: Command): void {
  parent
    .command('run')
    .description('Build tenant views for every pending (table, tenant) pair')
    .option('-f, --from <table>', 'Skip tables ordered before this name')
    .option('-s, --shard <index/count>', 'Process one shard of the work set, e.g. 0/4')
    .option('-r, --resume', 'Continue after the shard checkpoint')
    .option('-t, --table <name>', 'Restrict to a table (repeatable)', collect)
    .option('--publish', 'Publish central views after processing')
    .option('--no-publish', 'Skip central view publication')
    .option('--json', 'Output as JSON')
    .action(async (options: RunCommandOptions) => {
      const { runCommand } = await import('./run.js');
      await runCommand({ ...options, quiet: isQuiet(parent) });
    });
}

/**
 * Registers the 'publish' subcommand
 */
function registerPublishCommand(parent: Command): void {
  parent
    .command('publish [tables...]')
    .description('Publish central views and consolidated tables')
    .option('--json', 'Output as JSON')
    .action(async (tables: string[], options: PublishCommandOptions) => {
      const { publishCommand } = await import('./publish.js');
      await publishCommand(tables, { ...options, quiet: isQuiet(parent) });
    });
}

/**
 * Registers the 'plan' subcommand
 */
function registerPlanCommand(parent: Command): void {
  parent
    .command('plan <table>')
    .description('Show the canonical layout and rendered SQL of a table')
    .option('--tenant <id>', 'Render only this tenant view')
    .option('--json', 'Output as JSON')
    .action(async (table: string, options: PlanCommandOptions) => {
      const { planCommand } = await import('./plan.js');
      await planCommand(table, { ...options, quiet: isQuiet(parent) });
    });
}

/**
 * Registers the 'status' subcommand
 */
function registerStatusCommand(parent: Command): void {
  parent
    .command('status')
    .description('Show per-table completion')
    .option('-t, --table <name>', 'Only this table')
    .option('--json', 'Output as JSON')
    .action(async (options: StatusCommandOptions) => {
      const { statusCommand } = await import('./status.js');
      await statusCommand({ ...options, quiet: isQuiet(parent) });
    });
}

/**
 * Registers the 'ls' subcommand
 */
function registerLsCommand(parent: Command): void {
  parent
    .command('ls')
    .description('List consolidation records by status')
    .requiredOption('-s, --status <status>', 'PENDING, COMPLETED or ERROR')
    .option('-t, --table <name>', 'Only this table')
    .option('--json', 'Output as JSON')
    .action(async (options: ListCommandOptions) => {
      const { listCommand } = await import('./ls.js');
      await listCommand({ ...options, quiet: isQuiet(parent) });
    });
}

/**
 * Registers the 'reset' subcommand
 */
function registerResetCommand(parent: Command): void {
  parent
    .command('reset')
    .description('Reset consolidation records to PENDING')
    .option('-t, --table <name>', 'Only this table (default: every table)')
    .option('-y, --yes', 'Skip confirmation prompt')
    .option('--json', 'Output as JSON')
    .action(async (options: ResetCommandOptions) => {
      const { resetCommand } = await import('./reset.js');
      await resetCommand({ ...options, quiet: isQuiet(parent) });
    });
}

/**
 * Registers the 'migrate' subcommand
 */
function registerMigrateCommand(parent: Command): void {
  parent
    .command('migrate')
    .description('Create the control-plane tables')
    .option('--rollback', 'Drop the control-plane tables instead')
    .option('--json', 'Output as JSON')
    .action(async (options: MigrateCommandOptions) => {
      const { migrateCommand } = await import('./migrate.js');
      await migrateCommand({ ...options, quiet: isQuiet(parent) });
    });
}
