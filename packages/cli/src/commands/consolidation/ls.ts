/**
 * List Command - smerge ls
 *
 * Lists consolidation records with a given status.
 *
 * @module packages/cli/commands/consolidation/ls
 */

import chalk from 'chalk';
import Table from 'cli-table3';
import {
  CONSOLIDATION_STATUSES,
  ConsolidationError,
  ConsolidationErrorCode,
  type ConsolidationRecord,
  type ConsolidationStatus,
} from '@silvermerge/core/domain';
import {
  closeConsolidationContext,
  formatDate,
  getConsolidationContext,
  handleError,
} from './utils.js';

export interface ListCommandOptions {
  status: string;
  table?: string;
  json?: boolean;
  quiet?: boolean;
}

/**
 * Validate a status flag (case-insensitive)
 */
export function parseStatus(value: string): ConsolidationStatus {
  const status = CONSOLIDATION_STATUSES.find((candidate) => candidate === value.toUpperCase());
  if (!status) {
    throw new ConsolidationError(
      ConsolidationErrorCode.INVALID_CONFIG,
      `Invalid status "${value}". Use one of: ${CONSOLIDATION_STATUSES.join(', ')}`,
      { value }
    );
  }
  return status;
}

function toJson(record: ConsolidationRecord) {
  return {
    tenantId: record.tenantId,
    tableName: record.tableName,
    status: record.status,
    sourcePresent: record.sourcePresent,
    errorMessage: record.errorMessage,
    updatedAt: record.updatedAt.toISOString(),
    completedAt: record.completedAt?.toISOString() ?? null,
  };
}

/**
 * Executes the list command
 */
export async function listCommand(options: ListCommandOptions): Promise<void> {
  try {
    const status = parseStatus(options.status);
    const { orchestrator } = getConsolidationContext(options.quiet);
    const records = await orchestrator.tracker.listByStatus(status, options.table);

    if (options.json) {
      console.log(
        JSON.stringify({ success: true, count: records.length, records: records.map(toJson) }, null, 2)
      );
    } else if (records.length === 0) {
      if (!options.quiet) {
        console.log(chalk.yellow(`No ${status} records found.`));
      }
    } else if (options.quiet) {
      for (const record of records) {
        console.log(`${record.tableName}\t${record.tenantId}`);
      }
    } else {
      const table = new Table({
        head: [
          chalk.bold('Table'),
          chalk.bold('Tenant'),
          chalk.bold('Source'),
          chalk.bold('Updated'),
          chalk.bold('Error'),
        ],
        style: { head: [], border: [] },
      });
      for (const record of records) {
        table.push([
          record.tableName,
          record.tenantId,
          record.sourcePresent ? 'present' : chalk.dim('absent'),
          formatDate(record.updatedAt),
          record.errorMessage ? chalk.red(record.errorMessage) : '-',
        ]);
      }
      console.log(table.toString());
      console.log(chalk.dim(`${records.length} record(s)`));
    }
  } catch (error) {
    await closeConsolidationContext();
    handleError(error, options.json);
  }

  await closeConsolidationContext();
}
