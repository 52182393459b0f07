/**
 * Plan Command - smerge plan
 *
 * Reconciles a table across the fleet and prints its canonical layout and
 * rendered SQL. Nothing is materialized and the tracker is not touched.
 *
 * @module packages/cli/commands/consolidation/plan
 */

import chalk from 'chalk';
import Table from 'cli-table3';
import {
  closeConsolidationContext,
  getConsolidationContext,
  handleError,
} from './utils.js';

export interface PlanCommandOptions {
  tenant?: string;
  json?: boolean;
  quiet?: boolean;
}

/**
 * Executes the plan command
 */
export async function planCommand(tableName: string, options: PlanCommandOptions): Promise<void> {
  try {
    const { orchestrator } = getConsolidationContext(options.quiet);
    const plan = await orchestrator.plan(tableName, { tenantId: options.tenant });

    if (options.json) {
      console.log(JSON.stringify({ success: true, plan }, null, 2));
      await closeConsolidationContext();
      return;
    }

    const { layout } = plan;
    console.log(chalk.bold(`Layout of ${layout.tableName}`) + chalk.dim(` (${layout.fingerprint.slice(0, 12)})`));
    console.log(`  Tenants: ${layout.tenantCount}  Fields: ${layout.fields.length}`);

    const fields = new Table({
      head: [
        chalk.bold('#'),
        chalk.bold('Field'),
        chalk.bold('Type'),
        chalk.bold('Sources'),
        chalk.bold('Present'),
        chalk.bold('Flags'),
      ],
      style: { head: [], border: [] },
    });
    for (const field of layout.fields) {
      const flags = [field.hasTypeConflict ? chalk.yellow('conflict') : '', field.isPartial ? 'partial' : '']
        .filter((flag) => flag.length > 0)
        .join(' ');
      fields.push([
        String(field.fieldOrder),
        field.name,
        field.isRepeated ? `ARRAY<${field.targetType}>` : field.targetType,
        field.sourceTypes.join(', '),
        `${field.presentIn}/${layout.tenantCount}`,
        flags || '-',
      ]);
    }
    console.log(fields.toString());

    if (plan.absentTenantIds.length > 0) {
      console.log(chalk.dim(`Absent for: ${plan.absentTenantIds.join(', ')}`));
    }
    for (const [tenantId, reason] of Object.entries(plan.failures)) {
      console.log(chalk.red(`Tenant ${tenantId}: ${reason}`));
    }

    for (const statement of plan.statements) {
      const { projectId, datasetId, tableId } = statement.target;
      console.log();
      console.log(chalk.cyan(`-- ${statement.kind} ${projectId}.${datasetId}.${tableId}`));
      console.log(statement.statements.join(';\n\n') + ';');
    }
  } catch (error) {
    await closeConsolidationContext();
    handleError(error, options.json);
  }

  await closeConsolidationContext();
}
