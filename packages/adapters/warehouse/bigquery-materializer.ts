/**
 * BigQueryMaterializer - Executes rendered definitions
 *
 * Runs the statements of a RenderedStatement in order as query jobs.
 *
 * @module packages/adapters/warehouse/bigquery-materializer
 */

import type { Logger } from 'pino';
import type { RenderedStatement } from '@silvermerge/core/domain';
import {
  ConsolidationError,
  ConsolidationErrorCode,
  errorMessage,
} from '@silvermerge/core/domain';
import type { IViewMaterializer } from '@silvermerge/core/ports';

import type { WarehouseQueryClient } from './query-client.js';

export interface BigQueryMaterializerConfig {
  client: WarehouseQueryClient;
  logger: Logger;
  location: string;
}

export class BigQueryMaterializer implements IViewMaterializer {
  private readonly client: WarehouseQueryClient;
  private readonly logger: Logger;
  private readonly location: string;

  constructor(config: BigQueryMaterializerConfig) {
    this.client = config.client;
    this.logger = config.logger.child({ component: 'BigQueryMaterializer' });
    this.location = config.location;
  }

  async materialize(statement: RenderedStatement): Promise<void> {
    const { projectId, datasetId, tableId } = statement.target;
    const target = `${projectId}.${datasetId}.${tableId}`;

    for (const [index, query] of statement.statements.entries()) {
      try {
        await this.client.query({ query, location: this.location });
      } catch (error) {
        throw new ConsolidationError(
          ConsolidationErrorCode.MATERIALIZATION_FAILED,
          `Failed to materialize ${statement.kind} ${target}: ${errorMessage(error)}`,
          { target, statement: index }
        );
      }
    }

    this.logger.info({ target, kind: statement.kind, statements: statement.statements.length }, 'Materialized');
  }
}
