/**
 * BigQuerySchemaCatalog - Column listings from INFORMATION_SCHEMA
 *
 * Reads `<project>.<dataset>.INFORMATION_SCHEMA.COLUMNS` of the tenant's
 * source dataset, in ordinal order. A missing dataset or table yields an
 * empty listing; every other failure is CATALOG_UNAVAILABLE.
 *
 * @module packages/adapters/warehouse/bigquery-schema-catalog
 */

import type { Logger } from 'pino';
import type { TenantRef } from '@silvermerge/core/domain';
import {
  ConsolidationError,
  ConsolidationErrorCode,
  errorMessage,
} from '@silvermerge/core/domain';
import type { CatalogColumn, ISchemaCatalog } from '@silvermerge/core/ports';

import { isNotFound, quotePath, type WarehouseQueryClient } from './query-client.js';

export interface BigQuerySchemaCatalogConfig {
  client: WarehouseQueryClient;
  logger: Logger;

  /** Job location, e.g. 'US' */
  location: string;
}

interface ColumnRow {
  column_name: string;
  data_type: string;
}

function isColumnRow(value: unknown): value is ColumnRow {
  return (
    typeof value === 'object' &&
    value !== null &&
    'column_name' in value &&
    typeof value.column_name === 'string' &&
    'data_type' in value &&
    typeof value.data_type === 'string'
  );
}

export class BigQuerySchemaCatalog implements ISchemaCatalog {
  private readonly client: WarehouseQueryClient;
  private readonly logger: Logger;
  private readonly location: string;

  constructor(config: BigQuerySchemaCatalogConfig) {
    this.client = config.client;
    this.logger = config.logger.child({ component: 'BigQuerySchemaCatalog' });
    this.location = config.location;
  }

  async listColumns(tenant: TenantRef, tableName: string): Promise<CatalogColumn[]> {
    const source = quotePath([tenant.projectId, tenant.sourceDataset, 'INFORMATION_SCHEMA', 'COLUMNS']);
    const query = [
      'SELECT column_name, data_type',
      `FROM ${source}`,
      'WHERE table_name = @tableName',
      'ORDER BY ordinal_position',
    ].join('\n');

    let result: unknown[];
    try {
      result = await this.client.query({ query, params: { tableName }, location: this.location });
    } catch (error) {
      if (isNotFound(error)) {
        this.logger.debug(
          { tenantId: tenant.tenantId, dataset: tenant.sourceDataset },
          'Source dataset not found'
        );
        return [];
      }
      throw new ConsolidationError(
        ConsolidationErrorCode.CATALOG_UNAVAILABLE,
        `INFORMATION_SCHEMA read failed for ${tenant.projectId}.${tenant.sourceDataset}: ${errorMessage(error)}`,
        { tenantId: tenant.tenantId, tableName }
      );
    }

    const rows = Array.isArray(result[0]) ? result[0] : [];
    return rows.filter(isColumnRow).map((row) => ({
      name: row.column_name,
      dataType: row.data_type,
      repeated: row.data_type.toUpperCase().startsWith('ARRAY<'),
    }));
  }
}
