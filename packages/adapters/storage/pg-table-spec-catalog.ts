/**
 * PgTableSpecCatalog - Consolidated table specs from PostgreSQL
 *
 * @module packages/adapters/storage/pg-table-spec-catalog
 */

import type { Logger } from 'pino';
import type postgres from 'postgres';
import type { ConsolidatedTableSpec } from '@silvermerge/core/domain';
import type { ITableSpecCatalog } from '@silvermerge/core/ports';

import type { ConsolidatedTableSpecRow } from './consolidation-schema.js';

export interface PgTableSpecCatalogConfig {
  sql: postgres.Sql;
  logger: Logger;
}

type SpecRow = Omit<ConsolidatedTableSpecRow, 'createdAt' | 'updatedAt'>;

export class PgTableSpecCatalog implements ITableSpecCatalog {
  private readonly sql: postgres.Sql;
  private readonly logger: Logger;

  constructor(config: PgTableSpecCatalogConfig) {
    this.sql = config.sql;
    this.logger = config.logger.child({ component: 'PgTableSpecCatalog' });
  }

  async listSpecs(options: { activeOnly?: boolean } = {}): Promise<ConsolidatedTableSpec[]> {
    const rows = options.activeOnly
      ? await this.sql<SpecRow[]>`
          SELECT table_name AS "tableName", partition_fields AS "partitionFields",
            cluster_fields AS "clusterFields", update_strategy AS "updateStrategy",
            merge_key_fields AS "mergeKeyFields", active
          FROM consolidated_table_specs
          WHERE active = TRUE
          ORDER BY table_name
        `
      : await this.sql<SpecRow[]>`
          SELECT table_name AS "tableName", partition_fields AS "partitionFields",
            cluster_fields AS "clusterFields", update_strategy AS "updateStrategy",
            merge_key_fields AS "mergeKeyFields", active
          FROM consolidated_table_specs
          ORDER BY table_name
        `;

    this.logger.debug({ count: rows.length, activeOnly: options.activeOnly ?? false }, 'Specs listed');
    return rows.map(rowToSpec);
  }

  async getSpec(tableName: string): Promise<ConsolidatedTableSpec | null> {
    const rows = await this.sql<SpecRow[]>`
      SELECT table_name AS "tableName", partition_fields AS "partitionFields",
        cluster_fields AS "clusterFields", update_strategy AS "updateStrategy",
        merge_key_fields AS "mergeKeyFields", active
      FROM consolidated_table_specs
      WHERE table_name = ${tableName}
    `;

    if (rows.length === 0) {
      return null;
    }
    return rowToSpec(rows[0]);
  }
}

function rowToSpec(row: SpecRow): ConsolidatedTableSpec {
  return {
    tableName: row.tableName,
    partitionFields: row.partitionFields,
    clusterFields: row.clusterFields,
    updateStrategy: row.updateStrategy,
    mergeKeyFields: row.mergeKeyFields,
    active: row.active,
  };
}
