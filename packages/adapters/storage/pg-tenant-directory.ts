/**
 * PgTenantDirectory - Tenant directory from PostgreSQL
 *
 * Tenants without an explicit source dataset read from the dataset named
 * after their project: the configured prefix plus the project id with
 * hyphens replaced by underscores.
 *
 * @module packages/adapters/storage/pg-tenant-directory
 */

import type { Logger } from 'pino';
import type postgres from 'postgres';
import type { TenantRef } from '@silvermerge/core/domain';
import type { ITenantDirectory } from '@silvermerge/core/ports';

import type { TenantRow } from './consolidation-schema.js';

export interface PgTenantDirectoryConfig {
  sql: postgres.Sql;
  logger: Logger;

  /** Prefix of derived source datasets, e.g. 'tenant_' */
  datasetPrefix: string;
}

type DirectoryRow = Omit<TenantRow, 'createdAt'>;

/**
 * Dataset a tenant's tables land in when none is recorded
 */
export function defaultSourceDataset(prefix: string, projectId: string): string {
  return `${prefix}${projectId.replace(/-/g, '_')}`;
}

export class PgTenantDirectory implements ITenantDirectory {
  private readonly sql: postgres.Sql;
  private readonly logger: Logger;
  private readonly datasetPrefix: string;

  constructor(config: PgTenantDirectoryConfig) {
    this.sql = config.sql;
    this.logger = config.logger.child({ component: 'PgTenantDirectory' });
    this.datasetPrefix = config.datasetPrefix;
  }

  async listTenants(options: { activeOnly?: boolean } = {}): Promise<TenantRef[]> {
    const rows = options.activeOnly
      ? await this.sql<DirectoryRow[]>`
          SELECT tenant_id AS "tenantId", display_name AS "displayName",
            project_id AS "projectId", source_dataset AS "sourceDataset", active
          FROM tenants
          WHERE active = TRUE
          ORDER BY tenant_id
        `
      : await this.sql<DirectoryRow[]>`
          SELECT tenant_id AS "tenantId", display_name AS "displayName",
            project_id AS "projectId", source_dataset AS "sourceDataset", active
          FROM tenants
          ORDER BY tenant_id
        `;

    this.logger.debug({ count: rows.length }, 'Tenants listed');
    return rows.map((row) => ({
      tenantId: row.tenantId,
      displayName: row.displayName,
      projectId: row.projectId,
      sourceDataset: row.sourceDataset ?? defaultSourceDataset(this.datasetPrefix, row.projectId),
    }));
  }
}
