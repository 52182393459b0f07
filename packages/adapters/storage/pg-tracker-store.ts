/**
 * PgTrackerStore - PostgreSQL consolidation record persistence
 *
 * Implements ITrackerStore over the consolidation_records table with
 * postgres.js. Every write is a single-row upsert keyed by
 * (tenant_id, table_name); the last write wins.
 *
 * @module packages/adapters/storage/pg-tracker-store
 */

import type { Logger } from 'pino';
import type postgres from 'postgres';
import type {
  ConsolidationKey,
  ConsolidationRecord,
  ConsolidationRecordWrite,
  ConsolidationStatus,
  TableStatusCounts,
} from '@silvermerge/core/domain';
import type { ITrackerStore } from '@silvermerge/core/ports';

import type { ConsolidationRecordRow } from './consolidation-schema.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Configuration for PgTrackerStore
 */
export interface PgTrackerStoreConfig {
  /** PostgreSQL client (postgres.js) */
  sql: postgres.Sql;

  /** Logger instance */
  logger: Logger;
}

// =============================================================================
// PgTrackerStore
// =============================================================================

export class PgTrackerStore implements ITrackerStore {
  private readonly sql: postgres.Sql;
  private readonly logger: Logger;

  constructor(config: PgTrackerStoreConfig) {
    this.sql = config.sql;
    this.logger = config.logger.child({ component: 'PgTrackerStore' });
  }

  async get(key: ConsolidationKey): Promise<ConsolidationRecord | null> {
    const rows = await this.sql<ConsolidationRecordRow[]>`
      SELECT tenant_id AS "tenantId", table_name AS "tableName", status,
        error_message AS "errorMessage", source_present AS "sourcePresent",
        layout_fingerprint AS "layoutFingerprint",
        created_at AS "createdAt", updated_at AS "updatedAt", completed_at AS "completedAt"
      FROM consolidation_records
      WHERE tenant_id = ${key.tenantId} AND table_name = ${key.tableName}
    `;

    if (rows.length === 0) {
      return null;
    }
    return rowToRecord(rows[0]);
  }

  async ensure(
    key: ConsolidationKey,
    sourcePresent: boolean,
    at: Date
  ): Promise<ConsolidationRecord> {
    const rows = await this.sql<ConsolidationRecordRow[]>`
      INSERT INTO consolidation_records (
        tenant_id, table_name, status, source_present, created_at, updated_at
      )
      VALUES (${key.tenantId}, ${key.tableName}, 'PENDING', ${sourcePresent}, ${at}, ${at})
      ON CONFLICT (tenant_id, table_name) DO UPDATE
        SET source_present = EXCLUDED.source_present,
            updated_at = EXCLUDED.updated_at
        WHERE consolidation_records.status = 'PENDING'
      RETURNING tenant_id AS "tenantId", table_name AS "tableName", status,
        error_message AS "errorMessage", source_present AS "sourcePresent",
        layout_fingerprint AS "layoutFingerprint",
        created_at AS "createdAt", updated_at AS "updatedAt", completed_at AS "completedAt"
    `;

    if (rows.length > 0) {
      return rowToRecord(rows[0]);
    }

    // Existing non-PENDING record left untouched
    const existing = await this.get(key);
    if (!existing) {
      throw new Error(`Record ${key.tenantId}/${key.tableName} vanished during ensure`);
    }
    return existing;
  }

  async upsert(write: ConsolidationRecordWrite): Promise<ConsolidationRecord> {
    const completedAt = write.status === 'COMPLETED' ? write.at : null;

    const rows = await this.sql<ConsolidationRecordRow[]>`
      INSERT INTO consolidation_records (
        tenant_id, table_name, status, error_message, source_present,
        layout_fingerprint, created_at, updated_at, completed_at
      )
      VALUES (
        ${write.tenantId},
        ${write.tableName},
        ${write.status},
        ${write.errorMessage},
        ${write.sourcePresent},
        ${write.layoutFingerprint},
        ${write.at},
        ${write.at},
        ${completedAt}
      )
      ON CONFLICT (tenant_id, table_name) DO UPDATE
        SET status = EXCLUDED.status,
            error_message = EXCLUDED.error_message,
            source_present = EXCLUDED.source_present,
            layout_fingerprint = EXCLUDED.layout_fingerprint,
            updated_at = EXCLUDED.updated_at,
            completed_at = EXCLUDED.completed_at
      RETURNING tenant_id AS "tenantId", table_name AS "tableName", status,
        error_message AS "errorMessage", source_present AS "sourcePresent",
        layout_fingerprint AS "layoutFingerprint",
        created_at AS "createdAt", updated_at AS "updatedAt", completed_at AS "completedAt"
    `;

    this.logger.debug(
      { tenantId: write.tenantId, tableName: write.tableName, status: write.status },
      'Consolidation record written'
    );
    return rowToRecord(rows[0]);
  }

  async listForTable(tableName: string): Promise<ConsolidationRecord[]> {
    const rows = await this.sql<ConsolidationRecordRow[]>`
      SELECT tenant_id AS "tenantId", table_name AS "tableName", status,
        error_message AS "errorMessage", source_present AS "sourcePresent",
        layout_fingerprint AS "layoutFingerprint",
        created_at AS "createdAt", updated_at AS "updatedAt", completed_at AS "completedAt"
      FROM consolidation_records
      WHERE table_name = ${tableName}
      ORDER BY tenant_id
    `;
    return rows.map(rowToRecord);
  }

  async listByStatus(
    status: ConsolidationStatus,
    tableName?: string
  ): Promise<ConsolidationRecord[]> {
    let rows: ConsolidationRecordRow[];

    if (tableName) {
      rows = await this.sql<ConsolidationRecordRow[]>`
        SELECT tenant_id AS "tenantId", table_name AS "tableName", status,
          error_message AS "errorMessage", source_present AS "sourcePresent",
          layout_fingerprint AS "layoutFingerprint",
          created_at AS "createdAt", updated_at AS "updatedAt", completed_at AS "completedAt"
        FROM consolidation_records
        WHERE status = ${status} AND table_name = ${tableName}
        ORDER BY table_name, tenant_id
      `;
    } else {
      rows = await this.sql<ConsolidationRecordRow[]>`
        SELECT tenant_id AS "tenantId", table_name AS "tableName", status,
          error_message AS "errorMessage", source_present AS "sourcePresent",
          layout_fingerprint AS "layoutFingerprint",
          created_at AS "createdAt", updated_at AS "updatedAt", completed_at AS "completedAt"
        FROM consolidation_records
        WHERE status = ${status}
        ORDER BY table_name, tenant_id
      `;
    }

    return rows.map(rowToRecord);
  }

  async countByTable(tableName?: string): Promise<TableStatusCounts[]> {
    if (tableName) {
      return this.sql<TableStatusCounts[]>`
        SELECT table_name AS "tableName",
          COUNT(*) FILTER (WHERE status = 'PENDING')::int AS pending,
          COUNT(*) FILTER (WHERE status = 'COMPLETED')::int AS completed,
          COUNT(*) FILTER (WHERE status = 'ERROR')::int AS errored,
          COUNT(*) FILTER (WHERE status = 'PENDING' AND NOT source_present)::int AS absent
        FROM consolidation_records
        WHERE table_name = ${tableName}
        GROUP BY table_name
      `;
    }

    return this.sql<TableStatusCounts[]>`
      SELECT table_name AS "tableName",
        COUNT(*) FILTER (WHERE status = 'PENDING')::int AS pending,
        COUNT(*) FILTER (WHERE status = 'COMPLETED')::int AS completed,
        COUNT(*) FILTER (WHERE status = 'ERROR')::int AS errored,
        COUNT(*) FILTER (WHERE status = 'PENDING' AND NOT source_present)::int AS absent
      FROM consolidation_records
      GROUP BY table_name
      ORDER BY table_name
    `;
  }

  async reset(scope: { tableName?: string }, at: Date): Promise<number> {
    const result = scope.tableName
      ? await this.sql`
          UPDATE consolidation_records
          SET status = 'PENDING', error_message = NULL, completed_at = NULL,
              layout_fingerprint = NULL, updated_at = ${at}
          WHERE table_name = ${scope.tableName}
        `
      : await this.sql`
          UPDATE consolidation_records
          SET status = 'PENDING', error_message = NULL, completed_at = NULL,
              layout_fingerprint = NULL, updated_at = ${at}
        `;

    this.logger.info({ tableName: scope.tableName ?? null, count: result.count }, 'Records reset');
    return result.count;
  }
}

// =============================================================================
// Row Mapping
// =============================================================================

function rowToRecord(row: ConsolidationRecordRow): ConsolidationRecord {
  return {
    tenantId: row.tenantId,
    tableName: row.tableName,
    status: row.status,
    errorMessage: row.errorMessage,
    sourcePresent: row.sourcePresent,
    layoutFingerprint: row.layoutFingerprint,
    createdAt: new Date(row.createdAt),
    updatedAt: new Date(row.updatedAt),
    completedAt: row.completedAt ? new Date(row.completedAt) : null,
  };
}
