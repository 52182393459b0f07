/**
 * Consolidation Port Interfaces
 *
 * Defines the contracts between the consolidation engine and the systems it
 * reads from and writes to: the warehouse catalog, the warehouse itself, and
 * the control-plane stores.
 */

import type {
  ConsolidatedTableSpec,
  ConsolidationKey,
  ConsolidationRecord,
  ConsolidationRecordWrite,
  ConsolidationStatus,
  TableStatusCounts,
  TenantRef,
  WorkCursor,
} from '../domain/consolidation.js';
import type { RenderedStatement } from '../domain/statements.js';

// =============================================================================
// Warehouse
// =============================================================================

/**
 * One column as reported by the warehouse catalog.
 */
export interface CatalogColumn {
  name: string;
  /** Declared type string, e.g. 'INT64', 'NUMERIC(10,2)', 'STRUCT<id INT64>' */
  dataType: string;
  /** ARRAY column (mode REPEATED) */
  repeated: boolean;
}

/**
 * ISchemaCatalog reads physical column listings from tenant warehouses.
 */
export interface ISchemaCatalog {
  /**
   * List the columns of a tenant's table in ordinal order.
   *
   * @returns Empty list when the table (or its dataset) does not exist
   * @throws ConsolidationError(CATALOG_UNAVAILABLE) on access failure
   */
  listColumns(tenant: TenantRef, tableName: string): Promise<CatalogColumn[]>;
}

/**
 * IViewMaterializer creates or replaces warehouse views and tables.
 */
export interface IViewMaterializer {
  /**
   * Execute a rendered definition.
   *
   * @throws ConsolidationError(MATERIALIZATION_FAILED) when rejected
   */
  materialize(statement: RenderedStatement): Promise<void>;
}

// =============================================================================
// Control Plane
// =============================================================================

/**
 * ITrackerStore persists consolidation records keyed by (tenantId, tableName).
 *
 * Writes are independent upserts; concurrent writers to distinct keys never
 * conflict and a repeated write to the same key is last-write-wins.
 */
export interface ITrackerStore {
  get(key: ConsolidationKey): Promise<ConsolidationRecord | null>;

  /**
   * Create a PENDING record if none exists.
   * An existing PENDING record only has its source presence refreshed.
   */
  ensure(key: ConsolidationKey, sourcePresent: boolean, at: Date): Promise<ConsolidationRecord>;

  upsert(write: ConsolidationRecordWrite): Promise<ConsolidationRecord>;

  listForTable(tableName: string): Promise<ConsolidationRecord[]>;

  listByStatus(status: ConsolidationStatus, tableName?: string): Promise<ConsolidationRecord[]>;

  countByTable(tableName?: string): Promise<TableStatusCounts[]>;

  /**
   * Move every record in scope to PENDING, clearing error, completion time
   * and layout fingerprint.
   *
   * @returns Number of records reset
   */
  reset(scope: { tableName?: string }, at: Date): Promise<number>;
}

/**
 * ITableSpecCatalog lists the tables to consolidate and their placement.
 */
export interface ITableSpecCatalog {
  listSpecs(options?: { activeOnly?: boolean }): Promise<ConsolidatedTableSpec[]>;
  getSpec(tableName: string): Promise<ConsolidatedTableSpec | null>;
}

/**
 * ITenantDirectory lists the tenants of the fleet.
 */
export interface ITenantDirectory {
  listTenants(options?: { activeOnly?: boolean }): Promise<TenantRef[]>;
}

/**
 * ICheckpointStore keeps the resume cursor of each shard.
 */
export interface ICheckpointStore {
  load(shardKey: string): Promise<WorkCursor | null>;
  save(shardKey: string, cursor: WorkCursor, runId: string): Promise<void>;
  clear(shardKey: string): Promise<void>;
}
