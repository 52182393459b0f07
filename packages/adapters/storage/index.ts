/**
 * Storage Adapters
 *
 * PostgreSQL implementations of the control-plane ports.
 *
 * @module packages/adapters/storage
 */

// =============================================================================
// Stores
// =============================================================================

export { PgTrackerStore, type PgTrackerStoreConfig } from './pg-tracker-store.js';
export { PgTableSpecCatalog, type PgTableSpecCatalogConfig } from './pg-table-spec-catalog.js';
export {
  PgTenantDirectory,
  defaultSourceDataset,
  type PgTenantDirectoryConfig,
} from './pg-tenant-directory.js';
export { PgCheckpointStore } from './pg-checkpoint-store.js';

// =============================================================================
// Schema
// =============================================================================

export {
  consolidationStatusEnum,
  updateStrategyEnum,
  consolidationRecords,
  consolidatedTableSpecs,
  tenants,
  consolidationCheckpoints,
  type ConsolidationRecordRow,
  type ConsolidatedTableSpecRow,
  type TenantRow,
  type CheckpointRow,
} from './consolidation-schema.js';

// =============================================================================
// Migrations
// =============================================================================

export {
  CONSOLIDATION_SCHEMA_SQL,
  migrateConsolidation,
  rollbackConsolidation,
} from './migrations/001_consolidation.js';
