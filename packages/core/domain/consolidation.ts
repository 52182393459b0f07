/**
 * Consolidation Domain Types
 *
 * Defines the core domain types for tenant schema reconciliation:
 * physical tenant schemas, the canonical layout derived from them, and the
 * per-(tenant, table) consolidation tracking records.
 *
 * @module packages/core/domain/consolidation
 */

// =============================================================================
// Warehouse Types
// =============================================================================

/**
 * Closed set of warehouse column types understood by the type lattice.
 *
 * STRUCT and RANGE are opaque: their inner layout is not modelled.
 */
export type WarehouseType =
  | 'BOOL'
  | 'INT64'
  | 'NUMERIC'
  | 'BIGNUMERIC'
  | 'FLOAT64'
  | 'STRING'
  | 'BYTES'
  | 'DATE'
  | 'DATETIME'
  | 'TIME'
  | 'TIMESTAMP'
  | 'INTERVAL'
  | 'JSON'
  | 'GEOGRAPHY'
  | 'STRUCT'
  | 'RANGE';

export const WAREHOUSE_TYPES: readonly WarehouseType[] = [
  'BOOL',
  'INT64',
  'NUMERIC',
  'BIGNUMERIC',
  'FLOAT64',
  'STRING',
  'BYTES',
  'DATE',
  'DATETIME',
  'TIME',
  'TIMESTAMP',
  'INTERVAL',
  'JSON',
  'GEOGRAPHY',
  'STRUCT',
  'RANGE',
] as const;

// =============================================================================
// Tenants & Physical Schemas
// =============================================================================

/**
 * A tenant of the fleet, as listed by the tenant directory.
 */
export interface TenantRef {
  /** Stable tenant identifier */
  tenantId: string;
  /** Human-readable tenant name */
  displayName: string;
  /** Warehouse project holding the tenant's data */
  projectId: string;
  /** Dataset the ingestion pipeline writes the tenant's tables into */
  sourceDataset: string;
}

/**
 * One column of a tenant's physical table.
 */
export interface FieldDescriptor {
  /** Projected field name (flattened STRUCT members use parent_child) */
  name: string;
  declaredType: WarehouseType;
  /** ARRAY column */
  isRepeated: boolean;
  /** Column path in the source table, e.g. ['customer', 'id'] */
  path: string[];
}

/**
 * Physical schema of one table for one tenant.
 *
 * An empty field list means the table does not exist for the tenant.
 */
export interface TenantSchema {
  tenantId: string;
  tableName: string;
  fields: FieldDescriptor[];
}

// =============================================================================
// Canonical Layout
// =============================================================================

/**
 * One field of the canonical layout shared by every tenant view of a table.
 */
export interface ReconciledField {
  name: string;
  targetType: WarehouseType;
  /** Tenants declare this field with more than one type or repeatedness */
  hasTypeConflict: boolean;
  /** At least one supplied tenant schema lacks this field */
  isPartial: boolean;
  /** 1-based position, alphabetical by name */
  fieldOrder: number;
  /** Projected as ARRAY<targetType> */
  isRepeated: boolean;
  /** Distinct declared types across tenants, sorted */
  sourceTypes: WarehouseType[];
  /** Number of tenant schemas declaring the field */
  presentIn: number;
}

/**
 * Canonical field layout of a table across the fleet.
 *
 * Derived and recomputable; never the source of truth.
 */
export interface CanonicalLayout {
  tableName: string;
  fields: ReconciledField[];
  /** Number of tenant schemas the layout was reconciled from */
  tenantCount: number;
  /** SHA-256 over table name and (name, targetType, isRepeated) of every field */
  fingerprint: string;
  generatedAt: Date;
}

// =============================================================================
// Consolidation Tracking
// =============================================================================

/**
 * Consolidation status of a (tenant, table) pair.
 *
 * State transitions:
 * - PENDING → COMPLETED | ERROR
 * - ERROR → COMPLETED | ERROR (retry)
 * - COMPLETED → PENDING (explicit reset)
 */
export type ConsolidationStatus = 'PENDING' | 'COMPLETED' | 'ERROR';

export const CONSOLIDATION_STATUSES: readonly ConsolidationStatus[] = [
  'PENDING',
  'COMPLETED',
  'ERROR',
] as const;

/**
 * Identifies one unit of work.
 */
export interface ConsolidationKey {
  tenantId: string;
  tableName: string;
}

/**
 * Tracking record of one (tenant, table) pair.
 */
export interface ConsolidationRecord extends ConsolidationKey {
  status: ConsolidationStatus;
  /** Last failure message (ERROR only) */
  errorMessage: string | null;
  /** Whether the tenant's source table existed at the last observation */
  sourcePresent: boolean;
  /** Fingerprint of the layout the tenant view was rendered against */
  layoutFingerprint: string | null;
  createdAt: Date;
  updatedAt: Date;
  completedAt: Date | null;
}

/**
 * Full-state write of a tracking record (last write wins).
 */
export interface ConsolidationRecordWrite extends ConsolidationKey {
  status: ConsolidationStatus;
  errorMessage: string | null;
  sourcePresent: boolean;
  layoutFingerprint: string | null;
  at: Date;
}

/**
 * Per-table completion summary.
 */
export interface TableCompletion {
  tableName: string;
  total: number;
  pending: number;
  completed: number;
  errored: number;
  /** PENDING records whose source table is absent */
  absent: number;
  /** completed / (total - absent), 0 when nothing is present */
  completionRate: number;
  /** Every present source is COMPLETED */
  isFullyConsolidated: boolean;
}

/**
 * Raw status counts for one table, as aggregated by a tracker store.
 */
export interface TableStatusCounts {
  tableName: string;
  pending: number;
  completed: number;
  errored: number;
  absent: number;
}

// =============================================================================
// Consolidated Table Specs
// =============================================================================

export type UpdateStrategy = 'incremental' | 'full_refresh';

/**
 * Physical placement of a consolidated table, from the spec catalog.
 */
export interface ConsolidatedTableSpec {
  tableName: string;
  /** Partition field candidates, in priority order */
  partitionFields: string[];
  /** At most four */
  clusterFields: string[];
  updateStrategy: UpdateStrategy;
  /** Row key for incremental merges, besides the tenant id column */
  mergeKeyFields: string[];
  active: boolean;
}

// =============================================================================
// Batch Work
// =============================================================================

export interface WorkItem {
  tableName: string;
  tenant: TenantRef;
}

/**
 * Position of the last finished work item of a shard.
 */
export interface WorkCursor {
  tableName: string;
  tenantId: string;
}

export interface PublishResult {
  tableName: string;
  outcome: 'published' | 'skipped' | 'failed';
  /** Tenants included in the central union */
  tenantIds: string[];
  reason?: string;
}

/**
 * Result of one orchestrator run.
 */
export interface BatchSummary {
  runId: string;
  completed: number;
  errored: number;
  skipped: number;
  absent: number;
  tablesProcessed: string[];
  published: PublishResult[];
  /** Cursor left behind by the run (null when the shard finished) */
  checkpoint: WorkCursor | null;
  durationMs: number;
}
