/**
 * Consolidation Types - TypeScript type definitions
 *
 * Status transitions, structured view definitions and run options used
 * across the consolidation services.
 *
 * @module packages/consolidation/types
 */

import type {
  ConsolidationStatus,
  TableRef,
  WarehouseType,
} from '@silvermerge/core/domain';

// =============================================================================
// Consolidation Status
// =============================================================================

/**
 * Valid status transitions
 *
 * A rewrite of the current status is always accepted (at-least-once writes).
 * Bulk reset moves any status to PENDING and bypasses this table.
 */
export const VALID_STATUS_TRANSITIONS: Record<ConsolidationStatus, ConsolidationStatus[]> = {
  PENDING: ['COMPLETED', 'ERROR'],
  ERROR: ['COMPLETED', 'ERROR'],
  COMPLETED: ['PENDING'],
};

// =============================================================================
// Metadata Columns
// =============================================================================

/**
 * Names of the metadata columns appended to every tenant view
 */
export interface MetadataColumnNames {
  /** Tenant identifier literal */
  tenantId: string;
  /** Source project literal */
  sourceProject: string;
  /** Processing timestamp */
  processedAt: string;
}

// =============================================================================
// View Definitions
// =============================================================================

/**
 * What to do when a non-null source value fails to convert
 */
export type CastFailurePolicy = 'null' | 'type_default';

/**
 * One projected column of a tenant view
 */
export type ColumnSpec =
  | { kind: 'direct'; name: string; path: string[] }
  | {
      kind: 'safe_cast';
      name: string;
      path: string[];
      targetType: WarehouseType;
      onFailure: CastFailurePolicy;
    }
  | { kind: 'json_string'; name: string; path: string[] }
  | { kind: 'null_literal'; name: string; targetType: WarehouseType; isRepeated: boolean }
  | { kind: 'string_literal'; name: string; value: string }
  | { kind: 'current_timestamp'; name: string };

/**
 * Normalized per-tenant view over the tenant's source table
 */
export interface TenantViewDefinition {
  shape: 'tenant_view';
  target: TableRef;
  source: TableRef;
  columns: ColumnSpec[];
}

/**
 * Central view: UNION ALL of completed tenant views
 */
export interface UnionViewDefinition {
  shape: 'union_view';
  target: TableRef;
  /** Tenant views, one branch each */
  branches: TableRef[];
  /** Column list every branch projects, in order */
  columns: string[];
}

export type TruncFunction = 'DATE_TRUNC' | 'DATETIME_TRUNC' | 'TIMESTAMP_TRUNC';

export interface PartitionDirective {
  field: string;
  trunc: TruncFunction;
}

export type RefreshMode =
  | { mode: 'full_refresh' }
  | { mode: 'incremental'; keyFields: string[] };

/**
 * Consolidated table materialized from the central view
 */
export interface ConsolidatedTableDefinition {
  shape: 'consolidated_table';
  target: TableRef;
  source: TableRef;
  columns: string[];
  partition: PartitionDirective | null;
  clusterFields: string[];
  refresh: RefreshMode;
}

export type ViewDefinition =
  | TenantViewDefinition
  | UnionViewDefinition
  | ConsolidatedTableDefinition;

// =============================================================================
// Orchestration
// =============================================================================

/**
 * Options for one orchestrator run
 */
export interface RunOptions {
  /** Skip tables ordered before this name */
  startMarker?: string;
  /** 0-based shard index */
  shardIndex?: number;
  shardCount?: number;
  /** Continue after the shard's stored checkpoint */
  resume?: boolean;
  /** Restrict the run to these tables */
  tables?: string[];
  /**
   * Publish central views after processing.
   * @default true for unsharded runs, false otherwise
   */
  publish?: boolean;
}

export interface ResolvedShard {
  shardIndex: number;
  shardCount: number;
  shardKey: string;
}
