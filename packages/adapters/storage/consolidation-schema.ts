/**
 * Drizzle Schema - Consolidation Control Plane
 *
 * Control-plane tables read and written by the PostgreSQL adapters. The DDL
 * lives in migrations/001_consolidation.ts; this module keeps the column
 * shapes typed for the adapters' row mapping.
 *
 * @module packages/adapters/storage/consolidation-schema
 */

import {
  pgTable,
  pgEnum,
  varchar,
  text,
  boolean,
  timestamp,
  index,
  primaryKey,
} from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';

// =============================================================================
// Enums
// =============================================================================

/**
 * Matches the consolidation_status PostgreSQL enum type.
 */
export const consolidationStatusEnum = pgEnum('consolidation_status', [
  'PENDING',
  'COMPLETED',
  'ERROR',
]);

export const updateStrategyEnum = pgEnum('consolidation_update_strategy', [
  'incremental',
  'full_refresh',
]);

// =============================================================================
// Consolidation Records
// =============================================================================

/**
 * One row per (tenant, table) pair. Upserts are last-write-wins.
 */
export const consolidationRecords = pgTable(
  'consolidation_records',
  {
    tenantId: varchar('tenant_id', { length: 128 }).notNull(),
    tableName: varchar('table_name', { length: 256 }).notNull(),
    status: consolidationStatusEnum('status').notNull().default('PENDING'),
    errorMessage: text('error_message'),
    sourcePresent: boolean('source_present').notNull().default(true),
    layoutFingerprint: varchar('layout_fingerprint', { length: 64 }),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
    completedAt: timestamp('completed_at', { withTimezone: true }),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.tenantId, table.tableName] }),
    statusIdx: index('idx_consolidation_records_status').on(table.status),
    tableIdx: index('idx_consolidation_records_table').on(table.tableName, table.status),
    absentIdx: index('idx_consolidation_records_absent')
      .on(table.tableName)
      .where(sql`source_present = false`),
  })
);

// =============================================================================
// Table Specs
// =============================================================================

/**
 * Tables to consolidate and their consolidated placement
 */
export const consolidatedTableSpecs = pgTable('consolidated_table_specs', {
  tableName: varchar('table_name', { length: 256 }).primaryKey(),
  partitionFields: text('partition_fields').array().notNull().default(sql`ARRAY[]::text[]`),
  clusterFields: text('cluster_fields').array().notNull().default(sql`ARRAY[]::text[]`),
  updateStrategy: updateStrategyEnum('update_strategy').notNull().default('full_refresh'),
  mergeKeyFields: text('merge_key_fields').array().notNull().default(sql`ARRAY['id']::text[]`),
  active: boolean('active').notNull().default(true),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
});

// =============================================================================
// Tenants
// =============================================================================

/**
 * Tenant directory
 *
 * source_dataset NULL means the configured prefix plus the project id.
 */
export const tenants = pgTable('tenants', {
  tenantId: varchar('tenant_id', { length: 128 }).primaryKey(),
  displayName: varchar('display_name', { length: 256 }).notNull(),
  projectId: varchar('project_id', { length: 128 }).notNull(),
  sourceDataset: varchar('source_dataset', { length: 1024 }),
  active: boolean('active').notNull().default(true),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
});

// =============================================================================
// Checkpoints
// =============================================================================

/**
 * Resume cursor per shard
 */
export const consolidationCheckpoints = pgTable('consolidation_checkpoints', {
  shardKey: varchar('shard_key', { length: 64 }).primaryKey(),
  tableName: varchar('table_name', { length: 256 }).notNull(),
  tenantId: varchar('tenant_id', { length: 128 }).notNull(),
  runId: varchar('run_id', { length: 32 }).notNull(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
});

// =============================================================================
// Type Exports
// =============================================================================

export type ConsolidationRecordRow = typeof consolidationRecords.$inferSelect;
export type ConsolidatedTableSpecRow = typeof consolidatedTableSpecs.$inferSelect;
export type TenantRow = typeof tenants.$inferSelect;
export type CheckpointRow = typeof consolidationCheckpoints.$inferSelect;
