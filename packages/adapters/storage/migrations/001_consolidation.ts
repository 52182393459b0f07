/**
 * Migration 001: Consolidation Control Plane
 *
 * Creates the control-plane tables:
 * - consolidation_records: status per (tenant, table)
 * - consolidated_table_specs: tables to consolidate and their placement
 * - tenants: tenant directory
 * - consolidation_checkpoints: resume cursor per shard
 *
 * Column shapes mirror ../consolidation-schema.ts.
 */

import type { Logger } from 'pino';
import type postgres from 'postgres';

/**
 * Migration SQL for the consolidation control plane
 */
export const CONSOLIDATION_SCHEMA_SQL = `
DO $$ BEGIN
  CREATE TYPE consolidation_status AS ENUM ('PENDING', 'COMPLETED', 'ERROR');
EXCEPTION WHEN duplicate_object THEN NULL;
END $$;

DO $$ BEGIN
  CREATE TYPE consolidation_update_strategy AS ENUM ('incremental', 'full_refresh');
EXCEPTION WHEN duplicate_object THEN NULL;
END $$;

-- =============================================================================
-- Consolidation Records
-- =============================================================================

CREATE TABLE IF NOT EXISTS consolidation_records (
  tenant_id VARCHAR(128) NOT NULL,
  table_name VARCHAR(256) NOT NULL,
  status consolidation_status NOT NULL DEFAULT 'PENDING',
  error_message TEXT,
  source_present BOOLEAN NOT NULL DEFAULT TRUE,
  layout_fingerprint VARCHAR(64),
  created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
  updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
  completed_at TIMESTAMPTZ,
  PRIMARY KEY (tenant_id, table_name)
);

CREATE INDEX IF NOT EXISTS idx_consolidation_records_status
  ON consolidation_records(status);

CREATE INDEX IF NOT EXISTS idx_consolidation_records_table
  ON consolidation_records(table_name, status);

CREATE INDEX IF NOT EXISTS idx_consolidation_records_absent
  ON consolidation_records(table_name)
  WHERE source_present = FALSE;

-- =============================================================================
-- Table Specs
-- =============================================================================

CREATE TABLE IF NOT EXISTS consolidated_table_specs (
  table_name VARCHAR(256) PRIMARY KEY,
  partition_fields TEXT[] NOT NULL DEFAULT ARRAY[]::TEXT[],
  cluster_fields TEXT[] NOT NULL DEFAULT ARRAY[]::TEXT[],
  update_strategy consolidation_update_strategy NOT NULL DEFAULT 'full_refresh',
  merge_key_fields TEXT[] NOT NULL DEFAULT ARRAY['id']::TEXT[],
  active BOOLEAN NOT NULL DEFAULT TRUE,
  created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
  updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
  CONSTRAINT consolidated_table_specs_cluster_max CHECK (cardinality(cluster_fields) <= 4)
);

-- =============================================================================
-- Tenants
-- =============================================================================

CREATE TABLE IF NOT EXISTS tenants (
  tenant_id VARCHAR(128) PRIMARY KEY,
  display_name VARCHAR(256) NOT NULL,
  project_id VARCHAR(128) NOT NULL,
  source_dataset VARCHAR(1024),
  active BOOLEAN NOT NULL DEFAULT TRUE,
  created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
);

-- =============================================================================
-- Checkpoints
-- =============================================================================

CREATE TABLE IF NOT EXISTS consolidation_checkpoints (
  shard_key VARCHAR(64) PRIMARY KEY,
  table_name VARCHAR(256) NOT NULL,
  tenant_id VARCHAR(128) NOT NULL,
  run_id VARCHAR(32) NOT NULL,
  updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
);
`;

const ROLLBACK_SQL = `
DROP TABLE IF EXISTS consolidation_checkpoints;
DROP TABLE IF EXISTS tenants;
DROP TABLE IF EXISTS consolidated_table_specs;
DROP TABLE IF EXISTS consolidation_records;
DROP TYPE IF EXISTS consolidation_update_strategy;
DROP TYPE IF EXISTS consolidation_status;
`;

/**
 * Run the consolidation control-plane migration
 */
export async function migrateConsolidation(sql: postgres.Sql, logger: Logger): Promise<void> {
  logger.info('Running migration 001: Consolidation control plane');

  try {
    await sql.unsafe(CONSOLIDATION_SCHEMA_SQL).simple();
    logger.info('Migration 001 completed: consolidation tables created');
  } catch (error) {
    logger.error(
      { error: error instanceof Error ? error.message : String(error) },
      'Migration 001 failed'
    );
    throw error;
  }
}

/**
 * Rollback the consolidation control-plane migration
 */
export async function rollbackConsolidation(sql: postgres.Sql, logger: Logger): Promise<void> {
  logger.info('Rolling back migration 001: Consolidation control plane');

  try {
    await sql.unsafe(ROLLBACK_SQL).simple();
    logger.info('Migration 001 rollback completed');
  } catch (error) {
    logger.error(
      { error: error instanceof Error ? error.message : String(error) },
      'Migration 001 rollback failed'
    );
    throw error;
  }
}
