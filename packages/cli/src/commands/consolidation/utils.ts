/**
 * Consolidation CLI Utilities
 *
 * Shared wiring and output helpers for the smerge commands.
 *
 * @module packages/cli/commands/consolidation/utils
 */

import type { Logger } from 'pino';
import postgres from 'postgres';
import {
  BatchOrchestrator,
  ConsolidationError,
  ConsolidationErrorCode,
  errorMessage,
  loadConfig,
  type ConsolidationConfig,
} from '@silvermerge/consolidation';
import {
  PgCheckpointStore,
  PgTableSpecCatalog,
  PgTenantDirectory,
  PgTrackerStore,
} from '@silvermerge/adapters/storage';
import {
  BigQueryMaterializer,
  BigQuerySchemaCatalog,
  createBigQueryClient,
} from '@silvermerge/adapters/warehouse';

import { createLogger } from '../../utils/logger.js';

// =============================================================================
// Context
// =============================================================================

/**
 * Everything a command needs, built once per process
 */
export interface ConsolidationContext {
  config: ConsolidationConfig;
  sql: postgres.Sql;
  logger: Logger;
  orchestrator: BatchOrchestrator;
}

let cachedContext: ConsolidationContext | null = null;

/**
 * Build (or reuse) the command context from environment variables
 *
 * @param quiet - Discard everything below error level
 */
export function getConsolidationContext(quiet = false): ConsolidationContext {
  if (cachedContext) {
    return cachedContext;
  }

  const config = loadConfig();
  const logger = quiet ? createSilentLogger() : createLogger(config.logLevel);
  const sql = postgres(config.databaseUrl);
  const client = createBigQueryClient(config.centralProjectId);

  const orchestrator = new BatchOrchestrator({
    config,
    catalog: new BigQuerySchemaCatalog({ client, logger, location: config.warehouseLocation }),
    materializer: new BigQueryMaterializer({ client, logger, location: config.warehouseLocation }),
    trackerStore: new PgTrackerStore({ sql, logger }),
    specCatalog: new PgTableSpecCatalog({ sql, logger }),
    directory: new PgTenantDirectory({ sql, logger, datasetPrefix: config.tenantDatasetPrefix }),
    checkpoints: new PgCheckpointStore(sql),
    logger,
  });

  cachedContext = { config, sql, logger, orchestrator };
  return cachedContext;
}

/**
 * Close the cached context's database connection
 */
export async function closeConsolidationContext(): Promise<void> {
  if (cachedContext) {
    const { sql } = cachedContext;
    cachedContext = null;
    await sql.end({ timeout: 5 });
  }
}

// =============================================================================
// Argument Parsing
// =============================================================================

/**
 * Parse a shard argument of the form "i/n" (0-based index)
 *
 * @example
 * parseShard('0/4') // { shardIndex: 0, shardCount: 4 }
 */
export function parseShard(value: string): { shardIndex: number; shardCount: number } {
  const match = /^(\d+)\/(\d+)$/.exec(value.trim());
  if (!match) {
    throw new ConsolidationError(
      ConsolidationErrorCode.INVALID_SHARD,
      `Invalid shard "${value}". Use <index>/<count>, e.g. 0/4.`,
      { value }
    );
  }
  return { shardIndex: parseInt(match[1], 10), shardCount: parseInt(match[2], 10) };
}

/**
 * Collect a repeatable option into a list
 */
export function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

// =============================================================================
// Output Formatting
// =============================================================================

/**
 * Format a completion rate for display
 *
 * @example
 * formatRate(0.5) // '50.0%'
 */
export function formatRate(rate: number): string {
  return `${(rate * 100).toFixed(1)}%`;
}

/**
 * Formats a date for display
 */
export function formatDate(date: Date | null): string {
  if (!date) {
    return '-';
  }
  return date.toISOString().replace('T', ' ').slice(0, 19);
}

/**
 * Formats a duration in a human-readable way
 *
 * @example
 * formatDuration(75_000) // '1m 15s'
 */
export function formatDuration(milliseconds: number): string {
  const totalSeconds = Math.round(milliseconds / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;

  if (minutes > 0) {
    return `${minutes}m ${seconds}s`;
  }
  return `${seconds}s`;
}

// =============================================================================
// Terminal Capabilities
// =============================================================================

/**
 * Whether colored output is appropriate (NO_COLOR, TERM=dumb, non-TTY)
 */
export function shouldUseColor(): boolean {
  if (process.env.NO_COLOR !== undefined) return false;
  if (process.env.TERM === 'dumb') return false;
  if (!process.stdout.isTTY) return false;
  return true;
}

/**
 * Whether spinners and prompts make sense
 */
export function isInteractive(): boolean {
  return process.stdout.isTTY === true;
}

// =============================================================================
// Error Handling
// =============================================================================

/**
 * Handles errors in CLI commands
 *
 * @param error - Error to handle
 * @param json - Whether to output as JSON
 */
export function handleError(error: unknown, json: boolean = false): never {
  const message = errorMessage(error);
  const code = error instanceof ConsolidationError ? error.code : undefined;

  if (json) {
    console.log(
      JSON.stringify(
        {
          success: false,
          error: {
            message,
            code: code ?? 'UNKNOWN',
          },
        },
        null,
        2
      )
    );
  } else {
    console.error(`Error: ${message}`);
    if (code) {
      console.error(`Code: ${code}`);
    }
  }

  process.exit(1);
}

// =============================================================================
// Silent Logger
// =============================================================================

/**
 * Creates a logger for quiet runs: errors only, on stderr
 */
export function createSilentLogger(): Logger {
  return createLogger('error');
}
