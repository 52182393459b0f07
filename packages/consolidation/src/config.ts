/**
 * Consolidation Configuration
 *
 * Validated, immutable configuration passed to every component at
 * construction. Loaded from environment variables by the CLI.
 *
 * @module packages/consolidation/config
 */

import { z } from 'zod';
import { ConsolidationError, ConsolidationErrorCode } from '@silvermerge/core/domain';

const identifier = z
  .string()
  .min(1)
  .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'must be a plain identifier');

const configSchema = z.object({
  // Central warehouse project receiving the union views and tables
  centralProjectId: z.string().min(1, 'CENTRAL_PROJECT_ID is required'),
  warehouseLocation: z.string().default('US'),

  // Tenant-side naming
  tenantDatasetPrefix: z.string().default('tenant_'),
  tenantViewDataset: identifier.default('silver'),
  tenantViewPrefix: z.string().default('vw_'),

  // Central naming
  centralViewDataset: identifier.default('silver'),
  centralViewPrefix: z.string().default('vw_consolidated_'),
  consolidatedDataset: identifier.default('bronze'),
  consolidatedTablePrefix: z.string().default('consolidated_'),

  // Reconciliation
  internalFieldPrefixes: z.array(z.string().min(1)).default(['_fivetran']),
  metadataColumns: z
    .object({
      tenantId: identifier.default('tenant_id'),
      sourceProject: identifier.default('source_project'),
      processedAt: identifier.default('silver_processed_at'),
    })
    .default({}),
  castFailurePolicy: z.enum(['null', 'type_default']).default('null'),
  defaultPartitionFields: z
    .array(identifier)
    .default(['created_on', 'updated_on', 'date_created']),

  // Control plane
  databaseUrl: z.string().url('DATABASE_URL must be a valid PostgreSQL URL'),

  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
});

export type ConsolidationConfig = Readonly<z.infer<typeof configSchema>>;
export type ConsolidationConfigInput = z.input<typeof configSchema>;

function validateConfig(raw: unknown): ConsolidationConfig {
  const result = configSchema.safeParse(raw);

  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new ConsolidationError(
      ConsolidationErrorCode.INVALID_CONFIG,
      `Configuration validation failed:\n${errors.join('\n')}`,
      { errors }
    );
  }

  return Object.freeze(result.data);
}

/**
 * Validate a configuration object and freeze it
 *
 * @throws ConsolidationError(INVALID_CONFIG) listing every invalid key
 */
export function buildConfig(input: ConsolidationConfigInput): ConsolidationConfig {
  return validateConfig(input);
}

function listFromEnv(value: string | undefined): string[] | undefined {
  if (!value) {
    return undefined;
  }
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Parse environment variables into configuration
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ConsolidationConfig {
  const raw = {
    centralProjectId: env['CENTRAL_PROJECT_ID'] ?? '',
    warehouseLocation: env['WAREHOUSE_LOCATION'] || undefined,
    tenantDatasetPrefix: env['TENANT_DATASET_PREFIX'] ?? undefined,
    tenantViewDataset: env['TENANT_VIEW_DATASET'] || undefined,
    tenantViewPrefix: env['TENANT_VIEW_PREFIX'] ?? undefined,
    centralViewDataset: env['CENTRAL_VIEW_DATASET'] || undefined,
    centralViewPrefix: env['CENTRAL_VIEW_PREFIX'] ?? undefined,
    consolidatedDataset: env['CONSOLIDATED_DATASET'] || undefined,
    consolidatedTablePrefix: env['CONSOLIDATED_TABLE_PREFIX'] ?? undefined,
    internalFieldPrefixes: listFromEnv(env['INTERNAL_FIELD_PREFIXES']),
    metadataColumns: {
      tenantId: env['METADATA_TENANT_COLUMN'] || undefined,
      sourceProject: env['METADATA_SOURCE_COLUMN'] || undefined,
      processedAt: env['METADATA_PROCESSED_AT_COLUMN'] || undefined,
    },
    castFailurePolicy: env['CAST_FAILURE_POLICY'] || undefined,
    defaultPartitionFields: listFromEnv(env['DEFAULT_PARTITION_FIELDS']),
    databaseUrl: env['DATABASE_URL'] ?? '',
    logLevel: env['LOG_LEVEL'] || 'info',
  };

  return validateConfig(raw);
}
