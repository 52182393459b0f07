/**
 * @silvermerge/consolidation
 *
 * Schema reconciliation, tenant view generation and consolidation tracking
 * for a fleet of tenant warehouses.
 *
 * @module packages/consolidation
 */

// =============================================================================
// Configuration
// =============================================================================

export {
  buildConfig,
  loadConfig,
  type ConsolidationConfig,
  type ConsolidationConfigInput,
} from './config.js';

// =============================================================================
// Types
// =============================================================================

export {
  VALID_STATUS_TRANSITIONS,
  type MetadataColumnNames,
  type CastFailurePolicy,
  type ColumnSpec,
  type TenantViewDefinition,
  type UnionViewDefinition,
  type ConsolidatedTableDefinition,
  type ViewDefinition,
  type TruncFunction,
  type PartitionDirective,
  type RefreshMode,
  type RunOptions,
  type ResolvedShard,
} from './types.js';

// =============================================================================
// Services
// =============================================================================

export * from './services/index.js';

// =============================================================================
// Metrics
// =============================================================================

export {
  consolidationRegistry,
  recordPairOutcome,
  recordLayoutConflicts,
  recordRun,
  recordRunAborted,
  recordPublish,
  updateStatusGauge,
  type PairOutcome,
} from './metrics.js';

// =============================================================================
// Errors
// =============================================================================

export {
  ConsolidationError,
  ConsolidationErrorCode,
  isFatalError,
  errorMessage,
} from '@silvermerge/core/domain';
