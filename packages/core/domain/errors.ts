/**
 * Consolidation Errors
 *
 * Error codes shared by the engine and its adapters.
 *
 * @module packages/core/domain/errors
 */

export enum ConsolidationErrorCode {
  /** Warehouse catalog unreachable, unauthorized or failing */
  CATALOG_UNAVAILABLE = 'CONSOLIDATION_001',
  /** Control-plane store unreachable or failing */
  TRACKER_UNAVAILABLE = 'CONSOLIDATION_002',
  /** Declared column type outside the closed type set */
  UNSUPPORTED_TYPE = 'CONSOLIDATION_003',
  /** View or table DDL rejected by the warehouse */
  MATERIALIZATION_FAILED = 'CONSOLIDATION_004',
  /** Illegal consolidation status change */
  INVALID_TRANSITION = 'CONSOLIDATION_005',
  /** Shard index/count out of range */
  INVALID_SHARD = 'CONSOLIDATION_006',
  /** Configuration failed validation */
  INVALID_CONFIG = 'CONSOLIDATION_007',
  /** Table has no projectable fields */
  EMPTY_LAYOUT = 'CONSOLIDATION_008',
}

const FATAL_CODES: ReadonlySet<ConsolidationErrorCode> = new Set([
  ConsolidationErrorCode.CATALOG_UNAVAILABLE,
  ConsolidationErrorCode.TRACKER_UNAVAILABLE,
]);

/**
 * Consolidation-specific error
 */
export class ConsolidationError extends Error {
  constructor(
    public readonly code: ConsolidationErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ConsolidationError';
  }
}

/**
 * Errors that abort a whole batch run instead of a single pair
 */
export function isFatalError(error: unknown): boolean {
  return error instanceof ConsolidationError && FATAL_CODES.has(error.code);
}

/**
 * Message of any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
