/**
 * ConsolidationTracker - Per-(tenant, table) status state machine
 *
 * Owns status transitions of consolidation records:
 * - PENDING on first observation
 * - COMPLETED only after a successful tenant view materialization
 * - ERROR with the failure message otherwise
 * - bulk reset back to PENDING
 *
 * Persistence goes through ITrackerStore; store failures surface as
 * TRACKER_UNAVAILABLE, which aborts a batch run.
 *
 * @module packages/consolidation/services/consolidation-tracker
 */

import type { Logger } from 'pino';
import type {
  ConsolidationKey,
  ConsolidationRecord,
  ConsolidationStatus,
  TableCompletion,
  TableStatusCounts,
} from '@silvermerge/core/domain';
import {
  ConsolidationError,
  ConsolidationErrorCode,
  errorMessage,
} from '@silvermerge/core/domain';
import type { ITrackerStore } from '@silvermerge/core/ports';

import { VALID_STATUS_TRANSITIONS } from '../types.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Configuration for ConsolidationTracker
 */
export interface ConsolidationTrackerConfig {
  /** Record persistence */
  store: ITrackerStore;

  /** Logger instance */
  logger: Logger;

  /** Clock for record timestamps */
  now?: () => Date;
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Whether a status change is allowed by the state machine
 */
export function canTransition(from: ConsolidationStatus, to: ConsolidationStatus): boolean {
  return from === to || VALID_STATUS_TRANSITIONS[from].includes(to);
}

/**
 * Derive completion figures from raw counts
 */
export function toTableCompletion(counts: TableStatusCounts): TableCompletion {
  const total = counts.pending + counts.completed + counts.errored;
  const present = total - counts.absent;

  return {
    tableName: counts.tableName,
    total,
    pending: counts.pending,
    completed: counts.completed,
    errored: counts.errored,
    absent: counts.absent,
    completionRate: present > 0 ? counts.completed / present : 0,
    isFullyConsolidated: present > 0 && counts.completed === present,
  };
}

// =============================================================================
// ConsolidationTracker
// =============================================================================

export class ConsolidationTracker {
  private readonly store: ITrackerStore;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(config: ConsolidationTrackerConfig) {
    this.store = config.store;
    this.logger = config.logger.child({ component: 'ConsolidationTracker' });
    this.now = config.now ?? (() => new Date());
  }

  // ===========================================================================
  // Transitions
  // ===========================================================================

  /**
   * Register a pair, creating a PENDING record on first sight
   */
  async observe(key: ConsolidationKey, sourcePresent: boolean): Promise<ConsolidationRecord> {
    return this.guard('observe', key, () => this.store.ensure(key, sourcePresent, this.now()));
  }

  /**
   * Mark a pair COMPLETED after its view was materialized
   *
   * @param layoutFingerprint - Layout the tenant view was rendered against
   */
  async complete(key: ConsolidationKey, layoutFingerprint: string): Promise<ConsolidationRecord> {
    await this.assertTransition(key, 'COMPLETED');

    const record = await this.guard('complete', key, () =>
      this.store.upsert({
        ...key,
        status: 'COMPLETED',
        errorMessage: null,
        sourcePresent: true,
        layoutFingerprint,
        at: this.now(),
      })
    );

    this.logger.info({ ...key }, 'Pair consolidated');
    return record;
  }

  /**
   * Mark a pair ERROR, overwriting any previous message
   */
  async fail(
    key: ConsolidationKey,
    message: string,
    sourcePresent = true
  ): Promise<ConsolidationRecord> {
    await this.assertTransition(key, 'ERROR');

    const record = await this.guard('fail', key, () =>
      this.store.upsert({
        ...key,
        status: 'ERROR',
        errorMessage: message,
        sourcePresent,
        layoutFingerprint: null,
        at: this.now(),
      })
    );

    this.logger.warn({ ...key, error: message }, 'Pair consolidation failed');
    return record;
  }

  /**
   * Reset every record in scope to PENDING
   *
   * @returns Number of records reset
   */
  async reset(scope: { tableName?: string } = {}): Promise<number> {
    let count: number;
    try {
      count = await this.store.reset(scope, this.now());
    } catch (error) {
      throw this.unavailable('reset', error, { ...scope });
    }

    this.logger.info({ ...scope, count }, 'Consolidation records reset');
    return count;
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  async get(key: ConsolidationKey): Promise<ConsolidationRecord | null> {
    return this.guard('get', key, () => this.store.get(key));
  }

  async isCompleted(key: ConsolidationKey): Promise<boolean> {
    const record = await this.get(key);
    return record?.status === 'COMPLETED';
  }

  /**
   * All records of a table
   */
  async snapshot(tableName: string): Promise<ConsolidationRecord[]> {
    try {
      return await this.store.listForTable(tableName);
    } catch (error) {
      throw this.unavailable('snapshot', error, { tableName });
    }
  }

  async completedTenantIds(tableName: string): Promise<string[]> {
    const records = await this.snapshot(tableName);
    return records.filter((record) => record.status === 'COMPLETED').map((record) => record.tenantId);
  }

  async listByStatus(
    status: ConsolidationStatus,
    tableName?: string
  ): Promise<ConsolidationRecord[]> {
    try {
      return await this.store.listByStatus(status, tableName);
    } catch (error) {
      throw this.unavailable('listByStatus', error, { status, tableName });
    }
  }

  /**
   * Per-table completion summary
   */
  async summarize(tableName?: string): Promise<TableCompletion[]> {
    try {
      const counts = await this.store.countByTable(tableName);
      return counts.map(toTableCompletion);
    } catch (error) {
      throw this.unavailable('summarize', error, { tableName });
    }
  }

  // ===========================================================================
  // Private Helpers
  // ===========================================================================

  private async assertTransition(key: ConsolidationKey, to: ConsolidationStatus): Promise<void> {
    const current = await this.get(key);
    const from = current?.status ?? 'PENDING';

    if (!canTransition(from, to)) {
      throw new ConsolidationError(
        ConsolidationErrorCode.INVALID_TRANSITION,
        `Cannot transition ${key.tenantId}/${key.tableName} from ${from} to ${to}`,
        { ...key, from, to }
      );
    }
  }

  private async guard<T>(
    operation: string,
    key: ConsolidationKey,
    fn: () => Promise<T>
  ): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw this.unavailable(operation, error, { ...key });
    }
  }

  private unavailable(
    operation: string,
    error: unknown,
    details: Record<string, unknown>
  ): ConsolidationError {
    if (error instanceof ConsolidationError) {
      return error;
    }
    this.logger.error({ ...details, operation, error: errorMessage(error) }, 'Tracker store failed');
    return new ConsolidationError(
      ConsolidationErrorCode.TRACKER_UNAVAILABLE,
      `Tracker ${operation} failed: ${errorMessage(error)}`,
      { ...details, operation }
    );
  }
}
