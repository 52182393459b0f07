/**
 * Consolidation Metrics
 *
 * Prometheus-compatible metrics for consolidation runs.
 *
 * @module packages/consolidation/metrics
 */

import { Counter, Histogram, Gauge, Registry } from 'prom-client';
import type { ConsolidationStatus, PublishResult } from '@silvermerge/core/domain';

// =============================================================================
// Registry
// =============================================================================

/**
 * Consolidation metrics registry
 *
 * Can be merged with a process-wide registry:
 * ```typescript
 * import { register } from 'prom-client';
 * import { consolidationRegistry } from '@silvermerge/consolidation';
 * register.merge(consolidationRegistry);
 * ```
 */
export const consolidationRegistry = new Registry();

// =============================================================================
// Pair Metrics
// =============================================================================

export type PairOutcome = 'completed' | 'errored' | 'skipped' | 'absent';

export const pairsProcessed = new Counter({
  name: 'consolidation_pairs_total',
  help: 'Tenant/table pairs processed by outcome',
  labelNames: ['table', 'outcome'] as const,
  registers: [consolidationRegistry],
});

export const pairDuration = new Histogram({
  name: 'consolidation_pair_duration_seconds',
  help: 'Time to render and materialize one tenant view in seconds',
  buckets: [0.1, 0.5, 1, 2, 5, 10, 30],
  registers: [consolidationRegistry],
});

export const layoutConflicts = new Gauge({
  name: 'consolidation_layout_type_conflicts',
  help: 'Fields with conflicting types in the latest layout of a table',
  labelNames: ['table'] as const,
  registers: [consolidationRegistry],
});

// =============================================================================
// Run Metrics
// =============================================================================

export const runDuration = new Histogram({
  name: 'consolidation_run_duration_seconds',
  help: 'Batch run duration in seconds',
  buckets: [10, 60, 300, 900, 1800, 3600],
  registers: [consolidationRegistry],
});

export const runsAborted = new Counter({
  name: 'consolidation_runs_aborted_total',
  help: 'Batch runs aborted by a fatal error',
  labelNames: ['code'] as const,
  registers: [consolidationRegistry],
});

export const centralPublishes = new Counter({
  name: 'consolidation_central_publish_total',
  help: 'Central view publish attempts by outcome',
  labelNames: ['outcome'] as const,
  registers: [consolidationRegistry],
});

export const recordsByStatus = new Gauge({
  name: 'consolidation_records',
  help: 'Tracking records by status',
  labelNames: ['status'] as const,
  registers: [consolidationRegistry],
});

// =============================================================================
// Helper Functions
// =============================================================================

export function recordPairOutcome(table: string, outcome: PairOutcome, durationMs?: number): void {
  pairsProcessed.inc({ table, outcome });
  if (durationMs !== undefined) {
    pairDuration.observe(durationMs / 1000);
  }
}

export function recordLayoutConflicts(table: string, conflicts: number): void {
  layoutConflicts.set({ table }, conflicts);
}

export function recordRun(durationMs: number): void {
  runDuration.observe(durationMs / 1000);
}

export function recordRunAborted(code: string): void {
  runsAborted.inc({ code });
}

export function recordPublish(outcome: PublishResult['outcome']): void {
  centralPublishes.inc({ outcome });
}

export function updateStatusGauge(counts: Record<ConsolidationStatus, number>): void {
  for (const [status, count] of Object.entries(counts)) {
    recordsByStatus.set({ status }, count);
  }
}
