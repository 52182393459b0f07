/**
 * Work Planner - Deterministic work set, shards and resume points
 *
 * @module packages/consolidation/services/work-planner
 */

import type { TenantRef, WorkCursor, WorkItem } from '@silvermerge/core/domain';
import { ConsolidationError, ConsolidationErrorCode } from '@silvermerge/core/domain';

import type { ResolvedShard } from '../types.js';
import { compareCodeUnits } from './schema-reconciler.js';

const DIGITS = /^\d+$/;

/**
 * Order tenant ids: all-digit ids first and numerically, the rest by code units
 */
export function compareTenantIds(a: string, b: string): number {
  const numericA = DIGITS.test(a);
  const numericB = DIGITS.test(b);
  if (numericA !== numericB) {
    return numericA ? -1 : 1;
  }
  if (numericA) {
    const strippedA = a.replace(/^0+/, '');
    const strippedB = b.replace(/^0+/, '');
    const byValue =
      strippedA.length - strippedB.length || compareCodeUnits(strippedA, strippedB);
    if (byValue !== 0) {
      return byValue;
    }
  }
  return compareCodeUnits(a, b);
}

/**
 * Every (table, tenant) pair, tables alphabetically then tenants by id
 */
export function planWorkSet(tables: readonly string[], tenants: readonly TenantRef[]): WorkItem[] {
  const sortedTables = [...new Set(tables)].sort(compareCodeUnits);
  const sortedTenants = [...tenants].sort((a, b) => compareTenantIds(a.tenantId, b.tenantId));

  return sortedTables.flatMap((tableName) =>
    sortedTenants.map((tenant) => ({ tableName, tenant }))
  );
}

/**
 * Validate shard arguments
 *
 * @throws ConsolidationError(INVALID_SHARD)
 */
export function resolveShard(shardIndex = 0, shardCount = 1): ResolvedShard {
  if (!Number.isInteger(shardCount) || shardCount < 1) {
    throw new ConsolidationError(
      ConsolidationErrorCode.INVALID_SHARD,
      `Shard count must be a positive integer, got ${shardCount}`,
      { shardIndex, shardCount }
    );
  }
  if (!Number.isInteger(shardIndex) || shardIndex < 0 || shardIndex >= shardCount) {
    throw new ConsolidationError(
      ConsolidationErrorCode.INVALID_SHARD,
      `Shard index must be in [0, ${shardCount - 1}], got ${shardIndex}`,
      { shardIndex, shardCount }
    );
  }
  return { shardIndex, shardCount, shardKey: `shard-${shardIndex}-of-${shardCount}` };
}

/**
 * Contiguous slice of the work set owned by one shard
 *
 * Slices are disjoint, cover every item, and differ in size by at most one.
 */
export function sliceShard<T>(items: readonly T[], shard: ResolvedShard): T[] {
  const base = Math.floor(items.length / shard.shardCount);
  const remainder = items.length % shard.shardCount;
  const start = shard.shardIndex * base + Math.min(shard.shardIndex, remainder);
  const size = base + (shard.shardIndex < remainder ? 1 : 0);
  return items.slice(start, start + size);
}

/**
 * Drop items of tables ordered before the marker
 */
export function applyStartMarker(items: readonly WorkItem[], marker: string): WorkItem[] {
  return items.filter((item) => compareCodeUnits(item.tableName, marker) >= 0);
}

function compareToCursor(item: WorkItem, cursor: WorkCursor): number {
  const byTable = compareCodeUnits(item.tableName, cursor.tableName);
  return byTable !== 0 ? byTable : compareTenantIds(item.tenant.tenantId, cursor.tenantId);
}

/**
 * Items strictly after a recorded cursor
 */
export function applyCursor(items: readonly WorkItem[], cursor: WorkCursor): WorkItem[] {
  return items.filter((item) => compareToCursor(item, cursor) > 0);
}
