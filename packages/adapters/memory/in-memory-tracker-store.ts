/**
 * InMemoryTrackerStore - Process-local ITrackerStore
 *
 * Same upsert semantics as the PostgreSQL store, kept in a Map keyed by
 * tenant and table.
 *
 * @module packages/adapters/memory/in-memory-tracker-store
 */

import type {
  ConsolidationKey,
  ConsolidationRecord,
  ConsolidationRecordWrite,
  ConsolidationStatus,
  TableStatusCounts,
} from '@silvermerge/core/domain';
import type { ITrackerStore } from '@silvermerge/core/ports';

function keyOf(key: ConsolidationKey): string {
  return `${key.tableName}\u0000${key.tenantId}`;
}

function byKey(a: ConsolidationRecord, b: ConsolidationRecord): number {
  if (a.tableName !== b.tableName) {
    return a.tableName < b.tableName ? -1 : 1;
  }
  if (a.tenantId === b.tenantId) {
    return 0;
  }
  return a.tenantId < b.tenantId ? -1 : 1;
}

export class InMemoryTrackerStore implements ITrackerStore {
  private readonly records = new Map<string, ConsolidationRecord>();

  async get(key: ConsolidationKey): Promise<ConsolidationRecord | null> {
    const record = this.records.get(keyOf(key));
    return record ? { ...record } : null;
  }

  async ensure(
    key: ConsolidationKey,
    sourcePresent: boolean,
    at: Date
  ): Promise<ConsolidationRecord> {
    const existing = this.records.get(keyOf(key));

    if (!existing) {
      const record: ConsolidationRecord = {
        tenantId: key.tenantId,
        tableName: key.tableName,
        status: 'PENDING',
        errorMessage: null,
        sourcePresent,
        layoutFingerprint: null,
        createdAt: at,
        updatedAt: at,
        completedAt: null,
      };
      this.records.set(keyOf(key), record);
      return { ...record };
    }

    if (existing.status === 'PENDING') {
      existing.sourcePresent = sourcePresent;
      existing.updatedAt = at;
    }
    return { ...existing };
  }

  async upsert(write: ConsolidationRecordWrite): Promise<ConsolidationRecord> {
    const existing = this.records.get(keyOf(write));
    const record: ConsolidationRecord = {
      tenantId: write.tenantId,
      tableName: write.tableName,
      status: write.status,
      errorMessage: write.errorMessage,
      sourcePresent: write.sourcePresent,
      layoutFingerprint: write.layoutFingerprint,
      createdAt: existing?.createdAt ?? write.at,
      updatedAt: write.at,
      completedAt: write.status === 'COMPLETED' ? write.at : null,
    };
    this.records.set(keyOf(write), record);
    return { ...record };
  }

  async listForTable(tableName: string): Promise<ConsolidationRecord[]> {
    return this.all().filter((record) => record.tableName === tableName);
  }

  async listByStatus(
    status: ConsolidationStatus,
    tableName?: string
  ): Promise<ConsolidationRecord[]> {
    return this.all().filter(
      (record) => record.status === status && (!tableName || record.tableName === tableName)
    );
  }

  async countByTable(tableName?: string): Promise<TableStatusCounts[]> {
    const counts = new Map<string, TableStatusCounts>();

    for (const record of this.all()) {
      if (tableName && record.tableName !== tableName) {
        continue;
      }
      let entry = counts.get(record.tableName);
      if (!entry) {
        entry = { tableName: record.tableName, pending: 0, completed: 0, errored: 0, absent: 0 };
        counts.set(record.tableName, entry);
      }
      if (record.status === 'PENDING') {
        entry.pending++;
        if (!record.sourcePresent) {
          entry.absent++;
        }
      } else if (record.status === 'COMPLETED') {
        entry.completed++;
      } else {
        entry.errored++;
      }
    }

    return [...counts.values()];
  }

  async reset(scope: { tableName?: string }, at: Date): Promise<number> {
    let count = 0;
    for (const record of this.records.values()) {
      if (scope.tableName && record.tableName !== scope.tableName) {
        continue;
      }
      record.status = 'PENDING';
      record.errorMessage = null;
      record.completedAt = null;
      record.layoutFingerprint = null;
      record.updatedAt = at;
      count++;
    }
    return count;
  }

  /** Records sorted by table then tenant */
  all(): ConsolidationRecord[] {
    return [...this.records.values()].map((record) => ({ ...record })).sort(byKey);
  }
}
