/**
 * Table Layout - Partition, cluster and refresh selection
 *
 * Resolves the physical placement of a consolidated table from its spec and
 * the canonical layout actually available.
 *
 * @module packages/consolidation/services/table-layout
 */

import type {
  CanonicalLayout,
  ConsolidatedTableSpec,
  ReconciledField,
} from '@silvermerge/core/domain';

import type { PartitionDirective, RefreshMode, TruncFunction } from '../types.js';
import { DATE_LIKE_TYPES } from './type-lattice.js';

// =============================================================================
// Types
// =============================================================================

export interface TablePlacement {
  partition: PartitionDirective | null;
  clusterFields: string[];
  refresh: RefreshMode;
  /** Fallbacks taken while resolving, for logging */
  fallbacks: string[];
}

export interface PlacementDefaults {
  /** Partition candidates used when the spec is missing */
  partitionFields: readonly string[];
  /** Tenant id metadata column, always the first cluster field */
  tenantColumn: string;
}

// =============================================================================
// Constants
// =============================================================================

export const MAX_CLUSTER_FIELDS = 4;

/** Date field names tried when no spec candidate is usable */
export const DATE_FIELD_PRIORITY: readonly string[] = [
  'created_on',
  'created_at',
  'date',
  'timestamp',
  'modified_on',
  'updated_on',
];

const TRUNC_BY_TYPE: Readonly<Record<'DATE' | 'DATETIME' | 'TIMESTAMP', TruncFunction>> = {
  DATE: 'DATE_TRUNC',
  DATETIME: 'DATETIME_TRUNC',
  TIMESTAMP: 'TIMESTAMP_TRUNC',
};

// =============================================================================
// Selection
// =============================================================================

function truncFor(field: ReconciledField): TruncFunction | null {
  if (field.isRepeated) {
    return null;
  }
  switch (field.targetType) {
    case 'DATE':
    case 'DATETIME':
    case 'TIMESTAMP':
      return TRUNC_BY_TYPE[field.targetType];
    default:
      return null;
  }
}

function directive(field: ReconciledField | undefined): PartitionDirective | null {
  if (!field) {
    return null;
  }
  const trunc = truncFor(field);
  return trunc ? { field: field.name, trunc } : null;
}

/**
 * First usable partition field
 *
 * Order: spec candidates, then well-known date field names, then the first
 * date-like field of the layout.
 */
export function selectPartitionField(
  layout: CanonicalLayout,
  candidates: readonly string[]
): { partition: PartitionDirective | null; source: 'spec' | 'priority' | 'layout' | 'none' } {
  const byName = new Map(layout.fields.map((field) => [field.name, field]));

  for (const name of candidates) {
    const partition = directive(byName.get(name));
    if (partition) {
      return { partition, source: 'spec' };
    }
  }

  for (const name of DATE_FIELD_PRIORITY) {
    const partition = directive(byName.get(name));
    if (partition) {
      return { partition, source: 'priority' };
    }
  }

  const firstDateLike = layout.fields.find(
    (field) => !field.isRepeated && DATE_LIKE_TYPES.has(field.targetType)
  );
  const partition = directive(firstDateLike);
  return partition ? { partition, source: 'layout' } : { partition: null, source: 'none' };
}

/**
 * Cluster fields: tenant column first, then spec fields present in the layout
 */
export function selectClusterFields(
  layout: CanonicalLayout,
  requested: readonly string[],
  tenantColumn: string
): string[] {
  const available = new Set(
    layout.fields.filter((field) => !field.isRepeated).map((field) => field.name)
  );
  const clusterFields = [tenantColumn];

  for (const name of requested) {
    if (clusterFields.length >= MAX_CLUSTER_FIELDS) break;
    if (available.has(name) && !clusterFields.includes(name)) {
      clusterFields.push(name);
    }
  }

  return clusterFields;
}

/**
 * Resolve the full placement of a consolidated table
 */
export function resolvePlacement(
  layout: CanonicalLayout,
  spec: ConsolidatedTableSpec | null,
  defaults: PlacementDefaults
): TablePlacement {
  const fallbacks: string[] = [];

  if (!spec) {
    fallbacks.push('no table spec, using defaults');
  }

  const { partition, source } = selectPartitionField(
    layout,
    spec?.partitionFields ?? defaults.partitionFields
  );
  if (source === 'priority' || source === 'layout') {
    fallbacks.push(`partition field ${partition?.field ?? ''} detected from layout`);
  } else if (source === 'none') {
    fallbacks.push('no date-like field, table is unpartitioned');
  }

  const clusterFields = selectClusterFields(layout, spec?.clusterFields ?? [], defaults.tenantColumn);

  let refresh: RefreshMode = { mode: 'full_refresh' };
  if (spec?.updateStrategy === 'incremental') {
    const names = new Set(layout.fields.map((field) => field.name));
    const keyFields = spec.mergeKeyFields.filter((name) => names.has(name));

    if (keyFields.length > 0 && keyFields.length === spec.mergeKeyFields.length) {
      refresh = { mode: 'incremental', keyFields: [defaults.tenantColumn, ...keyFields] };
    } else {
      fallbacks.push('merge key fields missing from layout, using full refresh');
    }
  }

  return { partition, clusterFields, refresh, fallbacks };
}
