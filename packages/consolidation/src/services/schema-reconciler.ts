/**
 * SchemaReconciler - Canonical layout derivation
 *
 * Folds every tenant's physical schema of a table into one canonical layout:
 * the union of field names, each with a single target type, conflict and
 * partial flags, and a strictly alphabetical field order.
 *
 * Pure with respect to its inputs and clock: identical schemas produce an
 * identical layout.
 *
 * @module packages/consolidation/services/schema-reconciler
 */

import { createHash } from 'node:crypto';
import type { Logger } from 'pino';
import type {
  CanonicalLayout,
  ReconciledField,
  TenantSchema,
  WarehouseType,
} from '@silvermerge/core/domain';

import { isOpaque, resolveTargetType } from './type-lattice.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Configuration for SchemaReconciler
 */
export interface SchemaReconcilerConfig {
  /** Logger instance */
  logger: Logger;

  /** Field name prefixes of ingestion bookkeeping columns */
  internalFieldPrefixes: readonly string[];

  /** Names reserved for metadata columns */
  reservedNames: readonly string[];

  /** Clock for generatedAt */
  now?: () => Date;
}

interface FieldObservation {
  types: Set<WarehouseType>;
  repeated: Set<boolean>;
  presentIn: number;
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Code-unit string comparison, independent of locale
 */
export function compareCodeUnits(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Fingerprint of the parts of a layout that shape tenant views
 */
export function layoutFingerprint(
  tableName: string,
  fields: readonly Pick<ReconciledField, 'name' | 'targetType' | 'isRepeated'>[]
): string {
  const canonical = JSON.stringify({
    tableName,
    fields: fields.map((field) => [field.name, field.targetType, field.isRepeated]),
  });
  return createHash('sha256').update(canonical).digest('hex');
}

// =============================================================================
// SchemaReconciler
// =============================================================================

export class SchemaReconciler {
  private readonly logger: Logger;
  private readonly internalFieldPrefixes: readonly string[];
  private readonly reservedNames: ReadonlySet<string>;
  private readonly now: () => Date;

  constructor(config: SchemaReconcilerConfig) {
    this.logger = config.logger.child({ component: 'SchemaReconciler' });
    this.internalFieldPrefixes = config.internalFieldPrefixes;
    this.reservedNames = new Set(config.reservedNames);
    this.now = config.now ?? (() => new Date());
  }

  /**
   * Reconcile the schemas of one table into its canonical layout
   *
   * Empty schemas (tenants lacking the table) count towards partiality.
   */
  reconcile(tableName: string, schemas: readonly TenantSchema[]): CanonicalLayout {
    const observations = new Map<string, FieldObservation>();

    for (const schema of schemas) {
      const seen = new Set<string>();

      for (const field of schema.fields) {
        if (seen.has(field.name) || this.isExcluded(field.name)) {
          continue;
        }
        seen.add(field.name);

        let observation = observations.get(field.name);
        if (!observation) {
          observation = { types: new Set(), repeated: new Set(), presentIn: 0 };
          observations.set(field.name, observation);
        }
        observation.types.add(field.declaredType);
        observation.repeated.add(field.isRepeated);
        observation.presentIn++;
      }
    }

    const names = [...observations.keys()].sort(compareCodeUnits);
    const fields = names.map((name, index) => {
      const observation = observations.get(name);
      if (!observation) {
        throw new Error(`Missing observation for ${name}`);
      }
      return this.resolveField(name, index + 1, observation, schemas.length);
    });

    const conflicts = fields.filter((field) => field.hasTypeConflict).length;
    const partial = fields.filter((field) => field.isPartial).length;

    this.logger.info(
      { tableName, tenants: schemas.length, fields: fields.length, conflicts, partial },
      'Canonical layout reconciled'
    );

    return {
      tableName,
      fields,
      tenantCount: schemas.length,
      fingerprint: layoutFingerprint(tableName, fields),
      generatedAt: this.now(),
    };
  }

  // ===========================================================================
  // Private Helpers
  // ===========================================================================

  private isExcluded(name: string): boolean {
    return (
      this.reservedNames.has(name) ||
      this.internalFieldPrefixes.some((prefix) => name.startsWith(prefix))
    );
  }

  private resolveField(
    name: string,
    fieldOrder: number,
    observation: FieldObservation,
    tenantCount: number
  ): ReconciledField {
    const sourceTypes = [...observation.types].sort(compareCodeUnits);
    const isPartial = observation.presentIn < tenantCount;
    const base = { name, fieldOrder, sourceTypes, presentIn: observation.presentIn, isPartial };

    // Repeated in some tenants, scalar in others
    if (observation.repeated.size > 1) {
      return { ...base, targetType: 'STRING', isRepeated: false, hasTypeConflict: true };
    }

    const hasTypeConflict = sourceTypes.length > 1;

    if (observation.repeated.has(true)) {
      if (hasTypeConflict || isOpaque(sourceTypes[0])) {
        return { ...base, targetType: 'STRING', isRepeated: false, hasTypeConflict };
      }
      return { ...base, targetType: sourceTypes[0], isRepeated: true, hasTypeConflict: false };
    }

    return {
      ...base,
      targetType: resolveTargetType(sourceTypes),
      isRepeated: false,
      hasTypeConflict,
    };
  }
}
