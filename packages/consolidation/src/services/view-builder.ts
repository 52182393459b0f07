/**
 * ViewBuilder - Structured view definitions
 *
 * Produces structured definitions (column specs, branches, placement) for:
 * - per-tenant views projecting a source table onto the canonical layout
 * - the central view unioning completed tenant views
 * - the consolidated table materialized from the central view
 *
 * No SQL text is produced here; see sql-renderer.
 *
 * @module packages/consolidation/services/view-builder
 */

import type {
  CanonicalLayout,
  FieldDescriptor,
  ReconciledField,
  TableRef,
  TenantRef,
  TenantSchema,
} from '@silvermerge/core/domain';
import { ConsolidationError, ConsolidationErrorCode } from '@silvermerge/core/domain';

import type { ConsolidationConfig } from '../config.js';
import type {
  ColumnSpec,
  ConsolidatedTableDefinition,
  MetadataColumnNames,
  TenantViewDefinition,
  UnionViewDefinition,
} from '../types.js';
import type { TablePlacement } from './table-layout.js';
import { JSON_TEXT_TYPES } from './type-lattice.js';

// =============================================================================
// ViewBuilder
// =============================================================================

export class ViewBuilder {
  private readonly config: ConsolidationConfig;

  constructor(config: ConsolidationConfig) {
    this.config = config;
  }

  get metadataColumns(): MetadataColumnNames {
    return this.config.metadataColumns;
  }

  // ===========================================================================
  // Object References
  // ===========================================================================

  sourceTable(tenant: TenantRef, tableName: string): TableRef {
    return { projectId: tenant.projectId, datasetId: tenant.sourceDataset, tableId: tableName };
  }

  tenantView(tenant: TenantRef, tableName: string): TableRef {
    return {
      projectId: tenant.projectId,
      datasetId: this.config.tenantViewDataset,
      tableId: `${this.config.tenantViewPrefix}${tableName}`,
    };
  }

  centralView(tableName: string): TableRef {
    return {
      projectId: this.config.centralProjectId,
      datasetId: this.config.centralViewDataset,
      tableId: `${this.config.centralViewPrefix}${tableName}`,
    };
  }

  consolidatedTable(tableName: string): TableRef {
    return {
      projectId: this.config.centralProjectId,
      datasetId: this.config.consolidatedDataset,
      tableId: `${this.config.consolidatedTablePrefix}${tableName}`,
    };
  }

  /**
   * Output columns of every tenant view, in order
   */
  outputColumns(layout: CanonicalLayout): string[] {
    const { tenantId, sourceProject, processedAt } = this.config.metadataColumns;
    return [...layout.fields.map((field) => field.name), tenantId, sourceProject, processedAt];
  }

  // ===========================================================================
  // Definitions
  // ===========================================================================

  /**
   * Per-tenant view over the tenant's source table
   *
   * @throws ConsolidationError(EMPTY_LAYOUT) when there is nothing to project
   */
  buildTenantView(
    tenant: TenantRef,
    layout: CanonicalLayout,
    schema: TenantSchema
  ): TenantViewDefinition {
    if (layout.fields.length === 0) {
      throw new ConsolidationError(
        ConsolidationErrorCode.EMPTY_LAYOUT,
        `Table ${layout.tableName} has no projectable fields`,
        { tableName: layout.tableName }
      );
    }
    if (schema.fields.length === 0) {
      throw new ConsolidationError(
        ConsolidationErrorCode.EMPTY_LAYOUT,
        `Table ${layout.tableName} is absent for tenant ${tenant.tenantId}`,
        { tableName: layout.tableName, tenantId: tenant.tenantId }
      );
    }

    const byName = new Map<string, FieldDescriptor>();
    for (const field of schema.fields) {
      if (!byName.has(field.name)) {
        byName.set(field.name, field);
      }
    }

    const { tenantId, sourceProject, processedAt } = this.config.metadataColumns;
    const columns: ColumnSpec[] = [
      ...layout.fields.map((field) => this.project(field, byName.get(field.name))),
      { kind: 'string_literal', name: tenantId, value: tenant.tenantId },
      { kind: 'string_literal', name: sourceProject, value: tenant.projectId },
      { kind: 'current_timestamp', name: processedAt },
    ];

    return {
      shape: 'tenant_view',
      target: this.tenantView(tenant, layout.tableName),
      source: this.sourceTable(tenant, layout.tableName),
      columns,
    };
  }

  /**
   * Central view over the given tenants' views
   */
  buildCentralView(layout: CanonicalLayout, tenants: readonly TenantRef[]): UnionViewDefinition {
    if (tenants.length === 0) {
      throw new ConsolidationError(
        ConsolidationErrorCode.EMPTY_LAYOUT,
        `No completed tenants to union for ${layout.tableName}`,
        { tableName: layout.tableName }
      );
    }

    return {
      shape: 'union_view',
      target: this.centralView(layout.tableName),
      branches: tenants.map((tenant) => this.tenantView(tenant, layout.tableName)),
      columns: this.outputColumns(layout),
    };
  }

  /**
   * Consolidated table sourced from the central view
   */
  buildConsolidatedTable(
    layout: CanonicalLayout,
    placement: TablePlacement
  ): ConsolidatedTableDefinition {
    return {
      shape: 'consolidated_table',
      target: this.consolidatedTable(layout.tableName),
      source: this.centralView(layout.tableName),
      columns: this.outputColumns(layout),
      partition: placement.partition,
      clusterFields: placement.clusterFields,
      refresh: placement.refresh,
    };
  }

  // ===========================================================================
  // Private Helpers
  // ===========================================================================

  private project(field: ReconciledField, source: FieldDescriptor | undefined): ColumnSpec {
    if (!source) {
      return {
        kind: 'null_literal',
        name: field.name,
        targetType: field.targetType,
        isRepeated: field.isRepeated,
      };
    }

    if (source.declaredType === field.targetType && source.isRepeated === field.isRepeated) {
      return { kind: 'direct', name: field.name, path: source.path };
    }

    if (
      field.targetType === 'STRING' &&
      (source.isRepeated || JSON_TEXT_TYPES.has(source.declaredType))
    ) {
      return { kind: 'json_string', name: field.name, path: source.path };
    }

    return {
      kind: 'safe_cast',
      name: field.name,
      path: source.path,
      targetType: field.targetType,
      onFailure: this.config.castFailurePolicy,
    };
  }
}
