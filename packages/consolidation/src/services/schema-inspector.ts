/**
 * SchemaInspector - Tenant physical schema discovery
 *
 * Reads column listings through the warehouse catalog port and turns them
 * into TenantSchema values:
 * - declared types normalized onto the closed type set
 * - non-repeated STRUCT columns flattened one level into parent_child fields
 * - absent tables reported as empty schemas
 *
 * @module packages/consolidation/services/schema-inspector
 */

import type { Logger } from 'pino';
import type { FieldDescriptor, TenantRef, TenantSchema } from '@silvermerge/core/domain';
import {
  ConsolidationError,
  ConsolidationErrorCode,
  errorMessage,
} from '@silvermerge/core/domain';
import type { CatalogColumn, ISchemaCatalog } from '@silvermerge/core/ports';

import { normalizeDeclaredType } from './type-lattice.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Configuration for SchemaInspector
 */
export interface SchemaInspectorConfig {
  /** Warehouse catalog */
  catalog: ISchemaCatalog;

  /** Logger instance */
  logger: Logger;
}

/**
 * Result of inspecting every tenant of a table
 */
export interface TableInspection {
  tableName: string;
  /** Schemas in tenant order, including empty ones for absent tables */
  schemas: TenantSchema[];
  /** Tenants whose columns could not be interpreted, by tenant id */
  failures: Map<string, ConsolidationError>;
}

// =============================================================================
// SchemaInspector
// =============================================================================

/**
 * Builds TenantSchema values from catalog column listings
 */
export class SchemaInspector {
  private readonly catalog: ISchemaCatalog;
  private readonly logger: Logger;

  constructor(config: SchemaInspectorConfig) {
    this.catalog = config.catalog;
    this.logger = config.logger.child({ component: 'SchemaInspector' });
  }

  /**
   * Inspect one tenant's table
   *
   * @throws ConsolidationError(CATALOG_UNAVAILABLE) when the catalog fails
   * @throws ConsolidationError(UNSUPPORTED_TYPE) for unknown column types
   */
  async inspect(tenant: TenantRef, tableName: string): Promise<TenantSchema> {
    let columns: CatalogColumn[];

    try {
      columns = await this.catalog.listColumns(tenant, tableName);
    } catch (error) {
      if (error instanceof ConsolidationError) {
        throw error;
      }
      throw new ConsolidationError(
        ConsolidationErrorCode.CATALOG_UNAVAILABLE,
        `Failed to read columns of ${tableName} for tenant ${tenant.tenantId}: ${errorMessage(error)}`,
        { tenantId: tenant.tenantId, tableName }
      );
    }

    if (columns.length === 0) {
      this.logger.debug({ tenantId: tenant.tenantId, tableName }, 'Source table absent');
      return { tenantId: tenant.tenantId, tableName, fields: [] };
    }

    const fields = columns.flatMap((column) => this.toFields(column));

    this.logger.debug(
      { tenantId: tenant.tenantId, tableName, columns: columns.length, fields: fields.length },
      'Tenant schema inspected'
    );

    return { tenantId: tenant.tenantId, tableName, fields };
  }

  /**
   * Inspect a table for every tenant, in the given order
   *
   * Per-tenant type errors are collected; catalog failures propagate.
   */
  async inspectAll(tenants: readonly TenantRef[], tableName: string): Promise<TableInspection> {
    const schemas: TenantSchema[] = [];
    const failures = new Map<string, ConsolidationError>();

    for (const tenant of tenants) {
      try {
        schemas.push(await this.inspect(tenant, tableName));
      } catch (error) {
        if (
          error instanceof ConsolidationError &&
          error.code === ConsolidationErrorCode.UNSUPPORTED_TYPE
        ) {
          this.logger.warn(
            { tenantId: tenant.tenantId, tableName, error: error.message },
            'Tenant schema could not be interpreted'
          );
          failures.set(tenant.tenantId, error);
          continue;
        }
        throw error;
      }
    }

    return { tableName, schemas, failures };
  }

  // ===========================================================================
  // Private Helpers
  // ===========================================================================

  private toFields(column: CatalogColumn): FieldDescriptor[] {
    const normalized = normalizeDeclaredType(column.dataType);
    const isRepeated = column.repeated || normalized.isRepeated;

    if (normalized.type !== 'STRUCT' || isRepeated || normalized.members.length === 0) {
      return [
        {
          name: column.name,
          declaredType: normalized.type,
          isRepeated,
          path: [column.name],
        },
      ];
    }

    return normalized.members.map((member) => {
      const memberType = normalizeDeclaredType(member.dataType);
      return {
        name: `${column.name}_${member.name}`,
        declaredType: memberType.type,
        isRepeated: memberType.isRepeated,
        path: [column.name, member.name],
      };
    });
  }
}
