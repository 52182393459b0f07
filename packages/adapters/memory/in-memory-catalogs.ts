/**
 * In-memory warehouse, spec catalog, tenant directory and checkpoints
 *
 * @module packages/adapters/memory/in-memory-catalogs
 */

import type {
  ConsolidatedTableSpec,
  RenderedStatement,
  TenantRef,
  WorkCursor,
} from '@silvermerge/core/domain';
import {
  ConsolidationError,
  ConsolidationErrorCode,
} from '@silvermerge/core/domain';
import type {
  CatalogColumn,
  ICheckpointStore,
  ISchemaCatalog,
  ITableSpecCatalog,
  ITenantDirectory,
  IViewMaterializer,
} from '@silvermerge/core/ports';

// =============================================================================
// Warehouse
// =============================================================================

/**
 * Column listings keyed by tenant and table
 */
export class InMemorySchemaCatalog implements ISchemaCatalog {
  private readonly tables = new Map<string, CatalogColumn[]>();
  private unavailable: Error | null = null;

  setTable(tenantId: string, tableName: string, columns: CatalogColumn[]): this {
    this.tables.set(`${tenantId}/${tableName}`, columns);
    return this;
  }

  dropTable(tenantId: string, tableName: string): void {
    this.tables.delete(`${tenantId}/${tableName}`);
  }

  /** Make every listing fail with the given error, or recover with null */
  failWith(error: Error | null): void {
    this.unavailable = error;
  }

  async listColumns(tenant: TenantRef, tableName: string): Promise<CatalogColumn[]> {
    if (this.unavailable) {
      throw this.unavailable;
    }
    return [...(this.tables.get(`${tenant.tenantId}/${tableName}`) ?? [])];
  }
}

/**
 * Records every materialized statement instead of executing it
 */
export class RecordingMaterializer implements IViewMaterializer {
  readonly executed: RenderedStatement[] = [];
  private readonly failures = new Map<string, string>();

  /** Reject statements targeting this object id */
  failOn(tableId: string, message = 'rejected'): void {
    this.failures.set(tableId, message);
  }

  recover(tableId: string): void {
    this.failures.delete(tableId);
  }

  async materialize(statement: RenderedStatement): Promise<void> {
    const message = this.failures.get(statement.target.tableId);
    if (message !== undefined) {
      throw new ConsolidationError(ConsolidationErrorCode.MATERIALIZATION_FAILED, message, {
        target: statement.target.tableId,
      });
    }
    this.executed.push(statement);
  }

  /** Executed statements whose target is the given object id */
  forTarget(tableId: string): RenderedStatement[] {
    return this.executed.filter((statement) => statement.target.tableId === tableId);
  }
}

// =============================================================================
// Control Plane
// =============================================================================

export class InMemoryTableSpecCatalog implements ITableSpecCatalog {
  private readonly specs = new Map<string, ConsolidatedTableSpec>();

  constructor(specs: ConsolidatedTableSpec[] = []) {
    for (const spec of specs) {
      this.specs.set(spec.tableName, spec);
    }
  }

  put(spec: ConsolidatedTableSpec): void {
    this.specs.set(spec.tableName, spec);
  }

  async listSpecs(options: { activeOnly?: boolean } = {}): Promise<ConsolidatedTableSpec[]> {
    return [...this.specs.values()]
      .filter((spec) => !options.activeOnly || spec.active)
      .sort((a, b) => (a.tableName < b.tableName ? -1 : a.tableName > b.tableName ? 1 : 0));
  }

  async getSpec(tableName: string): Promise<ConsolidatedTableSpec | null> {
    return this.specs.get(tableName) ?? null;
  }
}

export class InMemoryTenantDirectory implements ITenantDirectory {
  private readonly tenants: Array<{ tenant: TenantRef; active: boolean }> = [];

  constructor(tenants: TenantRef[] = []) {
    for (const tenant of tenants) {
      this.add(tenant);
    }
  }

  add(tenant: TenantRef, active = true): void {
    this.tenants.push({ tenant, active });
  }

  setActive(tenantId: string, active: boolean): void {
    for (const entry of this.tenants) {
      if (entry.tenant.tenantId === tenantId) {
        entry.active = active;
      }
    }
  }

  async listTenants(options: { activeOnly?: boolean } = {}): Promise<TenantRef[]> {
    return this.tenants
      .filter((entry) => !options.activeOnly || entry.active)
      .map((entry) => entry.tenant);
  }
}

export class InMemoryCheckpointStore implements ICheckpointStore {
  readonly cursors = new Map<string, WorkCursor & { runId: string }>();

  async load(shardKey: string): Promise<WorkCursor | null> {
    const saved = this.cursors.get(shardKey);
    return saved ? { tableName: saved.tableName, tenantId: saved.tenantId } : null;
  }

  async save(shardKey: string, cursor: WorkCursor, runId: string): Promise<void> {
    this.cursors.set(shardKey, { ...cursor, runId });
  }

  async clear(shardKey: string): Promise<void> {
    this.cursors.delete(shardKey);
  }
}
