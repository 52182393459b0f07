/**
 * CentralPublisher - Central view and consolidated table publication
 *
 * Runs after per-tenant processing of a table has settled:
 * - checks eligibility of every active tenant against a tracker snapshot
 * - refuses tables whose completed views were rendered against another layout
 * - materializes the central UNION ALL view of COMPLETED tenants
 * - materializes the consolidated table from the central view
 *
 * Never mutates tracked state.
 *
 * @module packages/consolidation/services/central-publisher
 */

import type { Logger } from 'pino';
import type {
  CanonicalLayout,
  ConsolidationRecord,
  PublishResult,
  TenantRef,
} from '@silvermerge/core/domain';
import { errorMessage, isFatalError } from '@silvermerge/core/domain';
import type {
  ITableSpecCatalog,
  ITenantDirectory,
  IViewMaterializer,
} from '@silvermerge/core/ports';

import type { ConsolidationConfig } from '../config.js';
import { recordPublish } from '../metrics.js';
import type { ConsolidationTracker } from './consolidation-tracker.js';
import type { SchemaInspector } from './schema-inspector.js';
import type { SchemaReconciler } from './schema-reconciler.js';
import { renderDefinition } from './sql-renderer.js';
import { resolvePlacement } from './table-layout.js';
import type { ViewBuilder } from './view-builder.js';
import { compareTenantIds } from './work-planner.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Configuration for CentralPublisher
 */
export interface CentralPublisherConfig {
  config: ConsolidationConfig;
  tracker: ConsolidationTracker;
  inspector: SchemaInspector;
  reconciler: SchemaReconciler;
  builder: ViewBuilder;
  materializer: IViewMaterializer;
  specCatalog: ITableSpecCatalog;
  directory: ITenantDirectory;

  /** Logger instance */
  logger: Logger;
}

/**
 * Inputs already computed by the caller
 */
export interface PublishContext {
  tenants: TenantRef[];
  layout: CanonicalLayout;
}

export type Eligibility =
  | { eligible: true; completed: ConsolidationRecord[] }
  | { eligible: false; reason: string };

// =============================================================================
// Helpers
// =============================================================================

/**
 * A table is eligible when something is COMPLETED and every active tenant
 * whose source exists is terminal. An active tenant without a record has
 * not been attempted yet and counts as pending.
 */
export function checkEligibility(
  records: readonly ConsolidationRecord[],
  activeTenantIds: readonly string[]
): Eligibility {
  const byTenant = new Map(records.map((record) => [record.tenantId, record]));
  const active = activeTenantIds.map((tenantId) => ({ tenantId, record: byTenant.get(tenantId) }));

  const completed = active.flatMap(({ record }) =>
    record?.status === 'COMPLETED' ? [record] : []
  );
  if (completed.length === 0) {
    return { eligible: false, reason: 'no_completed_tenants' };
  }

  const pending = active.filter(
    ({ record }) => !record || (record.status === 'PENDING' && record.sourcePresent)
  );
  if (pending.length > 0) {
    return { eligible: false, reason: `pending_tenants:${pending.length}` };
  }

  return { eligible: true, completed };
}

// =============================================================================
// CentralPublisher
// =============================================================================

export class CentralPublisher {
  private readonly config: ConsolidationConfig;
  private readonly tracker: ConsolidationTracker;
  private readonly inspector: SchemaInspector;
  private readonly reconciler: SchemaReconciler;
  private readonly builder: ViewBuilder;
  private readonly materializer: IViewMaterializer;
  private readonly specCatalog: ITableSpecCatalog;
  private readonly directory: ITenantDirectory;
  private readonly logger: Logger;

  constructor(config: CentralPublisherConfig) {
    this.config = config.config;
    this.tracker = config.tracker;
    this.inspector = config.inspector;
    this.reconciler = config.reconciler;
    this.builder = config.builder;
    this.materializer = config.materializer;
    this.specCatalog = config.specCatalog;
    this.directory = config.directory;
    this.logger = config.logger.child({ component: 'CentralPublisher' });
  }

  /**
   * Publish the central view and consolidated table of one table
   *
   * @throws ConsolidationError only for fatal catalog/tracker failures
   */
  async publish(tableName: string, context?: PublishContext): Promise<PublishResult> {
    const result = await this.publishTable(tableName, context);
    recordPublish(result.outcome);
    return result;
  }

  /**
   * Publish several tables, in order
   */
  async publishAll(tableNames: readonly string[]): Promise<PublishResult[]> {
    const results: PublishResult[] = [];
    for (const tableName of tableNames) {
      results.push(await this.publish(tableName));
    }
    return results;
  }

  // ===========================================================================
  // Private Helpers
  // ===========================================================================

  private async publishTable(tableName: string, context?: PublishContext): Promise<PublishResult> {
    const { tenants, layout } = context ?? (await this.analyze(tableName));
    const records = await this.tracker.snapshot(tableName);
    const eligibility = checkEligibility(
      records,
      tenants.map((tenant) => tenant.tenantId)
    );

    if (!eligibility.eligible) {
      this.logger.info({ tableName, reason: eligibility.reason }, 'Table not eligible for publication');
      return { tableName, outcome: 'skipped', tenantIds: [], reason: eligibility.reason };
    }

    const drifted = eligibility.completed.filter(
      (record) => record.layoutFingerprint !== layout.fingerprint
    );
    if (drifted.length > 0) {
      this.logger.warn(
        { tableName, tenantIds: drifted.map((record) => record.tenantId) },
        'Completed tenant views were rendered against another layout, reset the table to republish'
      );
      return { tableName, outcome: 'skipped', tenantIds: [], reason: 'layout_drift' };
    }

    const completedIds = new Set(eligibility.completed.map((record) => record.tenantId));
    const included = tenants
      .filter((tenant) => completedIds.has(tenant.tenantId))
      .sort((a, b) => compareTenantIds(a.tenantId, b.tenantId));
    const tenantIds = included.map((tenant) => tenant.tenantId);

    try {
      const view = this.builder.buildCentralView(layout, included);
      await this.materializer.materialize(renderDefinition(view));

      const spec = await this.specCatalog.getSpec(tableName);
      const placement = resolvePlacement(layout, spec, {
        partitionFields: this.config.defaultPartitionFields,
        tenantColumn: this.config.metadataColumns.tenantId,
      });
      for (const fallback of placement.fallbacks) {
        this.logger.info({ tableName, fallback }, 'Placement fallback');
      }

      const table = this.builder.buildConsolidatedTable(layout, placement);
      await this.materializer.materialize(renderDefinition(table));
    } catch (error) {
      if (isFatalError(error)) {
        throw error;
      }
      this.logger.error({ tableName, error: errorMessage(error) }, 'Central publication failed');
      return { tableName, outcome: 'failed', tenantIds, reason: errorMessage(error) };
    }

    this.logger.info({ tableName, tenants: tenantIds.length }, 'Central view published');
    return { tableName, outcome: 'published', tenantIds };
  }

  private async analyze(tableName: string): Promise<PublishContext> {
    const tenants = await this.directory.listTenants({ activeOnly: true });
    const inspection = await this.inspector.inspectAll(tenants, tableName);
    const layout = this.reconciler.reconcile(tableName, inspection.schemas);
    return { tenants, layout };
  }
}
