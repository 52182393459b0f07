/**
 * BatchOrchestrator - Fleet-wide consolidation runs
 *
 * Enumerates the (table, tenant) work set, takes the shard it owns, and
 * drives every pair through inspection, rendering, materialization and
 * tracking:
 * - COMPLETED pairs are skipped
 * - absent source tables are observed and left PENDING
 * - per-pair failures become ERROR records and the batch continues
 * - catalog and tracker failures abort the run
 *
 * Progress is checkpointed per shard after every pair so a later run can
 * resume after the last finished item.
 *
 * @module packages/consolidation/services/batch-orchestrator
 */

import type { Logger } from 'pino';
import { nanoid } from 'nanoid';
import type {
  BatchSummary,
  CanonicalLayout,
  ConsolidationStatus,
  PublishResult,
  RenderedStatement,
  TenantSchema,
  WorkCursor,
  WorkItem,
} from '@silvermerge/core/domain';
import {
  ConsolidationError,
  ConsolidationErrorCode,
  errorMessage,
  isFatalError,
} from '@silvermerge/core/domain';
import type {
  ICheckpointStore,
  ISchemaCatalog,
  ITableSpecCatalog,
  ITenantDirectory,
  ITrackerStore,
  IViewMaterializer,
} from '@silvermerge/core/ports';

import type { ConsolidationConfig } from '../config.js';
import {
  recordLayoutConflicts,
  recordPairOutcome,
  recordRun,
  recordRunAborted,
  updateStatusGauge,
} from '../metrics.js';
import type { PairOutcome } from '../metrics.js';
import type { ResolvedShard, RunOptions } from '../types.js';
import { CentralPublisher } from './central-publisher.js';
import { ConsolidationTracker } from './consolidation-tracker.js';
import { SchemaInspector } from './schema-inspector.js';
import type { TableInspection } from './schema-inspector.js';
import { SchemaReconciler } from './schema-reconciler.js';
import { renderDefinition } from './sql-renderer.js';
import { ViewBuilder } from './view-builder.js';
import {
  applyCursor,
  applyStartMarker,
  planWorkSet,
  resolveShard,
  sliceShard,
} from './work-planner.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Configuration for BatchOrchestrator
 */
export interface BatchOrchestratorConfig {
  /** Validated consolidation configuration */
  config: ConsolidationConfig;

  /** Warehouse catalog */
  catalog: ISchemaCatalog;

  /** Warehouse view/table materializer */
  materializer: IViewMaterializer;

  /** Tracking record persistence */
  trackerStore: ITrackerStore;

  /** Tables to consolidate */
  specCatalog: ITableSpecCatalog;

  /** Tenants of the fleet */
  directory: ITenantDirectory;

  /** Shard resume cursors */
  checkpoints: ICheckpointStore;

  /** Logger instance */
  logger: Logger;

  /** Clock for records and layouts */
  now?: () => Date;
}

/**
 * Rendered statements of a table, without side effects
 */
export interface TablePlan {
  layout: CanonicalLayout;
  statements: RenderedStatement[];
  /** Tenants whose schema could not be interpreted, with the reason */
  failures: Record<string, string>;
  /** Tenants lacking the table */
  absentTenantIds: string[];
}

interface RunCounters {
  completed: number;
  errored: number;
  skipped: number;
  absent: number;
}

// =============================================================================
// BatchOrchestrator
// =============================================================================

export class BatchOrchestrator {
  private readonly inspector: SchemaInspector;
  private readonly reconciler: SchemaReconciler;
  private readonly builder: ViewBuilder;
  private readonly materializer: IViewMaterializer;
  private readonly specCatalog: ITableSpecCatalog;
  private readonly directory: ITenantDirectory;
  private readonly checkpoints: ICheckpointStore;
  private readonly logger: Logger;

  readonly tracker: ConsolidationTracker;
  readonly publisher: CentralPublisher;

  constructor(config: BatchOrchestratorConfig) {
    this.logger = config.logger.child({ component: 'BatchOrchestrator' });
    this.materializer = config.materializer;
    this.specCatalog = config.specCatalog;
    this.directory = config.directory;
    this.checkpoints = config.checkpoints;

    const { metadataColumns } = config.config;

    this.inspector = new SchemaInspector({ catalog: config.catalog, logger: config.logger });
    this.reconciler = new SchemaReconciler({
      logger: config.logger,
      internalFieldPrefixes: config.config.internalFieldPrefixes,
      reservedNames: [
        metadataColumns.tenantId,
        metadataColumns.sourceProject,
        metadataColumns.processedAt,
      ],
      now: config.now,
    });
    this.builder = new ViewBuilder(config.config);
    this.tracker = new ConsolidationTracker({
      store: config.trackerStore,
      logger: config.logger,
      now: config.now,
    });
    this.publisher = new CentralPublisher({
      config: config.config,
      tracker: this.tracker,
      inspector: this.inspector,
      reconciler: this.reconciler,
      builder: this.builder,
      materializer: config.materializer,
      specCatalog: config.specCatalog,
      directory: config.directory,
      logger: config.logger,
    });
  }

  // ===========================================================================
  // Runs
  // ===========================================================================

  /**
   * Process the shard's share of the work set
   *
   * @throws ConsolidationError(INVALID_SHARD) before any work
   * @throws ConsolidationError for fatal catalog/tracker failures
   */
  async run(options: RunOptions = {}): Promise<BatchSummary> {
    const startTime = Date.now();
    const runId = nanoid(12);
    const shard = resolveShard(options.shardIndex, options.shardCount);
    const publish = options.publish ?? shard.shardCount === 1;

    const tenants = await this.directory.listTenants({ activeOnly: true });
    const tables = await this.listTables(options.tables);
    const items = await this.selectItems(planWorkSet(tables, tenants), shard, options);

    this.logger.info(
      {
        runId,
        shard: shard.shardKey,
        tables: tables.length,
        tenants: tenants.length,
        items: items.length,
        publish,
      },
      'Consolidation run started'
    );

    const counters: RunCounters = { completed: 0, errored: 0, skipped: 0, absent: 0 };
    const tablesProcessed: string[] = [];
    const published: PublishResult[] = [];
    let checkpoint: WorkCursor | null = null;

    try {
      for (const [tableName, tableItems] of groupByTable(items)) {
        const inspection = await this.inspector.inspectAll(tenants, tableName);
        const layout = this.reconciler.reconcile(tableName, inspection.schemas);
        recordLayoutConflicts(tableName, layout.fields.filter((f) => f.hasTypeConflict).length);

        const schemas = new Map(inspection.schemas.map((schema) => [schema.tenantId, schema]));

        for (const item of tableItems) {
          const schema = schemas.get(item.tenant.tenantId);
          const outcome = await this.processPair(item, layout, schema, inspection);
          counters[outcome]++;

          checkpoint = { tableName, tenantId: item.tenant.tenantId };
          await this.saveCheckpoint(shard, checkpoint, runId);
        }

        tablesProcessed.push(tableName);

        if (publish) {
          published.push(await this.publisher.publish(tableName, { tenants, layout }));
        }
      }

      await this.clearCheckpoint(shard);
      checkpoint = null;
    } catch (error) {
      const code = error instanceof ConsolidationError ? error.code : 'UNKNOWN';
      recordRunAborted(code);
      this.logger.error(
        { runId, code, error: errorMessage(error), ...counters, checkpoint },
        'Consolidation run aborted'
      );
      throw error;
    }

    await this.refreshStatusGauge();

    const durationMs = Date.now() - startTime;
    recordRun(durationMs);

    const summary: BatchSummary = {
      runId,
      ...counters,
      tablesProcessed,
      published,
      checkpoint,
      durationMs,
    };

    this.logger.info({ ...summary, published: published.length }, 'Consolidation run finished');
    return summary;
  }

  /**
   * Publish central views of the given (or every active) table
   */
  async publish(tableNames?: string[]): Promise<PublishResult[]> {
    const tables = await this.listTables(tableNames);
    return this.publisher.publishAll(tables);
  }

  /**
   * Reconcile a table and render its statements without materializing
   * anything or touching the tracker
   */
  async plan(tableName: string, options: { tenantId?: string } = {}): Promise<TablePlan> {
    const tenants = await this.directory.listTenants({ activeOnly: true });
    const inspection = await this.inspector.inspectAll(tenants, tableName);
    const layout = this.reconciler.reconcile(tableName, inspection.schemas);
    const schemas = new Map(inspection.schemas.map((schema) => [schema.tenantId, schema]));

    const present = tenants.filter(
      (tenant) => (schemas.get(tenant.tenantId)?.fields.length ?? 0) > 0
    );
    const absentTenantIds = tenants
      .filter((tenant) => schemas.get(tenant.tenantId)?.fields.length === 0)
      .map((tenant) => tenant.tenantId);

    const statements: RenderedStatement[] = [];
    if (layout.fields.length > 0) {
      for (const tenant of present) {
        const schema = schemas.get(tenant.tenantId);
        if (!schema || (options.tenantId && options.tenantId !== tenant.tenantId)) {
          continue;
        }
        statements.push(renderDefinition(this.builder.buildTenantView(tenant, layout, schema)));
      }
      if (!options.tenantId && present.length > 0) {
        statements.push(renderDefinition(this.builder.buildCentralView(layout, present)));
      }
    }

    const failures: Record<string, string> = {};
    for (const [tenantId, error] of inspection.failures) {
      failures[tenantId] = error.message;
    }

    return { layout, statements, failures, absentTenantIds };
  }

  // ===========================================================================
  // Pair Processing
  // ===========================================================================

  private async processPair(
    item: WorkItem,
    layout: CanonicalLayout,
    schema: TenantSchema | undefined,
    inspection: TableInspection
  ): Promise<PairOutcome> {
    const key = { tenantId: item.tenant.tenantId, tableName: item.tableName };
    const record = await this.tracker.get(key);

    if (record?.status === 'COMPLETED') {
      recordPairOutcome(item.tableName, 'skipped');
      return 'skipped';
    }

    const inspectionFailure = inspection.failures.get(key.tenantId);
    if (inspectionFailure) {
      await this.tracker.fail(key, inspectionFailure.message);
      recordPairOutcome(item.tableName, 'errored');
      return 'errored';
    }

    if (!schema || schema.fields.length === 0) {
      await this.tracker.observe(key, false);
      this.logger.info({ ...key }, 'Source table absent, left pending');
      recordPairOutcome(item.tableName, 'absent');
      return 'absent';
    }

    await this.tracker.observe(key, true);

    const startTime = Date.now();
    try {
      const definition = this.builder.buildTenantView(item.tenant, layout, schema);
      await this.materializer.materialize(renderDefinition(definition));
    } catch (error) {
      if (isFatalError(error)) {
        throw error;
      }
      await this.tracker.fail(key, errorMessage(error));
      recordPairOutcome(item.tableName, 'errored', Date.now() - startTime);
      return 'errored';
    }

    await this.tracker.complete(key, layout.fingerprint);
    recordPairOutcome(item.tableName, 'completed', Date.now() - startTime);
    return 'completed';
  }

  // ===========================================================================
  // Private Helpers
  // ===========================================================================

  private async listTables(only?: string[]): Promise<string[]> {
    const specs = await this.specCatalog.listSpecs({ activeOnly: true });
    const names = specs.map((spec) => spec.tableName);

    if (!only || only.length === 0) {
      return names;
    }

    const unknown = only.filter((name) => !names.includes(name));
    if (unknown.length > 0) {
      this.logger.warn({ tables: unknown }, 'Requested tables have no active spec, ignoring');
    }
    return names.filter((name) => only.includes(name));
  }

  private async selectItems(
    workSet: WorkItem[],
    shard: ResolvedShard,
    options: RunOptions
  ): Promise<WorkItem[]> {
    let items = sliceShard(workSet, shard);

    if (options.resume) {
      const cursor = await this.loadCheckpoint(shard);
      if (cursor) {
        this.logger.info({ shard: shard.shardKey, cursor }, 'Resuming after checkpoint');
        items = applyCursor(items, cursor);
      }
    }

    if (options.startMarker) {
      items = applyStartMarker(items, options.startMarker);
    }

    return items;
  }

  private async loadCheckpoint(shard: ResolvedShard): Promise<WorkCursor | null> {
    try {
      return await this.checkpoints.load(shard.shardKey);
    } catch (error) {
      throw trackerUnavailable('load checkpoint', error);
    }
  }

  private async saveCheckpoint(
    shard: ResolvedShard,
    cursor: WorkCursor,
    runId: string
  ): Promise<void> {
    try {
      await this.checkpoints.save(shard.shardKey, cursor, runId);
    } catch (error) {
      throw trackerUnavailable('save checkpoint', error);
    }
  }

  private async clearCheckpoint(shard: ResolvedShard): Promise<void> {
    try {
      await this.checkpoints.clear(shard.shardKey);
    } catch (error) {
      throw trackerUnavailable('clear checkpoint', error);
    }
  }

  private async refreshStatusGauge(): Promise<void> {
    const summaries = await this.tracker.summarize();
    const totals: Record<ConsolidationStatus, number> = { PENDING: 0, COMPLETED: 0, ERROR: 0 };
    for (const summary of summaries) {
      totals.PENDING += summary.pending;
      totals.COMPLETED += summary.completed;
      totals.ERROR += summary.errored;
    }
    updateStatusGauge(totals);
  }
}

// =============================================================================
// Helpers
// =============================================================================

function groupByTable(items: readonly WorkItem[]): Map<string, WorkItem[]> {
  const groups = new Map<string, WorkItem[]>();
  for (const item of items) {
    const group = groups.get(item.tableName);
    if (group) {
      group.push(item);
    } else {
      groups.set(item.tableName, [item]);
    }
  }
  return groups;
}

function trackerUnavailable(operation: string, error: unknown): ConsolidationError {
  return new ConsolidationError(
    ConsolidationErrorCode.TRACKER_UNAVAILABLE,
    `Failed to ${operation}: ${errorMessage(error)}`,
    { operation }
  );
}
