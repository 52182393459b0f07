/**
 * BatchOrchestrator Tests
 *
 * Runs against the in-memory adapters.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ConsolidationErrorCode } from '@silvermerge/core/domain';

import { FIXED_NOW, column, createHarness, tableSpec, type Harness } from './fixtures.js';

function statuses(harness: Harness): string[] {
  return harness.trackerStore
    .all()
    .map((record) => `${record.tableName}/${record.tenantId}:${record.status}`);
}

describe('BatchOrchestrator', () => {
  let harness: Harness;

  beforeEach(() => {
    harness = createHarness();
  });

  describe('run', () => {
    it('should consolidate every present pair and publish each table', async () => {
      const summary = await harness.orchestrator.run();

      expect(summary).toMatchObject({
        completed: 5,
        errored: 0,
        skipped: 0,
        absent: 1,
        tablesProcessed: ['invoices', 'orders'],
        checkpoint: null,
      });
      expect(summary.published).toEqual([
        { tableName: 'invoices', outcome: 'published', tenantIds: ['1', '2'] },
        { tableName: 'orders', outcome: 'published', tenantIds: ['1', '2', '3'] },
      ]);
      expect(statuses(harness)).toEqual([
        'invoices/1:COMPLETED',
        'invoices/2:COMPLETED',
        'invoices/3:PENDING',
        'orders/1:COMPLETED',
        'orders/2:COMPLETED',
        'orders/3:COMPLETED',
      ]);
      expect(harness.trackerStore.all()[2].sourcePresent).toBe(false);
      expect(harness.checkpoints.cursors.size).toBe(0);
    });

    it('should materialize tenant views in their own projects', async () => {
      await harness.orchestrator.run();

      const views = harness.materializer.forTarget('vw_invoices');
      expect(views.map((statement) => statement.target.projectId)).toEqual(['proj-1', 'proj-2']);
      expect(harness.materializer.forTarget('vw_consolidated_invoices')).toHaveLength(1);
      expect(harness.materializer.forTarget('consolidated_invoices')).toHaveLength(1);
    });

    it('should skip completed pairs on a second run', async () => {
      await harness.orchestrator.run();

      const summary = await harness.orchestrator.run();

      expect(summary).toMatchObject({ completed: 0, errored: 0, skipped: 5, absent: 1 });
      expect(harness.materializer.forTarget('vw_invoices')).toHaveLength(2);
      expect(harness.materializer.forTarget('vw_consolidated_invoices')).toHaveLength(2);
    });

    it('should record materialization failures and continue', async () => {
      harness.materializer.failOn('vw_invoices', 'quota exceeded');

      const summary = await harness.orchestrator.run();

      expect(summary).toMatchObject({ completed: 3, errored: 2, absent: 1 });
      expect(summary.published[0]).toEqual({
        tableName: 'invoices',
        outcome: 'skipped',
        tenantIds: [],
        reason: 'no_completed_tenants',
      });
      const failed = await harness.trackerStore.get({ tenantId: '1', tableName: 'invoices' });
      expect(failed).toMatchObject({ status: 'ERROR', errorMessage: 'quota exceeded' });
    });

    it('should retry errored pairs once the cause is fixed', async () => {
      harness.materializer.failOn('vw_invoices');
      await harness.orchestrator.run();
      harness.materializer.recover('vw_invoices');

      const summary = await harness.orchestrator.run();

      expect(summary).toMatchObject({ completed: 2, skipped: 3, absent: 1 });
      expect(summary.published[0]).toMatchObject({ outcome: 'published', tenantIds: ['1', '2'] });
    });

    it('should mark tenants with uninterpretable schemas as errored', async () => {
      harness.catalog.setTable('2', 'invoices', [column('id', 'INT64'), column('blob', 'VARIANT')]);

      const summary = await harness.orchestrator.run();

      expect(summary).toMatchObject({ completed: 4, errored: 1, absent: 1 });
      const record = await harness.trackerStore.get({ tenantId: '2', tableName: 'invoices' });
      expect(record).toMatchObject({
        status: 'ERROR',
        errorMessage: 'Unsupported column type: VARIANT',
      });
      expect(summary.published[0]).toMatchObject({ outcome: 'published', tenantIds: ['1'] });
    });

    it('should abort on catalog failure before touching the tracker', async () => {
      harness.catalog.failWith(new Error('permission denied'));

      await expect(harness.orchestrator.run()).rejects.toMatchObject({
        code: ConsolidationErrorCode.CATALOG_UNAVAILABLE,
      });
      expect(harness.trackerStore.all()).toEqual([]);
      expect(harness.materializer.executed).toEqual([]);
    });

    it('should leave a checkpoint behind on abort and resume after it', async () => {
      const listColumns = harness.catalog.listColumns.bind(harness.catalog);
      const spy = vi
        .spyOn(harness.catalog, 'listColumns')
        .mockImplementation(async (target, tableName) => {
          if (tableName === 'orders') {
            throw new Error('permission denied');
          }
          return listColumns(target, tableName);
        });

      await expect(harness.orchestrator.run()).rejects.toMatchObject({
        code: ConsolidationErrorCode.CATALOG_UNAVAILABLE,
      });
      expect(harness.checkpoints.cursors.get('shard-0-of-1')).toMatchObject({
        tableName: 'invoices',
        tenantId: '3',
      });

      spy.mockRestore();
      const summary = await harness.orchestrator.run({ resume: true });

      expect(summary).toMatchObject({ completed: 3, skipped: 0, tablesProcessed: ['orders'] });
      expect(harness.checkpoints.cursors.size).toBe(0);
    });

    it('should resume strictly after a stored cursor', async () => {
      await harness.checkpoints.save(
        'shard-0-of-1',
        { tableName: 'invoices', tenantId: '2' },
        'earlier-run'
      );

      const summary = await harness.orchestrator.run({ resume: true });

      expect(summary).toMatchObject({ completed: 3, absent: 1 });
      expect(await harness.trackerStore.get({ tenantId: '1', tableName: 'invoices' })).toBeNull();
      expect(summary.published[0]).toMatchObject({
        tableName: 'invoices',
        outcome: 'skipped',
        reason: 'no_completed_tenants',
      });
    });

    it('should ignore the stored cursor without resume', async () => {
      await harness.checkpoints.save('shard-0-of-1', { tableName: 'orders', tenantId: '3' }, 'old');

      const summary = await harness.orchestrator.run();

      expect(summary.completed).toBe(5);
    });

    it('should process only its shard and not publish by default', async () => {
      const summary = await harness.orchestrator.run({ shardIndex: 1, shardCount: 2 });

      expect(summary).toMatchObject({ completed: 3, tablesProcessed: ['orders'], published: [] });
      expect(statuses(harness)).toEqual([
        'orders/1:COMPLETED',
        'orders/2:COMPLETED',
        'orders/3:COMPLETED',
      ]);
    });

    it('should publish from a shard when asked', async () => {
      const summary = await harness.orchestrator.run({ shardIndex: 1, shardCount: 2, publish: true });

      expect(summary.published).toEqual([
        { tableName: 'orders', outcome: 'published', tenantIds: ['1', '2', '3'] },
      ]);
    });

    it('should reject an invalid shard before any work', async () => {
      await expect(harness.orchestrator.run({ shardIndex: 2, shardCount: 2 })).rejects.toMatchObject({
        code: ConsolidationErrorCode.INVALID_SHARD,
      });
      expect(harness.trackerStore.all()).toEqual([]);
    });

    it('should restrict the run to requested tables with an active spec', async () => {
      const summary = await harness.orchestrator.run({ tables: ['orders', 'payments'] });

      expect(summary.tablesProcessed).toEqual(['orders']);
    });

    it('should skip tables before the start marker', async () => {
      const summary = await harness.orchestrator.run({ startMarker: 'j' });

      expect(summary.tablesProcessed).toEqual(['orders']);
    });

    it('should skip inactive table specs', async () => {
      harness.specCatalog.put(tableSpec('orders', { active: false }));

      const summary = await harness.orchestrator.run();

      expect(summary.tablesProcessed).toEqual(['invoices']);
    });
  });

  describe('publication barrier', () => {
    it('should not publish a table before every shard has run', async () => {
      await harness.orchestrator.run({ shardIndex: 2, shardCount: 3 });

      expect(statuses(harness)).toEqual(['orders/2:COMPLETED', 'orders/3:COMPLETED']);
      expect(await harness.orchestrator.publish(['orders'])).toEqual([
        { tableName: 'orders', outcome: 'skipped', tenantIds: [], reason: 'pending_tenants:1' },
      ]);
      expect(harness.materializer.forTarget('vw_consolidated_orders')).toEqual([]);

      await harness.orchestrator.run({ shardIndex: 0, shardCount: 3 });
      await harness.orchestrator.run({ shardIndex: 1, shardCount: 3 });

      expect(await harness.orchestrator.publish()).toEqual([
        { tableName: 'invoices', outcome: 'published', tenantIds: ['1', '2'] },
        { tableName: 'orders', outcome: 'published', tenantIds: ['1', '2', '3'] },
      ]);
    });

    it('should drop a tenant from the central view once it is no longer completed', async () => {
      await harness.orchestrator.run();
      await harness.trackerStore.upsert({
        tenantId: '2',
        tableName: 'orders',
        status: 'ERROR',
        errorMessage: 'source dropped',
        sourcePresent: true,
        layoutFingerprint: null,
        at: FIXED_NOW,
      });

      const results = await harness.orchestrator.publish(['orders']);

      expect(results).toEqual([
        { tableName: 'orders', outcome: 'published', tenantIds: ['1', '3'] },
      ]);
      const views = harness.materializer.forTarget('vw_consolidated_orders');
      expect(views).toHaveLength(2);
      expect(views[1].statements[0]).not.toContain('proj-2');
    });
  });

  describe('reset', () => {
    it('should reprocess every present pair and reproduce the same layout and view', async () => {
      await harness.orchestrator.run();
      const before = await harness.trackerStore.get({ tenantId: '1', tableName: 'invoices' });
      const [firstView] = harness.materializer.forTarget('vw_consolidated_invoices');

      const count = await harness.orchestrator.tracker.reset({ tableName: 'invoices' });
      const summary = await harness.orchestrator.run({ tables: ['invoices'] });

      expect(count).toBe(3);
      expect(summary).toMatchObject({ completed: 2, skipped: 0, absent: 1 });
      expect(statuses(harness).slice(0, 3)).toEqual([
        'invoices/1:COMPLETED',
        'invoices/2:COMPLETED',
        'invoices/3:PENDING',
      ]);

      const after = await harness.trackerStore.get({ tenantId: '1', tableName: 'invoices' });
      expect(before?.layoutFingerprint).toEqual(expect.any(String));
      expect(after?.layoutFingerprint).toBe(before?.layoutFingerprint);

      const views = harness.materializer.forTarget('vw_consolidated_invoices');
      expect(views).toHaveLength(2);
      expect(views[1].statements).toEqual(firstView.statements);
    });
  });

  describe('plan', () => {
    it('should render statements without side effects', async () => {
      const plan = await harness.orchestrator.plan('invoices');

      expect(plan.statements.map((statement) => statement.target)).toEqual([
        { projectId: 'proj-1', datasetId: 'silver', tableId: 'vw_invoices' },
        { projectId: 'proj-2', datasetId: 'silver', tableId: 'vw_invoices' },
        { projectId: 'central-proj', datasetId: 'silver', tableId: 'vw_consolidated_invoices' },
      ]);
      expect(plan.absentTenantIds).toEqual(['3']);
      expect(plan.failures).toEqual({});
      expect(plan.layout.fields.map((field) => field.name)).toEqual(['amount', 'created_on', 'id']);
      expect(harness.materializer.executed).toEqual([]);
      expect(harness.trackerStore.all()).toEqual([]);
    });

    it('should limit the plan to one tenant view', async () => {
      const plan = await harness.orchestrator.plan('invoices', { tenantId: '2' });

      expect(plan.statements).toHaveLength(1);
      expect(plan.statements[0].target.projectId).toBe('proj-2');
    });
  });
});
