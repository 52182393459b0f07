/**
 * ViewBuilder Tests
 */

import { describe, it, expect } from 'vitest';
import { ConsolidationErrorCode } from '@silvermerge/core/domain';

import { SchemaReconciler } from '../services/schema-reconciler.js';
import { ViewBuilder } from '../services/view-builder.js';
import {
  FIXED_NOW,
  captureError,
  createMockLogger,
  createTestConfig,
  field,
  schema,
  tenant,
} from './fixtures.js';

const reconciler = new SchemaReconciler({
  logger: createMockLogger(),
  internalFieldPrefixes: ['_'],
  reservedNames: ['tenant_id', 'source_project', 'silver_processed_at'],
  now: () => FIXED_NOW,
});

const schemaA = schema('1', 'invoices', [
  field('id', 'INT64'),
  field('amount', 'INT64'),
  field('payload', 'JSON'),
  { name: 'customer_id', declaredType: 'INT64', isRepeated: false, path: ['customer', 'id'] },
]);
const schemaB = schema('2', 'invoices', [
  field('id', 'INT64'),
  field('amount', 'FLOAT64'),
  field('payload', 'STRING'),
]);
const layout = reconciler.reconcile('invoices', [schemaA, schemaB]);

describe('ViewBuilder', () => {
  const builder = new ViewBuilder(createTestConfig());

  describe('object references', () => {
    it('should place tenant views in the tenant project', () => {
      expect(builder.tenantView(tenant('1'), 'invoices')).toEqual({
        projectId: 'proj-1',
        datasetId: 'silver',
        tableId: 'vw_invoices',
      });
      expect(builder.sourceTable(tenant('1'), 'invoices')).toEqual({
        projectId: 'proj-1',
        datasetId: 'tenant_proj_1',
        tableId: 'invoices',
      });
    });

    it('should place central objects in the central project', () => {
      expect(builder.centralView('invoices')).toEqual({
        projectId: 'central-proj',
        datasetId: 'silver',
        tableId: 'vw_consolidated_invoices',
      });
      expect(builder.consolidatedTable('invoices')).toEqual({
        projectId: 'central-proj',
        datasetId: 'bronze',
        tableId: 'consolidated_invoices',
      });
    });
  });

  describe('buildTenantView', () => {
    it('should project every layout field and append metadata columns', () => {
      const definition = builder.buildTenantView(tenant('1'), layout, schemaA);

      expect(definition.columns).toEqual([
        { kind: 'safe_cast', name: 'amount', path: ['amount'], targetType: 'FLOAT64', onFailure: 'null' },
        { kind: 'direct', name: 'customer_id', path: ['customer', 'id'] },
        { kind: 'direct', name: 'id', path: ['id'] },
        { kind: 'json_string', name: 'payload', path: ['payload'] },
        { kind: 'string_literal', name: 'tenant_id', value: '1' },
        { kind: 'string_literal', name: 'source_project', value: 'proj-1' },
        { kind: 'current_timestamp', name: 'silver_processed_at' },
      ]);
    });

    it('should emit typed nulls for fields the tenant lacks', () => {
      const definition = builder.buildTenantView(tenant('2'), layout, schemaB);

      expect(definition.columns[0]).toEqual({ kind: 'direct', name: 'amount', path: ['amount'] });
      expect(definition.columns[1]).toEqual({
        kind: 'null_literal',
        name: 'customer_id',
        targetType: 'INT64',
        isRepeated: false,
      });
      expect(definition.columns[3]).toEqual({ kind: 'direct', name: 'payload', path: ['payload'] });
    });

    it('should reject an absent source table', () => {
      const error = captureError(() =>
        builder.buildTenantView(tenant('3'), layout, schema('3', 'invoices', []))
      );

      expect(error).toMatchObject({
        code: ConsolidationErrorCode.EMPTY_LAYOUT,
        message: 'Table invoices is absent for tenant 3',
      });
    });

    it('should reject an empty layout', () => {
      const empty = reconciler.reconcile('audit', [schema('1', 'audit', [field('_row', 'INT64')])]);

      const error = captureError(() =>
        builder.buildTenantView(tenant('1'), empty, schema('1', 'audit', [field('_row', 'INT64')]))
      );

      expect(error).toMatchObject({
        code: ConsolidationErrorCode.EMPTY_LAYOUT,
        message: 'Table audit has no projectable fields',
      });
    });

    it('should carry the cast failure policy', () => {
      const strict = new ViewBuilder(createTestConfig({ castFailurePolicy: 'type_default' }));

      const definition = strict.buildTenantView(tenant('1'), layout, schemaA);

      expect(definition.columns[0]).toMatchObject({ kind: 'safe_cast', onFailure: 'type_default' });
    });
  });

  describe('buildCentralView', () => {
    it('should union the given tenants with the shared column list', () => {
      const definition = builder.buildCentralView(layout, [tenant('1'), tenant('2')]);

      expect(definition.branches.map((branch) => branch.projectId)).toEqual(['proj-1', 'proj-2']);
      expect(definition.columns).toEqual([
        'amount',
        'customer_id',
        'id',
        'payload',
        'tenant_id',
        'source_project',
        'silver_processed_at',
      ]);
    });

    it('should reject an empty tenant list', () => {
      expect(() => builder.buildCentralView(layout, [])).toThrow(
        'No completed tenants to union for invoices'
      );
    });
  });
});
