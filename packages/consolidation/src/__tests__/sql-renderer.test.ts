/**
 * SQL Renderer Tests
 */

import { describe, it, expect } from 'vitest';

import { SchemaReconciler } from '../services/schema-reconciler.js';
import {
  quoteIdentifier,
  quoteString,
  quoteTable,
  renderColumn,
  renderDefinition,
} from '../services/sql-renderer.js';
import { ViewBuilder } from '../services/view-builder.js';
import type { ConsolidatedTableDefinition, UnionViewDefinition } from '../types.js';
import {
  FIXED_NOW,
  createMockLogger,
  createTestConfig,
  field,
  schema,
  tenant,
} from './fixtures.js';

const COLUMNS = ['amount', 'id', 'tenant_id'];

function consolidated(
  overrides: Partial<ConsolidatedTableDefinition> = {}
): ConsolidatedTableDefinition {
  return {
    shape: 'consolidated_table',
    target: { projectId: 'central-proj', datasetId: 'bronze', tableId: 'consolidated_invoices' },
    source: { projectId: 'central-proj', datasetId: 'silver', tableId: 'vw_consolidated_invoices' },
    columns: COLUMNS,
    partition: { field: 'created_on', trunc: 'DATE_TRUNC' },
    clusterFields: ['tenant_id'],
    refresh: { mode: 'full_refresh' },
    ...overrides,
  };
}

describe('SQL Renderer', () => {
  describe('quoting', () => {
    it('should wrap identifiers in backticks', () => {
      expect(quoteIdentifier('amount')).toBe('`amount`');
      expect(quoteIdentifier('we`ird')).toBe('`we\\`ird`');
      expect(quoteIdentifier('back\\slash')).toBe('`back\\\\slash`');
    });

    it('should quote a table reference as one path', () => {
      expect(quoteTable({ projectId: 'proj-1', datasetId: 'silver', tableId: 'vw_a' })).toBe(
        '`proj-1.silver.vw_a`'
      );
    });

    it('should escape string literals', () => {
      expect(quoteString("O'Brien")).toBe("'O\\'Brien'");
      expect(quoteString('C:\\tmp')).toBe("'C:\\\\tmp'");
    });
  });

  describe('renderColumn', () => {
    it('should omit the alias when the path already carries the name', () => {
      expect(renderColumn({ kind: 'direct', name: 'id', path: ['id'] })).toBe('`id`');
    });

    it('should alias nested paths', () => {
      expect(renderColumn({ kind: 'direct', name: 'customer_id', path: ['customer', 'id'] })).toBe(
        '`customer`.`id` AS `customer_id`'
      );
    });

    it('should render a null-on-failure cast', () => {
      expect(
        renderColumn({
          kind: 'safe_cast',
          name: 'amount',
          path: ['amount'],
          targetType: 'FLOAT64',
          onFailure: 'null',
        })
      ).toBe('SAFE_CAST(`amount` AS FLOAT64) AS `amount`');
    });

    it('should substitute the type default when a non-null value fails to convert', () => {
      expect(
        renderColumn({
          kind: 'safe_cast',
          name: 'amount',
          path: ['amount'],
          targetType: 'FLOAT64',
          onFailure: 'type_default',
        })
      ).toBe(
        'IF(`amount` IS NOT NULL AND SAFE_CAST(`amount` AS FLOAT64) IS NULL, 0.0, SAFE_CAST(`amount` AS FLOAT64)) AS `amount`'
      );
    });

    it('should fall back to a plain cast for types without a default', () => {
      expect(
        renderColumn({
          kind: 'safe_cast',
          name: 'seen_on',
          path: ['seen_on'],
          targetType: 'DATE',
          onFailure: 'type_default',
        })
      ).toBe('SAFE_CAST(`seen_on` AS DATE) AS `seen_on`');
    });

    it('should render typed nulls', () => {
      expect(
        renderColumn({ kind: 'null_literal', name: 'tags', targetType: 'STRING', isRepeated: true })
      ).toBe('CAST(NULL AS ARRAY<STRING>) AS `tags`');
      expect(
        renderColumn({ kind: 'null_literal', name: 'qty', targetType: 'INT64', isRepeated: false })
      ).toBe('CAST(NULL AS INT64) AS `qty`');
    });

    it('should render JSON text and literals', () => {
      expect(renderColumn({ kind: 'json_string', name: 'payload', path: ['payload'] })).toBe(
        'TO_JSON_STRING(`payload`) AS `payload`'
      );
      expect(renderColumn({ kind: 'string_literal', name: 'tenant_id', value: "t'1" })).toBe(
        "'t\\'1' AS `tenant_id`"
      );
      expect(renderColumn({ kind: 'current_timestamp', name: 'silver_processed_at' })).toBe(
        'CURRENT_TIMESTAMP() AS `silver_processed_at`'
      );
    });
  });

  describe('renderDefinition', () => {
    it('should render a tenant view built from a reconciled layout', () => {
      const reconciler = new SchemaReconciler({
        logger: createMockLogger(),
        internalFieldPrefixes: ['_'],
        reservedNames: [],
        now: () => FIXED_NOW,
      });
      const schemaA = schema('1', 'invoices', [field('id', 'INT64'), field('amount', 'INT64')]);
      const schemaB = schema('2', 'invoices', [
        field('id', 'INT64'),
        field('amount', 'FLOAT64'),
        field('notes', 'STRING'),
      ]);
      const layout = reconciler.reconcile('invoices', [schemaA, schemaB]);
      const builder = new ViewBuilder(createTestConfig());

      const rendered = renderDefinition(builder.buildTenantView(tenant('1'), layout, schemaA));

      expect(rendered.kind).toBe('view');
      expect(rendered.target).toEqual({
        projectId: 'proj-1',
        datasetId: 'silver',
        tableId: 'vw_invoices',
      });
      expect(rendered.statements).toEqual([
        [
          'CREATE OR REPLACE VIEW `proj-1.silver.vw_invoices` AS',
          'SELECT',
          '  SAFE_CAST(`amount` AS FLOAT64) AS `amount`,',
          '  `id`,',
          '  CAST(NULL AS STRING) AS `notes`,',
          "  '1' AS `tenant_id`,",
          "  'proj-1' AS `source_project`,",
          '  CURRENT_TIMESTAMP() AS `silver_processed_at`',
          'FROM `proj-1.tenant_proj_1.invoices`',
        ].join('\n'),
      ]);
    });

    it('should render the central view as a union of branches', () => {
      const definition: UnionViewDefinition = {
        shape: 'union_view',
        target: { projectId: 'central-proj', datasetId: 'silver', tableId: 'vw_consolidated_a' },
        branches: [
          { projectId: 'proj-1', datasetId: 'silver', tableId: 'vw_a' },
          { projectId: 'proj-2', datasetId: 'silver', tableId: 'vw_a' },
        ],
        columns: ['id', 'tenant_id'],
      };

      expect(renderDefinition(definition).statements).toEqual([
        [
          'CREATE OR REPLACE VIEW `central-proj.silver.vw_consolidated_a` AS',
          'SELECT',
          '  `id`,',
          '  `tenant_id`',
          'FROM `proj-1.silver.vw_a`',
          'UNION ALL',
          'SELECT',
          '  `id`,',
          '  `tenant_id`',
          'FROM `proj-2.silver.vw_a`',
        ].join('\n'),
      ]);
    });

    it('should render a full refresh table', () => {
      const rendered = renderDefinition(consolidated());

      expect(rendered.kind).toBe('table');
      expect(rendered.statements).toEqual([
        [
          'CREATE OR REPLACE TABLE `central-proj.bronze.consolidated_invoices`',
          'PARTITION BY DATE_TRUNC(`created_on`, MONTH)',
          'CLUSTER BY `tenant_id`',
          'AS',
          'SELECT',
          '  `amount`,',
          '  `id`,',
          '  `tenant_id`',
          'FROM `central-proj.silver.vw_consolidated_invoices`',
        ].join('\n'),
      ]);
    });

    it('should omit placement clauses for an unpartitioned, unclustered table', () => {
      const rendered = renderDefinition(consolidated({ partition: null, clusterFields: [] }));

      expect(rendered.statements[0].split('\n').slice(0, 2)).toEqual([
        'CREATE OR REPLACE TABLE `central-proj.bronze.consolidated_invoices`',
        'AS',
      ]);
    });

    it('should render an incremental table as create-if-missing plus merge', () => {
      const rendered = renderDefinition(
        consolidated({ refresh: { mode: 'incremental', keyFields: ['tenant_id', 'id'] } })
      );

      expect(rendered.statements).toHaveLength(2);
      expect(rendered.statements[0]).toBe(
        [
          'CREATE TABLE IF NOT EXISTS `central-proj.bronze.consolidated_invoices`',
          'PARTITION BY DATE_TRUNC(`created_on`, MONTH)',
          'CLUSTER BY `tenant_id`',
          'AS',
          'SELECT',
          '  `amount`,',
          '  `id`,',
          '  `tenant_id`',
          'FROM `central-proj.silver.vw_consolidated_invoices`',
          'LIMIT 0',
        ].join('\n')
      );
      expect(rendered.statements[1]).toBe(
        [
          'MERGE `central-proj.bronze.consolidated_invoices` T',
          'USING (',
          'SELECT',
          '  `amount`,',
          '  `id`,',
          '  `tenant_id`',
          'FROM `central-proj.silver.vw_consolidated_invoices`',
          ') S',
          'ON T.`tenant_id` = S.`tenant_id` AND T.`id` = S.`id`',
          'WHEN MATCHED THEN',
          '  UPDATE SET `amount` = S.`amount`',
          'WHEN NOT MATCHED THEN',
          '  INSERT (`amount`, `id`, `tenant_id`)',
          '  VALUES (S.`amount`, S.`id`, S.`tenant_id`)',
        ].join('\n')
      );
    });
  });
});
