/**
 * SchemaInspector Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { InMemorySchemaCatalog } from '@silvermerge/adapters/memory';
import { ConsolidationError, ConsolidationErrorCode } from '@silvermerge/core/domain';

import { SchemaInspector } from '../services/schema-inspector.js';
import { column, createMockLogger, tenant } from './fixtures.js';

describe('SchemaInspector', () => {
  let catalog: InMemorySchemaCatalog;
  let inspector: SchemaInspector;

  beforeEach(() => {
    catalog = new InMemorySchemaCatalog();
    inspector = new SchemaInspector({ catalog, logger: createMockLogger() });
  });

  describe('inspect', () => {
    it('should normalize types and flatten structs one level', async () => {
      catalog.setTable('1', 'invoices', [
        column('id', 'INTEGER'),
        column('customer', 'STRUCT<id INT64, name STRING>'),
        column('tags', 'ARRAY<STRING>'),
        column('lines', 'ARRAY<STRUCT<sku STRING, qty INT64>>'),
      ]);

      const result = await inspector.inspect(tenant('1'), 'invoices');

      expect(result).toEqual({
        tenantId: '1',
        tableName: 'invoices',
        fields: [
          { name: 'id', declaredType: 'INT64', isRepeated: false, path: ['id'] },
          { name: 'customer_id', declaredType: 'INT64', isRepeated: false, path: ['customer', 'id'] },
          {
            name: 'customer_name',
            declaredType: 'STRING',
            isRepeated: false,
            path: ['customer', 'name'],
          },
          { name: 'tags', declaredType: 'STRING', isRepeated: true, path: ['tags'] },
          { name: 'lines', declaredType: 'STRUCT', isRepeated: true, path: ['lines'] },
        ],
      });
    });

    it('should report an absent table as an empty schema', async () => {
      const result = await inspector.inspect(tenant('1'), 'invoices');

      expect(result).toEqual({ tenantId: '1', tableName: 'invoices', fields: [] });
    });

    it('should wrap catalog failures as CATALOG_UNAVAILABLE', async () => {
      catalog.failWith(new Error('connection refused'));

      await expect(inspector.inspect(tenant('1'), 'invoices')).rejects.toMatchObject({
        code: ConsolidationErrorCode.CATALOG_UNAVAILABLE,
        message: 'Failed to read columns of invoices for tenant 1: connection refused',
      });
    });

    it('should pass through consolidation errors from the catalog', async () => {
      const original = new ConsolidationError(ConsolidationErrorCode.CATALOG_UNAVAILABLE, 'denied');
      catalog.failWith(original);

      await expect(inspector.inspect(tenant('1'), 'invoices')).rejects.toBe(original);
    });
  });

  describe('inspectAll', () => {
    it('should collect unsupported types per tenant', async () => {
      catalog.setTable('1', 'invoices', [column('id', 'INT64')]);
      catalog.setTable('2', 'invoices', [column('id', 'INT64'), column('shape', 'VARIANT')]);

      const result = await inspector.inspectAll([tenant('1'), tenant('2'), tenant('3')], 'invoices');

      expect(result.schemas.map((s) => s.tenantId)).toEqual(['1', '3']);
      expect(result.schemas[1].fields).toEqual([]);
      expect([...result.failures.keys()]).toEqual(['2']);
      expect(result.failures.get('2')?.message).toBe('Unsupported column type: VARIANT');
    });

    it('should propagate catalog failures', async () => {
      catalog.failWith(new Error('timeout'));

      await expect(inspector.inspectAll([tenant('1')], 'invoices')).rejects.toMatchObject({
        code: ConsolidationErrorCode.CATALOG_UNAVAILABLE,
      });
    });
  });
});
