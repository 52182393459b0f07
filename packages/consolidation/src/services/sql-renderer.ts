/**
 * SQL Renderer - Warehouse DDL generation
 *
 * The only place SQL text is produced. Renders structured view definitions
 * into BigQuery Standard SQL statements.
 *
 * @module packages/consolidation/services/sql-renderer
 */

import type { RenderedStatement, TableRef, WarehouseType } from '@silvermerge/core/domain';

import type {
  ColumnSpec,
  ConsolidatedTableDefinition,
  TenantViewDefinition,
  UnionViewDefinition,
  ViewDefinition,
} from '../types.js';

// =============================================================================
// Constants
// =============================================================================

/** Zero values substituted for failed conversions under the type_default policy */
const TYPE_DEFAULTS: Partial<Record<WarehouseType, string>> = {
  STRING: "''",
  INT64: '0',
  FLOAT64: '0.0',
  NUMERIC: "NUMERIC '0'",
  BIGNUMERIC: "BIGNUMERIC '0'",
  BOOL: 'FALSE',
};

const INDENT = '  ';

// =============================================================================
// Quoting
// =============================================================================

export function quoteIdentifier(name: string): string {
  return `\`${name.replace(/\\/g, '\\\\').replace(/`/g, '\\`')}\``;
}

export function quoteTable(ref: TableRef): string {
  return quoteIdentifier(`${ref.projectId}.${ref.datasetId}.${ref.tableId}`);
}

export function quoteString(value: string): string {
  return `'${value.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`;
}

function columnPath(path: readonly string[]): string {
  return path.map(quoteIdentifier).join('.');
}

function typeName(type: WarehouseType, isRepeated: boolean): string {
  return isRepeated ? `ARRAY<${type}>` : type;
}

// =============================================================================
// Column Expressions
// =============================================================================

/**
 * Render one projected column, including its alias
 */
export function renderColumn(column: ColumnSpec): string {
  const alias = quoteIdentifier(column.name);

  switch (column.kind) {
    case 'direct': {
      const source = columnPath(column.path);
      return column.path.length === 1 && column.path[0] === column.name
        ? source
        : `${source} AS ${alias}`;
    }
    case 'safe_cast': {
      const source = columnPath(column.path);
      const cast = `SAFE_CAST(${source} AS ${column.targetType})`;
      const fallback = TYPE_DEFAULTS[column.targetType];
      if (column.onFailure === 'type_default' && fallback !== undefined) {
        return `IF(${source} IS NOT NULL AND ${cast} IS NULL, ${fallback}, ${cast}) AS ${alias}`;
      }
      return `${cast} AS ${alias}`;
    }
    case 'json_string':
      return `TO_JSON_STRING(${columnPath(column.path)}) AS ${alias}`;
    case 'null_literal':
      return `CAST(NULL AS ${typeName(column.targetType, column.isRepeated)}) AS ${alias}`;
    case 'string_literal':
      return `${quoteString(column.value)} AS ${alias}`;
    case 'current_timestamp':
      return `CURRENT_TIMESTAMP() AS ${alias}`;
  }
}

function selectList(expressions: readonly string[]): string {
  return expressions.map((expression) => `${INDENT}${expression}`).join(',\n');
}

// =============================================================================
// Statements
// =============================================================================

function renderTenantView(definition: TenantViewDefinition): string[] {
  return [
    [
      `CREATE OR REPLACE VIEW ${quoteTable(definition.target)} AS`,
      'SELECT',
      selectList(definition.columns.map(renderColumn)),
      `FROM ${quoteTable(definition.source)}`,
    ].join('\n'),
  ];
}

function renderUnionView(definition: UnionViewDefinition): string[] {
  const columns = selectList(definition.columns.map(quoteIdentifier));
  const branches = definition.branches.map(
    (branch) => ['SELECT', columns, `FROM ${quoteTable(branch)}`].join('\n')
  );

  return [
    [`CREATE OR REPLACE VIEW ${quoteTable(definition.target)} AS`, branches.join('\nUNION ALL\n')].join(
      '\n'
    ),
  ];
}

function placementClauses(definition: ConsolidatedTableDefinition): string[] {
  const clauses: string[] = [];
  if (definition.partition) {
    clauses.push(
      `PARTITION BY ${definition.partition.trunc}(${quoteIdentifier(definition.partition.field)}, MONTH)`
    );
  }
  if (definition.clusterFields.length > 0) {
    clauses.push(`CLUSTER BY ${definition.clusterFields.map(quoteIdentifier).join(', ')}`);
  }
  return clauses;
}

function renderConsolidatedTable(definition: ConsolidatedTableDefinition): string[] {
  const target = quoteTable(definition.target);
  const source = quoteTable(definition.source);
  const columns = definition.columns.map(quoteIdentifier);
  const select = ['SELECT', selectList(columns), `FROM ${source}`].join('\n');

  if (definition.refresh.mode === 'full_refresh') {
    return [
      [`CREATE OR REPLACE TABLE ${target}`, ...placementClauses(definition), 'AS', select].join('\n'),
    ];
  }

  const keyColumns = definition.refresh.keyFields;
  const keys = new Set(keyColumns);
  const condition = keyColumns
    .map((name) => `T.${quoteIdentifier(name)} = S.${quoteIdentifier(name)}`)
    .join(' AND ');
  const assignments = columns
    .filter((_, index) => !keys.has(definition.columns[index]))
    .map((column) => `${column} = S.${column}`);

  const merge = [
    `MERGE ${target} T`,
    `USING (\n${select}\n) S`,
    `ON ${condition}`,
    'WHEN MATCHED THEN',
    `${INDENT}UPDATE SET ${assignments.join(', ')}`,
    'WHEN NOT MATCHED THEN',
    `${INDENT}INSERT (${columns.join(', ')})`,
    `${INDENT}VALUES (${columns.map((column) => `S.${column}`).join(', ')})`,
  ].join('\n');

  return [
    [
      `CREATE TABLE IF NOT EXISTS ${target}`,
      ...placementClauses(definition),
      'AS',
      select,
      'LIMIT 0',
    ].join('\n'),
    merge,
  ];
}

/**
 * Render a structured definition into executable statements
 */
export function renderDefinition(definition: ViewDefinition): RenderedStatement {
  switch (definition.shape) {
    case 'tenant_view':
      return { target: definition.target, kind: 'view', statements: renderTenantView(definition) };
    case 'union_view':
      return { target: definition.target, kind: 'view', statements: renderUnionView(definition) };
    case 'consolidated_table':
      return {
        target: definition.target,
        kind: 'table',
        statements: renderConsolidatedTable(definition),
      };
  }
}
