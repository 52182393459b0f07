/**
 * Rendered Statement Types
 *
 * Output of the SQL renderer, input of the view materializer.
 *
 * @module packages/core/domain/statements
 */

/**
 * Kind of object a statement creates or replaces.
 */
export type MaterializationKind = 'view' | 'table';

/**
 * Fully-qualified warehouse object reference.
 */
export interface TableRef {
  projectId: string;
  datasetId: string;
  tableId: string;
}

/**
 * Ready-to-execute DDL/DML for one warehouse object.
 *
 * Statements run in order; later statements may depend on earlier ones.
 */
export interface RenderedStatement {
  target: TableRef;
  kind: MaterializationKind;
  statements: string[];
}
