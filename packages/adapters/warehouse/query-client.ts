/**
 * Warehouse query client
 *
 * The slice of the BigQuery client the warehouse adapters call. A
 * `BigQuery` instance from @google-cloud/bigquery satisfies it.
 *
 * @module packages/adapters/warehouse/query-client
 */

import { BigQuery } from '@google-cloud/bigquery';

export interface QueryRequest {
  query: string;
  params?: Record<string, string>;
  location?: string;
}

export interface WarehouseQueryClient {
  /** Resolves to [rows, ...] */
  query(request: QueryRequest): Promise<unknown[]>;
}

export function createBigQueryClient(projectId: string): WarehouseQueryClient {
  return new BigQuery({ projectId });
}

/**
 * Backtick-quote a dotted path of identifiers as one reference
 */
export function quotePath(parts: readonly string[]): string {
  return '`' + parts.join('.').replace(/\\/g, '\\\\').replace(/`/g, '\\`') + '`';
}

/**
 * Google API errors carry the HTTP status in `code`
 */
export function isNotFound(error: unknown): boolean {
  if (typeof error !== 'object' || error === null) {
    return false;
  }
  if ('code' in error && error.code === 404) {
    return true;
  }
  return 'message' in error && typeof error.message === 'string' && error.message.startsWith('Not found:');
}
