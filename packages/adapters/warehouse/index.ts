/**
 * Warehouse Adapters
 *
 * BigQuery implementations of the catalog and materializer ports.
 *
 * @module packages/adapters/warehouse
 */

export {
  createBigQueryClient,
  isNotFound,
  quotePath,
  type QueryRequest,
  type WarehouseQueryClient,
} from './query-client.js';
export {
  BigQuerySchemaCatalog,
  type BigQuerySchemaCatalogConfig,
} from './bigquery-schema-catalog.js';
export {
  BigQueryMaterializer,
  type BigQueryMaterializerConfig,
} from './bigquery-materializer.js';
