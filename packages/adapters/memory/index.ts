/**
 * Memory Adapters
 *
 * Process-local port implementations for tests and dry runs.
 *
 * @module packages/adapters/memory
 */

export { InMemoryTrackerStore } from './in-memory-tracker-store.js';
export {
  InMemorySchemaCatalog,
  RecordingMaterializer,
  InMemoryTableSpecCatalog,
  InMemoryTenantDirectory,
  InMemoryCheckpointStore,
} from './in-memory-catalogs.js';
