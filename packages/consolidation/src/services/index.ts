/**
 * Consolidation Services
 *
 * @module packages/consolidation/services
 */

export {
  normalizeDeclaredType,
  widen,
  resolveTargetType,
  isOpaque,
  JSON_TEXT_TYPES,
  DATE_LIKE_TYPES,
  type NormalizedType,
  type StructMember,
} from './type-lattice.js';

export {
  SchemaInspector,
  type SchemaInspectorConfig,
  type TableInspection,
} from './schema-inspector.js';

export {
  SchemaReconciler,
  compareCodeUnits,
  layoutFingerprint,
  type SchemaReconcilerConfig,
} from './schema-reconciler.js';

export { ViewBuilder } from './view-builder.js';

export {
  renderDefinition,
  renderColumn,
  quoteIdentifier,
  quoteTable,
  quoteString,
} from './sql-renderer.js';

export {
  resolvePlacement,
  selectPartitionField,
  selectClusterFields,
  MAX_CLUSTER_FIELDS,
  DATE_FIELD_PRIORITY,
  type TablePlacement,
  type PlacementDefaults,
} from './table-layout.js';

export {
  ConsolidationTracker,
  canTransition,
  toTableCompletion,
  type ConsolidationTrackerConfig,
} from './consolidation-tracker.js';

export {
  compareTenantIds,
  planWorkSet,
  resolveShard,
  sliceShard,
  applyStartMarker,
  applyCursor,
} from './work-planner.js';

export {
  CentralPublisher,
  checkEligibility,
  type CentralPublisherConfig,
  type PublishContext,
  type Eligibility,
} from './central-publisher.js';

export {
  BatchOrchestrator,
  type BatchOrchestratorConfig,
  type TablePlan,
} from './batch-orchestrator.js';
