/**
 * Core Domain Types
 *
 * Exports all domain types for tenant schema consolidation.
 * Domain types are independent of warehouse and control-plane infrastructure.
 */

// Consolidation Domain Types
export * from './consolidation.js';

// Rendered Warehouse Statements
export * from './statements.js';

// Errors
export * from './errors.js';
