/**
 * Core Ports
 *
 * Exports all port interfaces (contracts) for the application.
 * Ports define the boundaries between the consolidation engine and external adapters.
 */

// Consolidation Ports
export * from './consolidation.js';
