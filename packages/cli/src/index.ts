/**
 * smerge CLI
 *
 * Operational commands over the consolidation engine.
 *
 * @module @silvermerge/cli
 */

// =============================================================================
// Command Exports
// =============================================================================

export { registerCommands, registerConsolidationCommands } from './commands/index.js';
export { toRunOptions } from './commands/consolidation/run.js';
export { parseStatus } from './commands/consolidation/ls.js';

// =============================================================================
// Utility Exports
// =============================================================================

export {
  getConsolidationContext,
  closeConsolidationContext,
  parseShard,
  formatRate,
  formatDate,
  formatDuration,
  handleError,
  createSilentLogger,
  shouldUseColor,
  type ConsolidationContext,
} from './commands/consolidation/utils.js';
export { createLogger } from './utils/logger.js';
