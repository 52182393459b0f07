/**
 * Status Command Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

// Mock dependencies before imports
vi.mock('../utils.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../utils.js')>();
  return {
    ...actual,
    getConsolidationContext: vi.fn(),
    closeConsolidationContext: vi.fn(),
    handleError: vi.fn(),
  };
});

vi.mock('chalk', () => ({
  default: {
    bold: vi.fn((s: string) => s),
    dim: vi.fn((s: string) => s),
    green: vi.fn((s: string) => s),
    red: vi.fn((s: string) => s),
    yellow: vi.fn((s: string) => s),
  },
}));

import { statusCommand } from '../status.js';
import * as utils from '../utils.js';
import type { ConsolidationContext } from '../utils.js';

describe('statusCommand', () => {
  const mockSummarize = vi.fn();
  const mockContext = { orchestrator: { tracker: { summarize: mockSummarize } } };

  const completion = {
    tableName: 'invoices',
    total: 3,
    pending: 1,
    completed: 2,
    errored: 0,
    absent: 1,
    completionRate: 1,
    isFullyConsolidated: true,
  };

  beforeEach(() => {
    vi.mocked(utils.getConsolidationContext).mockReturnValue(
      mockContext as unknown as ConsolidationContext
    );
  });

  afterEach(() => {
    vi.clearAllMocks();
    vi.restoreAllMocks();
  });

  it('should print the summary as JSON', async () => {
    mockSummarize.mockResolvedValue([completion]);
    const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    await statusCommand({ table: 'invoices', json: true });

    expect(mockSummarize).toHaveBeenCalledWith('invoices');
    expect(consoleSpy).toHaveBeenCalledWith(
      JSON.stringify({ success: true, count: 1, tables: [completion] }, null, 2)
    );
    expect(utils.closeConsolidationContext).toHaveBeenCalled();
  });

  it('should hint at a first run when nothing is tracked', async () => {
    mockSummarize.mockResolvedValue([]);
    const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    await statusCommand({});

    expect(consoleSpy).toHaveBeenCalledWith('No consolidation records found.');
    expect(consoleSpy).toHaveBeenCalledWith('Start a run with: smerge run');
  });

  it('should render a table row per consolidated table', async () => {
    mockSummarize.mockResolvedValue([completion]);
    const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    await statusCommand({});

    const output = String(consoleSpy.mock.calls[0][0]);
    expect(output).toContain('invoices');
    expect(output).toContain('100.0%');
  });

  it('should hand tracker failures to the error handler', async () => {
    const error = new Error('Tracker summarize failed: timeout');
    mockSummarize.mockRejectedValue(error);

    await statusCommand({ json: true });

    expect(utils.closeConsolidationContext).toHaveBeenCalled();
    expect(utils.handleError).toHaveBeenCalledWith(error, true);
  });
});
