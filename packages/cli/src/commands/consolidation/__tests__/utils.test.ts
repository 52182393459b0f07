/**
 * Consolidation CLI Utilities Tests
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { ConsolidationError, ConsolidationErrorCode } from '@silvermerge/consolidation';

import {
  collect,
  formatDate,
  formatDuration,
  formatRate,
  handleError,
  parseShard,
} from '../utils.js';

describe('parseShard', () => {
  it('should parse index and count', () => {
    expect(parseShard('0/4')).toEqual({ shardIndex: 0, shardCount: 4 });
    expect(parseShard(' 3/16 ')).toEqual({ shardIndex: 3, shardCount: 16 });
  });

  it('should reject malformed values', () => {
    expect(() => parseShard('3')).toThrow('Invalid shard "3". Use <index>/<count>, e.g. 0/4.');
    expect(() => parseShard('-1/4')).toThrow(ConsolidationError);
  });
});

describe('collect', () => {
  it('should accumulate repeated options', () => {
    expect(collect('orders', collect('invoices'))).toEqual(['invoices', 'orders']);
  });
});

describe('formatting', () => {
  it('should format rates with one decimal', () => {
    expect(formatRate(0.5)).toBe('50.0%');
    expect(formatRate(2 / 3)).toBe('66.7%');
    expect(formatRate(0)).toBe('0.0%');
  });

  it('should format dates without milliseconds', () => {
    expect(formatDate(new Date('2026-01-15T10:04:05.123Z'))).toBe('2026-01-15 10:04:05');
    expect(formatDate(null)).toBe('-');
  });

  it('should format durations', () => {
    expect(formatDuration(75_000)).toBe('1m 15s');
    expect(formatDuration(4_400)).toBe('4s');
    expect(formatDuration(0)).toBe('0s');
  });
});

describe('handleError', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should print code and message as JSON', () => {
    const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const exitSpy = vi.spyOn(process, 'exit').mockImplementation(() => undefined as never);

    handleError(new ConsolidationError(ConsolidationErrorCode.INVALID_SHARD, 'bad shard'), true);

    expect(consoleSpy).toHaveBeenCalledWith(
      JSON.stringify(
        { success: false, error: { message: 'bad shard', code: 'CONSOLIDATION_006' } },
        null,
        2
      )
    );
    expect(exitSpy).toHaveBeenCalledWith(1);
  });

  it('should print plain errors to stderr', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const exitSpy = vi.spyOn(process, 'exit').mockImplementation(() => undefined as never);

    handleError(new Error('connection refused'));

    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy).toHaveBeenCalledWith('Error: connection refused');
    expect(exitSpy).toHaveBeenCalledWith(1);
  });
});
