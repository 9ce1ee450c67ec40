import { describe, it, expect, vi, beforeEach } from 'vitest';
import { runBatch } from './BatchRunner.js';
import type { ILogger } from '../domain/ports/ILogger.js';

describe('runBatch', () => {
  let mockLogger: ILogger;

  beforeEach(() => {
    mockLogger = {
      trace: vi.fn(),
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      fatal: vi.fn(),
      child: vi.fn().mockReturnThis(),
    };
  });

  it('should keep going after an item fails', async () => {
    const seen: string[] = [];
    const failure = new Error('boom');

    const result = await runBatch(
      ['one', 'two', 'three'],
      'Testing',
      async (item) => {
        seen.push(item);
        if (item === 'two') throw failure;
      },
      { logger: mockLogger }
    );

    expect(seen).toEqual(['one', 'two', 'three']);
    expect(result.processed).toEqual(['one', 'three']);
    expect(result.failures).toEqual([{ item: 'two', error: failure }]);
    expect(result.interrupted).toBe(false);
  });

  it('should stop before the next item once the signal is aborted', async () => {
    const controller = new AbortController();
    const seen: number[] = [];

    const result = await runBatch(
      [1, 2, 3],
      'Testing',
      async (item) => {
        seen.push(item);
        if (item === 2) controller.abort();
      },
      { logger: mockLogger, signal: controller.signal }
    );

    expect(seen).toEqual([1, 2]);
    expect(result.processed).toEqual([1, 2]);
    expect(result.interrupted).toBe(true);
    expect(mockLogger.warn).toHaveBeenCalledWith('Testing interrupted', { completed: 2, remaining: 1 });
  });

  it('should handle an empty batch', async () => {
    const handler = vi.fn();

    const result = await runBatch([], 'Testing', handler, { logger: mockLogger });

    expect(handler).not.toHaveBeenCalled();
    expect(result).toEqual({ processed: [], failures: [], interrupted: false });
  });
});
