import type { ILogger } from '../domain/ports/ILogger.js';
import { errorMessage } from '../domain/errors/SyncError.js';

export interface BatchFailure<T> {
  item: T;
  error: unknown;
}

export interface BatchResult<T> {
  /** Items whose handler resolved */
  processed: T[];
  failures: BatchFailure<T>[];
  /** The signal fired before every item was handled */
  interrupted: boolean;
}

export interface BatchOptions<T> {
  logger: ILogger;
  signal?: AbortSignal;
  /** Name of an item in progress logs */
  describe?: (item: T) => string;
}

/**
 * Handle items one at a time. A rejected handler is recorded and the batch moves on;
 * an aborted signal stops the batch before the next item.
 */
export async function runBatch<T>(
  items: readonly T[],
  label: string,
  handler: (item: T) => Promise<void>,
  options: BatchOptions<T>
): Promise<BatchResult<T>> {
  const { logger, signal } = options;
  const describe = options.describe ?? ((item: T) => String(item));
  const result: BatchResult<T> = { processed: [], failures: [], interrupted: false };

  for (const [index, item] of items.entries()) {
    if (signal?.aborted) {
      result.interrupted = true;
      logger.warn(`${label} interrupted`, {
        completed: index,
        remaining: items.length - index,
      });
      break;
    }

    const name = describe(item);
    logger.info(`${label} [${index + 1}/${items.length}]`, { item: name });

    try {
      await handler(item);
      result.processed.push(item);
    } catch (error) {
      logger.error(`${label} failed for item`, error, { item: name });
      result.failures.push({ item, error });
    }
  }

  logger.info(`${label} finished`, {
    processed: result.processed.length,
    failed: result.failures.length,
    interrupted: result.interrupted,
  });
  return result;
}

export function describeFailure<T>(failure: BatchFailure<T>): string {
  return errorMessage(failure.error);
}
