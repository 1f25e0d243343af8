/**
 * Bounded worker pool
 *
 * Runs one task per item with at most `concurrency` tasks in flight. Workers
 * pull the next index from a shared cursor; each outcome is written to the
 * slot of its input index, so the result array always matches input order.
 * A task's failure is captured in its slot and never stops other workers.
 * A throwing `onSettled` callback is logged and does not affect results.
 */

import { ItemTimeoutError, getErrorMessage } from '../core/errors.js';
import { createLogger, type Logger } from '../core/utils/logger.js';

export type TaskOutcome<R> =
  | { readonly ok: true; readonly value: R }
  | { readonly ok: false; readonly error: Error };

export interface WorkerPoolOptions<R> {
  readonly concurrency: number;
  /** Fail a task that has not settled after this many milliseconds */
  readonly taskTimeoutMs?: number;
  readonly onSettled?: (index: number, outcome: TaskOutcome<R>) => void;
  readonly logger?: Logger;
}

function withTimeout<R>(promise: Promise<R>, index: number, timeoutMs: number): Promise<R> {
  let timeoutId: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => reject(new ItemTimeoutError(index, timeoutMs)), timeoutMs);
  });

  return Promise.race([promise, timeout]).finally(() => clearTimeout(timeoutId));
}

async function settle<T, R>(
  item: T,
  index: number,
  task: (item: T, index: number) => Promise<R>,
  timeoutMs: number | undefined
): Promise<TaskOutcome<R>> {
  try {
    const running = task(item, index);
    const value = timeoutMs === undefined ? await running : await withTimeout(running, index, timeoutMs);
    return { ok: true, value };
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error : new Error(String(error)) };
  }
}

/**
 * Run `task` over every item with bounded concurrency
 *
 * @throws {RangeError} If concurrency is not a positive integer
 */
export async function runWorkerPool<T, R>(
  items: readonly T[],
  task: (item: T, index: number) => Promise<R>,
  options: WorkerPoolOptions<R>
): Promise<TaskOutcome<R>[]> {
  const { concurrency, taskTimeoutMs, onSettled } = options;
  const logger = options.logger ?? createLogger('worker-pool');
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`concurrency must be a positive integer, got ${concurrency}`);
  }

  const slots = new Array<TaskOutcome<R> | undefined>(items.length).fill(undefined);
  let cursor = 0;

  const worker = async (): Promise<void> => {
    while (cursor < items.length) {
      const index = cursor++;
      const outcome = await settle(items[index], index, task, taskTimeoutMs);
      slots[index] = outcome;
      try {
        onSettled?.(index, outcome);
      } catch (error) {
        logger.warn('Progress callback failed', { index, error: getErrorMessage(error) });
      }
    }
  };

  const workerCount = Math.min(concurrency, items.length);
  await Promise.all(Array.from({ length: workerCount }, () => worker()));

  return slots.map(
    (slot, index): TaskOutcome<R> =>
      slot ?? { ok: false, error: new Error(`Task ${index} was never scheduled`) }
  );
}
