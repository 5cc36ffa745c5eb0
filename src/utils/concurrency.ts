/**
 * Concurrency control utilities
 */

import pLimit from 'p-limit';

/**
 * Counting admission gate: at most `concurrency` tasks run at once.
 * A slot is released however the task settles. Queued tasks cannot be
 * dropped (their promises would never settle); cancel by making them no-ops.
 */
export interface AdmissionGate {
  run<T>(task: () => Promise<T>): Promise<T>;
  /** Tasks currently holding a slot */
  readonly activeCount: number;
  /** Tasks waiting for a slot */
  readonly pendingCount: number;
}

export function createAdmissionGate(concurrency: number): AdmissionGate {
  const limit = pLimit(concurrency);

  return {
    run: (task) => limit(task),
    get activeCount() {
      return limit.activeCount;
    },
    get pendingCount() {
      return limit.pendingCount;
    },
  };
}

/**
 * Process items through a gate and settle every one of them
 * @param items Items to process
 * @param processor Function to process each item
 * @param gate Shared admission gate
 * @returns Settled results in input order
 */
export async function settleAll<T, R>(
  items: Iterable<T>,
  processor: (item: T) => Promise<R>,
  gate: AdmissionGate
): Promise<PromiseSettledResult<R>[]> {
  const tasks = Array.from(items, (item) => gate.run(() => processor(item)));
  return await Promise.allSettled(tasks);
}

/**
 * Sleep for specified milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
