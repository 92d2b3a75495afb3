import { assertConcurrency } from "./errors.js";
import { WorkerPool } from "./pool.js";
import type { TaskHandle } from "./pool.js";
import type { Outcome, Processor, WorkItem } from "./types.js";

export interface RunBatchOptions {
  signal?: AbortSignal;
  onProgress?: (completed: number, total: number) => void;
}

/**
 * Run a closed batch: submit every item in order, shut the pool down, then
 * wait for all outcomes. The result has one outcome per item, in input order.
 */
export async function runBatch<P, R>(
  items: readonly WorkItem<P>[],
  processor: Processor<P, R>,
  concurrency: number,
  options: RunBatchOptions = {},
): Promise<Outcome<R>[]> {
  const capacity = assertConcurrency(concurrency);
  const total = items.length;

  const pool = new WorkerPool<P, R>(processor, {
    concurrency: capacity,
    signal: options.signal,
    onSettled: options.onProgress
      ? (_outcome, settled) => options.onProgress?.(settled, total)
      : undefined,
  });

  const handles: TaskHandle[] = [];
  try {
    for (const item of items) {
      handles.push(pool.submit(item));
    }
  } catch (err) {
    // Contract violation mid-batch: let submitted work finish before failing
    pool.shutdown();
    await pool.drained();
    throw err;
  }
  pool.shutdown();

  return pool.awaitAll(handles);
}
