import { AggregationError, DuplicateItemError, PoolClosedError, assertConcurrency } from "./errors.js";
import { executeItem } from "./processor.js";
import { cancelled } from "./types.js";
import type { Outcome, Processor, WorkItem } from "./types.js";

export interface WorkerPoolOptions<R> {
  /** Maximum number of items processed at once */
  concurrency: number;
  /** Aborting drops pending items as cancelled; running items finish */
  signal?: AbortSignal;
  /** Fires once per resolved handle, in completion order */
  onSettled?: (outcome: Outcome<R>, settledCount: number) => void;
}

/**
 * Token for one submitted item. Resolved by the pool, consumed once by
 * `awaitAll`.
 */
export class TaskHandle {
  constructor(
    public readonly id: string,
    /** Submission index within the pool */
    public readonly index: number,
  ) {}
}

interface Entry<P, R> {
  item: WorkItem<P>;
  handle: TaskHandle;
  promise: Promise<Outcome<R>>;
  resolve: (outcome: Outcome<R>) => void;
  settled: boolean;
  consumed: boolean;
}

/**
 * Fixed-capacity pool. Items wait in a FIFO queue until one of `capacity`
 * slots is free; a slot takes the next item as soon as its current one
 * settles. All queue and counter mutation happens synchronously on the
 * event loop, so slots never race on it.
 */
export class WorkerPool<P, R> {
  public readonly capacity: number;

  private readonly queue: Entry<P, R>[] = [];
  private readonly entries = new Map<TaskHandle, Entry<P, R>>();
  private readonly ids = new Set<string>();
  private readonly drainWaiters: Array<() => void> = [];
  private readonly signal?: AbortSignal;
  private readonly onSettled?: (outcome: Outcome<R>, settledCount: number) => void;
  private active = 0;
  private settledCount = 0;
  private isClosed = false;
  private fault: unknown = null;

  constructor(private readonly processor: Processor<P, R>, options: WorkerPoolOptions<R>) {
    this.capacity = assertConcurrency(options.concurrency);
    this.signal = options.signal;
    this.onSettled = options.onSettled;
    this.signal?.addEventListener("abort", this.onAbort, { once: true });
  }

  get activeCount(): number {
    return this.active;
  }

  get pendingCount(): number {
    return this.queue.length;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  submit(item: WorkItem<P>): TaskHandle {
    if (this.isClosed) throw new PoolClosedError(item.id);
    if (this.ids.has(item.id)) throw new DuplicateItemError(item.id);

    const handle = new TaskHandle(item.id, this.ids.size);
    this.ids.add(item.id);

    let resolve: (outcome: Outcome<R>) => void = () => {};
    const promise = new Promise<Outcome<R>>((r) => {
      resolve = r;
    });
    const entry: Entry<P, R> = { item, handle, promise, resolve, settled: false, consumed: false };
    this.entries.set(handle, entry);

    if (this.signal?.aborted) {
      this.settle(entry, cancelled(item.id));
      return handle;
    }

    this.queue.push(entry);
    this.pump();
    return handle;
  }

  /** Stop accepting submissions. Queued and running items still complete. */
  shutdown(): void {
    if (this.isClosed) return;
    this.isClosed = true;
    this.checkDrained();
  }

  isSettled(handle: TaskHandle): boolean {
    return this.entries.get(handle)?.settled ?? false;
  }

  /**
   * Wait for every handle and return outcomes in the order of `handles`,
   * regardless of completion order. Each handle may be awaited only once.
   */
  async awaitAll(handles: readonly TaskHandle[]): Promise<Outcome<R>[]> {
    // Validate the whole set before consuming any of it
    const claimed = handles.map((handle) => {
      const entry = this.entries.get(handle);
      if (!entry) {
        throw new AggregationError(`Handle "${handle.id}" does not belong to this pool`);
      }
      if (entry.consumed) {
        throw new AggregationError(`Handle "${handle.id}" was already awaited`);
      }
      return entry;
    });
    if (new Set(claimed).size !== claimed.length) {
      throw new AggregationError("The same handle was passed more than once");
    }
    const pending = claimed.map((entry) => {
      entry.consumed = true;
      return entry.promise;
    });

    const outcomes = await Promise.all(pending);
    if (this.fault !== null) throw this.fault;

    if (outcomes.length !== handles.length) {
      throw new AggregationError(`Expected ${handles.length} outcomes, got ${outcomes.length}`);
    }
    outcomes.forEach((outcome, i) => {
      if (outcome.id !== handles[i].id) {
        throw new AggregationError(`Outcome "${outcome.id}" does not match handle "${handles[i].id}"`);
      }
    });
    return outcomes;
  }

  /** Resolves once the pool is shut down with nothing queued or running. */
  drained(): Promise<void> {
    if (this.isDrained()) return Promise.resolve();
    return new Promise((resolve) => {
      this.drainWaiters.push(resolve);
    });
  }

  private pump(): void {
    while (this.active < this.capacity) {
      const entry = this.queue.shift();
      if (!entry) return;
      this.active++;
      void this.run(entry);
    }
  }

  private async run(entry: Entry<P, R>): Promise<void> {
    // Start off the submit call stack so a synchronous processor cannot block submit
    await Promise.resolve();
    const outcome = await executeItem(entry.item, this.processor);
    this.active--;
    try {
      this.settle(entry, outcome);
    } catch (err) {
      // awaitAll rethrows this once every handle has resolved
      this.fault ??= err;
    }
    this.pump();
    this.checkDrained();
  }

  private settle(entry: Entry<P, R>, outcome: Outcome<R>): void {
    if (entry.settled) {
      throw new AggregationError(`Handle "${entry.handle.id}" resolved twice`);
    }
    entry.settled = true;
    this.settledCount++;
    entry.resolve(outcome);
    this.onSettled?.(outcome, this.settledCount);
  }

  private readonly onAbort = (): void => {
    const dropped = this.queue.splice(0);
    for (const entry of dropped) {
      try {
        this.settle(entry, cancelled(entry.item.id));
      } catch (err) {
        this.fault ??= err;
      }
    }
    this.checkDrained();
  };

  private isDrained(): boolean {
    return this.isClosed && this.active === 0 && this.queue.length === 0;
  }

  private checkDrained(): void {
    if (!this.isDrained()) return;
    this.signal?.removeEventListener("abort", this.onAbort);
    for (const resolve of this.drainWaiters.splice(0)) {
      resolve();
    }
  }
}
