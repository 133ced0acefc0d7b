/**
 * Two-lane work queue: every item in the high lane is handed out before any
 * item in the low lane.
 */
export class LaneQueue<T> {
  private high: T[];
  private low: T[];

  constructor(high: T[], low: T[] = []) {
    this.high = [...high];
    this.low = [...low];
  }

  get size(): number {
    return this.high.length + this.low.length;
  }

  next(): T | undefined {
    return this.high.shift() ?? this.low.shift();
  }

  /** Removes and returns everything still queued. */
  drain(): T[] {
    const rest = [...this.high, ...this.low];
    this.high = [];
    this.low = [];
    return rest;
  }
}

/**
 * Runs `worker` over the queue with at most `concurrency` calls in flight.
 * Each of the `concurrency` loops pulls the next item as soon as its previous
 * one settles. Once `signal` aborts, no further items are taken; whatever is
 * left is returned to the caller.
 */
export async function runPool<T>(
  queue: LaneQueue<T>,
  concurrency: number,
  worker: (item: T) => Promise<void>,
  signal?: AbortSignal,
): Promise<T[]> {
  const loops = Math.max(1, Math.min(concurrency, queue.size));

  const loop = async (): Promise<void> => {
    while (!signal?.aborted) {
      const item = queue.next();
      if (item === undefined) return;
      await worker(item);
    }
  };

  await Promise.all(Array.from({ length: loops }, () => loop()));
  return queue.drain();
}
