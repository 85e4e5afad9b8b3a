/**
 * @fileoverview Memory-aware batch dispatcher for the fetch layer.
 *
 * A batch of URLs is handed to {@link Dispatcher.run} together with a
 * {@link DispatchPolicy}. Each batch gets its own `p-queue` whose
 * concurrency is the admission gate:
 *
 * ```
 *   items ──> [ PQueue(concurrency = ceiling) ] ──> worker(item)
 *                      ^
 *                      |  every checkIntervalMs
 *              memory probe ──> utilization >= threshold ? 1 : ceiling
 * ```
 *
 * Under memory pressure the gate narrows to a single task in flight; tasks
 * already running are never interrupted. The gate widens back to the
 * ceiling as soon as a sample comes in under the threshold. One task is
 * always admitted, so a batch finishes even if memory never recovers.
 *
 * The dispatcher owns no crawl state. It does not retry, and it does not
 * catch worker errors: workers report their own failures.
 *
 * @module services/dispatcher
 */

import os from "node:os";
import PQueue from "p-queue";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * Scheduling limits for one batch.
 */
export interface DispatchPolicy {
  /** Upper bound on tasks in flight at once. Values below 1 are treated as 1. */
  maxConcurrency: number;

  /** Memory utilization (0–100) at or above which admission drops to one. */
  memoryThresholdPercent: number;

  /** Milliseconds between memory samples while the batch runs. */
  checkIntervalMs: number;
}

/**
 * Returns current system memory utilization as a percentage (0–100).
 */
export type MemoryProbe = () => number;

// ---------------------------------------------------------------------------
// Memory Probe
// ---------------------------------------------------------------------------

/**
 * Default probe: share of system memory not reported free by the OS.
 */
export const systemMemoryUsage: MemoryProbe = () => {
  const total = os.totalmem();
  if (total <= 0) {
    return 0;
  }
  return ((total - os.freemem()) / total) * 100;
};

// ---------------------------------------------------------------------------
// Dispatcher Class
// ---------------------------------------------------------------------------

/**
 * Runs batches of async work under a concurrency ceiling and a memory
 * throttle.
 *
 * ```typescript
 * const dispatcher = new Dispatcher();
 * const pages = await dispatcher.run(urls, (url) => fetchPage(url), {
 *   maxConcurrency: 10,
 *   memoryThresholdPercent: 70,
 *   checkIntervalMs: 1000,
 * });
 * ```
 *
 * A single instance may run many batches at once; each batch has its own
 * queue and timer.
 */
export class Dispatcher {
  private readonly probe: MemoryProbe;

  /**
   * @param probe - Memory utilization source. Tests pass a stub.
   */
  constructor(probe: MemoryProbe = systemMemoryUsage) {
    this.probe = probe;
  }

  /**
   * Run `worker` over every item and resolve with the results in the same
   * order as `items`.
   *
   * Rejects with the first worker rejection; tasks already admitted keep
   * running to completion in the background.
   *
   * @typeParam T - Item type.
   * @typeParam R - Worker result type.
   */
  async run<T, R>(
    items: readonly T[],
    worker: (item: T) => Promise<R>,
    policy: DispatchPolicy,
  ): Promise<R[]> {
    if (items.length === 0) {
      return [];
    }

    const ceiling = Math.max(1, Math.floor(policy.maxConcurrency));
    const queue = new PQueue({ concurrency: ceiling });

    let throttled = false;
    const sample = (): void => {
      const usage = this.probe();
      const overThreshold = usage >= policy.memoryThresholdPercent;

      if (overThreshold !== throttled) {
        throttled = overThreshold;
        console.error(
          `[dispatcher] memory at ${usage.toFixed(1)}%, ` +
            `${throttled ? "throttling to 1" : `restoring ${ceiling}`} concurrent fetch(es)`,
        );
      }

      // Setting concurrency on p-queue re-runs admission immediately.
      queue.concurrency = throttled ? 1 : ceiling;
    };

    sample();
    const timer = setInterval(sample, Math.max(1, policy.checkIntervalMs));
    timer.unref();

    try {
      return await Promise.all(
        items.map((item) =>
          queue.add(() => worker(item), { throwOnTimeout: true }),
        ),
      );
    } finally {
      clearInterval(timer);
    }
  }
}
