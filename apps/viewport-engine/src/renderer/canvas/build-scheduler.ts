/**
 * Build Scheduler
 *
 * Incrementally builds the artifacts for a target item list within a fixed
 * per-tick budget, resuming where it left off on the next tick.
 *
 * States:
 * - idle: every target processed and no failed build waiting for a retry
 * - building: a BuildTask is in progress; each runBatch() advances its cursor,
 *   then retries the builds that failed in earlier batches
 *
 * A batch stops at whichever comes first:
 * - `maxBuildsPerTick` build invocations
 * - elapsed time since the batch started exceeding `tickBudgetMs`
 *
 * The elapsed check runs after each item, so a batch always makes progress.
 * A build that fails is retried on every later batch while it stays a target.
 *
 * Retargeting (setTargets) discards the unprocessed remainder of the old list
 * but never the cache. Items present in both lists with the same object
 * identity, already built and still cached, are carried over and not rebuilt.
 *
 * @example
 * ```typescript
 * const scheduler = new BuildScheduler(cache, { maxBuildsPerTick: 10, tickBudgetMs: 16 });
 * scheduler.setTargets(visibleItems);
 * const report = scheduler.runBatch();
 * if (report.completed) draw(scheduler.getRenderList());
 * ```
 */

import { toError } from './errors';
import type { ResultCache } from './result-cache';
import type { CanvasItem, ItemKey } from './types';

export type SchedulerState = 'idle' | 'building';

export interface BuildSchedulerOptions {
  maxBuildsPerTick: number;
  tickBudgetMs: number;
  /** Monotonic clock in ms (defaults to performance.now) */
  now?: () => number;
  /** Log a line per batch */
  debug?: boolean;
}

/**
 * Resumable state for the current target list.
 */
export interface BuildTask<A> {
  readonly targets: readonly CanvasItem<A>[];
  /** Number of targets processed so far */
  readonly cursor: number;
  readonly inProgress: boolean;
  /** Keys with a usable artifact for this task (built, reused or carried over) */
  readonly built: ReadonlySet<ItemKey>;
  /** Keys whose last build failed; retried on the next batch */
  readonly failed: ReadonlySet<ItemKey>;
}

/**
 * Outcome of one runBatch() call.
 */
export interface BatchReport {
  /** Successful build invocations */
  built: number;
  /** Failed build invocations */
  failed: number;
  /** Targets satisfied from the cache without building */
  reused: number;
  /** Targets processed: retries plus cursor advance */
  processed: number;
  durationMs: number;
  /** The batch stopped because the time budget ran out */
  overBudget: boolean;
  /** The task reached the end of its target list with no failure pending */
  completed: boolean;
}

export interface BuildSchedulerStats {
  builds: number;
  failures: number;
  reuses: number;
  batches: number;
  overBudgetBatches: number;
  restarts: number;
}

interface MutableTask<A> {
  targets: CanvasItem<A>[];
  cursor: number;
  inProgress: boolean;
  built: Set<ItemKey>;
  /** Failed items awaiting a retry, in failure order */
  failed: Map<ItemKey, CanvasItem<A>>;
}

const EMPTY_REPORT: BatchReport = Object.freeze({
  built: 0,
  failed: 0,
  reused: 0,
  processed: 0,
  durationMs: 0,
  overBudget: false,
  completed: true,
});

export class BuildScheduler<A> {
  private task: MutableTask<A> = {
    targets: [],
    cursor: 0,
    inProgress: false,
    built: new Set(),
    failed: new Map(),
  };

  /** Item object that produced each cached artifact */
  private producers = new Map<ItemKey, CanvasItem<A>>();

  private readonly now: () => number;
  private stats: BuildSchedulerStats = {
    builds: 0,
    failures: 0,
    reuses: 0,
    batches: 0,
    overBudgetBatches: 0,
    restarts: 0,
  };

  constructor(
    private readonly cache: ResultCache<ItemKey, A>,
    private readonly options: BuildSchedulerOptions,
  ) {
    this.now = options.now ?? (() => performance.now());
  }

  get state(): SchedulerState {
    return this.task.inProgress ? 'building' : 'idle';
  }

  get cursor(): number {
    return this.task.cursor;
  }

  /** Number of items in the current target list */
  get targetCount(): number {
    return this.task.targets.length;
  }

  /**
   * Copy of the current task. Later batches do not change it.
   */
  getTask(): BuildTask<A> {
    const task = this.task;
    return {
      targets: [...task.targets],
      cursor: task.cursor,
      inProgress: task.inProgress,
      built: new Set(task.built),
      failed: new Set(task.failed.keys()),
    };
  }

  getStats(): BuildSchedulerStats {
    return { ...this.stats };
  }

  /**
   * Replace the target list and (re)start building.
   */
  setTargets(items: readonly CanvasItem<A>[]): void {
    const previous = this.task;
    if (previous.inProgress) {
      this.stats.restarts++;
    }

    this.pruneProducers();

    const previousTargets = new Map<ItemKey, CanvasItem<A>>();
    for (const item of previous.targets) {
      previousTargets.set(item.key, item);
    }

    const carried = new Set<ItemKey>();
    for (const item of items) {
      if (
        previousTargets.get(item.key) === item &&
        previous.built.has(item.key) &&
        this.hasCurrentArtifact(item)
      ) {
        carried.add(item.key);
      }
    }

    this.task = {
      targets: [...items],
      cursor: 0,
      inProgress: items.length > 0,
      built: carried,
      failed: new Map(),
    };
  }

  /**
   * Run one budgeted batch. A no-op when idle.
   */
  runBatch(): BatchReport {
    const task = this.task;
    if (!task.inProgress) {
      return EMPTY_REPORT;
    }

    const start = this.now();
    const { maxBuildsPerTick, tickBudgetMs } = this.options;
    let built = 0;
    let failed = 0;
    let reused = 0;
    let processed = 0;
    let overBudget = false;

    // Builds that failed in earlier batches are retried once the cursor is
    // exhausted. A failure in this batch waits for the next one.
    const retries = [...task.failed.values()];
    let retryIndex = 0;
    const hasWork = () => task.cursor < task.targets.length || retryIndex < retries.length;

    while (hasWork() && built + failed < maxBuildsPerTick) {
      let item: CanvasItem<A>;
      if (task.cursor < task.targets.length) {
        item = task.targets[task.cursor++];
      } else {
        item = retries[retryIndex++];
        task.failed.delete(item.key);
      }
      processed++;

      const outcome = this.processItem(task, item);
      if (outcome === 'built') built++;
      else if (outcome === 'failed') failed++;
      else if (outcome === 'reused') reused++;

      if (this.now() - start > tickBudgetMs) {
        overBudget = hasWork();
        break;
      }
    }

    const completed = task.cursor >= task.targets.length && task.failed.size === 0;
    if (completed) {
      task.inProgress = false;
    }

    const durationMs = this.now() - start;
    this.stats.batches++;
    if (overBudget) this.stats.overBudgetBatches++;

    if (this.options.debug) {
      console.log(
        `[BuildScheduler] batch: built=${built} failed=${failed} reused=${reused} ` +
        `cursor=${task.cursor}/${task.targets.length} pending=${task.failed.size} ${durationMs.toFixed(2)}ms` +
        (completed ? ' (complete)' : '')
      );
    }

    return { built, failed, reused, processed, durationMs, overBudget, completed };
  }

  /**
   * Built targets paired with their cached artifacts, in target order.
   * Targets evicted since they were built are left out.
   */
  getRenderList(): Array<{ item: CanvasItem<A>; artifact: A }> {
    const list: Array<{ item: CanvasItem<A>; artifact: A }> = [];
    for (const item of this.task.targets) {
      if (!this.task.built.has(item.key)) continue;
      const artifact = this.cache.peek(item.key);
      if (artifact !== undefined) {
        list.push({ item, artifact });
      }
    }
    return list;
  }

  /**
   * Forget which items produced the cached artifacts (after the cache was
   * cleared externally) and stop the current task.
   */
  reset(): void {
    this.producers.clear();
    this.task = {
      targets: [],
      cursor: 0,
      inProgress: false,
      built: new Set(),
      failed: new Map(),
    };
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Private
  // ───────────────────────────────────────────────────────────────────────────

  private processItem(task: MutableTask<A>, item: CanvasItem<A>): 'carried' | 'reused' | 'built' | 'failed' {
    if (task.built.has(item.key) && this.hasCurrentArtifact(item)) {
      return 'carried';
    }

    // An artifact cached under this key by a different item object is stale
    const producer = this.producers.get(item.key);
    if (producer !== undefined && producer !== item) {
      this.cache.delete(item.key);
      this.producers.delete(item.key);
    }

    if (this.cache.get(item.key) !== undefined) {
      task.built.add(item.key);
      this.stats.reuses++;
      return 'reused';
    }

    try {
      const artifact = item.build(item);
      if (artifact === undefined) {
        throw new Error('build returned no artifact');
      }
      this.cache.put(item.key, artifact);
      this.producers.set(item.key, item);
      task.built.add(item.key);
      this.stats.builds++;
      return 'built';
    } catch (error) {
      task.built.delete(item.key);
      task.failed.set(item.key, item);
      this.stats.failures++;
      console.warn(`[BuildScheduler] Build failed for item ${String(item.key)}, skipping:`, toError(error).message);
      return 'failed';
    }
  }

  private hasCurrentArtifact(item: CanvasItem<A>): boolean {
    return this.cache.has(item.key) && this.producers.get(item.key) === item;
  }

  /** Drop producer records for artifacts the cache no longer holds */
  private pruneProducers(): void {
    for (const key of this.producers.keys()) {
      if (!this.cache.has(key)) {
        this.producers.delete(key);
      }
    }
  }
}
