/**
 * Engine Telemetry Module
 *
 * Aggregates per-frame metrics into a subscribable store for a debug HUD or a
 * host status bar. The engine never depends on anyone subscribing: frames are
 * returned from tick() directly and telemetry is a side channel.
 *
 * Usage:
 * ```typescript
 * const unsubscribe = engine.telemetry.stats.subscribe(stats => {
 *   statusBar.setText(`${stats.visibleCount}/${stats.totalCount} items`);
 * });
 * ```
 */

import { derived, get, writable, type Readable, type Writable } from 'svelte/store';
import type { BatchReport } from './build-scheduler';
import type { RenderFrame } from './types';

/** Rolling window for the average batch duration */
const BATCH_WINDOW = 60;

export interface EngineStats {
  visibleCount: number;
  totalCount: number;
  /** Items drawn in the latest frame */
  renderedCount: number;
  cacheHitRatio: number;
  lastBatchMs: number;
  averageBatchMs: number;
  frames: number;
  builds: number;
  failures: number;
  overBudgetBatches: number;
  /** Latest frame had every target processed */
  complete: boolean;
}

function createInitialStats(): EngineStats {
  return {
    visibleCount: 0,
    totalCount: 0,
    renderedCount: 0,
    cacheHitRatio: 0,
    lastBatchMs: 0,
    averageBatchMs: 0,
    frames: 0,
    builds: 0,
    failures: 0,
    overBudgetBatches: 0,
    complete: true,
  };
}

export class EngineTelemetry {
  private readonly store: Writable<EngineStats> = writable(createInitialStats());
  private batchTimes: number[] = [];

  /** Latest aggregated statistics */
  readonly stats: Readable<EngineStats> = { subscribe: this.store.subscribe };

  /** True while the latest frame is still incomplete */
  readonly isBuilding: Readable<boolean> = derived(this.store, $stats => !$stats.complete);

  record<A>(frame: RenderFrame<A>, report: BatchReport): void {
    if (report.processed > 0) {
      this.batchTimes.push(report.durationMs);
      if (this.batchTimes.length > BATCH_WINDOW) {
        this.batchTimes.shift();
      }
    }

    const averageBatchMs = this.batchTimes.length > 0
      ? this.batchTimes.reduce((sum, t) => sum + t, 0) / this.batchTimes.length
      : 0;

    this.store.update(stats => ({
      visibleCount: frame.visibleCount,
      totalCount: frame.totalCount,
      renderedCount: frame.items.length,
      cacheHitRatio: frame.cacheHitRatio,
      lastBatchMs: frame.batchDurationMs,
      averageBatchMs,
      frames: stats.frames + 1,
      builds: stats.builds + report.built,
      failures: stats.failures + report.failed,
      overBudgetBatches: stats.overBudgetBatches + (report.overBudget ? 1 : 0),
      complete: frame.complete,
    }));
  }

  getSnapshot(): EngineStats {
    return get(this.store);
  }

  reset(): void {
    this.batchTimes = [];
    this.store.set(createInitialStats());
  }
}
