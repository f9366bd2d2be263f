/**
 * Viewport Engine
 *
 * Composition root: camera → visible world rect → spatial query → priority
 * order → level-of-detail reduction → budgeted incremental build → frame.
 *
 * The engine is driven from outside. Mutators (submitItems, pan, zoomAt, ...)
 * only record that the target list is stale and return whether anything
 * changed; the work happens in tick(), at most one budgeted batch per call.
 *
 * Invalidation:
 * - submitItems marks the spatial index dirty; it is rebuilt lazily on the
 *   next tick. Artifacts of removed or replaced items are dropped.
 * - a zoom change clears the result cache (artifacts are scale-specific)
 * - any camera or viewport change retargets the scheduler on the next tick
 *
 * @example
 * ```typescript
 * const engine = new ViewportEngine<Picture>({ viewportSize: { width: 1280, height: 720 } });
 * engine.submitItems(items);
 * engine.zoomAt(1.1, pointer);
 * const frame = engine.tick(performance.now());
 * for (const entry of frame.items) paint(entry.artifact, entry.screenRect);
 * ```
 */

import { BuildScheduler, type BatchReport, type BuildSchedulerStats } from './build-scheduler';
import { CanvasCamera, type CameraState } from './canvas-camera';
import { assertInitialView, resolveEngineConfig, type EngineConfig } from './engine-config';
import { EngineTelemetry } from './engine-telemetry';
import { unionRects, type Point, type Size } from './geometry';
import { LevelOfDetailReducer } from './lod-reducer';
import { ResultCache, type ResultCacheStats } from './result-cache';
import { SpatialIndex } from './spatial-index';
import type { CanvasItem, ItemKey, RenderEntry, RenderFrame } from './types';

export interface ViewportEngineOptions<A> {
  config?: Partial<EngineConfig>;
  /** Viewport size in screen pixels */
  viewportSize: Size;
  initialOrigin?: Point;
  initialZoom?: number;
  /** Release resources owned by an artifact leaving the cache */
  releaseArtifact?: (artifact: A) => void;
  /** Monotonic clock in ms used for the per-tick budget */
  now?: () => number;
}

export class ViewportEngine<A> {
  readonly telemetry = new EngineTelemetry();

  private readonly config: EngineConfig;
  private readonly camera: CanvasCamera;
  private readonly cache: ResultCache<ItemKey, A>;
  private readonly scheduler: BuildScheduler<A>;
  private readonly reducer: LevelOfDetailReducer;

  private items: CanvasItem<A>[] = [];
  private itemsByKey = new Map<ItemKey, CanvasItem<A>>();
  private index: SpatialIndex<CanvasItem<A>> | null = null;
  private indexDirty = false;

  private viewportSize: Size;
  private needsRetarget = true;
  private clusterSizes = new Map<ItemKey, number>();
  private disposed = false;

  constructor(options: ViewportEngineOptions<A>) {
    this.config = resolveEngineConfig(options.config);
    assertInitialView({
      origin: options.initialOrigin,
      zoom: options.initialZoom,
      viewportSize: options.viewportSize,
    });
    this.viewportSize = { ...options.viewportSize };

    this.camera = new CanvasCamera(
      {
        minZoom: this.config.minZoom,
        maxZoom: this.config.maxZoom,
        minScreenSize: this.config.minScreenSize,
      },
      options.initialOrigin,
      options.initialZoom,
    );

    const release = options.releaseArtifact;
    this.cache = new ResultCache<ItemKey, A>({
      capacity: this.config.cacheCapacity,
      onEvict: release ? value => release(value) : undefined,
    });

    this.scheduler = new BuildScheduler<A>(this.cache, {
      maxBuildsPerTick: this.config.maxBuildsPerTick,
      tickBudgetMs: this.config.tickBudgetMs,
      now: options.now,
      debug: this.config.debug,
    });

    this.reducer = new LevelOfDetailReducer(this.config);
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Dataset
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Replace the item set. The spatial index is rebuilt on the next tick.
   */
  submitItems(items: readonly CanvasItem<A>[]): void {
    const next = new Map<ItemKey, CanvasItem<A>>();
    for (const item of items) {
      if (next.has(item.key)) {
        console.warn(`[ViewportEngine] Duplicate item key ${String(item.key)}, keeping the last one`);
      }
      next.set(item.key, item);
    }

    // Artifacts of removed or replaced items can never be shown again
    for (const [key, previous] of this.itemsByKey) {
      if (next.get(key) !== previous) {
        this.cache.delete(key);
      }
    }

    this.itemsByKey = next;
    this.items = [...next.values()];
    this.indexDirty = true;
    this.needsRetarget = true;
  }

  getItemCount(): number {
    return this.items.length;
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Camera
  // ───────────────────────────────────────────────────────────────────────────

  setCamera(origin: Point, zoom: number): boolean {
    const previousZoom = this.camera.zoom;
    return this.afterCameraChange(this.camera.setState(origin, zoom), previousZoom);
  }

  /** Pan by a world-space delta */
  pan(delta: Point): boolean {
    return this.afterCameraChange(this.camera.pan(delta), this.camera.zoom);
  }

  /** Pan by a screen-space delta (drag) */
  panByScreen(delta: Point): boolean {
    return this.afterCameraChange(this.camera.panByScreen(delta), this.camera.zoom);
  }

  /**
   * Zoom by `factor` around `focal` (screen coordinates; viewport center when
   * omitted).
   */
  zoomAt(factor: number, focal?: Point, viewportSize: Size = this.viewportSize): boolean {
    const previousZoom = this.camera.zoom;
    return this.afterCameraChange(this.camera.zoomBy(factor, focal, viewportSize), previousZoom);
  }

  /**
   * Fit every submitted item in the viewport.
   */
  fitToItems(padding?: number): boolean {
    const bounds = unionRects(this.items.map(item => item.rect));
    if (!bounds) return false;

    const previousZoom = this.camera.zoom;
    return this.afterCameraChange(this.camera.fitRect(bounds, this.viewportSize, padding), previousZoom);
  }

  setViewportSize(size: Size): boolean {
    if (size.width === this.viewportSize.width && size.height === this.viewportSize.height) {
      return false;
    }
    this.viewportSize = { ...size };
    this.needsRetarget = true;
    return true;
  }

  getCamera(): CameraState {
    return this.camera.getState();
  }

  getConfig(): Readonly<EngineConfig> {
    return this.config;
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Tick
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Run one budgeted step and return the current frame.
   */
  tick(now: number): RenderFrame<A> {
    if (this.indexDirty) {
      this.rebuildIndex();
    }

    if (this.needsRetarget) {
      this.retarget();
    }

    const report = this.scheduler.runBatch();
    const frame = this.assembleFrame(report, now);
    this.telemetry.record(frame, report);
    return frame;
  }

  /**
   * True when the current target list is fully built and nothing is pending.
   */
  isIdle(): boolean {
    return !this.needsRetarget && !this.indexDirty && this.scheduler.state === 'idle';
  }

  /**
   * Drop every cached artifact and rebuild the visible set from scratch.
   */
  invalidate(): void {
    this.cache.clear();
    this.scheduler.reset();
    this.needsRetarget = true;
  }

  getCacheStats(): ResultCacheStats {
    return this.cache.getStats();
  }

  getSchedulerStats(): BuildSchedulerStats {
    return this.scheduler.getStats();
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.cache.clear();
    this.scheduler.reset();
    this.index = null;
    this.items = [];
    this.itemsByKey.clear();
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Private
  // ───────────────────────────────────────────────────────────────────────────

  private afterCameraChange(changed: boolean, previousZoom: number): boolean {
    if (!changed) return false;

    if (this.camera.zoom !== previousZoom) {
      // Artifacts are rendered at a specific scale
      this.cache.clear();
    }
    this.needsRetarget = true;
    return true;
  }

  private rebuildIndex(): void {
    this.index = SpatialIndex.fromItems(this.items, this.config);
    this.indexDirty = false;

    if (this.config.debug && this.index) {
      const stats = this.index.getStats();
      console.log(
        `[SpatialIndex] rebuilt: items=${stats.itemCount} nodes=${stats.nodeCount} depth=${stats.depth}`
      );
    }
  }

  private retarget(): void {
    this.needsRetarget = false;

    const viewport = this.camera.visibleWorldRect(this.viewportSize);
    const visible = this.index ? this.index.query(viewport) : [];

    // Stable: equal priorities keep query order
    const ordered = visible
      .map((item, position) => ({ item, position }))
      .sort((a, b) => (b.item.priority ?? 0) - (a.item.priority ?? 0) || a.position - b.position)
      .map(({ item }) => item);

    const reduced = this.reducer.reduce(ordered, this.camera.zoom);
    this.clusterSizes = reduced.clusterSizes;
    this.scheduler.setTargets(reduced.items);

    if (this.config.debug) {
      const { x, y, width, height } = viewport;
      console.log(
        `[ViewportEngine] retarget: viewport=(${x.toFixed(1)},${y.toFixed(1)} ${width.toFixed(1)}x${height.toFixed(1)}) ` +
        `visible=${visible.length} targets=${reduced.items.length} collapsed=${reduced.collapsedCount}`
      );
    }
  }

  private assembleFrame(report: BatchReport, now: number): RenderFrame<A> {
    const entries: RenderEntry<A>[] = this.scheduler.getRenderList().map(({ item, artifact }) => ({
      item,
      artifact,
      screenRect: this.camera.worldToScreen(item.rect),
      clusterSize: this.clusterSizes.get(item.key) ?? 1,
    }));

    return {
      items: entries,
      visibleCount: this.scheduler.targetCount,
      totalCount: this.index?.totalCount() ?? 0,
      cacheHitRatio: this.cache.hitRatio(),
      batchDurationMs: report.durationMs,
      builtCount: report.built,
      failedCount: report.failed,
      complete: report.completed,
      timestamp: now,
    };
  }
}
