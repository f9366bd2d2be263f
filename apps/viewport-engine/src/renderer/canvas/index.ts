/**
 * Viewport engine
 *
 * Culls, clusters and incrementally builds the items of a large 2-D world for
 * a moving, zooming viewport within a fixed per-tick budget.
 *
 * @example
 * ```typescript
 * import { ViewportEngine, FrameDriver } from './renderer/canvas';
 *
 * const engine = new ViewportEngine<Picture>({ viewportSize: { width: 1280, height: 720 } });
 * engine.submitItems(items);
 *
 * const driver = new FrameDriver(engine, { scheduleFrame: cb => requestAnimationFrame(() => cb()) });
 * driver.onFrame(frame => paint(frame.items));
 * engine.zoomAt(1.25, pointer);
 * void driver.requestFrame();
 * ```
 */

export { ViewportEngine, type ViewportEngineOptions } from './viewport-engine';
export { FrameDriver, type FrameDriverOptions, type FrameListener } from './frame-driver';
export {
  BuildScheduler,
  type BatchReport,
  type BuildSchedulerOptions,
  type BuildSchedulerStats,
  type BuildTask,
  type SchedulerState,
} from './build-scheduler';
export { ResultCache, type ResultCacheOptions, type ResultCacheStats } from './result-cache';
export { LevelOfDetailReducer, type Clusterable, type LodConfig, type LodResult } from './lod-reducer';
export {
  SpatialIndex,
  type Bounded,
  type SpatialIndexBuildConfig,
  type SpatialIndexConfig,
  type SpatialIndexStats,
} from './spatial-index';
export {
  CanvasCamera,
  centerOnPoint,
  createCameraSnapshot,
  fitRectInView,
  getVisibleWorldRect,
  panCamera,
  panCameraByScreen,
  screenToWorld,
  worldRectToScreen,
  worldToScreen,
  zoomCameraToPoint,
  type CameraConstraints,
  type CameraSnapshot,
  type CameraState,
} from './canvas-camera';
export { EngineTelemetry, type EngineStats } from './engine-telemetry';
export {
  DEFAULT_ENGINE_CONFIG,
  assertInitialView,
  resolveEngineConfig,
  validateEngineConfig,
  validateInitialView,
  type EngineConfig,
  type InitialView,
} from './engine-config';
export { EngineConfigError, type ConfigIssue } from './errors';
export {
  clamp,
  distance,
  inflateRect,
  rectCenter,
  rectContains,
  rectsOverlap,
  unionRects,
  type Point,
  type Rect,
  type Size,
} from './geometry';
export type { BuildOperation, CanvasItem, ItemKey, RenderEntry, RenderFrame } from './types';
