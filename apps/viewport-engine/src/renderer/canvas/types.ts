/**
 * Item and frame types shared across the viewport engine.
 */

import type { Rect } from './geometry';

/** Stable identity of an item across submissions */
export type ItemKey = string | number;

/**
 * Produces the render artifact for an item. Supplied by the host; may be
 * expensive. Returning `undefined` counts as a failed build.
 */
export type BuildOperation<A> = (item: CanvasItem<A>) => A | undefined;

/**
 * A positioned visual item in world space.
 *
 * Items are immutable once submitted. Resubmitting a different object under
 * the same key marks the item as changed and drops its cached artifact.
 */
export interface CanvasItem<A> {
  readonly key: ItemKey;
  readonly rect: Rect;
  /** May be merged into a cluster representative at low zoom */
  readonly clusterable: boolean;
  /** Higher priority items are built first (default 0) */
  readonly priority?: number;
  readonly build: BuildOperation<A>;
}

/**
 * One renderable entry of a frame.
 */
export interface RenderEntry<A> {
  item: CanvasItem<A>;
  artifact: A;
  /** Item rectangle transformed to screen space */
  screenRect: Rect;
  /** 1 for individual items, member count for cluster representatives */
  clusterSize: number;
}

/**
 * Result of one engine tick.
 */
export interface RenderFrame<A> {
  items: RenderEntry<A>[];
  /** Items in the current target list (after culling and LOD) */
  visibleCount: number;
  /** Items in the spatial index */
  totalCount: number;
  cacheHitRatio: number;
  batchDurationMs: number;
  /** Build invocations that succeeded in this tick */
  builtCount: number;
  /** Build invocations that failed in this tick */
  failedCount: number;
  /** True once every target has been processed */
  complete: boolean;
  timestamp: number;
}
