/**
 * Level-of-detail reducer
 *
 * Collapses dense groups of clusterable items into a single representative
 * when the camera is zoomed out far enough that the members would overlap on
 * screen.
 *
 * Grouping is greedy and O(n²) over the clusterable subset. That is the known
 * bound: it only ever runs on the already-culled visible set.
 */

import { distance, rectCenter, type Rect } from './geometry';
import type { ItemKey } from './types';

export interface Clusterable {
  readonly key: ItemKey;
  readonly rect: Rect;
  readonly clusterable: boolean;
}

export interface LodConfig {
  lodZoomThreshold: number;
  lodMinItems: number;
  clusterPixelThreshold: number;
  clusterSizeCutoff: number;
  deepZoomThreshold: number;
  deepZoomClusterSizeCutoff: number;
}

export interface LodResult<T> {
  /** Reduced clusterable items followed by every non-clusterable item */
  items: T[];
  /** Member count per representative key (only collapsed clusters) */
  clusterSizes: Map<ItemKey, number>;
  /** Items hidden behind a representative */
  collapsedCount: number;
}

export class LevelOfDetailReducer {
  constructor(private readonly config: LodConfig) {}

  /**
   * Whether a candidate set of `count` items at `zoom` gets reduced at all.
   * Small sets are left alone: clustering would cost more than it saves.
   */
  shouldReduce(count: number, zoom: number): boolean {
    return zoom < this.config.lodZoomThreshold && count >= this.config.lodMinItems;
  }

  /**
   * Largest cluster still emitted member by member. Stricter (smaller) below
   * the deep-zoom threshold.
   */
  clusterSizeCutoff(zoom: number): number {
    return zoom < this.config.deepZoomThreshold
      ? this.config.deepZoomClusterSizeCutoff
      : this.config.clusterSizeCutoff;
  }

  /**
   * World-space cluster radius. The pixel radius is constant, so clusters
   * grow as the user zooms out.
   */
  clusterRadius(zoom: number): number {
    return this.config.clusterPixelThreshold / zoom;
  }

  /**
   * Apply level-of-detail reduction when the zoom and set size call for it.
   */
  reduce<T extends Clusterable>(items: readonly T[], zoom: number): LodResult<T> {
    if (!this.shouldReduce(items.length, zoom)) {
      return { items: [...items], clusterSizes: new Map(), collapsedCount: 0 };
    }
    return this.cluster(items, zoom);
  }

  /**
   * Greedy clustering without the zoom/size gate.
   */
  cluster<T extends Clusterable>(items: readonly T[], zoom: number): LodResult<T> {
    const clusterable = items.filter(item => item.clusterable);
    const nonClusterable = items.filter(item => !item.clusterable);

    const radius = this.clusterRadius(zoom);
    const cutoff = this.clusterSizeCutoff(zoom);
    const processed = new Array<boolean>(clusterable.length).fill(false);

    const output: T[] = [];
    const clusterSizes = new Map<ItemKey, number>();
    let collapsedCount = 0;

    for (let i = 0; i < clusterable.length; i++) {
      if (processed[i]) continue;
      processed[i] = true;

      const seed = clusterable[i];
      const seedCenter = rectCenter(seed.rect);
      const cluster: T[] = [seed];

      for (let j = i + 1; j < clusterable.length; j++) {
        if (processed[j]) continue;

        const candidate = clusterable[j];
        if (distance(seedCenter, rectCenter(candidate.rect)) < radius) {
          cluster.push(candidate);
          processed[j] = true;
        }
      }

      if (cluster.length > cutoff) {
        output.push(seed);
        clusterSizes.set(seed.key, cluster.length);
        collapsedCount += cluster.length - 1;
      } else {
        output.push(...cluster);
      }
    }

    output.push(...nonClusterable);
    return { items: output, clusterSizes, collapsedCount };
  }
}
