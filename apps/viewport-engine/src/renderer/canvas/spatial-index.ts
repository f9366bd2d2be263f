/**
 * spatial-index.ts
 *
 * Region quadtree over world-space item rectangles, used for viewport culling.
 *
 * Architecture:
 * - Root bounds are fixed at construction (item union plus a margin)
 * - A node keeps items locally until it holds `maxItemsPerNode`, then splits
 *   into four equal quadrants (unless it sits at `maxDepth`)
 * - Later items go to the first child that fully contains them, otherwise
 *   they stay at the current node. Each item lives in exactly one node.
 *
 * The index never grows. Items outside the root bounds are rejected and the
 * owner rebuilds the index from scratch when its item set changes.
 *
 * @module spatial-index
 */

import { inflateRect, rectContains, rectsOverlap, unionRects, type Rect } from './geometry';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Anything with a world-space bounding rectangle.
 */
export interface Bounded {
  readonly rect: Rect;
}

/**
 * Configuration for the spatial index.
 */
export interface SpatialIndexConfig {
  /** Items held by a node before it subdivides */
  maxItemsPerNode: number;

  /** Nodes at this depth never subdivide */
  maxDepth: number;
}

export interface SpatialIndexBuildConfig extends SpatialIndexConfig {
  /** World units added around the item union */
  boundsMargin: number;
}

export interface SpatialIndexStats {
  nodeCount: number;
  itemCount: number;
  depth: number;
}

/**
 * QuadTree node.
 */
interface QuadNode<T> {
  bounds: Rect;
  depth: number;
  items: T[];
  children: [QuadNode<T>, QuadNode<T>, QuadNode<T>, QuadNode<T>] | null; // [NW, NE, SW, SE]
}

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

const DEFAULT_CONFIG: SpatialIndexConfig = {
  maxItemsPerNode: 16,
  maxDepth: 8,
};

// ─────────────────────────────────────────────────────────────────────────────
// SpatialIndex
// ─────────────────────────────────────────────────────────────────────────────

export class SpatialIndex<T extends Bounded> {
  private readonly root: QuadNode<T>;
  private nodeCount = 1;

  constructor(
    public readonly bounds: Rect,
    private readonly config: SpatialIndexConfig = DEFAULT_CONFIG,
  ) {
    this.root = this.createNode(bounds, 0);
  }

  /**
   * Build an index sized to fit `items`.
   *
   * Returns null for an empty item set (there are no bounds to index).
   */
  static fromItems<T extends Bounded>(
    items: readonly T[],
    config: SpatialIndexBuildConfig,
  ): SpatialIndex<T> | null {
    const union = unionRects(items.map(item => item.rect));
    if (!union) return null;

    const index = new SpatialIndex<T>(inflateRect(union, config.boundsMargin), config);
    for (const item of items) {
      index.insert(item);
    }
    return index;
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Public API
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Insert an item. Fails only when the item lies outside the root bounds.
   * Zero-size items on the root edge count as inside.
   */
  insert(item: T): boolean {
    const bounds = this.root.bounds;
    if (!rectsOverlap(bounds, item.rect) && !rectContains(bounds, item.rect)) {
      return false;
    }
    this.insertIntoNode(this.root, item);
    return true;
  }

  /**
   * Every item whose rectangle overlaps `range`.
   *
   * Order is node-local items first, then children NW→SE, so it is stable for
   * a fixed insertion order.
   */
  query(range: Rect): T[] {
    const results: T[] = [];

    // Root items may extend past the root bounds, so they are always tested
    this.collectOverlapping(this.root, range, results);
    if (this.root.children) {
      for (const child of this.root.children) {
        this.queryNode(child, range, results);
      }
    }
    return results;
  }

  /**
   * Recursive item count. Equals the number of successful inserts.
   */
  totalCount(): number {
    return this.countNode(this.root);
  }

  getStats(): SpatialIndexStats {
    return {
      nodeCount: this.nodeCount,
      itemCount: this.totalCount(),
      depth: this.getMaxDepth(this.root),
    };
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Private: Node operations
  // ───────────────────────────────────────────────────────────────────────────

  private createNode(bounds: Rect, depth: number): QuadNode<T> {
    return {
      bounds,
      depth,
      items: [],
      children: null,
    };
  }

  private insertIntoNode(node: QuadNode<T>, item: T): void {
    if (!node.children) {
      if (node.items.length < this.config.maxItemsPerNode || node.depth >= this.config.maxDepth) {
        node.items.push(item);
        return;
      }
      this.subdivide(node);
    }

    const target = this.findContainingChild(node, item.rect);
    if (target) {
      this.insertIntoNode(target, item);
    } else {
      // Spans a quadrant boundary - keep at this level
      node.items.push(item);
    }
  }

  private subdivide(node: QuadNode<T>): void {
    const { x, y, width, height } = node.bounds;
    const halfW = width / 2;
    const halfH = height / 2;
    const nextDepth = node.depth + 1;

    node.children = [
      this.createNode({ x, y, width: halfW, height: halfH }, nextDepth),                     // NW
      this.createNode({ x: x + halfW, y, width: halfW, height: halfH }, nextDepth),          // NE
      this.createNode({ x, y: y + halfH, width: halfW, height: halfH }, nextDepth),          // SW
      this.createNode({ x: x + halfW, y: y + halfH, width: halfW, height: halfH }, nextDepth), // SE
    ];

    this.nodeCount += 4;
  }

  private findContainingChild(node: QuadNode<T>, rect: Rect): QuadNode<T> | null {
    if (!node.children) return null;

    for (const child of node.children) {
      if (rectContains(child.bounds, rect)) {
        return child;
      }
    }
    return null;
  }

  private queryNode(node: QuadNode<T>, range: Rect, results: T[]): void {
    if (!rectsOverlap(node.bounds, range)) {
      return;
    }

    this.collectOverlapping(node, range, results);

    if (node.children) {
      for (const child of node.children) {
        this.queryNode(child, range, results);
      }
    }
  }

  private collectOverlapping(node: QuadNode<T>, range: Rect, results: T[]): void {
    for (const item of node.items) {
      if (rectsOverlap(item.rect, range)) {
        results.push(item);
      }
    }
  }

  private countNode(node: QuadNode<T>): number {
    let count = node.items.length;
    if (node.children) {
      for (const child of node.children) {
        count += this.countNode(child);
      }
    }
    return count;
  }

  private getMaxDepth(node: QuadNode<T>): number {
    if (!node.children) return node.depth;
    return Math.max(...node.children.map(child => this.getMaxDepth(child)));
  }
}
