/**
 * Item fixtures for viewport engine tests
 */

import type { Rect } from '@/renderer/canvas/geometry';
import type { CanvasItem, ItemKey } from '@/renderer/canvas/types';

/** Artifact produced by the fixture build operation */
export interface TestArtifact {
  key: ItemKey;
  /** Build invocation counter for this key at creation time */
  generation: number;
}

/**
 * Counts build invocations per key so tests can assert rebuild behaviour.
 */
export class BuildCounter {
  private counts = new Map<ItemKey, number>();
  readonly order: ItemKey[] = [];

  record(key: ItemKey): number {
    const next = (this.counts.get(key) ?? 0) + 1;
    this.counts.set(key, next);
    this.order.push(key);
    return next;
  }

  count(key: ItemKey): number {
    return this.counts.get(key) ?? 0;
  }

  get total(): number {
    return this.order.length;
  }
}

export interface MakeItemOptions {
  clusterable?: boolean;
  priority?: number;
  counter?: BuildCounter;
  /** Throw from build instead of returning an artifact */
  fail?: boolean;
  /** Throw from the first N builds, then succeed */
  failFirst?: number;
}

export function makeItem(key: ItemKey, rect: Rect, options: MakeItemOptions = {}): CanvasItem<TestArtifact> {
  const { clusterable = false, priority, counter, fail = false, failFirst = 0 } = options;
  let attempts = 0;
  return {
    key,
    rect,
    clusterable,
    priority,
    build: item => {
      attempts++;
      const generation = counter?.record(item.key) ?? 1;
      if (fail || attempts <= failFirst) {
        throw new Error(`cannot build ${String(item.key)}`);
      }
      return { key: item.key, generation };
    },
  };
}

/**
 * `count` items of 10x10 laid out left to right, 20 units apart, on y = 0.
 */
export function makeRow(count: number, options: MakeItemOptions = {}, prefix = 'item'): CanvasItem<TestArtifact>[] {
  return Array.from({ length: count }, (_, i) =>
    makeItem(`${prefix}-${i}`, { x: i * 20, y: 0, width: 10, height: 10 }, options)
  );
}

/**
 * Deterministic pseudo-random generator (mulberry32) for property checks.
 */
export function createRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * A clock the test advances by hand.
 */
export class FakeClock {
  constructor(public time = 0) {}

  now = (): number => this.time;

  advance(ms: number): void {
    this.time += ms;
  }
}
