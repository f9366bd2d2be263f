/**
 * Integration tests for ViewportEngine
 *
 * Drives the full pipeline (index → cull → priority → LOD → build → frame)
 * through tick() with a hand-advanced clock.
 */

import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';

import { EngineConfigError } from '@/renderer/canvas/errors';
import type { EngineConfig } from '@/renderer/canvas/engine-config';
import type { ItemKey, RenderFrame } from '@/renderer/canvas/types';
import { ViewportEngine } from '@/renderer/canvas/viewport-engine';
import { BuildCounter, FakeClock, makeItem, makeRow, type TestArtifact } from '../fixtures/items';

const VIEWPORT = { width: 200, height: 100 };

function frameKeys(frame: RenderFrame<TestArtifact>): ItemKey[] {
  return frame.items.map(entry => entry.item.key);
}

describe('ViewportEngine', () => {
  let clock: FakeClock;
  let counter: BuildCounter;
  let released: ItemKey[];
  let warnSpy: MockInstance;

  function createEngine(config: Partial<EngineConfig> = {}, initialZoom?: number): ViewportEngine<TestArtifact> {
    return new ViewportEngine<TestArtifact>({
      config,
      viewportSize: VIEWPORT,
      initialZoom,
      now: clock.now,
      releaseArtifact: artifact => released.push(artifact.key),
    });
  }

  beforeEach(() => {
    clock = new FakeClock();
    counter = new BuildCounter();
    released = [];
    warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    warnSpy.mockRestore();
  });

  describe('construction', () => {
    it('rejects invalid configuration', () => {
      expect(() => createEngine({ minZoom: 5, maxZoom: 2 })).toThrow(EngineConfigError);
    });

    it('rejects a non-finite starting camera', () => {
      expect(() => createEngine({}, Number.NaN)).toThrow('Invalid initial view: initialZoom must be a finite number');
      expect(
        () => new ViewportEngine<TestArtifact>({ viewportSize: VIEWPORT, initialOrigin: { x: 0, y: Number.NaN } })
      ).toThrow(EngineConfigError);
    });

    it('produces an empty complete frame without items', () => {
      const engine = createEngine();
      const frame = engine.tick(0);

      expect(frame).toMatchObject({ items: [], visibleCount: 0, totalCount: 0, complete: true });
      expect(engine.isIdle()).toBe(true);
    });
  });

  describe('culling and building', () => {
    it('builds the visible items and maps them to screen space', () => {
      const engine = createEngine();
      engine.submitItems(makeRow(25, { counter }));

      // Index is rebuilt lazily on the first tick
      expect(counter.total).toBe(0);
      expect(engine.isIdle()).toBe(false);

      const frame = engine.tick(42);

      // Visible world is x 0..200: item-0..item-9
      expect(frame.visibleCount).toBe(10);
      expect(frame.totalCount).toBe(25);
      expect(frame.builtCount).toBe(10);
      expect(frame.complete).toBe(true);
      expect(frame.timestamp).toBe(42);
      expect([...frameKeys(frame)].sort()).toEqual(
        ['item-0', 'item-1', 'item-2', 'item-3', 'item-4', 'item-5', 'item-6', 'item-7', 'item-8', 'item-9']
      );

      const third = frame.items.find(entry => entry.item.key === 'item-3');
      expect(third?.screenRect).toEqual({ x: 60, y: 0, width: 10, height: 10 });
      expect(third?.artifact).toEqual({ key: 'item-3', generation: 1 });
      expect(third?.clusterSize).toBe(1);
      expect(engine.isIdle()).toBe(true);
    });

    it('spreads a large visible set across ticks', () => {
      const engine = createEngine();
      engine.setViewportSize({ width: 1000, height: 100 });
      engine.submitItems(makeRow(25, { counter }));

      const frames = [engine.tick(0), engine.tick(16), engine.tick(32)];

      expect(frames.map(f => f.builtCount)).toEqual([10, 10, 5]);
      expect(frames.map(f => f.items.length)).toEqual([10, 20, 25]);
      expect(frames.map(f => f.complete)).toEqual([false, false, true]);
      expect(engine.isIdle()).toBe(true);
    });

    it('builds higher priority items first, keeping order among equals', () => {
      const engine = createEngine();
      engine.submitItems([
        makeItem('low', { x: 0, y: 0, width: 10, height: 10 }, { counter, priority: 1 }),
        makeItem('first-plain', { x: 20, y: 0, width: 10, height: 10 }, { counter }),
        makeItem('high', { x: 40, y: 0, width: 10, height: 10 }, { counter, priority: 5 }),
        makeItem('second-plain', { x: 60, y: 0, width: 10, height: 10 }, { counter }),
        makeItem('mid', { x: 80, y: 0, width: 10, height: 10 }, { counter, priority: 3 }),
      ]);

      const frame = engine.tick(0);

      expect(counter.order).toEqual(['high', 'mid', 'low', 'first-plain', 'second-plain']);
      expect(frameKeys(frame)).toEqual(['high', 'mid', 'low', 'first-plain', 'second-plain']);
    });

    it('keeps rendering the other items when one build fails', () => {
      const engine = createEngine();
      engine.submitItems([
        makeItem('ok', { x: 0, y: 0, width: 10, height: 10 }, { counter }),
        makeItem('broken', { x: 20, y: 0, width: 10, height: 10 }, { counter, fail: true }),
      ]);

      const frame = engine.tick(0);

      expect(frameKeys(frame)).toEqual(['ok']);
      expect(frame.failedCount).toBe(1);
      expect(engine.telemetry.getSnapshot().failures).toBe(1);
    });
  });

  describe('failed builds', () => {
    it('shows an item whose first build failed without any camera change', () => {
      const engine = createEngine();
      engine.submitItems([makeItem('flaky', { x: 0, y: 0, width: 10, height: 10 }, { counter, failFirst: 1 })]);

      const first = engine.tick(0);
      expect(frameKeys(first)).toEqual([]);
      expect(first.complete).toBe(false);
      expect(engine.isIdle()).toBe(false);

      let frame = first;
      for (let i = 1; i < 6; i++) {
        frame = engine.tick(i * 16);
      }

      expect(frameKeys(frame)).toEqual(['flaky']);
      expect(counter.count('flaky')).toBe(2);
      expect(engine.isIdle()).toBe(true);
    });
  });

  describe('camera changes', () => {
    it('retargets on pan and carries over items still visible', () => {
      const engine = createEngine();
      engine.submitItems(makeRow(25, { counter }));
      engine.tick(0);

      expect(engine.pan({ x: 100, y: 0 })).toBe(true);
      expect(engine.isIdle()).toBe(false);

      // Visible world is now x 100..300: item-5..item-14
      const frame = engine.tick(16);

      expect(frame.visibleCount).toBe(10);
      expect(frame.builtCount).toBe(5);
      expect(counter.count('item-5')).toBe(1);
      expect(counter.count('item-14')).toBe(1);
      expect(counter.total).toBe(15);
      expect(frame.items.find(entry => entry.item.key === 'item-5')?.screenRect.x).toBe(0);
    });

    it('reuses cached artifacts when panning back', () => {
      const engine = createEngine();
      engine.submitItems(makeRow(25, { counter }));
      engine.tick(0);

      engine.pan({ x: 1000, y: 0 });
      expect(engine.tick(16).visibleCount).toBe(0);

      engine.pan({ x: -1000, y: 0 });
      const frame = engine.tick(32);

      expect(frame.items).toHaveLength(10);
      expect(frame.builtCount).toBe(0);
      expect(counter.total).toBe(10);
      // 10 misses on the first pass, 10 hits on the way back
      expect(frame.cacheHitRatio).toBe(0.5);
    });

    it('clears the cache on zoom and rebuilds at the new scale', () => {
      const engine = createEngine();
      engine.submitItems(makeRow(25, { counter }));
      engine.tick(0);

      expect(engine.zoomAt(2, { x: 0, y: 0 })).toBe(true);
      expect(released).toHaveLength(10);
      expect(engine.getCacheStats().size).toBe(0);

      // Visible world is x 0..100: item-0..item-4
      const frame = engine.tick(16);

      expect(frame.visibleCount).toBe(5);
      expect(counter.count('item-0')).toBe(2);
      expect(frame.items.find(entry => entry.item.key === 'item-1')?.screenRect).toEqual({
        x: 40,
        y: 0,
        width: 20,
        height: 20,
      });
    });

    it('keeps the cache when zoom is already at its limit', () => {
      const engine = createEngine({}, 10);
      engine.submitItems(makeRow(3, { counter }));
      engine.tick(0);

      expect(engine.zoomAt(2)).toBe(false);
      expect(released).toEqual([]);
      expect(engine.isIdle()).toBe(true);
    });

    it('fits every item in the viewport', () => {
      const engine = createEngine();
      engine.submitItems(makeRow(25, { counter }));

      expect(engine.fitToItems(0)).toBe(true);
      expect(engine.getCamera().z).toBeCloseTo(200 / 490, 10);
      expect(engine.tick(0).visibleCount).toBe(25);
    });

    it('does nothing when fitting an empty item set', () => {
      expect(createEngine().fitToItems()).toBe(false);
    });

    it('retargets when the viewport grows', () => {
      const engine = createEngine();
      engine.submitItems(makeRow(25, { counter }));
      engine.tick(0);

      expect(engine.setViewportSize(VIEWPORT)).toBe(false);
      expect(engine.setViewportSize({ width: 400, height: 100 })).toBe(true);
      expect(engine.tick(16).visibleCount).toBe(20);
    });
  });

  describe('level of detail', () => {
    it('collapses dense clusters into one representative at low zoom', () => {
      const engine = createEngine({ lodMinItems: 10 }, 0.4);
      const dense = Array.from({ length: 12 }, (_, i) =>
        makeItem(`c-${i}`, { x: i * 2, y: 0, width: 4, height: 4 }, { counter, clusterable: true })
      );
      const pinned = makeItem('pinned', { x: 300, y: 0, width: 10, height: 10 }, { counter });
      engine.submitItems([...dense, pinned]);

      const frame = engine.tick(0);

      expect(frameKeys(frame)).toEqual(['c-0', 'pinned']);
      expect(frame.items[0].clusterSize).toBe(12);
      expect(frame.items[1].clusterSize).toBe(1);
      expect(frame.visibleCount).toBe(2);
      expect(frame.totalCount).toBe(13);
      expect(counter.total).toBe(2);
    });

    it('leaves the set alone at normal zoom', () => {
      const engine = createEngine({ lodMinItems: 10 });
      engine.submitItems(
        Array.from({ length: 12 }, (_, i) =>
          makeItem(`c-${i}`, { x: i * 2, y: 0, width: 4, height: 4 }, { counter, clusterable: true })
        )
      );

      expect(engine.tick(0).visibleCount).toBe(12);
    });
  });

  describe('dataset changes', () => {
    it('drops artifacts of removed and replaced items', () => {
      const engine = createEngine();
      const items = makeRow(10, { counter });
      engine.submitItems(items);
      engine.tick(0);

      const replacement = makeItem('item-0', { x: 0, y: 50, width: 10, height: 10 }, { counter });
      engine.submitItems([replacement, ...items.slice(2)]);

      expect(released.sort()).toEqual(['item-0', 'item-1']);

      const frame = engine.tick(16);

      expect(frame.builtCount).toBe(1);
      expect(frame.totalCount).toBe(9);
      expect(counter.count('item-0')).toBe(2);
      expect(counter.total).toBe(11);
      expect(frame.items.find(entry => entry.item.key === 'item-0')?.screenRect.y).toBe(50);
    });

    it('keeps the last item for a duplicated key', () => {
      const engine = createEngine();
      engine.submitItems([
        makeItem('dup', { x: 0, y: 0, width: 10, height: 10 }),
        makeItem('dup', { x: 30, y: 0, width: 10, height: 10 }),
      ]);

      expect(engine.getItemCount()).toBe(1);
      expect(warnSpy).toHaveBeenCalledWith('[ViewportEngine] Duplicate item key dup, keeping the last one');
      expect(engine.tick(0).items[0].screenRect.x).toBe(30);
    });

    it('rebuilds everything after invalidate()', () => {
      const engine = createEngine();
      engine.submitItems(makeRow(10, { counter }));
      engine.tick(0);

      engine.invalidate();
      expect(released).toHaveLength(10);

      const frame = engine.tick(16);
      expect(frame.builtCount).toBe(10);
      expect(counter.count('item-9')).toBe(2);
    });

    it('releases every artifact on dispose()', () => {
      const engine = createEngine();
      engine.submitItems(makeRow(4, { counter }));
      engine.tick(0);
      engine.dispose();

      expect(released.sort()).toEqual(['item-0', 'item-1', 'item-2', 'item-3']);
      expect(engine.getItemCount()).toBe(0);
    });
  });

  describe('telemetry', () => {
    it('records every tick', () => {
      const engine = createEngine();
      engine.submitItems(makeRow(25, { counter }));
      engine.tick(0);
      engine.tick(16);

      expect(engine.telemetry.getSnapshot()).toMatchObject({
        frames: 2,
        builds: 10,
        visibleCount: 10,
        totalCount: 25,
        renderedCount: 10,
        complete: true,
      });
      expect(engine.getSchedulerStats().builds).toBe(10);
    });
  });
});
