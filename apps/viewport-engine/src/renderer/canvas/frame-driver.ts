/**
 * Frame Driver
 *
 * Change-driven tick loop for a ViewportEngine. Ticks are serialized through
 * a single-concurrency queue so async callers (pointer handlers, resize
 * observers, timers) never run two ticks at once against the shared cache.
 *
 * After each tick the driver schedules another one only while the engine
 * still has work; once the target list is fully built it goes quiet until the
 * next requestFrame(). There is no periodic repaint.
 */

import PQueue from 'p-queue';
import { toError } from './errors';
import type { RenderFrame } from './types';
import type { ViewportEngine } from './viewport-engine';

export type FrameListener<A> = (frame: RenderFrame<A>) => void;

export interface FrameDriverOptions {
  /** Defers a follow-up tick (defaults to a zero-delay timer) */
  scheduleFrame?: (callback: () => void) => void;
  /** Timestamp passed to tick() (defaults to performance.now) */
  now?: () => number;
}

export class FrameDriver<A> {
  private readonly queue = new PQueue({ concurrency: 1 });
  private readonly listeners = new Set<FrameListener<A>>();
  private readonly scheduleFrame: (callback: () => void) => void;
  private readonly now: () => number;

  /** Settles once the scheduled follow-up tick has run */
  private followUp: Promise<void> | null = null;
  private stopped = false;
  private frameCount = 0;

  constructor(
    private readonly engine: ViewportEngine<A>,
    options: FrameDriverOptions = {},
  ) {
    this.scheduleFrame = options.scheduleFrame ?? (callback => { setTimeout(callback, 0); });
    this.now = options.now ?? (() => performance.now());
  }

  /**
   * Tick now (after any tick already queued) and keep ticking until the
   * engine is idle.
   */
  requestFrame(): Promise<RenderFrame<A>> {
    this.stopped = false;
    return this.enqueueTick();
  }

  /**
   * Subscribe to every produced frame. Returns an unsubscribe function.
   */
  onFrame(listener: FrameListener<A>): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Stop scheduling follow-up ticks. Ticks already queued still run.
   */
  stop(): void {
    this.stopped = true;
  }

  /**
   * Resolves once no tick is queued or scheduled.
   */
  async onIdle(): Promise<void> {
    await this.queue.onIdle();
    while (this.followUp) {
      await this.followUp;
      await this.queue.onIdle();
    }
  }

  get frames(): number {
    return this.frameCount;
  }

  get isRunning(): boolean {
    return this.queue.pending > 0 || this.queue.size > 0 || this.followUp !== null;
  }

  private enqueueTick(): Promise<RenderFrame<A>> {
    return this.queue.add(() => this.runTick(), { throwOnTimeout: true });
  }

  private runTick(): RenderFrame<A> {
    const frame = this.engine.tick(this.now());
    this.frameCount++;

    for (const listener of this.listeners) {
      try {
        listener(frame);
      } catch (error) {
        console.warn('[FrameDriver] Frame listener failed:', toError(error).message);
      }
    }

    if (!this.engine.isIdle()) {
      this.scheduleFollowUp();
    }
    return frame;
  }

  private scheduleFollowUp(): void {
    if (this.followUp || this.stopped) return;

    let settle: () => void = () => {};
    const followUp = new Promise<void>(resolve => {
      settle = resolve;
    });
    this.followUp = followUp;

    this.scheduleFrame(() => {
      if (this.followUp === followUp) {
        this.followUp = null;
      }
      if (this.stopped) {
        settle();
        return;
      }
      this.enqueueTick().then(
        () => settle(),
        (error: unknown) => {
          console.warn('[FrameDriver] Tick failed:', toError(error).message);
          settle();
        },
      );
    });
  }
}
