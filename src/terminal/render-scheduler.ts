/**
 * Throttled, cached frame rendering.
 *
 * Output can arrive far faster than a full grid re-encode is worth doing.
 * Dirty marks collapse into a single delayed tick; the tick re-renders and
 * replaces the cached frame only when the text actually changed.
 */

export type CancelTimer = () => void;

/** Time source and timer used by the scheduler */
export interface SchedulerClock {
  now(): number;
  setTimeout(callback: () => void, delayMs: number): CancelTimer;
}

export const systemClock: SchedulerClock = {
  now: () => Date.now(),
  setTimeout: (callback, delayMs) => {
    const handle = setTimeout(callback, delayMs);
    return () => clearTimeout(handle);
  },
};

export interface RenderSchedulerOptions {
  /** Full frame render */
  render: () => string;
  /** While true, ticks keep rescheduling themselves */
  isRunning: () => boolean;
  /** Called whenever the cached frame is replaced */
  onFrame?: (frame: string) => void;
  intervalMs?: number;
  minIntervalMs?: number;
  clock?: SchedulerClock;
}

export interface RenderStats {
  /** Frames computed */
  renders: number;
  /** Times the cached frame was replaced by a different one */
  replacements: number;
}

export type SchedulerState = 'idle' | 'tick-scheduled';

export class RenderScheduler {
  private readonly render: () => string;
  private readonly isRunning: () => boolean;
  private readonly onFrame?: (frame: string) => void;
  private readonly intervalMs: number;
  private readonly minIntervalMs: number;
  private readonly clock: SchedulerClock;

  private cachedFrame: string | null = null;
  private dirty = false;
  private lastRender = Number.NEGATIVE_INFINITY;
  private cancelTick: CancelTimer | null = null;
  private disposed = false;
  private readonly counters: RenderStats = { renders: 0, replacements: 0 };

  constructor(options: RenderSchedulerOptions) {
    this.render = options.render;
    this.isRunning = options.isRunning;
    this.onFrame = options.onFrame;
    this.intervalMs = Math.max(0, options.intervalMs ?? 50);
    this.minIntervalMs = Math.max(0, options.minIntervalMs ?? 0);
    this.clock = options.clock ?? systemClock;
  }

  get state(): SchedulerState {
    return this.cancelTick ? 'tick-scheduled' : 'idle';
  }

  get isDirty(): boolean {
    return this.dirty;
  }

  get stats(): Readonly<RenderStats> {
    return this.counters;
  }

  /** Last rendered frame, or null before the first render */
  get cached(): string | null {
    return this.cachedFrame;
  }

  /** Something visible changed; render on the next tick */
  markDirty(): void {
    if (this.disposed) return;
    this.dirty = true;
    this.schedule();
  }

  /**
   * Drop the cached frame so the next read renders fresh.
   * Used when the view moved (scrolling) rather than the content.
   */
  invalidate(): void {
    if (this.disposed) return;
    this.cachedFrame = null;
    this.markDirty();
  }

  /** The cached frame, rendering synchronously when there is none */
  frame(): string {
    if (this.cachedFrame === null) {
      this.renderNow();
    }
    return this.cachedFrame ?? '';
  }

  /** Render immediately, bypassing the throttle (selection changes) */
  forceRender(): boolean {
    if (this.disposed) return false;
    this.dirty = false;
    return this.renderNow();
  }

  dispose(): void {
    this.disposed = true;
    this.cancelTick?.();
    this.cancelTick = null;
  }

  /**
   * Delay is measured from the last render; a tick rescheduling itself
   * waits a full interval so an idle running session does not spin.
   */
  private schedule(afterTick = false): void {
    if (this.cancelTick || this.disposed) return;
    const elapsed = afterTick ? 0 : this.clock.now() - this.lastRender;
    const delay = Math.max(this.minIntervalMs, this.intervalMs - elapsed);
    this.cancelTick = this.clock.setTimeout(() => this.tick(), delay);
  }

  private tick(): void {
    this.cancelTick = null;
    if (this.disposed) return;

    if (this.dirty) {
      this.dirty = false;
      this.renderNow();
    }

    if (this.isRunning()) {
      this.schedule(true);
    }
  }

  private renderNow(): boolean {
    this.lastRender = this.clock.now();
    this.counters.renders++;
    const next = this.render();
    if (next === this.cachedFrame) return false;
    this.cachedFrame = next;
    this.counters.replacements++;
    this.onFrame?.(next);
    return true;
  }
}
