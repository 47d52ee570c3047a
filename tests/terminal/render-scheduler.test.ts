import { describe, expect, it } from 'vitest';
import { RenderScheduler } from '../../src/terminal/render-scheduler';
import { ManualClock } from '../mocks/manual-clock';

const setup = (options: { intervalMs?: number; minIntervalMs?: number } = {}) => {
  const clock = new ManualClock();
  const frames: string[] = [];
  const state = { content: 'a', running: false, frames };
  const scheduler = new RenderScheduler({
    render: () => `frame:${state.content}`,
    isRunning: () => state.running,
    onFrame: (frame) => state.frames.push(frame),
    intervalMs: options.intervalMs ?? 50,
    minIntervalMs: options.minIntervalMs ?? 0,
    clock,
  });
  return { clock, state, scheduler };
};

describe('RenderScheduler', () => {
  it('collapses dirty marks into a single tick', () => {
    const { clock, scheduler, state } = setup();

    scheduler.markDirty();
    scheduler.markDirty();
    scheduler.markDirty();

    expect(clock.pending).toBe(1);
    expect(scheduler.state).toBe('tick-scheduled');

    clock.advance(0);

    expect(scheduler.stats).toEqual({ renders: 1, replacements: 1 });
    expect(state.frames).toEqual(['frame:a']);
    expect(scheduler.state).toBe('idle');
    expect(scheduler.isDirty).toBe(false);
  });

  it('waits out the interval since the last render', () => {
    const { clock, scheduler } = setup();
    scheduler.markDirty();
    clock.advance(10);

    scheduler.markDirty();
    clock.advance(39);
    expect(scheduler.stats.renders).toBe(1);

    clock.advance(1);
    expect(scheduler.stats.renders).toBe(2);
  });

  it('keeps the cached frame when the output is unchanged', () => {
    const { clock, scheduler, state } = setup();
    scheduler.markDirty();
    clock.advance(0);

    scheduler.markDirty();
    clock.advance(50);

    expect(scheduler.stats).toEqual({ renders: 2, replacements: 1 });
    expect(state.frames).toEqual(['frame:a']);
    expect(scheduler.cached).toBe('frame:a');
  });

  it('replaces the frame when the content changes', () => {
    const { clock, scheduler, state } = setup();
    scheduler.markDirty();
    clock.advance(0);

    state.content = 'b';
    scheduler.markDirty();
    clock.advance(50);

    expect(state.frames).toEqual(['frame:a', 'frame:b']);
    expect(scheduler.frame()).toBe('frame:b');
  });

  it('keeps ticking while the session runs and stops after', () => {
    const { clock, scheduler, state } = setup();
    state.running = true;
    scheduler.markDirty();
    clock.advance(0);

    expect(scheduler.state).toBe('tick-scheduled');

    clock.advance(50);
    expect(scheduler.stats.renders).toBe(1);
    expect(scheduler.state).toBe('tick-scheduled');

    state.running = false;
    clock.advance(50);
    expect(scheduler.state).toBe('idle');
  });

  it('renders synchronously when nothing is cached', () => {
    const { scheduler } = setup();

    expect(scheduler.cached).toBeNull();
    expect(scheduler.frame()).toBe('frame:a');
    expect(scheduler.stats.renders).toBe(1);
  });

  it('renders fresh after invalidate', () => {
    const { scheduler, state } = setup();
    scheduler.frame();

    state.content = 'b';
    scheduler.invalidate();

    expect(scheduler.cached).toBeNull();
    expect(scheduler.frame()).toBe('frame:b');
  });

  it('force-renders past the throttle', () => {
    const { scheduler, state } = setup();
    scheduler.frame();
    state.content = 'c';

    expect(scheduler.forceRender()).toBe(true);
    expect(scheduler.cached).toBe('frame:c');
    expect(scheduler.forceRender()).toBe(false);
  });

  it('honours the minimum interval', () => {
    const { clock, scheduler } = setup({ intervalMs: 0, minIntervalMs: 20 });
    scheduler.markDirty();

    clock.advance(19);
    expect(scheduler.stats.renders).toBe(0);

    clock.advance(1);
    expect(scheduler.stats.renders).toBe(1);
  });

  it('cancels the pending tick on dispose', () => {
    const { clock, scheduler } = setup();
    scheduler.markDirty();
    scheduler.dispose();

    expect(clock.pending).toBe(0);
    scheduler.markDirty();
    expect(clock.pending).toBe(0);
  });
});
