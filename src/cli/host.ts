/**
 * Full-screen terminal host for a single process pane.
 *
 * Owns the real terminal: raw mode, alternate screen, SGR mouse reporting
 * and bracketed paste. Decoded input goes to the pane; frames come back
 * through pane.onFrame() and are drawn above a one-line status bar.
 */

import { Effect } from 'effect';
import { describeKey, type InputEvent } from '../core/keyboard-event';
import type { PaneRole } from '../core/types';
import { ThemeConfig, type ThemeConfigShape } from '../effect/Config';
import { describeExitError, type ProcessExitError } from '../effect/errors';
import {
  makeProcessPane,
  type PaneCommand,
  type ProcessPane,
  type RestartPolicy,
} from '../components/process-pane';
import { DEFAULT_COLOR } from '../terminal/color-utils';
import { InputDecoder } from '../terminal/input-decoder';
import { ATTR_INVERSE, buildSgr, SGR_RESET } from '../terminal/rendering';

const ENTER_SEQUENCE = '\x1b[?1049h\x1b[?25l\x1b[?1002h\x1b[?1006h\x1b[?2004h\x1b[2J';
const LEAVE_SEQUENCE = '\x1b[?2004l\x1b[?1006l\x1b[?1002l\x1b[?25h\x1b[?1049l';

const QUIT_KEY = 'ctrl+q';

/** Rows taken by the status bar */
const STATUS_ROWS = 1;

export interface HostInput {
  readonly isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
  setEncoding(encoding: BufferEncoding): unknown;
  on(event: 'data', listener: (chunk: string | Buffer) => void): unknown;
  off(event: 'data', listener: (chunk: string | Buffer) => void): unknown;
  resume(): unknown;
  pause(): unknown;
}

export interface HostOutput {
  readonly columns?: number;
  readonly rows?: number;
  write(data: string): boolean;
  on(event: 'resize', listener: () => void): unknown;
  off(event: 'resize', listener: () => void): unknown;
}

export interface HostOptions {
  title: string;
  policy: RestartPolicy;
  command: PaneCommand;
  input: HostInput;
  output: HostOutput;
  /** Aborting quits the host like Ctrl+Q */
  signal?: AbortSignal;
}

export interface StatusInfo {
  title: string;
  role: PaneRole;
  running: boolean;
  error: ProcessExitError | null;
}

// =============================================================================
// Drawing
// =============================================================================

function fitWidth(text: string, width: number): string {
  const chars = Array.from(text).slice(0, Math.max(0, width));
  return chars.join('') + ' '.repeat(Math.max(0, width - chars.length));
}

/** Reverse-video status bar, coloured with the error colour after a failed exit */
export function formatStatusLine(info: StatusInfo, width: number, theme: ThemeConfigShape): string {
  const state = info.running ? 'running' : info.error ? describeExitError(info.error) : 'stopped';
  const text = ` ${info.title} [${info.role}] ${state} | Ctrl+Q quit`;
  const sgr = buildSgr({
    fg: info.error && !info.running ? theme.error : DEFAULT_COLOR,
    bg: DEFAULT_COLOR,
    attributes: ATTR_INVERSE,
  });
  return `${sgr}${fitWidth(text, width)}${SGR_RESET}`;
}

/**
 * Absolute-positioned screen update: each content row is drawn at its row
 * and cleared to the right, then the status bar on the last row.
 */
export function composeScreen(view: string, rows: number, status: string): string {
  const lines = view.split('\n');
  const contentRows = Math.max(0, rows - STATUS_ROWS);
  let out = '';
  for (let row = 0; row < contentRows; row++) {
    out += `\x1b[${row + 1};1H${lines[row] ?? ''}\x1b[K`;
  }
  if (rows > 0) {
    out += `\x1b[${rows};1H${status}`;
  }
  return out;
}

/** Outer pane height for a terminal of `rows`, leaving room for the status bar */
export function paneHeightFor(rows: number, policy: RestartPolicy): number {
  // A pane that reserves rows already leaves them for the status bar
  return policy.reservedRows >= STATUS_ROWS ? rows : rows - STATUS_ROWS;
}

// =============================================================================
// Host
// =============================================================================

class TerminalHost {
  private readonly decoder: InputDecoder;
  private readonly releases: Array<() => void> = [];
  private quit: (() => void) | null = null;
  private active = false;

  constructor(
    private readonly pane: ProcessPane,
    private readonly options: HostOptions,
    private readonly theme: ThemeConfigShape
  ) {
    this.decoder = new InputDecoder({ onEvent: (event) => this.dispatch(event) });
  }

  enter(): void {
    const { input, output } = this.options;
    this.active = true;
    output.write(ENTER_SEQUENCE);
    if (input.isTTY) input.setRawMode?.(true);
    input.setEncoding('utf8');
    input.on('data', this.onData);
    input.resume();
    output.on('resize', this.onResize);
  }

  run(): Promise<void> {
    return new Promise((resolve) => {
      this.quit = resolve;
      const signal = this.options.signal;
      if (signal) {
        if (signal.aborted) {
          resolve();
          return;
        }
        const onAbort = (): void => this.requestQuit();
        signal.addEventListener('abort', onAbort, { once: true });
        this.releases.push(() => signal.removeEventListener('abort', onAbort));
      }

      this.releases.push(this.pane.onFrame(() => this.draw()));
      this.releases.push(this.pane.onExit(() => this.draw()));
      this.pane.focus();
      void this.onResize();
      void this.pane.start().then(() => this.draw());
    });
  }

  async leave(): Promise<void> {
    const { input, output } = this.options;
    this.active = false;
    for (const release of this.releases.splice(0)) release();
    input.off('data', this.onData);
    output.off('resize', this.onResize);
    this.decoder.dispose();
    if (input.isTTY) input.setRawMode?.(false);
    input.pause();
    await this.pane.dispose();
    output.write(LEAVE_SEQUENCE);
  }

  private requestQuit(): void {
    const quit = this.quit;
    this.quit = null;
    quit?.();
  }

  private readonly onData = (chunk: string | Buffer): void => {
    this.decoder.feed(typeof chunk === 'string' ? chunk : chunk.toString('utf8'));
  };

  private readonly onResize = (): Promise<void> => {
    const { columns, rows } = this.size();
    const resized = this.pane.setSize(columns, paneHeightFor(rows, this.pane.policy));
    this.draw();
    return resized;
  };

  private dispatch(input: InputEvent): void {
    switch (input.kind) {
      case 'key':
        if (describeKey(input.event) === QUIT_KEY) {
          this.requestQuit();
          return;
        }
        this.pane.handleKey(input.event);
        return;
      case 'mouse':
        if (input.event.y >= this.size().rows - STATUS_ROWS) return;
        this.pane.handleMouse(input.event);
        return;
      case 'paste':
        this.pane.handlePaste(input.event.text);
        return;
    }
  }

  private size(): { columns: number; rows: number } {
    const { output } = this.options;
    return { columns: output.columns ?? 80, rows: output.rows ?? 24 };
  }

  private draw(): void {
    if (!this.active) return;
    const { columns, rows } = this.size();
    const status = formatStatusLine(
      {
        title: this.options.title,
        role: this.pane.policy.role,
        running: this.pane.running,
        error: this.pane.lastExitError,
      },
      columns,
      this.theme
    );
    this.options.output.write(composeScreen(this.pane.view(), rows, status));
  }
}

/**
 * Run one pane full-screen until Ctrl+Q (or the abort signal).
 * The terminal is restored and the pane disposed on the way out.
 */
export const runPaneHost = (options: HostOptions) =>
  Effect.gen(function* () {
    const theme = yield* ThemeConfig;
    const pane = yield* makeProcessPane({
      policy: options.policy,
      command: options.command,
      chrome: { top: 0, left: 0 },
    });
    const host = new TerminalHost(pane, options, theme);

    yield* Effect.acquireUseRelease(
      Effect.sync(() => host.enter()),
      () => Effect.promise(() => host.run()),
      () => Effect.promise(() => host.leave())
    );
    yield* Effect.logInfo('host closed').pipe(Effect.annotateLogs({ pane: pane.id }));
  });
