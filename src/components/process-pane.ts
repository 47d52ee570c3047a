/**
 * ProcessPane - interactive process pane.
 *
 * Composes a process session, the virtual screen, scrollback capture,
 * selection and the render scheduler. The host feeds it key, mouse and
 * paste events and reads frames back through view() / onFrame().
 *
 * Everything that touches the screen or the session (output, exit,
 * start, resize) runs through a serial mailbox, one task at a time.
 */

import { Effect, Runtime } from 'effect';
import type { Context } from 'effect';
import {
  COMMAND_STATUS_ROWS,
  FALLBACK_COLS,
  FALLBACK_ROWS,
  MAX_RAPID_RESTARTS,
  RAPID_EXIT_MS,
} from '../core/config';
import {
  describeKey,
  MOUSE_LEFT,
  MOUSE_WHEEL_DOWN,
  MOUSE_WHEEL_UP,
  type KeyboardEvent,
  type PaneMouseEvent,
} from '../core/keyboard-event';
import type { PaneRole, SessionExit, TextPosition } from '../core/types';
import type { AppConfigShape, ThemeConfigShape } from '../effect/Config';
import { AppConfig, ThemeConfig } from '../effect/Config';
import type { ProcessExitError } from '../effect/errors';
import { Clipboard } from '../effect/services/Clipboard';
import { Pty } from '../effect/services/Pty';
import { Cols, Rows, makePaneId, type PaneId } from '../effect/types';
import type { VirtualScreen } from '../terminal/emulator-interface';
import { encodeKey } from '../terminal/key-encoder';
import { ProcessSession } from '../terminal/process-session';
import {
  buildSgr,
  plainScreenLine,
  renderFrame,
  renderScreenLine,
  SGR_RESET,
  ATTR_BOLD,
  ATTR_ITALIC,
  visibleText,
  type RenderStyle,
} from '../terminal/rendering';
import { RenderScheduler, systemClock, type RenderStats, type SchedulerClock } from '../terminal/render-scheduler';
import { ScrollState } from '../terminal/scroll-state';
import { captureScrolledLines, ScrollbackStore, type ScreenSnapshot } from '../terminal/scrollback-store';
import { isCopyKey, SelectionModel } from '../terminal/selection-model';
import { DEFAULT_COLOR } from '../terminal/color-utils';
import { XtermScreen } from '../terminal/xterm-emulator';

// =============================================================================
// Restart policy
// =============================================================================

/** What the pane does when its process exits */
export interface RestartPolicy {
  readonly role: PaneRole;
  /** Rows kept back from the pty for a status line */
  readonly reservedRows: number;
  shouldRestart(exit: SessionExit): boolean;
}

/** Always-on shell: restarts after every exit except an explicit stop */
export const shellPolicy: RestartPolicy = {
  role: 'shell',
  reservedRows: 0,
  shouldRestart: (exit) => !exit.requested,
};

/** External command (AI assistant): stays stopped, exposing its exit error */
export const commandPolicy: RestartPolicy = {
  role: 'command',
  reservedRows: COMMAND_STATUS_ROWS,
  shouldRestart: () => false,
};

// =============================================================================
// Types
// =============================================================================

export interface PaneCommand {
  command: string;
  args: ReadonlyArray<string>;
  cwd?: string;
  env?: Record<string, string>;
}

/** Where the pane's first text cell sits in host mouse coordinates */
export interface ChromeOffsets {
  top: number;
  left: number;
}

export interface ProcessPaneOptions {
  policy: RestartPolicy;
  /** Command started by start() and by restarts */
  command: PaneCommand;
  chrome?: ChromeOffsets;
  clock?: SchedulerClock;
  createScreen?: (cols: number, rows: number) => VirtualScreen;
}

export interface ProcessPaneDeps {
  pty: Context.Tag.Service<Pty>;
  clipboard: Context.Tag.Service<Clipboard>;
  config: AppConfigShape;
  theme: ThemeConfigShape;
  runtime: Runtime.Runtime<never>;
}

export type PaneExitListener = (exit: SessionExit, error: ProcessExitError | null) => void;

const PAGE_FALLBACK = 10;

const RESTART_GIVEN_UP = '\x1b[31mProcess exited immediately; not restarting\x1b[0m\r\n';

const DEFAULT_CHROME: ChromeOffsets = { top: 1, left: 1 };

// =============================================================================
// ProcessPane
// =============================================================================

export class ProcessPane {
  readonly id: PaneId = makePaneId();
  readonly policy: RestartPolicy;

  private readonly deps: ProcessPaneDeps;
  private readonly command: PaneCommand;
  private readonly chrome: ChromeOffsets;
  private readonly createScreen: (cols: number, rows: number) => VirtualScreen;
  private readonly style: RenderStyle;
  private readonly clock: SchedulerClock;

  private readonly scrollback: ScrollbackStore;
  private readonly scroll = new ScrollState();
  private readonly selection = new SelectionModel();
  private readonly scheduler: RenderScheduler;

  private screen: VirtualScreen | null = null;
  private session: ProcessSession | null = null;
  private width = 0;
  private height = 0;
  private sized = false;
  private _focused = false;
  private disposed = false;
  private sessionStartedAt = 0;
  private rapidExits = 0;

  private mailbox: Promise<void> = Promise.resolve();
  private readonly frameListeners = new Set<(frame: string) => void>();
  private readonly exitListeners = new Set<PaneExitListener>();

  constructor(deps: ProcessPaneDeps, options: ProcessPaneOptions) {
    this.deps = deps;
    this.policy = options.policy;
    this.command = options.command;
    this.chrome = options.chrome ?? DEFAULT_CHROME;
    this.createScreen = options.createScreen ?? ((cols, rows) => new XtermScreen(cols, rows));
    this.style = { cursor: deps.theme.cursor, selection: deps.theme.selection };
    this.clock = options.clock ?? systemClock;
    this.scrollback = new ScrollbackStore({
      capacity: deps.config.scrollbackLimit,
      dedupWindow: deps.config.dedupWindow,
    });
    this.scheduler = new RenderScheduler({
      render: () => this.renderContent(),
      isRunning: () => this.running,
      onFrame: (frame) => {
        for (const listener of this.frameListeners) listener(frame);
      },
      intervalMs: deps.config.renderIntervalMs,
      minIntervalMs: deps.config.minRenderIntervalMs,
      clock: this.clock,
    });
  }

  // ===========================================================================
  // State
  // ===========================================================================

  get running(): boolean {
    return this.session?.running ?? false;
  }

  get focused(): boolean {
    return this._focused;
  }

  /** Exit error of the last session, for the owning chrome to display */
  get lastExitError(): ProcessExitError | null {
    return this.session?.lastExitError ?? null;
  }

  get scrollOffset(): number {
    return this.scroll.offset;
  }

  get scrollLocked(): boolean {
    return this.scroll.locked;
  }

  get scrollbackLength(): number {
    return this.scrollback.length;
  }

  scrollbackLines(): ReadonlyArray<string> {
    return this.scrollback.lines();
  }

  get renderStats(): Readonly<RenderStats> {
    return this.scheduler.stats;
  }

  hasSelection(): boolean {
    return this.selection.hasSelection();
  }

  selectedText(): string {
    return this.selection.getSelectedText();
  }

  focus(): void {
    this._focused = true;
    this.scheduler.markDirty();
  }

  blur(): void {
    this._focused = false;
    this.scheduler.markDirty();
  }

  onFrame(listener: (frame: string) => void): () => void {
    this.frameListeners.add(listener);
    return () => this.frameListeners.delete(listener);
  }

  onExit(listener: PaneExitListener): () => void {
    this.exitListeners.add(listener);
    return () => this.exitListeners.delete(listener);
  }

  /** Resolves once every queued screen/session task has run */
  whenIdle(): Promise<void> {
    return this.mailbox;
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  /** Start the configured command unless a session is already running */
  start(): Promise<void> {
    return this.enqueue('start', () => {
      this.rapidExits = 0;
      return this.startSession();
    });
  }

  /** Kill the running process; an explicit stop never restarts */
  stop(): void {
    this.session?.stop();
    this.scheduler.markDirty();
  }

  /**
   * New outer size. The view returns to the live tail and any selection
   * is dropped at once; the screen and pty follow through the mailbox.
   */
  setSize(width: number, height: number): Promise<void> {
    this.width = Math.max(0, Math.floor(width));
    this.height = Math.max(0, Math.floor(height));
    this.sized = true;
    this.scroll.toLive();
    this.selection.clear();
    this.scheduler.invalidate();

    const cols = this.width;
    const rows = this.height - this.policy.reservedRows;
    if (cols <= 0 || rows <= 0) return this.mailbox;

    return this.enqueue('resize', () => {
      this.screen?.resize(cols, rows);
      this.session?.resize(Cols.make(cols), Rows.make(rows));
      this.scheduler.markDirty();
    });
  }

  dispose(): Promise<void> {
    if (this.disposed) return this.mailbox;
    this.disposed = true;
    this.session?.stop();
    this.scheduler.dispose();
    this.frameListeners.clear();
    return this.enqueue('dispose', () => {
      this.screen?.dispose();
      this.screen = null;
      this.exitListeners.clear();
    });
  }

  // ===========================================================================
  // Input
  // ===========================================================================

  handleKey(event: KeyboardEvent): void {
    if (!this._focused || event.eventType === 'release') return;
    const name = describeKey(event);
    const key = event.key.toLowerCase();

    if (isCopyKey(name) && this.selection.hasSelection()) {
      this.copySelection();
      return;
    }

    if (key === 'escape' && this.selection.hasSelection()) {
      this.selection.clear();
      this.scheduler.forceRender();
      return;
    }

    if (key === 'end' && this.scroll.offset > 0) {
      this.scroll.toLive();
      this.scheduler.invalidate();
      return;
    }

    if (key === 'home' && (this.scroll.offset > 0 || !this.running) && this.scrollback.length > 0) {
      this.scroll.jumpToOldest(this.scrollback.length);
      this.scheduler.invalidate();
      return;
    }

    if ((this.scroll.offset > 0 || !this.running) && (key === 'pageup' || key === 'pagedown')) {
      const page = this.pageSize();
      if (key === 'pageup') this.scroll.scrollUp(page, this.scrollback.length);
      else this.scroll.scrollDown(page, this.scrollback.length);
      this.scheduler.invalidate();
      return;
    }

    const session = this.session;
    if (!session?.running) return;

    if (name === 'ctrl+v') {
      this.pasteFromClipboard(session);
      return;
    }

    const bytes = encodeKey(event);
    if (bytes !== null) session.write(bytes);
  }

  handlePaste(text: string): void {
    if (!this._focused || text.length === 0) return;
    this.session?.write(text);
  }

  handleMouse(event: PaneMouseEvent): void {
    if (event.type === 'scroll') {
      this.handleWheel(event.button);
      return;
    }

    if (event.button !== MOUSE_LEFT && event.type !== 'move' && event.type !== 'drag') return;
    const { line, col } = this.toTextPosition(event.x, event.y);

    switch (event.type) {
      case 'down':
        this.refreshSelectionContent();
        this.selection.start(line, col);
        this.scheduler.forceRender();
        return;
      case 'drag':
      case 'move':
        if (!this.selection.state.active) return;
        this.selection.update(line, col);
        this.scheduler.forceRender();
        return;
      case 'up':
        if (!this.selection.state.active) return;
        this.selection.update(line, col);
        this.selection.end();
        this.refreshSelectionContent();
        this.scheduler.forceRender();
        return;
    }
  }

  // ===========================================================================
  // View
  // ===========================================================================

  /** Current frame, with placeholders before the pane is usable */
  view(): string {
    if (!this.sized || this.width <= 0 || this.height <= 0) {
      return this.muted('Initializing terminal...', 0);
    }
    if (!this.screen) {
      return this.muted('Terminal ready...', ATTR_ITALIC);
    }

    const content = this.scheduler.frame();
    if (this.scroll.offset <= 0) return content;

    const lines = content.split('\n');
    lines[0] = this.scrollIndicator();
    return lines.join('\n');
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private enqueue(label: string, task: () => Promise<void> | void): Promise<void> {
    this.mailbox = this.mailbox
      .then(task)
      .catch((error: unknown) => {
        this.log(Effect.logError(`pane task failed: ${label}`, error));
      });
    return this.mailbox;
  }

  private log(effect: Effect.Effect<void>): void {
    Runtime.runFork(this.deps.runtime)(effect.pipe(Effect.annotateLogs({ pane: this.id })));
  }

  private ptySize(): { cols: Cols; rows: Rows } {
    const cols = this.width > 0 ? this.width : FALLBACK_COLS;
    const rows = this.height - this.policy.reservedRows;
    return { cols: Cols.make(cols), rows: Rows.make(rows > 0 ? rows : FALLBACK_ROWS) };
  }

  private async startSession(): Promise<void> {
    if (this.disposed || this.session?.running) return;

    const { cols, rows } = this.ptySize();
    if (!this.screen) {
      this.screen = this.createScreen(cols, rows);
    } else {
      this.screen.resize(cols, rows);
    }

    const session = await Runtime.runPromise(this.deps.runtime)(
      ProcessSession.start(this.deps.pty, {
        ...this.command,
        cols,
        rows,
        screen: this.screen,
        events: {
          onOutput: (source, data) => {
            void this.enqueue('output', () => this.applyOutput(source, data));
          },
          onExit: (source, exit) => {
            void this.enqueue('exit', () => this.handleExit(source, exit));
          },
          onWriteError: (_source, error) => {
            this.log(Effect.logDebug('pty write dropped', error));
          },
        },
      })
    );

    this.session = session;
    this.sessionStartedAt = this.clock.now();
    this.log(
      Effect.logInfo('session started').pipe(
        Effect.annotateLogs({ role: this.policy.role, command: this.command.command, running: session.running })
      )
    );
    this.scheduler.invalidate();
  }

  private snapshot(screen: VirtualScreen): ScreenSnapshot {
    const { cols, rows } = screen.size();
    const plain: string[] = [];
    const styled: string[] = [];
    for (let row = 0; row < rows; row++) {
      plain.push(plainScreenLine(screen, row, cols));
      styled.push(renderScreenLine(screen, row, cols, this.style));
    }
    return { plain, styled };
  }

  private async applyOutput(source: ProcessSession, data: string): Promise<void> {
    const screen = this.screen;
    if (source !== this.session || !screen) return;

    const before = screen.isAlternateScreen() ? null : this.snapshot(screen);
    await screen.write(data);

    if (before && !screen.isAlternateScreen()) {
      const newTop = plainScreenLine(screen, 0, screen.size().cols);
      const appended = captureScrolledLines(this.scrollback, before, newTop);
      this.scroll.followCapture(appended, this.scrollback.length);
    }

    this.scheduler.markDirty();
    source.continueReading();
  }

  private async handleExit(source: ProcessSession, exit: SessionExit): Promise<void> {
    if (source !== this.session) return;

    this.scroll.unlock();
    this.scheduler.markDirty();
    this.log(
      Effect.logInfo('session exited').pipe(
        Effect.annotateLogs({ role: this.policy.role, exitCode: exit.exitCode, requested: exit.requested })
      )
    );

    const error = source.lastExitError;
    for (const listener of this.exitListeners) listener(exit, error);

    const rapid = this.clock.now() - this.sessionStartedAt < RAPID_EXIT_MS;
    this.rapidExits = rapid ? this.rapidExits + 1 : 0;

    if (this.disposed || !this.policy.shouldRestart(exit)) return;

    if (this.rapidExits >= MAX_RAPID_RESTARTS) {
      this.log(
        Effect.logWarning('process keeps exiting at start, not restarting').pipe(
          Effect.annotateLogs({ command: this.command.command, exits: this.rapidExits })
        )
      );
      await this.screen?.write(RESTART_GIVEN_UP);
      this.scheduler.markDirty();
      return;
    }
    await this.startSession();
  }

  private renderContent(): string {
    const screen = this.screen;
    if (!screen) return '';
    const selecting = this.selection.hasVisibleSelection();
    return renderFrame({
      screen,
      scrollback: this.scrollback.lines(),
      scrollOffset: this.scroll.offset,
      showCursor: this._focused,
      isSelected: selecting ? (line, col) => this.selection.isSelected(line, col) : undefined,
      style: this.style,
    });
  }

  private refreshSelectionContent(): void {
    if (!this.screen) {
      this.selection.setContent([]);
      return;
    }
    this.selection.setContent(visibleText(this.screen, this.scrollback.lines(), this.scroll.offset));
  }

  private toTextPosition(x: number, y: number): TextPosition {
    return {
      line: Math.max(0, y - this.chrome.top),
      col: Math.max(0, x - this.chrome.left),
    };
  }

  private pageSize(): number {
    const page = this.height - 2;
    return page < 1 ? PAGE_FALLBACK : page;
  }

  private handleWheel(button: number): void {
    const step = this.deps.config.wheelStep;
    let moved = false;
    if (button === MOUSE_WHEEL_UP) moved = this.scroll.scrollUp(step, this.scrollback.length);
    else if (button === MOUSE_WHEEL_DOWN) moved = this.scroll.scrollDown(step, this.scrollback.length);
    if (moved) this.scheduler.invalidate();
  }

  private copySelection(): void {
    const text = this.selection.getSelectedText();
    this.selection.clear();
    this.scheduler.forceRender();
    if (text.length === 0) return;
    this.log(
      this.deps.clipboard.write(text).pipe(
        Effect.catchAll((error) => Effect.logDebug('clipboard write failed', error))
      )
    );
  }

  private pasteFromClipboard(session: ProcessSession): void {
    this.log(
      this.deps.clipboard.read().pipe(
        Effect.tap((text) => Effect.sync(() => session.write(text))),
        Effect.asVoid,
        Effect.catchAll((error) => Effect.logDebug('clipboard read failed', error))
      )
    );
  }

  private muted(text: string, attributes: number): string {
    return `${buildSgr({ fg: this.deps.theme.muted, bg: DEFAULT_COLOR, attributes })}${text}${SGR_RESET}`;
  }

  private scrollIndicator(): string {
    const label = ` ↑ SCROLL: ${this.scroll.offset} lines (End to return) `;
    const labelWidth = Array.from(label).length;
    const padding = labelWidth < this.width ? ' '.repeat(this.width - labelWidth) : '';
    const sgr = buildSgr({ fg: this.deps.theme.scrollIndicator, bg: DEFAULT_COLOR, attributes: ATTR_BOLD });
    return `${padding}${sgr}${label}${SGR_RESET}`;
  }
}

// =============================================================================
// Construction
// =============================================================================

/** Build a pane wired to the services of the current runtime */
export const makeProcessPane = (options: ProcessPaneOptions) =>
  Effect.gen(function* () {
    const pty = yield* Pty;
    const clipboard = yield* Clipboard;
    const config = yield* AppConfig;
    const theme = yield* ThemeConfig;
    const runtime = yield* Effect.runtime<never>();
    return new ProcessPane({ pty, clipboard, config, theme, runtime }, options);
  });
