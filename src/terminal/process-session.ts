/**
 * ProcessSession - one child process behind a pty, from spawn to reap.
 *
 * Output is delivered one chunk at a time: the next chunk is handed over
 * only when the consumer calls continueReading(). Chunks read meanwhile
 * wait in the session; past the high-water mark the pty itself is paused.
 * The exit event is held until every chunk read before it was delivered.
 */

import { Effect } from 'effect';
import type { Context } from 'effect';
import type { SessionExit } from '../core/types';
import { ProcessExitError, type PtySpawnError } from '../effect/errors';
import type { Pty, PtyExit, PtyProcess } from '../effect/services/Pty';
import type { Cols, Rows } from '../effect/types';
import type { VirtualScreen } from './emulator-interface';

export interface SessionEvents {
  onOutput: (session: ProcessSession, data: string) => void;
  onExit: (session: ProcessSession, exit: SessionExit) => void;
  onWriteError?: (session: ProcessSession, error: unknown) => void;
}

export interface StartSessionOptions {
  command: string;
  args: ReadonlyArray<string>;
  cols: Cols;
  rows: Rows;
  cwd?: string;
  env?: Record<string, string>;
  /** Receives the spawn error line when the process cannot start */
  screen: VirtualScreen;
  events: SessionEvents;
  /** Queued output (in UTF-16 units) at which the pty is paused */
  highWaterMark?: number;
}

export const DEFAULT_HIGH_WATER_MARK = 1024 * 1024;

/** Red one-line rendering of a spawn failure */
export function formatSpawnError(error: PtySpawnError): string {
  const reason = error.cause instanceof Error ? error.cause.message : String(error.cause);
  return `\x1b[31mError starting process: ${reason}\x1b[0m\r\n`;
}

export class ProcessSession {
  private proc: PtyProcess | null = null;
  private _running = false;
  private _lastExitError: ProcessExitError | null = null;
  private stopRequested = false;
  private releaseData: (() => void) | null = null;
  private releaseExit: (() => void) | null = null;
  private _cols: number;
  private _rows: number;

  private readonly queued: string[] = [];
  private queuedLength = 0;
  /** A chunk is with the consumer */
  private delivering = false;
  private ptyPaused = false;
  private pendingExit: PtyExit | null = null;

  private constructor(
    readonly command: string,
    readonly args: ReadonlyArray<string>,
    cols: number,
    rows: number,
    private readonly events: SessionEvents,
    private readonly highWaterMark: number
  ) {
    this._cols = cols;
    this._rows = rows;
  }

  /**
   * Spawn the process. A spawn failure is not propagated: the error is
   * written into the screen and the returned session is not running.
   */
  static start(
    pty: Context.Tag.Service<Pty>,
    options: StartSessionOptions
  ): Effect.Effect<ProcessSession> {
    const session = new ProcessSession(
      options.command,
      options.args,
      options.cols,
      options.rows,
      options.events,
      Math.max(1, options.highWaterMark ?? DEFAULT_HIGH_WATER_MARK)
    );
    return pty
      .spawn({
        command: options.command,
        args: options.args,
        cols: options.cols,
        rows: options.rows,
        cwd: options.cwd,
        env: options.env,
      })
      .pipe(
        Effect.tap((proc) => Effect.sync(() => session.attach(proc))),
        Effect.as(session),
        Effect.catchTag('PtySpawnError', (error) =>
          Effect.logWarning('failed to start process').pipe(
            Effect.annotateLogs({ command: error.command, cwd: error.cwd }),
            Effect.zipRight(Effect.promise(() => options.screen.write(formatSpawnError(error)))),
            Effect.as(session)
          )
        )
      );
  }

  get running(): boolean {
    return this._running;
  }

  get pid(): number | undefined {
    return this.proc?.pid;
  }

  get lastExitError(): ProcessExitError | null {
    return this._lastExitError;
  }

  get cols(): number {
    return this._cols;
  }

  get rows(): number {
    return this._rows;
  }

  /** Output chunks read from the pty but not yet delivered */
  get pendingChunks(): number {
    return this.queued.length;
  }

  /** Forward bytes to the process; dropped when not running or already exited */
  write(data: string): void {
    if (!this._running || !this.proc || this.pendingExit || data.length === 0) return;
    try {
      this.proc.write(data);
    } catch (error) {
      this.events.onWriteError?.(this, error);
    }
  }

  /** Allow the next chunk of output to be delivered */
  continueReading(): void {
    this.delivering = false;
    this.deliverNext();
  }

  resize(cols: Cols, rows: Rows): void {
    this._cols = cols;
    this._rows = rows;
    if (this._running && this.proc) this.proc.resize(cols, rows);
  }

  /**
   * Kill the process. The session stops accepting writes at once and
   * undelivered output is dropped; the exit event still follows once the
   * child has been reaped.
   */
  stop(): void {
    if (!this.proc) return;
    this.stopRequested = true;
    this._running = false;
    this.releaseData?.();
    this.releaseData = null;
    this.queued.length = 0;
    this.queuedLength = 0;
    this.proc.kill();
  }

  private attach(proc: PtyProcess): void {
    this.proc = proc;
    this._running = true;
    this.releaseData = proc.onData((data) => {
      if (!this._running || data.length === 0) return;
      this.queued.push(data);
      this.queuedLength += data.length;
      if (!this.ptyPaused && this.queuedLength >= this.highWaterMark) {
        this.ptyPaused = true;
        proc.pause();
      }
      this.deliverNext();
    });
    this.releaseExit = proc.onExit((exit) => {
      this.releaseExit?.();
      this.releaseExit = null;
      this.pendingExit = exit;
      if (this.stopRequested) this.finishExit(exit);
      else this.deliverNext();
    });
  }

  private deliverNext(): void {
    if (this.delivering || !this.proc) return;

    const chunk = this.queued.shift();
    if (chunk !== undefined) {
      this.queuedLength -= chunk.length;
      this.delivering = true;
      this.events.onOutput(this, chunk);
      return;
    }

    if (this.pendingExit) {
      this.finishExit(this.pendingExit);
      return;
    }
    if (this.ptyPaused) {
      this.ptyPaused = false;
      this.proc.resume();
    }
  }

  private finishExit({ exitCode, signal }: PtyExit): void {
    if (!this.proc) return;
    this.releaseData?.();
    this.releaseExit?.();
    this.releaseData = null;
    this.releaseExit = null;
    this.proc = null;
    this._running = false;
    this.delivering = false;

    const requested = this.stopRequested;
    this._lastExitError =
      !requested && exitCode !== 0 ? ProcessExitError.make({ exitCode, signal }) : null;
    this.events.onExit(this, { exitCode, signal, requested });
  }
}
