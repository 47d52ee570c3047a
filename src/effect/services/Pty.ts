/**
 * PTY service for spawning processes behind a pseudo-terminal.
 * Wraps node-pty; each spawned process exposes flow control through
 * pause/resume so callers can bound what is read ahead.
 *
 * Traffic is logged at Trace level through the spawning fiber's logger.
 */
import { Context, Effect, Layer, Runtime } from "effect"
import * as nodePty from "node-pty"
import { isDirectory, resolveCommand } from "../../core/executable"
import { PtySpawnError } from "../errors"
import type { Cols, Rows } from "../types"
import { AppConfig } from "../Config"

// =============================================================================
// Types
// =============================================================================

export interface PtyExit {
  readonly exitCode: number
  readonly signal?: number
}

export interface SpawnOptions {
  readonly command: string
  readonly args: ReadonlyArray<string>
  readonly cols: Cols
  readonly rows: Rows
  readonly cwd?: string
  readonly env?: Record<string, string>
}

/** Handle to a running child process and its pty endpoint */
export interface PtyProcess {
  readonly pid: number
  readonly write: (data: string) => void
  readonly resize: (cols: Cols, rows: Rows) => void
  /** Stop delivering data events until resume() */
  readonly pause: () => void
  readonly resume: () => void
  readonly kill: (signal?: string) => void
  /** Returns an unsubscribe function */
  readonly onData: (listener: (data: string) => void) => () => void
  /** Fires once, after the child has been reaped */
  readonly onExit: (listener: (exit: PtyExit) => void) => () => void
}

/** Merge the host environment with overrides and the terminal capabilities */
export const buildSpawnEnv = (
  base: NodeJS.ProcessEnv,
  overrides: Record<string, string> | undefined,
  term: string
): Record<string, string> => {
  const env: Record<string, string> = {}
  for (const [key, value] of Object.entries(base)) {
    if (value !== undefined) env[key] = value
  }
  return {
    ...env,
    ...overrides,
    TERM: term,
    COLORTERM: "truecolor",
  }
}

/** Longest slice of a chunk shown in a trace line */
const TRACE_PREVIEW_CHARS = 200

/** Chunk as a quoted, escaped string, cut at TRACE_PREVIEW_CHARS */
export const previewChunk = (data: string): string => {
  if (data.length <= TRACE_PREVIEW_CHARS) return JSON.stringify(data)
  const over = data.length - TRACE_PREVIEW_CHARS
  return `${JSON.stringify(data.slice(0, TRACE_PREVIEW_CHARS))}...[truncated ${over} chars]`
}

type Trace = (message: string, annotations: Record<string, unknown>) => void

const wrapNodePty = (proc: nodePty.IPty, trace: Trace): PtyProcess => ({
  pid: proc.pid,
  write: (data) => {
    trace("pty write", { pid: proc.pid, bytes: data.length, data: previewChunk(data) })
    proc.write(data)
  },
  resize: (cols, rows) => proc.resize(cols, rows),
  pause: () => proc.pause(),
  resume: () => proc.resume(),
  kill: (signal) => proc.kill(signal),
  onData: (listener) => {
    const subscription = proc.onData((data) => {
      trace("pty read", { pid: proc.pid, bytes: data.length, data: previewChunk(data) })
      listener(data)
    })
    return () => subscription.dispose()
  },
  onExit: (listener) => {
    const subscription = proc.onExit(({ exitCode, signal }) => {
      trace("pty exit", { pid: proc.pid, exitCode, signal })
      listener({ exitCode, signal })
    })
    return () => subscription.dispose()
  },
})

// =============================================================================
// PTY Service
// =============================================================================

export class Pty extends Context.Tag("@ptydeck/Pty")<
  Pty,
  {
    /** Spawn a command behind a new pty */
    readonly spawn: (options: SpawnOptions) => Effect.Effect<PtyProcess, PtySpawnError>
  }
>() {
  /** Production layer */
  static readonly layer = Layer.effect(
    Pty,
    Effect.gen(function* () {
      const config = yield* AppConfig

      const spawn = Effect.fn("Pty.spawn")(function* (options: SpawnOptions) {
        const cwd = options.cwd ?? process.cwd()
        const env = buildSpawnEnv(process.env, options.env, config.term)

        // node-pty reports a failed exec as an exit, not as a spawn error
        if (!isDirectory(cwd)) {
          return yield* Effect.fail(
            PtySpawnError.make({
              command: options.command,
              cwd,
              cause: new Error(`${cwd}: no such directory`),
            })
          )
        }
        const file = resolveCommand(options.command, cwd, env)
        if (file === null) {
          return yield* Effect.fail(
            PtySpawnError.make({
              command: options.command,
              cwd,
              cause: new Error(`${options.command}: not found or not executable`),
            })
          )
        }

        const proc = yield* Effect.try({
          try: () =>
            nodePty.spawn(file, [...options.args], {
              name: config.term,
              cols: options.cols,
              rows: options.rows,
              cwd,
              env,
            }),
          catch: (error) =>
            PtySpawnError.make({ command: options.command, cwd, cause: error }),
        })

        yield* Effect.logDebug("pty spawned").pipe(
          Effect.annotateLogs({
            pid: proc.pid,
            command: file,
            cwd,
            cols: options.cols,
            rows: options.rows,
          })
        )

        const runtime = yield* Effect.runtime<never>()
        const trace: Trace = (message, annotations) =>
          Runtime.runSync(runtime)(Effect.logTrace(message).pipe(Effect.annotateLogs(annotations)))

        return wrapNodePty(proc, trace)
      })

      return Pty.of({ spawn })
    })
  )

  /** Test layer - inert process that never produces output */
  static readonly testLayer = Layer.succeed(Pty, {
    spawn: () =>
      Effect.succeed({
        pid: 12345,
        write: () => {},
        resize: () => {},
        pause: () => {},
        resume: () => {},
        kill: () => {},
        onData: () => () => {},
        onExit: () => () => {},
      }),
  })
}
