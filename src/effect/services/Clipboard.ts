/**
 * Clipboard service for cross-platform clipboard operations.
 */
import { spawn } from "node:child_process"
import { Context, Effect, Layer } from "effect"
import { ClipboardError } from "../errors"

// =============================================================================
// Platform commands
// =============================================================================

export type ClipboardCommand = readonly [command: string, ...args: string[]]

/** Runs one command with optional stdin and resolves with its stdout */
export type CommandRunner = (command: ClipboardCommand, input?: string) => Promise<string>

/** Candidates tried in order for each operation */
export interface ClipboardCommands {
  readonly write: ReadonlyArray<ClipboardCommand>
  readonly read: ReadonlyArray<ClipboardCommand>
}

const WRITE_COMMANDS: Partial<Record<NodeJS.Platform, ReadonlyArray<ClipboardCommand>>> = {
  darwin: [["pbcopy"]],
  linux: [["xclip", "-selection", "clipboard"], ["xsel", "--clipboard", "--input"]],
  win32: [["clip"]],
}

const READ_COMMANDS: Partial<Record<NodeJS.Platform, ReadonlyArray<ClipboardCommand>>> = {
  darwin: [["pbpaste"]],
  linux: [["xclip", "-selection", "clipboard", "-o"], ["xsel", "--clipboard", "--output"]],
  win32: [["powershell", "-command", "Get-Clipboard"]],
}

export const platformCommands = (platform: NodeJS.Platform): ClipboardCommands => ({
  write: WRITE_COMMANDS[platform] ?? [],
  read: READ_COMMANDS[platform] ?? [],
})

/** Spawn a command, feeding stdin and collecting stdout; rejects on spawn error or non-zero exit */
export const spawnCommand: CommandRunner = ([command, ...args], input) =>
  new Promise((resolve, reject) => {
    const child = spawn(command, args, { stdio: ["pipe", "pipe", "ignore"] })
    let output = ""
    child.stdout.setEncoding("utf8")
    child.stdout.on("data", (chunk: string) => {
      output += chunk
    })
    child.on("error", reject)
    child.on("close", (code) => {
      if (code === 0) resolve(output)
      else reject(new Error(`${command} exited with code ${code}`))
    })
    // a command that never reads stdin may close it first
    child.stdin.on("error", reject)
    child.stdin.end(input ?? "")
  })

/** Try each candidate in order, keeping the first success; rejects with the last failure */
export const runFirst = async (
  run: CommandRunner,
  candidates: ReadonlyArray<ClipboardCommand>,
  input?: string
): Promise<string> => {
  if (candidates.length === 0) {
    throw new Error("No clipboard command available")
  }
  let lastError: unknown
  for (const candidate of candidates) {
    try {
      return await run(candidate, input)
    } catch (error) {
      lastError = error
    }
  }
  throw lastError
}

const CLIPBOARD_TIMEOUT = "5 seconds"

// =============================================================================
// Clipboard Service
// =============================================================================

export interface ClipboardShape {
  /** Write text to the system clipboard */
  readonly write: (text: string) => Effect.Effect<void, ClipboardError>
  /** Read text from the system clipboard */
  readonly read: () => Effect.Effect<string, ClipboardError>
}

/** Clipboard over external commands run by `run` */
export const makeClipboard = (run: CommandRunner, commands: ClipboardCommands): ClipboardShape => {
  const write = (text: string): Effect.Effect<void, ClipboardError> =>
    Effect.tryPromise({
      try: () => runFirst(run, commands.write, text),
      catch: (error) =>
        ClipboardError.make({ operation: "write", cause: error }),
    }).pipe(
      Effect.asVoid,
      Effect.timeout(CLIPBOARD_TIMEOUT),
      Effect.catchTag("TimeoutException", () =>
        ClipboardError.make({
          operation: "write",
          cause: new Error("Clipboard write timed out"),
        })
      )
    )

  const read = (): Effect.Effect<string, ClipboardError> =>
    Effect.tryPromise({
      try: () => runFirst(run, commands.read),
      catch: (error) =>
        ClipboardError.make({ operation: "read", cause: error }),
    }).pipe(
      Effect.timeout(CLIPBOARD_TIMEOUT),
      Effect.catchTag("TimeoutException", () =>
        ClipboardError.make({
          operation: "read",
          cause: new Error("Clipboard read timed out"),
        })
      )
    )

  return { write, read }
}

export class Clipboard extends Context.Tag("@ptydeck/Clipboard")<Clipboard, ClipboardShape>() {
  /** Production layer - uses platform-specific clipboard commands */
  static readonly layer = Layer.sync(Clipboard, () =>
    Clipboard.of(makeClipboard(spawnCommand, platformCommands(process.platform)))
  )

  /** Test layer - in-memory clipboard for testing */
  static readonly testLayer = Layer.sync(Clipboard, () => {
    let buffer = ""

    const write = (text: string): Effect.Effect<void, ClipboardError> =>
      Effect.sync(() => {
        buffer = text
      })

    const read = (): Effect.Effect<string, ClipboardError> =>
      Effect.succeed(buffer)

    return Clipboard.of({ write, read })
  })
}
