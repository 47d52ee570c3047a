/**
 * Tests for the command-backed Clipboard and its in-memory layer.
 */
import { Effect, Fiber, TestClock } from "effect"
import { describe, expect, it } from "@effect/vitest"
import {
  Clipboard,
  makeClipboard,
  platformCommands,
  spawnCommand,
  type ClipboardCommand,
  type ClipboardCommands,
  type CommandRunner,
} from "../../../src/effect/services/Clipboard"

const commands: ClipboardCommands = {
  write: [["first-copy"], ["second-copy", "--in"]],
  read: [["first-paste"], ["second-paste", "--out"]],
}

/** Runner answering from a table; a missing entry rejects */
const scriptedRunner = (answers: Record<string, string>) => {
  const calls: Array<{ command: ClipboardCommand; input?: string }> = []
  const run: CommandRunner = async (command, input) => {
    calls.push({ command, input })
    const answer = answers[command[0]]
    if (answer === undefined) throw new Error(`${command[0]} exited with code 1`)
    return answer
  }
  return { calls, run }
}

const causeMessage = (cause: unknown): string => (cause instanceof Error ? cause.message : String(cause))

describe("Clipboard", () => {
  describe("makeClipboard", () => {
    it.effect("falls back to the next write command", () =>
      Effect.gen(function* () {
        const { calls, run } = scriptedRunner({ "second-copy": "" })
        const clipboard = makeClipboard(run, commands)

        yield* clipboard.write("copied text")

        expect(calls).toEqual([
          { command: ["first-copy"], input: "copied text" },
          { command: ["second-copy", "--in"], input: "copied text" },
        ])
      })
    )

    it.effect("reads from the first command that succeeds", () =>
      Effect.gen(function* () {
        const { calls, run } = scriptedRunner({ "first-paste": "pasted", "second-paste": "unused" })
        const clipboard = makeClipboard(run, commands)

        const text = yield* clipboard.read()

        expect(text).toBe("pasted")
        expect(calls).toEqual([{ command: ["first-paste"], input: undefined }])
      })
    )

    it.effect("fails with the last command's error when every candidate fails", () =>
      Effect.gen(function* () {
        const { run } = scriptedRunner({})
        const clipboard = makeClipboard(run, commands)

        const error = yield* Effect.flip(clipboard.write("x"))

        expect(error._tag).toBe("ClipboardError")
        expect(error.operation).toBe("write")
        expect(causeMessage(error.cause)).toBe("second-copy exited with code 1")
      })
    )

    it.effect("fails when the platform has no clipboard command", () =>
      Effect.gen(function* () {
        const { calls, run } = scriptedRunner({})
        const clipboard = makeClipboard(run, { write: [], read: [] })

        const error = yield* Effect.flip(clipboard.read())

        expect(error.operation).toBe("read")
        expect(causeMessage(error.cause)).toBe("No clipboard command available")
        expect(calls).toEqual([])
      })
    )

    it.effect("gives up on a command that hangs for five seconds", () =>
      Effect.gen(function* () {
        const hang: CommandRunner = () => new Promise<string>(() => {})
        const clipboard = makeClipboard(hang, commands)

        const fiber = yield* Effect.fork(Effect.flip(clipboard.read()))
        yield* TestClock.adjust("5 seconds")
        const error = yield* Fiber.join(fiber)

        expect(error.operation).toBe("read")
        expect(causeMessage(error.cause)).toBe("Clipboard read timed out")
      })
    )

    it.effect("maps a hanging write to a write timeout", () =>
      Effect.gen(function* () {
        const hang: CommandRunner = () => new Promise<string>(() => {})
        const clipboard = makeClipboard(hang, commands)

        const fiber = yield* Effect.fork(Effect.flip(clipboard.write("x")))
        yield* TestClock.adjust("5 seconds")
        const error = yield* Fiber.join(fiber)

        expect(error.operation).toBe("write")
        expect(causeMessage(error.cause)).toBe("Clipboard write timed out")
      })
    )
  })

  describe("platformCommands", () => {
    it("tries xclip before xsel on linux", () => {
      const { write, read } = platformCommands("linux")

      expect(write.map(([command]) => command)).toEqual(["xclip", "xsel"])
      expect(read.map(([command]) => command)).toEqual(["xclip", "xsel"])
    })

    it("has no commands on an unsupported platform", () => {
      expect(platformCommands("aix")).toEqual({ write: [], read: [] })
    })
  })

  describe.skipIf(process.platform === "win32")("spawnCommand", () => {
    it("feeds stdin and collects stdout", async () => {
      await expect(spawnCommand(["cat"], "round trip")).resolves.toBe("round trip")
    })

    it("rejects on a non-zero exit", async () => {
      await expect(spawnCommand(["sh", "-c", "exit 3"])).rejects.toThrow("sh exited with code 3")
    })

    it("rejects when the command does not exist", async () => {
      await expect(spawnCommand(["ptydeck-no-such-clipboard-tool"])).rejects.toThrow("ENOENT")
    })
  })

  describe("testLayer", () => {
    it.effect("keeps the last text written", () =>
      Effect.gen(function* () {
        const clipboard = yield* Clipboard

        yield* clipboard.write("first line\nsecond line")
        yield* clipboard.write("replaced")

        expect(yield* clipboard.read()).toBe("replaced")
      }).pipe(Effect.provide(Clipboard.testLayer))
    )
  })
})
