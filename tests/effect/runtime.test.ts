/**
 * Tests for the logger layer wired from AppConfig.
 */
import fs from "node:fs"
import os from "node:os"
import path from "node:path"
import { Effect, Layer, LogLevel, Option } from "effect"
import { afterEach, describe, expect, it } from "vitest"
import { AppConfig } from "../../src/effect/Config"
import { LoggerLayer } from "../../src/effect/runtime"

const dirs: string[] = []

afterEach(() => {
  for (const dir of dirs.splice(0)) fs.rmSync(dir, { recursive: true, force: true })
})

const configWith = (logFile: string, logLevel: LogLevel.LogLevel) =>
  Layer.effect(
    AppConfig,
    Effect.map(AppConfig, (config) => ({ ...config, logFile: Option.some(logFile), logLevel }))
  ).pipe(Layer.provide(AppConfig.testLayer))

describe("LoggerLayer", () => {
  it("writes logfmt lines at or above the configured level to the log file", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "ptydeck-log-"))
    dirs.push(dir)
    const logFile = path.join(dir, "nested", "ptydeck.log")

    await Effect.runPromise(
      Effect.gen(function* () {
        yield* Effect.logInfo("below the level")
        yield* Effect.logWarning("pane restarted")
      }).pipe(Effect.provide(LoggerLayer.pipe(Layer.provide(configWith(logFile, LogLevel.Warning)))))
    )

    const lines = fs.readFileSync(logFile, "utf8").trimEnd().split("\n")
    expect(lines).toHaveLength(1)
    expect(lines[0]).toMatch(/ level=WARN /)
    expect(lines[0]).toMatch(/ message="pane restarted"$/)
  })
})
