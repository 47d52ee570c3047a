/**
 * Effect runtime for the application.
 * Provides a managed runtime with all services composed.
 */
import { appendFileSync, mkdirSync } from "fs"
import { dirname } from "path"
import { Effect, Layer, Logger, ManagedRuntime, Option } from "effect"
import { AppConfig, ThemeConfig } from "./Config"
import { Clipboard, Pty } from "./services"

// =============================================================================
// Logging
// =============================================================================

/**
 * logfmt lines appended to a file. The pane owns the terminal, so logs
 * never go to stdout; a logger that cannot write turns itself off.
 */
export const makeFileLogger = (path: string): Logger.Logger<unknown, void> => {
  let writable = true
  try {
    mkdirSync(dirname(path), { recursive: true })
  } catch {
    writable = false
  }
  return Logger.make((options) => {
    if (!writable) return
    try {
      appendFileSync(path, `${Logger.logfmtLogger.log(options)}\n`)
    } catch {
      writable = false
    }
  })
}

/** Route logs to the configured file (or nowhere) at the configured level */
export const LoggerLayer = Layer.unwrapEffect(
  Effect.gen(function* () {
    const config = yield* AppConfig
    const output = Option.match(config.logFile, {
      onNone: () => Logger.remove(Logger.defaultLogger),
      onSome: (path) => Logger.replace(Logger.defaultLogger, makeFileLogger(path)),
    })
    return Layer.merge(output, Logger.minimumLogLevel(config.logLevel))
  })
)

// =============================================================================
// Layer Composition
// =============================================================================

/** Base layer with configuration */
const ConfigLayer = Layer.merge(AppConfig.layer, ThemeConfig.layer)

/** PTY layer (depends on Config) */
const PtyLayer = Pty.layer.pipe(Layer.provide(ConfigLayer))

/** Full application layer */
export const AppLayer = Layer.mergeAll(
  ConfigLayer,
  Clipboard.layer,
  PtyLayer,
  LoggerLayer.pipe(Layer.provide(ConfigLayer))
)

/** Test layer composition */
export const TestAppLayer = Layer.mergeAll(
  AppConfig.testLayer,
  ThemeConfig.testLayer,
  Clipboard.testLayer,
  Pty.testLayer
)

// =============================================================================
// Runtime Types
// =============================================================================

/** All services provided by the app layer */
export type AppServices = AppConfig | ThemeConfig | Clipboard | Pty

// =============================================================================
// Managed Runtime
// =============================================================================

/** Managed runtime for the application */
export const AppRuntime = ManagedRuntime.make(AppLayer)

// =============================================================================
// Helper Functions
// =============================================================================

/**
 * Run an effect with the app runtime.
 * Returns a promise that resolves with the result.
 */
export const runEffect = <A, E>(
  effect: Effect.Effect<A, E, AppServices>
): Promise<A> => AppRuntime.runPromise(effect)

// =============================================================================
// Runtime Lifecycle
// =============================================================================

/**
 * Dispose the app runtime.
 * Call this when shutting down the application.
 */
export const disposeRuntime = (): Promise<void> =>
  AppRuntime.dispose()
