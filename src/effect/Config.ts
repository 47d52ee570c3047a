/**
 * Application configuration service using Effect.Config.
 * Layers: built-in defaults, then config.toml, then environment variables.
 */
import { Config, Context, Effect, Layer, LogLevel, Option } from "effect"
import { DEFAULT_USER_CONFIG, getConfigPath, readUserConfigFile, type UserConfig } from "../core/user-config"
import type { CellColor } from "../core/types"
import { hexToCellColor, rgbFromInt } from "../terminal/color-utils"
import { ConfigFileError } from "./errors"

// =============================================================================
// User config file
// =============================================================================

/** Load config.toml, falling back to defaults with a warning when it is invalid */
export const loadUserConfig = (path: string): Effect.Effect<UserConfig> =>
  Effect.try({
    try: () => readUserConfigFile(path),
    catch: (error) => ConfigFileError.make({ path, cause: error }),
  }).pipe(
    Effect.catchTag("ConfigFileError", (error) =>
      Effect.logWarning("Failed to parse config, using defaults").pipe(
        Effect.annotateLogs({ path: error.path }),
        Effect.as(DEFAULT_USER_CONFIG)
      )
    )
  )

const configPath = Config.string("PTYDECK_CONFIG").pipe(
  Config.orElse(() => Config.succeed(getConfigPath()))
)

// =============================================================================
// Config Service
// =============================================================================

/** Application configuration */
export interface AppConfigShape {
  readonly shell: string
  readonly term: string
  readonly scrollbackLimit: number
  readonly dedupWindow: number
  readonly renderIntervalMs: number
  readonly minRenderIntervalMs: number
  readonly wheelStep: number
  readonly logFile: Option.Option<string>
  readonly logLevel: LogLevel.LogLevel
  readonly aiProvider: string
  readonly configPath: string
}

export class AppConfig extends Context.Tag("@ptydeck/AppConfig")<
  AppConfig,
  AppConfigShape
>() {
  /** Production layer - config file overridden by environment */
  static readonly layer = Layer.effect(
    AppConfig,
    Effect.gen(function* () {
      const path = yield* configPath
      const { pane } = yield* loadUserConfig(path)

      const shell = yield* Config.string("PTYDECK_SHELL").pipe(
        Config.orElse(() => Config.succeed(pane.shell))
      )

      const term = yield* Config.string("PTYDECK_TERM").pipe(
        Config.orElse(() => Config.succeed(pane.term))
      )

      const scrollbackLimit = yield* Config.integer("PTYDECK_SCROLLBACK_LIMIT").pipe(
        Config.orElse(() => Config.succeed(pane.scrollbackLimit))
      )

      const dedupWindow = yield* Config.integer("PTYDECK_DEDUP_WINDOW").pipe(
        Config.orElse(() => Config.succeed(pane.dedupWindow))
      )

      const renderIntervalMs = yield* Config.integer("PTYDECK_RENDER_INTERVAL_MS").pipe(
        Config.orElse(() => Config.succeed(pane.renderIntervalMs))
      )

      const minRenderIntervalMs = yield* Config.integer("PTYDECK_MIN_RENDER_INTERVAL_MS").pipe(
        Config.orElse(() => Config.succeed(pane.minRenderIntervalMs))
      )

      const wheelStep = yield* Config.integer("PTYDECK_WHEEL_STEP").pipe(
        Config.orElse(() => Config.succeed(pane.wheelStep))
      )

      const logFile = yield* Config.option(Config.string("PTYDECK_LOG_FILE"))

      const logLevel = yield* Config.logLevel("PTYDECK_LOG_LEVEL").pipe(
        Config.orElse(() => Config.succeed(LogLevel.Info))
      )

      const aiProvider = yield* Config.string("PTYDECK_AI_PROVIDER").pipe(
        Config.orElse(() => Config.succeed(pane.aiProvider))
      )

      return AppConfig.of({
        shell,
        term,
        scrollbackLimit: Math.max(1, scrollbackLimit),
        dedupWindow: Math.max(0, dedupWindow),
        renderIntervalMs: Math.max(0, renderIntervalMs),
        minRenderIntervalMs: Math.max(0, minRenderIntervalMs),
        wheelStep: Math.max(1, wheelStep),
        logFile,
        logLevel,
        aiProvider,
        configPath: path,
      })
    })
  )

  /** Test layer - hardcoded values for testing */
  static readonly testLayer = Layer.succeed(AppConfig, {
    shell: "/bin/sh",
    term: "xterm-256color",
    scrollbackLimit: 10_000,
    dedupWindow: 20,
    renderIntervalMs: 50,
    minRenderIntervalMs: 0,
    wheelStep: 3,
    logFile: Option.none(),
    logLevel: LogLevel.None,
    aiProvider: "claude-code",
    configPath: "/tmp/ptydeck-test/config.toml",
  })
}

// =============================================================================
// Theme Configuration
// =============================================================================

/**
 * Colours painted over a cell by the cursor or the selection.
 * With neither set the cell is drawn in reverse video.
 */
export interface OverlayStyle {
  readonly fg?: CellColor
  readonly bg?: CellColor
}

export interface ThemeConfigShape {
  readonly cursor: OverlayStyle
  readonly selection: OverlayStyle
  readonly scrollIndicator: CellColor
  readonly error: CellColor
  readonly muted: CellColor
}

export const themeFromUserConfig = (config: UserConfig): ThemeConfigShape => {
  const { theme } = config
  return {
    cursor: {
      fg: hexToCellColor(theme.cursor.foreground),
      bg: hexToCellColor(theme.cursor.background),
    },
    selection: {
      fg: hexToCellColor(theme.selection.foreground),
      bg: hexToCellColor(theme.selection.background),
    },
    scrollIndicator: hexToCellColor(theme.scrollIndicatorColor) ?? rgbFromInt(0x00f0ff),
    error: hexToCellColor(theme.errorColor) ?? rgbFromInt(0xff3860),
    muted: hexToCellColor(theme.mutedColor) ?? rgbFromInt(0x8b7fa8),
  }
}

export class ThemeConfig extends Context.Tag("@ptydeck/ThemeConfig")<
  ThemeConfig,
  ThemeConfigShape
>() {
  static readonly layer = Layer.effect(
    ThemeConfig,
    Effect.gen(function* () {
      const path = yield* configPath
      const config = yield* loadUserConfig(path)
      return ThemeConfig.of(themeFromUserConfig(config))
    })
  )

  /** Test layer - reverse video overlays */
  static readonly testLayer = Layer.succeed(ThemeConfig, themeFromUserConfig(DEFAULT_USER_CONFIG))
}
