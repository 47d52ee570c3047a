/**
 * Domain errors with Schema.TaggedError for type-safe, serializable errors.
 */
import { Schema } from "effect"

// =============================================================================
// PTY Errors
// =============================================================================

/** Failed to spawn a process behind a pseudo-terminal */
export class PtySpawnError extends Schema.TaggedError<PtySpawnError>()(
  "PtySpawnError",
  {
    command: Schema.String,
    cwd: Schema.String,
    cause: Schema.Defect,
  }
) {}

/** A session's process ended with a non-zero status */
export class ProcessExitError extends Schema.TaggedError<ProcessExitError>()(
  "ProcessExitError",
  {
    exitCode: Schema.Number,
    signal: Schema.optional(Schema.Number),
  }
) {}

/** Human readable summary for status lines */
export const describeExitError = (error: ProcessExitError): string =>
  error.signal !== undefined && error.signal !== 0
    ? `exited with code ${error.exitCode} (signal ${error.signal})`
    : `exited with code ${error.exitCode}`

// =============================================================================
// Clipboard Errors
// =============================================================================

/** Clipboard operation failed */
export class ClipboardError extends Schema.TaggedError<ClipboardError>()(
  "ClipboardError",
  {
    operation: Schema.Literal("read", "write"),
    cause: Schema.Defect,
  }
) {}

// =============================================================================
// Configuration Errors
// =============================================================================

/** User configuration file could not be parsed */
export class ConfigFileError extends Schema.TaggedError<ConfigFileError>()(
  "ConfigFileError",
  {
    path: Schema.String,
    cause: Schema.Defect,
  }
) {}
