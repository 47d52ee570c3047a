/**
 * Effect services barrel export.
 */
export * from "./Clipboard"
export * from "./Pty"
