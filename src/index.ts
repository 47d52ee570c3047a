/**
 * Library entry: the process pane and the pieces it is built from.
 */

export * from './core/types';
export * from './core/keyboard-event';
export * from './core/config';
export * from './terminal';
export * from './components/process-pane';
export * from './ai/providers';
export * from './effect/errors';
export * from './effect/types';
export { AppConfig, ThemeConfig, type AppConfigShape, type ThemeConfigShape, type OverlayStyle } from './effect/Config';
export { Clipboard, Pty, type PtyProcess, type SpawnOptions } from './effect/services';
export { AppLayer, AppRuntime, TestAppLayer, disposeRuntime, runEffect, type AppServices } from './effect/runtime';
