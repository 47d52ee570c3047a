/**
 * Built-in defaults for the process pane and its styling
 */

export interface PaneSettings {
  /** Shell started by the shell-role pane */
  shell: string;

  /** TERM advertised to child processes */
  term: string;

  /** Maximum captured history lines */
  scrollbackLimit: number;

  /** How many recent scrollback entries are checked for duplicates */
  dedupWindow: number;

  /** Target delay between renders in milliseconds */
  renderIntervalMs: number;

  /** Lower bound for any scheduled render delay */
  minRenderIntervalMs: number;

  /** Lines moved per mouse wheel tick */
  wheelStep: number;

  /** AI provider used by `ptydeck ai` when none is given */
  aiProvider: string;
}

/**
 * Overlay colours are '#rrggbb' strings; an overlay without colours
 * renders as reverse video over the cell's own colours.
 */
export interface OverlayTheme {
  foreground?: string;
  background?: string;
}

export interface PaneTheme {
  cursor: OverlayTheme;
  selection: OverlayTheme;
  scrollIndicatorColor: string;
  errorColor: string;
  mutedColor: string;
}

export const DEFAULT_PANE_SETTINGS: PaneSettings = {
  shell: process.env.SHELL ?? '/bin/bash',
  term: 'xterm-256color',
  scrollbackLimit: 10_000,
  dedupWindow: 20,
  renderIntervalMs: 50,
  minRenderIntervalMs: 0,
  wheelStep: 3,
  aiProvider: 'claude-code',
};

export const DEFAULT_PANE_THEME: PaneTheme = {
  cursor: {},
  selection: {},
  scrollIndicatorColor: '#00f0ff',
  errorColor: '#ff3860',
  mutedColor: '#8b7fa8',
};

/** Rows reserved by the command-role pane for its status line */
export const COMMAND_STATUS_ROWS = 1;

/** Fallback pty size when the pane has not been sized yet */
export const FALLBACK_COLS = 80;
export const FALLBACK_ROWS = 24;

/** A session ending sooner than this after its start counts as a rapid exit */
export const RAPID_EXIT_MS = 1000;

/** Consecutive rapid exits after which a shell pane stops restarting */
export const MAX_RAPID_RESTARTS = 3;
