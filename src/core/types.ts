/**
 * Core type definitions shared by the screen, rendering and pane layers
 */

/**
 * Cell colour as reported by the virtual screen.
 * - default: the terminal's default foreground/background
 * - palette: one of the 256 indexed colours
 * - rgb: a 24-bit true colour
 */
export type CellColor =
  | { readonly kind: 'default' }
  | { readonly kind: 'palette'; readonly index: number }
  | { readonly kind: 'rgb'; readonly r: number; readonly g: number; readonly b: number };

/**
 * A single cell of the virtual screen grid
 */
export interface ScreenCell {
  /** Glyph; empty string for an unwritten cell */
  char: string;
  fg: CellColor;
  bg: CellColor;
  /** Bitmask of ATTR_* flags (see terminal/rendering) */
  attributes: number;
  /** 0 for the trailing half of a wide glyph */
  width: 0 | 1 | 2;
}

/** Cursor position (0-indexed) and DECTCEM visibility */
export interface CursorState {
  x: number;
  y: number;
  visible: boolean;
}

/** Grid size in cells */
export interface ScreenSize {
  cols: number;
  rows: number;
}

/**
 * Position inside the currently visible text.
 * Lines index the concatenated scrollback + live rows when scrolled.
 */
export interface TextPosition {
  line: number;
  col: number;
}

/** Which way the pane treats its process when it exits */
export type PaneRole = 'shell' | 'command';

/** How a session ended */
export interface SessionExit {
  exitCode: number;
  signal?: number;
  /** True when the exit followed an explicit stop() */
  requested: boolean;
}
