/**
 * ANSI re-encoding of the virtual screen.
 * Rendering is a pure function of the grid, the overlays and the style
 * configuration passed in.
 */

import type { CellColor, CursorState, ScreenCell } from '../core/types';
import type { VirtualScreen } from './emulator-interface';
import { cellColorsEqual } from './color-utils';

// =============================================================================
// Text Attributes
// =============================================================================

/** Bold text attribute flag */
export const ATTR_BOLD = 1;

/** Dim (faint) text attribute flag */
export const ATTR_DIM = 2;

/** Italic text attribute flag */
export const ATTR_ITALIC = 4;

/** Underline text attribute flag */
export const ATTR_UNDERLINE = 8;

/** Blink text attribute flag */
export const ATTR_BLINK = 16;

/** Reverse video attribute flag */
export const ATTR_INVERSE = 32;

/** Concealed text attribute flag */
export const ATTR_INVISIBLE = 64;

/** Strikethrough text attribute flag */
export const ATTR_STRIKETHROUGH = 128;

/** SGR parameter for each attribute, in emission order */
const ATTRIBUTE_CODES: ReadonlyArray<readonly [flag: number, code: string]> = [
  [ATTR_BOLD, '1'],
  [ATTR_DIM, '2'],
  [ATTR_ITALIC, '3'],
  [ATTR_UNDERLINE, '4'],
  [ATTR_BLINK, '5'],
  [ATTR_INVERSE, '7'],
  [ATTR_INVISIBLE, '8'],
  [ATTR_STRIKETHROUGH, '9'],
];

export const SGR_RESET = '\x1b[0m';

// =============================================================================
// Style resolution
// =============================================================================

export interface CellStyle {
  fg: CellColor;
  bg: CellColor;
  attributes: number;
}

/** Colours painted over a cell; neither set means reverse video */
export interface OverlayColors {
  readonly fg?: CellColor;
  readonly bg?: CellColor;
}

export interface RenderStyle {
  readonly cursor: OverlayColors;
  readonly selection: OverlayColors;
}

export const REVERSE_VIDEO_STYLE: RenderStyle = { cursor: {}, selection: {} };

export interface CellOverlay {
  isCursor: boolean;
  isSelected: boolean;
}

function applyOverlay(cell: ScreenCell, overlay: OverlayColors): CellStyle {
  if (!overlay.fg && !overlay.bg) {
    return { fg: cell.fg, bg: cell.bg, attributes: ATTR_INVERSE };
  }
  return {
    fg: overlay.fg ?? cell.fg,
    bg: overlay.bg ?? cell.bg,
    attributes: cell.attributes & ~ATTR_INVERSE,
  };
}

/**
 * Cursor beats selection, selection beats the cell's own style.
 */
export function resolveCellStyle(cell: ScreenCell, overlay: CellOverlay, style: RenderStyle): CellStyle {
  if (overlay.isCursor) return applyOverlay(cell, style.cursor);
  if (overlay.isSelected) return applyOverlay(cell, style.selection);
  return { fg: cell.fg, bg: cell.bg, attributes: cell.attributes };
}

export function stylesEqual(a: CellStyle, b: CellStyle): boolean {
  return a.attributes === b.attributes && cellColorsEqual(a.fg, b.fg) && cellColorsEqual(a.bg, b.bg);
}

// =============================================================================
// SGR encoding
// =============================================================================

/** SGR parameters for a colour; empty for the terminal default */
export function colorToSgr(color: CellColor, isForeground: boolean): string {
  const base = isForeground ? 38 : 48;
  switch (color.kind) {
    case 'default':
      return '';
    case 'palette':
      return `${base};5;${color.index}`;
    case 'rgb':
      return `${base};2;${color.r};${color.g};${color.b}`;
  }
}

/** Single escape sequence for a style, or '' when everything is default */
export function buildSgr(style: CellStyle): string {
  const codes: string[] = [];
  for (const [flag, code] of ATTRIBUTE_CODES) {
    if (style.attributes & flag) codes.push(code);
  }
  const fg = colorToSgr(style.fg, true);
  if (fg) codes.push(fg);
  const bg = colorToSgr(style.bg, false);
  if (bg) codes.push(bg);
  return codes.length > 0 ? `\x1b[${codes.join(';')}m` : '';
}

// =============================================================================
// Line encoding
// =============================================================================

export interface LineOverlays {
  /** Cursor column on this row, if the cursor is drawn here */
  cursorCol?: number;
  isSelected?: (col: number) => boolean;
}

/**
 * Encode one row, batching consecutive cells that share a style into a
 * single run: style sequence, characters, reset.
 */
export function renderScreenLine(
  screen: VirtualScreen,
  row: number,
  cols: number,
  style: RenderStyle,
  overlays: LineOverlays = {}
): string {
  let result = '';
  let batch = '';
  let current: CellStyle | undefined;

  const flush = () => {
    if (batch.length === 0 || !current) return;
    result += buildSgr(current) + batch + SGR_RESET;
    batch = '';
  };

  for (let col = 0; col < cols; col++) {
    const cell = screen.cell(col, row);
    if (cell.width === 0) continue;

    const next = resolveCellStyle(
      cell,
      {
        isCursor: overlays.cursorCol === col,
        isSelected: overlays.isSelected?.(col) ?? false,
      },
      style
    );
    if (current && !stylesEqual(current, next)) flush();
    current = next;
    batch += cell.char === '' ? ' ' : cell.char;
  }
  flush();

  return result;
}

/** Row text without styling, trailing spaces removed */
export function plainScreenLine(screen: VirtualScreen, row: number, cols: number): string {
  let result = '';
  for (let col = 0; col < cols; col++) {
    const cell = screen.cell(col, row);
    if (cell.width === 0) continue;
    result += cell.char === '' ? ' ' : cell.char;
  }
  return result.replace(/ +$/, '');
}

const ANSI_PATTERN = /\x1b\[[^A-Za-z]*[A-Za-z]/g;

/** Remove CSI sequences from a styled line */
export function stripAnsi(text: string): string {
  return text.replace(ANSI_PATTERN, '');
}

// =============================================================================
// Frame construction
// =============================================================================

export interface FrameInput {
  screen: VirtualScreen;
  /** Captured history, oldest first */
  scrollback: ReadonlyArray<string>;
  scrollOffset: number;
  /** Draw the cursor (pane focused and cursor reported visible) */
  showCursor: boolean;
  /** Selection membership in view coordinates (row of the frame, column) */
  isSelected?: (line: number, col: number) => boolean;
  style: RenderStyle;
}

/** First scrollback index shown when scrolled back by `scrollOffset` */
export function scrollbackStart(scrollbackLength: number, scrollOffset: number): number {
  return Math.max(0, scrollbackLength - scrollOffset);
}

/**
 * Build the visible frame. Live: every screen row with cursor and
 * selection overlays. Scrolled: the scrollback tail followed by as many
 * live rows as fit; scrollback rows are emitted as stored.
 */
export function renderFrame(input: FrameInput): string {
  const { screen, scrollback, scrollOffset, style, isSelected } = input;
  const { cols, rows } = screen.size();
  if (cols <= 0 || rows <= 0) return '';

  const lines: string[] = [];

  if (scrollOffset > 0 && scrollback.length > 0) {
    for (let i = scrollbackStart(scrollback.length, scrollOffset); i < scrollback.length && lines.length < rows; i++) {
      lines.push(scrollback[i]);
    }
    const historyRows = lines.length;
    for (let row = 0; lines.length < rows; row++) {
      const line = historyRows + row;
      lines.push(
        renderScreenLine(screen, row, cols, style, {
          isSelected: isSelected ? (col) => isSelected(line, col) : undefined,
        })
      );
    }
    return lines.join('\n');
  }

  const cursor: CursorState = screen.cursor();
  const drawCursor = input.showCursor && cursor.visible;
  for (let row = 0; row < rows; row++) {
    lines.push(
      renderScreenLine(screen, row, cols, style, {
        cursorCol: drawCursor && cursor.y === row ? cursor.x : undefined,
        isSelected: isSelected ? (col) => isSelected(row, col) : undefined,
      })
    );
  }
  return lines.join('\n');
}

/**
 * Plain text of the visible frame, one entry per row, in the same
 * coordinates renderFrame uses for selection.
 */
export function visibleText(
  screen: VirtualScreen,
  scrollback: ReadonlyArray<string>,
  scrollOffset: number
): string[] {
  const { cols, rows } = screen.size();
  if (cols <= 0 || rows <= 0) return [];

  const lines: string[] = [];
  if (scrollOffset > 0 && scrollback.length > 0) {
    for (let i = scrollbackStart(scrollback.length, scrollOffset); i < scrollback.length && lines.length < rows; i++) {
      lines.push(stripAnsi(scrollback[i]));
    }
  }
  for (let row = 0; lines.length < rows; row++) {
    lines.push(plainScreenLine(screen, row, cols));
  }
  return lines;
}
