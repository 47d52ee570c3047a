/**
 * XtermScreen - VirtualScreen backed by @xterm/headless.
 *
 * The emulator keeps no scrollback of its own: rows leaving the top are
 * captured by the pane's scrollback store instead.
 */

import { Terminal, type IBufferCell } from '@xterm/headless';
import type { CellColor, CursorState, ScreenCell, ScreenSize } from '../core/types';
import type { VirtualScreen } from './emulator-interface';
import { DEFAULT_COLOR, paletteColor, rgbFromInt } from './color-utils';
import {
  ATTR_BLINK,
  ATTR_BOLD,
  ATTR_DIM,
  ATTR_INVERSE,
  ATTR_INVISIBLE,
  ATTR_ITALIC,
  ATTR_STRIKETHROUGH,
  ATTR_UNDERLINE,
} from './rendering';

const DECTCEM = 25;

const BLANK_CELL: ScreenCell = {
  char: '',
  fg: DEFAULT_COLOR,
  bg: DEFAULT_COLOR,
  attributes: 0,
  width: 1,
};

function hasParam(params: (number | number[])[], value: number): boolean {
  return params.some((param) => (Array.isArray(param) ? param.includes(value) : param === value));
}

function cellWidth(width: number): 0 | 1 | 2 {
  if (width === 0) return 0;
  return width >= 2 ? 2 : 1;
}

function foreground(cell: IBufferCell): CellColor {
  if (cell.isFgRGB()) return rgbFromInt(cell.getFgColor());
  if (cell.isFgPalette()) return paletteColor(cell.getFgColor());
  return DEFAULT_COLOR;
}

function background(cell: IBufferCell): CellColor {
  if (cell.isBgRGB()) return rgbFromInt(cell.getBgColor());
  if (cell.isBgPalette()) return paletteColor(cell.getBgColor());
  return DEFAULT_COLOR;
}

function attributes(cell: IBufferCell): number {
  let attrs = 0;
  if (cell.isBold()) attrs |= ATTR_BOLD;
  if (cell.isDim()) attrs |= ATTR_DIM;
  if (cell.isItalic()) attrs |= ATTR_ITALIC;
  if (cell.isUnderline()) attrs |= ATTR_UNDERLINE;
  if (cell.isBlink()) attrs |= ATTR_BLINK;
  if (cell.isInverse()) attrs |= ATTR_INVERSE;
  if (cell.isInvisible()) attrs |= ATTR_INVISIBLE;
  if (cell.isStrikethrough()) attrs |= ATTR_STRIKETHROUGH;
  return attrs;
}

export class XtermScreen implements VirtualScreen {
  private readonly term: Terminal;
  private readonly scratch: IBufferCell;
  private cursorVisible = true;
  private disposed = false;

  constructor(cols: number, rows: number) {
    this.term = new Terminal({ cols, rows, scrollback: 0, allowProposedApi: true });
    this.scratch = this.term.buffer.active.getNullCell();

    // Track DECTCEM; returning false lets xterm apply the mode as well
    this.term.parser.registerCsiHandler({ prefix: '?', final: 'h' }, (params) => {
      if (hasParam(params, DECTCEM)) this.cursorVisible = true;
      return false;
    });
    this.term.parser.registerCsiHandler({ prefix: '?', final: 'l' }, (params) => {
      if (hasParam(params, DECTCEM)) this.cursorVisible = false;
      return false;
    });
    // RIS restores the cursor
    this.term.parser.registerEscHandler({ final: 'c' }, () => {
      this.cursorVisible = true;
      return false;
    });
  }

  write(data: string): Promise<void> {
    if (this.disposed || data.length === 0) return Promise.resolve();
    return new Promise((resolve) => {
      this.term.write(data, resolve);
    });
  }

  resize(cols: number, rows: number): void {
    if (this.disposed) return;
    if (cols === this.term.cols && rows === this.term.rows) return;
    this.term.resize(Math.max(1, cols), Math.max(1, rows));
  }

  cell(x: number, y: number): ScreenCell {
    if (this.disposed) return BLANK_CELL;
    const buffer = this.term.buffer.active;
    const line = buffer.getLine(buffer.baseY + y);
    if (!line || x < 0 || x >= this.term.cols) return BLANK_CELL;
    const cell = line.getCell(x, this.scratch);
    if (!cell) return BLANK_CELL;
    return {
      char: cell.getChars(),
      fg: foreground(cell),
      bg: background(cell),
      attributes: attributes(cell),
      width: cellWidth(cell.getWidth()),
    };
  }

  cursor(): CursorState {
    const buffer = this.term.buffer.active;
    return { x: buffer.cursorX, y: buffer.cursorY, visible: this.cursorVisible };
  }

  size(): ScreenSize {
    return { cols: this.term.cols, rows: this.term.rows };
  }

  isAlternateScreen(): boolean {
    return this.term.buffer.active.type === 'alternate';
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.term.dispose();
  }
}
