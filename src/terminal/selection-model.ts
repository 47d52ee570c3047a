/**
 * Character-range selection over the pane's visible text.
 * Positions index the rows of the current frame (scrollback rows first
 * when scrolled) and the characters of each row.
 */

import type { TextPosition } from '../core/types';

export interface Selection {
  /** Pointer is down and dragging */
  active: boolean;
  /** Pointer was released */
  complete: boolean;
  anchor: TextPosition;
  end: TextPosition;
}

const EMPTY_SELECTION: Selection = {
  active: false,
  complete: false,
  anchor: { line: 0, col: 0 },
  end: { line: 0, col: 0 },
};

const clamp = (value: number, min: number, max: number): number =>
  Math.max(min, Math.min(value, max));

const positionsEqual = (a: TextPosition, b: TextPosition): boolean =>
  a.line === b.line && a.col === b.col;

/** Order two positions so the first is never after the second */
export const normalizeRange = (
  a: TextPosition,
  b: TextPosition
): [start: TextPosition, end: TextPosition] => {
  if (a.line > b.line || (a.line === b.line && a.col > b.col)) {
    return [b, a];
  }
  return [a, b];
};

/** Keys that copy a completed selection; terminals swallow some of them */
const COPY_KEYS = new Set(['ctrl+c', 'y', 'ctrl+y']);

export const isCopyKey = (key: string): boolean => COPY_KEYS.has(key);

export class SelectionModel {
  private selection: Selection = EMPTY_SELECTION;
  /** Visible rows split into characters */
  private content: string[][] = [];

  get state(): Readonly<Selection> {
    return this.selection;
  }

  setContent(lines: ReadonlyArray<string>): void {
    this.content = lines.map((line) => Array.from(line));
  }

  start(line: number, col: number): void {
    const position = { line, col };
    this.selection = { active: true, complete: false, anchor: position, end: position };
  }

  update(line: number, col: number): void {
    if (!this.selection.active) return;
    this.selection = { ...this.selection, end: { line, col } };
  }

  end(): void {
    if (!this.selection.active) return;
    this.selection = { ...this.selection, active: false, complete: true };
  }

  clear(): void {
    this.selection = EMPTY_SELECTION;
  }

  /** A released selection covering at least one character */
  hasSelection(): boolean {
    return this.selection.complete && !positionsEqual(this.selection.anchor, this.selection.end);
  }

  /** Dragging or released, and non-empty */
  hasVisibleSelection(): boolean {
    if (!this.selection.active && !this.selection.complete) return false;
    return !positionsEqual(this.selection.anchor, this.selection.end);
  }

  /** Range membership; the end column is exclusive */
  isSelected(line: number, col: number): boolean {
    if (!this.selection.active && !this.selection.complete) return false;
    const [start, end] = normalizeRange(this.selection.anchor, this.selection.end);

    if (line < start.line || line > end.line) return false;
    if (line === start.line && col < start.col) return false;
    if (line === end.line && col >= end.col) return false;
    return true;
  }

  /**
   * Text covered by a completed selection, rows joined by '\n'.
   * Indices past the available content are clamped.
   */
  getSelectedText(): string {
    if (!this.hasSelection() || this.content.length === 0) return '';

    let [start, end] = normalizeRange(this.selection.anchor, this.selection.end);
    if (start.line < 0) start = { line: 0, col: 0 };
    if (start.line >= this.content.length) return '';
    if (end.line >= this.content.length) {
      const last = this.content.length - 1;
      end = { line: last, col: this.content[last].length };
    }
    if (end.line < 0) return '';

    if (start.line === end.line) {
      const chars = this.content[start.line];
      const from = clamp(start.col, 0, chars.length);
      const to = clamp(end.col, 0, chars.length);
      return chars.slice(Math.min(from, to), Math.max(from, to)).join('');
    }

    const first = this.content[start.line];
    const parts = [first.slice(clamp(start.col, 0, first.length)).join('')];
    for (let line = start.line + 1; line < end.line; line++) {
      parts.push(this.content[line].join(''));
    }
    const last = this.content[end.line];
    parts.push(last.slice(0, clamp(end.col, 0, last.length)).join(''));
    return parts.join('\n');
  }
}
