/**
 * VirtualScreen - the terminal emulator seen by the process pane.
 *
 * The pane only consumes the emulator's grid; escape-sequence parsing
 * lives entirely behind this interface.
 */

import type { CursorState, ScreenCell, ScreenSize } from '../core/types';

export interface VirtualScreen {
  /**
   * Feed raw process output. Resolves once the bytes have been parsed
   * and the grid reflects them.
   */
  write(data: string): Promise<void>;

  /** Resize the grid */
  resize(cols: number, rows: number): void;

  /** Cell at column x, row y (0-indexed). Out of range yields a blank cell. */
  cell(x: number, y: number): ScreenCell;

  cursor(): CursorState;

  size(): ScreenSize;

  /** True while a full-screen program holds the alternate buffer */
  isAlternateScreen(): boolean;

  /** Free all resources. After this, the screen should not be used. */
  dispose(): void;
}
