import type { CellColor } from '../core/types';

export const DEFAULT_COLOR: CellColor = { kind: 'default' };

export function paletteColor(index: number): CellColor {
  return { kind: 'palette', index };
}

export function rgbColor(r: number, g: number, b: number): CellColor {
  return { kind: 'rgb', r, g, b };
}

/** Unpack a 0xRRGGBB integer */
export function rgbFromInt(color: number): CellColor {
  return rgbColor((color >> 16) & 0xff, (color >> 8) & 0xff, color & 0xff);
}

/**
 * Parse '#rrggbb' (or 'rrggbb'). Returns undefined for anything else.
 */
export function hexToCellColor(hex: string | undefined): CellColor | undefined {
  if (!hex) return undefined;
  const match = /^#?([0-9a-fA-F]{6})$/.exec(hex.trim());
  if (!match) return undefined;
  return rgbFromInt(parseInt(match[1], 16));
}

export function cellColorsEqual(a: CellColor, b: CellColor): boolean {
  switch (a.kind) {
    case 'default':
      return b.kind === 'default';
    case 'palette':
      return b.kind === 'palette' && a.index === b.index;
    case 'rgb':
      return b.kind === 'rgb' && a.r === b.r && a.g === b.g && a.b === b.b;
  }
}
