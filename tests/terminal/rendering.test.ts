import { describe, expect, it } from 'vitest';
import { paletteColor, rgbColor, DEFAULT_COLOR } from '../../src/terminal/color-utils';
import {
  ATTR_BOLD,
  ATTR_INVERSE,
  ATTR_UNDERLINE,
  buildSgr,
  colorToSgr,
  plainScreenLine,
  renderFrame,
  renderScreenLine,
  resolveCellStyle,
  REVERSE_VIDEO_STYLE,
  scrollbackStart,
  stripAnsi,
  visibleText,
  type RenderStyle,
} from '../../src/terminal/rendering';
import { GridScreen } from '../mocks/grid-screen';

describe('SGR encoding', () => {
  it('encodes colours by kind', () => {
    expect(colorToSgr(DEFAULT_COLOR, true)).toBe('');
    expect(colorToSgr(paletteColor(196), true)).toBe('38;5;196');
    expect(colorToSgr(rgbColor(1, 2, 3), false)).toBe('48;2;1;2;3');
  });

  it('puts attributes first, then foreground, then background', () => {
    const sgr = buildSgr({ fg: paletteColor(2), bg: rgbColor(1, 2, 3), attributes: ATTR_UNDERLINE | ATTR_BOLD });

    expect(sgr).toBe('\x1b[1;4;38;5;2;48;2;1;2;3m');
  });

  it('is empty for the default style', () => {
    expect(buildSgr({ fg: DEFAULT_COLOR, bg: DEFAULT_COLOR, attributes: 0 })).toBe('');
  });
});

describe('resolveCellStyle', () => {
  const cell = { char: 'x', fg: paletteColor(1), bg: DEFAULT_COLOR, attributes: ATTR_BOLD | ATTR_INVERSE, width: 1 as const };
  const style: RenderStyle = {
    cursor: { fg: rgbColor(0, 0, 0), bg: rgbColor(255, 255, 255) },
    selection: { bg: paletteColor(4) },
  };

  it('prefers the cursor over the selection', () => {
    expect(resolveCellStyle(cell, { isCursor: true, isSelected: true }, style)).toEqual({
      fg: rgbColor(0, 0, 0),
      bg: rgbColor(255, 255, 255),
      attributes: ATTR_BOLD,
    });
  });

  it('keeps the cell foreground when the selection only sets a background', () => {
    expect(resolveCellStyle(cell, { isCursor: false, isSelected: true }, style)).toEqual({
      fg: paletteColor(1),
      bg: paletteColor(4),
      attributes: ATTR_BOLD,
    });
  });

  it('falls back to reverse video without overlay colours', () => {
    expect(resolveCellStyle(cell, { isCursor: true, isSelected: false }, REVERSE_VIDEO_STYLE)).toEqual({
      fg: paletteColor(1),
      bg: DEFAULT_COLOR,
      attributes: ATTR_INVERSE,
    });
  });

  it('uses the cell style without overlays', () => {
    expect(resolveCellStyle(cell, { isCursor: false, isSelected: false }, style)).toEqual({
      fg: paletteColor(1),
      bg: DEFAULT_COLOR,
      attributes: ATTR_BOLD | ATTR_INVERSE,
    });
  });
});

describe('renderScreenLine', () => {
  it('closes every run with a reset', () => {
    const screen = new GridScreen(3, 1);
    screen.setRow(0, 'hi');

    expect(renderScreenLine(screen, 0, 3, REVERSE_VIDEO_STYLE)).toBe('hi \x1b[0m');
  });

  it('batches cells sharing a style', () => {
    const screen = new GridScreen(2, 1);
    screen.setRow(0, 'ab', { fg: paletteColor(1), attributes: ATTR_BOLD });

    expect(renderScreenLine(screen, 0, 2, REVERSE_VIDEO_STYLE)).toBe('\x1b[1;38;5;1mab\x1b[0m');
  });

  it('splits runs around the cursor', () => {
    const screen = new GridScreen(3, 1);
    screen.setRow(0, 'hi');

    expect(renderScreenLine(screen, 0, 3, REVERSE_VIDEO_STYLE, { cursorCol: 1 })).toBe(
      'h\x1b[0m\x1b[7mi\x1b[0m \x1b[0m'
    );
  });

  it('skips the trailing half of wide glyphs', () => {
    const screen = new GridScreen(3, 1);
    screen.setCell(0, 0, { char: '日', fg: DEFAULT_COLOR, bg: DEFAULT_COLOR, attributes: 0, width: 2 });
    screen.setCell(1, 0, { char: '', fg: DEFAULT_COLOR, bg: DEFAULT_COLOR, attributes: 0, width: 0 });
    screen.setCell(2, 0, { char: 'x', fg: DEFAULT_COLOR, bg: DEFAULT_COLOR, attributes: 0, width: 1 });

    expect(renderScreenLine(screen, 0, 3, REVERSE_VIDEO_STYLE)).toBe('日x\x1b[0m');
  });
});

describe('plain text', () => {
  it('trims trailing blanks', () => {
    const screen = new GridScreen(5, 1);
    screen.setRow(0, 'hi');

    expect(plainScreenLine(screen, 0, 5)).toBe('hi');
  });

  it('strips CSI sequences', () => {
    expect(stripAnsi('\x1b[1;31mred\x1b[0m plain')).toBe('red plain');
  });
});

describe('renderFrame', () => {
  it('draws the live screen with the cursor', () => {
    const screen = new GridScreen(2, 2);
    screen.setRow(0, 'ab');
    screen.setRow(1, 'cd');
    screen.setCursor({ x: 0, y: 1, visible: true });

    const frame = renderFrame({ screen, scrollback: [], scrollOffset: 0, showCursor: true, style: REVERSE_VIDEO_STYLE });

    expect(frame).toBe('ab\x1b[0m\n\x1b[7mc\x1b[0md\x1b[0m');
  });

  it('hides a cursor the program turned off', () => {
    const screen = new GridScreen(2, 2);
    screen.setRow(0, 'ab');
    screen.setRow(1, 'cd');
    screen.setCursor({ x: 0, y: 1, visible: false });

    const frame = renderFrame({ screen, scrollback: [], scrollOffset: 0, showCursor: true, style: REVERSE_VIDEO_STYLE });

    expect(frame).toBe('ab\x1b[0m\ncd\x1b[0m');
  });

  it('shows the scrollback tail before the live rows when scrolled', () => {
    const screen = new GridScreen(2, 3);
    screen.setRow(0, 'L1');
    screen.setRow(1, 'L2');
    screen.setCursor({ x: 0, y: 0, visible: true });

    const frame = renderFrame({
      screen,
      scrollback: ['s1', 's2', 's3'],
      scrollOffset: 2,
      showCursor: true,
      isSelected: (line, col) => line === 2 && col === 0,
      style: REVERSE_VIDEO_STYLE,
    });

    expect(frame).toBe('s2\ns3\n\x1b[7mL\x1b[0m1\x1b[0m');
  });

  it('fills the whole frame from history when scrolled far back', () => {
    const screen = new GridScreen(2, 2);
    screen.setRow(0, 'L1');

    const frame = renderFrame({
      screen,
      scrollback: ['s1', 's2', 's3', 's4', 's5'],
      scrollOffset: 3,
      showCursor: false,
      style: REVERSE_VIDEO_STYLE,
    });

    expect(frame).toBe('s3\ns4');
  });

  it('computes the first shown history line', () => {
    expect(scrollbackStart(5, 2)).toBe(3);
    expect(scrollbackStart(2, 5)).toBe(0);
  });
});

describe('visibleText', () => {
  it('matches the frame rows as plain text', () => {
    const screen = new GridScreen(2, 2);
    screen.setRow(0, 'ab');

    expect(visibleText(screen, ['\x1b[1ms1\x1b[0m'], 1)).toEqual(['s1', 'ab']);
    expect(visibleText(screen, ['\x1b[1ms1\x1b[0m'], 0)).toEqual(['ab', '']);
  });
});
