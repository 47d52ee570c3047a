import { describe, expect, it } from 'vitest';
import type { InputEvent } from '../../src/core/keyboard-event';
import { decodeSgrMouse, InputDecoder, keyForChar } from '../../src/terminal/input-decoder';
import { ManualClock } from '../mocks/manual-clock';

const setup = () => {
  const clock = new ManualClock();
  const events: InputEvent[] = [];
  const decoder = new InputDecoder({ onEvent: (event) => events.push(event), escapeTimeoutMs: 25, clock });
  return { clock, events, decoder };
};

const keys = (events: InputEvent[]) => events.flatMap((event) => (event.kind === 'key' ? [event.event] : []));

describe('InputDecoder', () => {
  it('decodes printable text one key per character', () => {
    const { decoder, events } = setup();
    decoder.feed('hé😀');

    expect(keys(events)).toEqual([
      { key: 'h', sequence: 'h' },
      { key: 'é', sequence: 'é' },
      { key: '😀', sequence: '😀' },
    ]);
  });

  it('decodes control characters', () => {
    const { decoder, events } = setup();
    decoder.feed('\r\t\x7f\x03\n');

    expect(keys(events)).toEqual([
      { key: 'enter' },
      { key: 'tab' },
      { key: 'backspace' },
      { key: 'c', ctrl: true },
      { key: 'j', ctrl: true },
    ]);
  });

  it('decodes cursor and function keys', () => {
    const { decoder, events } = setup();
    decoder.feed('\x1b[A\x1b[5~\x1bOP\x1b[15~\x1b[Z');

    expect(keys(events)).toEqual([
      { key: 'up' },
      { key: 'pageup' },
      { key: 'f1' },
      { key: 'f5' },
      { key: 'tab', shift: true },
    ]);
  });

  it('applies xterm modifier parameters', () => {
    const { decoder, events } = setup();
    decoder.feed('\x1b[1;5C\x1b[3;2~');

    expect(keys(events)).toEqual([
      { key: 'right', ctrl: true },
      { key: 'delete', shift: true },
    ]);
  });

  it('treats ESC followed by a character as alt', () => {
    const { decoder, events } = setup();
    decoder.feed('\x1bx');

    expect(keys(events)).toEqual([{ key: 'x', sequence: 'x', alt: true }]);
  });

  it('holds a sequence split across reads', () => {
    const { decoder, events } = setup();
    decoder.feed('\x1b[');

    expect(events).toEqual([]);
    expect(decoder.pending).toBe(true);

    decoder.feed('B');

    expect(keys(events)).toEqual([{ key: 'down' }]);
    expect(decoder.pending).toBe(false);
  });

  it('flushes a lone ESC as the Escape key after the timeout', () => {
    const { decoder, events, clock } = setup();
    decoder.feed('\x1b');

    clock.advance(24);
    expect(events).toEqual([]);

    clock.advance(1);
    expect(keys(events)).toEqual([{ key: 'escape' }]);
  });

  it('splits a double ESC into two Escape keys', () => {
    const { decoder, events, clock } = setup();
    decoder.feed('\x1b\x1b');
    expect(keys(events)).toEqual([{ key: 'escape' }]);

    clock.advance(25);
    expect(keys(events)).toEqual([{ key: 'escape' }, { key: 'escape' }]);
  });

  it('decodes SGR mouse reports', () => {
    const { decoder, events } = setup();
    decoder.feed('\x1b[<0;10;5M\x1b[<32;11;5M\x1b[<0;11;5m');

    expect(events).toEqual([
      { kind: 'mouse', event: { type: 'down', button: 0, x: 9, y: 4, shift: false, alt: false, ctrl: false } },
      { kind: 'mouse', event: { type: 'drag', button: 0, x: 10, y: 4, shift: false, alt: false, ctrl: false } },
      { kind: 'mouse', event: { type: 'up', button: 0, x: 10, y: 4, shift: false, alt: false, ctrl: false } },
    ]);
  });

  it('decodes a paste in one read', () => {
    const { decoder, events } = setup();
    decoder.feed('\x1b[200~echo \x1b[31m hi\x1b[201~');

    expect(events).toEqual([{ kind: 'paste', event: { text: 'echo \x1b[31m hi' } }]);
  });

  it('decodes a paste whose end marker is split across reads', () => {
    const { decoder, events } = setup();
    decoder.feed('\x1b[200~hel');
    decoder.feed('lo\x1b[2');
    expect(events).toEqual([]);

    decoder.feed('01~x');

    expect(events).toEqual([
      { kind: 'paste', event: { text: 'hello' } },
      { kind: 'key', event: { key: 'x', sequence: 'x' } },
    ]);
  });

  it('cancels the escape timer on dispose', () => {
    const { decoder, clock, events } = setup();
    decoder.feed('\x1b');
    decoder.dispose();

    expect(clock.pending).toBe(0);
    clock.advance(100);
    expect(events).toEqual([]);
  });
});

describe('decodeSgrMouse', () => {
  it('maps wheel buttons', () => {
    expect(decodeSgrMouse('<64;3;3', 'M')).toMatchObject({ type: 'scroll', button: 4, x: 2, y: 2 });
    expect(decodeSgrMouse('<65;3;3', 'M')).toMatchObject({ type: 'scroll', button: 5 });
  });

  it('reports motion without a button as move', () => {
    expect(decodeSgrMouse('<35;1;1', 'M')).toMatchObject({ type: 'move', button: 3, x: 0, y: 0 });
  });

  it('reads modifier bits', () => {
    expect(decodeSgrMouse('<20;1;1', 'M')).toMatchObject({ type: 'down', shift: true, ctrl: true, alt: false });
  });

  it('rejects malformed reports', () => {
    expect(decodeSgrMouse('<1;2', 'M')).toBeNull();
    expect(decodeSgrMouse('<a;1;1', 'M')).toBeNull();
  });
});

describe('keyForChar', () => {
  it('maps NUL to ctrl+space', () => {
    expect(keyForChar('\x00')).toEqual({ key: 'space', ctrl: true });
  });
});
