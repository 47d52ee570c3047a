/**
 * Host stdin decoder.
 *
 * Turns raw terminal input into key, mouse (SGR 1006) and bracketed paste
 * events. Escape sequences can be split across reads: an incomplete tail is
 * held until the next chunk, and a lone ESC is flushed as the Escape key once
 * nothing has followed it for `escapeTimeoutMs`.
 */

import type { InputEvent, KeyboardEvent, PaneMouseEvent } from '../core/keyboard-event';
import { MOUSE_WHEEL_DOWN, MOUSE_WHEEL_UP } from '../core/keyboard-event';
import { systemClock, type CancelTimer, type SchedulerClock } from './render-scheduler';

const ESC = '\x1b';
const PASTE_START = '\x1b[200~';
const PASTE_END = '\x1b[201~';

/** Longest CSI body accepted before the sequence is treated as garbage */
const MAX_CSI_LENGTH = 32;

const CSI_FINAL_KEYS: Record<string, string> = {
  A: 'up',
  B: 'down',
  C: 'right',
  D: 'left',
  H: 'home',
  F: 'end',
  P: 'f1',
  Q: 'f2',
  R: 'f3',
  S: 'f4',
};

const CSI_TILDE_KEYS: Record<string, string> = {
  '1': 'home',
  '2': 'insert',
  '3': 'delete',
  '4': 'end',
  '5': 'pageup',
  '6': 'pagedown',
  '7': 'home',
  '8': 'end',
  '11': 'f1',
  '12': 'f2',
  '13': 'f3',
  '14': 'f4',
  '15': 'f5',
  '17': 'f6',
  '18': 'f7',
  '19': 'f8',
  '20': 'f9',
  '21': 'f10',
  '23': 'f11',
  '24': 'f12',
};

export interface InputDecoderOptions {
  onEvent: (event: InputEvent) => void;
  escapeTimeoutMs?: number;
  clock?: SchedulerClock;
}

type EscapeResult = { length: number; events: InputEvent[]; pasteStart?: boolean } | 'incomplete';

function key(event: KeyboardEvent): InputEvent {
  return { kind: 'key', event };
}

/** Key event for a single character outside an escape sequence */
export function keyForChar(ch: string): KeyboardEvent {
  const code = ch.codePointAt(0) ?? 0;
  if (ch === '\r') return { key: 'enter' };
  if (ch === '\t') return { key: 'tab' };
  if (ch === '\x7f' || ch === '\b') return { key: 'backspace' };
  if (code === 0) return { key: 'space', ctrl: true };
  // \n arrives as Ctrl+J
  if (code >= 0x01 && code <= 0x1a) {
    return { key: String.fromCharCode(code + 96), ctrl: true };
  }
  return { key: ch, sequence: ch };
}

/** xterm modifier parameter (1 + bitmask) onto a key event */
function applyModifier(event: KeyboardEvent, param: string | undefined): KeyboardEvent {
  const value = Number(param);
  if (!param || !Number.isInteger(value) || value < 2) return event;
  const bits = value - 1;
  return {
    ...event,
    shift: (bits & 1) !== 0 || undefined,
    alt: (bits & 2) !== 0 || undefined,
    ctrl: (bits & 4) !== 0 || undefined,
    meta: (bits & 8) !== 0 || undefined,
  };
}

/**
 * SGR mouse report body ("<b;x;y") with its final byte.
 * Coordinates come 1-based and are returned 0-based.
 */
export function decodeSgrMouse(body: string, final: 'M' | 'm'): PaneMouseEvent | null {
  const parts = body.slice(1).split(';').map((part) => Number(part));
  if (parts.length !== 3 || parts.some((part) => !Number.isInteger(part))) return null;
  const [code, x, y] = parts;

  const modifiers = {
    shift: (code & 4) !== 0,
    alt: (code & 8) !== 0,
    ctrl: (code & 16) !== 0,
  };
  const position = { x: Math.max(0, x - 1), y: Math.max(0, y - 1) };

  if ((code & 64) !== 0) {
    if (final === 'm') return null;
    const button = (code & 1) === 0 ? MOUSE_WHEEL_UP : MOUSE_WHEEL_DOWN;
    return { type: 'scroll', button, ...position, ...modifiers };
  }

  const button = code & 3;
  if ((code & 32) !== 0) {
    return { type: button === 3 ? 'move' : 'drag', button, ...position, ...modifiers };
  }
  return { type: final === 'M' ? 'down' : 'up', button, ...position, ...modifiers };
}

function decodeCsiKey(body: string, final: string): KeyboardEvent | null {
  const params = body.split(';');

  if (final === '~') {
    const name = CSI_TILDE_KEYS[params[0]];
    return name ? applyModifier({ key: name }, params[1]) : null;
  }
  if (final === 'Z') {
    return { key: 'tab', shift: true };
  }
  const name = CSI_FINAL_KEYS[final];
  return name ? applyModifier({ key: name }, params[1]) : null;
}

function isCsiFinal(ch: string): boolean {
  return ch >= '@' && ch <= '~';
}

/** Length of the longest suffix of `text` that starts `marker` */
function partialSuffix(text: string, marker: string): number {
  for (let len = Math.min(text.length, marker.length - 1); len > 0; len--) {
    if (marker.startsWith(text.slice(text.length - len))) return len;
  }
  return 0;
}

export class InputDecoder {
  private buffer = '';
  private pasting = false;
  private pasteText = '';
  private cancelFlush: CancelTimer | null = null;

  private readonly onEvent: (event: InputEvent) => void;
  private readonly escapeTimeoutMs: number;
  private readonly clock: SchedulerClock;

  constructor(options: InputDecoderOptions) {
    this.onEvent = options.onEvent;
    this.escapeTimeoutMs = options.escapeTimeoutMs ?? 25;
    this.clock = options.clock ?? systemClock;
  }

  /** True while an incomplete escape sequence is held */
  get pending(): boolean {
    return this.buffer.length > 0 && !this.pasting;
  }

  feed(chunk: string): void {
    this.cancelPendingFlush();
    this.buffer += chunk;
    this.drain(false);
  }

  /** Decode whatever is held, treating a leading ESC as the Escape key */
  flush(): void {
    this.cancelPendingFlush();
    if (this.pasting) return;
    this.drain(true);
  }

  dispose(): void {
    this.cancelPendingFlush();
    this.buffer = '';
    this.pasteText = '';
    this.pasting = false;
  }

  private cancelPendingFlush(): void {
    this.cancelFlush?.();
    this.cancelFlush = null;
  }

  private drain(force: boolean): void {
    const buf = this.buffer;
    let i = 0;
    let forceEscape = force;

    while (i < buf.length) {
      if (this.pasting) {
        const end = buf.indexOf(PASTE_END, i);
        if (end === -1) {
          const held = partialSuffix(buf.slice(i), PASTE_END);
          this.pasteText += buf.slice(i, buf.length - held);
          this.buffer = buf.slice(buf.length - held);
          return;
        }
        this.pasteText += buf.slice(i, end);
        this.emit({ kind: 'paste', event: { text: this.pasteText } });
        this.pasteText = '';
        this.pasting = false;
        i = end + PASTE_END.length;
        continue;
      }

      if (buf[i] === ESC) {
        const result = this.readEscape(buf, i);
        if (result === 'incomplete') {
          if (forceEscape) {
            this.emit(key({ key: 'escape' }));
            forceEscape = false;
            i += 1;
            continue;
          }
          this.buffer = buf.slice(i);
          this.cancelFlush = this.clock.setTimeout(() => {
            this.cancelFlush = null;
            this.flush();
          }, this.escapeTimeoutMs);
          return;
        }
        for (const event of result.events) this.emit(event);
        if (result.pasteStart) this.pasting = true;
        i += result.length;
        continue;
      }

      const ch = String.fromCodePoint(buf.codePointAt(i) ?? 0);
      this.emit(key(keyForChar(ch)));
      i += ch.length;
    }

    this.buffer = '';
  }

  private readEscape(buf: string, start: number): EscapeResult {
    const next = buf[start + 1];
    if (next === undefined) return 'incomplete';

    if (next === ESC) {
      return { length: 1, events: [key({ key: 'escape' })] };
    }

    if (next === '[') {
      if (buf.startsWith(PASTE_START, start)) {
        return { length: PASTE_START.length, events: [], pasteStart: true };
      }
      let end = start + 2;
      while (end < buf.length && !isCsiFinal(buf[end])) end++;
      if (end >= buf.length) {
        return end - start > MAX_CSI_LENGTH ? { length: 2, events: [key({ key: '[', alt: true, sequence: '[' })] } : 'incomplete';
      }
      const body = buf.slice(start + 2, end);
      const final = buf[end];
      const length = end - start + 1;

      if (body.startsWith('<') && (final === 'M' || final === 'm')) {
        const mouse = decodeSgrMouse(body, final);
        return { length, events: mouse ? [{ kind: 'mouse', event: mouse }] : [] };
      }
      const csiKey = decodeCsiKey(body, final);
      return { length, events: csiKey ? [key(csiKey)] : [] };
    }

    if (next === 'O') {
      const final = buf[start + 2];
      if (final === undefined) return 'incomplete';
      const name = CSI_FINAL_KEYS[final];
      return { length: 3, events: name ? [key({ key: name })] : [] };
    }

    // ESC + key is Alt+key
    const ch = String.fromCodePoint(buf.codePointAt(start + 1) ?? 0);
    return { length: 1 + ch.length, events: [key({ ...keyForChar(ch), alt: true })] };
  }

  private emit(event: InputEvent): void {
    this.onEvent(event);
  }
}
