export type KeyboardEventType = 'press' | 'repeat' | 'release';

/**
 * Key event as delivered by the host input layer.
 * `key` is a lowercase name ('enter', 'up', 'f5', ...) or the character itself.
 */
export type KeyboardEvent = {
  key: string;
  ctrl?: boolean;
  alt?: boolean;
  shift?: boolean;
  meta?: boolean;
  /** Raw text the key produced, when printable */
  sequence?: string;
  eventType?: KeyboardEventType;
};

export type MouseEventType = 'down' | 'up' | 'move' | 'drag' | 'scroll';

/**
 * Mouse event in host screen coordinates (0-indexed).
 * button: 0=left, 1=middle, 2=right, 4=wheel up, 5=wheel down
 */
export type PaneMouseEvent = {
  type: MouseEventType;
  button: number;
  x: number;
  y: number;
  shift?: boolean;
  alt?: boolean;
  ctrl?: boolean;
};

export const MOUSE_LEFT = 0;
export const MOUSE_WHEEL_UP = 4;
export const MOUSE_WHEEL_DOWN = 5;

export type PasteEvent = {
  text: string;
};

export type InputEvent =
  | { kind: 'key'; event: KeyboardEvent }
  | { kind: 'mouse'; event: PaneMouseEvent }
  | { kind: 'paste'; event: PasteEvent };

/**
 * Canonical "ctrl+alt+shift+key" name used for binding lookups
 */
export function describeKey(event: KeyboardEvent): string {
  const parts: string[] = [];
  if (event.ctrl) parts.push('ctrl');
  if (event.alt) parts.push('alt');
  if (event.shift && event.key.length > 1) parts.push('shift');
  parts.push(event.key.length === 1 ? event.key : event.key.toLowerCase());
  return parts.join('+');
}
