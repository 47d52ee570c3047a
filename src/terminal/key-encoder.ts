/**
 * Key event to pty byte encoding.
 * Produces the byte sequences a VT-compatible terminal sends for each key.
 */

import type { KeyboardEvent } from "../core/keyboard-event";

const ESC = "\x1b";
const CSI = "\x1b[";
const SS3 = "\x1bO";

const SPECIAL_KEY_MAP: Record<string, string> = {
  enter: "\r",
  return: "\r",
  tab: "\t",
  space: " ",
  escape: ESC,
  esc: ESC,
  up: `${CSI}A`,
  down: `${CSI}B`,
  right: `${CSI}C`,
  left: `${CSI}D`,
  home: `${CSI}H`,
  end: `${CSI}F`,
  pageup: `${CSI}5~`,
  page_up: `${CSI}5~`,
  pagedown: `${CSI}6~`,
  page_down: `${CSI}6~`,
  insert: `${CSI}2~`,
  delete: `${CSI}3~`,
  f1: `${SS3}P`,
  f2: `${SS3}Q`,
  f3: `${SS3}R`,
  f4: `${SS3}S`,
  f5: `${CSI}15~`,
  f6: `${CSI}17~`,
  f7: `${CSI}18~`,
  f8: `${CSI}19~`,
  f9: `${CSI}20~`,
  f10: `${CSI}21~`,
  f11: `${CSI}23~`,
  f12: `${CSI}24~`,
};

const isLetter = (key: string): boolean => key.length === 1 && key >= "a" && key <= "z";

const isDigit = (code: string): boolean => code >= "0" && code <= "9";

/**
 * Bracket or digit runs left behind when the host input layer split an
 * escape sequence ("[", "<", "[<", "[12;3").
 */
export function looksLikeEscapeFragment(text: string): boolean {
  if (text === "[" || text === "<" || text === "[<") return true;
  if (text.length < 2 || text[0] !== "[") return false;
  for (let i = 1; i < text.length; i++) {
    const ch = text[i];
    if (ch !== ";" && ch !== "<" && !isDigit(ch)) return false;
  }
  return true;
}

/**
 * Tail of an SGR mouse report ("65;83;57M", "0;45;12m").
 */
export function looksLikeMouseSequence(text: string): boolean {
  if (text.length < 3) return false;
  const last = text[text.length - 1];
  if (last !== "M" && last !== "m") return false;
  for (let i = 0; i < text.length - 1; i++) {
    const ch = text[i];
    if (ch !== ";" && ch !== "<" && !isDigit(ch)) return false;
  }
  return true;
}

/**
 * Bytes to write to the pty for a key press, or null when the key
 * produces nothing (or is an input fragment that must not be forwarded).
 */
export function encodeKey(event: KeyboardEvent): string | null {
  const key = event.key.length === 1 ? event.key : event.key.toLowerCase();
  const lower = key.toLowerCase();

  // Ctrl+A..Ctrl+Z -> 0x01..0x1a
  if (event.ctrl && isLetter(lower)) {
    return String.fromCharCode(lower.charCodeAt(0) - 96);
  }

  if (event.shift && lower === "tab") {
    return `${CSI}Z`;
  }

  if (event.alt && isLetter(lower)) {
    return `${ESC}${lower}`;
  }

  if (lower === "backspace") {
    return event.alt ? `${ESC}\x7f` : "\x7f";
  }

  const special = key.length > 1 ? SPECIAL_KEY_MAP[lower] : undefined;
  if (special !== undefined) {
    return special;
  }

  const text = event.sequence ?? (key.length === 1 ? key : "");
  if (text.length === 0) return null;
  if (looksLikeMouseSequence(text) || looksLikeEscapeFragment(text)) return null;

  if (event.alt) {
    let out = "";
    for (const ch of text) out += `${ESC}${ch}`;
    return out;
  }
  return text;
}
