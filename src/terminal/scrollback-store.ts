/**
 * Scrollback capture for the process pane.
 *
 * The emulator keeps no history, so rows that leave the top of the grid
 * are detected by comparing the screen before and after each write.
 */

export interface ScrollbackOptions {
  /** Maximum number of stored lines */
  capacity: number;
  /** How many of the newest entries an incoming line is compared against */
  dedupWindow: number;
}

export const DEFAULT_SCROLLBACK_OPTIONS: ScrollbackOptions = {
  capacity: 10_000,
  dedupWindow: 20,
};

/**
 * Bounded FIFO of styled lines. A line equal to one of the most recent
 * `dedupWindow` entries is dropped; at capacity the oldest line is evicted.
 */
export class ScrollbackStore {
  private entries: string[] = [];
  readonly capacity: number;
  readonly dedupWindow: number;

  constructor(options: Partial<ScrollbackOptions> = {}) {
    this.capacity = Math.max(1, options.capacity ?? DEFAULT_SCROLLBACK_OPTIONS.capacity);
    this.dedupWindow = Math.max(0, options.dedupWindow ?? DEFAULT_SCROLLBACK_OPTIONS.dedupWindow);
  }

  get length(): number {
    return this.entries.length;
  }

  lines(): ReadonlyArray<string> {
    return this.entries;
  }

  /** Returns true when the line was stored */
  append(line: string): boolean {
    const from = Math.max(0, this.entries.length - this.dedupWindow);
    for (let i = from; i < this.entries.length; i++) {
      if (this.entries[i] === line) return false;
    }
    if (this.entries.length >= this.capacity) this.entries.shift();
    this.entries.push(line);
    return true;
  }

  clear(): void {
    this.entries = [];
  }
}

/** The grid as it looked before a write */
export interface ScreenSnapshot {
  /** Row text, trailing spaces removed */
  plain: ReadonlyArray<string>;
  /** Row text with styling, as it would be stored */
  styled: ReadonlyArray<string>;
}

const isBlank = (line: string) => line.trim().length === 0;

/**
 * How many rows scrolled off: the index of the first non-blank old row
 * (below the top) that now sits at the top. 0 when none matches.
 */
export function detectScrollAmount(before: ReadonlyArray<string>, newTop: string): number {
  if (isBlank(newTop)) return 0;
  for (let i = 1; i < before.length; i++) {
    if (!isBlank(before[i]) && before[i] === newTop) return i;
  }
  return 0;
}

/**
 * Move rows that left the screen into the store. When the scroll amount
 * cannot be detected but the old top row changed, every non-blank old row
 * is captured so no history is lost on large bursts.
 *
 * Returns the number of lines appended, counting ones evicted again
 * before the capture finished.
 */
export function captureScrolledLines(
  store: ScrollbackStore,
  before: ScreenSnapshot,
  newTop: string
): number {
  const rows = before.plain.length;
  if (rows === 0) return 0;

  const scrollAmount = detectScrollAmount(before.plain, newTop);
  let candidates = 0;
  if (scrollAmount > 0) {
    candidates = scrollAmount;
  } else if (before.plain[0] !== newTop && !isBlank(before.plain[0])) {
    candidates = rows;
  }

  let appended = 0;
  for (let i = 0; i < candidates; i++) {
    if (isBlank(before.plain[i])) continue;
    if (store.append(before.styled[i])) appended++;
  }
  return appended;
}
