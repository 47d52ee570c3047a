/**
 * Scroll position of the pane relative to the live screen.
 * offset 0 is the live tail; N shows N lines back into scrollback.
 */
export class ScrollState {
  private _offset = 0;
  private _locked = false;

  get offset(): number {
    return this._offset;
  }

  get locked(): boolean {
    return this._locked;
  }

  get isLive(): boolean {
    return this._offset === 0;
  }

  /** Move back into history, clamped to the available lines. Returns true if the offset changed. */
  scrollUp(lines: number, available: number): boolean {
    return this.setOffset(this._offset + lines, available);
  }

  /** Move toward the live tail, never below 0 */
  scrollDown(lines: number, available: number): boolean {
    return this.setOffset(this._offset - lines, available);
  }

  /** Jump to the oldest captured line */
  jumpToOldest(available: number): boolean {
    return this.setOffset(available, available);
  }

  /** Return to the live tail and unlock */
  toLive(): boolean {
    const changed = this._offset !== 0 || this._locked;
    this._offset = 0;
    this._locked = false;
    return changed;
  }

  /** Stop following captured lines without moving the view */
  unlock(): void {
    this._locked = false;
  }

  /**
   * Keep the displayed history still while new lines are captured:
   * the offset grows by exactly the appended count, capped at `available`.
   */
  followCapture(appended: number, available: number): void {
    if (!this._locked || this._offset === 0 || appended <= 0) return;
    this._offset = Math.min(this._offset + appended, available);
  }

  private setOffset(next: number, available: number): boolean {
    const clamped = Math.max(0, Math.min(next, Math.max(0, available)));
    const changed = clamped !== this._offset;
    this._offset = clamped;
    this._locked = clamped > 0;
    return changed;
  }
}
