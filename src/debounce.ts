/**
 * Trailing debounce.
 *
 * - Each call restarts the window
 * - `fn` runs once, after the window elapses with no further calls
 *
 * Result: N rapid calls within a window → exactly 1 execution.
 */
export class TrailingDebounce {
  private timeout: NodeJS.Timeout | undefined;

  constructor(
    private readonly fn: () => void,
    private readonly delayMs: number,
  ) {}

  get pending(): boolean {
    return this.timeout !== undefined;
  }

  trigger(): void {
    if (this.timeout) clearTimeout(this.timeout);
    this.timeout = setTimeout((): void => {
      this.timeout = undefined;
      this.fn();
    }, this.delayMs);
  }

  dispose(): void {
    if (this.timeout) {
      clearTimeout(this.timeout);
      this.timeout = undefined;
    }
  }
}
