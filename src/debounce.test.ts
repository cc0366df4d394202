import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { TrailingDebounce } from "./debounce.js";

/**
 * Trailing debounce: a burst of N calls inside the window runs fn once,
 * after the window closes.
 */
describe("TrailingDebounce", () => {
  let callCount: number;
  let debounce: TrailingDebounce;

  beforeEach(() => {
    vi.useFakeTimers();
    callCount = 0;
    debounce = new TrailingDebounce(() => {
      callCount++;
    }, 100);
  });

  afterEach(() => {
    debounce.dispose();
    vi.useRealTimers();
  });

  it("does not fire synchronously", () => {
    debounce.trigger();
    expect(callCount).toBe(0);
    expect(debounce.pending).toBe(true);
  });

  it("collapses a burst into one execution", () => {
    for (let i = 0; i < 7; i++) {
      debounce.trigger();
      vi.advanceTimersByTime(50);
    }
    expect(callCount).toBe(0);

    vi.advanceTimersByTime(100);
    expect(callCount).toBe(1);
    expect(debounce.pending).toBe(false);
  });

  it("fires again for a call after the window", () => {
    debounce.trigger();
    vi.advanceTimersByTime(100);
    debounce.trigger();
    vi.advanceTimersByTime(100);
    expect(callCount).toBe(2);
  });

  it("cancels the pending call on dispose", () => {
    debounce.trigger();
    debounce.dispose();
    vi.advanceTimersByTime(500);
    expect(callCount).toBe(0);
    expect(debounce.pending).toBe(false);
  });
});
