/**
 * Winnowing selection over a k-gram hash sequence.
 *
 * Every window of `window` consecutive hashes contributes its minimum. On ties
 * the rightmost occurrence wins, and a window whose minimum is the fingerprint
 * already selected for the previous window adds nothing.
 */
import type { Fingerprint } from './types.js';

/**
 * Sliding-window minimum as an explicit monotonic deque.
 * Hashes strictly increase from front to back, so the front is the window
 * minimum; pushing pops every entry with an equal or larger hash, which is
 * what makes the rightmost of equal minima win.
 */
export class WinnowingWindow {
  private readonly entries: Fingerprint[] = [];

  constructor(private readonly size: number) {}

  /**
   * Add the fingerprint at the right edge and drop entries that fell off
   * the left edge. Returns the current window minimum.
   */
  push(fingerprint: Fingerprint): Fingerprint {
    while (this.entries.length > 0 && this.entries[this.entries.length - 1].hash >= fingerprint.hash) {
      this.entries.pop();
    }
    this.entries.push(fingerprint);

    const windowStart = fingerprint.position - this.size + 1;
    while (this.entries[0].position < windowStart) {
      this.entries.shift();
    }
    return this.entries[0];
  }

  get length(): number {
    return this.entries.length;
  }
}

/**
 * Select fingerprints from a hash sequence whose positions are consecutive
 * (k-gram index = token index). Returned in position order; the same hash
 * may appear more than once at different positions.
 *
 * A sequence shorter than one window has no complete window, so every
 * fingerprint is selected.
 */
export function winnow(hashes: readonly Fingerprint[], window: number): Fingerprint[] {
  if (hashes.length < window) {
    return [...hashes];
  }

  const selected: Fingerprint[] = [];
  const deque = new WinnowingWindow(window);
  let lastPosition = -1;

  for (let i = 0; i < hashes.length; i++) {
    const minimum = deque.push(hashes[i]);
    if (i < window - 1) continue;

    if (minimum.position !== lastPosition) {
      selected.push(minimum);
      lastPosition = minimum.position;
    }
  }

  return selected;
}
