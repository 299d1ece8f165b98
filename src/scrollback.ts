import { SCROLLBACK_CAPACITY } from "./guardrails";
import type { ConsoleLine } from "./types";

/**
 * Bounded console history. Backed by a ring buffer that overwrites the oldest
 * entry once full; `total` counts every line ever appended so pollers can
 * resume from a sequence number after the buffer has wrapped.
 */
export class ScrollbackBuffer {
  private entries: ConsoleLine[] = [];
  private appended = 0;

  constructor(readonly capacity = SCROLLBACK_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Scrollback capacity must be a positive integer, got ${capacity}`);
    }
  }

  get length(): number {
    return this.entries.length;
  }

  /** Number of lines appended over the buffer's lifetime, including evicted ones. */
  get total(): number {
    return this.appended;
  }

  append(line: ConsoleLine): void {
    if (this.entries.length < this.capacity) {
      this.entries.push(line);
    } else {
      this.entries[this.appended % this.capacity] = line;
    }
    this.appended++;
  }

  /** All retained lines, oldest first. */
  toArray(): ConsoleLine[] {
    const len = this.entries.length;
    if (len === 0) return [];
    // Not wrapped yet - insertion order is storage order
    if (this.appended <= this.capacity) return this.entries.slice();
    const start = this.appended % len;
    return [...this.entries.slice(start), ...this.entries.slice(0, start)];
  }

  /** The most recent `count` lines, oldest first. */
  tail(count: number): ConsoleLine[] {
    if (count <= 0) return [];
    const all = this.toArray();
    return count >= all.length ? all : all.slice(all.length - count);
  }

  /**
   * Lines whose sequence number is >= `sequence` (the value of `total` a caller
   * saw earlier). Lines already evicted are skipped.
   */
  since(sequence: number): ConsoleLine[] {
    const missing = this.appended - Math.max(0, sequence);
    return missing > 0 ? this.tail(missing) : [];
  }
}
