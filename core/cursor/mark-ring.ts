/**
 * Bounded ring of previously set marks for one buffer.
 */

export class MarkRing {
  private marks: number[] = [];
  private readonly capacity: number;

  constructor(capacity: number) {
    this.capacity = capacity;
  }

  get size(): number {
    return this.marks.length;
  }

  get entries(): readonly number[] {
    return this.marks;
  }

  /** Save a mark as the newest entry, evicting the oldest past capacity. */
  push(position: number): void {
    this.marks.unshift(position);
    if (this.marks.length > this.capacity) {
      this.marks.length = this.capacity;
    }
  }

  /**
   * Take the newest saved mark and rotate `current` (when given) onto the
   * oldest end of the ring.
   */
  rotate(current: number | null): number | null {
    const next = this.marks.shift();
    if (next === undefined) return null;
    if (current !== null) {
      this.marks.push(current);
      if (this.marks.length > this.capacity) this.marks.shift();
    }
    return next;
  }

  /** Remap every saved mark through an offset transform. */
  map(transform: (offset: number) => number): void {
    for (let i = 0; i < this.marks.length; i++) {
      this.marks[i] = transform(this.marks[i]);
    }
  }

  clear(): void {
    this.marks = [];
  }
}
