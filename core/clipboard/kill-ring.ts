/**
 * Ring buffer for kill/yank operations.
 *
 * Index 0 holds the newest entry. Consecutive kills accumulate into that
 * entry. An entry made by several cursors at once keeps one segment per
 * cursor, so a later yank with the same number of cursors hands each
 * cursor its own piece.
 */

export type KillDirection = 'forward' | 'backward';

export interface KillEntry {
  /** Segments joined with newlines. */
  readonly text: string;
  /** One segment per cursor that contributed to the kill. */
  readonly segments: readonly string[];
}

function makeEntry(segments: readonly string[]): KillEntry {
  return Object.freeze({ text: segments.join('\n'), segments: Object.freeze([...segments]) });
}

export class KillRing {
  private ring: KillEntry[] = [];
  private yankIndex = 0;
  private _lastWasKill = false;
  readonly capacity: number;

  constructor(capacity: number = 60) {
    this.capacity = capacity;
  }

  get length(): number {
    return this.ring.length;
  }

  get entries(): readonly KillEntry[] {
    return this.ring;
  }

  /** Whether the previous command killed text. */
  get lastWasKill(): boolean {
    return this._lastWasKill;
  }

  /**
   * Add killed text. Right after another kill the text is appended
   * (forward) or prepended (backward) to the newest entry; otherwise it
   * becomes a new entry and the oldest past capacity is evicted.
   */
  push(text: string | readonly string[], direction: KillDirection): void {
    const segments = typeof text === 'string' ? [text] : [...text];
    if (segments.every(s => s.length === 0)) return;

    const newest = this.ring.length > 0 ? this.ring[0] : undefined;
    if (this._lastWasKill && newest !== undefined) {
      this.ring[0] = mergeEntry(newest, segments, direction);
    } else {
      this.ring.unshift(makeEntry(segments));
      if (this.ring.length > this.capacity) {
        this.ring.length = this.capacity;
      }
    }
    this.yankIndex = 0;
    this._lastWasKill = true;
  }

  /** The newest entry, leaving the ring unchanged. Null when empty. */
  yank(): KillEntry | null {
    this.yankIndex = 0;
    return this.ring.length > 0 ? this.ring[0] : null;
  }

  /** Advance to the next-older entry, wrapping past the oldest. Null when empty. */
  yankPop(): KillEntry | null {
    if (this.ring.length === 0) return null;
    this.yankIndex = (this.yankIndex + 1) % this.ring.length;
    return this.ring[this.yankIndex];
  }

  /** End a run of kills so the next push starts a new entry. */
  endKillSequence(): void {
    this._lastWasKill = false;
  }
}

function mergeEntry(entry: KillEntry, segments: readonly string[], direction: KillDirection): KillEntry {
  if (entry.segments.length === segments.length) {
    return makeEntry(entry.segments.map((existing, i) =>
      direction === 'forward' ? existing + segments[i] : segments[i] + existing,
    ));
  }
  const added = segments.join('\n');
  return makeEntry([direction === 'forward' ? entry.text + added : added + entry.text]);
}
