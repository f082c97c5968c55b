/**
 * Multi-cursor management: primary cursor, secondary cursors, cursor merging.
 *
 * Cursors are kept sorted by position and pairwise distinct once a command
 * finishes. The primary cursor is tracked by identity so it survives
 * re-sorting; when it merges with another cursor at the same position, the
 * primary wins and keeps its own mark and goal column.
 */

import { invariant } from '../errors';
import { cloneCursor, createCursor } from './cursor';
import type { Cursor, CursorSnapshot } from './cursor';

export class CursorSet {
  private _cursors: Cursor[];
  private _primary: Cursor;

  constructor(position: number = 0) {
    this._primary = createCursor(position);
    this._cursors = [this._primary];
  }

  get primary(): Cursor {
    return this._primary;
  }

  /** All cursors in ascending position order. */
  get cursors(): readonly Cursor[] {
    return this._cursors;
  }

  get size(): number {
    return this._cursors.length;
  }

  get primaryIndex(): number {
    return this._cursors.indexOf(this._primary);
  }

  isPrimary(cursor: Cursor): boolean {
    return cursor === this._primary;
  }

  /** Cursors from the highest position to the lowest. */
  descending(): Cursor[] {
    return [...this._cursors].sort((a, b) => b.position - a.position);
  }

  /**
   * Add a secondary cursor at an offset. Returns null when a cursor already
   * sits there.
   */
  addAt(position: number, goalColumn: number | null = null): Cursor | null {
    if (this._cursors.some(c => c.position === position)) return null;
    const cursor = createCursor(position);
    cursor.goalColumn = goalColumn;
    this._cursors.push(cursor);
    this.normalize();
    return cursor;
  }

  /** Drop every secondary cursor. */
  collapseToPrimary(): void {
    this._cursors = [this._primary];
  }

  /** Replace the whole set with cursors at the given positions; the first becomes primary. */
  resetTo(positions: readonly number[]): void {
    invariant(positions.length > 0, 'a cursor set needs at least one cursor');
    const cursors = positions.map(p => createCursor(p));
    this._primary = cursors[0];
    this._cursors = cursors;
    this.normalize();
  }

  snapshot(): CursorSnapshot {
    return {
      cursors: this._cursors.map(cloneCursor),
      primaryIndex: this.primaryIndex,
    };
  }

  restore(snapshot: CursorSnapshot): void {
    invariant(snapshot.cursors.length > 0, 'cursor snapshot is empty');
    this._cursors = snapshot.cursors.map(cloneCursor);
    this._primary = this._cursors[Math.min(snapshot.primaryIndex, this._cursors.length - 1)];
  }

  /** Remap every position and mark through an offset transform. */
  mapOffsets(transform: (offset: number) => number): void {
    for (const cursor of this._cursors) {
      cursor.position = transform(cursor.position);
      if (cursor.mark !== null) cursor.mark = transform(cursor.mark);
    }
  }

  /** Clamp positions and marks into [0, length]. */
  clamp(length: number): void {
    this.mapOffsets(offset => Math.max(0, Math.min(offset, length)));
  }

  /**
   * Sort by position and merge coincident cursors. Returns the number of
   * cursors removed by merging.
   */
  normalize(): number {
    const sorted = [...this._cursors].sort((a, b) => a.position - b.position);
    const merged: Cursor[] = [];
    for (const cursor of sorted) {
      const last = merged.length > 0 ? merged[merged.length - 1] : undefined;
      if (last !== undefined && last.position === cursor.position) {
        if (cursor === this._primary) merged[merged.length - 1] = cursor;
        continue;
      }
      merged.push(cursor);
    }
    const removed = this._cursors.length - merged.length;
    this._cursors = merged;
    return removed;
  }

  /** Check the sorted, distinct ordering. Throws InvariantError when broken. */
  assertOrdered(length: number): void {
    for (let i = 0; i < this._cursors.length; i++) {
      const p = this._cursors[i].position;
      invariant(p >= 0 && p <= length, `cursor ${i} at ${p} is outside [0, ${length}]`);
      if (i > 0) {
        invariant(this._cursors[i - 1].position < p, `cursors ${i - 1} and ${i} are out of order`);
      }
    }
    invariant(this._cursors.includes(this._primary), 'primary cursor is not in the set');
  }
}
