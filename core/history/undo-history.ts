/**
 * Linear undo history: one flat log, one index and one flag.
 *
 * Record behavior:
 * 1. A command announces itself with beginCommand(); when it starts a new
 *    group, a Boundary is written lazily before its first entry.
 * 2. A fresh edit while position < entries.length first discards the
 *    entries past position.
 * 3. When the log grows past its limit, the oldest whole groups are dropped.
 *
 * Undo behavior:
 * Undo collects the group ending at the walk start (entries.length, or
 * position while an undo sequence is running), and the caller applies its
 * inverses. Those inverses are recorded at the end of the log after their
 * own Boundary, so a later undo started outside the sequence undoes the undo.
 */

import { BOUNDARY } from './undo-entry';
import type { CursorMoveEntry, TextEntry, UndoEntry } from './undo-entry';

export interface UndoGroup {
  /** Entries of the group, newest first. */
  readonly entries: readonly UndoEntry[];
  /** Index of the group's first entry. */
  readonly start: number;
}

export class UndoHistory {
  private _entries: UndoEntry[] = [];
  private _position = 0;
  private _inUndoSequence = false;
  private undoing = false;
  private pendingBoundary = false;
  private readonly limit: number;

  constructor(limit: number = 10000) {
    this.limit = limit;
  }

  get entries(): readonly UndoEntry[] {
    return this._entries;
  }

  get position(): number {
    return this._position;
  }

  get inUndoSequence(): boolean {
    return this._inUndoSequence;
  }

  /** Whether inverse edits of an undo are being recorded right now. */
  get isUndoing(): boolean {
    return this.undoing;
  }

  /**
   * Announce the next command. When `startsGroup` is set, its first
   * recorded entry is preceded by a Boundary.
   */
  beginCommand(startsGroup: boolean): void {
    this.pendingBoundary = startsGroup;
  }

  record(entry: TextEntry | CursorMoveEntry): void {
    if (this.undoing) {
      this._entries.push(entry);
      return;
    }
    if (this._position < this._entries.length) {
      this._entries.length = this._position;
    }
    if (this.pendingBoundary) {
      this._entries.push(BOUNDARY);
      this.pendingBoundary = false;
    }
    this._entries.push(entry);
    this._position = this._entries.length;
    this.enforceLimit();
  }

  /**
   * Start undoing the next group. Returns null when nothing is left to undo.
   * Entries recorded until endUndo() are the applied inverses.
   */
  beginUndo(): UndoGroup | null {
    let end = this._inUndoSequence ? this._position : this._entries.length;
    while (end > 0 && this._entries[end - 1].kind === 'boundary') end--;
    if (end === 0) return null;

    let start = end;
    while (start > 0 && this._entries[start - 1].kind !== 'boundary') start--;

    const group = this._entries.slice(start, end).reverse();
    this.pendingBoundary = false;
    this._entries.push(BOUNDARY);
    this.undoing = true;
    return { entries: group, start };
  }

  /** Finish an undo begun with beginUndo(). */
  endUndo(group: UndoGroup): void {
    this.undoing = false;
    this._position = group.start > 0 ? group.start - 1 : 0;
    this._inUndoSequence = true;
  }

  /** End the current undo sequence; the next undo starts from the end of the log. */
  breakSequence(): void {
    this._inUndoSequence = false;
  }

  get canUndo(): boolean {
    const end = this._inUndoSequence ? this._position : this._entries.length;
    for (let i = end - 1; i >= 0; i--) {
      if (this._entries[i].kind !== 'boundary') return true;
    }
    return false;
  }

  /** Clear all history. */
  clear(): void {
    this._entries = [];
    this._position = 0;
    this._inUndoSequence = false;
    this.pendingBoundary = false;
  }

  private enforceLimit(): void {
    if (this._entries.length <= this.limit) return;
    let cut = 0;
    for (let i = 1; i < this._entries.length; i++) {
      if (this._entries[i].kind !== 'boundary') continue;
      cut = i;
      if (this._entries.length - i <= this.limit) break;
    }
    if (cut === 0) return;
    this._entries.splice(0, cut);
    this._position = Math.max(0, this._position - cut);
  }
}
