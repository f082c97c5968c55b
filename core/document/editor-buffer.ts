/**
 * EditorBuffer: name, text storage, cursor set, mark ring, undo history and
 * the modified and read-only flags.
 *
 * Every text change goes through insertText, deleteRange or replaceRange,
 * which record the undo entry and carry every cursor, mark and saved mark
 * across the edit.
 */

import { TextStorage, normalizeLineEndings } from '../buffer/text-storage';
import type { Position } from '../buffer/position';
import { regionOf } from '../cursor/cursor';
import type { CursorSnapshot } from '../cursor/cursor';
import { CursorSet } from '../cursor/cursor-set';
import { MarkRing } from '../cursor/mark-ring';
import { UndoHistory } from '../history/undo-history';
import type { TextEntry } from '../history/undo-entry';

export interface EditorBufferOptions {
  name: string;
  text?: string;
  readOnly?: boolean;
  markRingCapacity?: number;
  undoLimit?: number;
}

export interface CursorView {
  readonly line: number;
  readonly column: number;
  readonly primary: boolean;
}

export interface RegionView {
  readonly start: Position;
  readonly end: Position;
}

/** Read-only view handed to renderers. */
export interface BufferSnapshot {
  readonly name: string;
  readonly version: number;
  readonly lineCount: number;
  /** First line included in `lines`. */
  readonly firstLine: number;
  readonly lines: readonly string[];
  readonly cursors: readonly CursorView[];
  readonly regions: readonly RegionView[];
  readonly modified: boolean;
  readonly readOnly: boolean;
}

export class EditorBuffer {
  readonly name: string;
  readonly storage: TextStorage;
  readonly cursors: CursorSet;
  readonly markRing: MarkRing;
  readonly history: UndoHistory;
  readOnly: boolean;

  private _modified = false;
  private _version = 0;

  constructor(options: EditorBufferOptions) {
    this.name = options.name;
    this.storage = new TextStorage(options.text ?? '');
    this.cursors = new CursorSet(0);
    this.markRing = new MarkRing(options.markRingCapacity ?? 16);
    this.history = new UndoHistory(options.undoLimit ?? 10000);
    this.readOnly = options.readOnly ?? false;
  }

  get version(): number {
    return this._version;
  }

  get modified(): boolean {
    return this._modified;
  }

  get length(): number {
    return this.storage.getLength();
  }

  getText(): string {
    return this.storage.getText();
  }

  /** Mark the current state as saved. */
  markSaved(): void {
    this._modified = false;
  }

  /**
   * Insert text at an offset. Cursors, marks and saved marks beyond the
   * offset move right; those at the offset stay.
   * @returns The inserted length after line-ending normalization.
   */
  insertText(offset: number, text: string): number {
    const normalized = normalizeLineEndings(text);
    if (normalized.length === 0) return 0;
    this.storage.insert(offset, normalized);
    const delta = normalized.length;
    this.mapOffsets(p => (p > offset ? p + delta : p));
    this.recordChange({ kind: 'insert', position: offset, text: normalized });
    return delta;
  }

  /**
   * Delete [start, end). Offsets inside the span collapse to start; those
   * past it move left.
   * @returns The removed text.
   */
  deleteRange(start: number, end: number): string {
    const removed = this.storage.delete(start, end);
    if (removed.length === 0) return removed;
    const delta = end - start;
    this.mapOffsets(p => (p >= end ? p - delta : p > start ? start : p));
    this.recordChange({ kind: 'delete', position: start, text: removed });
    return removed;
  }

  /**
   * Replace [start, end) with text. Offsets inside the span keep their
   * distance from start, clamped to the new span.
   * @returns The removed text.
   */
  replaceRange(start: number, end: number, text: string): string {
    const normalized = normalizeLineEndings(text);
    const removed = this.storage.delete(start, end);
    if (normalized.length > 0) this.storage.insert(start, normalized);
    const newEnd = start + normalized.length;
    const delta = normalized.length - (end - start);
    this.mapOffsets(p => (p >= end ? p + delta : p > start ? Math.min(p, newEnd) : p));
    if (removed.length > 0) this.recordChange({ kind: 'delete', position: start, text: removed });
    if (normalized.length > 0) this.recordChange({ kind: 'insert', position: start, text: normalized });
    return removed;
  }

  /**
   * Undo the next group. Returns false when there is nothing to undo.
   * Cursors return to where they stood before the group's first command.
   */
  undo(): boolean {
    const group = this.history.beginUndo();
    if (group === null) return false;

    const before = this.cursors.snapshot();
    let restore: CursorSnapshot | null = null;
    for (const entry of group.entries) {
      switch (entry.kind) {
        case 'insert':
          this.deleteRange(entry.position, entry.position + entry.text.length);
          break;
        case 'delete':
          this.insertText(entry.position, entry.text);
          break;
        case 'cursor-move':
          restore = entry.before;
          break;
        case 'boundary':
          break;
      }
    }
    if (restore !== null) {
      this.cursors.restore(restore);
      this.cursors.clamp(this.length);
    }
    this.history.record({ kind: 'cursor-move', before, after: this.cursors.snapshot() });
    this.history.endUndo(group);
    return true;
  }

  /**
   * Snapshot for rendering. Without arguments every line is included.
   */
  snapshot(firstLine: number = 0, maxLines: number = Number.POSITIVE_INFINITY): BufferSnapshot {
    const lineCount = this.storage.lineCount();
    const first = Math.max(0, Math.min(firstLine, lineCount - 1));
    const last = Math.min(lineCount, first + maxLines);
    const lines: string[] = [];
    for (let line = first; line < last; line++) {
      lines.push(this.storage.getLine(line));
    }

    const cursors: CursorView[] = this.cursors.cursors.map(c => ({
      ...this.storage.offsetToLineCol(c.position),
      primary: this.cursors.isPrimary(c),
    }));
    const regions: RegionView[] = [];
    for (const cursor of this.cursors.cursors) {
      const region = regionOf(cursor);
      if (region === null) continue;
      regions.push({
        start: this.storage.offsetToLineCol(region[0]),
        end: this.storage.offsetToLineCol(region[1]),
      });
    }

    return Object.freeze({
      name: this.name,
      version: this._version,
      lineCount,
      firstLine: first,
      lines,
      cursors,
      regions,
      modified: this._modified,
      readOnly: this.readOnly,
    });
  }

  private mapOffsets(transform: (offset: number) => number): void {
    this.cursors.mapOffsets(transform);
    this.markRing.map(transform);
  }

  private recordChange(entry: TextEntry): void {
    this._modified = true;
    this._version++;
    this.history.record(entry);
  }
}
