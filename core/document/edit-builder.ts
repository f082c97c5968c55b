/**
 * Transaction builder for one multi-cursor edit.
 *
 * Edits are collected in pre-edit coordinates, then applied from the highest
 * offset to the lowest so earlier offsets stay valid. Pure deletions that
 * overlap or touch are merged into one deletion over their union. A
 * replacement or insertion that overlaps an edit already accepted is
 * dropped.
 */

import { orderedRange } from '../buffer/position';
import type { Cursor } from '../cursor/cursor';
import type { EditorBuffer } from './editor-buffer';

/** Where an inserting cursor ends up: after the new text, or before it. */
export type PointPlacement = 'after' | 'before';

interface PendingEdit {
  start: number;
  end: number;
  text: string;
  cursor: Cursor | null;
  place: PointPlacement;
}

export interface CommitResult {
  /** Edits applied, after merging and dropping. */
  applied: number;
  /** Text removed by each applied edit, in ascending offset order. */
  removed: string[];
}

function overlaps(a: PendingEdit, b: PendingEdit): boolean {
  if (a.start === a.end) return b.start < a.start && a.start < b.end;
  if (b.start === b.end) return a.start < b.start && b.start < a.end;
  return a.start < b.end && b.start < a.end;
}

export class EditBuilder {
  private _edits: PendingEdit[] = [];
  private _committed = false;
  private readonly buffer: EditorBuffer;

  constructor(buffer: EditorBuffer) {
    this.buffer = buffer;
  }

  /** Insert text at a cursor and move that cursor relative to it. */
  insert(cursor: Cursor, text: string, place: PointPlacement = 'after'): void {
    this.push({ start: cursor.position, end: cursor.position, text, cursor, place });
  }

  /** Delete text in [start, end). */
  delete(start: number, end: number): void {
    if (start === end) return;
    const [from, to] = orderedRange(start, end);
    this.push({ start: from, end: to, text: '', cursor: null, place: 'after' });
  }

  /** Replace text in [start, end). */
  replace(start: number, end: number, text: string, cursor: Cursor | null = null): void {
    this.push({ start, end, text, cursor, place: 'after' });
  }

  /** Whether this builder has any edits. */
  get hasEdits(): boolean {
    return this._edits.length > 0;
  }

  /** Apply the collected edits. The builder cannot be reused afterwards. */
  commit(): CommitResult {
    this._committed = true;
    const accepted = this.resolve();
    accepted.sort((a, b) => b.start - a.start || b.end - a.end);

    const removed: string[] = [];
    for (const edit of accepted) {
      let text = '';
      let inserted = edit.text.length;
      if (edit.text.length === 0) {
        text = this.buffer.deleteRange(edit.start, edit.end);
      } else if (edit.end > edit.start) {
        text = this.buffer.replaceRange(edit.start, edit.end, edit.text);
      } else {
        inserted = this.buffer.insertText(edit.start, edit.text);
      }
      removed.unshift(text);
      if (edit.cursor !== null) {
        edit.cursor.position = edit.place === 'after' ? edit.start + inserted : edit.start;
      }
    }
    return { applied: accepted.length, removed };
  }

  private push(edit: PendingEdit): void {
    if (this._committed) throw new Error('EditBuilder already committed');
    this._edits.push(edit);
  }

  private resolve(): PendingEdit[] {
    const deletions = this._edits
      .filter(e => e.text.length === 0 && e.end > e.start)
      .sort((a, b) => a.start - b.start);
    const merged: PendingEdit[] = [];
    for (const edit of deletions) {
      const last = merged.length > 0 ? merged[merged.length - 1] : undefined;
      if (last !== undefined && edit.start <= last.end) {
        last.end = Math.max(last.end, edit.end);
      } else {
        merged.push({ ...edit });
      }
    }

    const writes = this._edits
      .map((edit, order) => ({ edit, order }))
      .filter(({ edit }) => edit.text.length > 0)
      .sort((a, b) => a.edit.start - b.edit.start || a.order - b.order);
    const accepted = [...merged];
    for (const { edit } of writes) {
      if (accepted.some(other => overlaps(edit, other))) continue;
      accepted.push(edit);
    }
    return accepted;
  }
}
