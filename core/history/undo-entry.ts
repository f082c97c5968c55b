/**
 * Undo entry types: text edits, cursor snapshots and group boundaries.
 */

import type { CursorSnapshot } from '../cursor/cursor';

export interface InsertEntry {
  readonly kind: 'insert';
  readonly position: number;
  readonly text: string;
}

export interface DeleteEntry {
  readonly kind: 'delete';
  readonly position: number;
  readonly text: string;
}

export interface CursorMoveEntry {
  readonly kind: 'cursor-move';
  readonly before: CursorSnapshot;
  readonly after: CursorSnapshot;
}

export interface BoundaryEntry {
  readonly kind: 'boundary';
}

export type TextEntry = InsertEntry | DeleteEntry;

export type UndoEntry = TextEntry | CursorMoveEntry | BoundaryEntry;

export const BOUNDARY: BoundaryEntry = Object.freeze({ kind: 'boundary' });

/** The edit that reverses a text entry. */
export function invertEntry(entry: TextEntry): TextEntry {
  return entry.kind === 'insert'
    ? { kind: 'delete', position: entry.position, text: entry.text }
    : { kind: 'insert', position: entry.position, text: entry.text };
}

/**
 * Replay text entries over a starting string. Boundaries and cursor
 * snapshots carry no text and are skipped.
 */
export function replayEntries(initial: string, entries: readonly UndoEntry[]): string {
  let text = initial;
  for (const entry of entries) {
    if (entry.kind === 'insert') {
      text = text.slice(0, entry.position) + entry.text + text.slice(entry.position);
    } else if (entry.kind === 'delete') {
      text = text.slice(0, entry.position) + text.slice(entry.position + entry.text.length);
    }
  }
  return text;
}
