/**
 * A single edit point: position, remembered goal column and mark.
 *
 * The region of a cursor is the span between its position and its mark,
 * and exists only while the mark is active.
 */

export interface Cursor {
  position: number;
  /** Column kept across vertical motion; null until the first vertical move. */
  goalColumn: number | null;
  mark: number | null;
  markActive: boolean;
  /** The active mark was set by a shift motion. */
  shiftSelected: boolean;
}

export interface CursorSnapshot {
  readonly cursors: readonly Readonly<Cursor>[];
  readonly primaryIndex: number;
}

export function createCursor(position: number): Cursor {
  return {
    position,
    goalColumn: null,
    mark: null,
    markActive: false,
    shiftSelected: false,
  };
}

export function cloneCursor(cursor: Readonly<Cursor>): Cursor {
  return { ...cursor };
}

/** The cursor's active region as [start, end), or null without an active mark. */
export function regionOf(cursor: Readonly<Cursor>): [number, number] | null {
  if (!cursor.markActive || cursor.mark === null) return null;
  return cursor.mark <= cursor.position
    ? [cursor.mark, cursor.position]
    : [cursor.position, cursor.mark];
}

export function setMark(cursor: Cursor, position: number, active: boolean): void {
  cursor.mark = position;
  cursor.markActive = active;
  cursor.shiftSelected = false;
}

export function deactivateMark(cursor: Cursor): void {
  cursor.markActive = false;
  cursor.shiftSelected = false;
}
