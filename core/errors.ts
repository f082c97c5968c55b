/**
 * Error kinds surfaced by the editing core.
 *
 * User-facing outcomes travel as values inside a CommandResult. The classes
 * below are thrown only at the storage boundary (OutOfRangeError) or when an
 * internal invariant breaks (InvariantError).
 */

export type EditorErrorKind =
  | 'OutOfRange'
  | 'ReadOnlyViolation'
  | 'UndoEmpty'
  | 'KillRingEmpty'
  | 'CommandNotFound'
  | 'NoMark'
  | 'NotAfterYank';

export class OutOfRangeError extends Error {
  readonly kind = 'OutOfRange' as const;
  readonly start: number;
  readonly end: number;
  readonly length: number;

  constructor(start: number, end: number, length: number) {
    super(
      start === end
        ? `Offset ${start} is outside the buffer (length ${length})`
        : `Range [${start}, ${end}) is outside the buffer (length ${length})`,
    );
    this.name = 'OutOfRangeError';
    this.start = start;
    this.end = end;
    this.length = length;
  }
}

export class InvariantError extends Error {
  constructor(message: string) {
    super(`Invariant violated: ${message}`);
    this.name = 'InvariantError';
  }
}

export function invariant(condition: boolean, message: string): asserts condition {
  if (!condition) throw new InvariantError(message);
}
