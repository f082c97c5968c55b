/**
 * Coordinate systems for a buffer location.
 *
 * The core addresses text by character offset (one UTF-16 code unit per
 * character). Line/column pairs are derived from it for rendering, and byte
 * offsets (UTF-8) exist only where text crosses the storage boundary.
 */

export type CharOffset = number;
export type ByteOffset = number;

export interface Position {
  line: number;
  column: number;
}

/** One location expressed in all three coordinate systems. */
export interface ResolvedPosition extends Position {
  offset: CharOffset;
  byte: ByteOffset;
}

/** Order a pair of offsets as [start, end]. */
export function orderedRange(a: CharOffset, b: CharOffset): [CharOffset, CharOffset] {
  return a <= b ? [a, b] : [b, a];
}
