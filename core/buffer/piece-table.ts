/**
 * Piece table primitives: original buffer + add buffer + piece descriptors.
 *
 * The piece table maintains two immutable string buffers:
 * 1. Original buffer: text handed over by the loader. Never modified.
 * 2. Add buffer: append-only buffer for all inserted text.
 *
 * A piece descriptor references a span in one of these buffers. Pieces are
 * capped at MAX_PIECE_LENGTH characters so that scans inside a single piece
 * stay bounded; the rope above them carries all whole-document lookups.
 */

export type BufferType = 'original' | 'add';

export const MAX_PIECE_LENGTH = 1024;

export interface PieceDescriptor {
  /** Which buffer this piece references. */
  readonly bufferType: BufferType;
  /** Start offset within that buffer. */
  readonly start: number;
  /** Length of the piece in characters. */
  readonly length: number;
  /** Number of line breaks (\n) in this piece. */
  readonly lineBreakCount: number;
  /** UTF-8 length of the piece. */
  readonly byteLength: number;
}

/**
 * Count the number of newline characters in a string range.
 */
export function countLineBreaks(text: string, start: number, length: number): number {
  let count = 0;
  const end = start + length;
  for (let i = start; i < end; i++) {
    if (text.charCodeAt(i) === 10) count++;
  }
  return count;
}

/**
 * UTF-8 width of one UTF-16 code unit. Each half of a surrogate pair
 * counts 2 so that a pair sums to 4 even when a piece boundary splits it.
 */
export function utf8Width(code: number): number {
  if (code < 0x80) return 1;
  if (code < 0x800) return 2;
  if (code >= 0xd800 && code <= 0xdfff) return 2;
  return 3;
}

export function countUtf8Bytes(text: string, start: number, length: number): number {
  let bytes = 0;
  const end = start + length;
  for (let i = start; i < end; i++) {
    bytes += utf8Width(text.charCodeAt(i));
  }
  return bytes;
}

export class PieceTable {
  /** The original text. Never modified after construction. */
  readonly originalBuffer: string;
  /** Append-only buffer for all insertions. */
  private _addBuffer: string;

  constructor(originalContent: string) {
    this.originalBuffer = originalContent;
    this._addBuffer = '';
  }

  get addBuffer(): string {
    return this._addBuffer;
  }

  /** Pieces covering the whole original buffer, in order. */
  originalPieces(): PieceDescriptor[] {
    return this.chunk('original', this.originalBuffer, 0, this.originalBuffer.length);
  }

  /** Append text to the add buffer and return the pieces that reference it. */
  append(text: string): PieceDescriptor[] {
    const start = this._addBuffer.length;
    this._addBuffer += text;
    return this.chunk('add', this._addBuffer, start, text.length);
  }

  bufferFor(piece: PieceDescriptor): string {
    return piece.bufferType === 'original' ? this.originalBuffer : this._addBuffer;
  }

  /** Get the text content of a piece. */
  getPieceText(piece: PieceDescriptor): string {
    return this.bufferFor(piece).substring(piece.start, piece.start + piece.length);
  }

  /** Build a descriptor for a sub-span of an existing piece. */
  slicePiece(piece: PieceDescriptor, from: number, to: number): PieceDescriptor {
    const buffer = this.bufferFor(piece);
    const start = piece.start + from;
    const length = to - from;
    return {
      bufferType: piece.bufferType,
      start,
      length,
      lineBreakCount: countLineBreaks(buffer, start, length),
      byteLength: countUtf8Bytes(buffer, start, length),
    };
  }

  private chunk(bufferType: BufferType, buffer: string, start: number, length: number): PieceDescriptor[] {
    const pieces: PieceDescriptor[] = [];
    const end = start + length;
    for (let pos = start; pos < end; pos += MAX_PIECE_LENGTH) {
      const len = Math.min(MAX_PIECE_LENGTH, end - pos);
      pieces.push({
        bufferType,
        start: pos,
        length: len,
        lineBreakCount: countLineBreaks(buffer, pos, len),
        byteLength: countUtf8Bytes(buffer, pos, len),
      });
    }
    return pieces;
  }
}
