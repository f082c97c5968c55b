/**
 * High-level TextStorage API wrapping rope internals.
 *
 * This is the public interface for all text operations. It validates ranges,
 * normalizes line endings and converts between the three coordinate systems
 * of a buffer location. The rope underneath trusts its inputs.
 */

import { OutOfRangeError } from '../errors';
import { PieceTable } from './piece-table';
import { Rope } from './rope';
import type { Position, ResolvedPosition } from './position';

/** Convert CRLF and lone CR line endings to LF. */
export function normalizeLineEndings(text: string): string {
  return text.indexOf('\r') === -1 ? text : text.replace(/\r\n?/g, '\n');
}

export class TextStorage {
  private rope: Rope;

  constructor(initialContent: string = '') {
    this.rope = new Rope(new PieceTable(normalizeLineEndings(initialContent)));
  }

  /**
   * Insert text at the given character offset.
   * @returns The buffer length after the insert.
   */
  insert(offset: number, text: string): number {
    this.checkOffset(offset);
    this.rope.insert(offset, normalizeLineEndings(text));
    return this.rope.totalChars;
  }

  /**
   * Delete the character range [start, end).
   * @returns The removed text.
   */
  delete(start: number, end: number): string {
    this.checkRange(start, end);
    if (start === end) return '';
    const removed = this.rope.getText(start, end);
    this.rope.delete(start, end);
    return removed;
  }

  /** Text within the character range [start, end). */
  slice(start: number, end: number): string {
    this.checkRange(start, end);
    return this.rope.getText(start, end);
  }

  /** Get the full text content of the buffer. */
  getText(): string {
    return this.rope.getFullText();
  }

  /** Total number of characters in the buffer. */
  getLength(): number {
    return this.rope.totalChars;
  }

  /** Total UTF-8 length of the buffer. */
  getByteLength(): number {
    return this.rope.totalBytes;
  }

  /** Number of lines; an empty buffer has one. */
  lineCount(): number {
    return this.rope.totalLineBreaks + 1;
  }

  /** Character offset of the first character of a line. */
  lineStart(line: number): number {
    this.checkLine(line);
    return this.rope.findLineStart(line);
  }

  /** Character offset just before the line's terminating newline. */
  lineEnd(line: number): number {
    this.checkLine(line);
    if (line === this.lineCount() - 1) return this.rope.totalChars;
    return this.rope.findLineStart(line + 1) - 1;
  }

  /** Length of a line in characters, excluding the newline. */
  lineLength(line: number): number {
    return this.lineEnd(line) - this.lineStart(line);
  }

  /** Content of a single line, without its line ending. */
  getLine(line: number): string {
    return this.rope.getText(this.lineStart(line), this.lineEnd(line));
  }

  /** Line containing a character offset. */
  lineAt(offset: number): number {
    this.checkOffset(offset);
    return this.rope.findOffsetLine(offset);
  }

  offsetToLineCol(offset: number): Position {
    const line = this.lineAt(offset);
    return { line, column: offset - this.rope.findLineStart(line) };
  }

  lineColToOffset(line: number, column: number): number {
    const start = this.lineStart(line);
    const end = this.lineEnd(line);
    if (column < 0 || start + column > end) {
      throw new OutOfRangeError(start + column, start + column, this.rope.totalChars);
    }
    return start + column;
  }

  charOffsetToByte(offset: number): number {
    this.checkOffset(offset);
    return this.rope.charToByte(offset);
  }

  byteOffsetToChar(byteOffset: number): number {
    if (!Number.isInteger(byteOffset) || byteOffset < 0 || byteOffset > this.rope.totalBytes) {
      throw new OutOfRangeError(byteOffset, byteOffset, this.rope.totalBytes);
    }
    return this.rope.byteToChar(byteOffset);
  }

  /** A location in every coordinate system. */
  resolve(offset: number): ResolvedPosition {
    const { line, column } = this.offsetToLineCol(offset);
    return { offset, byte: this.rope.charToByte(offset), line, column };
  }

  /** Character code at an offset, or -1 outside the buffer. */
  charCodeAt(offset: number): number {
    return this.rope.charCodeAt(offset);
  }

  /** Character at an offset, or the empty string outside the buffer. */
  charAt(offset: number): string {
    const code = this.rope.charCodeAt(offset);
    return code === -1 ? '' : String.fromCharCode(code);
  }

  private checkOffset(offset: number): void {
    if (!Number.isInteger(offset) || offset < 0 || offset > this.rope.totalChars) {
      throw new OutOfRangeError(offset, offset, this.rope.totalChars);
    }
  }

  private checkRange(start: number, end: number): void {
    if (
      !Number.isInteger(start) ||
      !Number.isInteger(end) ||
      start < 0 ||
      start > end ||
      end > this.rope.totalChars
    ) {
      throw new OutOfRangeError(start, end, this.rope.totalChars);
    }
  }

  private checkLine(line: number): void {
    if (!Number.isInteger(line) || line < 0 || line >= this.lineCount()) {
      throw new OutOfRangeError(line, line, this.lineCount());
    }
  }
}
