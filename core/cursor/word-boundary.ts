/**
 * Word boundary detection over the whole buffer.
 *
 * A word is a maximal run of word constituents: letters, digits and the
 * configured extra characters. Forward motion skips non-word characters and
 * then a word; backward motion does the same in reverse. Line breaks are
 * ordinary non-word characters, so motion crosses lines.
 */

import type { TextStorage } from '../buffer/text-storage';

const LETTER_OR_DIGIT = /[\p{L}\p{N}]/u;

export class WordSyntax {
  private readonly extra: ReadonlySet<number>;

  constructor(wordChars: string) {
    const codes = new Set<number>();
    for (let i = 0; i < wordChars.length; i++) codes.add(wordChars.charCodeAt(i));
    this.extra = codes;
  }

  isWordChar(code: number): boolean {
    if (code < 0) return false;
    // ASCII fast path
    if (code >= 97 && code <= 122) return true;
    if (code >= 65 && code <= 90) return true;
    if (code >= 48 && code <= 57) return true;
    if (this.extra.has(code)) return true;
    if (code < 0x80) return false;
    return LETTER_OR_DIGIT.test(String.fromCharCode(code));
  }
}

/** End of the next word at or after `offset`. */
export function forwardWord(storage: TextStorage, offset: number, syntax: WordSyntax): number {
  const length = storage.getLength();
  let pos = offset;
  while (pos < length && !syntax.isWordChar(storage.charCodeAt(pos))) pos++;
  while (pos < length && syntax.isWordChar(storage.charCodeAt(pos))) pos++;
  return pos;
}

/** Start of the previous word at or before `offset`. */
export function backwardWord(storage: TextStorage, offset: number, syntax: WordSyntax): number {
  let pos = offset;
  while (pos > 0 && !syntax.isWordChar(storage.charCodeAt(pos - 1))) pos--;
  while (pos > 0 && syntax.isWordChar(storage.charCodeAt(pos - 1))) pos--;
  return pos;
}

/**
 * The word touching `offset` as [start, end): the word containing it, or
 * the one ending right before it. Null when no word touches the offset.
 */
export function wordAt(storage: TextStorage, offset: number, syntax: WordSyntax): [number, number] | null {
  const length = storage.getLength();
  let start = offset;
  let end = offset;
  while (start > 0 && syntax.isWordChar(storage.charCodeAt(start - 1))) start--;
  while (end < length && syntax.isWordChar(storage.charCodeAt(end))) end++;
  return start === end ? null : [start, end];
}
