import { describe, expect, test } from 'vitest';
import { TextStorage } from '../core/buffer/text-storage';
import { PieceTable } from '../core/buffer/piece-table';
import { Rope } from '../core/buffer/rope';
import { OutOfRangeError } from '../core/errors';

function makeRandom(seed: number): (max: number) => number {
  let state = seed >>> 0;
  return (max: number) => {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    return state % max;
  };
}

describe('TextStorage', () => {
  describe('construction', () => {
    test('empty buffer', () => {
      const storage = new TextStorage();
      expect(storage.getText()).toBe('');
      expect(storage.getLength()).toBe(0);
      expect(storage.lineCount()).toBe(1); // always at least 1 line
    });

    test('normalizes \\r\\n and \\r to \\n', () => {
      const storage = new TextStorage('one\r\ntwo\rthree');
      expect(storage.getText()).toBe('one\ntwo\nthree');
      expect(storage.lineCount()).toBe(3);
    });

    test('trailing newline', () => {
      const storage = new TextStorage('hello\n');
      expect(storage.lineCount()).toBe(2);
      expect(storage.getLine(0)).toBe('hello');
      expect(storage.getLine(1)).toBe('');
    });
  });

  describe('insert', () => {
    test('returns the new length', () => {
      const storage = new TextStorage('hello');
      expect(storage.insert(5, ' world')).toBe(11);
      expect(storage.getText()).toBe('hello world');
    });

    test('insert into the middle', () => {
      const storage = new TextStorage('helo');
      storage.insert(3, 'l');
      expect(storage.getText()).toBe('hello');
    });

    test('normalizes inserted line endings', () => {
      const storage = new TextStorage('ab');
      expect(storage.insert(1, '\r\n')).toBe(3);
      expect(storage.getLine(0)).toBe('a');
      expect(storage.getLine(1)).toBe('b');
    });

    test('past the end is out of range', () => {
      const storage = new TextStorage('hello');
      expect(() => storage.insert(6, 'x')).toThrow(OutOfRangeError);
      expect(() => storage.insert(-1, 'x')).toThrow(OutOfRangeError);
      expect(storage.getText()).toBe('hello');
    });
  });

  describe('delete', () => {
    test('returns the removed text', () => {
      const storage = new TextStorage('hello world');
      expect(storage.delete(5, 11)).toBe(' world');
      expect(storage.getText()).toBe('hello');
    });

    test('delete across lines', () => {
      const storage = new TextStorage('ab\ncd\nef');
      expect(storage.delete(1, 7)).toBe('b\ncd\ne');
      expect(storage.getText()).toBe('af');
      expect(storage.lineCount()).toBe(1);
    });

    test('empty range removes nothing', () => {
      const storage = new TextStorage('abc');
      expect(storage.delete(1, 1)).toBe('');
      expect(storage.getText()).toBe('abc');
    });

    test('reversed or overlong ranges are out of range', () => {
      const storage = new TextStorage('abc');
      expect(() => storage.delete(2, 1)).toThrow(OutOfRangeError);
      expect(() => storage.delete(0, 4)).toThrow(OutOfRangeError);
    });
  });

  describe('coordinates', () => {
    test('offset to line and column', () => {
      const storage = new TextStorage('ab\ncd\n');
      expect(storage.offsetToLineCol(0)).toEqual({ line: 0, column: 0 });
      expect(storage.offsetToLineCol(2)).toEqual({ line: 0, column: 2 });
      expect(storage.offsetToLineCol(4)).toEqual({ line: 1, column: 1 });
      expect(storage.offsetToLineCol(6)).toEqual({ line: 2, column: 0 });
    });

    test('line and column to offset', () => {
      const storage = new TextStorage('ab\ncd\n');
      expect(storage.lineColToOffset(1, 2)).toBe(5);
      expect(storage.lineColToOffset(2, 0)).toBe(6);
      expect(() => storage.lineColToOffset(1, 3)).toThrow(OutOfRangeError);
      expect(() => storage.lineColToOffset(3, 0)).toThrow(OutOfRangeError);
    });

    test('line lengths and bounds', () => {
      const storage = new TextStorage('abc\n\nxy');
      expect(storage.lineLength(0)).toBe(3);
      expect(storage.lineLength(1)).toBe(0);
      expect(storage.lineLength(2)).toBe(2);
      expect(storage.lineStart(2)).toBe(5);
      expect(storage.lineEnd(0)).toBe(3);
      expect(storage.lineEnd(2)).toBe(7);
    });

    test('byte offsets count UTF-8 widths', () => {
      // a: 1 byte, é: 2, €: 3, 😀: 4 (two code units), b: 1
      const storage = new TextStorage('aé€😀b');
      expect(storage.getLength()).toBe(6);
      expect(storage.getByteLength()).toBe(11);
      expect(storage.charOffsetToByte(2)).toBe(3);
      expect(storage.charOffsetToByte(3)).toBe(6);
      expect(storage.charOffsetToByte(5)).toBe(10);
      expect(storage.charOffsetToByte(6)).toBe(11);
      expect(storage.byteOffsetToChar(6)).toBe(3);
      expect(storage.byteOffsetToChar(10)).toBe(5);
      // inside the three bytes of €
      expect(storage.byteOffsetToChar(4)).toBe(2);
      expect(() => storage.byteOffsetToChar(12)).toThrow(OutOfRangeError);
    });

    test('resolve gives every coordinate system', () => {
      const storage = new TextStorage('é\nxy');
      expect(storage.resolve(3)).toEqual({ offset: 3, byte: 4, line: 1, column: 1 });
    });

    test('slice', () => {
      const storage = new TextStorage('hello world');
      expect(storage.slice(6, 11)).toBe('world');
      expect(() => storage.slice(6, 12)).toThrow(OutOfRangeError);
    });
  });

  describe('large documents', () => {
    const lines = Array.from({ length: 5000 }, (_, i) => `line ${i}`);
    const text = lines.join('\n');

    test('line lookups span many pieces', () => {
      const storage = new TextStorage(text);
      const start = lines.slice(0, 4321).join('\n').length + 1;
      expect(storage.lineCount()).toBe(5000);
      expect(storage.lineStart(4321)).toBe(start);
      expect(storage.getLine(4321)).toBe('line 4321');
      expect(storage.offsetToLineCol(start + 3)).toEqual({ line: 4321, column: 3 });
      expect(storage.charOffsetToByte(start)).toBe(start);
    });

    test('random edits agree with a plain string', () => {
      const storage = new TextStorage(text);
      let model = text;
      const random = makeRandom(7);
      for (let i = 0; i < 400; i++) {
        if (random(3) === 0 && model.length > 0) {
          const start = random(model.length);
          const end = Math.min(model.length, start + random(200));
          expect(storage.delete(start, end)).toBe(model.slice(start, end));
          model = model.slice(0, start) + model.slice(end);
        } else {
          const offset = random(model.length + 1);
          const inserted = i % 5 === 0 ? `ins\n${i}\n` : `<${i}>`;
          storage.insert(offset, inserted);
          model = model.slice(0, offset) + inserted + model.slice(offset);
        }
      }
      expect(storage.getText()).toBe(model);
      const modelLines = model.split('\n');
      expect(storage.lineCount()).toBe(modelLines.length);
      const middle = Math.floor(modelLines.length / 2);
      expect(storage.getLine(middle)).toBe(modelLines[middle]);
      expect(storage.lineAt(model.length)).toBe(modelLines.length - 1);
    });
  });
});

describe('Rope', () => {
  test('splits leaves as pieces accumulate and collapses when emptied', () => {
    const rope = new Rope(new PieceTable(''));
    for (let i = 0; i < 100; i++) rope.insert(0, 'x');
    expect(rope.getFullText()).toBe('x'.repeat(100));
    expect(rope.depth()).toBeGreaterThan(1);

    rope.delete(0, 100);
    expect(rope.totalChars).toBe(0);
    expect(rope.depth()).toBe(1);
    rope.insert(0, 'again');
    expect(rope.getFullText()).toBe('again');
  });

  test('typed text lands in the add buffer', () => {
    const rope = new Rope(new PieceTable(''));
    rope.insert(0, 'a');
    rope.insert(1, 'b');
    rope.insert(2, 'c');
    expect(rope.getFullText()).toBe('abc');
    expect(rope.pieceTable.addBuffer).toBe('abc');
  });

  test('line and byte lookups agree after edits', () => {
    const rope = new Rope(new PieceTable('one\ntwo\nthree'));
    rope.insert(4, 'é\n');
    expect(rope.getFullText()).toBe('one\né\ntwo\nthree');
    expect(rope.totalLineBreaks).toBe(3);
    expect(rope.findLineStart(2)).toBe(6);
    expect(rope.findOffsetLine(6)).toBe(2);
    expect(rope.charToByte(6)).toBe(7);
    expect(rope.byteToChar(7)).toBe(6);
    expect(rope.charCodeAt(4)).toBe(0xe9);
    expect(rope.charCodeAt(99)).toBe(-1);
  });
});
