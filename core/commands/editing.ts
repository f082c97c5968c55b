/**
 * Editing commands: typing, line breaks, character deletion, transposition,
 * case conversion and undo.
 */

import { regionOf } from '../cursor/cursor';
import { backwardWord, forwardWord } from '../cursor/word-boundary';
import type { WordSyntax } from '../cursor/word-boundary';
import { EditBuilder } from '../document/edit-builder';
import type { PointPlacement } from '../document/edit-builder';
import { OK, defineCommand, failure } from './registry';
import type { CommandEnv, CommandResult, CommandSpec } from './registry';

function insertAtEveryCursor(env: CommandEnv, text: string, place: PointPlacement = 'after'): CommandResult {
  if (text.length === 0) return OK;
  const builder = new EditBuilder(env.buffer);
  for (const cursor of env.buffer.cursors.descending()) {
    builder.insert(cursor, text, place);
  }
  builder.commit();
  return OK;
}

/**
 * Delete `count` characters at every cursor, forward for positive counts.
 * A cursor with an active region deletes the region instead.
 */
function deleteChars(env: CommandEnv, count: number): CommandResult {
  const length = env.buffer.length;
  const builder = new EditBuilder(env.buffer);
  for (const cursor of env.buffer.cursors.descending()) {
    const region = regionOf(cursor);
    if (region !== null) {
      builder.delete(region[0], region[1]);
      continue;
    }
    const other = Math.max(0, Math.min(cursor.position + count, length));
    builder.delete(cursor.position, other);
  }
  builder.commit();
  return OK;
}

const selfInsert = defineCommand({
  name: 'self-insert-command',
  undoClass: 'self-insertion',
  repeat: 'count',
  mutates: true,
  run: (env) => {
    const input = env.context.input ?? '';
    return insertAtEveryCursor(env, env.count > 0 ? input.repeat(env.count) : '');
  },
});

const newline = defineCommand({
  name: 'newline',
  repeat: 'count',
  mutates: true,
  run: env => insertAtEveryCursor(env, '\n'.repeat(Math.max(0, env.count))),
});

const openLine = defineCommand({
  name: 'open-line',
  repeat: 'count',
  mutates: true,
  run: env => insertAtEveryCursor(env, '\n'.repeat(Math.max(0, env.count)), 'before'),
});

const deleteChar = defineCommand({
  name: 'delete-char',
  undoClass: 'deletion',
  repeat: 'count',
  mutates: true,
  run: env => deleteChars(env, env.count),
});

const deleteBackwardChar = defineCommand({
  name: 'delete-backward-char',
  undoClass: 'deletion',
  repeat: 'count',
  mutates: true,
  run: env => deleteChars(env, -env.count),
});

/**
 * Swap the characters around each cursor and move past them. At the end of
 * a line the two characters before the cursor are swapped instead.
 */
const transposeChars = defineCommand({
  name: 'transpose-chars',
  mutates: true,
  run: (env) => {
    const { storage } = env.buffer;
    const length = storage.getLength();
    const builder = new EditBuilder(env.buffer);
    for (const cursor of env.buffer.cursors.cursors) {
      const p = cursor.position;
      const atLineEnd = p === length || storage.charAt(p) === '\n';
      const start = atLineEnd ? p - 2 : p - 1;
      if (start < 0) continue;
      const pair = storage.slice(start, start + 2);
      builder.replace(start, start + 2, pair.charAt(1) + pair.charAt(0), cursor);
    }
    builder.commit();
    return OK;
  },
});

function regionCaseCommand(name: string, convert: (text: string) => string): CommandSpec {
  return defineCommand({
    name,
    mutates: true,
    run: (env) => {
      const { storage } = env.buffer;
      const builder = new EditBuilder(env.buffer);
      for (const cursor of env.buffer.cursors.cursors) {
        const region = regionOf(cursor);
        if (region === null) continue;
        builder.replace(region[0], region[1], convert(storage.slice(region[0], region[1])));
      }
      if (!builder.hasEdits) return failure('NoMark', 'The mark is not active');
      builder.commit();
      return OK;
    },
  });
}

/** Upcase the first word character of every word, downcase the rest. */
export function capitalizeWords(text: string, words: WordSyntax): string {
  let result = '';
  let inWord = false;
  for (let i = 0; i < text.length; i++) {
    const ch = text.charAt(i);
    const isWord = words.isWordChar(text.charCodeAt(i));
    result += isWord && !inWord ? ch.toUpperCase() : ch.toLowerCase();
    inWord = isWord;
  }
  return result;
}

/**
 * Convert the words after each cursor (before it, for negative counts).
 * Point moves past the converted words only for forward counts.
 */
function wordCaseCommand(name: string, convert: (text: string, words: WordSyntax) => string): CommandSpec {
  return defineCommand({
    name,
    repeat: 'count',
    mutates: true,
    run: (env) => {
      const { storage } = env.buffer;
      const builder = new EditBuilder(env.buffer);
      for (const cursor of env.buffer.cursors.cursors) {
        let pos = cursor.position;
        for (let i = 0; i < Math.abs(env.count); i++) {
          pos = env.count > 0 ? forwardWord(storage, pos, env.words) : backwardWord(storage, pos, env.words);
        }
        const start = Math.min(pos, cursor.position);
        const end = Math.max(pos, cursor.position);
        if (start === end) continue;
        const converted = convert(storage.slice(start, end), env.words);
        builder.replace(start, end, converted, env.count > 0 ? cursor : null);
      }
      builder.commit();
      return OK;
    },
  });
}

/** Undo one group; repeated undos keep walking back through history. */
const undo = defineCommand({
  name: 'undo',
  repeat: 'loop',
  mutates: true,
  preservesMark: true,
  keepsUndoSequence: true,
  keepsGoalColumn: true,
  run: env => (env.buffer.undo() ? OK : failure('UndoEmpty', 'No further undo information')),
});

export function editingCommands(): CommandSpec[] {
  return [
    selfInsert,
    newline,
    openLine,
    deleteChar,
    deleteBackwardChar,
    transposeChars,
    regionCaseCommand('upcase-region', text => text.toUpperCase()),
    regionCaseCommand('downcase-region', text => text.toLowerCase()),
    wordCaseCommand('upcase-word', text => text.toUpperCase()),
    wordCaseCommand('downcase-word', text => text.toLowerCase()),
    wordCaseCommand('capitalize-word', capitalizeWords),
    undo,
  ];
}
