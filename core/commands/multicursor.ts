/**
 * Multi-cursor commands: add cursor above/below, spawn cursors at matches,
 * drop secondary cursors.
 */

import { regionOf } from '../cursor/cursor';
import { wordAt } from '../cursor/word-boundary';
import { OK, defineCommand, message } from './registry';
import type { CommandEnv, CommandResult, CommandSpec } from './registry';

/** Add a cursor on the next line up or down from every cursor, keeping goal columns. */
function addCursorsOnAdjacentLine(env: CommandEnv, direction: 1 | -1): CommandResult {
  const { storage, cursors } = env.buffer;
  for (const cursor of [...cursors.cursors]) {
    const { line, column } = storage.offsetToLineCol(cursor.position);
    const goal = cursor.goalColumn ?? column;
    cursor.goalColumn = goal;
    const target = line + direction;
    if (target < 0 || target >= storage.lineCount()) continue;
    cursors.addAt(storage.lineStart(target) + Math.min(goal, storage.lineLength(target)), goal);
  }
  return OK;
}

const addCursorAbove = defineCommand({
  name: 'add-cursor-above',
  repeat: 'loop',
  keepsGoalColumn: true,
  run: env => addCursorsOnAdjacentLine(env, -1),
});

const addCursorBelow = defineCommand({
  name: 'add-cursor-below',
  repeat: 'loop',
  keepsGoalColumn: true,
  run: env => addCursorsOnAdjacentLine(env, 1),
});

/**
 * Put a cursor on every other occurrence of the primary cursor's region, or
 * of the whole word at point. New cursors sit at the same spot within their
 * match as the primary does within its own.
 */
const spawnCursorsAtWordMatches = defineCommand({
  name: 'spawn-cursors-at-word-matches',
  run: (env) => {
    const { storage, cursors } = env.buffer;
    const primary = cursors.primary;
    const region = regionOf(primary);
    // an empty region falls back to the word at point
    const selected = region !== null && region[0] < region[1] ? region : null;
    const span = selected ?? wordAt(storage, primary.position, env.words);
    if (span === null) return message('No word at point');
    const wholeWord = selected === null;

    const [matchStart, matchEnd] = span;
    const needle = storage.slice(matchStart, matchEnd);
    const offsetInMatch = primary.position - matchStart;
    const text = storage.getText();
    let added = 0;
    for (let idx = text.indexOf(needle); idx !== -1; idx = text.indexOf(needle, idx + needle.length)) {
      if (idx === matchStart) continue;
      if (wholeWord) {
        const before = idx > 0 && env.words.isWordChar(text.charCodeAt(idx - 1));
        const after = env.words.isWordChar(storage.charCodeAt(idx + needle.length));
        if (before || after) continue;
      }
      if (cursors.addAt(idx + offsetInMatch) !== null) added++;
    }
    return added > 0 ? message(`Added ${added} cursors`) : message('No other matches');
  },
});

const clearMultipleCursors = defineCommand({
  name: 'clear-multiple-cursors',
  run: (env) => {
    env.buffer.cursors.collapseToPrimary();
    return OK;
  },
});

/** Drop secondary cursors and deactivate marks. */
const keyboardQuit = defineCommand({
  name: 'keyboard-quit',
  run: (env) => {
    env.buffer.cursors.collapseToPrimary();
    return message('Quit');
  },
});

export function multicursorCommands(): CommandSpec[] {
  return [addCursorAbove, addCursorBelow, spawnCursorsAtWordMatches, clearMultipleCursors, keyboardQuit];
}
