/**
 * Kill and yank commands.
 *
 * Kills remove text at every cursor and push one segment per cursor to the
 * kill ring. A yank with as many cursors as the newest entry has segments
 * hands each cursor its own segment; otherwise every cursor gets the whole
 * entry.
 */

import { orderedRange } from '../buffer/position';
import type { KillDirection, KillEntry } from '../clipboard/kill-ring';
import { regionOf } from '../cursor/cursor';
import type { Cursor } from '../cursor/cursor';
import { backwardWord, forwardWord } from '../cursor/word-boundary';
import { EditBuilder } from '../document/edit-builder';
import { OK, defineCommand, failure, message } from './registry';
import type { CommandEnv, CommandResult, CommandSpec } from './registry';

type Span = [number, number];

const TRAILING_BLANKS = /^[ \t]*$/;

function killSpans(env: CommandEnv, spans: readonly Span[], direction: KillDirection): CommandResult {
  const builder = new EditBuilder(env.buffer);
  for (const [start, end] of spans) builder.delete(start, end);
  if (!builder.hasEdits) {
    return message(direction === 'forward' ? 'End of buffer' : 'Beginning of buffer');
  }
  const { removed } = builder.commit();
  env.killRing.push(removed, direction);
  return OK;
}

function regionSpans(env: CommandEnv): Span[] {
  const spans: Span[] = [];
  for (const cursor of env.buffer.cursors.cursors) {
    const region = regionOf(cursor);
    if (region !== null) spans.push(region);
  }
  return spans;
}

/**
 * Without an argument: kill to the end of the line, or through the newline
 * when only blanks remain. With n > 0: kill through n newlines. With
 * n <= 0: kill back to the start of the line n lines up.
 */
function killLineSpan(env: CommandEnv, position: number): Span {
  const { storage } = env.buffer;
  const line = storage.lineAt(position);
  const arg = env.context.prefixArg;
  if (arg === undefined) {
    const end = storage.lineEnd(line);
    if (TRAILING_BLANKS.test(storage.slice(position, end))) {
      return [position, Math.min(end + 1, storage.getLength())];
    }
    return [position, end];
  }
  if (arg > 0) {
    const target = line + arg;
    return [position, target < storage.lineCount() ? storage.lineStart(target) : storage.getLength()];
  }
  return [storage.lineStart(Math.max(0, line + arg)), position];
}

const killLine = defineCommand({
  name: 'kill-line',
  undoClass: 'kill',
  isKill: true,
  mutates: true,
  run: (env) => {
    const spans = env.buffer.cursors.cursors.map(c => killLineSpan(env, c.position));
    const arg = env.context.prefixArg;
    return killSpans(env, spans, arg !== undefined && arg <= 0 ? 'backward' : 'forward');
  },
});

function wordSpan(env: CommandEnv, cursor: Cursor, count: number): Span {
  const { storage } = env.buffer;
  let pos = cursor.position;
  for (let i = 0; i < Math.abs(count); i++) {
    pos = count > 0 ? forwardWord(storage, pos, env.words) : backwardWord(storage, pos, env.words);
  }
  return pos < cursor.position ? [pos, cursor.position] : [cursor.position, pos];
}

const killWord = defineCommand({
  name: 'kill-word',
  undoClass: 'kill',
  isKill: true,
  repeat: 'count',
  mutates: true,
  run: env => killSpans(
    env,
    env.buffer.cursors.cursors.map(c => wordSpan(env, c, env.count)),
    env.count < 0 ? 'backward' : 'forward',
  ),
});

const backwardKillWord = defineCommand({
  name: 'backward-kill-word',
  undoClass: 'kill',
  isKill: true,
  repeat: 'count',
  mutates: true,
  run: env => killSpans(
    env,
    env.buffer.cursors.cursors.map(c => wordSpan(env, c, -env.count)),
    env.count < 0 ? 'forward' : 'backward',
  ),
});

const killRegion = defineCommand({
  name: 'kill-region',
  undoClass: 'kill',
  isKill: true,
  mutates: true,
  run: (env) => {
    const spans = regionSpans(env);
    if (spans.length === 0) return failure('NoMark', 'The mark is not active');
    return killSpans(env, spans, 'forward');
  },
});

/** Save the regions as a new kill-ring entry without deleting them. */
const copyRegionAsKill = defineCommand({
  name: 'copy-region-as-kill',
  run: (env) => {
    const spans = regionSpans(env);
    if (spans.length === 0) return failure('NoMark', 'The mark is not active');
    const { storage } = env.buffer;
    env.killRing.endKillSequence();
    env.killRing.push(spans.map(([start, end]) => storage.slice(start, end)), 'forward');
    return OK;
  },
});

function textFor(entry: KillEntry, index: number, cursorCount: number): string {
  return cursorCount > 1 && entry.segments.length === cursorCount ? entry.segments[index] : entry.text;
}

const yank = defineCommand({
  name: 'yank',
  mutates: true,
  run: (env) => {
    const entry = env.killRing.yank();
    if (entry === null) return failure('KillRingEmpty', 'Kill ring is empty');
    const { cursors, markRing } = env.buffer;
    const builder = new EditBuilder(env.buffer);
    cursors.cursors.forEach((cursor, i) => {
      if (cursors.isPrimary(cursor) && cursor.mark !== null) markRing.push(cursor.mark);
      cursor.mark = cursor.position;
      cursor.markActive = false;
      builder.insert(cursor, textFor(entry, i, cursors.size));
    });
    builder.commit();
    return OK;
  },
});

/** Replace the text just yanked with the next-older kill-ring entry. */
const yankPop = defineCommand({
  name: 'yank-pop',
  mutates: true,
  run: (env) => {
    const last = env.context.lastCommand;
    if (last !== 'yank' && last !== 'yank-pop') {
      return failure('NotAfterYank', 'Previous command was not a yank');
    }
    const entry = env.killRing.yankPop();
    if (entry === null) return failure('KillRingEmpty', 'Kill ring is empty');
    const { cursors } = env.buffer;
    const builder = new EditBuilder(env.buffer);
    cursors.cursors.forEach((cursor, i) => {
      if (cursor.mark === null) return;
      const [start, end] = orderedRange(cursor.mark, cursor.position);
      builder.replace(start, end, textFor(entry, i, cursors.size), cursor);
    });
    builder.commit();
    return OK;
  },
});

export function clipboardCommands(): CommandSpec[] {
  return [killLine, killWord, backwardKillWord, killRegion, copyRegionAsKill, yank, yankPop];
}
