/**
 * Motion commands: by character, line, word, line edge and buffer edge,
 * plus goto-line. Every motion except goto-line has a `-shift` twin that
 * extends a shift-selected region.
 */

import type { TextStorage } from '../buffer/text-storage';
import { deactivateMark } from '../cursor/cursor';
import type { Cursor } from '../cursor/cursor';
import { backwardWord, forwardWord } from '../cursor/word-boundary';
import { OK, defineCommand, message } from './registry';
import type { CommandEnv, CommandSpec } from './registry';

/** New position for one cursor. Vertical motions keep the goal column. */
interface Motion {
  name: string;
  vertical?: boolean;
  target: (env: CommandEnv, cursor: Cursor) => number;
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(value, max));
}

function moveVertically(storage: TextStorage, cursor: Cursor, lines: number): number {
  const { line, column } = storage.offsetToLineCol(cursor.position);
  if (cursor.goalColumn === null) cursor.goalColumn = column;
  const target = clamp(line + lines, 0, storage.lineCount() - 1);
  return storage.lineStart(target) + Math.min(cursor.goalColumn, storage.lineLength(target));
}

function repeatWord(env: CommandEnv, position: number, count: number): number {
  const { storage } = env.buffer;
  let pos = position;
  for (let i = 0; i < Math.abs(count); i++) {
    pos = count > 0 ? forwardWord(storage, pos, env.words) : backwardWord(storage, pos, env.words);
  }
  return pos;
}

/** Line reached by an `n`-style line-edge argument: 1 is the current line. */
function lineForEdge(storage: TextStorage, position: number, count: number): number {
  return clamp(storage.lineAt(position) + count - 1, 0, storage.lineCount() - 1);
}

const MOTIONS: readonly Motion[] = [
  {
    name: 'forward-char',
    target: (env, c) => clamp(c.position + env.count, 0, env.buffer.length),
  },
  {
    name: 'backward-char',
    target: (env, c) => clamp(c.position - env.count, 0, env.buffer.length),
  },
  {
    name: 'next-line',
    vertical: true,
    target: (env, c) => moveVertically(env.buffer.storage, c, env.count),
  },
  {
    name: 'previous-line',
    vertical: true,
    target: (env, c) => moveVertically(env.buffer.storage, c, -env.count),
  },
  {
    name: 'forward-word',
    target: (env, c) => repeatWord(env, c.position, env.count),
  },
  {
    name: 'backward-word',
    target: (env, c) => repeatWord(env, c.position, -env.count),
  },
  {
    name: 'move-beginning-of-line',
    target: (env, c) => env.buffer.storage.lineStart(lineForEdge(env.buffer.storage, c.position, env.count)),
  },
  {
    name: 'move-end-of-line',
    target: (env, c) => env.buffer.storage.lineEnd(lineForEdge(env.buffer.storage, c.position, env.count)),
  },
  {
    name: 'beginning-of-buffer',
    target: () => 0,
  },
  {
    name: 'end-of-buffer',
    target: env => env.buffer.length,
  },
];

function motionCommand(motion: Motion, shift: boolean): CommandSpec {
  return defineCommand({
    name: shift ? `${motion.name}-shift` : motion.name,
    repeat: 'count',
    preservesMark: true,
    keepsGoalColumn: motion.vertical === true,
    run: (env) => {
      for (const cursor of env.buffer.cursors.cursors) {
        if (shift) {
          if (!cursor.markActive) {
            cursor.mark = cursor.position;
            cursor.markActive = true;
            cursor.shiftSelected = true;
          }
        } else if (cursor.shiftSelected) {
          deactivateMark(cursor);
        }
        cursor.position = motion.target(env, cursor);
      }
      return OK;
    },
  });
}

const gotoLine = defineCommand({
  name: 'goto-line',
  preservesMark: true,
  run: (env) => {
    const line = env.context.prefixArg;
    if (line === undefined) return message('Goto line: a line number is required');
    const { storage, cursors } = env.buffer;
    const target = clamp(line - 1, 0, storage.lineCount() - 1);
    for (const cursor of cursors.cursors) {
      if (cursor.shiftSelected) deactivateMark(cursor);
      cursor.position = storage.lineStart(target);
    }
    return OK;
  },
});

export function navigationCommands(): CommandSpec[] {
  return [
    ...MOTIONS.map(m => motionCommand(m, false)),
    ...MOTIONS.map(m => motionCommand(m, true)),
    gotoLine,
  ];
}
