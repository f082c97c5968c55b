/**
 * Mark commands: set, pop, exchange and mark-whole-buffer.
 *
 * Each cursor owns its mark. The buffer's mark ring saves the primary
 * cursor's previous marks.
 */

import { setMark } from '../cursor/cursor';
import type { Cursor } from '../cursor/cursor';
import { OK, defineCommand, failure, message } from './registry';
import type { CommandEnv, CommandResult, CommandSpec } from './registry';

function saveMark(env: CommandEnv, cursor: Cursor): void {
  if (cursor.mark !== null && env.buffer.cursors.isPrimary(cursor)) {
    env.buffer.markRing.push(cursor.mark);
  }
}

/** Jump the primary cursor to its mark and rotate the mark ring. */
function popToMark(env: CommandEnv): CommandResult {
  const { cursors, markRing } = env.buffer;
  const primary = cursors.primary;
  if (primary.mark === null) return failure('NoMark', 'No mark set in this buffer');
  primary.position = primary.mark;
  const next = markRing.rotate(primary.mark);
  if (next !== null) primary.mark = next;
  primary.markActive = false;
  return OK;
}

/** Set the mark at point for every cursor; with a prefix argument, pop instead. */
const setMarkCommand = defineCommand({
  name: 'set-mark-command',
  preservesMark: true,
  run: (env) => {
    if (env.context.prefixArg !== undefined) return popToMark(env);
    for (const cursor of env.buffer.cursors.cursors) {
      saveMark(env, cursor);
      setMark(cursor, cursor.position, true);
    }
    return message('Mark set');
  },
});

const popToMarkCommand = defineCommand({
  name: 'pop-to-mark-command',
  run: popToMark,
});

const exchangePointAndMark = defineCommand({
  name: 'exchange-point-and-mark',
  preservesMark: true,
  run: (env) => {
    let swapped = false;
    for (const cursor of env.buffer.cursors.cursors) {
      if (cursor.mark === null) continue;
      const mark = cursor.mark;
      cursor.mark = cursor.position;
      cursor.position = mark;
      cursor.markActive = true;
      swapped = true;
    }
    return swapped ? OK : failure('NoMark', 'No mark set in this buffer');
  },
});

/** Collapse to the primary cursor with the whole buffer as its region. */
const markWholeBuffer = defineCommand({
  name: 'mark-whole-buffer',
  preservesMark: true,
  run: (env) => {
    const { cursors } = env.buffer;
    cursors.collapseToPrimary();
    const primary = cursors.primary;
    saveMark(env, primary);
    setMark(primary, 0, true);
    primary.position = env.buffer.length;
    return OK;
  },
});

export function markCommands(): CommandSpec[] {
  return [setMarkCommand, popToMarkCommand, exchangePointAndMark, markWholeBuffer];
}
