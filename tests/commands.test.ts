import { describe, expect, test, vi } from 'vitest';
import { CommandEngine } from '../core/commands/engine';
import { CommandRegistry, OK, defineCommand } from '../core/commands/registry';
import type { CommandContext } from '../core/commands/registry';
import { regionOf, setMark } from '../core/cursor/cursor';
import { EditorBuffer } from '../core/document/editor-buffer';
import { InvariantError } from '../core/errors';
import { replayEntries } from '../core/history/undo-entry';

type RunContext = Omit<CommandContext, 'lastCommand'>;

function makeEditor(text: string, positions: number[] = [0], readOnly = false) {
  const engine = new CommandEngine();
  const buffer = new EditorBuffer({ name: 'test', text, readOnly });
  buffer.cursors.resetTo(positions);
  let lastCommand: string | undefined;
  const run = (name: string, context: RunContext = {}) => {
    const result = engine.execute(buffer, name, { ...context, lastCommand });
    lastCommand = name;
    return result;
  };
  const positionsOf = () => buffer.cursors.cursors.map(c => c.position);
  return { engine, buffer, run, positions: positionsOf };
}

describe('CommandRegistry', () => {
  test('defineCommand fills defaults', () => {
    const spec = defineCommand({ name: 'noop', run: () => OK });
    expect(spec.undoClass).toBe('other');
    expect(spec.repeat).toBe('none');
    expect(spec.mutates).toBe(false);
    expect(spec.isKill).toBe(false);
  });

  test('rejects duplicate identifiers', () => {
    const spec = defineCommand({ name: 'noop', run: () => OK });
    expect(() => new CommandRegistry([spec, spec])).toThrow(InvariantError);
  });

  test('the built-in table has the core commands', () => {
    const { engine } = makeEditor('');
    for (const name of ['forward-char', 'kill-line', 'yank', 'yank-pop', 'undo', 'add-cursor-below']) {
      expect(engine.registry.has(name)).toBe(true);
    }
  });
});

describe('CommandEngine', () => {
  test('unknown commands fail and are logged', () => {
    const logger = vi.fn();
    const engine = new CommandEngine({ logger });
    const buffer = new EditorBuffer({ name: 'test', text: 'abc' });
    expect(engine.execute(buffer, 'no-such-command')).toEqual({
      kind: 'error',
      error: 'CommandNotFound',
      message: 'no-such-command is not a command',
    });
    expect(logger).toHaveBeenCalledWith('command not found', { command: 'no-such-command' });
  });

  test('read-only buffers refuse edits but allow motion', () => {
    const { buffer, run, positions } = makeEditor('abc', [0], true);
    expect(run('self-insert-command', { input: 'x' })).toEqual({
      kind: 'error',
      error: 'ReadOnlyViolation',
      message: 'Buffer is read-only: test',
    });
    expect(buffer.getText()).toBe('abc');
    expect(run('forward-char')).toEqual(OK);
    expect(positions()).toEqual([1]);
  });

  test('a refused edit still ends the kill sequence', () => {
    const engine = new CommandEngine();
    const notes = new EditorBuffer({ name: 'notes', text: 'one two three' });
    const locked = new EditorBuffer({ name: 'locked', text: 'fixed', readOnly: true });
    engine.execute(notes, 'kill-word');
    expect(engine.execute(locked, 'self-insert-command', { input: 'x' }).kind).toBe('error');
    engine.execute(notes, 'kill-word');
    expect(notes.getText()).toBe(' three');
    expect(engine.killRing.entries.map(e => e.text)).toEqual([' two', 'one']);
  });

  test('a refused edit still ends the undo sequence', () => {
    const { buffer, run } = makeEditor('', [0]);
    run('newline');
    run('newline');
    run('undo');
    expect(buffer.history.inUndoSequence).toBe(true);
    buffer.readOnly = true;
    run('self-insert-command', { input: 'x' });
    expect(buffer.history.inUndoSequence).toBe(false);
  });

  test('commands that change nothing leave the version alone', () => {
    const { buffer, run } = makeEditor('abc', [0]);
    run('transpose-chars');
    expect(buffer.version).toBe(0);
    expect(buffer.history.entries).toHaveLength(0);
  });
});

describe('typing and deletion', () => {
  test('inserting at two cursors', () => {
    const { buffer, run, positions } = makeEditor('abcdefghij', [2, 5]);
    run('self-insert-command', { input: 'X' });
    expect(buffer.getText()).toBe('abXcdeXfghij');
    expect(positions()).toEqual([3, 7]);
  });

  test('adjacent deletions merge and the cursors collapse', () => {
    const { buffer, run, positions } = makeEditor('abcdefgh', [3, 4]);
    run('delete-char');
    expect(buffer.getText()).toBe('abcfgh');
    expect(positions()).toEqual([3]);
    const deletes = buffer.history.entries.filter(e => e.kind === 'delete');
    expect(deletes).toEqual([{ kind: 'delete', position: 3, text: 'de' }]);
  });

  test('undo restores text and both cursors', () => {
    const { buffer, run, positions } = makeEditor('abcdefgh', [3, 4]);
    run('delete-char');
    run('undo');
    expect(buffer.getText()).toBe('abcdefgh');
    expect(positions()).toEqual([3, 4]);
  });

  test('prefix argument counts', () => {
    const { buffer, run, positions } = makeEditor('abcdef', [4]);
    run('delete-backward-char', { prefixArg: 2 });
    expect(buffer.getText()).toBe('abef');
    expect(positions()).toEqual([2]);
    run('self-insert-command', { input: 'z', prefixArg: 3 });
    expect(buffer.getText()).toBe('abzzzef');
  });

  test('delete-char deletes an active region', () => {
    const { buffer, run } = makeEditor('hello world', [0]);
    run('forward-word-shift');
    run('delete-char');
    expect(buffer.getText()).toBe(' world');
  });

  test('open-line leaves point before the new line', () => {
    const { buffer, run, positions } = makeEditor('ab', [1]);
    run('open-line');
    expect(buffer.getText()).toBe('a\nb');
    expect(positions()).toEqual([1]);
  });

  test('transpose-chars swaps around point and at the line end', () => {
    const { buffer, run, positions } = makeEditor('abc', [1]);
    run('transpose-chars');
    expect(buffer.getText()).toBe('bac');
    expect(positions()).toEqual([2]);
    run('end-of-buffer');
    run('transpose-chars');
    expect(buffer.getText()).toBe('bca');
    expect(positions()).toEqual([3]);
  });
});

describe('undo', () => {
  test('consecutive typing is one group', () => {
    const { buffer, run, positions } = makeEditor('', [0]);
    for (const ch of ['a', 'b', 'c']) run('self-insert-command', { input: ch });
    expect(buffer.getText()).toBe('abc');
    run('undo');
    expect(buffer.getText()).toBe('');
    expect(positions()).toEqual([0]);
  });

  test('undo reports when history is exhausted', () => {
    const { run } = makeEditor('', [0]);
    run('self-insert-command', { input: 'a' });
    run('undo');
    expect(run('undo')).toEqual({
      kind: 'error',
      error: 'UndoEmpty',
      message: 'No further undo information',
    });
  });

  test('breaking the sequence lets undo redo', () => {
    const { buffer, run, positions } = makeEditor('', [0]);
    for (const ch of ['a', 'b', 'c']) run('self-insert-command', { input: ch });
    run('undo');
    run('forward-char');
    run('undo');
    expect(buffer.getText()).toBe('abc');
    expect(positions()).toEqual([3]);
  });

  test('commands of the other class each get a group', () => {
    const { buffer, run } = makeEditor('', [0]);
    run('newline');
    run('newline');
    run('undo');
    expect(buffer.getText()).toBe('\n');
  });

  test('undo with a count walks back several groups', () => {
    const { buffer, run } = makeEditor('', [0]);
    run('newline');
    run('newline');
    run('newline');
    run('undo', { prefixArg: 2 });
    expect(buffer.getText()).toBe('\n');
  });

  test('undo does not clear the modified flag', () => {
    const { buffer, run } = makeEditor('', [0]);
    run('newline');
    run('undo');
    expect(buffer.modified).toBe(true);
  });
});

describe('motion', () => {
  test('vertical motion keeps the goal column', () => {
    const { buffer, run, positions } = makeEditor('abcd\nx\nabcd', [3]);
    run('next-line');
    expect(positions()).toEqual([6]);
    run('next-line');
    expect(positions()).toEqual([10]);
    expect(buffer.cursors.primary.goalColumn).toBe(3);
    run('forward-char');
    expect(buffer.cursors.primary.goalColumn).toBeNull();
  });

  test('line edges with a count', () => {
    const { run, positions } = makeEditor('ab\ncd\nef', [1]);
    run('move-end-of-line');
    expect(positions()).toEqual([2]);
    run('move-end-of-line', { prefixArg: 2 });
    expect(positions()).toEqual([5]);
    run('move-beginning-of-line');
    expect(positions()).toEqual([3]);
  });

  test('goto-line', () => {
    const { run, positions } = makeEditor('a\nb\nc', [0]);
    expect(run('goto-line')).toEqual({ kind: 'message', text: 'Goto line: a line number is required' });
    run('goto-line', { prefixArg: 2 });
    expect(positions()).toEqual([2]);
    run('goto-line', { prefixArg: 99 });
    expect(positions()).toEqual([4]);
  });

  test('shift motion selects and a plain motion drops the selection', () => {
    const { buffer, run, positions } = makeEditor('hello world', [0]);
    run('forward-word-shift');
    expect(regionOf(buffer.cursors.primary)).toEqual([0, 5]);
    run('forward-char');
    expect(buffer.cursors.primary.markActive).toBe(false);
    expect(positions()).toEqual([6]);
  });

  test('a set mark survives plain motion', () => {
    const { buffer, run } = makeEditor('hello world', [6]);
    expect(run('set-mark-command')).toEqual({ kind: 'message', text: 'Mark set' });
    run('forward-char');
    expect(regionOf(buffer.cursors.primary)).toEqual([6, 7]);
    run('kill-region');
    expect(buffer.getText()).toBe('hello orld');
  });
});

describe('marks', () => {
  test('marks follow edits before them', () => {
    const { buffer, run } = makeEditor('hello world', [5]);
    run('set-mark-command');
    run('beginning-of-buffer');
    run('self-insert-command', { input: 'X' });
    expect(buffer.cursors.primary.mark).toBe(6);
    expect(buffer.cursors.primary.markActive).toBe(false);
  });

  test('exchange-point-and-mark', () => {
    const { buffer, run, positions } = makeEditor('abcdef', [0]);
    expect(run('exchange-point-and-mark')).toEqual({
      kind: 'error',
      error: 'NoMark',
      message: 'No mark set in this buffer',
    });
    run('set-mark-command');
    run('forward-char', { prefixArg: 3 });
    run('exchange-point-and-mark');
    expect(positions()).toEqual([0]);
    expect(buffer.cursors.primary.mark).toBe(3);
    expect(buffer.cursors.primary.markActive).toBe(true);
  });

  test('pop-to-mark cycles through saved marks', () => {
    const { buffer, run, positions } = makeEditor('abcdefgh', [2]);
    run('set-mark-command');
    run('forward-char', { prefixArg: 3 });
    run('set-mark-command');
    expect(buffer.markRing.entries).toEqual([2]);
    run('end-of-buffer');
    run('pop-to-mark-command');
    expect(positions()).toEqual([5]);
    expect(buffer.cursors.primary.mark).toBe(2);
    run('pop-to-mark-command');
    expect(positions()).toEqual([2]);
    expect(buffer.cursors.primary.mark).toBe(5);
  });

  test('mark-whole-buffer and region case conversion', () => {
    const { buffer, run, positions } = makeEditor('hello', [2], false);
    expect(run('upcase-region')).toEqual({ kind: 'error', error: 'NoMark', message: 'The mark is not active' });
    run('mark-whole-buffer');
    expect(regionOf(buffer.cursors.primary)).toEqual([0, 5]);
    run('upcase-region');
    expect(buffer.getText()).toBe('HELLO');
    expect(positions()).toEqual([5]);
  });

  describe('region commands skip cursors without an active mark', () => {
    function makeTwoCursors() {
      const editor = makeEditor('abcdef ghijkl', [3, 10]);
      setMark(editor.buffer.cursors.cursors[0], 0, true);
      return editor;
    }

    test('upcase-region', () => {
      const { buffer, run, positions } = makeTwoCursors();
      run('upcase-region');
      expect(buffer.getText()).toBe('ABCdef ghijkl');
      expect(positions()).toEqual([3, 10]);
    });

    test('kill-region', () => {
      const { engine, buffer, run, positions } = makeTwoCursors();
      run('kill-region');
      expect(buffer.getText()).toBe('def ghijkl');
      expect(positions()).toEqual([0, 7]);
      expect(engine.killRing.entries[0].segments).toEqual(['abc']);
    });

    test('copy-region-as-kill', () => {
      const { engine, buffer, run, positions } = makeTwoCursors();
      run('copy-region-as-kill');
      expect(buffer.getText()).toBe('abcdef ghijkl');
      expect(positions()).toEqual([3, 10]);
      expect(engine.killRing.entries.map(e => e.text)).toEqual(['abc']);
    });
  });
});

describe('word case', () => {
  test('capitalize-word with a count moves past the words', () => {
    const { buffer, run, positions } = makeEditor('hello big world', [0]);
    run('capitalize-word', { prefixArg: 2 });
    expect(buffer.getText()).toBe('Hello Big world');
    expect(positions()).toEqual([9]);
  });

  test('a negative count converts backward without moving', () => {
    const { buffer, run, positions } = makeEditor('hello big world', [15]);
    run('upcase-word', { prefixArg: -1 });
    expect(buffer.getText()).toBe('hello big WORLD');
    expect(positions()).toEqual([15]);
  });
});

describe('kill and yank', () => {
  test('consecutive kill-line calls accumulate', () => {
    const { engine, buffer, run, positions } = makeEditor('one\ntwo\n', [0]);
    run('kill-line');
    expect(buffer.getText()).toBe('\ntwo\n');
    run('kill-line');
    expect(buffer.getText()).toBe('two\n');
    expect(engine.killRing.entries.map(e => e.text)).toEqual(['one\n']);
    run('yank');
    expect(buffer.getText()).toBe('one\ntwo\n');
    expect(positions()).toEqual([4]);
  });

  test('kill-line at the end of the buffer', () => {
    const { run } = makeEditor('abc', [3]);
    expect(run('kill-line')).toEqual({ kind: 'message', text: 'End of buffer' });
  });

  test('kill-line with a count kills whole lines', () => {
    const { engine, buffer, run } = makeEditor('a\nb\nc', [0]);
    run('kill-line', { prefixArg: 2 });
    expect(buffer.getText()).toBe('c');
    expect(engine.killRing.entries[0].text).toBe('a\nb\n');
  });

  test('kill-word then backward-kill-word join in one entry', () => {
    const { engine, buffer, run } = makeEditor('one two three', [3]);
    run('kill-word');
    expect(buffer.getText()).toBe('one three');
    run('backward-kill-word');
    expect(buffer.getText()).toBe(' three');
    expect(engine.killRing.entries.map(e => e.text)).toEqual(['one two']);
  });

  test('yank-pop replaces the yanked text with older kills', () => {
    const { engine, buffer, run, positions } = makeEditor('xy', [1]);
    engine.killRing.push('first', 'forward');
    engine.killRing.endKillSequence();
    engine.killRing.push('second', 'forward');
    run('yank');
    expect(buffer.getText()).toBe('xsecondy');
    run('yank-pop');
    expect(buffer.getText()).toBe('xfirsty');
    expect(positions()).toEqual([6]);
    run('yank-pop');
    expect(buffer.getText()).toBe('xsecondy');
  });

  test('yank-pop needs a yank right before it', () => {
    const { engine, run } = makeEditor('xy', [1]);
    engine.killRing.push('first', 'forward');
    expect(run('yank-pop')).toEqual({
      kind: 'error',
      error: 'NotAfterYank',
      message: 'Previous command was not a yank',
    });
  });

  test('yank from an empty ring', () => {
    const { run } = makeEditor('', [0]);
    expect(run('yank')).toEqual({ kind: 'error', error: 'KillRingEmpty', message: 'Kill ring is empty' });
  });

  test('each cursor yanks its own killed segment', () => {
    const { engine, buffer, run, positions } = makeEditor('ab\ncd', [0, 3]);
    run('kill-line');
    expect(buffer.getText()).toBe('\n');
    expect(positions()).toEqual([0, 1]);
    expect(engine.killRing.entries[0].segments).toEqual(['ab', 'cd']);
    run('yank');
    expect(buffer.getText()).toBe('ab\ncd');
    expect(positions()).toEqual([2, 5]);
  });

  test('copy-region-as-kill leaves the text alone', () => {
    const { engine, buffer, run } = makeEditor('abc', [0]);
    run('mark-whole-buffer');
    run('copy-region-as-kill');
    expect(buffer.getText()).toBe('abc');
    expect(engine.killRing.entries.map(e => e.text)).toEqual(['abc']);
    expect(buffer.cursors.primary.markActive).toBe(false);
  });
});

describe('multiple cursors', () => {
  test('add-cursor-below then type', () => {
    const { buffer, run, positions } = makeEditor('ab\ncd\nef', [1]);
    run('add-cursor-below');
    expect(positions()).toEqual([1, 4]);
    run('self-insert-command', { input: 'X' });
    expect(buffer.getText()).toBe('aXb\ncXd\nef');
    expect(positions()).toEqual([2, 6]);
  });

  test('add-cursor-below with a count', () => {
    const { run, positions } = makeEditor('ab\ncd\nef', [1]);
    run('add-cursor-below', { prefixArg: 2 });
    expect(positions()).toEqual([1, 4, 7]);
  });

  test('spawn-cursors-at-word-matches skips partial words', () => {
    const { run, positions } = makeEditor('foo bar foo foobar foo', [1]);
    expect(run('spawn-cursors-at-word-matches')).toEqual({ kind: 'message', text: 'Added 2 cursors' });
    expect(positions()).toEqual([1, 9, 20]);
  });

  test('spawn-cursors-at-word-matches without matches', () => {
    expect(makeEditor('foo bar', [1]).run('spawn-cursors-at-word-matches'))
      .toEqual({ kind: 'message', text: 'No other matches' });
    expect(makeEditor('  ', [1]).run('spawn-cursors-at-word-matches'))
      .toEqual({ kind: 'message', text: 'No word at point' });
  });

  test('an empty region right after set-mark matches the word at point', () => {
    const { run, positions } = makeEditor('foo bar foo', [1]);
    run('set-mark-command');
    expect(run('spawn-cursors-at-word-matches')).toEqual({ kind: 'message', text: 'Added 1 cursors' });
    expect(positions()).toEqual([1, 9]);
  });

  test('keyboard-quit keeps only the primary', () => {
    const { buffer, run, positions } = makeEditor('abcdef', [4, 1]);
    expect(run('keyboard-quit')).toEqual({ kind: 'message', text: 'Quit' });
    expect(positions()).toEqual([4]);
    expect(buffer.cursors.primaryIndex).toBe(0);
  });

  test('random command runs keep cursors ordered and the log consistent', () => {
    const initial = 'alpha beta\ngamma delta\nepsilon zeta\n';
    const { buffer, run } = makeEditor(initial, [0, 8, 15]);
    const commands = [
      'forward-char', 'backward-word', 'next-line', 'delete-char', 'delete-backward-char',
      'kill-word', 'kill-line', 'yank', 'undo', 'newline', 'transpose-chars', 'add-cursor-below',
    ];
    let state = 11;
    for (let i = 0; i < 150; i++) {
      state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
      const name = commands[state % commands.length];
      run(name);
      if (i % 7 === 0) run('self-insert-command', { input: 'q' });

      const cursors = buffer.cursors.cursors.map(c => c.position);
      for (let k = 1; k < cursors.length; k++) expect(cursors[k - 1]).toBeLessThan(cursors[k]);
      expect(cursors[cursors.length - 1]).toBeLessThanOrEqual(buffer.length);
      expect(replayEntries(initial, buffer.history.entries)).toBe(buffer.getText());
    }
  });
});
