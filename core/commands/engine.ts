/**
 * Command engine: runs one command against every cursor of a buffer as a
 * single undoable step and does the bookkeeping around it.
 *
 * Per invocation:
 * 1. Look the identifier up in the registry.
 * 2. Refuse mutating commands on read-only buffers.
 * 3. Open an undo group when the undo class differs from the previous
 *    command's (the `other` class always opens one).
 * 4. Run the command, honouring the prefix argument.
 * 5. Sort and merge cursors, end the kill sequence for non-kill commands,
 *    deactivate marks unless the command preserves them and record the
 *    cursor snapshot pair.
 */

import { KillRing } from '../clipboard/kill-ring';
import { resolveEngineConfig } from '../config/engine-config';
import type { EngineConfig } from '../config/engine-config';
import { deactivateMark } from '../cursor/cursor';
import { WordSyntax } from '../cursor/word-boundary';
import type { EditorBuffer } from '../document/editor-buffer';
import { noopLogger } from '../logging';
import type { EngineLogger } from '../logging';
import { builtinCommands } from './builtin';
import { CommandRegistry, OK, failure } from './registry';
import type { CommandContext, CommandEnv, CommandResult, CommandSpec } from './registry';

export interface CommandEngineOptions {
  killRing?: KillRing;
  /** Partial configuration merged over the defaults. */
  config?: unknown;
  logger?: EngineLogger;
  registry?: CommandRegistry;
}

export class CommandEngine {
  readonly killRing: KillRing;
  readonly config: EngineConfig;
  readonly registry: CommandRegistry;
  private readonly words: WordSyntax;
  private readonly logger: EngineLogger;

  constructor(options: CommandEngineOptions = {}) {
    this.config = resolveEngineConfig(options.config);
    this.killRing = options.killRing ?? new KillRing(this.config.killRingCapacity);
    this.registry = options.registry ?? new CommandRegistry(builtinCommands());
    this.words = new WordSyntax(this.config.wordChars);
    this.logger = options.logger ?? noopLogger;
  }

  execute(buffer: EditorBuffer, name: string, context: CommandContext = {}): CommandResult {
    const spec = this.registry.get(name);
    if (spec === undefined) {
      this.logger('command not found', { command: name });
      return failure('CommandNotFound', `${name} is not a command`);
    }
    if (spec.mutates && buffer.readOnly) {
      if (!spec.keepsUndoSequence) buffer.history.breakSequence();
      if (!spec.isKill) this.killRing.endKillSequence();
      this.logger('read-only buffer', { command: name, buffer: buffer.name });
      return failure('ReadOnlyViolation', `Buffer is read-only: ${buffer.name}`);
    }

    const history = buffer.history;
    if (!spec.keepsUndoSequence) history.breakSequence();
    if (spec.mutates) history.beginCommand(this.startsUndoGroup(spec, context));

    const before = buffer.cursors.snapshot();
    const versionBefore = buffer.version;
    const result = this.run(spec, buffer, context);

    const cursors = buffer.cursors;
    cursors.clamp(buffer.length);
    cursors.normalize();
    if (!spec.isKill) this.killRing.endKillSequence();
    for (const cursor of cursors.cursors) {
      if (!spec.preservesMark) deactivateMark(cursor);
      if (!spec.keepsGoalColumn) cursor.goalColumn = null;
    }
    if (buffer.version !== versionBefore && !spec.keepsUndoSequence) {
      history.record({ kind: 'cursor-move', before, after: cursors.snapshot() });
    }
    cursors.assertOrdered(buffer.length);

    if (result.kind === 'error') {
      this.logger('command failed', { command: name, error: result.error, message: result.message });
    }
    return result;
  }

  private run(spec: CommandSpec, buffer: EditorBuffer, context: CommandContext): CommandResult {
    const count = spec.repeat === 'none' ? 1 : context.prefixArg ?? 1;
    if (spec.repeat !== 'loop') {
      return spec.run(this.env(buffer, context, count));
    }
    let result = OK;
    for (let i = 0; i < count; i++) {
      result = spec.run(this.env(buffer, context, 1));
      if (result.kind === 'error') break;
    }
    return result;
  }

  private env(buffer: EditorBuffer, context: CommandContext, count: number): CommandEnv {
    return {
      buffer,
      killRing: this.killRing,
      config: this.config,
      words: this.words,
      context,
      count,
    };
  }

  private startsUndoGroup(spec: CommandSpec, context: CommandContext): boolean {
    if (spec.undoClass === 'other') return true;
    const previous = context.lastCommand === undefined ? undefined : this.registry.get(context.lastCommand);
    return previous === undefined || previous.undoClass !== spec.undoClass;
  }
}
