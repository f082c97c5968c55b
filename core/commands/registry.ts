/**
 * Command registry: a frozen map from command identifiers to command
 * objects, built once from static tables.
 *
 * Identifiers are the classic editor command names: forward-char,
 * kill-line, yank-pop and so on.
 */

import type { KillRing } from '../clipboard/kill-ring';
import type { EngineConfig } from '../config/engine-config';
import type { WordSyntax } from '../cursor/word-boundary';
import type { EditorBuffer } from '../document/editor-buffer';
import { InvariantError } from '../errors';
import type { EditorErrorKind } from '../errors';

/** Undo grouping class; consecutive commands of one class share a group. */
export type UndoClass = 'self-insertion' | 'deletion' | 'kill' | 'other';

/**
 * How the numeric prefix argument applies:
 * - none: ignored
 * - loop: the command runs that many times
 * - count: the command runs once and reads the count itself
 */
export type RepeatMode = 'none' | 'loop' | 'count';

/** What the resolver passes along with a command identifier. */
export interface CommandContext {
  prefixArg?: number;
  lastCommand?: string;
  /** Text typed for self-insert-command. */
  input?: string;
}

export type CommandResult =
  | { readonly kind: 'ok' }
  | { readonly kind: 'message'; readonly text: string }
  | { readonly kind: 'error'; readonly error: EditorErrorKind; readonly message: string };

export const OK: CommandResult = Object.freeze({ kind: 'ok' });

export function message(text: string): CommandResult {
  return { kind: 'message', text };
}

export function failure(error: EditorErrorKind, text: string): CommandResult {
  return { kind: 'error', error, message: text };
}

/** Everything a command body may touch. */
export interface CommandEnv {
  readonly buffer: EditorBuffer;
  readonly killRing: KillRing;
  readonly config: EngineConfig;
  readonly words: WordSyntax;
  readonly context: CommandContext;
  /** Repeat count for `count` commands; 1 otherwise. */
  readonly count: number;
}

export type CommandRun = (env: CommandEnv) => CommandResult;

export interface CommandSpec {
  readonly name: string;
  readonly run: CommandRun;
  readonly undoClass: UndoClass;
  /** Pushes to the kill ring and keeps the kill sequence going. */
  readonly isKill: boolean;
  readonly repeat: RepeatMode;
  /** Leaves active marks alone after running. */
  readonly preservesMark: boolean;
  /** Changes text; refused on read-only buffers. */
  readonly mutates: boolean;
  /** Continues an undo sequence instead of ending it. */
  readonly keepsUndoSequence: boolean;
  /** Leaves goal columns alone; every other command forgets them. */
  readonly keepsGoalColumn: boolean;
}

export type CommandDefinition =
  Pick<CommandSpec, 'name' | 'run'> & Partial<Omit<CommandSpec, 'name' | 'run'>>;

export function defineCommand(definition: CommandDefinition): CommandSpec {
  const spec: CommandSpec = {
    undoClass: 'other',
    isKill: false,
    repeat: 'none',
    preservesMark: false,
    mutates: false,
    keepsUndoSequence: false,
    keepsGoalColumn: false,
    ...definition,
  };
  return Object.freeze(spec);
}

export class CommandRegistry {
  private readonly commands: ReadonlyMap<string, CommandSpec>;

  constructor(specs: readonly CommandSpec[]) {
    const commands = new Map<string, CommandSpec>();
    for (const spec of specs) {
      if (commands.has(spec.name)) {
        throw new InvariantError(`command ${spec.name} registered twice`);
      }
      commands.set(spec.name, spec);
    }
    this.commands = commands;
    Object.freeze(this);
  }

  get(name: string): CommandSpec | undefined {
    return this.commands.get(name);
  }

  has(name: string): boolean {
    return this.commands.has(name);
  }

  getAll(): string[] {
    return [...this.commands.keys()];
  }
}
