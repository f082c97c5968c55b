/**
 * EditorSession: the host the UI layer drives.
 *
 * Owns the process-wide kill ring, the command engine and the named
 * buffers, one of which is current. It remembers the previous command so
 * callers pass only the identifier, prefix argument and typed input.
 */

import type { KillRing } from '../clipboard/kill-ring';
import { CommandEngine } from '../commands/engine';
import type { CommandResult } from '../commands/registry';
import { EditorBuffer } from '../document/editor-buffer';
import type { BufferSnapshot } from '../document/editor-buffer';
import type { EngineLogger } from '../logging';
import { noopLogger } from '../logging';

export const SCRATCH_BUFFER = '*scratch*';

export interface EditorSessionOptions {
  /** Partial engine configuration merged over the defaults. */
  config?: unknown;
  logger?: EngineLogger;
}

export interface OpenBufferOptions {
  readOnly?: boolean;
}

export interface RunOptions {
  prefixArg?: number;
  input?: string;
}

export class EditorSession {
  readonly engine: CommandEngine;
  private readonly buffers = new Map<string, EditorBuffer>();
  private currentName: string;
  private _lastCommand: string | undefined;
  private readonly logger: EngineLogger;

  constructor(options: EditorSessionOptions = {}) {
    this.logger = options.logger ?? noopLogger;
    this.engine = new CommandEngine({ config: options.config, logger: this.logger });
    this.currentName = this.open(SCRATCH_BUFFER, '').name;
  }

  get killRing(): KillRing {
    return this.engine.killRing;
  }

  get current(): EditorBuffer {
    const buffer = this.buffers.get(this.currentName);
    if (buffer === undefined) throw new Error(`Current buffer ${this.currentName} is missing`);
    return buffer;
  }

  get lastCommand(): string | undefined {
    return this._lastCommand;
  }

  bufferNames(): string[] {
    return [...this.buffers.keys()];
  }

  getBuffer(name: string): EditorBuffer | undefined {
    return this.buffers.get(name);
  }

  /**
   * Create a buffer from loaded text. A taken name gets a `<n>` suffix.
   * The new buffer does not become current.
   */
  open(name: string, text: string, options: OpenBufferOptions = {}): EditorBuffer {
    const unique = this.uniqueName(name);
    const buffer = new EditorBuffer({
      name: unique,
      text,
      readOnly: options.readOnly,
      markRingCapacity: this.engine.config.markRingCapacity,
      undoLimit: this.engine.config.undoLimit,
    });
    this.buffers.set(unique, buffer);
    this.logger('buffer opened', { buffer: unique, length: buffer.length });
    return buffer;
  }

  /** Make a buffer current. Returns false for an unknown name. */
  switchTo(name: string): boolean {
    if (!this.buffers.has(name)) return false;
    if (name !== this.currentName) this._lastCommand = undefined;
    this.currentName = name;
    return true;
  }

  /**
   * Close a buffer. A modified buffer stays open unless `force` is set.
   * Closing the last buffer leaves a fresh scratch buffer behind.
   */
  kill(name: string, force: boolean = false): boolean {
    const buffer = this.buffers.get(name);
    if (buffer === undefined) return false;
    if (buffer.modified && !force) {
      this.logger('buffer modified, not killed', { buffer: name });
      return false;
    }
    this.buffers.delete(name);
    if (name === this.currentName) {
      const next = this.buffers.keys().next();
      this.currentName = next.done === true ? this.open(SCRATCH_BUFFER, '').name : next.value;
      this._lastCommand = undefined;
    }
    return true;
  }

  /** Clear the modified flag after the host has written the text out. */
  markSaved(name: string = this.currentName): boolean {
    const buffer = this.buffers.get(name);
    if (buffer === undefined) return false;
    buffer.markSaved();
    return true;
  }

  /** Run a command on the current buffer. */
  run(command: string, options: RunOptions = {}): CommandResult {
    const result = this.engine.execute(this.current, command, {
      prefixArg: options.prefixArg,
      input: options.input,
      lastCommand: this._lastCommand,
    });
    if (!(result.kind === 'error' && result.error === 'CommandNotFound')) {
      this._lastCommand = command;
    }
    return result;
  }

  /** Type text at every cursor of the current buffer. */
  type(text: string): CommandResult {
    return this.run('self-insert-command', { input: text });
  }

  snapshot(firstLine?: number, maxLines?: number): BufferSnapshot {
    return this.current.snapshot(firstLine, maxLines);
  }

  private uniqueName(name: string): string {
    if (!this.buffers.has(name)) return name;
    let n = 2;
    while (this.buffers.has(`${name}<${n}>`)) n++;
    return `${name}<${n}>`;
  }
}
