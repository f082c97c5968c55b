/**
 * Core barrel export: re-exports all public APIs from core/.
 */

// Errors, logging, configuration
export { OutOfRangeError, InvariantError, invariant, type EditorErrorKind } from './errors';
export { noopLogger, type EngineLogger } from './logging';
export {
  EngineConfigSchema, DEFAULT_ENGINE_CONFIG, ConfigValidationError,
  resolveEngineConfig, type EngineConfig,
} from './config/engine-config';

// Buffer
export { TextStorage, normalizeLineEndings } from './buffer/text-storage';
export { PieceTable, MAX_PIECE_LENGTH, type PieceDescriptor, type BufferType } from './buffer/piece-table';
export { Rope } from './buffer/rope';
export {
  type CharOffset, type ByteOffset, type Position, type ResolvedPosition,
  orderedRange,
} from './buffer/position';

// Document
export {
  EditorBuffer, type EditorBufferOptions, type BufferSnapshot,
  type CursorView, type RegionView,
} from './document/editor-buffer';
export { EditBuilder, type PointPlacement, type CommitResult } from './document/edit-builder';

// Cursor
export {
  type Cursor, type CursorSnapshot,
  createCursor, cloneCursor, regionOf, setMark, deactivateMark,
} from './cursor/cursor';
export { CursorSet } from './cursor/cursor-set';
export { MarkRing } from './cursor/mark-ring';
export { WordSyntax, forwardWord, backwardWord, wordAt } from './cursor/word-boundary';

// History
export { UndoHistory, type UndoGroup } from './history/undo-history';
export {
  type UndoEntry, type TextEntry, type InsertEntry, type DeleteEntry,
  type CursorMoveEntry, type BoundaryEntry,
  BOUNDARY, invertEntry, replayEntries,
} from './history/undo-entry';

// Kill ring
export { KillRing, type KillEntry, type KillDirection } from './clipboard/kill-ring';

// Commands
export {
  CommandRegistry, defineCommand, OK, message, failure,
  type CommandSpec, type CommandDefinition, type CommandContext, type CommandEnv,
  type CommandResult, type CommandRun, type UndoClass, type RepeatMode,
} from './commands/registry';
export { CommandEngine, type CommandEngineOptions } from './commands/engine';
export { builtinCommands } from './commands/builtin';
export { navigationCommands } from './commands/navigation';
export { editingCommands, capitalizeWords } from './commands/editing';
export { markCommands } from './commands/mark-cmds';
export { clipboardCommands } from './commands/clipboard';
export { multicursorCommands } from './commands/multicursor';

// Session
export {
  EditorSession, SCRATCH_BUFFER,
  type EditorSessionOptions, type OpenBufferOptions, type RunOptions,
} from './session/editor-session';
