/**
 * The static table of built-in commands.
 */

import { clipboardCommands } from './clipboard';
import { editingCommands } from './editing';
import { markCommands } from './mark-cmds';
import { multicursorCommands } from './multicursor';
import { navigationCommands } from './navigation';
import type { CommandSpec } from './registry';

export function builtinCommands(): CommandSpec[] {
  return [
    ...navigationCommands(),
    ...editingCommands(),
    ...markCommands(),
    ...clipboardCommands(),
    ...multicursorCommands(),
  ];
}
