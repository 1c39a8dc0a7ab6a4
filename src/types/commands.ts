/**
 * Command types for the editing engine.
 * Every buffer mutation is a reversible command record. Records are plain,
 * frozen data: each one captures what its undo needs, so undo never has to
 * re-derive anything from the buffer.
 */

import type { Position } from './state.ts';

// =============================================================================
// Shared Fields
// =============================================================================

/**
 * Cursor positions recorded at construction.
 * Execute restores `cursorAfter`, undo restores `cursorBefore`.
 */
interface CursorCapture {
  readonly cursorBefore: Position;
  readonly cursorAfter: Position;
}

// =============================================================================
// Single-Step Commands
// =============================================================================

/**
 * Insert one character.
 */
export interface InsertCharCommand extends CursorCapture {
  readonly type: 'INSERT_CHAR';
  readonly position: Position;
  readonly char: string;
}

/**
 * Backspace: remove the character before `position`, or merge the line into
 * the previous one when `position` is at column 0.
 */
export interface DeleteCharCommand extends CursorCapture {
  readonly type: 'DELETE_CHAR';
  readonly position: Position;
  /** The removed character, '\n' for a line merge, '' when nothing was removed */
  readonly deletedText: string;
}

/**
 * Delete key: remove the character at `position`, or merge the next line in
 * when `position` is at the end of its line.
 */
export interface DeleteForwardCommand extends CursorCapture {
  readonly type: 'DELETE_FORWARD';
  readonly position: Position;
  /** The removed character, '\n' for a line merge, '' when nothing was removed */
  readonly deletedText: string;
}

/**
 * Split a line at `position`.
 */
export interface InsertNewlineCommand extends CursorCapture {
  readonly type: 'INSERT_NEWLINE';
  readonly position: Position;
}

/**
 * Insert arbitrary text (paste, IME commit, tab expansion).
 */
export interface InsertTextCommand extends CursorCapture {
  readonly type: 'INSERT_TEXT';
  readonly position: Position;
  readonly text: string;
}

/**
 * Delete a normalized range (selection deletion).
 */
export interface DeleteRangeCommand extends CursorCapture {
  readonly type: 'DELETE_RANGE';
  readonly start: Position;
  readonly end: Position;
  readonly deletedText: string;
}

/**
 * Replace text at a position (search and replace).
 */
export interface ReplaceTextCommand extends CursorCapture {
  readonly type: 'REPLACE_TEXT';
  readonly position: Position;
  readonly oldText: string;
  readonly newText: string;
}

// =============================================================================
// Composite
// =============================================================================

/**
 * Ordered list of commands forming one undo unit.
 * Executes in order and undoes in reverse order.
 */
export interface CompositeCommand {
  readonly type: 'COMPOSITE';
  readonly label: string;
  readonly commands: readonly Command[];
}

// =============================================================================
// Union Type
// =============================================================================

/**
 * Union of all command types.
 */
export type Command =
  | InsertCharCommand
  | DeleteCharCommand
  | DeleteForwardCommand
  | InsertNewlineCommand
  | InsertTextCommand
  | DeleteRangeCommand
  | ReplaceTextCommand
  | CompositeCommand;

/**
 * Extract the command type string from a command.
 */
export type CommandType = Command['type'];

/**
 * Commands that are not composites.
 */
export type TextEditCommand = Exclude<Command, CompositeCommand>;

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Check if a command is a single text edit (not a composite).
 */
export function isTextEditCommand(command: Command): command is TextEditCommand {
  return command.type !== 'COMPOSITE';
}

/**
 * Check if a command is a composite.
 */
export function isCompositeCommand(command: Command): command is CompositeCommand {
  return command.type === 'COMPOSITE';
}

function isPosition(value: unknown): value is Position {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const position = value as { line?: unknown; column?: unknown };
  return typeof position.line === 'number' && typeof position.column === 'number';
}

function hasCursors(value: Partial<Record<string, unknown>>): boolean {
  return isPosition(value.cursorBefore) && isPosition(value.cursorAfter);
}

/**
 * Check if an unknown value is a well-formed Command.
 * Useful when commands were stored or transferred outside the engine.
 */
export function isCommand(value: unknown): value is Command {
  if (typeof value !== 'object' || value === null) {
    return false;
  }

  const command = value as Partial<Record<string, unknown>> & { type?: unknown };

  switch (command.type) {
    case 'INSERT_CHAR':
      return isPosition(command.position) && typeof command.char === 'string' && hasCursors(command);
    case 'DELETE_CHAR':
    case 'DELETE_FORWARD':
      return isPosition(command.position) && typeof command.deletedText === 'string' && hasCursors(command);
    case 'INSERT_NEWLINE':
      return isPosition(command.position) && hasCursors(command);
    case 'INSERT_TEXT':
      return isPosition(command.position) && typeof command.text === 'string' && hasCursors(command);
    case 'DELETE_RANGE':
      return (
        isPosition(command.start) &&
        isPosition(command.end) &&
        typeof command.deletedText === 'string' &&
        hasCursors(command)
      );
    case 'REPLACE_TEXT':
      return (
        isPosition(command.position) &&
        typeof command.oldText === 'string' &&
        typeof command.newText === 'string' &&
        hasCursors(command)
      );
    case 'COMPOSITE':
      return (
        typeof command.label === 'string' &&
        Array.isArray(command.commands) &&
        command.commands.every(isCommand)
      );
    default:
      return false;
  }
}
