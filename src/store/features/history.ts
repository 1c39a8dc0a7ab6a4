/**
 * Undo/redo history over command records.
 * Bounded undo stack, save-point tracking and grouping of consecutive commands
 * into one undo unit.
 */

import type { Caret } from '../../types/state.ts';
import type { Command } from '../../types/commands.ts';
import type { TextBuffer } from '../core/text-buffer.ts';
import { Commands } from './commands.ts';
import { executeCommand, undoCommand } from './executor.ts';

// =============================================================================
// Types
// =============================================================================

/**
 * Options for creating a command history.
 */
export interface CommandHistoryOptions {
  /** Maximum number of undo entries (default: 1000) */
  maxSize?: number;
}

/**
 * Undo/redo stack manager.
 *
 * Commands handed to `push` must already have been executed; `execute` does
 * both. While a group is open, pushed commands accumulate into it and reach
 * the undo stack as one composite when the group ends.
 */
export interface CommandHistory {
  /** Record an executed command. */
  push(command: Command): void;

  /** Execute a command and record it. */
  execute(command: Command, buffer: TextBuffer, caret: Caret): void;

  /**
   * Undo the most recent entry. Flushes an open group first.
   * @returns false when there was nothing to undo
   */
  undo(buffer: TextBuffer, caret: Caret): boolean;

  /**
   * Redo the most recently undone entry. Flushes an open group first, which
   * clears the redo stack when the group held anything.
   * @returns false when there was nothing to redo
   */
  redo(buffer: TextBuffer, caret: Caret): boolean;

  /** Open a group. An already open group is ended first. */
  beginGroup(label: string): void;

  /** Close the open group. An empty group leaves no entry. */
  endGroup(): void;

  /** Record the current undo depth as the saved state. */
  markSaved(): void;

  /** Whether the document differs from the last saved state. */
  isModified(): boolean;

  canUndo(): boolean;
  canRedo(): boolean;

  /** Change the bound, evicting the oldest entries if needed. */
  setMaxSize(maxSize: number): void;

  /** Drop every entry, the open group and the save point. */
  clear(): void;

  readonly undoCount: number;
  readonly redoCount: number;
  readonly isGrouping: boolean;
  readonly maxSize: number;
}

export const DEFAULT_HISTORY_LIMIT = 1000;

// =============================================================================
// Factory
// =============================================================================

function checkMaxSize(maxSize: number): void {
  if (!Number.isInteger(maxSize) || maxSize < 1) {
    throw new RangeError(`History maxSize must be a positive integer, got ${maxSize}`);
  }
}

/**
 * Create a command history.
 * @throws RangeError when `maxSize` is not a positive integer
 */
export function createCommandHistory(options: CommandHistoryOptions = {}): CommandHistory {
  let maxSize = options.maxSize ?? DEFAULT_HISTORY_LIMIT;
  checkMaxSize(maxSize);

  let undoStack: Command[] = [];
  let redoStack: Command[] = [];
  /** Undo depth at the last save; null when never saved, -1 once the saved state is unreachable */
  let savePoint: number | null = null;
  let group: { label: string; commands: Command[] } | null = null;

  function evictOverflow(): void {
    while (undoStack.length > maxSize) {
      undoStack.shift();
      if (savePoint !== null && savePoint >= 0) {
        savePoint = savePoint > 0 ? savePoint - 1 : -1;
      }
    }
  }

  function pushToStack(command: Command): void {
    if (redoStack.length > 0) {
      // The saved state lived on the redo branch and can no longer be reached.
      if (savePoint !== null && savePoint > undoStack.length) {
        savePoint = -1;
      }
      redoStack = [];
    }
    undoStack.push(command);
    evictOverflow();
  }

  function endGroup(): void {
    if (group === null) return;
    const { label, commands } = group;
    group = null;
    if (commands.length > 0) {
      pushToStack(Commands.composite(label, commands));
    }
  }

  function push(command: Command): void {
    if (group !== null) {
      group.commands.push(command);
      return;
    }
    pushToStack(command);
  }

  function undo(buffer: TextBuffer, caret: Caret): boolean {
    endGroup();
    const command = undoStack.pop();
    if (command === undefined) return false;
    undoCommand(command, buffer, caret);
    redoStack.push(command);
    return true;
  }

  function redo(buffer: TextBuffer, caret: Caret): boolean {
    endGroup();
    const command = redoStack.pop();
    if (command === undefined) return false;
    executeCommand(command, buffer, caret);
    undoStack.push(command);
    return true;
  }

  function isModified(): boolean {
    if (group !== null) return true;
    if (savePoint === null) return undoStack.length > 0;
    return savePoint !== undoStack.length;
  }

  return {
    push,
    execute(command, buffer, caret) {
      executeCommand(command, buffer, caret);
      push(command);
    },
    undo,
    redo,
    beginGroup(label) {
      endGroup();
      group = { label, commands: [] };
    },
    endGroup,
    markSaved() {
      endGroup();
      savePoint = undoStack.length;
    },
    isModified,
    canUndo: () => undoStack.length > 0 || (group !== null && group.commands.length > 0),
    canRedo: () => redoStack.length > 0,
    setMaxSize(next) {
      checkMaxSize(next);
      maxSize = next;
      evictOverflow();
    },
    clear() {
      undoStack = [];
      redoStack = [];
      group = null;
      savePoint = null;
    },
    get undoCount() {
      return undoStack.length + (group !== null && group.commands.length > 0 ? 1 : 0);
    },
    get redoCount() {
      return redoStack.length;
    },
    get isGrouping() {
      return group !== null;
    },
    get maxSize() {
      return maxSize;
    },
  };
}
