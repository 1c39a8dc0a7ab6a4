/**
 * Command creators.
 * Each creator reads the buffer once, clamps its positions and records
 * everything undo will need. The returned records are frozen and serializable.
 */

import type { Position } from '../../types/state.ts';
import type {
  Command,
  CompositeCommand,
  DeleteCharCommand,
  DeleteForwardCommand,
  DeleteRangeCommand,
  InsertCharCommand,
  InsertNewlineCommand,
  InsertTextCommand,
  ReplaceTextCommand,
} from '../../types/commands.ts';
import type { ReadonlyTextBuffer } from '../core/text-buffer.ts';
import { comparePositions, endOfInsertion, position } from '../core/text-buffer.ts';
import { charAtColumn, sliceColumns } from '../core/unicode.ts';

/**
 * Command creators.
 * `cursorBefore` defaults to the edit position; pass it explicitly when the
 * cursor sat elsewhere (e.g. at the far end of a deleted selection).
 */
export const Commands = {
  /**
   * Create an insert-character command.
   */
  insertChar(
    buffer: ReadonlyTextBuffer,
    at: Position,
    char: string,
    cursorBefore: Position = at
  ): InsertCharCommand {
    const clamped = buffer.clampPosition(at);
    return Object.freeze({
      type: 'INSERT_CHAR',
      position: clamped,
      char,
      cursorBefore,
      cursorAfter: endOfInsertion(clamped, char),
    });
  },

  /**
   * Create a backspace command.
   * At the document start the command records nothing and does nothing.
   */
  deleteChar(buffer: ReadonlyTextBuffer, at: Position, cursorBefore: Position = at): DeleteCharCommand {
    const clamped = buffer.clampPosition(at);
    let deletedText = '';
    let cursorAfter = clamped;

    if (clamped.column > 0) {
      deletedText = charAtColumn(buffer.line(clamped.line), clamped.column - 1);
      cursorAfter = position(clamped.line, clamped.column - 1);
    } else if (clamped.line > 0) {
      deletedText = '\n';
      cursorAfter = position(clamped.line - 1, buffer.lineLength(clamped.line - 1));
    }

    return Object.freeze({ type: 'DELETE_CHAR', position: clamped, deletedText, cursorBefore, cursorAfter });
  },

  /**
   * Create a delete-forward command.
   * At the document end the command records nothing and does nothing.
   */
  deleteForward(buffer: ReadonlyTextBuffer, at: Position, cursorBefore: Position = at): DeleteForwardCommand {
    const clamped = buffer.clampPosition(at);
    let deletedText = '';

    if (clamped.column < buffer.lineLength(clamped.line)) {
      deletedText = charAtColumn(buffer.line(clamped.line), clamped.column);
    } else if (clamped.line + 1 < buffer.lineCount()) {
      deletedText = '\n';
    }

    return Object.freeze({
      type: 'DELETE_FORWARD',
      position: clamped,
      deletedText,
      cursorBefore,
      cursorAfter: clamped,
    });
  },

  /**
   * Create a line-split command.
   */
  insertNewline(buffer: ReadonlyTextBuffer, at: Position, cursorBefore: Position = at): InsertNewlineCommand {
    const clamped = buffer.clampPosition(at);
    return Object.freeze({
      type: 'INSERT_NEWLINE',
      position: clamped,
      cursorBefore,
      cursorAfter: position(clamped.line + 1, 0),
    });
  },

  /**
   * Create an insert-text command. `text` may contain line breaks.
   */
  insertText(
    buffer: ReadonlyTextBuffer,
    at: Position,
    text: string,
    cursorBefore: Position = at
  ): InsertTextCommand {
    const clamped = buffer.clampPosition(at);
    return Object.freeze({
      type: 'INSERT_TEXT',
      position: clamped,
      text,
      cursorBefore,
      cursorAfter: endOfInsertion(clamped, text),
    });
  },

  /**
   * Create a range deletion. Endpoints may come in either order.
   * `cursorBefore` defaults to the later endpoint.
   */
  deleteRange(
    buffer: ReadonlyTextBuffer,
    from: Position,
    to: Position,
    cursorBefore?: Position
  ): DeleteRangeCommand {
    const a = buffer.clampPosition(from);
    const b = buffer.clampPosition(to);
    const [start, end] = comparePositions(a, b) <= 0 ? [a, b] : [b, a];
    return Object.freeze({
      type: 'DELETE_RANGE',
      start,
      end,
      deletedText: buffer.textInRange(start, end),
      cursorBefore: cursorBefore ?? end,
      cursorAfter: start,
    });
  },

  /**
   * Create a replace command for `length` columns at `at` on a single line.
   */
  replaceText(
    buffer: ReadonlyTextBuffer,
    at: Position,
    length: number,
    newText: string,
    cursorBefore: Position = at
  ): ReplaceTextCommand {
    const clamped = buffer.clampPosition(at);
    const oldText = sliceColumns(buffer.line(clamped.line), clamped.column, clamped.column + Math.max(0, length));
    return Object.freeze({
      type: 'REPLACE_TEXT',
      position: clamped,
      oldText,
      newText,
      cursorBefore,
      cursorAfter: endOfInsertion(clamped, newText),
    });
  },

  /**
   * Group commands into one undo unit.
   */
  composite(label: string, commands: readonly Command[]): CompositeCommand {
    return Object.freeze({ type: 'COMPOSITE', label, commands: Object.freeze(commands.slice()) });
  },
} as const;

/**
 * Human-readable label for a command, e.g. for an undo menu entry.
 */
export function commandLabel(command: Command): string {
  switch (command.type) {
    case 'INSERT_CHAR':
      return 'Insert character';
    case 'DELETE_CHAR':
    case 'DELETE_FORWARD':
      return 'Delete character';
    case 'INSERT_NEWLINE':
      return 'Insert line break';
    case 'INSERT_TEXT':
      return 'Insert text';
    case 'DELETE_RANGE':
      return 'Delete selection';
    case 'REPLACE_TEXT':
      return 'Replace';
    case 'COMPOSITE':
      return command.label;
  }
}
