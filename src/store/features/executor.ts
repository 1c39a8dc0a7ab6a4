/**
 * Command execution and reversal.
 * Execute writes the buffer and moves the caret to `cursorAfter`; undo
 * restores the buffer and moves the caret to `cursorBefore`.
 */

import type { Caret } from '../../types/state.ts';
import type { Command } from '../../types/commands.ts';
import type { TextBuffer } from '../core/text-buffer.ts';
import { position } from '../core/text-buffer.ts';
import { charCount } from '../core/unicode.ts';

/**
 * Apply a command to the buffer.
 */
export function executeCommand(command: Command, buffer: TextBuffer, caret: Caret): void {
  switch (command.type) {
    case 'INSERT_CHAR':
      buffer.insertText(command.position, command.char);
      caret.position = command.cursorAfter;
      return;

    case 'DELETE_CHAR':
      if (command.deletedText !== '') {
        buffer.deleteChar(command.position.line, command.position.column);
      }
      caret.position = command.cursorAfter;
      return;

    case 'DELETE_FORWARD':
      if (command.deletedText !== '') {
        buffer.deleteForward(command.position.line, command.position.column);
      }
      caret.position = command.cursorAfter;
      return;

    case 'INSERT_NEWLINE':
      buffer.insertNewline(command.position.line, command.position.column);
      caret.position = command.cursorAfter;
      return;

    case 'INSERT_TEXT':
      buffer.insertText(command.position, command.text);
      caret.position = command.cursorAfter;
      return;

    case 'DELETE_RANGE':
      buffer.deleteRange(command.start, command.end);
      caret.position = command.cursorAfter;
      return;

    case 'REPLACE_TEXT':
      buffer.replaceRange(
        command.position.line,
        command.position.column,
        charCount(command.oldText),
        command.newText
      );
      caret.position = command.cursorAfter;
      return;

    case 'COMPOSITE':
      for (const child of command.commands) {
        executeCommand(child, buffer, caret);
      }
      return;
  }
}

/**
 * Reverse a command previously applied with `executeCommand`.
 */
export function undoCommand(command: Command, buffer: TextBuffer, caret: Caret): void {
  switch (command.type) {
    case 'INSERT_CHAR':
      buffer.deleteRange(command.position, command.cursorAfter);
      break;

    case 'DELETE_CHAR':
      if (command.deletedText !== '') {
        buffer.insertText(command.cursorAfter, command.deletedText);
      }
      break;

    case 'DELETE_FORWARD':
      if (command.deletedText !== '') {
        buffer.insertText(command.position, command.deletedText);
      }
      break;

    case 'INSERT_NEWLINE':
      buffer.deleteRange(command.position, position(command.position.line + 1, 0));
      break;

    case 'INSERT_TEXT':
      buffer.deleteRange(command.position, command.cursorAfter);
      break;

    case 'DELETE_RANGE':
      buffer.insertText(command.start, command.deletedText);
      break;

    case 'REPLACE_TEXT':
      buffer.deleteRange(command.position, command.cursorAfter);
      buffer.insertText(command.position, command.oldText);
      break;

    case 'COMPOSITE':
      for (let i = command.commands.length - 1; i >= 0; i--) {
        const child = command.commands[i];
        if (child) undoCommand(child, buffer, caret);
      }
      return;
  }
  caret.position = command.cursorBefore;
}
