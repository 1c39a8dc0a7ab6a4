/**
 * Line-based text buffer.
 * Stores the document as a vector of lines (no newline characters) for the
 * random line access virtual scrolling needs. This is the only module that
 * touches line storage; all other components go through its column-based API.
 */

import type { Position } from '../../types/state.ts';
import { charCount, columnToCodeUnit, sliceColumns, splitLines } from './unicode.ts';

// =============================================================================
// Types
// =============================================================================

/**
 * Read-only view of a text buffer, handed to the renderer and to search.
 */
export interface ReadonlyTextBuffer {
  /** Number of lines; always at least 1 */
  lineCount(): number;
  /** Text of a line, or '' when out of range */
  line(index: number): string;
  /** Column count of a line, or 0 when out of range */
  lineLength(index: number): number;
  /** Snapshot of all lines */
  lines(): readonly string[];
  /** Text between two positions (normalized), lines joined with '\n' */
  textInRange(start: Position, end: Position): string;
  /** Clamp a position to the nearest valid one */
  clampPosition(position: Position): Position;
  /** All lines joined with '\n', no trailing newline added */
  toString(): string;
}

/**
 * Mutable text buffer. Out-of-range lines are absorbed as no-ops.
 */
export interface TextBuffer extends ReadonlyTextBuffer {
  /** Insert one character at `column` of `line`; other strings, line breaks included, are ignored */
  insertChar(line: number, column: number, char: string): void;
  /** Split `line` at `column`; the tail becomes the next line */
  insertNewline(line: number, column: number): void;
  /**
   * Backspace at (`line`, `column`).
   * @returns Where the cursor lands: one column left, or the merge point on the previous line
   */
  deleteChar(line: number, column: number): Position;
  /**
   * Delete key at (`line`, `column`).
   * @returns Where the cursor stays (the clamped input position)
   */
  deleteForward(line: number, column: number): Position;
  /** Replace `length` columns at `columnStart` of `line` with `newText` */
  replaceRange(line: number, columnStart: number, length: number, newText: string): Position;
  /**
   * Insert text that may contain newlines.
   * @returns Position just after the inserted text
   */
  insertText(position: Position, text: string): Position;
  /**
   * Delete the text between two positions.
   * @returns The deleted text, lines joined with '\n'
   */
  deleteRange(start: Position, end: Position): string;
  /** Replace the whole content */
  setContent(content: string): void;
}

// =============================================================================
// Position Helpers
// =============================================================================

/**
 * Create a position value.
 */
export function position(line: number, column: number): Position {
  return Object.freeze({ line, column });
}

/**
 * Compare two positions in document order.
 * @returns negative if a < b, 0 if equal, positive if a > b
 */
export function comparePositions(a: Position, b: Position): number {
  return a.line !== b.line ? a.line - b.line : a.column - b.column;
}

/**
 * Whether two positions are equal.
 */
export function positionsEqual(a: Position, b: Position): boolean {
  return a.line === b.line && a.column === b.column;
}

/**
 * Position just after `text` when inserted at `at`.
 */
export function endOfInsertion(at: Position, text: string): Position {
  const parts = splitLines(text);
  if (parts.length === 1) {
    return position(at.line, at.column + charCount(text));
  }
  return position(at.line + parts.length - 1, charCount(parts[parts.length - 1] ?? ''));
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Create a text buffer from initial content.
 * Empty content yields a single empty line.
 */
export function createTextBuffer(content: string = ''): TextBuffer {
  let lines: string[] = splitLines(content);

  function inRange(line: number): boolean {
    return Number.isInteger(line) && line >= 0 && line < lines.length;
  }

  function lineAt(index: number): string {
    return inRange(index) ? (lines[index] ?? '') : '';
  }

  function lineLength(index: number): number {
    return charCount(lineAt(index));
  }

  function clampPosition(pos: Position): Position {
    const maxLine = lines.length - 1;
    const line = Number.isFinite(pos.line) ? Math.max(0, Math.min(Math.floor(pos.line), maxLine)) : 0;
    const column = Number.isFinite(pos.column)
      ? Math.max(0, Math.min(Math.floor(pos.column), lineLength(line)))
      : 0;
    return position(line, column);
  }

  function ordered(a: Position, b: Position): [Position, Position] {
    const start = clampPosition(a);
    const end = clampPosition(b);
    return comparePositions(start, end) <= 0 ? [start, end] : [end, start];
  }

  function textInRange(a: Position, b: Position): string {
    const [start, end] = ordered(a, b);
    if (start.line === end.line) {
      return sliceColumns(lineAt(start.line), start.column, end.column);
    }

    const parts: string[] = [sliceColumns(lineAt(start.line), start.column)];
    for (let i = start.line + 1; i < end.line; i++) {
      parts.push(lineAt(i));
    }
    parts.push(sliceColumns(lineAt(end.line), 0, end.column));
    return parts.join('\n');
  }

  function spliceLine(line: number, column: number, removeColumns: number, insert: string): void {
    const text = lineAt(line);
    const start = columnToCodeUnit(text, column);
    const end = columnToCodeUnit(text, column + removeColumns);
    lines[line] = text.slice(0, start) + insert + text.slice(end);
  }

  function insertChar(line: number, column: number, char: string): void {
    if (!inRange(line) || charCount(char) !== 1 || char === '\n' || char === '\r') return;
    spliceLine(line, column, 0, char);
  }

  function insertNewline(line: number, column: number): void {
    if (!inRange(line)) return;
    const text = lineAt(line);
    const split = columnToCodeUnit(text, column);
    lines.splice(line, 1, text.slice(0, split), text.slice(split));
  }

  function deleteChar(line: number, column: number): Position {
    if (!inRange(line)) return clampPosition(position(line, column));

    const clampedColumn = Math.min(Math.max(0, column), lineLength(line));
    if (clampedColumn > 0) {
      spliceLine(line, clampedColumn - 1, 1, '');
      return position(line, clampedColumn - 1);
    }
    if (line > 0) {
      const mergeColumn = lineLength(line - 1);
      lines[line - 1] = lineAt(line - 1) + lineAt(line);
      lines.splice(line, 1);
      return position(line - 1, mergeColumn);
    }
    return position(0, 0);
  }

  function deleteForward(line: number, column: number): Position {
    if (!inRange(line)) return clampPosition(position(line, column));

    const length = lineLength(line);
    const clampedColumn = Math.min(Math.max(0, column), length);
    if (clampedColumn < length) {
      spliceLine(line, clampedColumn, 1, '');
    } else if (line + 1 < lines.length) {
      lines[line] = lineAt(line) + lineAt(line + 1);
      lines.splice(line + 1, 1);
    }
    return position(line, clampedColumn);
  }

  function insertText(at: Position, text: string): Position {
    if (!inRange(at.line)) return at;

    const start = clampPosition(at);
    const current = lineAt(start.line);
    const split = columnToCodeUnit(current, start.column);
    const head = current.slice(0, split);
    const tail = current.slice(split);
    const parts = splitLines(text);

    if (parts.length === 1) {
      lines[start.line] = head + text + tail;
      return position(start.line, start.column + charCount(text));
    }

    const first = parts[0] ?? '';
    const last = parts[parts.length - 1] ?? '';
    const inserted = [head + first, ...parts.slice(1, -1), last + tail];
    lines.splice(start.line, 1, ...inserted);
    return position(start.line + parts.length - 1, charCount(last));
  }

  function deleteRange(a: Position, b: Position): string {
    if (!inRange(a.line) && !inRange(b.line)) return '';

    const [start, end] = ordered(a, b);
    const removed = textInRange(start, end);
    if (removed.length === 0) return '';

    // Keep the last line's tail, fold it onto the first line's head, then
    // drop every line from start+1 through end.
    const tail = sliceColumns(lineAt(end.line), end.column);
    const head = sliceColumns(lineAt(start.line), 0, start.column);
    lines.splice(start.line, end.line - start.line + 1, head + tail);
    return removed;
  }

  function replaceRange(line: number, columnStart: number, length: number, newText: string): Position {
    if (!inRange(line)) return position(line, columnStart);
    const start = clampPosition(position(line, columnStart));
    const end = clampPosition(position(line, start.column + Math.max(0, length)));
    deleteRange(start, end);
    return insertText(start, newText);
  }

  function setContent(next: string): void {
    lines = splitLines(next);
  }

  return {
    lineCount: () => lines.length,
    line: lineAt,
    lineLength,
    lines: () => Object.freeze(lines.slice()),
    textInRange,
    clampPosition,
    toString: () => lines.join('\n'),
    insertChar,
    insertNewline,
    deleteChar,
    deleteForward,
    replaceRange,
    insertText,
    deleteRange,
    setContent,
  };
}
