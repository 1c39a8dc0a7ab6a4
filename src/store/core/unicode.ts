/**
 * Column/storage conversion helpers.
 * Columns count Unicode scalar values; line strings are stored as UTF-16, so
 * every column must be converted to a code-unit offset before slicing.
 */

import type { CodeUnitOffset, ColumnOffset } from '../../types/branded.ts';
import { codeUnitOffset, columnOffset } from '../../types/branded.ts';

/**
 * Whether the UTF-16 code unit at `index` starts a surrogate pair.
 */
function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}

/**
 * Width in code units of the scalar value starting at `index`.
 */
function scalarWidthAt(text: string, index: number): number {
  const code = text.charCodeAt(index);
  if (isHighSurrogate(code) && index + 1 < text.length && isLowSurrogate(text.charCodeAt(index + 1))) {
    return 2;
  }
  return 1;
}

/**
 * Number of Unicode scalar values in `text`.
 */
export function charCount(text: string): number {
  let count = 0;
  for (let i = 0; i < text.length; i += scalarWidthAt(text, i)) {
    count++;
  }
  return count;
}

/**
 * Convert a column to a storage offset.
 * Columns past the end clamp to `text.length`; negative columns clamp to 0.
 */
export function columnToCodeUnit(text: string, column: number): CodeUnitOffset {
  if (column <= 0) return codeUnitOffset(0);

  let index = 0;
  let seen = 0;
  while (index < text.length && seen < column) {
    index += scalarWidthAt(text, index);
    seen++;
  }
  return codeUnitOffset(index);
}

/**
 * Convert a storage offset back to a column.
 * An offset in the middle of a surrogate pair counts the pair as consumed.
 */
export function codeUnitToColumn(text: string, offset: CodeUnitOffset): ColumnOffset {
  let index = 0;
  let column = 0;
  const limit = Math.min(offset, text.length);
  while (index < limit) {
    index += scalarWidthAt(text, index);
    column++;
  }
  return columnOffset(column);
}

/**
 * Slice `text` by columns: [startColumn, endColumn).
 */
export function sliceColumns(text: string, startColumn: number, endColumn: number = Number.MAX_SAFE_INTEGER): string {
  const start = columnToCodeUnit(text, startColumn);
  const end = columnToCodeUnit(text, endColumn);
  return end > start ? text.slice(start, end) : '';
}

/**
 * The scalar value at `column`, or '' past the end.
 */
export function charAtColumn(text: string, column: number): string {
  return sliceColumns(text, column, column + 1);
}

/**
 * Split text into lines. Accepts '\n', '\r\n' and lone '\r'.
 * Always returns at least one line.
 */
export function splitLines(text: string): string[] {
  return text.split(/\r\n|\r|\n/);
}
