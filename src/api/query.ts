/**
 * Query namespace, O(1) and bounded operations.
 * Functions here are read-only selectors over a text buffer.
 */

import type { Position } from '../types/state.ts';
import type { ReadonlyTextBuffer } from '../store/core/text-buffer.ts';
import { normalizeSelection } from '../store/features/selection.ts';
import { getVisibleLineRange, getVisibleLines } from '../store/features/rendering.ts';

function line(buffer: ReadonlyTextBuffer, lineNumber: number): string {
  return buffer.line(lineNumber);
}

function lineLength(buffer: ReadonlyTextBuffer, lineNumber: number): number {
  return buffer.lineLength(lineNumber);
}

function lineCount(buffer: ReadonlyTextBuffer): number {
  return buffer.lineCount();
}

function clampPosition(buffer: ReadonlyTextBuffer, pos: Position): Position {
  return buffer.clampPosition(pos);
}

export const query = {
  /** @complexity O(1): array lookup; '' when out of range */
  line,
  /** @complexity O(line_length): counts Unicode scalars */
  lineLength,
  /** @complexity O(1) */
  lineCount,
  /** @complexity O(line_length): column clamp needs the line length */
  clampPosition,
  /** @complexity O(1): orders anchor and head */
  normalizeSelection,
  /** @complexity O(1): arithmetic over scroll geometry */
  getVisibleLineRange,
  /** @complexity O(k): k lines in the window */
  getVisibleLines,
} as const;
