/**
 * Cursor movement and hit testing.
 * Movement functions are pure: they take a position and return the target.
 * `applyMovement` is the only function that writes cursor state.
 */

import type { ArrowDirection, CursorState, Position } from '../../types/state.ts';
import type { ReadonlyTextBuffer } from '../core/text-buffer.ts';
import { position, positionsEqual } from '../core/text-buffer.ts';

// =============================================================================
// Arrow Movement
// =============================================================================

/**
 * Target of an arrow key press.
 * Up/Down keep the column where the target line is long enough; Left/Right
 * wrap across line boundaries. At the document edges the position is kept.
 */
export function moveCursor(buffer: ReadonlyTextBuffer, from: Position, direction: ArrowDirection): Position {
  const { line, column } = buffer.clampPosition(from);

  switch (direction) {
    case 'up':
      if (line === 0) return position(line, column);
      return position(line - 1, Math.min(column, buffer.lineLength(line - 1)));

    case 'down':
      if (line >= buffer.lineCount() - 1) return position(line, column);
      return position(line + 1, Math.min(column, buffer.lineLength(line + 1)));

    case 'left':
      if (column > 0) return position(line, column - 1);
      if (line > 0) return position(line - 1, buffer.lineLength(line - 1));
      return position(line, column);

    case 'right':
      if (column < buffer.lineLength(line)) return position(line, column + 1);
      if (line < buffer.lineCount() - 1) return position(line + 1, 0);
      return position(line, column);
  }
}

// =============================================================================
// Line and Document Jumps
// =============================================================================

export function lineStart(buffer: ReadonlyTextBuffer, from: Position): Position {
  return position(buffer.clampPosition(from).line, 0);
}

export function lineEnd(buffer: ReadonlyTextBuffer, from: Position): Position {
  const { line } = buffer.clampPosition(from);
  return position(line, buffer.lineLength(line));
}

export function documentStart(): Position {
  return position(0, 0);
}

export function documentEnd(buffer: ReadonlyTextBuffer): Position {
  const last = buffer.lineCount() - 1;
  return position(last, buffer.lineLength(last));
}

/**
 * Lines moved by one page: whole lines that fit in the viewport.
 */
export function linesPerPage(viewportHeight: number, lineHeight: number): number {
  if (!(lineHeight > 0) || !(viewportHeight > 0)) return 0;
  return Math.floor(viewportHeight / lineHeight);
}

export function pageUp(
  buffer: ReadonlyTextBuffer,
  from: Position,
  viewportHeight: number,
  lineHeight: number
): Position {
  const { line, column } = buffer.clampPosition(from);
  const target = Math.max(0, line - linesPerPage(viewportHeight, lineHeight));
  return position(target, Math.min(column, buffer.lineLength(target)));
}

export function pageDown(
  buffer: ReadonlyTextBuffer,
  from: Position,
  viewportHeight: number,
  lineHeight: number
): Position {
  const { line, column } = buffer.clampPosition(from);
  const target = Math.min(buffer.lineCount() - 1, line + linesPerPage(viewportHeight, lineHeight));
  return position(target, Math.min(column, buffer.lineLength(target)));
}

// =============================================================================
// Selection-Aware Movement
// =============================================================================

/**
 * Move the cursor to `target`.
 * With `extend`, the pre-move position becomes the anchor unless one is set;
 * without it, the anchor is cleared.
 * @returns Whether the cursor or the anchor changed
 */
export function applyMovement(state: CursorState, target: Position, extend: boolean): boolean {
  const previous = state.position;
  const previousAnchor = state.anchor;

  if (extend) {
    state.anchor = state.anchor ?? previous;
  } else {
    state.anchor = null;
  }
  state.position = target;

  return !positionsEqual(previous, target) || previousAnchor !== state.anchor;
}

// =============================================================================
// Hit Testing
// =============================================================================

/**
 * A point in viewport pixels, relative to the editor's top-left corner.
 */
export interface Point {
  readonly x: number;
  readonly y: number;
}

/**
 * Fixed-pitch layout metrics.
 */
export interface TextMetrics {
  readonly lineHeight: number;
  readonly charWidth: number;
  readonly gutterWidth: number;
}

/**
 * Map a pixel point to a document position for a monospace layout.
 * @returns The clamped position, or null for a point in the gutter
 */
export function pointToPosition(
  point: Point,
  metrics: TextMetrics,
  scrollOffset: number,
  buffer: ReadonlyTextBuffer
): Position | null {
  if (point.x < metrics.gutterWidth) return null;

  const line = Math.floor((point.y + scrollOffset) / metrics.lineHeight);
  const column = Math.floor((point.x - metrics.gutterWidth) / metrics.charWidth);
  return buffer.clampPosition(position(line, column));
}
