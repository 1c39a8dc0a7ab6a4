/**
 * Selection helpers.
 */

import type { CursorState, Position, SelectionRange } from '../../types/state.ts';
import type { ReadonlyTextBuffer } from '../core/text-buffer.ts';
import { comparePositions } from '../core/text-buffer.ts';
import { documentEnd, documentStart } from './cursor.ts';

/**
 * Order an anchor and a live end in document order.
 * @returns null when there is no anchor or the range is empty
 */
export function normalizeSelection(anchor: Position | null, head: Position): SelectionRange | null {
  if (anchor === null) return null;
  const order = comparePositions(anchor, head);
  if (order === 0) return null;
  return Object.freeze(order < 0 ? { start: anchor, end: head } : { start: head, end: anchor });
}

/**
 * Normalized selection of a cursor state.
 */
export function getSelection(state: CursorState): SelectionRange | null {
  return normalizeSelection(state.anchor, state.position);
}

/**
 * Text covered by a selection, or null when nothing is selected.
 */
export function getSelectedText(buffer: ReadonlyTextBuffer, range: SelectionRange | null): string | null {
  if (range === null) return null;
  return buffer.textInRange(range.start, range.end);
}

/**
 * Anchor and cursor for selecting the whole document.
 */
export function selectAll(buffer: ReadonlyTextBuffer): { anchor: Position; position: Position } {
  return { anchor: documentStart(), position: documentEnd(buffer) };
}
