/**
 * Scan namespace, O(n) operations.
 * All functions in this namespace walk the whole document or a range of it.
 * Use `query.*` for single-line lookups when possible.
 */

import type { ReadonlyTextBuffer } from '../store/core/text-buffer.ts';
import { findMatches } from '../store/features/search.ts';
import { getSelectedText } from '../store/features/selection.ts';

function toString(buffer: ReadonlyTextBuffer): string {
  return buffer.toString();
}

export const scan = {
  /** @complexity O(n): joins every line */
  toString,
  /** @complexity O(n): tests every line against the query */
  findMatches,
  /** @complexity O(k): k lines spanned by the selection */
  getSelectedText,
} as const;
