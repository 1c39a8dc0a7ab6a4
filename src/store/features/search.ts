/**
 * Find and replace.
 * Matches are per line and non-overlapping, reported in original-text columns
 * even when case folding changes the length of the text.
 */

import type { Caret, Position, SearchMatch, SearchSnapshot } from '../../types/state.ts';
import type { ReadonlyTextBuffer, TextBuffer } from '../core/text-buffer.ts';
import type { CommandHistory } from './history.ts';
import { codeUnitOffset } from '../../types/branded.ts';
import { comparePositions, position } from '../core/text-buffer.ts';
import { charCount, codeUnitToColumn } from '../core/unicode.ts';
import { Commands } from './commands.ts';

// =============================================================================
// Matching
// =============================================================================

/**
 * Lower-cased line with a mapping from folded code units back to columns.
 */
interface FoldedLine {
  readonly text: string;
  /** Column of the character each folded code unit came from */
  readonly startColumn: readonly number[];
}

function foldLine(line: string): FoldedLine {
  let text = '';
  const startColumn: number[] = [];
  let column = 0;

  for (const char of line) {
    const folded = char.toLowerCase();
    text += folded;
    for (let i = 0; i < folded.length; i++) {
      startColumn.push(column);
    }
    column++;
  }

  return { text, startColumn };
}

function matchesInLine(line: string, lineIndex: number, query: string, caseSensitive: boolean): SearchMatch[] {
  const found: SearchMatch[] = [];

  if (caseSensitive) {
    const length = charCount(query);
    let from = 0;
    for (let index = line.indexOf(query, from); index !== -1; index = line.indexOf(query, from)) {
      found.push(Object.freeze({ line: lineIndex, column: codeUnitToColumn(line, codeUnitOffset(index)), length }));
      from = index + query.length;
    }
    return found;
  }

  const folded = foldLine(line);
  const needle = foldLine(query).text;
  let from = 0;
  for (let index = folded.text.indexOf(needle, from); index !== -1; index = folded.text.indexOf(needle, from)) {
    const column = folded.startColumn[index] ?? 0;
    const endColumn = (folded.startColumn[index + needle.length - 1] ?? column) + 1;
    found.push(Object.freeze({ line: lineIndex, column, length: endColumn - column }));
    from = index + needle.length;
  }
  return found;
}

/**
 * Find every match of `query`, line by line, left to right.
 * An empty query matches nothing.
 */
export function findMatches(buffer: ReadonlyTextBuffer, query: string, caseSensitive: boolean): SearchMatch[] {
  if (query.length === 0) return [];

  const matches: SearchMatch[] = [];
  for (let line = 0; line < buffer.lineCount(); line++) {
    matches.push(...matchesInLine(buffer.line(line), line, query, caseSensitive));
  }
  return matches;
}

/**
 * Start of a match as a position.
 */
export function matchStart(match: SearchMatch): Position {
  return position(match.line, match.column);
}

/**
 * End of a match as a position.
 */
export function matchEnd(match: SearchMatch): Position {
  return position(match.line, match.column + match.length);
}

// =============================================================================
// Search State
// =============================================================================

/**
 * Options for the search controller.
 */
export interface SearchStateOptions {
  /** Maximum matches exposed for display (default: 10000) */
  displayLimit?: number;
}

/**
 * Search panel state and match navigation.
 */
export interface SearchState {
  open(): void;
  openReplace(): void;
  close(): void;
  setQuery(query: string, buffer: ReadonlyTextBuffer): void;
  setReplaceWith(text: string): void;
  toggleCaseSensitive(buffer: ReadonlyTextBuffer): void;
  /** Re-scan the buffer, keeping the current index in range */
  updateMatches(buffer: ReadonlyTextBuffer): void;
  /** Advance circularly; no-op without matches */
  nextMatch(): void;
  /** Step back circularly; no-op without matches */
  previousMatch(): void;
  currentMatch(): SearchMatch | null;
  matchCount(): number;
  /** Make the match closest to `cursor` current, lines weighing far more than columns */
  selectMatchNearCursor(cursor: Position): void;
  /** Make the first match at or after `from` current, wrapping to the first match */
  selectMatchFrom(from: Position): void;
  /** Matches up to the display limit */
  displayedMatches(): readonly SearchMatch[];
  /** Frozen view for rendering */
  snapshot(): SearchSnapshot;

  readonly query: string;
  readonly replaceWith: string;
  readonly caseSensitive: boolean;
  readonly isOpen: boolean;
  readonly isReplaceMode: boolean;
  readonly currentMatchIndex: number | null;
}

export const DEFAULT_SEARCH_DISPLAY_LIMIT = 10000;

const LINE_DISTANCE_WEIGHT = 1000;

/**
 * Create a search controller.
 */
export function createSearchState(options: SearchStateOptions = {}): SearchState {
  const displayLimit = options.displayLimit ?? DEFAULT_SEARCH_DISPLAY_LIMIT;

  let query = '';
  let replaceWith = '';
  let caseSensitive = false;
  let isOpen = false;
  let isReplaceMode = false;
  let matches: SearchMatch[] = [];
  let currentMatchIndex: number | null = null;

  function updateMatches(buffer: ReadonlyTextBuffer): void {
    matches = findMatches(buffer, query, caseSensitive);
    if (matches.length === 0) {
      currentMatchIndex = null;
    } else if (currentMatchIndex === null) {
      currentMatchIndex = 0;
    } else if (currentMatchIndex >= matches.length) {
      currentMatchIndex = matches.length - 1;
    }
  }

  function displayedMatches(): readonly SearchMatch[] {
    return matches.length > displayLimit ? matches.slice(0, displayLimit) : matches;
  }

  return {
    open() {
      isOpen = true;
      isReplaceMode = false;
    },
    openReplace() {
      isOpen = true;
      isReplaceMode = true;
    },
    close() {
      isOpen = false;
    },
    setQuery(next, buffer) {
      query = next;
      updateMatches(buffer);
    },
    setReplaceWith(text) {
      replaceWith = text;
    },
    toggleCaseSensitive(buffer) {
      caseSensitive = !caseSensitive;
      updateMatches(buffer);
    },
    updateMatches,
    nextMatch() {
      if (matches.length === 0) return;
      currentMatchIndex = currentMatchIndex === null ? 0 : (currentMatchIndex + 1) % matches.length;
    },
    previousMatch() {
      if (matches.length === 0) return;
      currentMatchIndex =
        currentMatchIndex === null || currentMatchIndex === 0 ? matches.length - 1 : currentMatchIndex - 1;
    },
    currentMatch() {
      return currentMatchIndex === null ? null : (matches[currentMatchIndex] ?? null);
    },
    matchCount: () => matches.length,
    selectMatchNearCursor(cursor) {
      if (matches.length === 0) {
        currentMatchIndex = null;
        return;
      }
      let best = 0;
      let bestScore = Number.POSITIVE_INFINITY;
      matches.forEach((match, index) => {
        const score =
          Math.abs(match.line - cursor.line) * LINE_DISTANCE_WEIGHT + Math.abs(match.column - cursor.column);
        if (score < bestScore) {
          best = index;
          bestScore = score;
        }
      });
      currentMatchIndex = best;
    },
    selectMatchFrom(from) {
      if (matches.length === 0) {
        currentMatchIndex = null;
        return;
      }
      const index = matches.findIndex((match) => comparePositions(matchStart(match), from) >= 0);
      currentMatchIndex = index === -1 ? 0 : index;
    },
    displayedMatches,
    snapshot() {
      return Object.freeze({
        query,
        replaceWith,
        caseSensitive,
        isOpen,
        isReplaceMode,
        matches: displayedMatches(),
        currentMatchIndex,
      });
    },
    get query() {
      return query;
    },
    get replaceWith() {
      return replaceWith;
    },
    get caseSensitive() {
      return caseSensitive;
    },
    get isOpen() {
      return isOpen;
    },
    get isReplaceMode() {
      return isReplaceMode;
    },
    get currentMatchIndex() {
      return currentMatchIndex;
    },
  };
}

// =============================================================================
// Replace
// =============================================================================

/**
 * Replace the current match through history, refresh, and make the first
 * match after the replacement current so the inserted text is never matched
 * again on the next call.
 * @returns false when there is no current match
 */
export function replaceOne(
  search: SearchState,
  buffer: TextBuffer,
  caret: Caret,
  history: CommandHistory
): boolean {
  const match = search.currentMatch();
  if (match === null) return false;

  const command = Commands.replaceText(buffer, matchStart(match), match.length, search.replaceWith, caret.position);
  history.execute(command, buffer, caret);
  search.updateMatches(buffer);
  search.selectMatchFrom(command.cursorAfter);
  return true;
}

/**
 * Replace every match, ignoring the display limit, as one undo unit.
 * Matches are replaced back to front so earlier positions stay valid.
 * @returns The number of replacements
 */
export function replaceAll(
  search: SearchState,
  buffer: TextBuffer,
  caret: Caret,
  history: CommandHistory
): number {
  const all = findMatches(buffer, search.query, search.caseSensitive);
  if (all.length === 0) return 0;

  const cursorBefore = caret.position;
  const commands = all
    .slice()
    .reverse()
    .map((match) => Commands.replaceText(buffer, matchStart(match), match.length, search.replaceWith, cursorBefore));

  history.execute(Commands.composite('Replace all', commands), buffer, caret);
  search.updateMatches(buffer);
  return all.length;
}
