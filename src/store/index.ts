/**
 * Store exports for the editing engine.
 */

// Editor facade
export { createEditor } from './features/editor.ts';

// Intent creators
export { EditorIntents } from './features/intents.ts';

// Configuration
export { DEFAULT_EDITOR_CONFIG, resolveEditorConfig } from './core/config.ts';

// Text buffer
export {
  createTextBuffer,
  position,
  comparePositions,
  positionsEqual,
  endOfInsertion,
} from './core/text-buffer.ts';
export type { ReadonlyTextBuffer, TextBuffer } from './core/text-buffer.ts';

// Unicode column helpers
export {
  charCount,
  columnToCodeUnit,
  codeUnitToColumn,
  sliceColumns,
  charAtColumn,
  splitLines,
} from './core/unicode.ts';

// Commands and history
export { Commands, commandLabel } from './features/commands.ts';
export { executeCommand, undoCommand } from './features/executor.ts';
export { createCommandHistory, DEFAULT_HISTORY_LIMIT } from './features/history.ts';
export type { CommandHistory, CommandHistoryOptions } from './features/history.ts';

// Cursor and selection
export {
  moveCursor,
  lineStart,
  lineEnd,
  documentStart,
  documentEnd,
  linesPerPage,
  pageUp,
  pageDown,
  applyMovement,
  pointToPosition,
} from './features/cursor.ts';
export type { Point, TextMetrics } from './features/cursor.ts';
export { normalizeSelection, getSelection, getSelectedText, selectAll } from './features/selection.ts';

// Search
export {
  findMatches,
  matchStart,
  matchEnd,
  createSearchState,
  replaceOne,
  replaceAll,
  DEFAULT_SEARCH_DISPLAY_LIMIT,
} from './features/search.ts';
export type { SearchState, SearchStateOptions } from './features/search.ts';

// Viewport
export {
  getVisibleLineRange,
  getVisibleLines,
  computeScrollToCursor,
  createCacheWindowManager,
} from './features/rendering.ts';
export type {
  VisibleLine,
  ScrollPosition,
  CacheWindowUpdate,
  CacheWindowOptions,
  CacheWindowManager,
} from './features/rendering.ts';

// Events
export {
  createEventEmitter,
  createContentChangeEvent,
  createSelectionChangeEvent,
  createHistoryChangeEvent,
  createSaveEvent,
  createDirtyChangeEvent,
  createSearchChangeEvent,
  createCacheInvalidateEvent,
  createScrollRequestEvent,
  createClipboardWriteEvent,
  createClipboardRequestEvent,
} from './features/events.ts';
export type {
  EditorEvent,
  ContentChangeReason,
  ContentChangeEvent,
  SelectionChangeEvent,
  HistoryChangeEvent,
  SaveEvent,
  DirtyChangeEvent,
  SearchChangeEvent,
  CacheInvalidateEvent,
  ScrollRequestEvent,
  ClipboardWriteEvent,
  ClipboardRequestEvent,
  AnyEditorEvent,
  EditorEventMap,
  EventHandler,
  EditorEventEmitter,
} from './features/events.ts';
