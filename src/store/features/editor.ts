/**
 * Editor facade.
 * Owns the buffer, cursor, history, search and cache window, and turns each
 * dispatched intent into commands, cursor updates and events.
 */

import type {
  CursorState,
  EditorConfig,
  Position,
  PreeditState,
  SelectionRange,
  ViewportState,
} from '../../types/state.ts';
import type { Command } from '../../types/commands.ts';
import type { EditorIntent } from '../../types/intents.ts';
import type { Editor, EditorListener, EditorSnapshot } from '../../types/editor.ts';
import type { ContentChangeReason } from './events.ts';
import { validateIntent } from '../../types/intents.ts';
import { resolveEditorConfig } from '../core/config.ts';
import { createTextBuffer, position, positionsEqual } from '../core/text-buffer.ts';
import { Commands } from './commands.ts';
import { createCommandHistory } from './history.ts';
import {
  applyMovement,
  documentEnd,
  documentStart,
  lineEnd,
  lineStart,
  moveCursor,
  pageDown,
  pageUp,
  pointToPosition,
} from './cursor.ts';
import { getSelectedText, getSelection, selectAll } from './selection.ts';
import { createSearchState, matchEnd, matchStart, replaceAll, replaceOne } from './search.ts';
import { computeScrollToCursor, createCacheWindowManager, getVisibleLines } from './rendering.ts';
import {
  createCacheInvalidateEvent,
  createClipboardRequestEvent,
  createClipboardWriteEvent,
  createContentChangeEvent,
  createDirtyChangeEvent,
  createEventEmitter,
  createHistoryChangeEvent,
  createSaveEvent,
  createScrollRequestEvent,
  createSearchChangeEvent,
  createSelectionChangeEvent,
} from './events.ts';

const TYPING_GROUP = 'Typing';

function sameAnchor(a: Position | null, b: Position | null): boolean {
  if (a === null || b === null) return a === b;
  return positionsEqual(a, b);
}

/**
 * What one dispatch changed, collected while handling the intent.
 */
interface PendingChanges {
  content: { reason: ContentChangeReason; command: Command | null } | null;
  /** Matches already refreshed by the handler */
  searchRefreshed: boolean;
  search: boolean;
  /** Bring the cursor into view once handling is done */
  reveal: boolean;
  /** State the snapshot carries changed (viewport, preedit) */
  other: boolean;
}

/**
 * Create an editor.
 *
 * @example
 * ```typescript
 * const editor = createEditor({ content: 'Hello' });
 * editor.dispatch(EditorIntents.documentEnd());
 * editor.dispatch(EditorIntents.characterInput('!'));
 * editor.content(); // 'Hello!'
 * ```
 */
export function createEditor(options: Partial<EditorConfig> = {}): Editor {
  const config = resolveEditorConfig(options);

  const buffer = createTextBuffer(config.content);
  const cursor: CursorState = { position: position(0, 0), anchor: null };
  const history = createCommandHistory({ maxSize: config.historyLimit });
  const search = createSearchState({ displayLimit: config.searchDisplayLimit });
  const cache = createCacheWindowManager({
    lineHeight: config.lineHeight,
    marginMultiplier: config.cacheMarginMultiplier,
    resizeEpsilon: config.resizeEpsilon,
  });
  const emitter = createEventEmitter();
  const listeners = new Set<EditorListener>();

  let viewport: ViewportState = Object.freeze({
    scrollOffset: 0,
    viewportWidth: config.viewportWidth,
    viewportHeight: config.viewportHeight,
  });
  cache.update(viewport);

  let preedit: PreeditState | null = null;
  let isDragging = false;
  let version = 0;
  let snapshot: EditorSnapshot | null = null;

  // ===========================================================================
  // Helpers
  // ===========================================================================

  function selection(): SelectionRange | null {
    return getSelection(cursor);
  }

  function notifyListeners(): void {
    for (const listener of [...listeners]) {
      try {
        listener();
      } catch (error) {
        console.error('Editor listener error:', error);
      }
    }
  }

  function apply(command: Command, changes: PendingChanges): void {
    history.execute(command, buffer, cursor);
    cursor.anchor = null;
    changes.content = { reason: 'edit', command };
    changes.reveal = true;
  }

  /**
   * Insert at the cursor, replacing the selection in the same undo unit.
   */
  function replaceSelection(
    label: string,
    build: (at: Position, cursorBefore: Position) => Command,
    changes: PendingChanges
  ): void {
    const range = selection();
    if (range === null) {
      apply(build(cursor.position, cursor.position), changes);
      return;
    }
    const removal = Commands.deleteRange(buffer, range.start, range.end, cursor.position);
    apply(Commands.composite(label, [removal, build(range.start, range.start)]), changes);
  }

  function deleteSelection(changes: PendingChanges): boolean {
    const range = selection();
    if (range === null) return false;
    apply(Commands.deleteRange(buffer, range.start, range.end, cursor.position), changes);
    return true;
  }

  function move(target: Position, extend: boolean, changes: PendingChanges): void {
    applyMovement(cursor, target, extend);
    changes.reveal = true;
  }

  function selectCurrentMatch(changes: PendingChanges): void {
    const match = search.currentMatch();
    if (match === null) return;
    cursor.anchor = matchStart(match);
    cursor.position = matchEnd(match);
    changes.reveal = true;
  }

  function undoOrRedo(direction: 'undo' | 'redo', changes: PendingChanges): void {
    const done = direction === 'undo' ? history.undo(buffer, cursor) : history.redo(buffer, cursor);
    if (!done) return;
    cursor.anchor = null;
    changes.content = { reason: direction, command: null };
    changes.reveal = true;
    emitter.emit('history-change', createHistoryChangeEvent(direction, history.canUndo(), history.canRedo()));
  }

  // ===========================================================================
  // Intent Handling
  // ===========================================================================

  function handle(intent: EditorIntent, changes: PendingChanges): void {
    switch (intent.type) {
      case 'CHARACTER_INPUT': {
        const char = intent.char;
        if (!history.isGrouping) {
          history.beginGroup(TYPING_GROUP);
        }
        replaceSelection(TYPING_GROUP, (at, before) => Commands.insertChar(buffer, at, char, before), changes);
        return;
      }

      case 'BACKSPACE': {
        if (deleteSelection(changes)) return;
        const command = Commands.deleteChar(buffer, cursor.position);
        if (command.deletedText !== '') apply(command, changes);
        return;
      }

      case 'DELETE': {
        if (deleteSelection(changes)) return;
        const command = Commands.deleteForward(buffer, cursor.position);
        if (command.deletedText !== '') apply(command, changes);
        return;
      }

      case 'ENTER':
        replaceSelection('Insert line break', (at, before) => Commands.insertNewline(buffer, at, before), changes);
        return;

      case 'TAB': {
        const indent = ' '.repeat(config.tabSize);
        replaceSelection('Indent', (at, before) => Commands.insertText(buffer, at, indent, before), changes);
        return;
      }

      case 'ARROW_MOVE':
        move(moveCursor(buffer, cursor.position, intent.direction), intent.extend, changes);
        return;

      case 'HOME':
        move(lineStart(buffer, cursor.position), intent.extend, changes);
        return;

      case 'END':
        move(lineEnd(buffer, cursor.position), intent.extend, changes);
        return;

      case 'DOCUMENT_START':
        move(documentStart(), intent.extend, changes);
        return;

      case 'DOCUMENT_END':
        move(documentEnd(buffer), intent.extend, changes);
        return;

      case 'PAGE_UP':
        move(pageUp(buffer, cursor.position, viewport.viewportHeight, config.lineHeight), false, changes);
        return;

      case 'PAGE_DOWN':
        move(pageDown(buffer, cursor.position, viewport.viewportHeight, config.lineHeight), false, changes);
        return;

      case 'MOUSE_CLICK': {
        const target = buffer.clampPosition(intent.position);
        cursor.position = target;
        cursor.anchor = target;
        isDragging = true;
        return;
      }

      case 'MOUSE_DRAG':
        if (isDragging) {
          cursor.position = buffer.clampPosition(intent.position);
        }
        return;

      case 'MOUSE_RELEASE':
        isDragging = false;
        if (cursor.anchor !== null && positionsEqual(cursor.anchor, cursor.position)) {
          cursor.anchor = null;
        }
        return;

      case 'SELECT_ALL': {
        const all = selectAll(buffer);
        cursor.anchor = all.anchor;
        cursor.position = all.position;
        return;
      }

      case 'COPY': {
        const text = getSelectedText(buffer, selection());
        if (text !== null) {
          emitter.emit('clipboard-write', createClipboardWriteEvent(text));
        }
        return;
      }

      case 'CUT': {
        const text = getSelectedText(buffer, selection());
        if (text === null) return;
        emitter.emit('clipboard-write', createClipboardWriteEvent(text));
        deleteSelection(changes);
        return;
      }

      case 'PASTE': {
        const text = intent.text;
        if (text === undefined) {
          emitter.emit('clipboard-request', createClipboardRequestEvent());
          return;
        }
        if (text === '') return;
        replaceSelection('Paste', (at, before) => Commands.insertText(buffer, at, text, before), changes);
        return;
      }

      case 'UNDO':
        undoOrRedo('undo', changes);
        return;

      case 'REDO':
        undoOrRedo('redo', changes);
        return;

      case 'OPEN_SEARCH':
        search.open();
        changes.search = true;
        return;

      case 'OPEN_REPLACE':
        search.openReplace();
        changes.search = true;
        return;

      case 'CLOSE_SEARCH':
        search.close();
        changes.search = true;
        return;

      case 'SEARCH_QUERY_CHANGED':
        search.setQuery(intent.query, buffer);
        changes.search = true;
        return;

      case 'REPLACE_TEXT_CHANGED':
        search.setReplaceWith(intent.text);
        changes.search = true;
        return;

      case 'TOGGLE_CASE_SENSITIVE':
        search.toggleCaseSensitive(buffer);
        changes.search = true;
        return;

      case 'FIND_NEXT':
        search.nextMatch();
        selectCurrentMatch(changes);
        changes.search = true;
        return;

      case 'FIND_PREVIOUS':
        search.previousMatch();
        selectCurrentMatch(changes);
        changes.search = true;
        return;

      case 'REPLACE_NEXT':
        if (replaceOne(search, buffer, cursor, history)) {
          cursor.anchor = null;
          changes.content = { reason: 'edit', command: null };
          changes.searchRefreshed = true;
          changes.search = true;
          changes.reveal = true;
        }
        return;

      case 'REPLACE_ALL':
        if (replaceAll(search, buffer, cursor, history) > 0) {
          cursor.anchor = null;
          changes.content = { reason: 'edit', command: null };
          changes.searchRefreshed = true;
          changes.search = true;
          changes.reveal = true;
        }
        return;

      case 'SCROLLED': {
        viewport = Object.freeze({
          scrollOffset: Math.max(0, intent.scrollOffset),
          viewportWidth: intent.viewportWidth,
          viewportHeight: intent.viewportHeight,
        });
        const result = cache.update(viewport);
        if (result.invalidated) {
          emitter.emit('cache-invalidate', createCacheInvalidateEvent(result.window));
        }
        changes.other = true;
        return;
      }

      case 'IME_PREEDIT':
        preedit = intent.text === '' ? null : Object.freeze({ text: intent.text, position: cursor.position });
        changes.other = true;
        return;

      case 'IME_COMMIT': {
        const text = intent.text;
        preedit = null;
        changes.other = true;
        if (text === '') return;
        replaceSelection('Input method', (at, before) => Commands.insertText(buffer, at, text, before), changes);
        return;
      }
    }
  }

  // ===========================================================================
  // Change Propagation
  // ===========================================================================

  function finish(
    changes: PendingChanges,
    before: { cursor: Position; anchor: Position | null; modified: boolean }
  ): void {
    if (changes.content !== null) {
      if (search.query !== '' && !changes.searchRefreshed) {
        search.updateMatches(buffer);
        search.selectMatchNearCursor(cursor.position);
        changes.search = true;
      }
      emitter.emit(
        'content-change',
        createContentChangeEvent(changes.content.reason, changes.content.command, buffer.lineCount())
      );
      emitter.emit('cache-invalidate', createCacheInvalidateEvent(cache.window));
    }

    const selectionChanged =
      !positionsEqual(before.cursor, cursor.position) || !sameAnchor(before.anchor, cursor.anchor);
    if (selectionChanged) {
      emitter.emit('selection-change', createSelectionChangeEvent(cursor.position, selection()));
    }

    if (changes.reveal && selectionChanged) {
      const scrollOffset = computeScrollToCursor(
        cursor.position.line,
        viewport,
        config.lineHeight,
        config.scrollMarginLines
      );
      if (scrollOffset !== null) {
        emitter.emit('scroll-request', createScrollRequestEvent(scrollOffset));
      }
    }

    if (changes.search) {
      emitter.emit('search-change', createSearchChangeEvent(search.snapshot()));
    }

    const modified = history.isModified();
    if (modified !== before.modified) {
      emitter.emit('dirty-change', createDirtyChangeEvent(modified));
    }

    if (
      changes.content !== null ||
      changes.search ||
      changes.other ||
      selectionChanged ||
      modified !== before.modified
    ) {
      version++;
      snapshot = null;
      notifyListeners();
    }
  }

  function freshChanges(): PendingChanges {
    return { content: null, searchRefreshed: false, search: false, reveal: false, other: false };
  }

  function captureBefore(): { cursor: Position; anchor: Position | null; modified: boolean } {
    return { cursor: cursor.position, anchor: cursor.anchor, modified: history.isModified() };
  }

  // ===========================================================================
  // Public API
  // ===========================================================================

  function getSnapshot(): EditorSnapshot {
    if (snapshot === null) {
      snapshot = Object.freeze({
        version,
        lineCount: buffer.lineCount(),
        cursor: cursor.position,
        selection: selection(),
        search: search.snapshot(),
        viewport,
        cacheWindow: cache.window,
        preedit,
        isModified: history.isModified(),
        canUndo: history.canUndo(),
        canRedo: history.canRedo(),
      });
    }
    return snapshot;
  }

  function dispatch(intent: EditorIntent): EditorSnapshot {
    const validation = validateIntent(intent);
    if (!validation.valid) {
      console.warn('Ignoring invalid intent:', validation.errors);
      return getSnapshot();
    }

    const before = captureBefore();
    if (intent.type !== 'CHARACTER_INPUT') {
      history.endGroup();
    }

    const changes = freshChanges();
    handle(intent, changes);
    finish(changes, before);
    return getSnapshot();
  }

  function setContent(content: string): void {
    const before = captureBefore();
    const changes = freshChanges();

    buffer.setContent(content);
    history.clear();
    cursor.position = position(0, 0);
    cursor.anchor = null;
    preedit = null;
    isDragging = false;
    cache.invalidate();
    cache.update(viewport);

    changes.content = { reason: 'reset', command: null };
    changes.other = true;
    finish(changes, before);
  }

  function markSaved(): void {
    const before = captureBefore();
    history.markSaved();
    emitter.emit('save', createSaveEvent(buffer.toString()));
    finish(freshChanges(), before);
  }

  return {
    subscribe(listener: EditorListener) {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
    getSnapshot,
    dispatch,
    addEventListener: emitter.addEventListener,
    removeEventListener: emitter.removeEventListener,
    buffer,
    config,
    selectedText: () => getSelectedText(buffer, selection()),
    visibleLines: () => getVisibleLines(buffer, cache.window),
    pointToPosition: (point) => pointToPosition(point, config, viewport.scrollOffset, buffer),
    content: () => buffer.toString(),
    setContent,
    markSaved,
    isModified: () => history.isModified(),
    canUndo: () => history.canUndo(),
    canRedo: () => history.canRedo(),
  };
}
