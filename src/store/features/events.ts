/**
 * Event system for the editing engine.
 * Provides a pub/sub mechanism for document changes and host requests.
 */

import type { CacheWindow, Position, SearchSnapshot, SelectionRange } from '../../types/state.ts';
import type { Command } from '../../types/commands.ts';

// =============================================================================
// Event Types
// =============================================================================

/**
 * Base event interface.
 */
export interface EditorEvent {
  readonly type: string;
  readonly timestamp: number;
}

/**
 * What produced a content change.
 */
export type ContentChangeReason = 'edit' | 'undo' | 'redo' | 'reset';

/**
 * Fired when document content changes.
 */
export interface ContentChangeEvent extends EditorEvent {
  readonly type: 'content-change';
  readonly reason: ContentChangeReason;
  /** The command applied, or null for undo/redo and content resets */
  readonly command: Command | null;
  /** Line count after the change */
  readonly lineCount: number;
}

/**
 * Fired when the cursor or selection changes.
 */
export interface SelectionChangeEvent extends EditorEvent {
  readonly type: 'selection-change';
  readonly cursor: Position;
  readonly selection: SelectionRange | null;
}

/**
 * Fired when undo/redo occurs.
 */
export interface HistoryChangeEvent extends EditorEvent {
  readonly type: 'history-change';
  readonly direction: 'undo' | 'redo';
  readonly canUndo: boolean;
  readonly canRedo: boolean;
}

/**
 * Fired when the document is marked saved.
 */
export interface SaveEvent extends EditorEvent {
  readonly type: 'save';
  readonly content: string;
}

/**
 * Fired when the modified flag flips.
 */
export interface DirtyChangeEvent extends EditorEvent {
  readonly type: 'dirty-change';
  readonly isDirty: boolean;
}

/**
 * Fired when the query, options, panel state or matches change.
 */
export interface SearchChangeEvent extends EditorEvent {
  readonly type: 'search-change';
  readonly search: SearchSnapshot;
}

/**
 * Fired when rendered lines must be re-derived.
 */
export interface CacheInvalidateEvent extends EditorEvent {
  readonly type: 'cache-invalidate';
  readonly window: CacheWindow;
}

/**
 * Asks the host to scroll so the cursor stays in view.
 */
export interface ScrollRequestEvent extends EditorEvent {
  readonly type: 'scroll-request';
  readonly scrollOffset: number;
}

/**
 * Asks the host to put text on the clipboard.
 */
export interface ClipboardWriteEvent extends EditorEvent {
  readonly type: 'clipboard-write';
  readonly text: string;
}

/**
 * Asks the host to read the clipboard and answer with a PASTE intent carrying
 * the text.
 */
export interface ClipboardRequestEvent extends EditorEvent {
  readonly type: 'clipboard-request';
}

/**
 * Union of all editor events.
 */
export type AnyEditorEvent =
  | ContentChangeEvent
  | SelectionChangeEvent
  | HistoryChangeEvent
  | SaveEvent
  | DirtyChangeEvent
  | SearchChangeEvent
  | CacheInvalidateEvent
  | ScrollRequestEvent
  | ClipboardWriteEvent
  | ClipboardRequestEvent;

/**
 * Event type to handler mapping.
 */
export interface EditorEventMap {
  'content-change': ContentChangeEvent;
  'selection-change': SelectionChangeEvent;
  'history-change': HistoryChangeEvent;
  'save': SaveEvent;
  'dirty-change': DirtyChangeEvent;
  'search-change': SearchChangeEvent;
  'cache-invalidate': CacheInvalidateEvent;
  'scroll-request': ScrollRequestEvent;
  'clipboard-write': ClipboardWriteEvent;
  'clipboard-request': ClipboardRequestEvent;
}

// =============================================================================
// Event Handler Types
// =============================================================================

/**
 * Handler function for a specific event type.
 */
export type EventHandler<T extends AnyEditorEvent> = (event: T) => void;

/**
 * Unsubscribe function returned by addEventListener.
 */
export type Unsubscribe = () => void;

// =============================================================================
// Event Emitter
// =============================================================================

/**
 * Type-safe emitter for editor events.
 */
export interface EditorEventEmitter {
  /**
   * Add an event listener for a specific event type.
   * @returns Unsubscribe function
   */
  addEventListener<K extends keyof EditorEventMap>(type: K, handler: EventHandler<EditorEventMap[K]>): Unsubscribe;

  /**
   * Remove an event listener.
   */
  removeEventListener<K extends keyof EditorEventMap>(type: K, handler: EventHandler<EditorEventMap[K]>): void;

  /**
   * Emit an event to all registered handlers.
   * A throwing handler is logged and does not stop the others.
   */
  emit<K extends keyof EditorEventMap>(type: K, event: EditorEventMap[K]): void;

  /**
   * Whether any handler listens for `type`.
   */
  hasListeners(type: keyof EditorEventMap): boolean;

  /**
   * Remove all event listeners.
   */
  removeAllListeners(): void;
}

/**
 * Create a new editor event emitter.
 */
export function createEventEmitter(): EditorEventEmitter {
  const handlers = new Map<keyof EditorEventMap, Set<EventHandler<AnyEditorEvent>>>();

  function removeEventListener<K extends keyof EditorEventMap>(
    type: K,
    handler: EventHandler<EditorEventMap[K]>
  ): void {
    const typeHandlers = handlers.get(type);
    if (typeHandlers) {
      typeHandlers.delete(handler as EventHandler<AnyEditorEvent>);
      if (typeHandlers.size === 0) {
        handlers.delete(type);
      }
    }
  }

  return {
    addEventListener<K extends keyof EditorEventMap>(
      type: K,
      handler: EventHandler<EditorEventMap[K]>
    ): Unsubscribe {
      let typeHandlers = handlers.get(type);
      if (!typeHandlers) {
        typeHandlers = new Set();
        handlers.set(type, typeHandlers);
      }
      typeHandlers.add(handler as EventHandler<AnyEditorEvent>);
      return () => removeEventListener(type, handler);
    },

    removeEventListener,

    emit<K extends keyof EditorEventMap>(type: K, event: EditorEventMap[K]): void {
      const typeHandlers = handlers.get(type);
      if (!typeHandlers) return;
      for (const handler of [...typeHandlers]) {
        try {
          handler(event);
        } catch (error) {
          console.error(`Event handler error for '${type}':`, error);
        }
      }
    },

    hasListeners(type: keyof EditorEventMap): boolean {
      return (handlers.get(type)?.size ?? 0) > 0;
    },

    removeAllListeners(): void {
      handlers.clear();
    },
  };
}

// =============================================================================
// Event Helpers
// =============================================================================

export function createContentChangeEvent(
  reason: ContentChangeReason,
  command: Command | null,
  lineCount: number
): ContentChangeEvent {
  return Object.freeze({ type: 'content-change', timestamp: Date.now(), reason, command, lineCount });
}

export function createSelectionChangeEvent(cursor: Position, selection: SelectionRange | null): SelectionChangeEvent {
  return Object.freeze({ type: 'selection-change', timestamp: Date.now(), cursor, selection });
}

export function createHistoryChangeEvent(
  direction: 'undo' | 'redo',
  canUndo: boolean,
  canRedo: boolean
): HistoryChangeEvent {
  return Object.freeze({ type: 'history-change', timestamp: Date.now(), direction, canUndo, canRedo });
}

export function createSaveEvent(content: string): SaveEvent {
  return Object.freeze({ type: 'save', timestamp: Date.now(), content });
}

export function createDirtyChangeEvent(isDirty: boolean): DirtyChangeEvent {
  return Object.freeze({ type: 'dirty-change', timestamp: Date.now(), isDirty });
}

export function createSearchChangeEvent(search: SearchSnapshot): SearchChangeEvent {
  return Object.freeze({ type: 'search-change', timestamp: Date.now(), search });
}

export function createCacheInvalidateEvent(window: CacheWindow): CacheInvalidateEvent {
  return Object.freeze({ type: 'cache-invalidate', timestamp: Date.now(), window });
}

export function createScrollRequestEvent(scrollOffset: number): ScrollRequestEvent {
  return Object.freeze({ type: 'scroll-request', timestamp: Date.now(), scrollOffset });
}

export function createClipboardWriteEvent(text: string): ClipboardWriteEvent {
  return Object.freeze({ type: 'clipboard-write', timestamp: Date.now(), text });
}

export function createClipboardRequestEvent(): ClipboardRequestEvent {
  return Object.freeze({ type: 'clipboard-request', timestamp: Date.now() });
}
