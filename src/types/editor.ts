/**
 * Editor interface for the editing engine.
 * Framework-agnostic: hosts subscribe for change notifications and read an
 * immutable snapshot, in the manner of React's useSyncExternalStore.
 */

import type {
  CacheWindow,
  EditorConfig,
  Position,
  PreeditState,
  SearchSnapshot,
  SelectionRange,
  ViewportState,
} from './state.ts';
import type { EditorIntent } from './intents.ts';
import type { ReadonlyTextBuffer } from '../store/core/text-buffer.ts';
import type { EditorEventMap, EventHandler } from '../store/features/events.ts';
import type { Point } from '../store/features/cursor.ts';
import type { VisibleLine } from '../store/features/rendering.ts';

/**
 * Listener function type for editor subscriptions.
 */
export type EditorListener = () => void;

/**
 * Unsubscribe function returned by subscribe.
 */
export type Unsubscribe = () => void;

/**
 * Immutable view of everything the renderer needs besides line text.
 */
export interface EditorSnapshot {
  /** Incremented on every state change */
  readonly version: number;
  readonly lineCount: number;
  readonly cursor: Position;
  readonly selection: SelectionRange | null;
  readonly search: SearchSnapshot;
  readonly viewport: ViewportState;
  readonly cacheWindow: CacheWindow;
  readonly preedit: PreeditState | null;
  readonly isModified: boolean;
  readonly canUndo: boolean;
  readonly canRedo: boolean;
}

/**
 * The editing engine facade.
 */
export interface Editor {
  /**
   * Subscribe to state changes.
   * The listener is called once per dispatched intent that changed anything.
   * @returns Unsubscribe function to remove the listener
   */
  subscribe(listener: EditorListener): Unsubscribe;

  /**
   * Get the current snapshot.
   * Returns the same reference while nothing has changed.
   */
  getSnapshot(): EditorSnapshot;

  /**
   * Process one intent synchronously.
   * Invalid intents are logged and ignored.
   * @returns The snapshot after the intent
   */
  dispatch(intent: EditorIntent): EditorSnapshot;

  /**
   * Subscribe to typed editor events.
   * @returns Unsubscribe function
   */
  addEventListener<K extends keyof EditorEventMap>(type: K, handler: EventHandler<EditorEventMap[K]>): Unsubscribe;

  /**
   * Remove a typed event listener.
   */
  removeEventListener<K extends keyof EditorEventMap>(type: K, handler: EventHandler<EditorEventMap[K]>): void;

  /** Read-only document access for the renderer */
  readonly buffer: ReadonlyTextBuffer;

  /** Resolved configuration */
  readonly config: Readonly<Required<EditorConfig>>;

  /** Text of the current selection, or null when nothing is selected */
  selectedText(): string | null;

  /** Lines inside the current cache window */
  visibleLines(): VisibleLine[];

  /** Map a viewport point to a document position using the configured metrics */
  pointToPosition(point: Point): Position | null;

  /** Full document text */
  content(): string;

  /** Replace the document, resetting history, cursor and selection */
  setContent(content: string): void;

  /** Record the current state as saved */
  markSaved(): void;

  isModified(): boolean;
  canUndo(): boolean;
  canRedo(): boolean;
}
