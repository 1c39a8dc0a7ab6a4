/**
 * Core state types for the editing engine.
 * Value types are read-only; the few mutable holders are spelled out explicitly.
 */

// =============================================================================
// Position Types
// =============================================================================

/**
 * A document position.
 * `column` counts Unicode scalar values from the start of the line, never bytes
 * or UTF-16 code units.
 */
export interface Position {
  /** Line index (0-based) */
  readonly line: number;
  /** Column (0-based, Unicode scalar offset) */
  readonly column: number;
}

/**
 * Mutable caret slot that commands write the resulting cursor into.
 * The editor's cursor state satisfies it; tests can pass a plain object.
 */
export interface Caret {
  position: Position;
}

// =============================================================================
// Selection Types
// =============================================================================

/**
 * A normalized selection range.
 * `start` precedes `end` in document order and the range is never empty.
 */
export interface SelectionRange {
  readonly start: Position;
  readonly end: Position;
}

/**
 * Cursor plus optional selection anchor.
 * The cursor is the moving end of the selection.
 */
export interface CursorState extends Caret {
  /** Where the selection started, or null when nothing is selected */
  anchor: Position | null;
}

/**
 * Direction for arrow-key movement.
 */
export type ArrowDirection = 'up' | 'down' | 'left' | 'right';

// =============================================================================
// Search Types
// =============================================================================

/**
 * A single search hit in original-text coordinates.
 */
export interface SearchMatch {
  readonly line: number;
  readonly column: number;
  /** Length of the matched text in columns */
  readonly length: number;
}

/**
 * Read-only view of the search state for rendering.
 */
export interface SearchSnapshot {
  readonly query: string;
  readonly replaceWith: string;
  readonly caseSensitive: boolean;
  readonly isOpen: boolean;
  readonly isReplaceMode: boolean;
  readonly matches: readonly SearchMatch[];
  readonly currentMatchIndex: number | null;
}

// =============================================================================
// Viewport Types
// =============================================================================

/**
 * Scroll and viewport geometry reported by the host.
 */
export interface ViewportState {
  /** Vertical scroll offset in pixels */
  readonly scrollOffset: number;
  /** Viewport width in pixels */
  readonly viewportWidth: number;
  /** Viewport height in pixels */
  readonly viewportHeight: number;
}

/**
 * The line range that may stay rendered without re-derivation.
 * `endLine` is exclusive and may exceed the document's line count.
 */
export interface CacheWindow {
  readonly startLine: number;
  readonly endLine: number;
}

/**
 * IME composition overlay. Display-only; it never reaches the buffer.
 */
export interface PreeditState {
  readonly text: string;
  /** Where the overlay is anchored */
  readonly position: Position;
}

// =============================================================================
// Configuration Types
// =============================================================================

/**
 * Configuration options for creating an editor.
 */
export interface EditorConfig {
  /** Initial document content */
  content?: string;
  /** Maximum undo entries (default: 1000) */
  historyLimit?: number;
  /** Spaces inserted by Tab (default: 4) */
  tabSize?: number;
  /** Fixed line height in pixels (default: 20) */
  lineHeight?: number;
  /** Monospace character width in pixels, for hit testing (default: 8.4) */
  charWidth?: number;
  /** Gutter width in pixels, for hit testing (default: 60) */
  gutterWidth?: number;
  /** Initial viewport width in pixels (default: 800) */
  viewportWidth?: number;
  /** Initial viewport height in pixels (default: 600) */
  viewportHeight?: number;
  /** Cache window margin, in multiples of the visible line count (default: 2) */
  cacheMarginMultiplier?: number;
  /** Viewport size change that counts as a resize, in pixels (default: 0.5) */
  resizeEpsilon?: number;
  /** Lines kept between the cursor and the viewport edge (default: 2) */
  scrollMarginLines?: number;
  /** Maximum matches exposed for display (default: 10000) */
  searchDisplayLimit?: number;
}
