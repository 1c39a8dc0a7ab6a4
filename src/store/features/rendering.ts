/**
 * Viewport utilities for virtualized display.
 * The cache window manager decides when a scroll or resize must invalidate
 * the rendered line range; small scrolls inside the safety margin do not.
 */

import type { CacheWindow, ViewportState } from '../../types/state.ts';
import type { ReadonlyTextBuffer } from '../core/text-buffer.ts';

// =============================================================================
// Types
// =============================================================================

/**
 * Information about a visible line for rendering.
 */
export interface VisibleLine {
  /** Line number (0-indexed) */
  readonly lineNumber: number;
  /** Text content of the line */
  readonly content: string;
}

/**
 * Scroll position information.
 */
export interface ScrollPosition {
  /** Scroll offset from top in pixels */
  readonly scrollTop: number;
  /** Height of a single line in pixels */
  readonly lineHeight: number;
  /** Height of the viewport in pixels */
  readonly viewportHeight: number;
}

/**
 * Result of feeding a viewport change to the cache window manager.
 */
export interface CacheWindowUpdate {
  /** Whether the window moved and the render cache must be dropped */
  readonly invalidated: boolean;
  readonly window: CacheWindow;
}

export interface CacheWindowOptions {
  /** Fixed line height in pixels */
  readonly lineHeight: number;
  /** Margin on each side, in multiples of the visible line count */
  readonly marginMultiplier: number;
  /** Size change in pixels that counts as a resize */
  readonly resizeEpsilon: number;
}

/**
 * Tracks the line range that may stay rendered.
 */
export interface CacheWindowManager {
  /** Feed a scroll or resize. */
  update(viewport: ViewportState): CacheWindowUpdate;
  /** Force the next update to re-window (e.g. after a content reset). */
  invalidate(): void;
  readonly window: CacheWindow;
}

// =============================================================================
// Viewport Calculations
// =============================================================================

/**
 * Calculate which lines are visible given a scroll position.
 * `endLine` is inclusive and clamped to the document.
 */
export function getVisibleLineRange(
  scroll: ScrollPosition,
  totalLines: number,
  overscan: number = 5
): { startLine: number; endLine: number } {
  const { scrollTop, lineHeight, viewportHeight } = scroll;

  const firstVisibleLine = Math.floor(Math.max(0, scrollTop) / lineHeight);
  const visibleLineCount = Math.ceil(viewportHeight / lineHeight);
  const lastVisibleLine = firstVisibleLine + visibleLineCount;

  const startLine = Math.max(0, Math.min(firstVisibleLine - overscan, totalLines - 1));
  const endLine = Math.max(0, Math.min(totalLines - 1, lastVisibleLine + overscan));

  return { startLine, endLine };
}

/**
 * Line contents for `[startLine, endLine)`, clamped to the document.
 */
export function getVisibleLines(buffer: ReadonlyTextBuffer, range: CacheWindow): VisibleLine[] {
  const first = Math.max(0, range.startLine);
  const last = Math.min(buffer.lineCount(), range.endLine);
  const lines: VisibleLine[] = [];

  for (let lineNumber = first; lineNumber < last; lineNumber++) {
    lines.push(Object.freeze({ lineNumber, content: buffer.line(lineNumber) }));
  }

  return lines;
}

/**
 * Scroll offset that brings the cursor line back into view with
 * `marginLines` lines of context above or below.
 * @returns The new offset, or null when the cursor is already comfortably visible
 */
export function computeScrollToCursor(
  cursorLine: number,
  viewport: Pick<ViewportState, 'scrollOffset' | 'viewportHeight'>,
  lineHeight: number,
  marginLines: number
): number | null {
  const cursorTop = cursorLine * lineHeight;
  const margin = marginLines * lineHeight;
  const viewportTop = viewport.scrollOffset;
  const viewportBottom = viewport.scrollOffset + viewport.viewportHeight;

  let target: number | null = null;
  if (cursorTop < viewportTop + margin) {
    target = Math.max(0, cursorTop - margin);
  } else if (cursorTop + lineHeight > viewportBottom - margin) {
    target = cursorTop + lineHeight + margin - viewport.viewportHeight;
  }
  return target === viewportTop ? null : target;
}

// =============================================================================
// Cache Window Manager
// =============================================================================

const DEGENERATE_WINDOW: CacheWindow = Object.freeze({ startLine: 0, endLine: 0 });

/**
 * Create a cache window manager.
 * The window starts degenerate, so the first update always establishes one.
 */
export function createCacheWindowManager(options: CacheWindowOptions): CacheWindowManager {
  const { lineHeight, marginMultiplier, resizeEpsilon } = options;

  let window: CacheWindow = DEGENERATE_WINDOW;
  let lastWidth: number | null = null;
  let lastHeight: number | null = null;

  function update(viewport: ViewportState): CacheWindowUpdate {
    const scrollOffset = Number.isFinite(viewport.scrollOffset) ? Math.max(0, viewport.scrollOffset) : 0;
    const { viewportWidth, viewportHeight } = viewport;

    const visibleLineCount = Math.ceil(viewportHeight / lineHeight) + 2;
    const firstVisibleLine = Math.floor(scrollOffset / lineHeight);
    const lastVisibleLine = firstVisibleLine + visibleLineCount;
    const margin = visibleLineCount * marginMultiplier;

    const resized =
      lastWidth !== null &&
      lastHeight !== null &&
      (Math.abs(viewportWidth - lastWidth) > resizeEpsilon || Math.abs(viewportHeight - lastHeight) > resizeEpsilon);
    lastWidth = viewportWidth;
    lastHeight = viewportHeight;

    const degenerate = window.endLine <= window.startLine;
    const crossedTop = window.startLine > 0 && firstVisibleLine < window.startLine + margin / 2;
    const crossedBottom = lastVisibleLine > window.endLine - margin / 2;

    if (degenerate || crossedTop || crossedBottom || resized) {
      window = Object.freeze({
        startLine: Math.max(0, firstVisibleLine - margin),
        endLine: lastVisibleLine + margin,
      });
      return { invalidated: true, window };
    }

    return { invalidated: false, window };
  }

  return {
    update,
    invalidate() {
      window = DEGENERATE_WINDOW;
    },
    get window() {
      return window;
    },
  };
}
