/**
 * Tests for viewport utilities and the cache window manager.
 */

import { describe, it, expect } from 'vitest';
import { createTextBuffer } from '../core/text-buffer.ts';
import {
  createCacheWindowManager,
  getVisibleLineRange,
  getVisibleLines,
  computeScrollToCursor,
} from './rendering.ts';

// =============================================================================
// Helpers
// =============================================================================

const LINE_HEIGHT = 20;

function createManager() {
  return createCacheWindowManager({ lineHeight: LINE_HEIGHT, marginMultiplier: 2, resizeEpsilon: 0.5 });
}

/** Viewport 400px high: 22 visible lines, 44 lines of margin */
function at(line: number, viewportWidth = 800) {
  return { scrollOffset: line * LINE_HEIGHT, viewportWidth, viewportHeight: 400 };
}

// =============================================================================
// Cache Window Manager
// =============================================================================

describe('createCacheWindowManager', () => {
  it('should establish a window on the first update', () => {
    const manager = createManager();
    expect(manager.window).toEqual({ startLine: 0, endLine: 0 });

    const result = manager.update(at(0));
    expect(result.invalidated).toBe(true);
    expect(result.window).toEqual({ startLine: 0, endLine: 66 });
  });

  it('should keep the window for an unchanged viewport', () => {
    const manager = createManager();
    manager.update(at(0));
    expect(manager.update(at(0)).invalidated).toBe(false);
  });

  it('should keep the window for small scrolls inside the margin', () => {
    const manager = createManager();
    manager.update(at(0));
    expect(manager.update(at(100)).window).toEqual({ startLine: 56, endLine: 166 });

    const result = manager.update(at(110));
    expect(result.invalidated).toBe(false);
    expect(result.window).toEqual({ startLine: 56, endLine: 166 });
  });

  it('should re-window when the bottom margin is crossed', () => {
    const manager = createManager();
    manager.update(at(100));

    const result = manager.update(at(123));
    expect(result.invalidated).toBe(true);
    expect(result.window).toEqual({ startLine: 79, endLine: 189 });
  });

  it('should re-window when the top margin is crossed', () => {
    const manager = createManager();
    manager.update(at(100));
    expect(manager.update(at(78)).invalidated).toBe(false);

    const result = manager.update(at(77));
    expect(result.invalidated).toBe(true);
    expect(result.window).toEqual({ startLine: 33, endLine: 143 });
  });

  it('should re-window on a resize beyond the epsilon', () => {
    const manager = createManager();
    manager.update(at(0));
    expect(manager.update(at(0, 800.4)).invalidated).toBe(false);
    expect(manager.update(at(0, 801)).invalidated).toBe(true);
  });

  it('should re-window after an explicit invalidation', () => {
    const manager = createManager();
    manager.update(at(0));
    manager.invalidate();
    expect(manager.update(at(0)).invalidated).toBe(true);
  });

  it('should treat a negative scroll offset as the top', () => {
    const manager = createManager();
    const result = manager.update({ scrollOffset: -50, viewportWidth: 800, viewportHeight: 400 });
    expect(result.window).toEqual({ startLine: 0, endLine: 66 });
  });
});

// =============================================================================
// Visible Lines
// =============================================================================

describe('getVisibleLineRange', () => {
  it('should apply overscan', () => {
    const scroll = { scrollTop: 200, lineHeight: LINE_HEIGHT, viewportHeight: 400 };
    expect(getVisibleLineRange(scroll, 100, 5)).toEqual({ startLine: 5, endLine: 35 });
  });

  it('should clamp to the document', () => {
    const scroll = { scrollTop: 200, lineHeight: LINE_HEIGHT, viewportHeight: 400 };
    expect(getVisibleLineRange(scroll, 20, 5)).toEqual({ startLine: 5, endLine: 19 });
  });
});

describe('getVisibleLines', () => {
  it('should return the lines of a window clamped to the document', () => {
    const buffer = createTextBuffer('a\nb\nc');
    expect(getVisibleLines(buffer, { startLine: 1, endLine: 66 })).toEqual([
      { lineNumber: 1, content: 'b' },
      { lineNumber: 2, content: 'c' },
    ]);
  });
});

describe('computeScrollToCursor', () => {
  const viewport = { scrollOffset: 0, viewportHeight: 400 };

  it('should return null when the cursor is visible', () => {
    expect(computeScrollToCursor(5, viewport, LINE_HEIGHT, 2)).toBeNull();
  });

  it('should scroll down to keep a bottom margin', () => {
    expect(computeScrollToCursor(18, viewport, LINE_HEIGHT, 2)).toBe(20);
  });

  it('should scroll up to keep a top margin', () => {
    expect(computeScrollToCursor(10, { scrollOffset: 200, viewportHeight: 400 }, LINE_HEIGHT, 2)).toBe(160);
    expect(computeScrollToCursor(1, { scrollOffset: 100, viewportHeight: 400 }, LINE_HEIGHT, 2)).toBe(0);
  });

  it('should return null when the offset would not change', () => {
    expect(computeScrollToCursor(0, viewport, LINE_HEIGHT, 2)).toBeNull();
  });
});
