/**
 * Tests for the command history.
 */

import { describe, it, expect } from 'vitest';
import type { Caret } from '../../types/state.ts';
import { createTextBuffer, position } from '../core/text-buffer.ts';
import type { TextBuffer } from '../core/text-buffer.ts';
import { Commands } from './commands.ts';
import { createCommandHistory } from './history.ts';
import type { CommandHistory } from './history.ts';

// =============================================================================
// Helpers
// =============================================================================

interface Fixture {
  history: CommandHistory;
  buffer: TextBuffer;
  caret: Caret;
  type(text: string): void;
}

function setup(maxSize?: number): Fixture {
  const history = createCommandHistory(maxSize === undefined ? {} : { maxSize });
  const buffer = createTextBuffer('');
  const caret: Caret = { position: position(0, 0) };
  return {
    history,
    buffer,
    caret,
    type(text) {
      for (const char of text) {
        history.execute(Commands.insertChar(buffer, caret.position, char), buffer, caret);
      }
    },
  };
}

// =============================================================================
// Undo / Redo
// =============================================================================

describe('undo and redo', () => {
  it('should undo and redo single commands', () => {
    const { history, buffer, caret, type } = setup();
    type('ab');

    expect(history.undo(buffer, caret)).toBe(true);
    expect(buffer.toString()).toBe('a');
    expect(caret.position).toEqual(position(0, 1));

    expect(history.redo(buffer, caret)).toBe(true);
    expect(buffer.toString()).toBe('ab');
    expect(caret.position).toEqual(position(0, 2));
  });

  it('should return false when there is nothing to undo or redo', () => {
    const { history, buffer, caret } = setup();
    expect(history.undo(buffer, caret)).toBe(false);
    expect(history.redo(buffer, caret)).toBe(false);
  });

  it('should clear the redo stack on a new push', () => {
    const { history, buffer, caret, type } = setup();
    type('ab');
    history.undo(buffer, caret);
    expect(history.canRedo()).toBe(true);

    type('c');
    expect(history.canRedo()).toBe(false);
    expect(buffer.toString()).toBe('ac');
  });
});

// =============================================================================
// Grouping
// =============================================================================

describe('grouping', () => {
  it('should collapse a group into one undo step', () => {
    const { history, buffer, caret, type } = setup();
    history.beginGroup('typing');
    type('abc');
    history.endGroup();

    expect(history.undoCount).toBe(1);
    history.undo(buffer, caret);
    expect(buffer.toString()).toBe('');
    expect(caret.position).toEqual(position(0, 0));
  });

  it('should flush an open group on undo', () => {
    const { history, buffer, caret, type } = setup();
    history.beginGroup('typing');
    type('ab');

    expect(history.canUndo()).toBe(true);
    expect(history.undoCount).toBe(1);
    history.undo(buffer, caret);
    expect(buffer.toString()).toBe('');
    expect(history.isGrouping).toBe(false);
  });

  it('should flush an open group on redo and drop the stale redo entry', () => {
    const { history, buffer, caret, type } = setup();
    type('x');
    history.undo(buffer, caret);
    expect(history.redoCount).toBe(1);

    history.beginGroup('typing');
    type('y');
    expect(history.redo(buffer, caret)).toBe(false);
    expect(buffer.toString()).toBe('y');
    expect(history.redoCount).toBe(0);
  });

  it('should leave no entry for an empty group', () => {
    const { history } = setup();
    history.beginGroup('typing');
    history.endGroup();
    expect(history.undoCount).toBe(0);
    expect(history.canUndo()).toBe(false);
  });

  it('should end the open group when a new one begins', () => {
    const { history, type } = setup();
    history.beginGroup('first');
    type('a');
    history.beginGroup('second');
    type('b');
    history.endGroup();
    expect(history.undoCount).toBe(2);
  });
});

// =============================================================================
// Save Point
// =============================================================================

describe('save point', () => {
  it('should track modification relative to the save point', () => {
    const { history, buffer, caret, type } = setup();
    expect(history.isModified()).toBe(false);

    type('a');
    expect(history.isModified()).toBe(true);

    history.markSaved();
    expect(history.isModified()).toBe(false);

    history.undo(buffer, caret);
    expect(history.isModified()).toBe(true);

    history.redo(buffer, caret);
    expect(history.isModified()).toBe(false);
  });

  it('should report a modification while a group is open', () => {
    const { history } = setup();
    history.markSaved();
    history.beginGroup('typing');
    expect(history.isModified()).toBe(true);
  });

  it('should stay modified once the saved state is discarded from redo', () => {
    const { history, buffer, caret, type } = setup();
    type('ab');
    history.markSaved();
    history.undo(buffer, caret);
    history.undo(buffer, caret);
    type('c');

    expect(history.isModified()).toBe(true);
    history.undo(buffer, caret);
    expect(buffer.toString()).toBe('');
    expect(history.isModified()).toBe(true);
  });
});

// =============================================================================
// Size Bound
// =============================================================================

describe('size bound', () => {
  it('should keep exactly maxSize entries', () => {
    const { history, buffer, caret, type } = setup(3);
    type('abcde');
    expect(history.undoCount).toBe(3);

    history.undo(buffer, caret);
    history.undo(buffer, caret);
    history.undo(buffer, caret);
    expect(buffer.toString()).toBe('ab');
    expect(history.undo(buffer, caret)).toBe(false);
  });

  it('should shift the save point on eviction', () => {
    const { history, buffer, caret, type } = setup(2);
    type('a');
    history.markSaved();
    type('bc');
    expect(history.isModified()).toBe(true);

    history.undo(buffer, caret);
    history.undo(buffer, caret);
    expect(buffer.toString()).toBe('a');
    expect(history.isModified()).toBe(false);
  });

  it('should stay modified once the save point is evicted', () => {
    const { history, buffer, caret, type } = setup(1);
    history.markSaved();
    type('ab');

    history.undo(buffer, caret);
    expect(buffer.toString()).toBe('a');
    expect(history.isModified()).toBe(true);
  });

  it('should trim the oldest entries on setMaxSize', () => {
    const { history, type } = setup();
    type('abcde');
    history.setMaxSize(2);
    expect(history.undoCount).toBe(2);
    expect(history.maxSize).toBe(2);
  });

  it('should reject a non-positive bound', () => {
    expect(() => createCommandHistory({ maxSize: 0 })).toThrow(RangeError);
    const { history } = setup();
    expect(() => history.setMaxSize(-1)).toThrow(RangeError);
    expect(history.maxSize).toBe(1000);
  });
});

// =============================================================================
// Clear
// =============================================================================

describe('clear', () => {
  it('should reset every counter', () => {
    const { history, buffer, caret, type } = setup();
    type('abc');
    history.undo(buffer, caret);
    history.markSaved();
    history.beginGroup('typing');

    history.clear();
    expect(history.undoCount).toBe(0);
    expect(history.redoCount).toBe(0);
    expect(history.isGrouping).toBe(false);
    expect(history.isModified()).toBe(false);
  });
});
