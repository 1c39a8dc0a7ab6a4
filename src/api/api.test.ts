/**
 * Tests for the query and scan namespaces.
 */

import { describe, it, expect } from 'vitest';
import { query, scan } from './index.ts';
import { createTextBuffer, position } from '../store/core/text-buffer.ts';

describe('query', () => {
  const buffer = createTextBuffer('héllo\n世界');

  it('should read lines by number', () => {
    expect(query.line(buffer, 1)).toBe('世界');
    expect(query.line(buffer, 5)).toBe('');
    expect(query.lineLength(buffer, 0)).toBe(5);
    expect(query.lineCount(buffer)).toBe(2);
  });

  it('should clamp positions and order selections', () => {
    expect(query.clampPosition(buffer, position(9, 9))).toEqual(position(1, 2));
    expect(query.normalizeSelection(position(1, 1), position(0, 2))).toEqual({
      start: position(0, 2),
      end: position(1, 1),
    });
  });

  it('should list the lines of a window', () => {
    expect(query.getVisibleLines(buffer, { startLine: 1, endLine: 10 })).toEqual([{ lineNumber: 1, content: '世界' }]);
  });
});

describe('scan', () => {
  it('should read the whole document and search it', () => {
    const buffer = createTextBuffer('ab\nab');
    expect(scan.toString(buffer)).toBe('ab\nab');
    expect(scan.findMatches(buffer, 'b', true)).toEqual([
      { line: 0, column: 1, length: 1 },
      { line: 1, column: 1, length: 1 },
    ]);
    expect(scan.getSelectedText(buffer, { start: position(0, 1), end: position(1, 1) })).toBe('b\na');
  });
});
