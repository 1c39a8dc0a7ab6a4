/**
 * Tests for branded offset types.
 */

import { describe, it, expect } from 'vitest';
import { codeUnitOffset, columnOffset } from './branded.ts';

describe('Branded Types', () => {
  describe('constructor functions', () => {
    it('should create CodeUnitOffset from number', () => {
      expect(codeUnitOffset(42)).toBe(42);
    });

    it('should create ColumnOffset from number', () => {
      expect(columnOffset(10)).toBe(10);
    });
  });
});
