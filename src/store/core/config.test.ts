import { describe, it, expect, vi, afterEach } from 'vitest';
import { DEFAULT_EDITOR_CONFIG, resolveEditorConfig } from './config.ts';

describe('resolveEditorConfig', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should return the defaults for an empty config', () => {
    expect(resolveEditorConfig()).toEqual(DEFAULT_EDITOR_CONFIG);
  });

  it('should keep valid overrides', () => {
    const config = resolveEditorConfig({ content: 'abc', tabSize: 2, lineHeight: 16, gutterWidth: 0 });
    expect(config.content).toBe('abc');
    expect(config.tabSize).toBe(2);
    expect(config.lineHeight).toBe(16);
    expect(config.gutterWidth).toBe(0);
    expect(config.historyLimit).toBe(1000);
  });

  it('should fall back and warn for invalid numbers', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const config = resolveEditorConfig({ lineHeight: 0, historyLimit: 2.5, charWidth: Number.NaN });

    expect(config.lineHeight).toBe(20);
    expect(config.historyLimit).toBe(1000);
    expect(config.charWidth).toBe(8.4);
    expect(warn).toHaveBeenCalledTimes(3);
  });

  it('should freeze the result', () => {
    expect(Object.isFrozen(resolveEditorConfig({ tabSize: 8 }))).toBe(true);
  });
});
