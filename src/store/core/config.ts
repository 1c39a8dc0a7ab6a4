/**
 * Editor configuration defaults and resolution.
 */

import type { EditorConfig } from '../../types/state.ts';

/**
 * Default configuration values.
 */
export const DEFAULT_EDITOR_CONFIG: Readonly<Required<EditorConfig>> = Object.freeze({
  content: '',
  historyLimit: 1000,
  tabSize: 4,
  lineHeight: 20,
  charWidth: 8.4,
  gutterWidth: 60,
  viewportWidth: 800,
  viewportHeight: 600,
  cacheMarginMultiplier: 2,
  resizeEpsilon: 0.5,
  scrollMarginLines: 2,
  searchDisplayLimit: 10000,
});

type NumericKey = Exclude<keyof EditorConfig, 'content'>;

/** Fields that must be positive integers */
const INTEGER_KEYS: readonly NumericKey[] = ['historyLimit', 'tabSize', 'searchDisplayLimit'];

/** Fields that must be positive numbers */
const POSITIVE_KEYS: readonly NumericKey[] = [
  'lineHeight',
  'charWidth',
  'viewportWidth',
  'viewportHeight',
  'cacheMarginMultiplier',
];

/** Fields that may be zero */
const NON_NEGATIVE_KEYS: readonly NumericKey[] = ['gutterWidth', 'resizeEpsilon', 'scrollMarginLines'];

function accepts(key: NumericKey, value: number): boolean {
  if (!Number.isFinite(value)) return false;
  if (INTEGER_KEYS.includes(key)) return Number.isInteger(value) && value >= 1;
  if (POSITIVE_KEYS.includes(key)) return value > 0;
  return value >= 0;
}

/**
 * Merge a partial configuration over the defaults.
 * Invalid numeric values fall back to their default with a warning.
 */
export function resolveEditorConfig(config: Partial<EditorConfig> = {}): Readonly<Required<EditorConfig>> {
  const resolved: Required<EditorConfig> = { ...DEFAULT_EDITOR_CONFIG };

  if (config.content !== undefined) {
    resolved.content = config.content;
  }

  for (const key of [...INTEGER_KEYS, ...POSITIVE_KEYS, ...NON_NEGATIVE_KEYS]) {
    const value = config[key];
    if (value === undefined) continue;
    if (accepts(key, value)) {
      resolved[key] = value;
    } else {
      console.warn(`Invalid editor config "${key}": ${value}; using ${DEFAULT_EDITOR_CONFIG[key]}`);
    }
  }

  return Object.freeze(resolved);
}
