/**
 * Input intent types for the editing engine.
 * The host translates raw keyboard, mouse, IME and scroll events into these
 * high-level intents and dispatches them one at a time.
 */

import type { ArrowDirection, Position } from './state.ts';

// =============================================================================
// Editing Intents
// =============================================================================

export interface CharacterInputIntent {
  readonly type: 'CHARACTER_INPUT';
  readonly char: string;
}

export interface BackspaceIntent {
  readonly type: 'BACKSPACE';
}

export interface DeleteIntent {
  readonly type: 'DELETE';
}

export interface EnterIntent {
  readonly type: 'ENTER';
}

export interface TabIntent {
  readonly type: 'TAB';
}

// =============================================================================
// Navigation Intents
// =============================================================================

export interface ArrowMoveIntent {
  readonly type: 'ARROW_MOVE';
  readonly direction: ArrowDirection;
  /** Extend the selection (Shift held) */
  readonly extend: boolean;
}

export interface HomeIntent {
  readonly type: 'HOME';
  readonly extend: boolean;
}

export interface EndIntent {
  readonly type: 'END';
  readonly extend: boolean;
}

/** Ctrl+Home */
export interface DocumentStartIntent {
  readonly type: 'DOCUMENT_START';
  readonly extend: boolean;
}

/** Ctrl+End */
export interface DocumentEndIntent {
  readonly type: 'DOCUMENT_END';
  readonly extend: boolean;
}

export interface PageUpIntent {
  readonly type: 'PAGE_UP';
}

export interface PageDownIntent {
  readonly type: 'PAGE_DOWN';
}

// =============================================================================
// Pointer Intents
// =============================================================================

/**
 * Pointer intents carry document positions; the renderer owns pixel mapping
 * (see `pointToPosition` for a monospace helper).
 */
export interface MouseClickIntent {
  readonly type: 'MOUSE_CLICK';
  readonly position: Position;
}

export interface MouseDragIntent {
  readonly type: 'MOUSE_DRAG';
  readonly position: Position;
}

export interface MouseReleaseIntent {
  readonly type: 'MOUSE_RELEASE';
}

export interface SelectAllIntent {
  readonly type: 'SELECT_ALL';
}

// =============================================================================
// Clipboard and History Intents
// =============================================================================

export interface CopyIntent {
  readonly type: 'COPY';
}

export interface CutIntent {
  readonly type: 'CUT';
}

/**
 * Paste. Without text the editor asks the host for the clipboard content;
 * the host answers with a second PASTE carrying the resolved text.
 */
export interface PasteIntent {
  readonly type: 'PASTE';
  readonly text?: string;
}

export interface UndoIntent {
  readonly type: 'UNDO';
}

export interface RedoIntent {
  readonly type: 'REDO';
}

// =============================================================================
// Search Intents
// =============================================================================

export interface OpenSearchIntent {
  readonly type: 'OPEN_SEARCH';
}

export interface OpenReplaceIntent {
  readonly type: 'OPEN_REPLACE';
}

export interface CloseSearchIntent {
  readonly type: 'CLOSE_SEARCH';
}

export interface SearchQueryChangedIntent {
  readonly type: 'SEARCH_QUERY_CHANGED';
  readonly query: string;
}

export interface ReplaceTextChangedIntent {
  readonly type: 'REPLACE_TEXT_CHANGED';
  readonly text: string;
}

export interface ToggleCaseSensitiveIntent {
  readonly type: 'TOGGLE_CASE_SENSITIVE';
}

export interface FindNextIntent {
  readonly type: 'FIND_NEXT';
}

export interface FindPreviousIntent {
  readonly type: 'FIND_PREVIOUS';
}

export interface ReplaceNextIntent {
  readonly type: 'REPLACE_NEXT';
}

export interface ReplaceAllIntent {
  readonly type: 'REPLACE_ALL';
}

// =============================================================================
// Viewport and IME Intents
// =============================================================================

export interface ScrolledIntent {
  readonly type: 'SCROLLED';
  readonly scrollOffset: number;
  readonly viewportWidth: number;
  readonly viewportHeight: number;
}

/**
 * IME composition update. Display-only: the buffer is not touched.
 * An empty string clears the overlay.
 */
export interface ImePreeditIntent {
  readonly type: 'IME_PREEDIT';
  readonly text: string;
}

/**
 * IME commit. Inserted as a single undoable text insertion.
 */
export interface ImeCommitIntent {
  readonly type: 'IME_COMMIT';
  readonly text: string;
}

// =============================================================================
// Union Type
// =============================================================================

/**
 * Union of all intents.
 */
export type EditorIntent =
  | CharacterInputIntent
  | BackspaceIntent
  | DeleteIntent
  | EnterIntent
  | TabIntent
  | ArrowMoveIntent
  | HomeIntent
  | EndIntent
  | DocumentStartIntent
  | DocumentEndIntent
  | PageUpIntent
  | PageDownIntent
  | MouseClickIntent
  | MouseDragIntent
  | MouseReleaseIntent
  | SelectAllIntent
  | CopyIntent
  | CutIntent
  | PasteIntent
  | UndoIntent
  | RedoIntent
  | OpenSearchIntent
  | OpenReplaceIntent
  | CloseSearchIntent
  | SearchQueryChangedIntent
  | ReplaceTextChangedIntent
  | ToggleCaseSensitiveIntent
  | FindNextIntent
  | FindPreviousIntent
  | ReplaceNextIntent
  | ReplaceAllIntent
  | ScrolledIntent
  | ImePreeditIntent
  | ImeCommitIntent;

/**
 * Extract the intent type string from an intent.
 */
export type EditorIntentType = EditorIntent['type'];

// =============================================================================
// Intent Type Guards
// =============================================================================

/**
 * Check if an intent may change document content.
 */
export function isEditIntent(
  intent: EditorIntent
): intent is
  | CharacterInputIntent
  | BackspaceIntent
  | DeleteIntent
  | EnterIntent
  | TabIntent
  | CutIntent
  | PasteIntent
  | ReplaceNextIntent
  | ReplaceAllIntent
  | ImeCommitIntent {
  switch (intent.type) {
    case 'CHARACTER_INPUT':
    case 'BACKSPACE':
    case 'DELETE':
    case 'ENTER':
    case 'TAB':
    case 'CUT':
    case 'PASTE':
    case 'REPLACE_NEXT':
    case 'REPLACE_ALL':
    case 'IME_COMMIT':
      return true;
    default:
      return false;
  }
}

/**
 * Check if an intent is an undo or redo request.
 */
export function isHistoryIntent(intent: EditorIntent): intent is UndoIntent | RedoIntent {
  return intent.type === 'UNDO' || intent.type === 'REDO';
}

// =============================================================================
// Intent Validation
// =============================================================================

/**
 * Result of validating an intent.
 */
export interface IntentValidationResult {
  /** Whether the intent is valid */
  readonly valid: boolean;
  /** Error messages if validation failed */
  readonly errors: readonly string[];
}

const ARROW_DIRECTIONS: readonly string[] = ['up', 'down', 'left', 'right'];

function checkPosition(type: string, value: unknown, errors: string[]): void {
  if (typeof value !== 'object' || value === null) {
    errors.push(`${type} intent requires a "position" object`);
    return;
  }
  const position = value as { line?: unknown; column?: unknown };
  if (typeof position.line !== 'number' || !Number.isFinite(position.line) || position.line < 0) {
    errors.push(`${type} position.line must be a finite non-negative number`);
  }
  if (typeof position.column !== 'number' || !Number.isFinite(position.column) || position.column < 0) {
    errors.push(`${type} position.column must be a finite non-negative number`);
  }
}

function checkExtend(type: string, value: unknown, errors: string[]): void {
  if (typeof value !== 'boolean') {
    errors.push(`${type} intent requires a boolean "extend" property`);
  }
}

function checkString(type: string, key: string, value: unknown, errors: string[]): void {
  if (typeof value !== 'string') {
    errors.push(`${type} intent requires a string "${key}" property`);
  }
}

function checkFiniteNumber(type: string, key: string, value: unknown, errors: string[]): void {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    errors.push(`${type} intent requires a finite numeric "${key}" property`);
  }
}

/**
 * Validate an intent with detailed error messages.
 *
 * @example
 * ```typescript
 * const result = validateIntent(message);
 * if (!result.valid) {
 *   console.error('Invalid intent:', result.errors);
 * }
 * ```
 */
export function validateIntent(value: unknown): IntentValidationResult {
  const errors: string[] = [];

  if (typeof value !== 'object' || value === null) {
    errors.push('Intent must be a non-null object');
    return { valid: false, errors };
  }

  const intent = value as Partial<Record<string, unknown>> & { type?: unknown };

  if (typeof intent.type !== 'string') {
    errors.push('Intent must have a string "type" property');
    return { valid: false, errors };
  }

  const type = intent.type;

  switch (type) {
    case 'CHARACTER_INPUT': {
      if (typeof intent.char !== 'string') {
        errors.push('CHARACTER_INPUT intent requires a string "char" property');
      } else if ([...intent.char].length !== 1) {
        errors.push(`CHARACTER_INPUT char must be exactly one character: "${intent.char}"`);
      } else if (intent.char === '\n' || intent.char === '\r') {
        errors.push('CHARACTER_INPUT char cannot be a line break; use ENTER');
      }
      break;
    }

    case 'ARROW_MOVE': {
      if (typeof intent.direction !== 'string' || !ARROW_DIRECTIONS.includes(intent.direction)) {
        errors.push(`ARROW_MOVE direction must be one of ${ARROW_DIRECTIONS.join(', ')}`);
      }
      checkExtend(type, intent.extend, errors);
      break;
    }

    case 'HOME':
    case 'END':
    case 'DOCUMENT_START':
    case 'DOCUMENT_END':
      checkExtend(type, intent.extend, errors);
      break;

    case 'MOUSE_CLICK':
    case 'MOUSE_DRAG':
      checkPosition(type, intent.position, errors);
      break;

    case 'PASTE':
      if (intent.text !== undefined && typeof intent.text !== 'string') {
        errors.push('PASTE text must be a string when present');
      }
      break;

    case 'SEARCH_QUERY_CHANGED':
      checkString(type, 'query', intent.query, errors);
      break;

    case 'REPLACE_TEXT_CHANGED':
    case 'IME_PREEDIT':
    case 'IME_COMMIT':
      checkString(type, 'text', intent.text, errors);
      break;

    case 'SCROLLED':
      checkFiniteNumber(type, 'scrollOffset', intent.scrollOffset, errors);
      checkFiniteNumber(type, 'viewportWidth', intent.viewportWidth, errors);
      checkFiniteNumber(type, 'viewportHeight', intent.viewportHeight, errors);
      break;

    case 'BACKSPACE':
    case 'DELETE':
    case 'ENTER':
    case 'TAB':
    case 'PAGE_UP':
    case 'PAGE_DOWN':
    case 'MOUSE_RELEASE':
    case 'SELECT_ALL':
    case 'COPY':
    case 'CUT':
    case 'UNDO':
    case 'REDO':
    case 'OPEN_SEARCH':
    case 'OPEN_REPLACE':
    case 'CLOSE_SEARCH':
    case 'TOGGLE_CASE_SENSITIVE':
    case 'FIND_NEXT':
    case 'FIND_PREVIOUS':
    case 'REPLACE_NEXT':
    case 'REPLACE_ALL':
      // These intents have no additional properties to validate
      break;

    default:
      errors.push(`Unknown intent type: "${type}"`);
  }

  return { valid: errors.length === 0, errors };
}

/**
 * Check if an unknown value is a valid EditorIntent.
 * Useful for validating intents from external sources.
 */
export function isEditorIntent(value: unknown): value is EditorIntent {
  return validateIntent(value).valid;
}
