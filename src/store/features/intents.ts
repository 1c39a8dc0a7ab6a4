/**
 * Intent creator functions.
 * Provides type-safe factory functions for the intents a host dispatches.
 */

import type { ArrowDirection, Position } from '../../types/state.ts';
import type {
  ArrowMoveIntent,
  BackspaceIntent,
  CharacterInputIntent,
  CloseSearchIntent,
  CopyIntent,
  CutIntent,
  DeleteIntent,
  DocumentEndIntent,
  DocumentStartIntent,
  EndIntent,
  EnterIntent,
  FindNextIntent,
  FindPreviousIntent,
  HomeIntent,
  ImeCommitIntent,
  ImePreeditIntent,
  MouseClickIntent,
  MouseDragIntent,
  MouseReleaseIntent,
  OpenReplaceIntent,
  OpenSearchIntent,
  PageDownIntent,
  PageUpIntent,
  PasteIntent,
  RedoIntent,
  ReplaceAllIntent,
  ReplaceNextIntent,
  ReplaceTextChangedIntent,
  ScrolledIntent,
  SearchQueryChangedIntent,
  SelectAllIntent,
  TabIntent,
  ToggleCaseSensitiveIntent,
  UndoIntent,
} from '../../types/intents.ts';

/**
 * Intent creators.
 * All functions return frozen, serializable intent objects.
 */
export const EditorIntents = {
  characterInput(char: string): CharacterInputIntent {
    return Object.freeze({ type: 'CHARACTER_INPUT', char });
  },

  backspace(): BackspaceIntent {
    return Object.freeze({ type: 'BACKSPACE' });
  },

  delete(): DeleteIntent {
    return Object.freeze({ type: 'DELETE' });
  },

  enter(): EnterIntent {
    return Object.freeze({ type: 'ENTER' });
  },

  tab(): TabIntent {
    return Object.freeze({ type: 'TAB' });
  },

  /**
   * @param extend - Whether Shift is held
   */
  arrow(direction: ArrowDirection, extend: boolean = false): ArrowMoveIntent {
    return Object.freeze({ type: 'ARROW_MOVE', direction, extend });
  },

  home(extend: boolean = false): HomeIntent {
    return Object.freeze({ type: 'HOME', extend });
  },

  end(extend: boolean = false): EndIntent {
    return Object.freeze({ type: 'END', extend });
  },

  documentStart(extend: boolean = false): DocumentStartIntent {
    return Object.freeze({ type: 'DOCUMENT_START', extend });
  },

  documentEnd(extend: boolean = false): DocumentEndIntent {
    return Object.freeze({ type: 'DOCUMENT_END', extend });
  },

  pageUp(): PageUpIntent {
    return Object.freeze({ type: 'PAGE_UP' });
  },

  pageDown(): PageDownIntent {
    return Object.freeze({ type: 'PAGE_DOWN' });
  },

  mouseClick(position: Position): MouseClickIntent {
    return Object.freeze({ type: 'MOUSE_CLICK', position });
  },

  mouseDrag(position: Position): MouseDragIntent {
    return Object.freeze({ type: 'MOUSE_DRAG', position });
  },

  mouseRelease(): MouseReleaseIntent {
    return Object.freeze({ type: 'MOUSE_RELEASE' });
  },

  selectAll(): SelectAllIntent {
    return Object.freeze({ type: 'SELECT_ALL' });
  },

  copy(): CopyIntent {
    return Object.freeze({ type: 'COPY' });
  },

  cut(): CutIntent {
    return Object.freeze({ type: 'CUT' });
  },

  /**
   * Paste. Omit `text` to ask the host for the clipboard content.
   */
  paste(text?: string): PasteIntent {
    if (text === undefined) {
      return Object.freeze({ type: 'PASTE' });
    }
    return Object.freeze({ type: 'PASTE', text });
  },

  undo(): UndoIntent {
    return Object.freeze({ type: 'UNDO' });
  },

  redo(): RedoIntent {
    return Object.freeze({ type: 'REDO' });
  },

  openSearch(): OpenSearchIntent {
    return Object.freeze({ type: 'OPEN_SEARCH' });
  },

  openReplace(): OpenReplaceIntent {
    return Object.freeze({ type: 'OPEN_REPLACE' });
  },

  closeSearch(): CloseSearchIntent {
    return Object.freeze({ type: 'CLOSE_SEARCH' });
  },

  searchQueryChanged(query: string): SearchQueryChangedIntent {
    return Object.freeze({ type: 'SEARCH_QUERY_CHANGED', query });
  },

  replaceTextChanged(text: string): ReplaceTextChangedIntent {
    return Object.freeze({ type: 'REPLACE_TEXT_CHANGED', text });
  },

  toggleCaseSensitive(): ToggleCaseSensitiveIntent {
    return Object.freeze({ type: 'TOGGLE_CASE_SENSITIVE' });
  },

  findNext(): FindNextIntent {
    return Object.freeze({ type: 'FIND_NEXT' });
  },

  findPrevious(): FindPreviousIntent {
    return Object.freeze({ type: 'FIND_PREVIOUS' });
  },

  replaceNext(): ReplaceNextIntent {
    return Object.freeze({ type: 'REPLACE_NEXT' });
  },

  replaceAll(): ReplaceAllIntent {
    return Object.freeze({ type: 'REPLACE_ALL' });
  },

  /**
   * @param scrollOffset - Vertical scroll offset in pixels
   */
  scrolled(scrollOffset: number, viewportWidth: number, viewportHeight: number): ScrolledIntent {
    return Object.freeze({ type: 'SCROLLED', scrollOffset, viewportWidth, viewportHeight });
  },

  imePreedit(text: string): ImePreeditIntent {
    return Object.freeze({ type: 'IME_PREEDIT', text });
  },

  imeCommit(text: string): ImeCommitIntent {
    return Object.freeze({ type: 'IME_COMMIT', text });
  },
} as const;
