/**
 * Type exports for the editing engine.
 */

// State types
export type {
  Position,
  Caret,
  SelectionRange,
  CursorState,
  ArrowDirection,
  SearchMatch,
  SearchSnapshot,
  ViewportState,
  CacheWindow,
  PreeditState,
  EditorConfig,
} from './state.ts';

// Command types
export type {
  InsertCharCommand,
  DeleteCharCommand,
  DeleteForwardCommand,
  InsertNewlineCommand,
  InsertTextCommand,
  DeleteRangeCommand,
  ReplaceTextCommand,
  CompositeCommand,
  Command,
  CommandType,
  TextEditCommand,
} from './commands.ts';

export { isTextEditCommand, isCompositeCommand, isCommand } from './commands.ts';

// Intent types
export type {
  CharacterInputIntent,
  BackspaceIntent,
  DeleteIntent,
  EnterIntent,
  TabIntent,
  ArrowMoveIntent,
  HomeIntent,
  EndIntent,
  DocumentStartIntent,
  DocumentEndIntent,
  PageUpIntent,
  PageDownIntent,
  MouseClickIntent,
  MouseDragIntent,
  MouseReleaseIntent,
  SelectAllIntent,
  CopyIntent,
  CutIntent,
  PasteIntent,
  UndoIntent,
  RedoIntent,
  OpenSearchIntent,
  OpenReplaceIntent,
  CloseSearchIntent,
  SearchQueryChangedIntent,
  ReplaceTextChangedIntent,
  ToggleCaseSensitiveIntent,
  FindNextIntent,
  FindPreviousIntent,
  ReplaceNextIntent,
  ReplaceAllIntent,
  ScrolledIntent,
  ImePreeditIntent,
  ImeCommitIntent,
  EditorIntent,
  EditorIntentType,
  IntentValidationResult,
} from './intents.ts';

export { isEditIntent, isHistoryIntent, validateIntent, isEditorIntent } from './intents.ts';

// Editor types
export type { EditorListener, Unsubscribe, EditorSnapshot, Editor } from './editor.ts';

// Branded offsets
export type { CodeUnitOffset, ColumnOffset } from './branded.ts';

export { codeUnitOffset, columnOffset } from './branded.ts';
