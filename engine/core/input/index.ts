/**
 * Caretpad Engine - Input Module Exports
 */

export {
  KeyboardHandler,
  createKeyboardHandler,
  parseKeyCombo,
  getModifiers,
  DEFAULT_KEYBINDINGS,
} from './KeyboardHandler.js';

export type {
  KeyboardEvent,
  KeyCombo,
  Keybinding,
  KeyboardHandlerConfig,
  ModifierState,
  // Intents
  EditorIntent,
  IntentType,
  MoveCharIntent,
  MoveWordIntent,
  MoveLineIntent,
  LineBoundaryIntent,
  DocumentBoundaryIntent,
  InsertTextIntent,
  NewlineIntent,
  IndentIntent,
  BackspaceIntent,
  DeleteIntent,
  SelectAllIntent,
  ClipboardIntent,
  HistoryIntent,
  CompleteIntent,
  EscapeIntent,
  UnknownIntent,
} from './KeyboardHandler.js';
