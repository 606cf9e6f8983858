/**
 * Caretpad Engine - Core Module Exports
 */

// Types - export all
export * from './types/index.js';

// Text Helpers
export * from './text/index.js';

// Edit History
export {
  UndoRedoManager,
  createUndoRedoManager,
  classifyCommand,
  DEFAULT_UNDO_CONFIG,
  EditCommand,
  CommandGroup,
} from './history/index.js';
export type {
  CommandClassifier,
  UndoRedoState,
  UndoRedoEvents,
  UndoRedoConfig,
  HistoryEntry,
  EditCommandInit,
} from './history/index.js';

// Document Buffer
export { TextBuffer, createTextBuffer } from './buffer/index.js';
export type { TextBufferConfig } from './buffer/index.js';

// Keyboard Input
export * from './input/index.js';

// Editing
export {
  EditorController,
  InMemoryClipboard,
  DEFAULT_EDITOR_CONFIG,
  createEditorController,
} from './editing/index.js';
export type {
  ClipboardProvider,
  EditorConfig,
  EditorUpdate,
} from './editing/index.js';
