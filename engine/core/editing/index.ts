/**
 * Caretpad Engine - Editing Module Exports
 */

export {
  EditorController,
  InMemoryClipboard,
  DEFAULT_EDITOR_CONFIG,
  createEditorController,
} from './EditorController.js';
export type {
  ClipboardProvider,
  EditorConfig,
  EditorUpdate,
} from './EditorController.js';
