/**
 * Caretpad Engine - History Module Exports
 */

export {
  UndoRedoManager,
  createUndoRedoManager,
  classifyCommand,
  DEFAULT_UNDO_CONFIG,
} from './UndoRedoManager.js';

export { EditCommand, CommandGroup } from './EditCommand.js';

export type {
  CommandClassifier,
  // State & Events
  UndoRedoState,
  UndoRedoEvents,
  UndoRedoConfig,
  HistoryEntry,
} from './UndoRedoManager.js';

export type { EditCommandInit } from './EditCommand.js';
