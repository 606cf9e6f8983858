/**
 * Caretpad Engine
 *
 * A plain-text document model with an edit-grouping undo/redo engine:
 * - Cursor and selection tracking with clamped offsets
 * - Edit commands grouped into undo units by category, adjacency and pauses
 * - Framework-agnostic keyboard mapping and an editor controller
 *
 * @example
 * ```typescript
 * import { TextBuffer } from '@caretpad/engine';
 *
 * const buffer = new TextBuffer('foobarbaz');
 *
 * buffer.setCursorPosition(3);
 * buffer.startSelection();
 * buffer.setCursorPosition(6);
 * buffer.updateSelection();
 * buffer.insertText('X');
 * console.log(buffer.content); // "fooXbaz"
 *
 * buffer.undo();
 * console.log(buffer.content); // "foobarbaz"
 * ```
 */

export * from './core/index.js';
