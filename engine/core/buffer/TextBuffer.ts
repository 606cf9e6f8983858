/**
 * Caretpad Engine - Text Buffer
 *
 * Owns the document content, the cursor and the selection.
 * Every content mutation is recorded with the UndoRedoManager before it is applied.
 *
 * Invariants:
 * - 0 <= cursorIndex <= content.length after every operation
 * - Selection endpoints are null or valid offsets; any content change clears them
 * - No operation throws; out-of-range positions are clamped
 */

import type {
  TextRange,
  TextLocation,
  SelectionEndpoints,
  TextStats,
} from '../types/index.js';
import { clamp, toRange } from '../types/index.js';
import {
  findWordStart,
  findWordEnd,
  lineStartOf,
  lineEndOf,
  lineIndexAt,
  lineOffset,
  locationAt,
  leadingIndentation,
  computeTextStats,
} from '../text/index.js';
import { UndoRedoManager } from '../history/UndoRedoManager.js';
import type { UndoRedoConfig, UndoRedoState, HistoryEntry } from '../history/UndoRedoManager.js';

// =============================================================================
// Types
// =============================================================================

export interface TextBufferConfig {
  /** Passed through to the history engine */
  history?: UndoRedoConfig;
}

// =============================================================================
// Text Buffer
// =============================================================================

export class TextBuffer {
  private _content: string = '';
  private _cursor: number = 0;
  private anchor: number | null = null;
  private floatingEnd: number | null = null;
  private _isSelecting: boolean = false;

  private readonly history: UndoRedoManager;

  constructor(initialContent: string = '', config: TextBufferConfig = {}) {
    this.history = new UndoRedoManager(config.history);
    this.setContent(initialContent);
  }

  // ===========================================================================
  // Read-only Surface
  // ===========================================================================

  get content(): string {
    return this._content;
  }

  get cursorIndex(): number {
    return this._cursor;
  }

  get length(): number {
    return this._content.length;
  }

  get isSelecting(): boolean {
    return this._isSelecting;
  }

  get canUndo(): boolean {
    return this.history.canUndo();
  }

  get canRedo(): boolean {
    return this.history.canRedo();
  }

  hasSelection(): boolean {
    return this.anchor !== null && this.floatingEnd !== null && this.anchor !== this.floatingEnd;
  }

  /**
   * Normalized active selection, or null when nothing is selected.
   */
  getSelectionRange(): TextRange | null {
    if (this.anchor === null || this.floatingEnd === null || this.anchor === this.floatingEnd) {
      return null;
    }
    return toRange(this.anchor, this.floatingEnd);
  }

  getSelectionEndpoints(): SelectionEndpoints {
    return { anchor: this.anchor, floatingEnd: this.floatingEnd };
  }

  getSelectedText(): string {
    const range = this.getSelectionRange();
    return range ? this._content.slice(range.start, range.end) : '';
  }

  getCursorLocation(): TextLocation {
    return locationAt(this._content, this._cursor);
  }

  getCurrentLineIndentation(): string {
    return leadingIndentation(this._content, this._cursor);
  }

  getStats(): TextStats {
    return computeTextStats(this._content);
  }

  getHistoryState(): UndoRedoState {
    return this.history.getState();
  }

  getUndoHistory(): HistoryEntry[] {
    return this.history.getUndoHistory();
  }

  getRedoHistory(): HistoryEntry[] {
    return this.history.getRedoHistory();
  }

  // ===========================================================================
  // Editing
  // ===========================================================================

  /**
   * Insert at the cursor, replacing the selection if one is active.
   * Replacing records two commands (delete, insert) in one undo group.
   */
  insertText(text: string): void {
    const replacing = this.hasSelection() && text.length > 0;

    if (replacing) this.history.beginBatch('replace');

    if (this.hasSelection()) {
      this.deleteSelection();
    }

    if (text.length > 0) {
      const position = this._cursor;
      this.history.recordCommand('insert', position, '', text, position, position + text.length);
      this._content = this._content.slice(0, position) + text + this._content.slice(position);
      this._cursor = position + text.length;
    }

    if (replacing) this.history.endBatch();

    this.clearSelection();
  }

  performBackspace(wordMode: boolean = false): void {
    if (this.hasSelection()) {
      this.deleteSelection();
      return;
    }

    const cursor = this._cursor;

    if (wordMode) {
      const start = findWordStart(this._content, cursor);
      if (start === cursor) return;
      this.removeRange('delete', start, cursor, start);
      return;
    }

    if (cursor === 0) return;
    this.removeRange('backspace', cursor - 1, cursor, cursor - 1);
  }

  performDelete(wordMode: boolean = false): void {
    if (this.hasSelection()) {
      this.deleteSelection();
      return;
    }

    const cursor = this._cursor;

    if (wordMode) {
      const end = findWordEnd(this._content, cursor);
      if (end === cursor) return;
      this.removeRange('delete', cursor, end, cursor);
      return;
    }

    if (cursor >= this._content.length) return;
    this.removeRange('delete', cursor, cursor + 1, cursor);
  }

  /**
   * Remove the selection and return it. Records nothing without a selection.
   */
  cutSelection(): string {
    return this.hasSelection() ? this.deleteSelection() : '';
  }

  // ===========================================================================
  // Cursor Movement
  // ===========================================================================

  moveCursor(delta: number): void {
    if (!Number.isFinite(delta)) return;
    this._cursor = clamp(this._cursor + Math.trunc(delta), 0, this._content.length);
  }

  setCursorPosition(position: number): void {
    if (!Number.isFinite(position)) return;
    this._cursor = clamp(Math.trunc(position), 0, this._content.length);
  }

  moveToWordStart(): void {
    this._cursor = findWordStart(this._content, this._cursor);
  }

  moveToWordEnd(): void {
    this._cursor = findWordEnd(this._content, this._cursor);
  }

  /**
   * Move up/down by `delta` lines, keeping the column where the target line allows.
   * Returns false (cursor untouched) when the target line does not exist.
   */
  moveCursorLine(delta: number): boolean {
    if (!Number.isInteger(delta)) return false;

    const column = this._cursor - lineStartOf(this._content, this._cursor);
    const target = lineOffset(this._content, lineIndexAt(this._content, this._cursor) + delta);
    if (target === null) return false;

    this._cursor = Math.min(target + column, lineEndOf(this._content, target));
    return true;
  }

  moveToLineStart(): void {
    this._cursor = lineStartOf(this._content, this._cursor);
  }

  moveToLineEnd(): void {
    this._cursor = lineEndOf(this._content, this._cursor);
  }

  moveToDocumentStart(): void {
    this._cursor = 0;
  }

  moveToDocumentEnd(): void {
    this._cursor = this._content.length;
  }

  /**
   * Jump to the start of a 1-based line number.
   */
  goToLine(lineNumber: number): boolean {
    const offset = lineOffset(this._content, lineNumber - 1);
    if (offset === null) return false;
    this._cursor = offset;
    return true;
  }

  // ===========================================================================
  // Selection
  // ===========================================================================

  startSelection(): void {
    this.anchor = this._cursor;
    this.floatingEnd = this._cursor;
    this._isSelecting = true;
  }

  updateSelection(): void {
    if (this._isSelecting) {
      this.floatingEnd = this._cursor;
    }
  }

  clearSelection(): void {
    this.anchor = null;
    this.floatingEnd = null;
    this._isSelecting = false;
  }

  selectAll(): void {
    this.anchor = 0;
    this.floatingEnd = this._content.length;
    this._cursor = this._content.length;
    this._isSelecting = true;
  }

  // ===========================================================================
  // History
  // ===========================================================================

  undo(): void {
    const result = this.history.undo(this._content, this._cursor);
    this._content = result.content;
    this._cursor = clamp(result.cursorPosition, 0, this._content.length);
    this.clearSelection();
  }

  redo(): void {
    const result = this.history.redo(this._content, this._cursor);
    this._content = result.content;
    this._cursor = clamp(result.cursorPosition, 0, this._content.length);
    this.clearSelection();
  }

  finalizeCurrentGroup(): void {
    this.history.finalizeCurrentGroup();
  }

  clearHistory(): void {
    this.history.clear();
  }

  /**
   * Replace the whole document. Not undoable: history is discarded.
   */
  setContent(content: string): void {
    this._content = content;
    this._cursor = 0;
    this.clearSelection();
    this.history.clear();
  }

  // ===========================================================================
  // Private Helper Methods
  // ===========================================================================

  private deleteSelection(): string {
    const range = this.getSelectionRange();
    if (range === null) return '';

    const removed = this._content.slice(range.start, range.end);
    this.removeRange('delete', range.start, range.end, range.start);
    return removed;
  }

  private removeRange(
    kind: 'delete' | 'backspace',
    start: number,
    end: number,
    cursorAfter: number
  ): void {
    const removed = this._content.slice(start, end);
    this.history.recordCommand(kind, start, removed, '', this._cursor, cursorAfter);
    this._content = this._content.slice(0, start) + this._content.slice(end);
    this._cursor = cursorAfter;
    this.clearSelection();
  }
}

// =============================================================================
// Factory Functions
// =============================================================================

export function createTextBuffer(initialContent?: string, config?: TextBufferConfig): TextBuffer {
  return new TextBuffer(initialContent, config);
}
