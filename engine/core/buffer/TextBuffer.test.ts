/**
 * Caretpad Engine - TextBuffer Unit Tests
 *
 * Covers:
 * - Insert, backspace and delete (character, word and selection modes)
 * - Cursor clamping and word/line navigation
 * - Selection lifecycle
 * - Undo/redo through the buffer
 * - Document replacement and statistics
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { TextBuffer, createTextBuffer } from './TextBuffer.js';
import type { ManualClock } from '../types/index.js';
import { createManualClock } from '../types/index.js';

// =============================================================================
// Test Utilities
// =============================================================================

let clock: ManualClock;

function createBuffer(content = ''): TextBuffer {
  return new TextBuffer(content, { history: { clock: clock.now } });
}

function select(buffer: TextBuffer, start: number, end: number): void {
  buffer.setCursorPosition(start);
  buffer.startSelection();
  buffer.setCursorPosition(end);
  buffer.updateSelection();
}

function expectCursorInBounds(buffer: TextBuffer): void {
  expect(buffer.cursorIndex).toBeGreaterThanOrEqual(0);
  expect(buffer.cursorIndex).toBeLessThanOrEqual(buffer.length);
}

describe('TextBuffer', () => {
  beforeEach(() => {
    clock = createManualClock();
  });

  // ===========================================================================
  // Construction
  // ===========================================================================

  describe('Construction', () => {
    it('should start with the given content and no history', () => {
      const buffer = createBuffer('hello');

      expect(buffer.content).toBe('hello');
      expect(buffer.cursorIndex).toBe(0);
      expect(buffer.length).toBe(5);
      expect(buffer.canUndo).toBe(false);
      expect(buffer.canRedo).toBe(false);
      expect(buffer.getSelectionRange()).toBeNull();
    });
  });

  // ===========================================================================
  // Insert
  // ===========================================================================

  describe('insertText', () => {
    it('should insert at the cursor and advance it', () => {
      const buffer = createBuffer();

      buffer.insertText('abc');

      expect(buffer.content).toBe('abc');
      expect(buffer.cursorIndex).toBe(3);
      expect(buffer.canUndo).toBe(true);
    });

    it('should restore content and cursor on undo', () => {
      const buffer = createBuffer('hello world');
      buffer.setCursorPosition(6);

      buffer.insertText('big ');
      expect(buffer.content).toBe('hello big world');
      expect(buffer.cursorIndex).toBe(10);

      buffer.undo();
      expect(buffer.content).toBe('hello world');
      expect(buffer.cursorIndex).toBe(6);
    });

    it('should record nothing for empty text', () => {
      const buffer = createBuffer('abc');

      buffer.insertText('');

      expect(buffer.content).toBe('abc');
      expect(buffer.canUndo).toBe(false);
    });

    it('should replace the selection as one undo step', () => {
      const buffer = createBuffer('foobarbaz');
      select(buffer, 3, 6);

      buffer.insertText('X');

      expect(buffer.content).toBe('fooXbaz');
      expect(buffer.cursorIndex).toBe(4);
      expect(buffer.hasSelection()).toBe(false);
      expect(buffer.getUndoHistory()).toEqual([
        expect.objectContaining({ category: 'replace', commandCount: 2 }),
      ]);

      buffer.undo();
      expect(buffer.content).toBe('foobarbaz');
      expect(buffer.cursorIndex).toBe(6);
    });

    it('should only delete the selection when inserting empty text', () => {
      const buffer = createBuffer('foobarbaz');
      select(buffer, 3, 6);

      buffer.insertText('');

      expect(buffer.content).toBe('foobaz');
      expect(buffer.cursorIndex).toBe(3);
      expect(buffer.getUndoHistory()[0].category).toBe('deletion');
    });

    it('should undo a typing burst at once', () => {
      const buffer = createBuffer();
      buffer.insertText('a');
      buffer.insertText('b');
      buffer.insertText('c');

      buffer.undo();

      expect(buffer.content).toBe('');
      expect(buffer.cursorIndex).toBe(0);
    });

    it('should split typing across a pause', () => {
      const buffer = createBuffer();
      buffer.insertText('a');
      clock.advance(1001);
      buffer.insertText('b');
      buffer.insertText('c');

      buffer.undo();

      expect(buffer.content).toBe('a');
      expect(buffer.cursorIndex).toBe(1);
    });
  });

  // ===========================================================================
  // Backspace / Delete
  // ===========================================================================

  describe('performBackspace / performDelete', () => {
    it('should do nothing on backspace at the start', () => {
      const buffer = createBuffer('abc');

      buffer.performBackspace();

      expect(buffer.content).toBe('abc');
      expect(buffer.canUndo).toBe(false);
    });

    it('should do nothing on delete at the end', () => {
      const buffer = createBuffer('abc');
      buffer.moveToDocumentEnd();

      buffer.performDelete();

      expect(buffer.content).toBe('abc');
      expect(buffer.cursorIndex).toBe(3);
      expect(buffer.canUndo).toBe(false);
    });

    it('should remove the character left of the cursor on backspace', () => {
      const buffer = createBuffer('abc');
      buffer.moveToDocumentEnd();

      buffer.performBackspace();

      expect(buffer.content).toBe('ab');
      expect(buffer.cursorIndex).toBe(2);
    });

    it('should remove the character at the cursor on delete', () => {
      const buffer = createBuffer('abc');
      buffer.setCursorPosition(1);

      buffer.performDelete();

      expect(buffer.content).toBe('ac');
      expect(buffer.cursorIndex).toBe(1);
    });

    it('should undo a backspace run at once', () => {
      const buffer = createBuffer('abcd');
      buffer.moveToDocumentEnd();
      buffer.performBackspace();
      buffer.performBackspace();
      expect(buffer.content).toBe('ab');

      buffer.undo();

      expect(buffer.content).toBe('abcd');
      expect(buffer.cursorIndex).toBe(4);
    });

    it('should delete the selection regardless of word mode', () => {
      const buffer = createBuffer('hello world');
      select(buffer, 0, 5);

      buffer.performBackspace(true);

      expect(buffer.content).toBe(' world');
      expect(buffer.cursorIndex).toBe(0);
      expect(buffer.hasSelection()).toBe(false);
    });

    it('should delete back to the previous word start in word mode', () => {
      const buffer = createBuffer('foo bar');
      buffer.moveToDocumentEnd();

      buffer.performBackspace(true);
      expect(buffer.content).toBe('foo ');
      expect(buffer.cursorIndex).toBe(4);

      buffer.undo();
      expect(buffer.content).toBe('foo bar');
      expect(buffer.cursorIndex).toBe(7);
    });

    it('should delete forward to the word end in word mode', () => {
      const buffer = createBuffer('foo bar');

      buffer.performDelete(true);

      expect(buffer.content).toBe(' bar');
      expect(buffer.cursorIndex).toBe(0);
    });

    it('should delete only the gap after a word in forward word mode', () => {
      const buffer = createBuffer('foo  bar');
      buffer.setCursorPosition(3);

      buffer.performDelete(true);

      expect(buffer.content).toBe('foobar');
      expect(buffer.cursorIndex).toBe(3);
    });

    it('should not delete a line break in forward word mode', () => {
      const buffer = createBuffer('foo\nbar');
      buffer.setCursorPosition(3);

      buffer.performDelete(true);

      expect(buffer.content).toBe('foo\nbar');
      expect(buffer.canUndo).toBe(false);
    });

    it('should do nothing on word backspace at the start', () => {
      const buffer = createBuffer('foo');

      buffer.performBackspace(true);

      expect(buffer.canUndo).toBe(false);
    });
  });

  // ===========================================================================
  // Cursor Movement
  // ===========================================================================

  describe('Cursor Movement', () => {
    it('should clamp relative moves', () => {
      const buffer = createBuffer('abc');

      buffer.moveCursor(10);
      expect(buffer.cursorIndex).toBe(3);

      buffer.moveCursor(-10);
      expect(buffer.cursorIndex).toBe(0);
    });

    it('should clamp absolute positions', () => {
      const buffer = createBuffer('abc');

      buffer.setCursorPosition(99);
      expect(buffer.cursorIndex).toBe(3);

      buffer.setCursorPosition(-5);
      expect(buffer.cursorIndex).toBe(0);
    });

    it('should ignore non-finite positions', () => {
      const buffer = createBuffer('abc');
      buffer.setCursorPosition(2);

      buffer.setCursorPosition(Number.NaN);
      buffer.moveCursor(Number.POSITIVE_INFINITY);

      expect(buffer.cursorIndex).toBe(2);
    });

    it('should stop word-end moves at the line end', () => {
      const buffer = createBuffer('foo  bar\nbaz');

      buffer.moveToWordEnd();
      expect(buffer.cursorIndex).toBe(3);

      buffer.moveToWordEnd();
      expect(buffer.cursorIndex).toBe(5);

      buffer.moveToWordEnd();
      expect(buffer.cursorIndex).toBe(8);

      buffer.moveToWordEnd();
      expect(buffer.cursorIndex).toBe(8);
    });

    it('should cross line breaks on word-start moves', () => {
      const buffer = createBuffer('foo  bar\nbaz');
      buffer.setCursorPosition(9);

      buffer.moveToWordStart();
      expect(buffer.cursorIndex).toBe(5);

      buffer.moveToWordStart();
      expect(buffer.cursorIndex).toBe(0);
    });

    it('should keep the column when moving between lines', () => {
      const buffer = createBuffer('ab\ncdef\ng');
      buffer.setCursorPosition(6);

      expect(buffer.moveCursorLine(-1)).toBe(true);
      expect(buffer.cursorIndex).toBe(2);

      buffer.setCursorPosition(6);
      expect(buffer.moveCursorLine(1)).toBe(true);
      expect(buffer.cursorIndex).toBe(9);
    });

    it('should not move to a line that does not exist', () => {
      const buffer = createBuffer('ab\ncdef\ng');
      buffer.setCursorPosition(6);

      expect(buffer.moveCursorLine(5)).toBe(false);
      expect(buffer.moveCursorLine(-2)).toBe(false);
      expect(buffer.cursorIndex).toBe(6);
    });

    it('should move to line and document boundaries', () => {
      const buffer = createBuffer('ab\ncdef\ng');
      buffer.setCursorPosition(5);

      buffer.moveToLineStart();
      expect(buffer.cursorIndex).toBe(3);

      buffer.moveToLineEnd();
      expect(buffer.cursorIndex).toBe(7);

      buffer.moveToDocumentEnd();
      expect(buffer.cursorIndex).toBe(9);

      buffer.moveToDocumentStart();
      expect(buffer.cursorIndex).toBe(0);
    });

    it('should go to 1-based line numbers', () => {
      const buffer = createBuffer('ab\ncdef\ng');

      expect(buffer.goToLine(2)).toBe(true);
      expect(buffer.cursorIndex).toBe(3);

      expect(buffer.goToLine(3)).toBe(true);
      expect(buffer.cursorIndex).toBe(8);

      expect(buffer.goToLine(0)).toBe(false);
      expect(buffer.goToLine(4)).toBe(false);
      expect(buffer.cursorIndex).toBe(8);
    });

    it('should report the cursor location', () => {
      const buffer = createBuffer('ab\ncdef\ng');
      buffer.setCursorPosition(5);

      expect(buffer.getCursorLocation()).toEqual({ line: 1, column: 2 });
    });

    it('should report the indentation of the cursor line', () => {
      const buffer = createBuffer('  foo\n\tbar');

      buffer.moveToDocumentEnd();
      expect(buffer.getCurrentLineIndentation()).toBe('\t');

      buffer.setCursorPosition(1);
      expect(buffer.getCurrentLineIndentation()).toBe(' ');
    });
  });

  // ===========================================================================
  // Selection
  // ===========================================================================

  describe('Selection', () => {
    it('should have no selection initially', () => {
      const buffer = createBuffer('hello');

      expect(buffer.hasSelection()).toBe(false);
      expect(buffer.getSelectionEndpoints()).toEqual({ anchor: null, floatingEnd: null });
      expect(buffer.getSelectedText()).toBe('');
    });

    it('should not be active until the floating end moves', () => {
      const buffer = createBuffer('hello');
      buffer.startSelection();
      buffer.moveCursor(2);

      expect(buffer.isSelecting).toBe(true);
      expect(buffer.hasSelection()).toBe(false);

      buffer.updateSelection();
      expect(buffer.getSelectionRange()).toEqual({ start: 0, end: 2 });
      expect(buffer.getSelectedText()).toBe('he');
    });

    it('should normalize a backward selection', () => {
      const buffer = createBuffer('hello');
      select(buffer, 5, 1);

      expect(buffer.getSelectionRange()).toEqual({ start: 1, end: 5 });
      expect(buffer.getSelectionEndpoints()).toEqual({ anchor: 5, floatingEnd: 1 });
    });

    it('should ignore updates when not selecting', () => {
      const buffer = createBuffer('hello');
      buffer.moveCursor(3);

      buffer.updateSelection();

      expect(buffer.getSelectionEndpoints()).toEqual({ anchor: null, floatingEnd: null });
    });

    it('should collapse when the floating end returns to the anchor', () => {
      const buffer = createBuffer('hello');
      select(buffer, 1, 4);

      buffer.setCursorPosition(1);
      buffer.updateSelection();

      expect(buffer.hasSelection()).toBe(false);
      expect(buffer.getSelectionRange()).toBeNull();
    });

    it('should select everything and move the cursor to the end', () => {
      const buffer = createBuffer('hello');

      buffer.selectAll();

      expect(buffer.getSelectionRange()).toEqual({ start: 0, end: 5 });
      expect(buffer.cursorIndex).toBe(5);
      expect(buffer.isSelecting).toBe(true);
    });

    it('should have no active selection after selecting all of nothing', () => {
      const buffer = createBuffer();

      buffer.selectAll();

      expect(buffer.hasSelection()).toBe(false);
    });

    it('should clear the selection', () => {
      const buffer = createBuffer('hello');
      select(buffer, 0, 3);

      buffer.clearSelection();

      expect(buffer.isSelecting).toBe(false);
      expect(buffer.getSelectionRange()).toBeNull();
    });

    it('should cut the selection', () => {
      const buffer = createBuffer('hello world');
      select(buffer, 6, 11);

      expect(buffer.cutSelection()).toBe('world');
      expect(buffer.content).toBe('hello ');
      expect(buffer.cursorIndex).toBe(6);
    });

    it('should cut nothing without a selection', () => {
      const buffer = createBuffer('hello');

      expect(buffer.cutSelection()).toBe('');
      expect(buffer.canUndo).toBe(false);
    });
  });

  // ===========================================================================
  // Undo / Redo
  // ===========================================================================

  describe('Undo/Redo', () => {
    it('should clear the selection on undo', () => {
      const buffer = createBuffer();
      buffer.insertText('abc');
      select(buffer, 0, 3);

      buffer.undo();

      expect(buffer.content).toBe('');
      expect(buffer.hasSelection()).toBe(false);
    });

    it('should redo an undone edit', () => {
      const buffer = createBuffer();
      buffer.insertText('abc');
      buffer.undo();

      buffer.redo();

      expect(buffer.content).toBe('abc');
      expect(buffer.cursorIndex).toBe(3);
    });

    it('should drop redo history on a new edit', () => {
      const buffer = createBuffer();
      buffer.insertText('abc');
      buffer.undo();
      expect(buffer.canRedo).toBe(true);

      buffer.insertText('x');

      expect(buffer.canRedo).toBe(false);
    });

    it('should expose history state', () => {
      const buffer = createBuffer();
      buffer.insertText('a');
      buffer.finalizeCurrentGroup();

      expect(buffer.getHistoryState()).toMatchObject({
        canUndo: true,
        undoCount: 1,
        openCategory: null,
      });
    });

    it('should keep the cursor in bounds across mixed edits', () => {
      const buffer = createBuffer('one two\nthree');
      buffer.moveToDocumentEnd();

      const steps: Array<(b: TextBuffer) => void> = [
        b => b.performBackspace(true),
        b => b.insertText('four five'),
        b => b.moveCursorLine(-1),
        b => b.performDelete(true),
        b => select(b, 2, 9),
        b => b.insertText('\n'),
        b => b.undo(),
        b => b.undo(),
        b => b.redo(),
        b => b.selectAll(),
        b => b.performDelete(),
        b => b.undo(),
        b => b.moveToWordEnd(),
      ];

      for (const step of steps) {
        clock.advance(10);
        step(buffer);
        expectCursorInBounds(buffer);
      }
    });
  });

  // ===========================================================================
  // Document
  // ===========================================================================

  describe('Document', () => {
    it('should reset cursor, selection and history on setContent', () => {
      const buffer = createBuffer();
      buffer.insertText('abc');
      buffer.undo();
      buffer.insertText('xyz');
      select(buffer, 0, 2);

      buffer.setContent('new');

      expect(buffer.content).toBe('new');
      expect(buffer.cursorIndex).toBe(0);
      expect(buffer.hasSelection()).toBe(false);
      expect(buffer.canUndo).toBe(false);
      expect(buffer.canRedo).toBe(false);
    });

    it('should drop history but keep the document on clearHistory', () => {
      const buffer = createTextBuffer('abc', { history: { clock: clock.now } });
      buffer.insertText('x');
      buffer.undo();
      buffer.redo();

      buffer.clearHistory();

      expect(buffer.content).toBe('xabc');
      expect(buffer.cursorIndex).toBe(1);
      expect(buffer.canUndo).toBe(false);
      expect(buffer.canRedo).toBe(false);
    });

    it('should count characters, words and lines', () => {
      const buffer = createBuffer('one two\n three');

      expect(buffer.getStats()).toEqual({ characters: 14, words: 3, lines: 2 });
    });
  });
});
