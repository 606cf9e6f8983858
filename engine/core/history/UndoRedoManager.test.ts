/**
 * UndoRedoManager Unit Tests
 *
 * Tests the grouped history engine including:
 * - State queries (canUndo, canRedo, open group)
 * - Command classification
 * - Grouping by category, timeout and adjacency
 * - Undo/redo replay and stale commands
 * - Batch operations
 * - Capacity eviction
 * - Event system
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
  UndoRedoManager,
  createUndoRedoManager,
  classifyCommand,
} from './UndoRedoManager.js';
import { EditCommand, CommandGroup } from './EditCommand.js';
import type { EditKind, ManualClock } from '../types/index.js';
import { createManualClock } from '../types/index.js';

describe('UndoRedoManager', () => {
  let clock: ManualClock;
  let manager: UndoRedoManager;

  beforeEach(() => {
    clock = createManualClock();
    manager = createUndoRedoManager({ clock: clock.now });
  });

  /** Record one insert per character, starting at `start`. */
  function typeChars(text: string, start: number): void {
    for (let i = 0; i < text.length; i++) {
      manager.recordCommand('insert', start + i, '', text[i], start + i, start + i + 1);
    }
  }

  function makeCommand(kind: EditKind, insertedText: string, removedText = ''): EditCommand {
    return new EditCommand({
      kind,
      position: 0,
      removedText,
      insertedText,
      cursorBefore: 0,
      cursorAfter: insertedText.length,
      timestamp: 0,
    });
  }

  // ===========================================================================
  // State Queries
  // ===========================================================================

  describe('State Queries', () => {
    it('should return initial state', () => {
      expect(manager.getState()).toEqual({
        canUndo: false,
        canRedo: false,
        undoCount: 0,
        redoCount: 0,
        openCategory: null,
        undoCategory: null,
        redoCategory: null,
        memoryUsage: 0,
      });
      expect(manager.isGroupOpen()).toBe(false);
    });

    it('should count the open group as undoable', () => {
      typeChars('a', 0);

      const state = manager.getState();
      expect(state.canUndo).toBe(true);
      expect(state.undoCount).toBe(1);
      expect(state.openCategory).toBe('typing');
      expect(state.undoCategory).toBe('typing');
      expect(state.memoryUsage).toBe(66);
      expect(manager.isGroupOpen()).toBe(true);
    });

    it('should close the open group on finalize', () => {
      typeChars('ab', 0);
      manager.finalizeCurrentGroup();

      expect(manager.isGroupOpen()).toBe(false);
      expect(manager.getOpenCategory()).toBeNull();
      expect(manager.getState().undoCount).toBe(1);
    });

    it('should treat finalize as idempotent', () => {
      typeChars('ab', 0);
      manager.finalizeCurrentGroup();
      manager.finalizeCurrentGroup();

      expect(manager.getState().undoCount).toBe(1);
    });

    it('should report group timestamps from the clock', () => {
      typeChars('a', 0);
      clock.advance(200);
      typeChars('b', 1);

      const [entry] = manager.getUndoHistory();
      expect(entry).toEqual({
        category: 'typing',
        commandCount: 2,
        startTime: 0,
        endTime: 200,
        open: true,
      });
    });
  });

  // ===========================================================================
  // Classification
  // ===========================================================================

  describe('classifyCommand', () => {
    it('should classify single letters and digits as typing', () => {
      expect(classifyCommand(makeCommand('insert', 'a'))).toBe('typing');
      expect(classifyCommand(makeCommand('insert', '7'))).toBe('typing');
      expect(classifyCommand(makeCommand('insert', 'é'))).toBe('typing');
    });

    it('should classify other single characters as insert', () => {
      expect(classifyCommand(makeCommand('insert', ' '))).toBe('insert');
      expect(classifyCommand(makeCommand('insert', '.'))).toBe('insert');
      expect(classifyCommand(makeCommand('insert', '_'))).toBe('insert');
    });

    it('should classify a lone line break as newline', () => {
      expect(classifyCommand(makeCommand('insert', '\n'))).toBe('newline');
    });

    it('should classify multi-character inserts as paste', () => {
      expect(classifyCommand(makeCommand('insert', 'ab'))).toBe('paste');
      expect(classifyCommand(makeCommand('insert', '\r\n'))).toBe('paste');
    });

    it('should classify removals and replacements', () => {
      expect(classifyCommand(makeCommand('delete', '', 'x'))).toBe('deletion');
      expect(classifyCommand(makeCommand('backspace', '', 'x'))).toBe('deletion');
      expect(classifyCommand(makeCommand('replace', 'y', 'x'))).toBe('replace');
    });
  });

  // ===========================================================================
  // Grouping
  // ===========================================================================

  describe('Grouping', () => {
    it('should group contiguous typing into one undo step', () => {
      typeChars('abc', 0);

      expect(manager.getState().undoCount).toBe(1);
      expect(manager.undo('abc', 3)).toEqual({ content: '', cursorPosition: 0 });
      expect(manager.canUndo()).toBe(false);
    });

    it('should start a new group after the timeout elapses', () => {
      typeChars('a', 0);
      clock.advance(1001);
      typeChars('bc', 1);

      expect(manager.undo('abc', 3)).toEqual({ content: 'a', cursorPosition: 1 });
    });

    it('should keep grouping when exactly the timeout has elapsed', () => {
      typeChars('a', 0);
      clock.advance(1000);
      typeChars('b', 1);

      expect(manager.getState().undoCount).toBe(1);
    });

    it('should start a new group when the category changes', () => {
      typeChars('ab', 0);
      manager.recordCommand('insert', 2, '', ' ', 2, 3);
      typeChars('c', 3);

      expect(manager.getUndoHistory().map(entry => entry.category)).toEqual([
        'typing',
        'insert',
        'typing',
      ]);
    });

    it('should split typing that jumps away from the previous insert', () => {
      typeChars('a', 0);
      typeChars('b', 3);

      expect(manager.getState().undoCount).toBe(2);
    });

    it('should tolerate a one-character gap in typing', () => {
      typeChars('a', 0);
      typeChars('b', 2);

      expect(manager.getState().undoCount).toBe(1);
    });

    it('should group a backspace run', () => {
      manager.recordCommand('backspace', 3, 'd', '', 4, 3);
      manager.recordCommand('backspace', 2, 'c', '', 3, 2);

      expect(manager.getState().undoCount).toBe(1);
      expect(manager.undo('ab', 2)).toEqual({ content: 'abcd', cursorPosition: 4 });
    });

    it('should group forward deletes at the same position', () => {
      manager.recordCommand('delete', 1, 'b', '', 1, 1);
      manager.recordCommand('delete', 1, 'c', '', 1, 1);

      expect(manager.getState().undoCount).toBe(1);
      expect(manager.undo('ad', 1)).toEqual({ content: 'abcd', cursorPosition: 1 });
    });

    it('should split deletions far apart', () => {
      manager.recordCommand('backspace', 5, 'x', '', 6, 5);
      manager.recordCommand('backspace', 1, 'y', '', 2, 1);

      expect(manager.getState().undoCount).toBe(2);
    });

    it('should not apply adjacency to pastes', () => {
      manager.recordCommand('insert', 0, '', 'xy', 0, 2);
      manager.recordCommand('insert', 10, '', 'zw', 10, 12);

      expect(manager.getState().undoCount).toBe(1);
      expect(manager.getUndoHistory()[0].category).toBe('paste');
    });

    it('should honor injected contiguous categories', () => {
      manager = createUndoRedoManager({ clock: clock.now, contiguousCategories: ['paste'] });

      manager.recordCommand('insert', 0, '', 'xy', 0, 2);
      manager.recordCommand('insert', 10, '', 'zw', 10, 12);

      expect(manager.getState().undoCount).toBe(2);
    });

    it('should honor an injected classifier', () => {
      manager = createUndoRedoManager({ clock: clock.now, classify: () => 'other' });

      manager.recordCommand('insert', 0, '', ' ', 0, 1);
      manager.recordCommand('insert', 1, '', 'a', 1, 2);
      manager.recordCommand('insert', 2, '', '\n', 2, 3);

      expect(manager.getUndoHistory()).toEqual([
        { category: 'other', commandCount: 3, startTime: 0, endTime: 0, open: true },
      ]);
    });
  });

  // ===========================================================================
  // Undo/Redo Operations
  // ===========================================================================

  describe('Undo/Redo Operations', () => {
    it('should return the input unchanged when there is nothing to undo', () => {
      expect(manager.undo('hello', 2)).toEqual({ content: 'hello', cursorPosition: 2 });
    });

    it('should return the input unchanged when there is nothing to redo', () => {
      expect(manager.redo('hello', 2)).toEqual({ content: 'hello', cursorPosition: 2 });
    });

    it('should restore content and cursor after undoing an insert', () => {
      manager.recordCommand('insert', 6, '', 'big ', 6, 10);

      expect(manager.undo('hello big world', 10)).toEqual({
        content: 'hello world',
        cursorPosition: 6,
      });
    });

    it('should re-apply an undone insert', () => {
      manager.recordCommand('insert', 6, '', 'big ', 6, 10);
      manager.undo('hello big world', 10);

      expect(manager.redo('hello world', 6)).toEqual({
        content: 'hello big world',
        cursorPosition: 10,
      });
    });

    it('should move groups between stacks', () => {
      typeChars('ab', 0);
      manager.undo('ab', 2);

      expect(manager.getState()).toMatchObject({ undoCount: 0, redoCount: 1, redoCategory: 'typing' });

      manager.redo('', 0);

      expect(manager.getState()).toMatchObject({ undoCount: 1, redoCount: 0 });
    });

    it('should invalidate redo when a new command is recorded', () => {
      typeChars('ab', 0);
      manager.undo('ab', 2);
      expect(manager.canRedo()).toBe(true);

      typeChars('x', 0);

      expect(manager.canRedo()).toBe(false);
      expect(manager.getRedoHistory()).toEqual([]);
    });

    it('should close the open group before undoing', () => {
      typeChars('ab', 0);
      manager.undo('ab', 2);

      expect(manager.isGroupOpen()).toBe(false);
    });

    it('should undo and redo several groups in order', () => {
      typeChars('a', 0);
      clock.advance(1001);
      typeChars('b', 1);

      expect(manager.undo('ab', 2)).toEqual({ content: 'a', cursorPosition: 1 });
      expect(manager.undo('a', 1)).toEqual({ content: '', cursorPosition: 0 });
      expect(manager.redo('', 0)).toEqual({ content: 'a', cursorPosition: 1 });
      expect(manager.redo('a', 1)).toEqual({ content: 'ab', cursorPosition: 2 });
    });

    it('should invert replace commands', () => {
      manager.recordCommand('replace', 0, 'foo', 'bar', 0, 3);

      expect(manager.undo('barbaz', 3)).toEqual({ content: 'foobaz', cursorPosition: 0 });
      expect(manager.redo('foobaz', 0)).toEqual({ content: 'barbaz', cursorPosition: 3 });
    });

    it('should skip commands whose offsets no longer fit', () => {
      manager.recordCommand('insert', 5, '', 'abc', 5, 8);

      expect(manager.undo('xy', 2)).toEqual({ content: 'xy', cursorPosition: 2 });
    });
  });

  // ===========================================================================
  // Stale Replay
  // ===========================================================================

  describe('Stale Replay', () => {
    it('should skip an undo of a delete past the end', () => {
      manager.recordCommand('delete', 4, 'xy', '', 4, 4);

      expect(manager.undo('ab', 2)).toEqual({ content: 'ab', cursorPosition: 2 });
    });

    it('should skip an undo of a backspace past the end', () => {
      manager.recordCommand('backspace', 3, 'c', '', 4, 3);

      expect(manager.undo('a', 1)).toEqual({ content: 'a', cursorPosition: 1 });
    });

    it('should leave content unchanged when a replace no longer fits on undo', () => {
      manager.recordCommand('replace', 5, 'ab', 'xyz', 5, 8);

      expect(manager.undo('hello', 5)).toEqual({ content: 'hello', cursorPosition: 5 });
    });

    it('should skip a redo of an insert past the end', () => {
      manager.recordCommand('insert', 3, '', 'z', 3, 4);
      expect(manager.undo('abcz', 4)).toEqual({ content: 'abc', cursorPosition: 3 });

      expect(manager.redo('a', 1)).toEqual({ content: 'a', cursorPosition: 1 });
    });

    it('should skip a redo of a delete whose text no longer fits', () => {
      manager.recordCommand('delete', 2, 'cd', '', 2, 2);
      expect(manager.undo('ab', 2)).toEqual({ content: 'abcd', cursorPosition: 2 });

      expect(manager.redo('a', 1)).toEqual({ content: 'a', cursorPosition: 1 });
    });

    it('should skip a redo of a backspace whose text no longer fits', () => {
      manager.recordCommand('backspace', 1, 'b', '', 2, 1);
      expect(manager.undo('a', 1)).toEqual({ content: 'ab', cursorPosition: 2 });

      expect(manager.redo('', 0)).toEqual({ content: '', cursorPosition: 0 });
    });

    it('should leave content unchanged when a replace no longer fits on redo', () => {
      manager.recordCommand('replace', 0, 'foo', 'bar', 0, 3);
      expect(manager.undo('barbaz', 3)).toEqual({ content: 'foobaz', cursorPosition: 0 });

      expect(manager.redo('fo', 2)).toEqual({ content: 'fo', cursorPosition: 2 });
    });

    it('should still move the entry to the other stack when a step is skipped', () => {
      manager.recordCommand('replace', 5, 'ab', 'xyz', 5, 8);
      manager.undo('hello', 5);

      expect(manager.canUndo()).toBe(false);
      expect(manager.canRedo()).toBe(true);
    });
  });

  // ===========================================================================
  // Batch Operations
  // ===========================================================================

  describe('Batch Operations', () => {
    it('should record a batch as one replace group', () => {
      manager.beginBatch();
      manager.recordCommand('delete', 3, 'bar', '', 6, 3);
      manager.recordCommand('insert', 3, '', 'X', 3, 4);
      manager.endBatch();

      expect(manager.getUndoHistory()).toEqual([
        { category: 'replace', commandCount: 2, startTime: 0, endTime: 0, open: false },
      ]);
      expect(manager.undo('fooXbaz', 4)).toEqual({ content: 'foobarbaz', cursorPosition: 6 });
    });

    it('should commit the open group when a batch begins', () => {
      typeChars('ab', 0);
      manager.beginBatch('paste');
      manager.recordCommand('insert', 2, '', 'cd', 2, 4);
      manager.endBatch();

      expect(manager.getUndoHistory().map(entry => entry.category)).toEqual(['paste', 'typing']);
    });

    it('should start a fresh group after a batch ends', () => {
      manager.beginBatch();
      manager.recordCommand('delete', 3, 'bar', '', 6, 3);
      manager.recordCommand('insert', 3, '', 'X', 3, 4);
      manager.endBatch();
      typeChars('Y', 4);

      expect(manager.getState().undoCount).toBe(2);
    });

    it('should only commit on the outermost endBatch', () => {
      manager.beginBatch();
      manager.beginBatch('paste');
      manager.recordCommand('insert', 0, '', 'a', 0, 1);
      manager.endBatch();

      expect(manager.isInBatch()).toBe(true);
      expect(manager.isGroupOpen()).toBe(true);

      manager.recordCommand('insert', 1, '', 'b', 1, 2);
      manager.endBatch();

      expect(manager.isInBatch()).toBe(false);
      expect(manager.getUndoHistory()).toEqual([
        { category: 'replace', commandCount: 2, startTime: 0, endTime: 0, open: false },
      ]);
    });

    it('should ignore endBatch outside a batch', () => {
      typeChars('a', 0);
      manager.endBatch();

      expect(manager.isGroupOpen()).toBe(true);
    });
  });

  // ===========================================================================
  // History Management
  // ===========================================================================

  describe('History Management', () => {
    it('should cap the undo stack and evict the oldest groups', () => {
      for (let i = 0; i < 150; i++) {
        clock.advance(1001);
        manager.recordCommand('insert', i, '', 'a', i, i + 1);
      }

      expect(manager.getState().undoCount).toBe(100);

      let content = 'a'.repeat(150);
      let cursor = 150;
      let undone = 0;
      while (manager.canUndo()) {
        const result = manager.undo(content, cursor);
        content = result.content;
        cursor = result.cursorPosition;
        undone++;
      }

      expect(undone).toBe(100);
      expect(content).toBe('a'.repeat(50));
      expect(cursor).toBe(50);
    });

    it('should evict immediately when the cap is lowered', () => {
      for (let i = 0; i < 5; i++) {
        clock.advance(1001);
        typeChars('a', i);
      }
      manager.finalizeCurrentGroup();

      manager.setConfig({ maxUndoGroups: 2 });

      expect(manager.getState().undoCount).toBe(2);
    });

    it('should clear both stacks and the open group', () => {
      typeChars('a', 0);
      clock.advance(1001);
      typeChars('b', 1);
      manager.undo('ab', 2);
      typeChars('c', 1);

      manager.clear();

      expect(manager.canUndo()).toBe(false);
      expect(manager.canRedo()).toBe(false);
      expect(manager.isGroupOpen()).toBe(false);
      expect(manager.getUndoHistory()).toEqual([]);
    });
  });

  // ===========================================================================
  // Event System
  // ===========================================================================

  describe('Event System', () => {
    it('should call onRecord with the command and its group', () => {
      const onRecord = vi.fn();
      manager.setEventHandlers({ onRecord });

      const command = manager.recordCommand('insert', 0, '', 'a', 0, 1);

      expect(onRecord).toHaveBeenCalledWith(command, expect.any(CommandGroup));
    });

    it('should call onGroupClosed when a group is committed', () => {
      const onGroupClosed = vi.fn();
      manager.setEventHandlers({ onGroupClosed });

      typeChars('ab', 0);
      expect(onGroupClosed).not.toHaveBeenCalled();

      manager.finalizeCurrentGroup();
      expect(onGroupClosed).toHaveBeenCalledTimes(1);
      expect(onGroupClosed).toHaveBeenCalledWith(expect.objectContaining({ category: 'typing' }));
    });

    it('should call onUndo and onRedo', () => {
      const onUndo = vi.fn();
      const onRedo = vi.fn();
      manager.setEventHandlers({ onUndo, onRedo });

      typeChars('a', 0);
      manager.undo('a', 1);
      manager.redo('', 0);

      expect(onUndo).toHaveBeenCalledTimes(1);
      expect(onRedo).toHaveBeenCalledTimes(1);
    });

    it('should not call onUndo when there is nothing to undo', () => {
      const onUndo = vi.fn();
      manager.setEventHandlers({ onUndo });

      manager.undo('', 0);

      expect(onUndo).not.toHaveBeenCalled();
    });

    it('should call onStateChange after clear', () => {
      const onStateChange = vi.fn();
      typeChars('a', 0);

      manager.setEventHandlers({ onStateChange });
      manager.clear();

      expect(onStateChange).toHaveBeenCalledWith(expect.objectContaining({
        canUndo: false,
        undoCount: 0,
      }));
    });

    it('should merge handlers across calls', () => {
      const onUndo = vi.fn();
      const onRedo = vi.fn();
      manager.setEventHandlers({ onUndo });
      manager.setEventHandlers({ onRedo });

      typeChars('a', 0);
      manager.undo('a', 1);

      expect(onUndo).toHaveBeenCalledTimes(1);
    });
  });
});
