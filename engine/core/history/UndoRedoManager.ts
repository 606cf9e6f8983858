/**
 * Caretpad Engine - Undo/Redo Manager (Grouped Command Log)
 *
 * Records primitive text mutations as EditCommands and folds them into
 * CommandGroups, which undo/redo treat as single units.
 *
 * Features:
 * - Heuristic grouping: category, idle timeout, positional adjacency
 * - Batch Operations: compound edits (delete selection + insert) undo as one step
 * - Pure replay: undo/redo transform a (content, cursor) pair and return a new one
 * - Bounded history: oldest groups are evicted past maxUndoGroups
 * - Event System: optional hooks for UI state synchronization
 * - Deterministic: time comes from an injected clock
 *
 * Design:
 * - The manager never holds the document; the buffer passes content in
 * - Commands are frozen on creation and never re-ordered
 * - Recording a command always invalidates the redo stack
 */

import type { EditKind, GroupCategory, Clock, ReplayResult } from '../types/index.js';
import { clamp, monotonicClock } from '../types/index.js';
import { EditCommand, CommandGroup } from './EditCommand.js';

// =============================================================================
// Types - Classification
// =============================================================================

/**
 * Maps a recorded command to the category used for grouping decisions.
 */
export type CommandClassifier = (command: EditCommand) => GroupCategory;

const TYPING_CHAR = /^[\p{L}\p{Nd}]$/u;

/**
 * Default category policy.
 *
 * - typing: a single letter or digit
 * - newline: exactly "\n"
 * - paste: more than one character at once
 * - insert: any other single character (space, punctuation)
 */
export const classifyCommand: CommandClassifier = (command) => {
  switch (command.kind) {
    case 'insert':
      if (command.insertedText === '\n') return 'newline';
      if (command.insertedText.length > 1) return 'paste';
      if (TYPING_CHAR.test(command.insertedText)) return 'typing';
      return 'insert';
    case 'delete':
    case 'backspace':
      return 'deletion';
    case 'replace':
      return 'replace';
    default:
      return 'other';
  }
};

// =============================================================================
// Types - State & Events
// =============================================================================

export interface UndoRedoState {
  /** Can undo (a committed group or a non-empty open group exists) */
  canUndo: boolean;
  /** Can redo */
  canRedo: boolean;
  /** Groups reachable by undo, the open group included */
  undoCount: number;
  /** Redo stack size */
  redoCount: number;
  /** Category of the group currently collecting commands */
  openCategory: GroupCategory | null;
  /** Category the next undo would revert */
  undoCategory: GroupCategory | null;
  /** Category the next redo would re-apply */
  redoCategory: GroupCategory | null;
  /** Total memory usage estimate (bytes) */
  memoryUsage: number;
}

export interface HistoryEntry {
  category: GroupCategory;
  commandCount: number;
  startTime: number;
  endTime: number;
  /** True for the group still collecting commands */
  open: boolean;
}

export interface UndoRedoEvents {
  /** Called when a command is recorded */
  onRecord?: (command: EditCommand, group: CommandGroup) => void;
  /** Called when a group is committed to the undo stack */
  onGroupClosed?: (group: CommandGroup) => void;
  /** Called when undo is performed */
  onUndo?: (group: CommandGroup) => void;
  /** Called when redo is performed */
  onRedo?: (group: CommandGroup) => void;
  /** Called when state changes */
  onStateChange?: (state: UndoRedoState) => void;
}

export interface UndoRedoConfig {
  /** Maximum number of committed groups to keep (default: 100) */
  maxUndoGroups?: number;
  /** Idle gap in ms that closes the open group (default: 1000) */
  groupingTimeoutMs?: number;
  /** Monotonic millisecond time source */
  clock?: Clock;
  /** Category policy */
  classify?: CommandClassifier;
  /** Categories whose commands must be positionally adjacent to merge */
  contiguousCategories?: ReadonlyArray<GroupCategory>;
}

export const DEFAULT_UNDO_CONFIG: Required<UndoRedoConfig> = {
  maxUndoGroups: 100,
  groupingTimeoutMs: 1000,
  clock: monotonicClock,
  classify: classifyCommand,
  contiguousCategories: ['typing', 'deletion'],
};

// =============================================================================
// Undo/Redo Manager
// =============================================================================

export class UndoRedoManager {
  /** Undo stack (most recent at end) */
  private undoStack: CommandGroup[] = [];

  /** Redo stack (most recent at end) */
  private redoStack: CommandGroup[] = [];

  /** Group collecting commands, or null when idle */
  private currentGroup: CommandGroup | null = null;

  /** Clock reading of the last recorded command */
  private lastActionTime: number | null = null;

  /** Nesting depth of beginBatch() calls */
  private batchDepth: number = 0;
  private batchCategory: GroupCategory = 'replace';

  /** Event handlers */
  private events: UndoRedoEvents = {};

  /** Configuration */
  private config: Required<UndoRedoConfig>;

  constructor(config: UndoRedoConfig = {}) {
    this.config = {
      maxUndoGroups: config.maxUndoGroups ?? DEFAULT_UNDO_CONFIG.maxUndoGroups,
      groupingTimeoutMs: config.groupingTimeoutMs ?? DEFAULT_UNDO_CONFIG.groupingTimeoutMs,
      clock: config.clock ?? DEFAULT_UNDO_CONFIG.clock,
      classify: config.classify ?? DEFAULT_UNDO_CONFIG.classify,
      contiguousCategories: config.contiguousCategories ?? DEFAULT_UNDO_CONFIG.contiguousCategories,
    };
  }

  // ===========================================================================
  // Configuration
  // ===========================================================================

  /**
   * Set event handlers.
   */
  setEventHandlers(events: UndoRedoEvents): void {
    this.events = { ...this.events, ...events };
  }

  /**
   * Update configuration. Lowering maxUndoGroups evicts immediately.
   */
  setConfig(config: Partial<UndoRedoConfig>): void {
    this.config = {
      maxUndoGroups: config.maxUndoGroups ?? this.config.maxUndoGroups,
      groupingTimeoutMs: config.groupingTimeoutMs ?? this.config.groupingTimeoutMs,
      clock: config.clock ?? this.config.clock,
      classify: config.classify ?? this.config.classify,
      contiguousCategories: config.contiguousCategories ?? this.config.contiguousCategories,
    };
    this.evictOverflow();
  }

  // ===========================================================================
  // State Queries
  // ===========================================================================

  getState(): UndoRedoState {
    const open = this.currentGroup !== null && !this.currentGroup.isEmpty;
    const nextUndo = open ? this.currentGroup : this.peek(this.undoStack);
    const nextRedo = this.peek(this.redoStack);

    return {
      canUndo: this.canUndo(),
      canRedo: this.canRedo(),
      undoCount: this.undoStack.length + (open ? 1 : 0),
      redoCount: this.redoStack.length,
      openCategory: this.getOpenCategory(),
      undoCategory: nextUndo?.category ?? null,
      redoCategory: nextRedo?.category ?? null,
      memoryUsage: this.getMemoryUsage(),
    };
  }

  canUndo(): boolean {
    return this.undoStack.length > 0 || (this.currentGroup !== null && !this.currentGroup.isEmpty);
  }

  canRedo(): boolean {
    return this.redoStack.length > 0;
  }

  isGroupOpen(): boolean {
    return this.currentGroup !== null;
  }

  getOpenCategory(): GroupCategory | null {
    return this.currentGroup?.category ?? null;
  }

  /**
   * Check if currently recording a batch.
   */
  isInBatch(): boolean {
    return this.batchDepth > 0;
  }

  // ===========================================================================
  // Recording
  // ===========================================================================

  /**
   * Record a mutation the caller has already applied to its content.
   */
  recordCommand(
    kind: EditKind,
    position: number,
    removedText: string,
    insertedText: string,
    cursorBefore: number,
    cursorAfter: number
  ): EditCommand {
    const now = this.config.clock();
    const command = new EditCommand({
      kind,
      position,
      removedText,
      insertedText,
      cursorBefore,
      cursorAfter,
      timestamp: now,
    });

    this.redoStack = [];

    let group = this.currentGroup;

    if (this.batchDepth > 0) {
      if (group === null) {
        group = new CommandGroup(this.batchCategory, now);
        this.currentGroup = group;
      }
    } else {
      const category = this.config.classify(command);
      if (group === null || this.shouldStartNewGroup(group, command, category, now)) {
        this.commitCurrentGroup();
        group = new CommandGroup(category, now);
        this.currentGroup = group;
      }
    }

    group.append(command, now);
    this.lastActionTime = now;

    this.evictOverflow();

    this.events.onRecord?.(command, group);
    this.notifyStateChange();

    return command;
  }

  /**
   * Close the open group. Idempotent.
   */
  finalizeCurrentGroup(): void {
    if (this.currentGroup === null) return;
    this.commitCurrentGroup();
    this.evictOverflow();
    this.notifyStateChange();
  }

  // ===========================================================================
  // Batch Operations
  // ===========================================================================

  /**
   * Begin a batch. Commands recorded until the matching endBatch() form
   * one group labelled `category`, bypassing the grouping heuristic.
   * Supports nesting; only the outermost batch decides the category.
   */
  beginBatch(category: GroupCategory = 'replace'): void {
    if (this.batchDepth === 0) {
      this.commitCurrentGroup();
      this.batchCategory = category;
    }
    this.batchDepth++;
  }

  /**
   * End a batch. The outermost call commits the batch group.
   */
  endBatch(): void {
    if (this.batchDepth === 0) return;
    this.batchDepth--;
    if (this.batchDepth === 0) {
      this.finalizeCurrentGroup();
    }
  }

  // ===========================================================================
  // Undo/Redo Operations
  // ===========================================================================

  /**
   * Revert the most recent group against `content`.
   * Returns the input unchanged when there is nothing to undo.
   */
  undo(content: string, cursorPosition: number): ReplayResult {
    this.finalizeCurrentGroup();

    const group = this.undoStack.pop();
    if (group === undefined) return { content, cursorPosition };

    this.redoStack.push(group);

    let text = content;
    let cursor = cursorPosition;
    const commands = group.commands;
    for (let i = commands.length - 1; i >= 0; i--) {
      const command = commands[i];
      text = revertCommand(text, command);
      cursor = command.cursorBefore;
    }

    this.events.onUndo?.(group);
    this.notifyStateChange();

    return { content: text, cursorPosition: clamp(cursor, 0, text.length) };
  }

  /**
   * Re-apply the most recently undone group against `content`.
   * Returns the input unchanged when there is nothing to redo.
   */
  redo(content: string, cursorPosition: number): ReplayResult {
    this.finalizeCurrentGroup();

    const group = this.redoStack.pop();
    if (group === undefined) return { content, cursorPosition };

    this.undoStack.push(group);

    let text = content;
    let cursor = cursorPosition;
    for (const command of group.commands) {
      text = applyCommand(text, command);
      cursor = command.cursorAfter;
    }

    this.events.onRedo?.(group);
    this.notifyStateChange();

    return { content: text, cursorPosition: clamp(cursor, 0, text.length) };
  }

  // ===========================================================================
  // History Management
  // ===========================================================================

  /**
   * Undo history (most recent first), the open group included.
   */
  getUndoHistory(): HistoryEntry[] {
    const entries = this.undoStack.map(group => toHistoryEntry(group, false)).reverse();
    if (this.currentGroup !== null && !this.currentGroup.isEmpty) {
      entries.unshift(toHistoryEntry(this.currentGroup, true));
    }
    return entries;
  }

  /**
   * Redo history (most recent first).
   */
  getRedoHistory(): HistoryEntry[] {
    return this.redoStack.map(group => toHistoryEntry(group, false)).reverse();
  }

  /**
   * Clear all history, the open group included.
   */
  clear(): void {
    this.undoStack = [];
    this.redoStack = [];
    this.currentGroup = null;
    this.lastActionTime = null;
    this.batchDepth = 0;
    this.notifyStateChange();
  }

  // ===========================================================================
  // Private Helper Methods
  // ===========================================================================

  private shouldStartNewGroup(
    group: CommandGroup,
    command: EditCommand,
    category: GroupCategory,
    now: number
  ): boolean {
    if (this.lastActionTime !== null && now - this.lastActionTime > this.config.groupingTimeoutMs) {
      return true;
    }

    if (category !== group.category) return true;

    const last = group.last;
    if (last === undefined) return false;

    if (this.config.contiguousCategories.includes(category)) {
      return Math.abs(command.position - continuationPoint(last)) > 1;
    }

    return false;
  }

  private commitCurrentGroup(): void {
    const group = this.currentGroup;
    this.currentGroup = null;
    if (group === null || group.isEmpty) return;

    this.undoStack.push(group);
    this.events.onGroupClosed?.(group);
  }

  /**
   * Keep committed groups plus the open group within maxUndoGroups.
   */
  private evictOverflow(): void {
    const reserved = this.currentGroup !== null && !this.currentGroup.isEmpty ? 1 : 0;
    const max = Math.max(0, this.config.maxUndoGroups - reserved);
    if (this.undoStack.length > max) {
      this.undoStack.splice(0, this.undoStack.length - max);
    }
  }

  private getMemoryUsage(): number {
    let total = this.currentGroup?.getMemorySize() ?? 0;
    for (const group of this.undoStack) total += group.getMemorySize();
    for (const group of this.redoStack) total += group.getMemorySize();
    return total;
  }

  private peek(stack: CommandGroup[]): CommandGroup | null {
    return stack.length > 0 ? stack[stack.length - 1] : null;
  }

  private notifyStateChange(): void {
    this.events.onStateChange?.(this.getState());
  }
}

// =============================================================================
// Replay Helpers
// =============================================================================

/**
 * Offset the next command must sit near to extend a contiguous run:
 * the end of inserted text, or the deletion point.
 */
function continuationPoint(command: EditCommand): number {
  return command.insertedText.length > 0 ? command.insertedEnd : command.position;
}

/**
 * Whether `text` can sit at `position` in `content`. A step that does not
 * fit is skipped whole, leaving the content unchanged for that step.
 */
function fitsAt(content: string, position: number, text: string): boolean {
  return position >= 0 && position + text.length <= content.length;
}

function spliceText(content: string, position: number, removed: string, inserted: string): string {
  return content.slice(0, position) + inserted + content.slice(position + removed.length);
}

function revertCommand(content: string, command: EditCommand): string {
  const { position, removedText, insertedText } = command;
  if (!fitsAt(content, position, insertedText)) return content;
  return spliceText(content, position, insertedText, removedText);
}

function applyCommand(content: string, command: EditCommand): string {
  const { position, removedText, insertedText } = command;
  if (!fitsAt(content, position, removedText)) return content;
  return spliceText(content, position, removedText, insertedText);
}

function toHistoryEntry(group: CommandGroup, open: boolean): HistoryEntry {
  return {
    category: group.category,
    commandCount: group.length,
    startTime: group.startTime,
    endTime: group.endTime,
    open,
  };
}

// =============================================================================
// Factory Functions
// =============================================================================

/**
 * Create a new UndoRedoManager instance.
 */
export function createUndoRedoManager(config?: UndoRedoConfig): UndoRedoManager {
  return new UndoRedoManager(config);
}
