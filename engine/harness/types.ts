/**
 * Caretpad Headless Test Harness - Types
 *
 * Command protocol and output types for stdin/stdout testing.
 */

import type { TextRange } from '../core/types/index.js';
import type { UndoRedoState, HistoryEntry } from '../core/history/index.js';

// =============================================================================
// Command Types
// =============================================================================

export const COMMAND_TYPES = [
  // Content
  'LOAD',            // LOAD "text" (replaces document, discards history)
  'INSERT',          // INSERT "text"
  'TYPE',            // TYPE "text" (one insert per character)
  'BACKSPACE',       // BACKSPACE [count=n] [word=true]
  'DELETE',          // DELETE [count=n] [word=true]

  // Cursor
  'MOVE',            // MOVE -3
  'CURSOR',          // CURSOR 12 | CURSOR (query)
  'WORD_START',      // WORD_START
  'WORD_END',        // WORD_END
  'LINE',            // LINE 1 | LINE -1
  'GOTO_LINE',       // GOTO_LINE 3 (1-based)

  // Selection
  'SELECT',          // SELECT 0 5
  'SELECT_ALL',      // SELECT_ALL
  'CLEAR_SELECTION', // CLEAR_SELECTION
  'GET_SELECTION',   // GET_SELECTION

  // Clipboard
  'COPY',            // COPY
  'CUT',             // CUT
  'PASTE',           // PASTE

  // Keys
  'KEY',             // KEY ctrl+z | KEY shift+left shift+left

  // Completion
  'COMPLETE',        // COMPLETE (suggestions for the word at the cursor)
  'ACCEPT',          // ACCEPT [word] (replace the word at the cursor)

  // History
  'UNDO',            // UNDO
  'REDO',            // REDO
  'FINALIZE',        // FINALIZE (close the open group)
  'WAIT',            // WAIT 1500 (advances the harness clock)

  // State inspection
  'GET',             // GET (document content)
  'STATS',           // STATS
  'HISTORY',         // HISTORY
  'SNAPSHOT',        // SNAPSHOT

  // Utility
  'ECHO',            // ECHO message
  'ASSERT',          // ASSERT CONTENT == "abc"
  'ASSERT_ERROR',    // ASSERT_ERROR (next command should fail)

  // Control
  'RESET',           // RESET
  'QUIT',            // QUIT
] as const;

export type CommandType = (typeof COMMAND_TYPES)[number];

export function isCommandType(value: string): value is CommandType {
  return COMMAND_TYPES.some((type) => type === value);
}

export interface ParsedCommand {
  type: CommandType;
  args: string[];
  options: Record<string, string | boolean | number>;
  raw: string;
  lineNumber: number;
}

/**
 * Values readable by ASSERT.
 */
export type AssertTarget =
  | 'CONTENT'
  | 'CURSOR'
  | 'SELECTION'
  | 'SELECTED_TEXT'
  | 'LENGTH'
  | 'LINE'
  | 'COLUMN'
  | 'CAN_UNDO'
  | 'CAN_REDO'
  | 'UNDO_COUNT'
  | 'REDO_COUNT';

// =============================================================================
// Output Types
// =============================================================================

export type OutputType =
  | 'result'    // Command result
  | 'value'     // Queried value
  | 'snapshot'  // Full state snapshot
  | 'history'   // Undo/redo group listing
  | 'error'     // Error message
  | 'info'      // Info message
  | 'stats'     // Statistics
  | 'assert'    // Assertion result
  | 'echo';     // Echo output

export interface OutputBase {
  type: OutputType;
  timestamp: number;
  command?: string;
  lineNumber?: number;
}

export interface ResultOutput extends OutputBase {
  type: 'result';
  success: boolean;
  data?: unknown;
}

export interface ValueOutput extends OutputBase {
  type: 'value';
  value: unknown;
}

export interface SnapshotOutput extends OutputBase {
  type: 'snapshot';
  content: string;
  cursor: CursorSnapshot;
  selection: SelectionSnapshot | null;
  history: UndoRedoState;
}

export interface HistoryOutput extends OutputBase {
  type: 'history';
  undo: HistoryEntry[];
  redo: HistoryEntry[];
}

export type HarnessErrorType = 'CommandTimeout' | 'StepLimitExceeded' | 'ScriptAborted';

export interface ErrorOutput extends OutputBase {
  type: 'error';
  message: string;
  stack?: string;
  errorType?: HarnessErrorType;
}

export interface InfoOutput extends OutputBase {
  type: 'info';
  message: string;
}

export interface StatsOutput extends OutputBase {
  type: 'stats';
  characters: number;
  words: number;
  lines: number;
  memoryKB: number;
  undoStackSize: number;
  redoStackSize: number;
}

export interface AssertOutput extends OutputBase {
  type: 'assert';
  passed: boolean;
  expected: unknown;
  actual: unknown;
  message?: string;
}

export interface EchoOutput extends OutputBase {
  type: 'echo';
  message: string;
}

export type Output =
  | ResultOutput
  | ValueOutput
  | SnapshotOutput
  | HistoryOutput
  | ErrorOutput
  | InfoOutput
  | StatsOutput
  | AssertOutput
  | EchoOutput;

// =============================================================================
// Snapshot Types
// =============================================================================

export interface CursorSnapshot {
  index: number;
  line: number;
  column: number;
}

export interface SelectionSnapshot extends TextRange {
  text: string;
}

// =============================================================================
// Harness Configuration
// =============================================================================

export interface HarnessConfig {
  /** Output format: 'json' (one JSON per line) or 'pretty' (human readable) */
  outputFormat: 'json' | 'pretty';
  /** Include timestamps in pretty output */
  includeTimestamps: boolean;
  /** Include line numbers in output */
  includeLineNumbers: boolean;
  /** Stop on first error */
  stopOnError: boolean;
  /** Echo commands before executing */
  echoCommands: boolean;
  /** Verbose mode (extra logging) */
  verbose: boolean;

  // === Editor Configuration ===
  /** Undo groups kept before the oldest is evicted */
  maxUndoGroups: number;
  /** Pause in ms that closes the open undo group */
  groupingTimeoutMs: number;
  /** KEY Enter carries indentation */
  autoIndent: boolean;
  /** KEY of an opening bracket or quote inserts its partner */
  autoClosePairs: boolean;

  // === Safety Configuration ===
  /** Per-command timeout in milliseconds (default: 2000ms) */
  commandTimeoutMs: number;
  /** Maximum commands per script execution (default: 10000) */
  maxStepsPerScript: number;
  /** Continue execution on timeout (vs. abort script) */
  continueOnTimeout: boolean;
}

export const DEFAULT_CONFIG: HarnessConfig = {
  outputFormat: 'json',
  includeTimestamps: true,
  includeLineNumbers: true,
  stopOnError: false,
  echoCommands: false,
  verbose: false,
  // Editor defaults
  maxUndoGroups: 100,
  groupingTimeoutMs: 1000,
  autoIndent: true,
  autoClosePairs: true,
  // Safety defaults
  commandTimeoutMs: 2000,
  maxStepsPerScript: 10000,
  continueOnTimeout: false,
};

// =============================================================================
// Safety Error Types
// =============================================================================

export interface TimeoutErrorOutput extends ErrorOutput {
  errorType: 'CommandTimeout';
  timeoutMs: number;
}

export interface StepLimitErrorOutput extends ErrorOutput {
  errorType: 'StepLimitExceeded';
  stepCount: number;
  maxSteps: number;
}

export interface AbortErrorOutput extends ErrorOutput {
  errorType: 'ScriptAborted';
  reason: string;
}
