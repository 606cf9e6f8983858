/**
 * Caretpad Headless Test Harness - Runner
 *
 * Executes parsed commands against a TextBuffer and its EditorController
 * and produces structured output.
 *
 * Time is a manual clock: it only moves on WAIT, so grouping decisions in a
 * script are deterministic.
 */

import type {
  ParsedCommand,
  Output,
  ResultOutput,
  ValueOutput,
  SnapshotOutput,
  HistoryOutput,
  ErrorOutput,
  InfoOutput,
  StatsOutput,
  AssertOutput,
  EchoOutput,
  AssertTarget,
  CursorSnapshot,
  SelectionSnapshot,
  HarnessConfig,
  TimeoutErrorOutput,
  StepLimitErrorOutput,
  AbortErrorOutput,
} from './types.js';
import { DEFAULT_CONFIG } from './types.js';
import { CommandParser, ParseError } from './CommandParser.js';
import type { ManualClock } from '../core/types/index.js';
import { createManualClock } from '../core/types/index.js';
import { TextBuffer } from '../core/buffer/TextBuffer.js';
import { EditorController, InMemoryClipboard } from '../core/editing/EditorController.js';
import type { EditorUpdate } from '../core/editing/EditorController.js';
import { parseKeyCombo } from '../core/input/KeyboardHandler.js';

// =============================================================================
// Custom Error Classes
// =============================================================================

/**
 * Error thrown when a command exceeds its timeout.
 */
export class CommandTimeoutError extends Error {
  command: string;
  timeoutMs: number;

  constructor(command: string, timeoutMs: number) {
    super(`Command timed out after ${timeoutMs}ms: ${command}`);
    this.name = 'CommandTimeoutError';
    this.command = command;
    this.timeoutMs = timeoutMs;
  }
}

type AssertValue = string | number | boolean | null;

const ASSERT_TARGETS: readonly AssertTarget[] = [
  'CONTENT',
  'CURSOR',
  'SELECTION',
  'SELECTED_TEXT',
  'LENGTH',
  'LINE',
  'COLUMN',
  'CAN_UNDO',
  'CAN_REDO',
  'UNDO_COUNT',
  'REDO_COUNT',
];

function isAssertTarget(value: string): value is AssertTarget {
  return ASSERT_TARGETS.some((target) => target === value);
}

// =============================================================================
// Harness Runner
// =============================================================================

export class HarnessRunner {
  private config: HarnessConfig;
  private readonly parser = new CommandParser();

  private clock: ManualClock;
  private clipboard: InMemoryClipboard;
  private buffer: TextBuffer;
  private editor: EditorController;

  private expectError: boolean = false;

  // === Safety state ===
  /** Abort controller for cancellation */
  private abortController: AbortController | null = null;
  /** Current step count in script execution */
  private stepCount: number = 0;
  /** Whether the runner is currently executing */
  private isExecuting: boolean = false;

  // Output handler
  private outputHandler: (output: Output) => void;

  constructor(
    config: Partial<HarnessConfig> = {},
    outputHandler?: (output: Output) => void
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.outputHandler = outputHandler ?? this.defaultOutputHandler.bind(this);

    this.clock = createManualClock();
    this.clipboard = new InMemoryClipboard();
    this.buffer = this.createBuffer();
    this.editor = this.createEditor();
  }

  // ===========================================================================
  // Command Execution
  // ===========================================================================

  /**
   * Execute a single command with timeout protection.
   */
  async execute(cmd: ParsedCommand): Promise<Output> {
    if (this.abortController?.signal.aborted) {
      return this.createAbortError('Script was aborted', cmd);
    }

    try {
      if (this.config.echoCommands) {
        this.emit(this.createEcho(cmd.raw, cmd));
      }

      const result = await this.executeWithTimeout(cmd);

      // Check if we expected an error but didn't get one
      if (this.expectError && cmd.type !== 'ASSERT_ERROR') {
        this.expectError = false;
        return this.createError('Expected error but command succeeded', cmd);
      }

      return result;
    } catch (error) {
      if (this.expectError) {
        this.expectError = false;
        return this.createResult(true, { expectedError: true }, cmd);
      }

      const err = error instanceof Error ? error : new Error(String(error));
      return this.createError(err.message, cmd, err.stack);
    }
  }

  /**
   * Execute a command with timeout wrapper.
   * @internal
   */
  private async executeWithTimeout(cmd: ParsedCommand): Promise<Output> {
    const timeoutMs = this.config.commandTimeoutMs;
    let timer: ReturnType<typeof setTimeout> | undefined;

    const timeoutPromise = new Promise<Output>((_, reject) => {
      timer = setTimeout(() => {
        reject(new CommandTimeoutError(cmd.raw, timeoutMs));
      }, timeoutMs);
    });

    try {
      return await Promise.race([
        this.executeCommand(cmd),
        timeoutPromise,
      ]);
    } catch (error) {
      if (error instanceof CommandTimeoutError) {
        return this.createTimeoutError(error.command, error.timeoutMs, cmd);
      }
      throw error;
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Execute multiple commands with step limit protection.
   */
  async executeAll(commands: ParsedCommand[]): Promise<Output[]> {
    const outputs: Output[] = [];
    this.stepCount = 0;
    this.abortController = new AbortController();
    this.isExecuting = true;

    try {
      for (const cmd of commands) {
        if (this.abortController.signal.aborted) {
          outputs.push(this.createAbortError('Script was aborted', cmd));
          break;
        }

        this.stepCount++;
        if (this.stepCount > this.config.maxStepsPerScript) {
          outputs.push(this.createStepLimitError(this.stepCount, this.config.maxStepsPerScript, cmd));
          break;
        }

        const output = await this.execute(cmd);
        outputs.push(output);
        this.emit(output);

        if (output.type === 'error') {
          if (output.errorType === 'CommandTimeout' && !this.config.continueOnTimeout) {
            break;
          }
          if (this.config.stopOnError) {
            break;
          }
        }

        if (cmd.type === 'QUIT') {
          break;
        }
      }
    } finally {
      this.isExecuting = false;
      this.abortController = null;
    }

    return outputs;
  }

  /**
   * Route command to appropriate handler.
   */
  private async executeCommand(cmd: ParsedCommand): Promise<Output> {
    switch (cmd.type) {
      // Content
      case 'LOAD': return this.cmdLoad(cmd);
      case 'INSERT': return this.cmdInsert(cmd);
      case 'TYPE': return this.cmdType(cmd);
      case 'BACKSPACE': return this.cmdRemove(cmd, 'backward');
      case 'DELETE': return this.cmdRemove(cmd, 'forward');

      // Cursor
      case 'MOVE': return this.cmdMove(cmd);
      case 'CURSOR': return this.cmdCursor(cmd);
      case 'WORD_START': return this.cmdWordStart(cmd);
      case 'WORD_END': return this.cmdWordEnd(cmd);
      case 'LINE': return this.cmdLine(cmd);
      case 'GOTO_LINE': return this.cmdGotoLine(cmd);

      // Selection
      case 'SELECT': return this.cmdSelect(cmd);
      case 'SELECT_ALL': return this.cmdSelectAll(cmd);
      case 'CLEAR_SELECTION': return this.cmdClearSelection(cmd);
      case 'GET_SELECTION': return this.cmdGetSelection(cmd);

      // Clipboard
      case 'COPY': return this.cmdClipboard(cmd, 'copy');
      case 'CUT': return this.cmdClipboard(cmd, 'cut');
      case 'PASTE': return this.cmdClipboard(cmd, 'paste');

      // Keys
      case 'KEY': return this.cmdKey(cmd);

      // Completion
      case 'COMPLETE': return this.cmdComplete(cmd);
      case 'ACCEPT': return this.cmdAccept(cmd);

      // History
      case 'UNDO': return this.cmdUndo(cmd);
      case 'REDO': return this.cmdRedo(cmd);
      case 'FINALIZE': return this.cmdFinalize(cmd);
      case 'WAIT': return this.cmdWait(cmd);

      // State inspection
      case 'GET': return this.cmdGet(cmd);
      case 'STATS': return this.cmdStats(cmd);
      case 'HISTORY': return this.cmdHistory(cmd);
      case 'SNAPSHOT': return this.cmdSnapshot(cmd);

      // Utility
      case 'ECHO': return this.cmdEcho(cmd);
      case 'ASSERT': return this.cmdAssert(cmd);
      case 'ASSERT_ERROR': return this.cmdAssertError(cmd);

      // Control
      case 'RESET': return this.cmdReset(cmd);
      case 'QUIT': return this.cmdQuit(cmd);
    }
  }

  // ===========================================================================
  // Content Commands
  // ===========================================================================

  private cmdLoad(cmd: ParsedCommand): Output {
    this.buffer.setContent(cmd.args.join(' '));
    return this.createResult(true, { length: this.buffer.length }, cmd);
  }

  private cmdInsert(cmd: ParsedCommand): Output {
    const text = cmd.args.join(' ');
    if (text === '') throw new Error('INSERT requires text');

    this.buffer.insertText(text);
    return this.createResult(true, { cursor: this.buffer.cursorIndex }, cmd);
  }

  private cmdType(cmd: ParsedCommand): Output {
    const text = cmd.args.join(' ');
    if (text === '') throw new Error('TYPE requires text');

    let typed = 0;
    for (const ch of text) {
      this.buffer.insertText(ch);
      typed++;
    }

    return this.createResult(true, { typed, cursor: this.buffer.cursorIndex }, cmd);
  }

  private cmdRemove(cmd: ParsedCommand, direction: 'backward' | 'forward'): Output {
    const count = this.optionInt(cmd, 'count', 1);
    if (count < 1) throw new Error(`${cmd.type} count must be at least 1, got: ${count}`);
    const word = cmd.options.word === true;

    const before = this.buffer.length;
    for (let i = 0; i < count; i++) {
      if (direction === 'backward') this.buffer.performBackspace(word);
      else this.buffer.performDelete(word);
    }

    return this.createResult(true, {
      removed: before - this.buffer.length,
      cursor: this.buffer.cursorIndex,
    }, cmd);
  }

  // ===========================================================================
  // Cursor Commands
  // ===========================================================================

  private cmdMove(cmd: ParsedCommand): Output {
    const delta = this.requireInt(cmd, 0, 'MOVE requires a delta');
    this.buffer.moveCursor(delta);
    return this.createResult(true, { cursor: this.buffer.cursorIndex }, cmd);
  }

  private cmdCursor(cmd: ParsedCommand): Output {
    if (cmd.args.length === 0) {
      return this.createValue(this.getCursorSnapshot(), cmd);
    }

    this.buffer.setCursorPosition(this.requireInt(cmd, 0, 'CURSOR requires a position'));
    return this.createResult(true, { cursor: this.buffer.cursorIndex }, cmd);
  }

  private cmdWordStart(cmd: ParsedCommand): Output {
    this.buffer.moveToWordStart();
    return this.createResult(true, { cursor: this.buffer.cursorIndex }, cmd);
  }

  private cmdWordEnd(cmd: ParsedCommand): Output {
    this.buffer.moveToWordEnd();
    return this.createResult(true, { cursor: this.buffer.cursorIndex }, cmd);
  }

  private cmdLine(cmd: ParsedCommand): Output {
    const delta = this.requireInt(cmd, 0, 'LINE requires a delta');
    const moved = this.buffer.moveCursorLine(delta);
    return this.createResult(moved, { cursor: this.buffer.cursorIndex }, cmd);
  }

  private cmdGotoLine(cmd: ParsedCommand): Output {
    const line = this.requireInt(cmd, 0, 'GOTO_LINE requires a line number');
    const moved = this.buffer.goToLine(line);
    return this.createResult(moved, { cursor: this.buffer.cursorIndex }, cmd);
  }

  // ===========================================================================
  // Selection Commands
  // ===========================================================================

  private cmdSelect(cmd: ParsedCommand): Output {
    const start = this.requireInt(cmd, 0, 'SELECT requires start and end offsets');
    const end = this.requireInt(cmd, 1, 'SELECT requires start and end offsets');

    this.buffer.setCursorPosition(start);
    this.buffer.startSelection();
    this.buffer.setCursorPosition(end);
    this.buffer.updateSelection();

    return this.createResult(true, { selection: this.getSelectionSnapshot() }, cmd);
  }

  private cmdSelectAll(cmd: ParsedCommand): Output {
    this.buffer.selectAll();
    return this.createResult(true, { selection: this.getSelectionSnapshot() }, cmd);
  }

  private cmdClearSelection(cmd: ParsedCommand): Output {
    this.buffer.clearSelection();
    return this.createResult(true, undefined, cmd);
  }

  private cmdGetSelection(cmd: ParsedCommand): Output {
    return this.createValue(this.getSelectionSnapshot(), cmd);
  }

  // ===========================================================================
  // Clipboard & Key Commands
  // ===========================================================================

  private cmdClipboard(cmd: ParsedCommand, action: 'copy' | 'cut' | 'paste'): Output {
    const update = this.editor.apply({ type: 'clipboard', action });
    return this.createResult(true, this.describeUpdate(update), cmd);
  }

  private cmdKey(cmd: ParsedCommand): Output {
    if (cmd.args.length === 0) throw new Error('KEY requires at least one key combo');

    let last: EditorUpdate | null = null;
    let handled = 0;

    for (const combo of cmd.args) {
      const event = parseKeyCombo(combo);
      if (!event) throw new Error(`Invalid key combo: ${combo}`);

      last = this.editor.handleKeyDown(event);
      if (last.handled) handled++;
    }

    return this.createResult(handled > 0, {
      keys: cmd.args.length,
      handled,
      ...(last ? this.describeUpdate(last) : {}),
    }, cmd);
  }

  // ===========================================================================
  // Completion Commands
  // ===========================================================================

  private cmdComplete(cmd: ParsedCommand): Output {
    return this.createValue(this.editor.getCompletions(), cmd);
  }

  private cmdAccept(cmd: ParsedCommand): Output {
    const update = this.editor.acceptCompletion(cmd.args[0]);
    return this.createResult(update.handled, this.describeUpdate(update), cmd);
  }

  // ===========================================================================
  // History Commands
  // ===========================================================================

  private cmdUndo(cmd: ParsedCommand): Output {
    const canUndo = this.buffer.canUndo;
    this.buffer.undo();
    return this.createResult(canUndo, this.describeHistory(), cmd);
  }

  private cmdRedo(cmd: ParsedCommand): Output {
    const canRedo = this.buffer.canRedo;
    this.buffer.redo();
    return this.createResult(canRedo, this.describeHistory(), cmd);
  }

  private cmdFinalize(cmd: ParsedCommand): Output {
    this.buffer.finalizeCurrentGroup();
    return this.createResult(true, this.describeHistory(), cmd);
  }

  private cmdWait(cmd: ParsedCommand): Output {
    const ms = this.requireInt(cmd, 0, 'WAIT requires a duration in ms');
    if (ms < 0) throw new Error(`WAIT requires a non-negative duration, got: ${ms}`);

    this.clock.advance(ms);
    const finalized = this.editor.tick();

    return this.createResult(true, { now: this.clock.now(), finalized }, cmd);
  }

  // ===========================================================================
  // Inspection Commands
  // ===========================================================================

  private cmdGet(cmd: ParsedCommand): Output {
    return this.createValue(this.buffer.content, cmd);
  }

  private cmdStats(cmd: ParsedCommand): StatsOutput {
    const stats = this.buffer.getStats();
    const history = this.buffer.getHistoryState();

    return {
      ...this.createBase(cmd),
      type: 'stats',
      characters: stats.characters,
      words: stats.words,
      lines: stats.lines,
      memoryKB: Math.ceil(history.memoryUsage / 1024),
      undoStackSize: history.undoCount,
      redoStackSize: history.redoCount,
    };
  }

  private cmdHistory(cmd: ParsedCommand): HistoryOutput {
    return {
      ...this.createBase(cmd),
      type: 'history',
      undo: this.buffer.getUndoHistory(),
      redo: this.buffer.getRedoHistory(),
    };
  }

  private cmdSnapshot(cmd: ParsedCommand): SnapshotOutput {
    return {
      ...this.createBase(cmd),
      type: 'snapshot',
      content: this.buffer.content,
      cursor: this.getCursorSnapshot(),
      selection: this.getSelectionSnapshot(),
      history: this.buffer.getHistoryState(),
    };
  }

  // ===========================================================================
  // Utility Commands
  // ===========================================================================

  private cmdEcho(cmd: ParsedCommand): Output {
    return this.createEcho(cmd.args.join(' '), cmd);
  }

  private cmdAssert(cmd: ParsedCommand): Output {
    const [targetArg, operator, expected] = cmd.args;
    if (!targetArg || !operator) throw new Error('ASSERT requires target, operator, and expected value');

    const target = targetArg.toUpperCase();
    if (!isAssertTarget(target)) throw new Error(`Unknown assert target: ${targetArg}`);

    const actual = this.readAssertTarget(target);
    const expectedValue = this.parseAssertValue(expected);
    let passed: boolean;

    switch (operator) {
      case '==':
      case '=':
        passed = String(actual) === String(expectedValue);
        break;
      case '===':
        passed = actual === expectedValue;
        break;
      case '!=':
      case '<>':
        passed = String(actual) !== String(expectedValue);
        break;
      case '>':
        passed = Number(actual) > Number(expectedValue);
        break;
      case '<':
        passed = Number(actual) < Number(expectedValue);
        break;
      case '>=':
        passed = Number(actual) >= Number(expectedValue);
        break;
      case '<=':
        passed = Number(actual) <= Number(expectedValue);
        break;
      default:
        throw new Error(`Unknown operator: ${operator}`);
    }

    const output: AssertOutput = {
      ...this.createBase(cmd),
      type: 'assert',
      passed,
      expected: expectedValue,
      actual,
    };
    if (!passed) {
      output.message = `Assertion failed: ${target} ${operator} ${JSON.stringify(expectedValue)}`;
    }
    return output;
  }

  private readAssertTarget(target: AssertTarget): AssertValue {
    switch (target) {
      case 'CONTENT': return this.buffer.content;
      case 'CURSOR': return this.buffer.cursorIndex;
      case 'SELECTION': {
        const range = this.buffer.getSelectionRange();
        return range ? `${range.start}:${range.end}` : 'none';
      }
      case 'SELECTED_TEXT': return this.buffer.getSelectedText();
      case 'LENGTH': return this.buffer.length;
      case 'LINE': return this.buffer.getCursorLocation().line + 1;
      case 'COLUMN': return this.buffer.getCursorLocation().column + 1;
      case 'CAN_UNDO': return this.buffer.canUndo;
      case 'CAN_REDO': return this.buffer.canRedo;
      case 'UNDO_COUNT': return this.buffer.getHistoryState().undoCount;
      case 'REDO_COUNT': return this.buffer.getHistoryState().redoCount;
    }
  }

  private parseAssertValue(value: string | undefined): AssertValue {
    if (value === undefined || value === 'null') return null;
    if (value === 'true') return true;
    if (value === 'false') return false;
    if (/^-?\d+(\.\d+)?$/.test(value)) return parseFloat(value);
    return value;
  }

  private cmdAssertError(cmd: ParsedCommand): Output {
    this.expectError = true;
    return this.createInfo('Expecting error on next command', cmd);
  }

  // ===========================================================================
  // Control Commands
  // ===========================================================================

  private cmdReset(cmd: ParsedCommand): Output {
    this.clock = createManualClock();
    this.clipboard = new InMemoryClipboard();
    this.buffer = this.createBuffer();
    this.editor = this.createEditor();
    this.expectError = false;

    return this.createResult(true, { reset: true }, cmd);
  }

  private cmdQuit(cmd: ParsedCommand): Output {
    return this.createInfo('Quitting', cmd);
  }

  // ===========================================================================
  // State Helpers
  // ===========================================================================

  private createBuffer(): TextBuffer {
    return new TextBuffer('', {
      history: {
        clock: this.clock.now,
        maxUndoGroups: this.config.maxUndoGroups,
        groupingTimeoutMs: this.config.groupingTimeoutMs,
      },
    });
  }

  private createEditor(): EditorController {
    return new EditorController(
      this.buffer,
      {
        clock: this.clock.now,
        autoIndent: this.config.autoIndent,
        autoClosePairs: this.config.autoClosePairs,
        idleFinalizeMs: this.config.groupingTimeoutMs,
      },
      this.clipboard
    );
  }

  private getCursorSnapshot(): CursorSnapshot {
    const location = this.buffer.getCursorLocation();
    return { index: this.buffer.cursorIndex, line: location.line, column: location.column };
  }

  private getSelectionSnapshot(): SelectionSnapshot | null {
    const range = this.buffer.getSelectionRange();
    if (!range) return null;
    return { start: range.start, end: range.end, text: this.buffer.getSelectedText() };
  }

  private describeUpdate(update: EditorUpdate): Record<string, unknown> {
    const data: Record<string, unknown> = {
      contentChanged: update.contentChanged,
      cursor: update.cursorIndex,
      selection: update.selection,
    };
    if (update.clipboardText !== undefined) data.clipboardText = update.clipboardText;
    return data;
  }

  private describeHistory(): Record<string, unknown> {
    const state = this.buffer.getHistoryState();
    return {
      cursor: this.buffer.cursorIndex,
      canUndo: state.canUndo,
      canRedo: state.canRedo,
      undoCount: state.undoCount,
      redoCount: state.redoCount,
    };
  }

  private requireInt(cmd: ParsedCommand, index: number, message: string): number {
    const raw = cmd.args[index];
    if (raw === undefined) throw new Error(message);

    const value = Number(raw);
    if (!Number.isInteger(value)) {
      throw new Error(`${cmd.type} expects an integer, got: ${raw}`);
    }
    return value;
  }

  private optionInt(cmd: ParsedCommand, key: string, fallback: number): number {
    const value = cmd.options[key];
    if (value === undefined) return fallback;
    if (typeof value !== 'number' || !Number.isInteger(value)) {
      throw new Error(`${cmd.type} option ${key} expects an integer, got: ${String(value)}`);
    }
    return value;
  }

  // ===========================================================================
  // Output Helpers
  // ===========================================================================

  private createBase(cmd: ParsedCommand): { timestamp: number; command: string; lineNumber?: number } {
    const base: { timestamp: number; command: string; lineNumber?: number } = {
      timestamp: Date.now(),
      command: cmd.raw,
    };
    if (this.config.includeLineNumbers) base.lineNumber = cmd.lineNumber;
    return base;
  }

  private createResult(success: boolean, data: unknown, cmd: ParsedCommand): ResultOutput {
    return { ...this.createBase(cmd), type: 'result', success, data };
  }

  private createValue(value: unknown, cmd: ParsedCommand): ValueOutput {
    return { ...this.createBase(cmd), type: 'value', value };
  }

  private createError(message: string, cmd: ParsedCommand, stack?: string): ErrorOutput {
    const output: ErrorOutput = { ...this.createBase(cmd), type: 'error', message };
    if (stack !== undefined && this.config.verbose) output.stack = stack;
    return output;
  }

  private createInfo(message: string, cmd: ParsedCommand): InfoOutput {
    return { ...this.createBase(cmd), type: 'info', message };
  }

  private createEcho(message: string, cmd: ParsedCommand): EchoOutput {
    return { ...this.createBase(cmd), type: 'echo', message };
  }

  // ===========================================================================
  // Safety Error Helpers
  // ===========================================================================

  private createTimeoutError(command: string, timeoutMs: number, cmd: ParsedCommand): TimeoutErrorOutput {
    return {
      ...this.createBase(cmd),
      type: 'error',
      message: `Command timed out after ${timeoutMs}ms: ${command}`,
      errorType: 'CommandTimeout',
      timeoutMs,
    };
  }

  private createStepLimitError(stepCount: number, maxSteps: number, cmd: ParsedCommand): StepLimitErrorOutput {
    return {
      ...this.createBase(cmd),
      type: 'error',
      message: `Step limit exceeded: ${stepCount} steps (max: ${maxSteps})`,
      errorType: 'StepLimitExceeded',
      stepCount,
      maxSteps,
    };
  }

  private createAbortError(reason: string, cmd: ParsedCommand): AbortErrorOutput {
    return {
      ...this.createBase(cmd),
      type: 'error',
      message: `Script aborted: ${reason}`,
      errorType: 'ScriptAborted',
      reason,
    };
  }

  private emit(output: Output): void {
    this.outputHandler(output);
  }

  private defaultOutputHandler(output: Output): void {
    if (output.type === 'error' && this.config.outputFormat === 'pretty') {
      console.error(formatOutput(output, this.config));
    } else {
      console.log(formatOutput(output, this.config));
    }
  }

  // ===========================================================================
  // CLI Interface Methods
  // ===========================================================================

  /**
   * Set a custom output handler.
   */
  onOutput(handler: (output: Output) => void): void {
    this.outputHandler = handler;
  }

  /**
   * Execute a single line of input (for interactive mode).
   * Returns false if QUIT command was executed.
   */
  async executeLine(line: string, lineNumber: number = 0): Promise<boolean> {
    let cmd: ParsedCommand | null;
    try {
      cmd = this.parser.parse(line, lineNumber);
    } catch (error) {
      if (!(error instanceof ParseError)) throw error;
      this.emit({
        type: 'error',
        timestamp: Date.now(),
        command: line.trim(),
        lineNumber,
        message: error.message,
      });
      if (this.config.stopOnError) throw error;
      return true;
    }

    if (!cmd) {
      return true;
    }

    const output = await this.execute(cmd);
    this.emit(output);

    if (cmd.type === 'QUIT') {
      return false;
    }

    if (output.type === 'error' && this.config.stopOnError) {
      throw new Error(output.message);
    }

    return true;
  }

  /**
   * Execute a script (multiple lines) with the full safety features.
   * Throws ParseError before running anything if a line does not parse.
   */
  async executeScript(script: string): Promise<Output[]> {
    return this.executeAll(this.parser.parseScript(script));
  }

  /**
   * Request abort of running script.
   */
  abort(reason: string = 'User requested abort'): void {
    if (this.abortController && this.isExecuting) {
      this.abortController.abort();
      if (this.config.verbose) {
        console.log(`[Abort] ${reason}`);
      }
    }
  }

  isRunning(): boolean {
    return this.isExecuting;
  }

  getStepCount(): number {
    return this.stepCount;
  }

  getBuffer(): TextBuffer {
    return this.buffer;
  }
}

// =============================================================================
// Output Formatting
// =============================================================================

/**
 * Render an output as a single JSON line or as human readable text.
 */
export function formatOutput(output: Output, config: HarnessConfig): string {
  if (config.outputFormat === 'json') {
    return JSON.stringify(output);
  }

  const time = config.includeTimestamps
    ? `[${new Date(output.timestamp).toISOString().slice(11, 23)}] `
    : '';
  const line = output.lineNumber ? `[${output.lineNumber}] ` : '';
  const prefix = time + line;

  switch (output.type) {
    case 'result':
      return `${prefix}${output.success ? 'OK' : 'FAIL'}${output.data !== undefined ? `: ${JSON.stringify(output.data)}` : ''}`;

    case 'value':
      return `${prefix}VALUE: ${JSON.stringify(output.value)}`;

    case 'snapshot': {
      const selection = output.selection ? `${output.selection.start}-${output.selection.end}` : 'none';
      return [
        `${prefix}SNAPSHOT:`,
        `  Content: ${JSON.stringify(output.content)}`,
        `  Cursor: ${output.cursor.index} (line ${output.cursor.line + 1}, col ${output.cursor.column + 1})`,
        `  Selection: ${selection}`,
        `  History: ${output.history.undoCount} undo, ${output.history.redoCount} redo`,
      ].join('\n');
    }

    case 'history':
      return [
        `${prefix}HISTORY:`,
        ...output.undo.map((entry) => `  undo ${entry.category} x${entry.commandCount}${entry.open ? ' (open)' : ''}`),
        ...output.redo.map((entry) => `  redo ${entry.category} x${entry.commandCount}`),
      ].join('\n');

    case 'error':
      return `${prefix}ERROR: ${output.message}`;

    case 'info':
      return `${prefix}INFO: ${output.message}`;

    case 'stats':
      return `${prefix}STATS: ${output.characters} chars, ${output.words} words, ${output.lines} lines, ${output.undoStackSize} undo, ${output.redoStackSize} redo, ${output.memoryKB}KB`;

    case 'assert':
      return `${prefix}ASSERT ${output.passed ? 'PASSED' : 'FAILED'}: expected=${JSON.stringify(output.expected)}, actual=${JSON.stringify(output.actual)}${output.message ? ` (${output.message})` : ''}`;

    case 'echo':
      return `${prefix}ECHO: ${output.message}`;
  }
}

// =============================================================================
// Factory
// =============================================================================

export function createHarnessRunner(
  config?: Partial<HarnessConfig>,
  outputHandler?: (output: Output) => void
): HarnessRunner {
  return new HarnessRunner(config, outputHandler);
}
