/**
 * Caretpad Engine - Editor Controller
 *
 * Applies EditorIntents to a TextBuffer and reports the outcome as a value.
 * No DOM dependencies and no callback registration: callers read the
 * returned EditorUpdate and poll tick() once per input cycle.
 *
 * Behavior:
 * - Shift-extended movement starts a selection before moving, then updates it
 * - Unshifted movement drops the selection
 * - Opening brackets and quotes insert their closing partner
 * - Enter carries the current line's indentation
 * - Tab inserts the indent unit
 * - Idle finalization: tick() closes the open history group after a pause
 * - Word completion: suggestions for the word at the cursor, accepted as one
 *   undo step
 */

import type { Clock, TextRange } from '../types/index.js';
import { monotonicClock } from '../types/index.js';
import type { TextBuffer } from '../buffer/TextBuffer.js';
import { wordRangeAt } from '../text/wordBoundaries.js';
import { generateSuggestions, resolveCompletionConfig } from '../text/completion.js';
import type { CompletionConfig } from '../text/completion.js';
import { KeyboardHandler } from '../input/KeyboardHandler.js';
import type {
  EditorIntent,
  KeyboardEvent,
  KeyboardHandlerConfig,
  ClipboardIntent,
  HistoryIntent,
} from '../input/KeyboardHandler.js';

// =============================================================================
// Clipboard
// =============================================================================

/**
 * Host clipboard access. Synchronous, like the rest of the core.
 */
export interface ClipboardProvider {
  readText(): string;
  writeText(text: string): void;
}

/**
 * Process-local clipboard.
 */
export class InMemoryClipboard implements ClipboardProvider {
  private text: string = '';

  readText(): string {
    return this.text;
  }

  writeText(text: string): void {
    this.text = text;
  }
}

// =============================================================================
// Types
// =============================================================================

export interface EditorConfig {
  /** Insert the closing partner of brackets and quotes (default: true) */
  autoClosePairs?: boolean;
  /** Opening character → closing character */
  pairs?: Readonly<Record<string, string>>;
  /** Carry the current line's indentation onto new lines (default: true) */
  autoIndent?: boolean;
  /** Text inserted by the indent intent (default: four spaces) */
  indentUnit?: string;
  /** Pause in ms after which tick() closes the open history group (default: 1000) */
  idleFinalizeMs?: number;
  /** Time source for tick() and edit stamps */
  clock?: Clock;
  /** Passed through to the KeyboardHandler */
  keyboard?: KeyboardHandlerConfig;
  /** Keyword list and limits for word completion */
  completion?: CompletionConfig;
}

export const DEFAULT_EDITOR_CONFIG: Required<EditorConfig> = {
  autoClosePairs: true,
  pairs: {
    '(': ')',
    '{': '}',
    '[': ']',
    '"': '"',
    "'": "'",
  },
  autoIndent: true,
  indentUnit: '    ',
  idleFinalizeMs: 1000,
  clock: monotonicClock,
  keyboard: {},
  completion: {},
};

/**
 * Result of applying an intent.
 */
export interface EditorUpdate {
  /** Whether the intent was handled (consumed) */
  handled: boolean;
  /** Whether the document text changed */
  contentChanged: boolean;
  cursorIndex: number;
  selection: TextRange | null;
  /** Text written to the clipboard by copy/cut */
  clipboardText?: string;
}

// =============================================================================
// Editor Controller
// =============================================================================

export class EditorController {
  private config: Required<EditorConfig>;
  private readonly buffer: TextBuffer;
  private readonly clipboard: ClipboardProvider;
  private readonly keyboard: KeyboardHandler;
  private completion: Required<CompletionConfig>;

  /** Clock reading of the last content change, or null once finalized */
  private lastEditTime: number | null = null;

  constructor(
    buffer: TextBuffer,
    config: EditorConfig = {},
    clipboard: ClipboardProvider = new InMemoryClipboard()
  ) {
    this.buffer = buffer;
    this.clipboard = clipboard;
    this.config = {
      autoClosePairs: config.autoClosePairs ?? DEFAULT_EDITOR_CONFIG.autoClosePairs,
      pairs: config.pairs ?? DEFAULT_EDITOR_CONFIG.pairs,
      autoIndent: config.autoIndent ?? DEFAULT_EDITOR_CONFIG.autoIndent,
      indentUnit: config.indentUnit ?? DEFAULT_EDITOR_CONFIG.indentUnit,
      idleFinalizeMs: config.idleFinalizeMs ?? DEFAULT_EDITOR_CONFIG.idleFinalizeMs,
      clock: config.clock ?? DEFAULT_EDITOR_CONFIG.clock,
      keyboard: config.keyboard ?? DEFAULT_EDITOR_CONFIG.keyboard,
      completion: config.completion ?? DEFAULT_EDITOR_CONFIG.completion,
    };
    this.completion = resolveCompletionConfig(this.config.completion);
    this.keyboard = new KeyboardHandler(this.config.keyboard);
  }

  // ===========================================================================
  // Configuration & State
  // ===========================================================================

  /**
   * Update configuration. Keybindings are fixed at construction.
   */
  setConfig(config: Partial<Omit<EditorConfig, 'keyboard'>>): void {
    this.config = {
      ...this.config,
      autoClosePairs: config.autoClosePairs ?? this.config.autoClosePairs,
      pairs: config.pairs ?? this.config.pairs,
      autoIndent: config.autoIndent ?? this.config.autoIndent,
      indentUnit: config.indentUnit ?? this.config.indentUnit,
      idleFinalizeMs: config.idleFinalizeMs ?? this.config.idleFinalizeMs,
      clock: config.clock ?? this.config.clock,
      completion: config.completion ?? this.config.completion,
    };
    this.completion = resolveCompletionConfig(this.config.completion);
  }

  getBuffer(): TextBuffer {
    return this.buffer;
  }

  getKeyboardHandler(): KeyboardHandler {
    return this.keyboard;
  }

  /**
   * Whether an edit is waiting for idle finalization.
   */
  hasPendingEdit(): boolean {
    return this.lastEditTime !== null;
  }

  // ===========================================================================
  // Input
  // ===========================================================================

  /**
   * Translate a key event and apply the resulting intent.
   */
  handleKeyDown(event: KeyboardEvent): EditorUpdate {
    return this.apply(this.keyboard.handleKeyDown(event));
  }

  /**
   * Apply an intent to the buffer.
   */
  apply(intent: EditorIntent): EditorUpdate {
    const before = this.buffer.content;
    let handled = true;
    let clipboardText: string | undefined;

    switch (intent.type) {
      case 'moveChar':
        this.move(intent.extend, () => this.buffer.moveCursor(intent.direction === 'backward' ? -1 : 1));
        break;

      case 'moveWord':
        this.move(intent.extend, () => {
          if (intent.direction === 'backward') this.buffer.moveToWordStart();
          else this.buffer.moveToWordEnd();
        });
        break;

      case 'moveLine':
        this.move(intent.extend, () => {
          this.buffer.moveCursorLine(intent.direction === 'up' ? -1 : 1);
        });
        break;

      case 'lineBoundary':
        this.move(intent.extend, () => {
          if (intent.target === 'start') this.buffer.moveToLineStart();
          else this.buffer.moveToLineEnd();
        });
        break;

      case 'documentBoundary':
        this.move(intent.extend, () => {
          if (intent.target === 'start') this.buffer.moveToDocumentStart();
          else this.buffer.moveToDocumentEnd();
        });
        break;

      case 'insertText':
        this.insertTyped(intent.text);
        break;

      case 'newline':
        this.buffer.insertText(
          this.config.autoIndent ? '\n' + this.buffer.getCurrentLineIndentation() : '\n'
        );
        break;

      case 'indent':
        this.buffer.insertText(this.config.indentUnit);
        break;

      case 'backspace':
        this.buffer.performBackspace(intent.word);
        break;

      case 'delete':
        this.buffer.performDelete(intent.word);
        break;

      case 'selectAll':
        this.buffer.selectAll();
        break;

      case 'escape':
        this.buffer.clearSelection();
        break;

      case 'complete':
        return this.acceptCompletion();

      case 'clipboard':
        clipboardText = this.handleClipboard(intent);
        break;

      case 'history':
        this.handleHistory(intent);
        break;

      case 'unknown':
        handled = false;
        break;
    }

    return this.createUpdate(before, handled, clipboardText);
  }

  // ===========================================================================
  // Word Completion
  // ===========================================================================

  /**
   * Suggestions for the word at the cursor. Empty when the word is shorter
   * than `minPrefixLength`.
   */
  getCompletions(): string[] {
    const content = this.buffer.content;
    const range = wordRangeAt(content, this.buffer.cursorIndex);
    if (!range) return [];

    if (range.end - range.start < this.completion.minPrefixLength) return [];

    return generateSuggestions(content.slice(range.start, range.end), content, this.completion);
  }

  /**
   * Replace the word at the cursor with `suggestion`, or with the first
   * suggestion when none is given. The replacement is one undo step.
   */
  acceptCompletion(suggestion?: string): EditorUpdate {
    const before = this.buffer.content;
    const range = wordRangeAt(before, this.buffer.cursorIndex);
    const replacement = suggestion ?? this.getCompletions()[0];

    if (!range || replacement === undefined || replacement.length === 0) {
      return this.createUpdate(before, false);
    }

    this.buffer.clearSelection();
    if (before.slice(range.start, range.end) === replacement) {
      this.buffer.setCursorPosition(range.end);
      return this.createUpdate(before, true);
    }

    this.buffer.setCursorPosition(range.start);
    this.buffer.startSelection();
    this.buffer.setCursorPosition(range.end);
    this.buffer.updateSelection();
    this.buffer.insertText(replacement);

    return this.createUpdate(before, true);
  }

  /**
   * Close the open history group once the editor has been idle long enough.
   * Call once per input cycle.
   *
   * @returns Whether a finalization happened
   */
  tick(now: number = this.config.clock()): boolean {
    if (this.lastEditTime === null) return false;
    if (now - this.lastEditTime <= this.config.idleFinalizeMs) return false;

    this.buffer.finalizeCurrentGroup();
    this.lastEditTime = null;
    return true;
  }

  // ===========================================================================
  // Private Helper Methods
  // ===========================================================================

  private createUpdate(before: string, handled: boolean, clipboardText?: string): EditorUpdate {
    const contentChanged = this.buffer.content !== before;
    if (contentChanged) {
      this.lastEditTime = this.config.clock();
    }

    const update: EditorUpdate = {
      handled,
      contentChanged,
      cursorIndex: this.buffer.cursorIndex,
      selection: this.buffer.getSelectionRange(),
    };
    if (clipboardText !== undefined) update.clipboardText = clipboardText;
    return update;
  }

  private move(extend: boolean, action: () => void): void {
    if (extend && !this.buffer.isSelecting) {
      this.buffer.startSelection();
    } else if (!extend && this.buffer.isSelecting) {
      this.buffer.clearSelection();
    }

    action();

    if (extend) {
      this.buffer.updateSelection();
    }
  }

  private insertTyped(text: string): void {
    const { autoClosePairs, pairs } = this.config;
    const closing = autoClosePairs && Object.hasOwn(pairs, text) ? pairs[text] : undefined;

    if (closing === undefined) {
      this.buffer.insertText(text);
      return;
    }

    this.buffer.insertText(text + closing);
    this.buffer.moveCursor(-closing.length);
  }

  private handleClipboard(intent: ClipboardIntent): string | undefined {
    switch (intent.action) {
      case 'copy': {
        if (!this.buffer.hasSelection()) return undefined;
        const text = this.buffer.getSelectedText();
        this.clipboard.writeText(text);
        return text;
      }

      case 'cut': {
        if (!this.buffer.hasSelection()) return undefined;
        const text = this.buffer.cutSelection();
        this.clipboard.writeText(text);
        return text;
      }

      case 'paste': {
        const text = this.clipboard.readText();
        if (text.length > 0) this.buffer.insertText(text);
        return undefined;
      }
    }
  }

  private handleHistory(intent: HistoryIntent): void {
    if (intent.action === 'undo') {
      if (this.buffer.canUndo) this.buffer.undo();
    } else if (this.buffer.canRedo) {
      this.buffer.redo();
    }
  }
}

// =============================================================================
// Factory Functions
// =============================================================================

export function createEditorController(
  buffer: TextBuffer,
  config?: EditorConfig,
  clipboard?: ClipboardProvider
): EditorController {
  return new EditorController(buffer, config, clipboard);
}
