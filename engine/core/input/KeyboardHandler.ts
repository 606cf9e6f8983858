/**
 * Caretpad Engine - Keyboard Handler
 *
 * Thin translation layer between raw keyboard events and editor intents.
 * This is an "input adapter": it maps low-level key events to high-level
 * editing commands without touching the document.
 *
 * Architecture:
 * - Raw KeyboardEvent → KeyboardHandler → EditorIntent → EditorController
 * - Pure translation: no state mutation, no side effects
 * - Framework-agnostic: the event shape matches the DOM but does not require it
 * - Configurable: keybindings can be customized
 */

import type { Direction } from '../types/index.js';

// =============================================================================
// Keyboard Event Interface (Framework-Agnostic)
// =============================================================================

/**
 * Framework-agnostic keyboard event interface.
 * Compatible with DOM KeyboardEvent but doesn't require it.
 */
export interface KeyboardEvent {
  /** The key value (e.g., 'a', 'Enter', 'ArrowUp') */
  readonly key: string;

  /** Ctrl key (or Cmd on Mac) pressed */
  readonly ctrlKey: boolean;

  /** Shift key pressed */
  readonly shiftKey: boolean;

  /** Alt key (Option on Mac) pressed */
  readonly altKey: boolean;

  /** Meta key (Cmd on Mac, Win on Windows) pressed */
  readonly metaKey: boolean;

  /** Prevent default host behavior */
  preventDefault?(): void;
}

// =============================================================================
// Intent Types (Semantic Commands)
// =============================================================================

export interface MoveCharIntent {
  readonly type: 'moveChar';
  readonly direction: Direction;
  readonly extend: boolean;    // Shift: extend selection
}

export interface MoveWordIntent {
  readonly type: 'moveWord';
  readonly direction: Direction;
  readonly extend: boolean;
}

export interface MoveLineIntent {
  readonly type: 'moveLine';
  readonly direction: 'up' | 'down';
  readonly extend: boolean;
}

/** Home/End */
export interface LineBoundaryIntent {
  readonly type: 'lineBoundary';
  readonly target: 'start' | 'end';
  readonly extend: boolean;
}

/** Ctrl+Home/Ctrl+End */
export interface DocumentBoundaryIntent {
  readonly type: 'documentBoundary';
  readonly target: 'start' | 'end';
  readonly extend: boolean;
}

export interface InsertTextIntent {
  readonly type: 'insertText';
  readonly text: string;
}

export interface NewlineIntent {
  readonly type: 'newline';
}

export interface IndentIntent {
  readonly type: 'indent';
}

export interface BackspaceIntent {
  readonly type: 'backspace';
  readonly word: boolean;      // Ctrl: delete to word boundary
}

export interface DeleteIntent {
  readonly type: 'delete';
  readonly word: boolean;
}

export interface SelectAllIntent {
  readonly type: 'selectAll';
}

export interface ClipboardIntent {
  readonly type: 'clipboard';
  readonly action: 'copy' | 'cut' | 'paste';
}

export interface HistoryIntent {
  readonly type: 'history';
  readonly action: 'undo' | 'redo';
}

/** Complete the word at the cursor with the best suggestion */
export interface CompleteIntent {
  readonly type: 'complete';
}

/** Escape: drop the selection */
export interface EscapeIntent {
  readonly type: 'escape';
}

/**
 * Unknown intent - for unmapped keys.
 */
export interface UnknownIntent {
  readonly type: 'unknown';
  readonly key: string;
  readonly modifiers: ModifierState;
}

/**
 * Union type of all intents.
 */
export type EditorIntent =
  | MoveCharIntent
  | MoveWordIntent
  | MoveLineIntent
  | LineBoundaryIntent
  | DocumentBoundaryIntent
  | InsertTextIntent
  | NewlineIntent
  | IndentIntent
  | BackspaceIntent
  | DeleteIntent
  | SelectAllIntent
  | ClipboardIntent
  | HistoryIntent
  | CompleteIntent
  | EscapeIntent
  | UnknownIntent;

/**
 * Intent type discriminator.
 */
export type IntentType = EditorIntent['type'];

// =============================================================================
// Modifier State
// =============================================================================

/**
 * Modifier key state.
 */
export interface ModifierState {
  readonly ctrl: boolean;   // Ctrl or Cmd
  readonly shift: boolean;
  readonly alt: boolean;
  readonly meta: boolean;
}

/**
 * Extract modifier state from an event.
 */
export function getModifiers(event: KeyboardEvent): ModifierState {
  return {
    ctrl: event.ctrlKey || event.metaKey,  // Treat Cmd as Ctrl on Mac
    shift: event.shiftKey,
    alt: event.altKey,
    meta: event.metaKey,
  };
}

// =============================================================================
// Keybinding Configuration
// =============================================================================

/**
 * Key combination for keybinding.
 */
export interface KeyCombo {
  readonly key: string;
  readonly ctrl?: boolean;
  readonly shift?: boolean;
  readonly alt?: boolean;
}

/**
 * Keybinding entry.
 */
export interface Keybinding {
  readonly combo: KeyCombo;
  readonly intent: EditorIntent;
}

/**
 * Plain and Shift variants of a movement key.
 */
function movementBindings(
  key: string,
  build: (extend: boolean) => EditorIntent,
  ctrl: boolean = false
): Keybinding[] {
  return [
    { combo: { key, ctrl }, intent: build(false) },
    { combo: { key, ctrl, shift: true }, intent: build(true) },
  ];
}

/**
 * Default keybindings - common text-editor conventions.
 */
export const DEFAULT_KEYBINDINGS: readonly Keybinding[] = [
  // Character / word movement
  ...movementBindings('ArrowLeft', extend => ({ type: 'moveChar', direction: 'backward', extend })),
  ...movementBindings('ArrowRight', extend => ({ type: 'moveChar', direction: 'forward', extend })),
  ...movementBindings('ArrowLeft', extend => ({ type: 'moveWord', direction: 'backward', extend }), true),
  ...movementBindings('ArrowRight', extend => ({ type: 'moveWord', direction: 'forward', extend }), true),

  // Line movement
  ...movementBindings('ArrowUp', extend => ({ type: 'moveLine', direction: 'up', extend })),
  ...movementBindings('ArrowDown', extend => ({ type: 'moveLine', direction: 'down', extend })),

  // Home/End
  ...movementBindings('Home', extend => ({ type: 'lineBoundary', target: 'start', extend })),
  ...movementBindings('End', extend => ({ type: 'lineBoundary', target: 'end', extend })),
  ...movementBindings('Home', extend => ({ type: 'documentBoundary', target: 'start', extend }), true),
  ...movementBindings('End', extend => ({ type: 'documentBoundary', target: 'end', extend }), true),

  // Structural input
  { combo: { key: 'Enter' }, intent: { type: 'newline' } },
  { combo: { key: 'Tab' }, intent: { type: 'indent' } },

  // Deletion
  { combo: { key: 'Backspace' }, intent: { type: 'backspace', word: false } },
  { combo: { key: 'Backspace', ctrl: true }, intent: { type: 'backspace', word: true } },
  { combo: { key: 'Delete' }, intent: { type: 'delete', word: false } },
  { combo: { key: 'Delete', ctrl: true }, intent: { type: 'delete', word: true } },

  // Selection
  { combo: { key: 'a', ctrl: true }, intent: { type: 'selectAll' } },
  { combo: { key: 'Escape' }, intent: { type: 'escape' } },

  // Clipboard
  { combo: { key: 'c', ctrl: true }, intent: { type: 'clipboard', action: 'copy' } },
  { combo: { key: 'x', ctrl: true }, intent: { type: 'clipboard', action: 'cut' } },
  { combo: { key: 'v', ctrl: true }, intent: { type: 'clipboard', action: 'paste' } },

  // History
  { combo: { key: 'z', ctrl: true }, intent: { type: 'history', action: 'undo' } },
  { combo: { key: 'y', ctrl: true }, intent: { type: 'history', action: 'redo' } },
  { combo: { key: 'z', ctrl: true, shift: true }, intent: { type: 'history', action: 'redo' } },

  // Completion
  { combo: { key: ' ', ctrl: true }, intent: { type: 'complete' } },
];

// =============================================================================
// Keyboard Handler Configuration
// =============================================================================

/**
 * Configuration for KeyboardHandler.
 */
export interface KeyboardHandlerConfig {
  /** Custom keybindings (merged with defaults) */
  keybindings?: readonly Keybinding[];

  /** Replace default keybindings entirely */
  replaceDefaults?: boolean;

  /** Keys inserted as text when no binding matches (default: one non-control code point) */
  printableChars?: RegExp;

  /** Whether to treat meta (Cmd) as ctrl */
  metaAsCtrl?: boolean;
}

// =============================================================================
// Keyboard Handler Class
// =============================================================================

/**
 * Keyboard handler.
 *
 * Converts raw key events into editor intents. It does not execute actions.
 *
 * Usage:
 * ```typescript
 * const handler = new KeyboardHandler();
 * const controller = new EditorController(buffer);
 *
 * const intent = handler.handleKeyDown({
 *   key: 'ArrowLeft', ctrlKey: true, shiftKey: true, altKey: false, metaKey: false,
 * });
 * // { type: 'moveWord', direction: 'backward', extend: true }
 * controller.apply(intent);
 * ```
 */
export class KeyboardHandler {
  private readonly config: Required<KeyboardHandlerConfig>;
  private readonly keybindings: Map<string, Keybinding>;

  constructor(config: KeyboardHandlerConfig = {}) {
    this.config = {
      keybindings: config.keybindings ?? [],
      replaceDefaults: config.replaceDefaults ?? false,
      printableChars: config.printableChars ?? /^[^\p{Cc}\p{Cf}]$/u,
      metaAsCtrl: config.metaAsCtrl ?? true,
    };

    this.keybindings = new Map();
    this.initializeKeybindings();
  }

  // ===========================================================================
  // Keybinding Initialization
  // ===========================================================================

  private initializeKeybindings(): void {
    if (!this.config.replaceDefaults) {
      for (const binding of DEFAULT_KEYBINDINGS) {
        this.keybindings.set(this.comboToKey(binding.combo), binding);
      }
    }

    // Custom keybindings override defaults
    for (const binding of this.config.keybindings) {
      this.keybindings.set(this.comboToKey(binding.combo), binding);
    }
  }

  /**
   * Convert a key combo to a lookup key string.
   */
  private comboToKey(combo: KeyCombo): string {
    const parts: string[] = [];
    if (combo.ctrl) parts.push('ctrl');
    if (combo.shift) parts.push('shift');
    if (combo.alt) parts.push('alt');
    parts.push(combo.key.toLowerCase());
    return parts.join('+');
  }

  /**
   * Convert an event to a lookup key string.
   */
  private eventToKey(event: KeyboardEvent): string {
    return this.comboToKey({
      key: event.key,
      ctrl: this.isCtrl(event),
      shift: event.shiftKey,
      alt: event.altKey,
    });
  }

  // ===========================================================================
  // Event Handling
  // ===========================================================================

  /**
   * Translate a keydown event into an intent.
   * Unmapped keys produce an `unknown` intent and are not prevented.
   */
  handleKeyDown(event: KeyboardEvent): EditorIntent {
    const binding = this.keybindings.get(this.eventToKey(event));

    if (binding) {
      event.preventDefault?.();
      return binding.intent;
    }

    if (this.isPrintable(event)) {
      event.preventDefault?.();
      return { type: 'insertText', text: event.key };
    }

    return { type: 'unknown', key: event.key, modifiers: getModifiers(event) };
  }

  // ===========================================================================
  // Helper Methods
  // ===========================================================================

  private isCtrl(event: KeyboardEvent): boolean {
    return event.ctrlKey || (this.config.metaAsCtrl && event.metaKey);
  }

  /**
   * Check if a key event should insert its character.
   */
  private isPrintable(event: KeyboardEvent): boolean {
    // Shift is allowed for capitals; other modifiers mean a shortcut
    if (this.isCtrl(event) || event.altKey) {
      return false;
    }
    return this.config.printableChars.test(event.key);
  }

  // ===========================================================================
  // Keybinding Management
  // ===========================================================================

  /**
   * Add or update a keybinding.
   */
  addKeybinding(binding: Keybinding): void {
    this.keybindings.set(this.comboToKey(binding.combo), binding);
  }

  /**
   * Remove a keybinding.
   *
   * @returns Whether a binding was removed
   */
  removeKeybinding(combo: KeyCombo): boolean {
    return this.keybindings.delete(this.comboToKey(combo));
  }

  /**
   * Get all current keybindings.
   */
  getKeybindings(): readonly Keybinding[] {
    return Array.from(this.keybindings.values());
  }

  /**
   * Reset keybindings to defaults.
   */
  resetKeybindings(): void {
    this.keybindings.clear();
    this.initializeKeybindings();
  }
}

// =============================================================================
// Combo Strings
// =============================================================================

const KEY_ALIASES: ReadonlyMap<string, string> = new Map([
  ['left', 'ArrowLeft'],
  ['right', 'ArrowRight'],
  ['up', 'ArrowUp'],
  ['down', 'ArrowDown'],
  ['home', 'Home'],
  ['end', 'End'],
  ['enter', 'Enter'],
  ['return', 'Enter'],
  ['tab', 'Tab'],
  ['backspace', 'Backspace'],
  ['delete', 'Delete'],
  ['del', 'Delete'],
  ['escape', 'Escape'],
  ['esc', 'Escape'],
  ['space', ' '],
]);

/**
 * Parse a combo string such as `ctrl+shift+left` or `a` into a key event.
 * Returns null for an empty combo or an unknown modifier.
 *
 * @example
 * ```typescript
 * parseKeyCombo('ctrl+z');  // { key: 'z', ctrlKey: true, ... }
 * parseKeyCombo('shift+a'); // { key: 'A', shiftKey: true, ... }
 * parseKeyCombo('ctrl++');  // { key: '+', ctrlKey: true, ... }
 * ```
 */
export function parseKeyCombo(combo: string): KeyboardEvent | null {
  const trimmed = combo.trim();
  if (trimmed.length === 0) return null;

  let keyPart: string;
  let modifierParts: string[];
  if (trimmed.endsWith('+')) {
    keyPart = '+';
    modifierParts = trimmed.slice(0, -1).split('+').filter(part => part.length > 0);
  } else {
    const parts = trimmed.split('+');
    keyPart = parts[parts.length - 1];
    modifierParts = parts.slice(0, -1);
  }

  let ctrlKey = false;
  let shiftKey = false;
  let altKey = false;
  let metaKey = false;

  for (const part of modifierParts) {
    switch (part.toLowerCase()) {
      case 'ctrl':
      case 'control':
        ctrlKey = true;
        break;
      case 'shift':
        shiftKey = true;
        break;
      case 'alt':
      case 'option':
        altKey = true;
        break;
      case 'meta':
      case 'cmd':
        metaKey = true;
        break;
      default:
        return null;
    }
  }

  let key = KEY_ALIASES.get(keyPart.toLowerCase()) ?? keyPart;
  if (shiftKey && key.length === 1) {
    key = key.toUpperCase();
  }

  return { key, ctrlKey, shiftKey, altKey, metaKey };
}

// =============================================================================
// Factory Functions
// =============================================================================

export function createKeyboardHandler(config?: KeyboardHandlerConfig): KeyboardHandler {
  return new KeyboardHandler(config);
}
