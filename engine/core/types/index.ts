/**
 * Caretpad Engine - Core Type Definitions
 * Plain-text document, cursor and edit-history types
 */

// ============================================================================
// Positions & Ranges
// ============================================================================

/**
 * Half-open range of UTF-16 offsets, normalized so that start <= end.
 */
export interface TextRange {
  start: number;
  end: number;
}

/**
 * 0-based line/column pair for a document offset.
 */
export interface TextLocation {
  line: number;
  column: number;
}

/**
 * Raw selection endpoints. Either side may be unset (null).
 * A selection is only active when both are set and differ.
 */
export interface SelectionEndpoints {
  anchor: number | null;
  floatingEnd: number | null;
}

export type Direction = 'backward' | 'forward';

// ============================================================================
// Edit History Types
// ============================================================================

/**
 * Kind of primitive mutation recorded by the history engine.
 */
export type EditKind = 'insert' | 'delete' | 'backspace' | 'replace';

/**
 * Category label shared by every command in a group.
 * Drives the grouping heuristic.
 */
export type GroupCategory =
  | 'typing'
  | 'newline'
  | 'paste'
  | 'deletion'
  | 'replace'
  | 'insert'
  | 'other';

/**
 * Monotonic millisecond time source.
 * The engine never reads the wall clock on its own.
 */
export type Clock = () => number;

/**
 * Default clock backed by the high-resolution monotonic timer.
 */
export const monotonicClock: Clock = () => performance.now();

/**
 * Clock that only moves when told to. Used by the harness and by tests.
 */
export interface ManualClock {
  now: Clock;
  advance(ms: number): void;
  set(ms: number): void;
}

export function createManualClock(start: number = 0): ManualClock {
  let current = start;
  return {
    now: () => current,
    advance(ms: number) {
      current += Math.max(0, ms);
    },
    set(ms: number) {
      current = ms;
    },
  };
}

/**
 * Result of replaying a history group against some content.
 */
export interface ReplayResult {
  content: string;
  cursorPosition: number;
}

// ============================================================================
// Text Statistics
// ============================================================================

export interface TextStats {
  characters: number;
  words: number;
  lines: number;
}

// ============================================================================
// Utility Functions
// ============================================================================

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/**
 * Normalize two endpoints into a range.
 */
export function toRange(a: number, b: number): TextRange {
  return a <= b ? { start: a, end: b } : { start: b, end: a };
}
