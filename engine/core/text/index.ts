/**
 * Caretpad Engine - Text Module Exports
 */

export { isWordChar, findWordStart, findWordEnd, wordRangeAt } from './wordBoundaries.js';
export {
  lineStartOf,
  lineEndOf,
  lineIndexAt,
  lineCount,
  lineOffset,
  locationAt,
  leadingIndentation,
  computeTextStats,
} from './lines.js';
export {
  DEFAULT_COMPLETION_CONFIG,
  resolveCompletionConfig,
  extractWords,
  generateSuggestions,
} from './completion.js';
export type { CompletionConfig } from './completion.js';
