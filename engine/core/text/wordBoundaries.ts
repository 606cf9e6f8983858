/**
 * Caretpad Engine - Word Boundaries
 *
 * Word character = Unicode letter, decimal digit, or underscore.
 *
 * Backward and forward scans are intentionally asymmetric:
 * - findWordStart walks across line breaks.
 * - findWordEnd never advances past the end of the current line.
 */

import type { TextRange } from '../types/index.js';

const WORD_CHAR = /^[\p{L}\p{Nd}_]$/u;

export function isWordChar(ch: string | undefined): boolean {
  return ch !== undefined && WORD_CHAR.test(ch);
}

/**
 * Offset reached by scanning backward over non-word characters,
 * then over the preceding run of word characters.
 */
export function findWordStart(text: string, index: number): number {
  let i = Math.min(index, text.length);
  if (i <= 0) return 0;

  while (i > 0 && !isWordChar(text[i - 1])) i--;
  while (i > 0 && isWordChar(text[i - 1])) i--;

  return i;
}

/**
 * Offset reached by scanning forward, clamped to the end of the current line.
 *
 * Inside a word: stops at the end of that word.
 * Otherwise: skips the non-word run up to the next word.
 *
 * @example
 * ```typescript
 * const text = 'foo  bar\nbaz';
 * findWordEnd(text, 0); // 3
 * findWordEnd(text, 3); // 5
 * findWordEnd(text, 5); // 8
 * findWordEnd(text, 8); // 8 - sits on the line break
 * ```
 */
export function findWordEnd(text: string, index: number): number {
  if (index >= text.length) return text.length;

  let i = Math.max(0, index);
  const newline = text.indexOf('\n', i);
  const lineEnd = newline === -1 ? text.length : newline;

  if (i < lineEnd && isWordChar(text[i])) {
    while (i < lineEnd && isWordChar(text[i])) i++;
    return i;
  }

  while (i < lineEnd && !isWordChar(text[i])) i++;

  return i;
}

/**
 * The run of word characters touching `index` on either side, or null when
 * the offset is not next to a word.
 */
export function wordRangeAt(text: string, index: number): TextRange | null {
  const at = Math.min(Math.max(0, index), text.length);

  let start = at;
  while (start > 0 && isWordChar(text[start - 1])) start--;

  let end = at;
  while (end < text.length && isWordChar(text[end])) end++;

  return start < end ? { start, end } : null;
}
