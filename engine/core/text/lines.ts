/**
 * Caretpad Engine - Line Helpers
 *
 * Lines are separated by '\n' only. A trailing '\n' opens an empty last line.
 */

import type { TextLocation, TextStats } from '../types/index.js';

/**
 * Offset of the first character of the line containing `index`.
 */
export function lineStartOf(text: string, index: number): number {
  if (index <= 0) return 0;
  return text.lastIndexOf('\n', Math.min(index, text.length) - 1) + 1;
}

/**
 * Offset of the '\n' ending the line containing `index`, or the text length.
 */
export function lineEndOf(text: string, index: number): number {
  const newline = text.indexOf('\n', Math.max(0, index));
  return newline === -1 ? text.length : newline;
}

/**
 * 0-based line number of the offset.
 */
export function lineIndexAt(text: string, index: number): number {
  const limit = Math.min(Math.max(0, index), text.length);
  let line = 0;
  for (let i = 0; i < limit; i++) {
    if (text.charCodeAt(i) === 10) line++;
  }
  return line;
}

export function lineCount(text: string): number {
  return text.split('\n').length;
}

/**
 * Start offset of a 0-based line, or null when the line does not exist.
 */
export function lineOffset(text: string, line: number): number | null {
  if (!Number.isInteger(line) || line < 0) return null;

  let offset = 0;
  for (let current = 0; current < line; current++) {
    const newline = text.indexOf('\n', offset);
    if (newline === -1) return null;
    offset = newline + 1;
  }
  return offset;
}

export function locationAt(text: string, index: number): TextLocation {
  const clamped = Math.min(Math.max(0, index), text.length);
  return {
    line: lineIndexAt(text, clamped),
    column: clamped - lineStartOf(text, clamped),
  };
}

/**
 * Leading spaces/tabs of the line containing `index`, not reaching past `index`.
 */
export function leadingIndentation(text: string, index: number): string {
  const limit = Math.min(Math.max(0, index), text.length);
  let indentation = '';
  for (let i = lineStartOf(text, limit); i < limit; i++) {
    const ch = text[i];
    if (ch !== ' ' && ch !== '\t') break;
    indentation += ch;
  }
  return indentation;
}

export function computeTextStats(text: string): TextStats {
  return {
    characters: text.length,
    words: text.split(/[ \t\r\n]+/).filter(word => word.length > 0).length,
    lines: lineCount(text),
  };
}
