/**
 * Caretpad Engine - Word Completion
 *
 * Suggests completions for the word being typed from two sources: an injected
 * keyword list and the identifiers already present in the document.
 * Matching is a case-insensitive prefix test. Results are ordered by length,
 * then by code unit order, and capped.
 */

// =============================================================================
// Types
// =============================================================================

export interface CompletionConfig {
  /** Language keywords offered alongside document words (default: none) */
  keywords?: readonly string[];
  /** Maximum suggestions returned (default: 10) */
  maxSuggestions?: number;
  /** Shortest document word worth suggesting (default: 2) */
  minWordLength?: number;
  /** Shortest word at the cursor that triggers completion (default: 2) */
  minPrefixLength?: number;
}

export const DEFAULT_COMPLETION_CONFIG: Required<CompletionConfig> = {
  keywords: [],
  maxSuggestions: 10,
  minWordLength: 2,
  minPrefixLength: 2,
};

const IDENTIFIER = /\b[a-zA-Z_][a-zA-Z0-9_]*\b/g;

// =============================================================================
// Suggestions
// =============================================================================

export function resolveCompletionConfig(config: CompletionConfig = {}): Required<CompletionConfig> {
  return {
    keywords: config.keywords ?? DEFAULT_COMPLETION_CONFIG.keywords,
    maxSuggestions: config.maxSuggestions ?? DEFAULT_COMPLETION_CONFIG.maxSuggestions,
    minWordLength: config.minWordLength ?? DEFAULT_COMPLETION_CONFIG.minWordLength,
    minPrefixLength: config.minPrefixLength ?? DEFAULT_COMPLETION_CONFIG.minPrefixLength,
  };
}

/**
 * Distinct identifiers in `content`, compared case-insensitively.
 * The first spelling seen is kept.
 */
export function extractWords(
  content: string,
  minWordLength: number = DEFAULT_COMPLETION_CONFIG.minWordLength
): string[] {
  const seen = new Set<string>();
  const words: string[] = [];

  for (const match of content.matchAll(IDENTIFIER)) {
    const word = match[0];
    if (word.length < minWordLength) continue;

    const key = word.toLowerCase();
    if (seen.has(key)) continue;

    seen.add(key);
    words.push(word);
  }

  return words;
}

/**
 * Completions for `prefix`.
 *
 * Keywords match when they start with the prefix, including an exact match.
 * Document words must also be longer than the prefix.
 *
 * @example
 * ```typescript
 * generateSuggestions('re', 'let result = 1;', { keywords: ['return', 'ref'] });
 * // ['ref', 'result', 'return']
 * ```
 */
export function generateSuggestions(
  prefix: string,
  content: string,
  config: CompletionConfig = {}
): string[] {
  if (prefix.length === 0) return [];

  const { keywords, maxSuggestions, minWordLength } = resolveCompletionConfig(config);
  const needle = prefix.toLowerCase();
  const suggestions = new Set<string>();

  for (const keyword of keywords) {
    if (keyword.toLowerCase().startsWith(needle)) suggestions.add(keyword);
  }

  for (const word of extractWords(content, minWordLength)) {
    if (word.length > prefix.length && word.toLowerCase().startsWith(needle)) {
      suggestions.add(word);
    }
  }

  return [...suggestions].sort(compareSuggestions).slice(0, Math.max(0, maxSuggestions));
}

function compareSuggestions(a: string, b: string): number {
  if (a.length !== b.length) return a.length - b.length;
  if (a === b) return 0;
  return a < b ? -1 : 1;
}
