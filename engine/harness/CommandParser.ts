/**
 * Caretpad Headless Test Harness - Command Parser
 *
 * Parses text commands into structured command objects.
 *
 * Command syntax:
 *   COMMAND [args...] [key=value...]
 *
 * Quoted arguments ("..." or '...') keep their spaces and understand
 * \n, \t, \\ and an escaped quote. Lines starting with # or // are comments.
 *
 * Content:
 *   LOAD "fn main() {\n}"                  - Replace document (clears history)
 *   INSERT "hello"                         - Insert at cursor
 *   TYPE "hello"                           - Insert one character at a time
 *   BACKSPACE count=3 | DELETE word=true   - Remove text
 *
 * Cursor & Selection:
 *   MOVE -2 | CURSOR 5 | LINE 1 | GOTO_LINE 3
 *   WORD_START | WORD_END
 *   SELECT 0 5 | SELECT_ALL | CLEAR_SELECTION | GET_SELECTION
 *
 * Keys:
 *   KEY ctrl+shift+left                    - Through the keyboard handler
 *
 * Completion:
 *   COMPLETE / ACCEPT [word]
 *
 * History:
 *   UNDO / REDO / FINALIZE / WAIT 1200
 *
 * State Inspection:
 *   GET / STATS / HISTORY / SNAPSHOT
 */

import type { ParsedCommand } from './types.js';
import { isCommandType } from './types.js';

// =============================================================================
// Command Parser
// =============================================================================

export class CommandParser {
  /**
   * Parse a single command line.
   */
  parse(line: string, lineNumber: number = 0): ParsedCommand | null {
    const trimmed = line.trim();

    // Skip empty lines and comments
    if (trimmed === '' || trimmed.startsWith('#') || trimmed.startsWith('//')) {
      return null;
    }

    const tokens = this.tokenize(trimmed, lineNumber);
    const [head, ...rest] = tokens;
    if (head === undefined) return null;

    // First token is the command
    const commandStr = head.value.toUpperCase();

    if (!isCommandType(commandStr)) {
      throw new ParseError(`Unknown command: ${commandStr}`, lineNumber, trimmed);
    }

    const args: string[] = [];
    const options: Record<string, string | boolean | number> = {};

    for (const token of rest) {
      // key=value option; quoted tokens are always arguments
      const eqIndex = token.value.indexOf('=');
      if (!token.quoted && eqIndex > 0) {
        const key = token.value.substring(0, eqIndex);
        // Only identifiers are keys, so operators like == and >= stay arguments
        if (/^[a-zA-Z_][a-zA-Z0-9_]*$/.test(key)) {
          options[key] = this.parseOptionValue(token.value.substring(eqIndex + 1));
          continue;
        }
      }
      args.push(token.value);
    }

    return {
      type: commandStr,
      args,
      options,
      raw: trimmed,
      lineNumber,
    };
  }

  /**
   * Parse multiple lines.
   */
  parseLines(lines: string[]): ParsedCommand[] {
    const commands: ParsedCommand[] = [];

    for (let i = 0; i < lines.length; i++) {
      const cmd = this.parse(lines[i], i + 1);
      if (cmd) {
        commands.push(cmd);
      }
    }

    return commands;
  }

  /**
   * Parse a script (multiline string).
   */
  parseScript(script: string): ParsedCommand[] {
    return this.parseLines(script.split(/\r?\n/));
  }

  /**
   * Tokenize a command line, respecting quoted strings.
   */
  private tokenize(line: string, lineNumber: number): Array<{ value: string; quoted: boolean }> {
    const tokens: Array<{ value: string; quoted: boolean }> = [];
    let current = '';
    let inQuotes = false;
    let quoteChar = '';

    for (let i = 0; i < line.length; i++) {
      const char = line[i];

      if (inQuotes) {
        if (char === quoteChar) {
          // End of quoted string; "" is an empty argument
          tokens.push({ value: current, quoted: true });
          current = '';
          inQuotes = false;
          quoteChar = '';
        } else if (char === '\\' && i + 1 < line.length) {
          const next = line[i + 1];
          if (next === quoteChar || next === '\\' || next === 'n' || next === 't') {
            if (next === 'n') current += '\n';
            else if (next === 't') current += '\t';
            else current += next;
            i++;
          } else {
            current += char;
          }
        } else {
          current += char;
        }
      } else if (char === '"' || char === "'") {
        if (current !== '') {
          tokens.push({ value: current, quoted: false });
          current = '';
        }
        inQuotes = true;
        quoteChar = char;
      } else if (char === ' ' || char === '\t') {
        if (current !== '') {
          tokens.push({ value: current, quoted: false });
          current = '';
        }
      } else {
        current += char;
      }
    }

    if (inQuotes) {
      throw new ParseError('Unterminated string', lineNumber, line);
    }

    if (current !== '') {
      tokens.push({ value: current, quoted: false });
    }

    return tokens;
  }

  /**
   * Parse an option value to appropriate type.
   */
  private parseOptionValue(value: string): string | boolean | number {
    if (value.toLowerCase() === 'true') return true;
    if (value.toLowerCase() === 'false') return false;

    if (/^-?\d+(\.\d+)?$/.test(value)) {
      return parseFloat(value);
    }

    return value;
  }
}

// =============================================================================
// Parse Error
// =============================================================================

export class ParseError extends Error {
  lineNumber: number;
  line: string;

  constructor(message: string, lineNumber: number, line: string) {
    super(`Parse error at line ${lineNumber}: ${message}\n  ${line}`);
    this.name = 'ParseError';
    this.lineNumber = lineNumber;
    this.line = line;
  }
}

// =============================================================================
// Factory
// =============================================================================

export function createCommandParser(): CommandParser {
  return new CommandParser();
}
