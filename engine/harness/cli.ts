#!/usr/bin/env node
/**
 * Caretpad Headless Test Harness - CLI Entry Point
 *
 * Usage:
 *   caretpad-harness [options]
 *   caretpad-harness < script.txt
 *   echo 'TYPE "abc"' | caretpad-harness --pretty
 *
 * Options:
 *   --pretty        Human-readable output (default: JSON)
 *   --no-timestamps Omit timestamps from output
 *   --stop-on-error Stop execution on first error
 *   --echo          Echo commands before executing
 *   --verbose       Verbose mode with extra logging
 *   --help          Show help message
 *
 * Interactive mode:
 *   Run without piped input for REPL-style interaction.
 */

import * as readline from 'readline';
import { HarnessRunner, createHarnessRunner, formatOutput } from './HarnessRunner.js';
import { ParseError } from './CommandParser.js';
import { DEFAULT_CONFIG } from './types.js';
import type { HarnessConfig, Output } from './types.js';

// =============================================================================
// CLI Argument Parsing
// =============================================================================

interface CLIArgs {
  config: Partial<HarnessConfig>;
  help: boolean;
  interactive: boolean;
}

function parseArgs(args: string[]): CLIArgs {
  const result: CLIArgs = {
    config: {},
    help: false,
    interactive: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '--pretty':
        result.config.outputFormat = 'pretty';
        break;
      case '--json':
        result.config.outputFormat = 'json';
        break;
      case '--no-timestamps':
        result.config.includeTimestamps = false;
        break;
      case '--timestamps':
        result.config.includeTimestamps = true;
        break;
      case '--stop-on-error':
        result.config.stopOnError = true;
        break;
      case '--continue-on-error':
        result.config.stopOnError = false;
        break;
      case '--echo':
        result.config.echoCommands = true;
        break;
      case '--no-echo':
        result.config.echoCommands = false;
        break;
      case '--verbose':
      case '-v':
        result.config.verbose = true;
        break;
      case '--quiet':
      case '-q':
        result.config.verbose = false;
        break;
      case '--interactive':
      case '-i':
        result.interactive = true;
        break;
      case '--help':
      case '-h':
        result.help = true;
        break;
      case '--no-auto-indent':
        result.config.autoIndent = false;
        break;
      case '--no-auto-close':
        result.config.autoClosePairs = false;
        break;
      case '--max-undo':
        result.config.maxUndoGroups = readIntArg(args, ++i, arg);
        break;
      case '--grouping-timeout':
        result.config.groupingTimeoutMs = readIntArg(args, ++i, arg);
        break;
      case '--timeout':
        result.config.commandTimeoutMs = readIntArg(args, ++i, arg);
        break;
      default:
        console.error(`Unknown option: ${arg}`);
        process.exit(1);
    }
  }

  return result;
}

function readIntArg(args: string[], index: number, flag: string): number {
  const raw = args[index];
  const value = raw === undefined ? NaN : Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    console.error(`${flag} requires a non-negative integer`);
    process.exit(1);
  }
  return value;
}

// =============================================================================
// Help Text
// =============================================================================

const HELP_TEXT = `
Caretpad Headless Test Harness

USAGE:
  caretpad-harness [options]
  caretpad-harness < script.txt
  echo 'TYPE "abc"' | caretpad-harness --pretty

OPTIONS:
  --pretty              Human-readable output (default: JSON)
  --json                JSON output (one object per line)
  --no-timestamps       Omit timestamps from pretty output
  --stop-on-error       Stop execution on first error
  --echo                Echo commands before executing
  --verbose, -v         Verbose mode with extra logging
  --interactive, -i     Force interactive mode
  --no-auto-indent      Enter does not carry indentation
  --no-auto-close       Brackets and quotes are not auto-closed
  --max-undo <n>        Undo groups kept (default: 100)
  --grouping-timeout <ms> Pause that closes an undo group (default: 1000)
  --timeout <ms>        Per-command timeout (default: 2000)
  --help, -h            Show this help message

COMMANDS:
  Content:
    LOAD "<text>"            Replace the document (clears history)
    INSERT "<text>"          Insert at the cursor (replaces selection)
    TYPE "<text>"            Insert one character at a time
    BACKSPACE [count=n] [word=true]
    DELETE [count=n] [word=true]

  Cursor:
    MOVE <delta>             Move by characters
    CURSOR [position]        Set or query the cursor
    WORD_START / WORD_END    Word navigation
    LINE <delta>             Move by lines
    GOTO_LINE <n>            Jump to a 1-based line

  Selection:
    SELECT <start> <end>     Select from start to end
    SELECT_ALL / CLEAR_SELECTION / GET_SELECTION

  Clipboard:
    COPY / CUT / PASTE

  Keys:
    KEY <combo> [combo...]   e.g. KEY ctrl+z, KEY shift+left, KEY enter

  Completion:
    COMPLETE                 Suggestions for the word at the cursor
    ACCEPT [word]            Replace the word (default: first suggestion)

  History:
    UNDO / REDO              Undo or redo one group
    FINALIZE                 Close the open group
    WAIT <ms>                Advance the clock

  State Inspection:
    GET                      Document content
    STATS                    Character, word and line counts
    HISTORY                  Undo/redo groups
    SNAPSHOT                 Full state

  Utility:
    ECHO <message>           Print message
    ASSERT <target> <op> <value>
                             Targets: CONTENT CURSOR SELECTION SELECTED_TEXT LENGTH
                             LINE COLUMN CAN_UNDO CAN_REDO UNDO_COUNT REDO_COUNT
    ASSERT_ERROR             Expect next command to fail

  Control:
    RESET                    Reset editor state
    QUIT                     Exit harness

EXAMPLES:
  TYPE "hello"
  WAIT 1500
  TYPE " world"
  UNDO
  ASSERT CONTENT == "hello"

  LOAD "foobarbaz"
  SELECT 3 6
  INSERT "X"
  ASSERT CONTENT == "fooXbaz"
  UNDO
  ASSERT CONTENT == "foobarbaz"
`;

// =============================================================================
// Main Entry Point
// =============================================================================

async function main(): Promise<void> {
  const cliArgs = parseArgs(process.argv.slice(2));

  if (cliArgs.help) {
    console.log(HELP_TEXT);
    process.exit(0);
  }

  const config: HarnessConfig = {
    ...DEFAULT_CONFIG,
    ...cliArgs.config,
  };

  const runner = createHarnessRunner(config);

  runner.onOutput((output) => {
    const line = formatOutput(output, config);
    if (output.type === 'error') console.error(line);
    else console.log(line);
  });

  process.on('SIGINT', () => {
    runner.abort('Interrupted');
    if (!runner.isRunning()) process.exit(130);
  });

  const isInteractive = cliArgs.interactive || process.stdin.isTTY;

  if (isInteractive) {
    await runInteractive(runner, config);
  } else {
    await runPiped(runner, config);
  }
}

async function runInteractive(runner: HarnessRunner, config: HarnessConfig): Promise<void> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: 'cp> ',
  });

  if (config.verbose) {
    console.log('Caretpad Headless Test Harness');
    console.log('Type "help" for commands, "quit" to exit.');
    console.log('');
  }

  rl.prompt();
  let lineNumber = 0;

  for await (const line of rl) {
    lineNumber++;

    if (line.trim().toLowerCase() === 'help') {
      console.log(HELP_TEXT);
      rl.prompt();
      continue;
    }

    try {
      const shouldContinue = await runner.executeLine(line, lineNumber);
      if (!shouldContinue) break;
    } catch (error) {
      // Already reported through the output handler
      if (config.verbose) console.error(error);
      if (config.stopOnError) {
        rl.close();
        process.exit(1);
      }
    }

    rl.prompt();
  }

  rl.close();
  if (config.verbose) {
    console.log('\nGoodbye!');
  }
  process.exit(0);
}

async function runPiped(runner: HarnessRunner, _config: HarnessConfig): Promise<void> {
  const rl = readline.createInterface({
    input: process.stdin,
    terminal: false,
  });

  const lines: string[] = [];
  for await (const line of rl) {
    lines.push(line);
  }

  try {
    const outputs = await runner.executeScript(lines.join('\n'));
    process.exit(outputs.some(isFailure) ? 1 : 0);
  } catch (error) {
    if (error instanceof ParseError) {
      console.error(error.message);
      process.exit(2);
    }
    throw error;
  }
}

function isFailure(output: Output): boolean {
  return output.type === 'error' || (output.type === 'assert' && !output.passed);
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
