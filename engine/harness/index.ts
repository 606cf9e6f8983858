/**
 * Caretpad Headless Test Harness - Module Exports
 *
 * A text-based testing harness for the Caretpad engine.
 * Enables automated testing via stdin/stdout command protocol.
 */

export { CommandParser, createCommandParser, ParseError } from './CommandParser.js';

export {
  HarnessRunner,
  createHarnessRunner,
  formatOutput,
  CommandTimeoutError,
} from './HarnessRunner.js';

export type {
  CommandType,
  ParsedCommand,
  AssertTarget,
  OutputType,
  Output,
  OutputBase,
  ResultOutput,
  ValueOutput,
  SnapshotOutput,
  HistoryOutput,
  ErrorOutput,
  HarnessErrorType,
  InfoOutput,
  StatsOutput,
  AssertOutput,
  EchoOutput,
  CursorSnapshot,
  SelectionSnapshot,
  HarnessConfig,
  TimeoutErrorOutput,
  StepLimitErrorOutput,
  AbortErrorOutput,
} from './types.js';

export { DEFAULT_CONFIG, COMMAND_TYPES, isCommandType } from './types.js';
