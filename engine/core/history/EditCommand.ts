/**
 * Caretpad Engine - Edit Command Log
 *
 * Value records for the history engine:
 * - EditCommand: one atomic text mutation, frozen on creation
 * - CommandGroup: a time-ordered run of commands undone/redone as one unit
 */

import type { EditKind, GroupCategory } from '../types/index.js';

/** Counter for generating unique IDs */
let commandIdCounter = 0;

function generateCommandId(): string {
  return `edit_${++commandIdCounter}`;
}

export interface EditCommandInit {
  kind: EditKind;
  /** Offset in the content before the mutation */
  position: number;
  removedText: string;
  insertedText: string;
  cursorBefore: number;
  cursorAfter: number;
  timestamp: number;
}

/**
 * One atomic text mutation.
 * Immutable after creation: the instance is frozen in the constructor.
 */
export class EditCommand {
  readonly id: string;
  readonly kind: EditKind;
  readonly position: number;
  readonly removedText: string;
  readonly insertedText: string;
  readonly cursorBefore: number;
  readonly cursorAfter: number;
  readonly timestamp: number;

  constructor(init: EditCommandInit) {
    this.id = generateCommandId();
    this.kind = init.kind;
    this.position = init.position;
    this.removedText = init.removedText;
    this.insertedText = init.insertedText;
    this.cursorBefore = init.cursorBefore;
    this.cursorAfter = init.cursorAfter;
    this.timestamp = init.timestamp;
    Object.freeze(this);
  }

  /** Offset just past the inserted text */
  get insertedEnd(): number {
    return this.position + this.insertedText.length;
  }

  /** Offset just past the removed text, in pre-mutation coordinates */
  get removedEnd(): number {
    return this.position + this.removedText.length;
  }

  /**
   * Rough memory estimate in bytes (UTF-16 payload plus fixed overhead).
   */
  getMemorySize(): number {
    return 64 + (this.removedText.length + this.insertedText.length) * 2;
  }
}

/**
 * Ordered run of commands sharing one category.
 * Only the history engine appends; consumers get read-only views.
 */
export class CommandGroup {
  readonly category: GroupCategory;
  readonly startTime: number;

  private _endTime: number;
  private readonly _commands: EditCommand[] = [];

  constructor(category: GroupCategory, startTime: number) {
    this.category = category;
    this.startTime = startTime;
    this._endTime = startTime;
  }

  get endTime(): number {
    return this._endTime;
  }

  get commands(): ReadonlyArray<EditCommand> {
    return this._commands;
  }

  get length(): number {
    return this._commands.length;
  }

  get isEmpty(): boolean {
    return this._commands.length === 0;
  }

  get first(): EditCommand | undefined {
    return this._commands[0];
  }

  get last(): EditCommand | undefined {
    return this._commands[this._commands.length - 1];
  }

  /**
   * Append a command and stamp the group's end time.
   * @internal Called by UndoRedoManager only.
   */
  append(command: EditCommand, time: number): void {
    this._commands.push(command);
    this._endTime = time;
  }

  /** Concatenated inserted text, in recording order */
  getInsertedText(): string {
    return this._commands.map(cmd => cmd.insertedText).join('');
  }

  getMemorySize(): number {
    return this._commands.reduce((sum, cmd) => sum + cmd.getMemorySize(), 0);
  }
}
