/**
 * EditCommand / CommandGroup Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { EditCommand, CommandGroup } from './EditCommand.js';

function insertCommand(position: number, text: string, timestamp = 0): EditCommand {
  return new EditCommand({
    kind: 'insert',
    position,
    removedText: '',
    insertedText: text,
    cursorBefore: position,
    cursorAfter: position + text.length,
    timestamp,
  });
}

describe('EditCommand', () => {
  it('should be frozen after creation', () => {
    const command = insertCommand(0, 'a');

    expect(Object.isFrozen(command)).toBe(true);
  });

  it('should assign unique ids', () => {
    expect(insertCommand(0, 'a').id).not.toBe(insertCommand(0, 'a').id);
  });

  it('should expose the end offsets of its text', () => {
    const command = new EditCommand({
      kind: 'replace',
      position: 4,
      removedText: 'abc',
      insertedText: 'xyzzy',
      cursorBefore: 4,
      cursorAfter: 9,
      timestamp: 0,
    });

    expect(command.insertedEnd).toBe(9);
    expect(command.removedEnd).toBe(7);
    expect(command.getMemorySize()).toBe(64 + 8 * 2);
  });
});

describe('CommandGroup', () => {
  it('should start empty', () => {
    const group = new CommandGroup('typing', 10);

    expect(group.isEmpty).toBe(true);
    expect(group.length).toBe(0);
    expect(group.first).toBeUndefined();
    expect(group.last).toBeUndefined();
    expect(group.endTime).toBe(10);
  });

  it('should append commands in order and stamp the end time', () => {
    const group = new CommandGroup('typing', 10);
    const a = insertCommand(0, 'a', 10);
    const b = insertCommand(1, 'b', 25);

    group.append(a, 10);
    group.append(b, 25);

    expect(group.commands).toEqual([a, b]);
    expect(group.first).toBe(a);
    expect(group.last).toBe(b);
    expect(group.endTime).toBe(25);
    expect(group.getInsertedText()).toBe('ab');
  });
});
