/**
 * Command Interpreter
 * Fixed-prefix commands against the task store: add, list, remove.
 *
 * Matching is done on the lowercased, trimmed utterance. Task text keeps the
 * casing it was spoken with.
 */

import type { Configuration } from './config';
import type { TaskStore } from './task-store';

export type Command =
  | { kind: 'add'; task: string }
  | { kind: 'list' }
  | { kind: 'remove'; task: string }
  | { kind: 'unknown'; utterance: string };

const ADD_PREFIX = 'add ';
const LIST_PREFIX = 'list';
const REMOVE_PREFIX = 'remove ';

/**
 * Parse an utterance. Prefixes are checked in order: add, list, remove.
 */
export function parseCommand(utterance: string): Command {
  const trimmed = utterance.trim();
  const normalized = trimmed.toLowerCase();

  if (normalized.startsWith(ADD_PREFIX)) {
    return { kind: 'add', task: trimmed.slice(ADD_PREFIX.length).trim() };
  }
  if (normalized.startsWith(LIST_PREFIX)) {
    return { kind: 'list' };
  }
  if (normalized.startsWith(REMOVE_PREFIX)) {
    return { kind: 'remove', task: trimmed.slice(REMOVE_PREFIX.length).trim() };
  }
  return { kind: 'unknown', utterance };
}

/**
 * Apply a command to the store and return the response text
 */
export function executeCommand(command: Command, config: Configuration, store: TaskStore): string {
  const { userId, todoCategory: category } = config;

  switch (command.kind) {
    case 'add':
      store.add(userId, category, command.task);
      return `Added task '${command.task}' to ${category} todo list for user ${userId}.`;

    case 'list': {
      const tasks = store.tasks(userId, category);
      if (tasks.length === 0) {
        return `No tasks in ${category} for ${userId}.`;
      }
      return tasks.map((task) => `- ${task}`).join('\n');
    }

    case 'remove': {
      const removed = store.remove(userId, category, command.task);
      if (removed === undefined) {
        return `Task '${command.task}' not found in ${category} for ${userId}.`;
      }
      return `Removed task '${removed}' from ${category} todo list for user ${userId}.`;
    }

    case 'unknown':
      return `Unknown command: ${command.utterance}. Use 'add <task>', 'list', or 'remove <task>'.`;
  }
}

export function interpret(utterance: string, config: Configuration, store: TaskStore): string {
  return executeCommand(parseCommand(utterance), config, store);
}
