/**
 * CLI argument parsing and output formatting helpers.
 *
 * Kept apart from cli.ts, which runs the program on import.
 */

import { InvalidArgumentError } from 'commander';
import { parse } from 'shell-quote';
import { isPaginationProtocolError } from '../protocol/errors.js';
import type { CollectionItemMap, CollectionKind } from './collections.js';

const COLLECTION_ALIASES = new Map<string, CollectionKind>([
  ['tools', 'tools'],
  ['prompts', 'prompts'],
  ['resources', 'resources'],
  ['templates', 'resourceTemplates'],
  ['resource-templates', 'resourceTemplates'],
  ['resourceTemplates', 'resourceTemplates'],
]);

/**
 * Parse a shell command string into command and arguments.
 * Handles quoted paths like "path with spaces" and 'single quoted'.
 */
export function parseCommand(command: string): string[] {
  const parsed = parse(command);
  // shell-quote returns objects for operators like | and >
  return parsed.filter((arg): arg is string => typeof arg === 'string');
}

export function parseCollectionKind(value: string): CollectionKind {
  const kind = COLLECTION_ALIASES.get(value);
  if (kind === undefined) {
    throw new InvalidArgumentError(
      'Expected one of: tools, prompts, resources, templates.'
    );
  }
  return kind;
}

export function parseMaxPages(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

type Locators = {
  [K in CollectionKind]: (item: CollectionItemMap[K]) => string | undefined;
};

const LOCATORS: Locators = {
  tools: () => undefined,
  prompts: () => undefined,
  resources: (item) => item.uri,
  resourceTemplates: (item) => item.uriTemplate,
};

/**
 * One-line summary of a collection item: name, location for resources,
 * then the description after a dash.
 */
export function formatItem<K extends CollectionKind>(kind: K, item: CollectionItemMap[K]): string {
  const location = LOCATORS[kind](item);
  let line = location === undefined ? item.name : `${item.name} (${location})`;
  if (item.description) {
    line += ` - ${item.description}`;
  }
  return line;
}

export function describeError(error: unknown): string {
  if (isPaginationProtocolError(error)) {
    return `Server pagination error: ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
