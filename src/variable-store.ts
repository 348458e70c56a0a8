/**
 * Layered variable environment.
 *
 * Values are merged from an ordered list of sources (inline assignments and
 * variable files). Sources are applied strictly in declaration order, so a
 * later source overrides an earlier one for the same name.
 *
 * Values are held as byte strings (see bytes.ts): variable files are read
 * byte for byte, inline and environment values are UTF-8 encoded.
 */
import fs from 'fs';

import { readByteString, toByteString } from './bytes.js';
import { ConfigError } from './errors.js';
import { logger } from './logger.js';

/** One apply-operation against the store, in command-line order. */
export type VariableSource =
  | { kind: 'assign'; name: string; value: string }
  | { kind: 'file'; path: string; mustExist: boolean };

export interface VariableEntry {
  name: string;
  value: string;
}

/**
 * Parse line-oriented `NAME=VALUE` content.
 *
 * Blank lines and lines whose first non-whitespace character is `#` are
 * skipped. The name is trimmed; the value is everything after the first
 * `=`, kept verbatim. Lines with no `=` or an empty name are dropped.
 */
export function parseVariableFile(content: string): VariableEntry[] {
  const entries: VariableEntry[] = [];
  const lines = content.split('\n');

  lines.forEach((rawLine, index) => {
    const line = rawLine.endsWith('\r') ? rawLine.slice(0, -1) : rawLine;
    const trimmed = line.trimStart();
    if (!trimmed || trimmed.startsWith('#')) return;

    const eqIndex = line.indexOf('=');
    const name = eqIndex === -1 ? '' : line.slice(0, eqIndex).trim();
    if (!name) {
      logger.debug({ line: index + 1 }, 'Skipping malformed variable line');
      return;
    }

    entries.push({ name, value: line.slice(eqIndex + 1) });
  });

  return entries;
}

export class VariableStore {
  private readonly values = new Map<string, string>();

  /** Register or overwrite a binding. */
  set(name: string, value: string): void {
    this.values.set(name, value);
  }

  /**
   * Apply every `NAME=VALUE` entry of a variable file, in file order.
   * An absent file is a ConfigError when `mustExist` is set, otherwise ignored.
   */
  setFromFile(filePath: string, mustExist: boolean): void {
    if (!fs.existsSync(filePath)) {
      if (mustExist) {
        throw new ConfigError(`Variable file not found: ${filePath}`);
      }
      logger.debug({ path: filePath }, 'Optional variable file absent, skipping');
      return;
    }
    if (!fs.statSync(filePath).isFile()) {
      throw new ConfigError(`Variable file is not a regular file: ${filePath}`);
    }

    const entries = parseVariableFile(readByteString(filePath));
    for (const entry of entries) {
      this.set(entry.name, entry.value);
    }
    logger.debug({ path: filePath, count: entries.length }, 'Variable file loaded');
  }

  /** Apply sources one after another; the last write for a name wins. */
  apply(sources: readonly VariableSource[]): this {
    for (const source of sources) {
      if (source.kind === 'assign') {
        this.set(source.name, toByteString(source.value));
      } else {
        this.setFromFile(source.path, source.mustExist);
      }
    }
    return this;
  }

  lookup(name: string): string | undefined {
    return this.values.get(name);
  }

  get size(): number {
    return this.values.size;
  }

  /** Seed a store from an environment record, skipping unset entries. */
  static fromEnvironment(env: NodeJS.ProcessEnv): VariableStore {
    const store = new VariableStore();
    for (const [name, value] of Object.entries(env)) {
      if (value !== undefined) store.set(name, toByteString(value));
    }
    return store;
  }
}

/**
 * Parse an inline `NAME=VALUE` assignment. The name is uppercased, the
 * value is everything after the first `=`.
 */
export function parseAssignment(assignment: string): VariableSource {
  const eqIndex = assignment.indexOf('=');
  const name = eqIndex === -1 ? '' : assignment.slice(0, eqIndex).trim();
  if (!name) {
    throw new ConfigError(`Invalid assignment "${assignment}", expected NAME=VALUE`);
  }
  return {
    kind: 'assign',
    name: name.toUpperCase(),
    value: assignment.slice(eqIndex + 1),
  };
}
