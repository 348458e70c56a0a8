/**
 * Template acquisition.
 *
 * Turns the selected input (inline text, one file, or a directory of
 * matching files) into an ordered list of template units, each paired with
 * its output destination. `null` means standard output.
 *
 * Directory layout mapping (outputRoot = /out, extension = template):
 *   root/x.template      -> /out/x
 *   root/sub/y.template  -> /out/sub/y
 */
import fs from 'fs';
import path from 'path';

import { readByteString, toByteString } from './bytes.js';
import { ConfigError, NotFoundError } from './errors.js';
import { logger } from './logger.js';

export type TemplateSource =
  | { kind: 'text'; text: string; output?: string }
  | { kind: 'file'; path: string; output?: string }
  | {
      kind: 'directory';
      root: string;
      extension: string;
      recursive: boolean;
      outputRoot?: string;
    };

export interface TemplateUnit {
  /** Where the text came from, for log lines. */
  label: string;
  /** Template content as a byte string. */
  text: string;
  output: string | null;
}

/**
 * List files under `root` whose name ends with `.<extension>`.
 *
 * Symbolic links are followed. A linked directory that resolves to one of
 * its own ancestors is not entered again; dangling links are skipped.
 *
 * @returns POSIX-style paths relative to `root`, sorted so runs are reproducible
 */
export function listTemplateFiles(
  root: string,
  extension: string,
  recursive: boolean,
): string[] {
  const suffix = `.${extension}`;
  const found: string[] = [];

  const walk = (dir: string, prefix: string, ancestors: Set<string>): void => {
    for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
      const full = path.join(dir, entry.name);
      const rel = prefix ? `${prefix}/${entry.name}` : entry.name;

      let isDirectory = entry.isDirectory();
      let isFile = entry.isFile();
      if (entry.isSymbolicLink()) {
        const target = fs.statSync(full, { throwIfNoEntry: false });
        if (!target) {
          logger.debug({ path: full }, 'Skipping dangling symlink');
          continue;
        }
        isDirectory = target.isDirectory();
        isFile = target.isFile();
      }

      if (isDirectory) {
        if (!recursive) continue;
        const real = fs.realpathSync(full);
        if (ancestors.has(real)) {
          logger.debug({ path: full }, 'Skipping symlink loop');
          continue;
        }
        walk(full, rel, new Set(ancestors).add(real));
      } else if (
        isFile &&
        entry.name.endsWith(suffix) &&
        entry.name.length > suffix.length
      ) {
        found.push(rel);
      }
    }
  };

  walk(root, '', new Set([fs.realpathSync(root)]));
  return found.sort();
}

/** Output location for a matched file: the relative path minus its suffix, under `outputRoot`. */
export function outputPathFor(
  outputRoot: string,
  relativePath: string,
  extension: string,
): string {
  const stripped = relativePath.slice(0, -(extension.length + 1));
  return path.join(outputRoot, ...stripped.split('/'));
}

function readTemplateFile(filePath: string): string {
  if (!fs.existsSync(filePath)) {
    throw new NotFoundError(filePath);
  }
  if (!fs.statSync(filePath).isFile()) {
    throw new ConfigError(`Template input is not a regular file: ${filePath}`);
  }
  return readByteString(filePath);
}

function collectDirectory(
  source: Extract<TemplateSource, { kind: 'directory' }>,
): TemplateUnit[] {
  const { root, extension, recursive, outputRoot } = source;

  if (!fs.existsSync(root)) {
    throw new NotFoundError(root);
  }
  if (!fs.statSync(root).isDirectory()) {
    throw new ConfigError(`Template directory is not a directory: ${root}`);
  }
  if (
    outputRoot !== undefined &&
    fs.existsSync(outputRoot) &&
    !fs.statSync(outputRoot).isDirectory()
  ) {
    throw new ConfigError(
      `Output path exists and is not a directory: ${outputRoot}`,
    );
  }

  const files = listTemplateFiles(root, extension, recursive);
  logger.debug({ path: root, count: files.length }, 'Template files found');

  return files.map((rel) => ({
    label: rel,
    text: readByteString(path.join(root, ...rel.split('/'))),
    output:
      outputRoot === undefined ? null : outputPathFor(outputRoot, rel, extension),
  }));
}

/** Produce the template units for `source`, in processing order. */
export function collectUnits(source: TemplateSource): TemplateUnit[] {
  switch (source.kind) {
    case 'text':
      return [
        { label: '<text>', text: toByteString(source.text), output: source.output ?? null },
      ];
    case 'file':
      return [
        {
          label: source.path,
          text: readTemplateFile(source.path),
          output: source.output ?? null,
        },
      ];
    case 'directory':
      return collectDirectory(source);
  }
}
