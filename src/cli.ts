/**
 * tokenfill command-line interface.
 *
 * `-e`, `-f` and `-F` feed one shared list so variable sources keep their
 * command-line order across all three flags.
 */
import fs from 'fs';

import { Command } from 'commander';

import { DEFAULT_EXTENSION } from './config.js';
import { TokenfillError } from './errors.js';
import { logger } from './logger.js';
import { parseRunOptions } from './options.js';
import { runTemplates } from './run.js';
import type { RunDeps } from './run.js';
import { parseAssignment } from './variable-store.js';
import type { VariableSource } from './variable-store.js';

function readVersion(): string {
  const pkgPath = new URL('../package.json', import.meta.url);
  try {
    const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'));
    if (
      typeof pkg === 'object' &&
      pkg !== null &&
      'version' in pkg &&
      typeof pkg.version === 'string'
    ) {
      return pkg.version;
    }
  } catch (err) {
    logger.debug({ err }, 'Could not read package version');
  }
  return '0.0.0';
}

/** One-line diagnostic plus help hint, as printed on a fatal error. */
export function formatDiagnostic(err: TokenfillError): string {
  return `tokenfill: ${err.message}\nTry 'tokenfill --help' for more information.\n`;
}

export function createProgram(deps: Partial<RunDeps> = {}): Command {
  const sources: VariableSource[] = [];
  const program = new Command();

  program
    .name('tokenfill')
    .description(
      'Replace ${ NAME } placeholders in text, a file or a directory of templates',
    )
    .version(readVersion())
    .option('-t, --text <text>', 'inline template text')
    .option('-i, --input <file>', 'template file')
    .option('-d, --dir <directory>', 'directory of template files')
    .option(
      '-o, --output <path>',
      'output file, or output root in directory mode (default: stdout)',
    )
    .option(
      '-e, --env <NAME=VALUE>',
      'set a variable; NAME is uppercased (repeatable)',
      (value: string) => {
        sources.push(parseAssignment(value));
        return sources;
      },
    )
    .option(
      '-f, --env-file <file>',
      'load NAME=VALUE lines from a file that must exist (repeatable)',
      (value: string) => {
        sources.push({ kind: 'file', path: value, mustExist: true });
        return sources;
      },
    )
    .option(
      '-F, --optional-env-file <file>',
      'load NAME=VALUE lines from a file if it exists (repeatable)',
      (value: string) => {
        sources.push({ kind: 'file', path: value, mustExist: false });
        return sources;
      },
    )
    .option('-s, --silent', 'leave unresolved placeholders in place instead of failing')
    .option('-r, --recursive', 'descend into subdirectories in directory mode')
    .option(
      '-x, --extension <ext>',
      `template file suffix in directory mode (default: "${DEFAULT_EXTENSION}")`,
    )
    .option('-n, --dry-run', 'resolve everything but write nothing')
    .option('-E, --expand-vars', 'follow $NAME indirection in variable values')
    .option('--no-inherit', 'do not read variables from the process environment')
    .option('-v, --verbose', 'debug logging')
    .option('-q, --quiet', 'log errors only')
    .action(() => {
      const flags = program.opts<{ verbose?: boolean; quiet?: boolean; inherit?: boolean }>();
      if (flags.verbose) logger.level = 'debug';
      else if (flags.quiet) logger.level = 'error';

      const opts = parseRunOptions({
        ...program.opts(),
        sources,
        useEnv: flags.inherit !== false,
      });
      const summary = runTemplates(opts, deps);
      logger.debug(
        { units: summary.units, written: summary.written, unresolved: summary.unresolved },
        'Run complete',
      );
    });

  return program;
}

/**
 * Parse `argv` and run. Fatal tokenfill errors are reported on `stderr`.
 *
 * @returns Process exit code
 */
export function main(
  argv: string[],
  deps: Partial<RunDeps> = {},
  stderr: { write(chunk: string): unknown } = process.stderr,
): number {
  try {
    createProgram(deps).parse(argv);
    return 0;
  } catch (err) {
    if (err instanceof TokenfillError) {
      stderr.write(formatDiagnostic(err));
      return err.exitCode;
    }
    throw err;
  }
}
