/**
 * One tokenfill invocation.
 *
 * Builds the variable store, acquires template units, then renders and
 * emits each unit in order. The first fatal error aborts the whole run;
 * units already written stay written.
 */
import { BYTE_ENCODING } from './bytes.js';
import { logger } from './logger.js';
import { parseRunOptions, templateSourceOf } from './options.js';
import type { RunOptions, RunOptionsInput } from './options.js';
import type { ResolveOptions } from './resolver.js';
import { FileSink, assertWritableOutput } from './sink.js';
import type { Sink } from './sink.js';
import { collectUnits } from './source-walker.js';
import { renderTemplate } from './template.js';
import { VariableStore } from './variable-store.js';

/** Collaborators injected into a run so tests can replace the environment and the sink. */
export interface RunDeps {
  sink: Sink;
  env: NodeJS.ProcessEnv;
}

export interface RunSummary {
  /** Template units processed. */
  units: number;
  /** Units handed to the sink (zero on a dry run). */
  written: number;
  /** Distinct tokens left in place under the silent policy, across all units. */
  unresolved: string[];
}

/** Build the store: environment seed first, then declared sources in order. */
export function buildStore(opts: RunOptions, env: NodeJS.ProcessEnv): VariableStore {
  const store = opts.useEnv
    ? VariableStore.fromEnvironment(env)
    : new VariableStore();
  return store.apply(opts.sources);
}

export function runTemplates(
  raw: RunOptionsInput,
  deps: Partial<RunDeps> = {},
): RunSummary {
  const opts = parseRunOptions(raw);
  const sink = deps.sink ?? new FileSink();
  const store = buildStore(opts, deps.env ?? process.env);

  const resolveOptions: ResolveOptions = {
    expandVars: opts.expandVars,
    failOnMissing: !opts.silent,
    maxDepth: opts.maxDepth,
  };

  const units = collectUnits(templateSourceOf(opts));
  if (units.length === 0) {
    logger.info('No template files matched, nothing to do');
  }

  const unresolved = new Set<string>();
  let written = 0;

  for (const unit of units) {
    const result = renderTemplate(unit.text, store, resolveOptions);
    for (const token of result.unresolved) {
      unresolved.add(token);
      logger.debug({ token, path: unit.label }, 'Token left unresolved');
    }

    const destination = unit.output ?? '<stdout>';
    if (opts.dryRun) {
      if (unit.output !== null) assertWritableOutput(unit.output);
      logger.info(
        {
          path: unit.label,
          output: destination,
          bytes: Buffer.byteLength(result.text, BYTE_ENCODING),
        },
        'Dry run, not writing',
      );
      continue;
    }

    sink.write(unit.output, result.text);
    written++;
    logger.debug({ path: unit.label, output: destination }, 'Template rendered');
  }

  return { units: units.length, written, unresolved: [...unresolved] };
}
