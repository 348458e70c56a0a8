/**
 * Zod schemas for the options of one tokenfill run.
 *
 * The CLI collects flags into a plain object; this module validates its
 * shape and the cross-field rules (exactly one input source) before any
 * file is touched, and maps violations to ConfigError.
 */
import { z } from 'zod';

import { DEFAULT_EXTENSION } from './config.js';
import { ConfigError } from './errors.js';
import type { TemplateSource } from './source-walker.js';

// ---------------------------------------------------------------------------
// Variable sources, applied in declaration order
// ---------------------------------------------------------------------------

export const AssignSourceSchema = z.object({
  kind: z.literal('assign'),
  name: z.string().min(1),
  value: z.string(),
});

export const FileSourceSchema = z.object({
  kind: z.literal('file'),
  path: z.string().min(1),
  mustExist: z.boolean(),
});

export const VariableSourceSchema = z.discriminatedUnion('kind', [
  AssignSourceSchema,
  FileSourceSchema,
]);

// ---------------------------------------------------------------------------
// Run options
// ---------------------------------------------------------------------------

export const RunOptionsSchema = z
  .object({
    text: z.string().optional(),
    input: z.string().min(1).optional(),
    dir: z.string().min(1).optional(),
    output: z.string().min(1).optional(),
    sources: z.array(VariableSourceSchema).default([]),
    /** Leave unresolved tokens in place instead of failing. */
    silent: z.boolean().default(false),
    recursive: z.boolean().default(false),
    extension: z
      .string()
      .transform((ext) => ext.replace(/^\./, ''))
      .pipe(z.string().min(1, 'extension must not be empty'))
      .default(DEFAULT_EXTENSION),
    dryRun: z.boolean().default(false),
    expandVars: z.boolean().default(false),
    /** Seed the store from the process environment before declared sources. */
    useEnv: z.boolean().default(true),
    maxDepth: z.number().int().positive().optional(),
  })
  .superRefine((opts, ctx) => {
    const selected = [opts.text, opts.input, opts.dir].filter(
      (v) => v !== undefined,
    ).length;
    if (selected !== 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message:
          selected === 0
            ? 'one of --text, --input or --dir is required'
            : '--text, --input and --dir are mutually exclusive',
      });
    }
  });

export type RunOptionsInput = z.input<typeof RunOptionsSchema>;
export type RunOptions = z.infer<typeof RunOptionsSchema>;

/** Validate raw options; any violation becomes a ConfigError. */
export function parseRunOptions(raw: unknown): RunOptions {
  const result = RunOptionsSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue.path.length ? `${issue.path.join('.')}: ` : '';
    throw new ConfigError(`${where}${issue.message}`);
  }
  return result.data;
}

/** The Template Unit source selected by validated options. */
export function templateSourceOf(opts: RunOptions): TemplateSource {
  if (opts.text !== undefined) {
    return { kind: 'text', text: opts.text, output: opts.output };
  }
  if (opts.input !== undefined) {
    return { kind: 'file', path: opts.input, output: opts.output };
  }
  if (opts.dir !== undefined) {
    return {
      kind: 'directory',
      root: opts.dir,
      extension: opts.extension,
      recursive: opts.recursive,
      outputRoot: opts.output,
    };
  }
  throw new ConfigError('one of --text, --input or --dir is required');
}
