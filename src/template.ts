/**
 * Template variable substitution.
 *
 * Replaces `${ NAME }` placeholders with resolved values. Placeholders whose
 * resolution is the UNRESOLVED sentinel, or that have no resolution at all,
 * are left exactly as written so callers can tell "not resolved" apart from
 * "intentionally empty".
 */
import { resolveAll } from './resolver.js';
import type { Resolution, ResolveOptions } from './resolver.js';
import { extractTokens, tokenPattern } from './tokens.js';
import type { VariableStore } from './variable-store.js';

/**
 * Replace every placeholder in `text` with its resolution.
 *
 * - Interior whitespace does not matter: `${FOO}` and `${ FOO }` share a resolution.
 * - Values are inserted literally; `$&`, `/`, `&` and `\` carry no meaning.
 * - Single pass: values that look like placeholders are not re-scanned.
 */
export function substituteTokens(
  text: string,
  resolutions: ReadonlyMap<string, Resolution>,
): string {
  return text.replace(tokenPattern(), (match: string, name: string) => {
    const resolution = resolutions.get(name);
    return resolution?.kind === 'value' ? resolution.value : match;
  });
}

export interface RenderResult {
  text: string;
  /** Distinct tokens left in place under the non-strict policy. */
  unresolved: string[];
}

/** Extract, resolve and substitute in one step. */
export function renderTemplate(
  text: string,
  store: VariableStore,
  options: ResolveOptions,
): RenderResult {
  const resolutions = resolveAll(extractTokens(text), store, options);
  const unresolved = [...resolutions]
    .filter(([, resolution]) => resolution.kind === 'unresolved')
    .map(([token]) => token);

  return { text: substituteTokens(text, resolutions), unresolved };
}
