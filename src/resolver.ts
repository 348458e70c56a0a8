/**
 * Token resolution against a VariableStore.
 *
 * A value starting with the `$` marker names another variable. With
 * `expandVars` enabled the chain is followed until a plain value is found;
 * otherwise the marker is literal text. A marker not followed by a valid
 * token name (`$`, `${B}`) is literal text as well.
 */
import { MAX_CHAIN_DEPTH } from './config.js';
import { CyclicReferenceError, MissingVariableError } from './errors.js';
import { isTokenName, lookupKey } from './tokens.js';
import type { VariableStore } from './variable-store.js';

export const INDIRECTION_MARKER = '$';

export type Resolution =
  | { kind: 'value'; value: string }
  | { kind: 'unresolved' };

/** Sentinel telling the substitution engine to keep the original placeholder. */
export const UNRESOLVED: Resolution = Object.freeze<Resolution>({ kind: 'unresolved' });

export interface ResolveOptions {
  expandVars: boolean;
  failOnMissing: boolean;
  /** Maximum number of indirection hops before the chain counts as cyclic. */
  maxDepth?: number;
}

/**
 * Resolve `token` to its final value.
 *
 * @throws MissingVariableError when a name in the chain is unset and `failOnMissing` is set
 * @throws CyclicReferenceError when the chain revisits a name or exceeds `maxDepth` hops
 */
export function resolveToken(
  token: string,
  store: VariableStore,
  options: ResolveOptions,
): Resolution {
  const maxDepth = options.maxDepth ?? MAX_CHAIN_DEPTH;
  const chain: string[] = [];
  let name = token;

  for (;;) {
    const key = lookupKey(name);
    if (chain.includes(key) || chain.length > maxDepth) {
      throw new CyclicReferenceError(token, [...chain, key]);
    }
    chain.push(key);

    const value = store.lookup(key);
    if (value === undefined) {
      if (options.failOnMissing) {
        throw new MissingVariableError(token, chain);
      }
      return UNRESOLVED;
    }

    const target = value.slice(INDIRECTION_MARKER.length);
    if (
      options.expandVars &&
      value.startsWith(INDIRECTION_MARKER) &&
      isTokenName(target)
    ) {
      name = target;
      continue;
    }

    return { kind: 'value', value };
  }
}

/** Resolve every token in `tokens`, keyed by the token as written. */
export function resolveAll(
  tokens: readonly string[],
  store: VariableStore,
  options: ResolveOptions,
): Map<string, Resolution> {
  const resolutions = new Map<string, Resolution>();
  for (const token of tokens) {
    resolutions.set(token, resolveToken(token, store, options));
  }
  return resolutions;
}
