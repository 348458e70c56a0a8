// Defaults read from the environment. Command-line flags override these.

// Suffix that marks template files in directory mode (without the dot)
export const DEFAULT_EXTENSION = (
  process.env.TOKENFILL_EXTENSION || 'template'
).replace(/^\./, '');

// Longest indirection chain (in hops) followed before giving up as cyclic
export const MAX_CHAIN_DEPTH = Math.max(
  1,
  parseInt(process.env.TOKENFILL_MAX_DEPTH || '32', 10) || 32,
);
