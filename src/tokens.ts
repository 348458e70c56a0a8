/**
 * Placeholder grammar: `${`, optional whitespace, a name drawn from
 * `[A-Za-z0-9_.-]`, optional whitespace, `}`. The grammar is flat; nested
 * placeholders are not recognised.
 */

export const TOKEN_SOURCE = String.raw`\$\{\s*([A-Za-z0-9_.-]+)\s*\}`;

/** Fresh global matcher; a shared `g` regex would carry `lastIndex` between callers. */
export function tokenPattern(): RegExp {
  return new RegExp(TOKEN_SOURCE, 'g');
}

/**
 * Distinct token names referenced in `text`, whitespace-stripped, in order
 * of first appearance. Case is preserved as written.
 */
export function extractTokens(text: string): string[] {
  const names = new Set<string>();
  for (const match of text.matchAll(tokenPattern())) {
    names.add(match[1]);
  }
  return [...names];
}

const NAME_PATTERN = /^[A-Za-z0-9_.-]+$/;

/** Whether `name` could appear inside a placeholder. */
export function isTokenName(name: string): boolean {
  return NAME_PATTERN.test(name);
}

/** Name used for store lookups. */
export function lookupKey(token: string): string {
  return token.toUpperCase();
}
