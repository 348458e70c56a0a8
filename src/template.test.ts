import { describe, it, expect } from 'vitest';

import { MissingVariableError } from './errors.js';
import { UNRESOLVED } from './resolver.js';
import type { Resolution } from './resolver.js';
import { renderTemplate, substituteTokens } from './template.js';
import { VariableStore } from './variable-store.js';

function value(v: string): Resolution {
  return { kind: 'value', value: v };
}

function storeOf(vars: Record<string, string>): VariableStore {
  const store = new VariableStore();
  for (const [name, v] of Object.entries(vars)) store.set(name, v);
  return store;
}

const strict = { expandVars: false, failOnMissing: true };
const silent = { expandVars: false, failOnMissing: false };

// --- substituteTokens ---

describe('substituteTokens', () => {
  // --- Simple substitution ---

  it('replaces a single ${TOKEN} with its value', () => {
    const resolutions = new Map([['NAME', value('Alice')]]);
    expect(substituteTokens('Hello, ${NAME}!', resolutions)).toBe(
      'Hello, Alice!',
    );
  });

  it('replaces a token with an empty string value', () => {
    const resolutions = new Map([['MID', value('')]]);
    expect(substituteTokens('prefix-${MID}-suffix', resolutions)).toBe(
      'prefix--suffix',
    );
  });

  it('replaces every occurrence regardless of interior whitespace', () => {
    const resolutions = new Map([['FOO', value('x')]]);
    expect(
      substituteTokens('a ${ FOO } b ${FOO} c ${\tFOO\n}', resolutions),
    ).toBe('a x b x c x');
  });

  // --- Unresolved tokens ---

  it('keeps the placeholder verbatim for the UNRESOLVED sentinel', () => {
    const resolutions = new Map([
      ['A', value('1')],
      ['B', UNRESOLVED],
    ]);
    expect(substituteTokens('${A}-${ B }', resolutions)).toBe('1-${ B }');
  });

  it('keeps placeholders that have no resolution at all', () => {
    expect(substituteTokens('Hello ${UNKNOWN}', new Map())).toBe(
      'Hello ${UNKNOWN}',
    );
  });

  // --- Literal replacement text ---

  it('inserts values containing slashes, ampersands, backslashes and $ literally', () => {
    const tricky = 'a/b&c\\d$&e$1';
    const resolutions = new Map([['PATH', value(tricky)]]);
    expect(substituteTokens('[${PATH}]', resolutions)).toBe(`[${tricky}]`);
  });

  it('does not double-substitute a value that looks like a token', () => {
    const resolutions = new Map([
      ['OUTER', value('${INNER}')],
      ['INNER', value('should-not-appear')],
    ]);
    expect(substituteTokens('${OUTER}', resolutions)).toBe('${INNER}');
  });

  // --- Text outside the grammar ---

  it('leaves text that does not match the placeholder grammar alone', () => {
    const resolutions = new Map([['A', value('x')]]);
    const text = '${} ${ A B } ${a:b} $A {A} $(A)';
    expect(substituteTokens(text, resolutions)).toBe(text);
  });

  it('returns the text unchanged when there are no tokens', () => {
    const plain = 'No tokens here, just plain text.\nSecond line.';
    expect(substituteTokens(plain, new Map([['IGNORED', value('v')]]))).toBe(
      plain,
    );
  });

  it('returns empty string for empty text', () => {
    expect(substituteTokens('', new Map())).toBe('');
  });

  it('substitutes tokens across multiple lines', () => {
    const resolutions = new Map([
      ['A', value('alpha')],
      ['B', value('beta')],
    ]);
    const text = 'Line 1: ${A}\nLine 2: ${B}\nLine 3: ${A}';
    expect(substituteTokens(text, resolutions)).toBe(
      'Line 1: alpha\nLine 2: beta\nLine 3: alpha',
    );
  });
});

// --- renderTemplate ---

describe('renderTemplate', () => {
  it('looks tokens up by their uppercased name', () => {
    const result = renderTemplate('${db.host}:${ DB.HOST }', storeOf({ 'DB.HOST': 'localhost' }), strict);
    expect(result).toEqual({ text: 'localhost:localhost', unresolved: [] });
  });

  it('throws MissingVariableError for an unset token in strict mode', () => {
    expect(() => renderTemplate('x ${NOPE} y', storeOf({}), strict)).toThrow(
      MissingVariableError,
    );
  });

  it('preserves unset tokens and reports them in silent mode', () => {
    const result = renderTemplate(
      '${SET} ${ missing } ${missing}',
      storeOf({ SET: 'ok' }),
      silent,
    );
    expect(result).toEqual({
      text: 'ok ${ missing } ${missing}',
      unresolved: ['missing'],
    });
  });

  it('follows indirection when expandVars is enabled', () => {
    const store = storeOf({ A: '$B', B: '$C', C: 'final' });
    expect(
      renderTemplate('${A}', store, { expandVars: true, failOnMissing: true })
        .text,
    ).toBe('final');
    expect(renderTemplate('${A}', store, strict).text).toBe('$B');
  });

  it('is idempotent once every token is resolved', () => {
    const store = storeOf({ HOST: 'example.test', PORT: '8080' });
    const once = renderTemplate('url=${HOST}:${ PORT }/', store, strict).text;
    expect(once).toBe('url=example.test:8080/');
    expect(renderTemplate(once, store, strict).text).toBe(once);
  });
});
