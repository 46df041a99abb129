import type { SparqlBindingValue } from './sparql/http.js';

export type Token = string | number | null | undefined;
export type Triple = readonly [Token, Token, Token];
export type SparqlType = 'SELECT' | 'CONSTRUCT' | 'INSERT' | 'DELETE' | 'CLEAR' | 'OTHER';

const XSD_STRING = 'http://www.w3.org/2001/XMLSchema#string';
const NUMERIC = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const SPARQL_TYPES: readonly SparqlType[] = ['SELECT', 'CONSTRUCT', 'INSERT', 'DELETE', 'CLEAR'];

/**
 * Renders a token for query text. The order of the checks matters: `a`, variables
 * and `_:` blank nodes pass through, anything starting with `http` is an absolute URI (even when a
 * registered namespace would match), known compact URIs pass through, and whatever
 * is left becomes a quoted string literal. Empty input yields `null`.
 */
export function prepare(token: Token, knownShortNames: readonly string[] = []): string | null {
  if (token === null || token === undefined || token === '') return null;
  if (typeof token === 'number') return String(token);
  if (token === 'a') return token;
  if (NUMERIC.test(token)) return token;
  if (token.startsWith('?')) return token;
  if (isBlankToken(token)) return token;
  if (token.startsWith('http')) return `<${token}>`;

  const colon = token.indexOf(':');
  if (colon > 0 && knownShortNames.includes(token.slice(0, colon))) return token;

  return `'${escapeLiteral(token)}'`;
}

export function prepareTriple(triple: Triple, knownShortNames: readonly string[] = []): string {
  const [s, p, o] = triple.map((t) => prepare(t, knownShortNames));
  return `${s} ${p} ${o} .`;
}

/**
 * An IRI term for query text: compact when its prefix is known, bracketed otherwise.
 * Unlike `prepare` it never falls back to a literal.
 */
export function iriTerm(uri: string, knownShortNames: readonly string[] = []): string {
  if (uri === 'a' || uri.startsWith('?') || uri.startsWith('<')) return uri;
  const colon = uri.indexOf(':');
  if (!uri.startsWith('http') && colon > 0 && knownShortNames.includes(uri.slice(0, colon))) return uri;
  return `<${uri}>`;
}

/**
 * Classifies query text by its first keyword, skipping leading comments and PREFIX lines.
 */
export function getSparqlType(query: string): SparqlType {
  let q = query.trimStart();
  q = q.replace(/^(?:\s*#.*(?:\n|$))*/, '');
  q = q.replace(/^(?:\s*PREFIX\s+[\w-]*:\s*<[^>]*>\s*)*/i, '');
  const first = /^\s*(\w+)/.exec(q);
  if (!first) return 'OTHER';
  const keyword = first[1].toUpperCase();
  return SPARQL_TYPES.find((t) => t === keyword) ?? 'OTHER';
}

export function escapeLiteral(value: string): string {
  return value
    .replace(/\\/g, '\\\\')
    .replace(/'/g, "\\'")
    .replace(/"/g, '\\"')
    .replace(/\n/g, '\\n')
    .replace(/\r/g, '\\r');
}

/** N-Quads rendering of a single term as the store returned it. */
export function termToNQuads(v: SparqlBindingValue): string {
  if (v.type === 'uri') return `<${v.value}>`;
  if (v.type === 'bnode') return `_:${v.value}`;
  const text = `"${escapeLiteral(v.value)}"`;
  if (v['xml:lang']) return `${text}@${v['xml:lang']}`;
  if (v.datatype && v.datatype !== XSD_STRING) return `${text}^^<${v.datatype}>`;
  return text;
}

export function isBlankToken(token: string): boolean {
  return token.startsWith('_:');
}
