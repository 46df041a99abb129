import { componentLogger } from '../logger.js';
import { PrefixRegistry } from '../prefix.js';
import { deleteDataQuery, deleteWhereQuery, insertDataQuery, type GraphScope } from '../queries.js';
import { getSparqlType, prepare, prepareTriple, type Triple } from '../util.js';
import type { TripleStoreBackend } from './backend.js';
import type { RunResult } from './http.js';

const log = componentLogger('sparql');

export const INSERT_CHUNK_SIZE = 5000;
export const UPLOAD_CHUNK_LINES = 10000;

/**
 * Sends the text to the query or the update side of the backend. Anything that is
 * not recognisably a SELECT or CONSTRUCT is an update.
 */
export function run(backend: TripleStoreBackend, text: string, prefixes: PrefixRegistry = new PrefixRegistry()): Promise<RunResult> {
  const type = getSparqlType(text);
  log.debug({ technology: backend.technology, type }, 'dispatching');
  if (type === 'SELECT' || type === 'CONSTRUCT') return backend.executeQuery(text, prefixes);
  return backend.executeUpdate(text, prefixes);
}

export function graphScope(graphUri: string | null | undefined, prefixes: PrefixRegistry): GraphScope {
  const term = prepare(graphUri, prefixes.shorts());
  return term ? { sparqlBegin: `GRAPH ${term} {`, sparqlEnd: '}' } : { sparqlBegin: '', sparqlEnd: '' };
}

function asList(triples: Triple | readonly Triple[]): readonly Triple[] {
  return isTriple(triples) ? [triples] : triples;
}

function isTriple(value: Triple | readonly Triple[]): value is Triple {
  return value.length === 3 && !Array.isArray(value[0]);
}

export function chunk<T>(items: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) chunks.push(items.slice(i, i + size));
  return chunks;
}

/**
 * `INSERT DATA` in chunks of 5000 triples, one request each, in order. Chunks that
 * went through stay in the store if a later one fails.
 */
export async function insert(
  backend: TripleStoreBackend,
  triples: Triple | readonly Triple[],
  graphUri?: string | null,
  prefixes: PrefixRegistry = new PrefixRegistry()
): Promise<void> {
  const shorts = prefixes.shorts();
  await insertLines(backend, asList(triples).map((t) => prepareTriple(t, shorts)), graphUri, prefixes);
}

/**
 * Same as `insert` for triple lines rendered by the caller. Stores that keep
 * duplicates get a `DELETE DATA` of each chunk right before its `INSERT DATA`;
 * triples with blank nodes are left out of it, `DELETE DATA` does not take them.
 */
export async function insertLines(
  backend: TripleStoreBackend,
  lines: readonly string[],
  graphUri?: string | null,
  prefixes: PrefixRegistry = new PrefixRegistry()
): Promise<void> {
  if (lines.length === 0) return;
  const scope = graphScope(graphUri, prefixes);
  const chunks = chunk(lines, INSERT_CHUNK_SIZE);
  for (const [i, part] of chunks.entries()) {
    if (backend.uniqueInsert) {
      const deletable = part.filter((line) => !hasBlankNode(line));
      if (deletable.length > 0) await run(backend, deleteDataQuery(scope, deletable), prefixes);
    }
    log.info({ chunk: i + 1, chunks: chunks.length, triples: part.length }, 'inserting triples');
    await run(backend, insertDataQuery(scope, part), prefixes);
  }
}

/** One `DELETE WHERE` for all the triples; callers chunk large deletions themselves. */
export async function remove(
  backend: TripleStoreBackend,
  triples: Triple | readonly Triple[],
  graphUri?: string | null,
  prefixes: PrefixRegistry = new PrefixRegistry()
): Promise<void> {
  const shorts = prefixes.shorts();
  await removeLines(backend, asList(triples).map((t) => prepareTriple(t, shorts)), graphUri, prefixes);
}

export async function removeLines(
  backend: TripleStoreBackend,
  lines: readonly string[],
  graphUri?: string | null,
  prefixes: PrefixRegistry = new PrefixRegistry()
): Promise<void> {
  if (lines.length === 0) return;
  await run(backend, deleteWhereQuery(graphScope(graphUri, prefixes), lines), prefixes);
}

function hasBlankNode(line: string): boolean {
  return line.startsWith('_:') || /\s_:[\w-]+ \.$/.test(line);
}

function splitLines(content: string): string[] {
  if (content === '') return [];
  return content.replace(/\r?\n$/, '').split(/\r?\n/);
}

export function dump(backend: TripleStoreBackend): Promise<string> {
  return backend.dumpAll();
}

export async function uploadNquads(backend: TripleStoreBackend, content: string): Promise<void> {
  const lines = splitLines(content);
  const chunks = chunk(lines, UPLOAD_CHUNK_LINES);
  for (const [i, part] of chunks.entries()) {
    log.info({ done: i * UPLOAD_CHUNK_LINES, total: lines.length }, 'uploading n-quads');
    await backend.uploadNquadsChunk(part.join('\n'));
  }
}

/**
 * The `@prefix` lines are pulled out and repeated at the top of every chunk so each
 * chunk parses on its own.
 */
export async function uploadTurtle(backend: TripleStoreBackend, content: string, graphUri?: string | null): Promise<void> {
  const prefixLines: string[] = [];
  const body: string[] = [];
  for (const line of splitLines(content)) {
    if (line.trim().startsWith('@prefix')) prefixLines.push(line);
    else body.push(line);
  }

  const header = prefixLines.join('\n') + '\n';
  const chunks = chunk(body, UPLOAD_CHUNK_LINES);
  for (const [i, part] of chunks.entries()) {
    log.info({ done: i * UPLOAD_CHUNK_LINES, total: body.length }, 'uploading turtle');
    await backend.uploadTurtleChunk(header + part.join('\n'), graphUri ?? undefined);
  }
}
