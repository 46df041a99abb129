import * as z from 'zod';
import { TransportError } from '../errors.js';
import { componentLogger } from '../logger.js';
import type { PrefixRegistry } from '../prefix.js';

const log = componentLogger('sparql');

const XSD_INTEGER = 'http://www.w3.org/2001/XMLSchema#integer';

export const SparqlBindingValue = z.object({
  type: z.string(),
  value: z.string(),
  datatype: z.string().optional(),
  'xml:lang': z.string().optional()
});
export type SparqlBindingValue = z.infer<typeof SparqlBindingValue>;

export const SparqlJsonResults = z.object({
  head: z.object({ vars: z.array(z.string()) }).optional(),
  results: z.object({ bindings: z.array(z.record(z.string(), SparqlBindingValue)) })
});
export type SparqlJsonResults = z.infer<typeof SparqlJsonResults>;

export type SparqlRow = Record<string, string | number>;

/** Rows for parsed answers, raw text when the body is not JSON, nothing when parsing was not asked for. */
export type RunResult = SparqlRow[] | string | undefined;

export type Connection = {
  url: string;
  username?: string;
  password?: string;
  name?: string;
};

export type PostOptions = {
  param?: 'query' | 'update';
  pathSuffix?: string;
  parseResponse?: boolean;
};

export function authHeaders(connection: Connection): Record<string, string> {
  if (!connection.username) return {};
  const token = Buffer.from(`${connection.username}:${connection.password ?? ''}`).toString('base64');
  return { authorization: `Basic ${token}` };
}

export function buildQueryText(text: string, prefixes: PrefixRegistry): string {
  const lines = text
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
  return [...Array.from(prefixes, (p) => p.toSparql()), ...lines].join('\n');
}

function formRequest(connection: Connection, param: string, text: string): RequestInit {
  return {
    method: 'POST',
    headers: {
      'content-type': 'application/x-www-form-urlencoded',
      accept: 'application/sparql-results+json',
      ...authHeaders(connection)
    },
    body: new URLSearchParams({ [param]: text }).toString()
  };
}

async function send(url: string, init: RequestInit, what: string): Promise<Response> {
  let res: Response;
  try {
    res = await fetch(url, init);
  } catch (e) {
    throw new TransportError(`${what} failed: ${e instanceof Error ? e.message : String(e)}`, url, undefined, undefined, undefined, { cause: e });
  }

  if (!res.ok) {
    const text = await res.text().catch(() => '');
    throw new TransportError(`${what} failed (${res.status} ${res.statusText}): ${text}`, url, res.status, res.statusText, text);
  }
  return res;
}

/**
 * The one request every backend shares: form-encoded `param=<prefixes + text>`.
 */
export async function postSparql(
  connection: Connection,
  text: string,
  prefixes: PrefixRegistry,
  options: PostOptions = {}
): Promise<RunResult> {
  const { param = 'query', pathSuffix = '', parseResponse = true } = options;
  const url = connection.url + pathSuffix;
  const full = buildQueryText(text, prefixes);
  log.debug({ url, param, query: full }, 'sparql request');

  const res = await send(url, formRequest(connection, param, full), `SPARQL ${param}`);

  const body = await res.text();
  if (!parseResponse) return undefined;

  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch {
    return body;
  }
  return parseBindings(json, prefixes);
}

/** Raw-body POST used by the bulk upload primitives. */
export async function postContent(connection: Connection, url: string, content: string, contentType: string): Promise<void> {
  log.debug({ url, contentType, bytes: content.length }, 'upload request');
  await send(
    url,
    {
      method: 'POST',
      headers: { 'content-type': contentType, ...authHeaders(connection) },
      body: content
    },
    'Upload'
  );
}

export async function getContent(connection: Connection, url: string, accept: string): Promise<string> {
  log.debug({ url, accept }, 'dump request');
  const res = await send(url, { method: 'GET', headers: { accept, ...authHeaders(connection) } }, 'Dump');
  return res.text();
}

export async function fetchBindings(
  connection: Connection,
  text: string,
  prefixes: PrefixRegistry
): Promise<SparqlJsonResults['results']['bindings']> {
  const full = buildQueryText(text, prefixes);
  log.debug({ url: connection.url, param: 'query', query: full }, 'sparql request');
  const res = await send(connection.url, formRequest(connection, 'query', full), 'SPARQL query');
  const body = await res.text();

  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (e) {
    throw new TransportError('SPARQL query answered with a body that is not JSON', connection.url, res.status, res.statusText, body, {
      cause: e
    });
  }
  const parsed = SparqlJsonResults.safeParse(json);
  return parsed.success ? parsed.data.results.bindings : [];
}

/**
 * SPARQL JSON results to rows: URIs shortened through the registry, `xsd:integer`
 * literals turned into numbers, every other value kept as its lexical form.
 */
export function parseBindings(json: unknown, prefixes: PrefixRegistry): SparqlRow[] {
  const parsed = SparqlJsonResults.safeParse(json);
  if (!parsed.success) return [];

  return parsed.data.results.bindings.map((binding) => {
    const row: SparqlRow = {};
    for (const [key, cell] of Object.entries(binding)) {
      if (cell.type === 'uri') row[key] = prefixes.shorten(cell.value);
      else if (cell.type === 'literal' && cell.datatype === XSD_INTEGER) row[key] = Number.parseInt(cell.value, 10);
      else row[key] = cell.value;
    }
    return row;
  });
}
