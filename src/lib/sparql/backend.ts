import type { PrefixRegistry } from '../prefix.js';
import type { Connection, RunResult } from './http.js';

export type Technology = 'Generic' | 'Allegrograph' | 'Fuseki' | 'GraphDB' | 'RDF4J';

/**
 * The protocol differences between triple stores. Everything generic (chunking,
 * pagination, triple rendering) lives in `client.ts` and only talks to this.
 */
export interface TripleStoreBackend {
  readonly technology: Technology;
  readonly connection: Connection;
  /** Delete the triples before inserting them, for stores that keep duplicates. */
  readonly uniqueInsert: boolean;

  executeQuery(text: string, prefixes: PrefixRegistry): Promise<RunResult>;
  executeUpdate(text: string, prefixes: PrefixRegistry): Promise<RunResult>;
  uploadNquadsChunk(content: string): Promise<void>;
  uploadTurtleChunk(content: string, graphUri?: string): Promise<void>;
  /** The whole dataset as N-Quads. */
  dumpAll(): Promise<string>;
}

export function stripSparqlSuffix(url: string): string {
  return url.endsWith('/sparql') ? url.slice(0, -'/sparql'.length) : url;
}

export function contextParam(graphUri: string): string {
  return `context=${encodeURIComponent(`<${graphUri}>`)}`;
}
