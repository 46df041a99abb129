import { UnsupportedOperationError } from '../errors.js';
import type { PrefixRegistry } from '../prefix.js';
import type { Technology, TripleStoreBackend } from './backend.js';
import { getContent, postSparql, type Connection, type RunResult } from './http.js';

/**
 * Plain SPARQL protocol: every request is `query=` on the endpoint itself. There is
 * no portable bulk upload, so the upload primitives refuse instead of guessing.
 */
export class GenericBackend implements TripleStoreBackend {
  readonly technology: Technology = 'Generic';
  readonly uniqueInsert: boolean = false;

  constructor(readonly connection: Connection) {}

  executeQuery(text: string, prefixes: PrefixRegistry): Promise<RunResult> {
    return postSparql(this.connection, text, prefixes);
  }

  executeUpdate(text: string, prefixes: PrefixRegistry): Promise<RunResult> {
    return postSparql(this.connection, text, prefixes);
  }

  async uploadNquadsChunk(_content: string): Promise<void> {
    throw new UnsupportedOperationError(this.technology, 'upload_nquads');
  }

  async uploadTurtleChunk(_content: string, _graphUri?: string): Promise<void> {
    throw new UnsupportedOperationError(this.technology, 'upload_turtle');
  }

  dumpAll(): Promise<string> {
    return getContent(this.connection, `${this.connection.url}/statements`, 'application/n-quads');
  }
}
