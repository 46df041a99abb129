import type { PrefixRegistry } from '../prefix.js';
import { contextParam, stripSparqlSuffix, type Technology, type TripleStoreBackend } from './backend.js';
import { getContent, postContent, postSparql, type Connection, type RunResult } from './http.js';

/**
 * GraphDB takes queries on the repository URL and updates on `/statements`.
 */
export class GraphDbBackend implements TripleStoreBackend {
  readonly technology: Technology = 'GraphDB';
  readonly uniqueInsert: boolean = false;

  constructor(readonly connection: Connection) {}

  executeQuery(text: string, prefixes: PrefixRegistry): Promise<RunResult> {
    return postSparql(this.connection, text, prefixes, { param: 'query' });
  }

  executeUpdate(text: string, prefixes: PrefixRegistry): Promise<RunResult> {
    return postSparql(this.connection, text, prefixes, {
      param: 'update',
      pathSuffix: '/statements',
      parseResponse: false
    });
  }

  uploadNquadsChunk(content: string): Promise<void> {
    return postContent(this.connection, this.statementsUrl(), content, 'application/n-quads');
  }

  uploadTurtleChunk(content: string, graphUri?: string): Promise<void> {
    const url = graphUri ? `${this.statementsUrl()}?${contextParam(graphUri)}` : this.statementsUrl();
    return postContent(this.connection, url, content, 'text/turtle');
  }

  dumpAll(): Promise<string> {
    return getContent(this.connection, this.statementsUrl(), 'application/n-quads');
  }

  private statementsUrl(): string {
    return `${stripSparqlSuffix(this.connection.url)}/statements`;
  }
}

/** Same protocol as GraphDB, which is built on it. */
export class Rdf4jBackend extends GraphDbBackend {
  override readonly technology: Technology = 'RDF4J';
}
