import { Prefix, type PrefixRegistry } from '../prefix.js';
import { contextParam, stripSparqlSuffix, type Technology, type TripleStoreBackend } from './backend.js';
import { getContent, postContent, postSparql, type Connection, type RunResult } from './http.js';

/**
 * AllegroGraph only honours the default dataset when told so through this pseudo
 * prefix, so it goes in front of every request.
 */
export const FRANZ_DATASET_OPTION = new Prefix('franzOption_defaultDatasetBehavior', 'franz:rdf');

export class AllegrographBackend implements TripleStoreBackend {
  readonly technology: Technology = 'Allegrograph';
  // the store keeps duplicate triples unless a server option is set, which we can't check
  readonly uniqueInsert: boolean = true;

  constructor(readonly connection: Connection) {}

  executeQuery(text: string, prefixes: PrefixRegistry): Promise<RunResult> {
    return postSparql(this.connection, text, withDatasetOption(prefixes));
  }

  executeUpdate(text: string, prefixes: PrefixRegistry): Promise<RunResult> {
    return postSparql(this.connection, text, withDatasetOption(prefixes));
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

function withDatasetOption(prefixes: PrefixRegistry): PrefixRegistry {
  if (prefixes.has(FRANZ_DATASET_OPTION.short)) return prefixes;
  const copy = prefixes.clone();
  copy.add(FRANZ_DATASET_OPTION);
  return copy;
}
