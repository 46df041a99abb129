import { componentLogger } from '../logger.js';
import { PrefixRegistry } from '../prefix.js';
import { namedGraphsQuery, PAGE_SIZE, storeDumpQuery } from '../queries.js';
import { termToNQuads } from '../util.js';
import type { Technology, TripleStoreBackend } from './backend.js';
import { fetchBindings, postContent, postSparql, type Connection, type RunResult } from './http.js';

const log = componentLogger('sparql');

/**
 * Fuseki serves query and update on the dataset URL, told apart by the form field
 * name, and has no N-Quads export of the whole dataset on that URL.
 */
export class FusekiBackend implements TripleStoreBackend {
  readonly technology: Technology = 'Fuseki';
  readonly uniqueInsert: boolean = false;

  constructor(readonly connection: Connection) {}

  executeQuery(text: string, prefixes: PrefixRegistry): Promise<RunResult> {
    return postSparql(this.connection, text, prefixes, { param: 'query' });
  }

  executeUpdate(text: string, prefixes: PrefixRegistry): Promise<RunResult> {
    return postSparql(this.connection, text, prefixes, { param: 'update', parseResponse: false });
  }

  uploadNquadsChunk(content: string): Promise<void> {
    return postContent(this.connection, this.connection.url, content, 'application/n-quads');
  }

  uploadTurtleChunk(content: string, graphUri?: string): Promise<void> {
    const url = graphUri
      ? `${this.connection.url}/data?graph=${encodeURIComponent(graphUri)}`
      : `${this.connection.url}/data`;
    return postContent(this.connection, url, content, 'text/turtle');
  }

  /**
   * Walks the default graph then every named graph, a page at a time, until a page
   * comes back empty.
   */
  async dumpAll(): Promise<string> {
    const none = new PrefixRegistry();
    const named = await fetchBindings(this.connection, namedGraphsQuery(), none);
    const graphs: (string | null)[] = [null, ...named.flatMap((b) => (b['g'] ? [`<${b['g'].value}>`] : []))];

    const lines: string[] = [];
    for (const graph of graphs) {
      let offset = 0;
      for (;;) {
        const page = await fetchBindings(this.connection, storeDumpQuery(graph, offset), none);
        if (page.length === 0) break;
        for (const b of page) {
          const { s, p, o } = b;
          if (!s || !p || !o) continue;
          const terms = [termToNQuads(s), termToNQuads(p), termToNQuads(o)];
          if (graph) terms.push(graph);
          lines.push(`${terms.join(' ')} .`);
        }
        offset += PAGE_SIZE;
      }
      log.info({ graph: graph ?? '(default)', offset }, 'graph dumped');
    }
    return lines.join('\n');
  }
}
