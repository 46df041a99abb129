import { componentLogger } from './logger.js';
import { XSD, type PrefixRegistry } from './prefix.js';
import { graphDumpQuery, PAGE_SIZE, type GraphScope } from './queries.js';
import type { TripleStoreBackend } from './sparql/backend.js';
import * as client from './sparql/client.js';
import type { SparqlRow } from './sparql/http.js';
import type { Statement } from './statement.js';
import { escapeLiteral, isBlankToken, prepare, type Triple } from './util.js';

const log = componentLogger('graph');

/**
 * A view of one graph of the store: the default graph when `uri` is null. It holds
 * no triples itself, every call goes through the backend.
 */
export class NamedGraph implements GraphScope {
  readonly longUri: string | null;
  readonly sparqlBegin: string;
  readonly sparqlEnd: string;

  constructor(
    readonly backend: TripleStoreBackend,
    readonly uri: string | null,
    readonly prefixes: PrefixRegistry
  ) {
    this.longUri = uri ? prefixes.lengthen(uri) : null;
    const scope = client.graphScope(uri, prefixes);
    this.sparqlBegin = scope.sparqlBegin;
    this.sparqlEnd = scope.sparqlEnd;
  }

  /** Rows of a SELECT; an unparsable or update answer gives no rows. */
  async run(text: string, prefixes: PrefixRegistry = this.prefixes): Promise<SparqlRow[]> {
    const result = await client.run(this.backend, text, prefixes);
    return Array.isArray(result) ? result : [];
  }

  async insert(triples: Triple | readonly Triple[], prefixes: PrefixRegistry = this.prefixes): Promise<void> {
    if (triples.length === 0) return;
    await client.insert(this.backend, triples, this.uri, prefixes);
  }

  async delete(triples: Triple | readonly Triple[], prefixes: PrefixRegistry = this.prefixes): Promise<void> {
    if (triples.length === 0) return;
    await client.remove(this.backend, triples, this.uri, prefixes);
  }

  insertStatements(statements: readonly Statement[], prefixes: PrefixRegistry = this.prefixes): Promise<void> {
    const shorts = prefixes.shorts();
    return client.insertLines(this.backend, statements.map((s) => s.toSparql(shorts)), this.uri, prefixes);
  }

  deleteStatements(statements: readonly Statement[], prefixes: PrefixRegistry = this.prefixes): Promise<void> {
    const shorts = prefixes.shorts();
    return client.removeLines(this.backend, statements.map((s) => s.toSparql(shorts)), this.uri, prefixes);
  }

  /**
   * Every triple of the graph, fetched 5000 at a time until a page comes back empty.
   * Rows carry `s_is_blank`/`o_is_blank` so blank nodes can be written back as such.
   */
  async dumpRows(prefixes: PrefixRegistry = this.prefixes): Promise<SparqlRow[]> {
    const rows: SparqlRow[] = [];
    let offset = 0;
    for (;;) {
      const page = await this.run(graphDumpQuery(this, offset), prefixes);
      if (page.length === 0) break;
      rows.push(...page);
      offset += PAGE_SIZE;
    }
    log.debug({ graph: this.uri ?? '(default)', triples: rows.length }, 'graph dumped');
    return rows;
  }

  async dumpTurtle(prefixes: PrefixRegistry = this.prefixes): Promise<string> {
    const rows = await this.dumpRows(prefixes);
    const shorts = prefixes.shorts();
    const term = (value: string | number | undefined, blank: string | number | undefined) =>
      renderTerm(value, blank, (v) => prepare(v, shorts));

    let content = prefixes.toTurtle() + '\n\n';
    for (const row of rows) {
      content += `${term(row['s'], row['s_is_blank'])} ${term(row['p'], undefined)} ${term(row['o'], row['o_is_blank'])} .\n`;
    }
    return content;
  }

  async dumpNquads(prefixes: PrefixRegistry = this.prefixes): Promise<string> {
    const rows = await this.dumpRows(prefixes);
    const term = (value: string | number | undefined, blank: string | number | undefined) =>
      renderTerm(value, blank, (v) => nquadsTerm(v, prefixes));
    const graph = this.longUri ? `<${this.longUri}> ` : '';

    let content = '';
    for (const row of rows) {
      content += `${term(row['s'], row['s_is_blank'])} ${term(row['p'], undefined)} ${term(row['o'], row['o_is_blank'])} ${graph}.\n`;
    }
    return content;
  }

  uploadTurtle(content: string): Promise<void> {
    return client.uploadTurtle(this.backend, content, this.longUri);
  }
}

function nquadsTerm(value: string | number, prefixes: PrefixRegistry): string {
  if (typeof value === 'number') return `"${value}"^^<${XSD.long}integer>`;
  const long = prefixes.lengthen(value);
  return long.startsWith('http') ? `<${long}>` : `"${escapeLiteral(long)}"`;
}

function renderTerm(
  value: string | number | undefined,
  blank: string | number | undefined,
  render: (v: string | number) => string | null
): string {
  if (value === undefined) return '';
  if (typeof value === 'string' && isBlankToken(value)) return value;
  if (blank === 'true') return `_:${value}`;
  return render(value) ?? '';
}
