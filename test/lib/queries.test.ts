import { describe, expect, it } from 'vitest';

import { deleteDataQuery, graphDumpQuery, storeDumpQuery } from '../../src/lib/queries.js';

function clauses(query: string): string[] {
  return query
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => /^(ORDER BY|LIMIT|OFFSET)\b/.test(line));
}

describe('dump queries', () => {
  it('order the rows before paging a graph', () => {
    const scope = { sparqlBegin: 'GRAPH ex:g {', sparqlEnd: '}' };
    expect(clauses(graphDumpQuery(scope, 5000))).toEqual(['ORDER BY ?s ?p ?o', 'LIMIT 5000', 'OFFSET 5000']);
  });

  it('order the rows before paging the store', () => {
    expect(clauses(storeDumpQuery('<http://ex.org/g1>', 0, 100))).toEqual(['ORDER BY ?s ?p ?o', 'LIMIT 100', 'OFFSET 0']);
    expect(storeDumpQuery(null, 0)).toContain('SELECT ?s ?p ?o WHERE { ?s ?p ?o . }');
  });
});

describe('deleteDataQuery()', () => {
  it('wraps the triples in DELETE DATA within the graph', () => {
    const query = deleteDataQuery({ sparqlBegin: 'GRAPH ex:g {', sparqlEnd: '}' }, ['ex:a ex:b ex:c .']);
    const lines = query
      .split('\n')
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
    expect(lines).toEqual(['# sparql.deleteData', 'DELETE DATA {', 'GRAPH ex:g {', 'ex:a ex:b ex:c .', '}', '}']);
  });
});
