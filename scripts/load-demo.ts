import { backendFromEnv, getEnv } from '../src/config.js';
import { NamedGraph } from '../src/lib/graph.js';
import { defaultPrefixes, Prefix, SH } from '../src/lib/prefix.js';
import * as client from '../src/lib/sparql/client.js';
import type { Triple } from '../src/lib/util.js';

const env = getEnv();
const prefixes = defaultPrefixes();
prefixes.add(SH);
prefixes.add(new Prefix('ex', 'https://example.org/people#'));

const graph = new NamedGraph(backendFromEnv(env), env.SPARQL_GRAPH ?? null, prefixes);

const data: Triple[] = [
  ['ex:Person', 'rdfs:label', 'Person'],
  ['ex:Animal', 'rdfs:label', 'Animal'],
  ['ex:name', 'rdfs:label', 'name'],
  ['ex:Alice', 'a', 'ex:Person'],
  ['ex:Alice', 'ex:name', 'Alice'],
  ['ex:Alice', 'ex:age', 30],
  ['ex:Alice', 'ex:hasParent', 'ex:Carol'],
  ['ex:Alice', 'ex:hasPet', 'ex:Fido'],
  ['ex:Bob', 'a', 'ex:Person'],
  ['ex:Bob', 'ex:name', 'Bob'],
  ['ex:Bob', 'ex:age', 32],
  ['ex:Carol', 'a', 'ex:Person'],
  ['ex:Carol', 'ex:name', 'Carol'],
  ['ex:Carol', 'ex:age', 55],
  ['ex:Fido', 'a', 'ex:Animal'],
  ['ex:Fido', 'ex:name', 'Fido']
];

const shapes: Triple[] = [
  ['ex:PersonShape', 'a', 'sh:NodeShape'],
  ['ex:PersonShape', 'sh:targetClass', 'ex:Person'],
  ['ex:PersonShape', 'sh:name', 'Person'],
  ['ex:PersonShape', 'sh:property', 'ex:PersonNameShape'],
  ['ex:PersonNameShape', 'sh:path', 'ex:name'],
  ['ex:PersonNameShape', 'sh:name', 'name'],
  ['ex:PersonNameShape', 'sh:datatype', 'xsd:string'],
  ['ex:PersonNameShape', 'sh:minCount', 1],
  ['ex:PersonNameShape', 'sh:maxCount', 1],
  ['ex:PersonNameShape', 'sh:order', 0]
];

await client.run(graph.backend, 'CLEAR ALL');
await graph.insert([...data, ...shapes]);

console.log(`OK: loaded ${data.length + shapes.length} demo triples into ${env.SPARQL_ENDPOINT}`);
console.log('Tip: run `npm run tui` to browse the inferred schema, `npm run tui -- --shacl` for the shapes');
