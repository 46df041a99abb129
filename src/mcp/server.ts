import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import * as z from 'zod';
import { backendFromEnv, getEnv } from '../config.js';
import { NamedGraph } from '../lib/graph.js';
import { componentLogger } from '../lib/logger.js';
import { SchemaModel } from '../lib/model.js';
import { defaultPrefixes, SH } from '../lib/prefix.js';
import { ShapeModel } from '../lib/shacl.js';
import * as client from '../lib/sparql/client.js';

const LIST_CAP = 500;

const log = componentLogger('mcp');
const env = getEnv();
const prefixes = defaultPrefixes();
prefixes.add(SH);
const graph = new NamedGraph(backendFromEnv(env), env.SPARQL_GRAPH ?? null, prefixes);
const inferred = SchemaModel.bound(graph);
const shapes = ShapeModel.bound(graph);

function ok(data: unknown) {
  return { content: [{ type: 'text' as const, text: JSON.stringify(data, null, 2) }] };
}

async function modelFor(shacl: boolean | undefined, refresh: boolean | undefined): Promise<SchemaModel> {
  const model = shacl ? shapes : inferred;
  if (refresh || model.classes.length === 0) await model.update();
  return model;
}

const triple = z.tuple([z.string(), z.string(), z.union([z.string(), z.number()])]);
const modelArgs = {
  shacl: z.boolean().optional().describe('Read SHACL shapes instead of inferring from data'),
  refresh: z.boolean().optional().describe('Re-read the store before answering')
};

const server = new McpServer({ name: 'sparql-schema-mcp', version: '0.1.0' });

server.registerTool(
  'ping',
  {
    description: 'Health check against the SPARQL endpoint',
    inputSchema: {}
  },
  async () => {
    const rows = await graph.run('SELECT (COUNT(*) AS ?c) WHERE { ?s ?p ?o }');
    const count = rows[0]?.['c'] ?? 0;
    return ok({ ok: true, endpoint: env.SPARQL_ENDPOINT, technology: env.SPARQL_TECHNOLOGY, triples: Number(count) || 0 });
  }
);

server.registerTool(
  'listClasses',
  {
    description: 'List the classes of the graph, datatypes included',
    inputSchema: { ...modelArgs, limit: z.number().int().positive().max(LIST_CAP).optional() }
  },
  async ({ shacl, refresh, limit }) => {
    const model = await modelFor(shacl, refresh);
    const classes = model.classes.slice(0, limit ?? LIST_CAP).map((c) => c.toDict());
    return ok({ framework: model.frameworkName, classes });
  }
);

server.registerTool(
  'listProperties',
  {
    description: 'List properties with domain, range and cardinality',
    inputSchema: {
      ...modelArgs,
      domain: z.string().optional(),
      limit: z.number().int().positive().max(LIST_CAP).optional()
    }
  },
  async ({ shacl, refresh, domain, limit }) => {
    const model = await modelFor(shacl, refresh);
    const props = domain ? model.properties.filter((p) => p.domain?.uri === domain) : model.properties;
    return ok({ framework: model.frameworkName, properties: props.slice(0, limit ?? LIST_CAP).map((p) => p.toDict()) });
  }
);

server.registerTool(
  'findProperties',
  {
    description: 'Find the uses of a predicate, optionally between a given domain and range',
    inputSchema: { ...modelArgs, uri: z.string(), domain: z.string().optional(), range: z.string().optional() }
  },
  async ({ shacl, refresh, uri, domain, range }) => {
    const model = await modelFor(shacl, refresh);
    return ok({ properties: model.findProperties(uri, domain, range).map((p) => p.toDict()) });
  }
);

server.registerTool(
  'isPropMandatory',
  {
    description: 'Tell whether a property is mandatory, optionally for one class',
    inputSchema: { ...modelArgs, uri: z.string(), cardOf: z.string().optional() }
  },
  async ({ shacl, refresh, uri, cardOf }) => {
    const model = await modelFor(shacl, refresh);
    const prop = model.isPropMandatory(uri, cardOf);
    return ok(prop ? { found: true, mandatory: prop.isMandatory(), property: prop.toDict() } : { found: false });
  }
);

server.registerTool(
  'query',
  {
    description: 'Run a SPARQL query or update with the configured prefixes',
    inputSchema: { sparql: z.string() }
  },
  async ({ sparql }) => {
    const result = await client.run(graph.backend, sparql, graph.prefixes);
    return ok({ result: result ?? null });
  }
);

server.registerTool(
  'insertTriples',
  {
    description: 'Insert triples into the configured graph',
    inputSchema: { triples: z.array(triple).min(1) }
  },
  async ({ triples }) => {
    await graph.insert(triples);
    return ok({ inserted: triples.length });
  }
);

server.registerTool(
  'deleteTriples',
  {
    description: 'Delete triples (or patterns with ?variables) from the configured graph',
    inputSchema: { triples: z.array(triple).min(1) }
  },
  async ({ triples }) => {
    await graph.delete(triples);
    return ok({ deleted: triples.length });
  }
);

async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  log.info({ endpoint: env.SPARQL_ENDPOINT }, 'mcp server ready');
}

main().catch((error: unknown) => {
  log.fatal({ err: error }, 'server error');
  process.exit(1);
});
