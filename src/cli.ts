#!/usr/bin/env node
import { readFile } from 'node:fs/promises';
import { Command, Option } from 'commander';
import { backendFromEnv, getEnv } from './config.js';
import { NamedGraph } from './lib/graph.js';
import { componentLogger } from './lib/logger.js';
import { SchemaModel } from './lib/model.js';
import { defaultPrefixes, SH } from './lib/prefix.js';
import { ShapeModel } from './lib/shacl.js';
import * as client from './lib/sparql/client.js';

const log = componentLogger('cli');

function openGraph(): NamedGraph {
  const env = getEnv();
  const prefixes = defaultPrefixes();
  prefixes.add(SH);
  return new NamedGraph(backendFromEnv(env), env.SPARQL_GRAPH ?? null, prefixes);
}

async function loadModel(shacl: boolean): Promise<SchemaModel> {
  const graph = openGraph();
  const model = shacl ? ShapeModel.bound(graph) : SchemaModel.bound(graph);
  await model.update();
  return model;
}

const program = new Command();
program.name('sparql-schema').description('Inspect and move data in a SPARQL triple store');

program
  .command('classes')
  .description('List the classes used in the graph')
  .option('--shacl', 'Read classes from SHACL node shapes', false)
  .action(async (opts: { shacl: boolean }) => {
    const model = await loadModel(opts.shacl);
    for (const c of model.classes) console.log(`${c.uri}\t${c.getText()}`);
  });

program
  .command('properties')
  .description('List properties with their domain and range')
  .option('--shacl', 'Read properties from SHACL property shapes', false)
  .option('--class <uri>', 'Only properties whose domain is this class')
  .action(async (opts: { shacl: boolean; class?: string }) => {
    const model = await loadModel(opts.shacl);
    const props = opts.class ? model.properties.filter((p) => p.domain?.uri === opts.class) : model.properties;
    for (const p of props) {
      const card = p.isMandatory() ? ` [${p.minCount}..${p.maxCount ?? '*'}]` : '';
      console.log(`${p.domain?.uri ?? '?'}\t${p.uri}\t${p.range?.uri ?? '?'}${card}`);
    }
  });

program
  .command('query')
  .description('Run a SPARQL query or update and print the result')
  .argument('<sparql>', 'Query text')
  .action(async (sparql: string) => {
    const graph = openGraph();
    const result = await client.run(graph.backend, sparql, graph.prefixes);
    console.log(typeof result === 'string' ? result : JSON.stringify(result ?? 'OK', null, 2));
  });

program
  .command('dump')
  .description('Write the graph (or the whole store) to stdout')
  .addOption(new Option('--format <format>', 'Output format').choices(['nquads', 'turtle']).default('nquads'))
  .option('--store', 'Dump every graph of the store instead of the configured one', false)
  .action(async (opts: { format: 'nquads' | 'turtle'; store: boolean }) => {
    const graph = openGraph();
    if (opts.store) {
      process.stdout.write(await client.dump(graph.backend));
      return;
    }
    process.stdout.write(opts.format === 'turtle' ? await graph.dumpTurtle() : await graph.dumpNquads());
  });

program
  .command('upload')
  .description('Upload an N-Quads or Turtle file')
  .argument('<file>', 'Path to the file')
  .addOption(new Option('--format <format>', 'Input format').choices(['nquads', 'turtle']).makeOptionMandatory())
  .action(async (file: string, opts: { format: 'nquads' | 'turtle' }) => {
    const graph = openGraph();
    const content = await readFile(file, 'utf8');
    if (opts.format === 'turtle') await graph.uploadTurtle(content);
    else await client.uploadNquads(graph.backend, content);
    log.info({ file, format: opts.format }, 'upload done');
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  log.error({ err }, 'command failed');
  process.exitCode = 1;
});
