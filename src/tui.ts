import blessed from 'blessed';
import type { Widgets } from 'blessed';
import { Command } from 'commander';
import { backendFromEnv, getEnv } from './config.js';
import { NamedGraph } from './lib/graph.js';
import { SchemaModel } from './lib/model.js';
import { defaultPrefixes, SH } from './lib/prefix.js';
import type { Property } from './lib/property.js';
import type { Resource } from './lib/resource.js';
import { ShapeModel } from './lib/shacl.js';

const program = new Command();
program
  .name('sparql-schema-tui')
  .option('--graph <uri>', 'Named graph to browse (default graph when omitted)')
  .option('--shacl', 'Read SHACL shapes instead of inferring from data', false)
  .option('--datatypes', 'Also list the built-in datatype classes', false)
  .parse(process.argv);

const opts = program.opts<{ graph?: string; shacl: boolean; datatypes: boolean }>();

const env = getEnv();
const prefixes = defaultPrefixes();
prefixes.add(SH);
const graph = new NamedGraph(backendFromEnv(env), opts.graph ?? env.SPARQL_GRAPH ?? null, prefixes);
const model = opts.shacl ? ShapeModel.bound(graph) : SchemaModel.bound(graph);

const screen = blessed.screen({ smartCSR: true, title: 'SPARQL schema' });

type Placement = Pick<Widgets.BoxOptions, 'top' | 'bottom' | 'left' | 'width' | 'height'>;

const frame = { border: 'line', tags: true, style: { border: { fg: 'cyan' } } } as const;
const column = { top: 3, height: '100%-13', width: '35%' } as const;

function listPane(label: string, placement: Placement): Widgets.ListElement {
  return blessed.list({
    ...placement,
    label: ` ${label} `,
    keys: true,
    vi: true,
    mouse: true,
    border: 'line',
    style: { border: { fg: 'cyan' }, selected: { bg: 'blue' } }
  });
}

const header = blessed.box({ ...frame, top: 0, left: 0, height: 3, width: '100%' });
const footer = blessed.box({ ...frame, bottom: 0, left: 0, height: 3, width: '100%' });
const log = blessed.log({ ...frame, bottom: 3, left: 0, height: 7, width: '100%', label: ' log ', scrollable: true, alwaysScroll: true });
const classList = listPane('classes', { ...column, left: 0 });
const propList = listPane('properties', { ...column, left: '35%' });
const detail = blessed.box({
  ...frame,
  ...column,
  left: '70%',
  width: '30%',
  label: ' detail ',
  scrollable: true,
  alwaysScroll: true,
  keys: true,
  mouse: true
});

for (const element of [header, classList, propList, detail, log, footer]) screen.append(element);

footer.setContent('{bold}Tab{/bold}=switch pane  {bold}r{/bold}=refresh  {bold}q{/bold}=quit');

let shownClasses: Resource[] = [];
let shownProps: Property[] = [];
let isRefreshing = false;

function setHeader(): void {
  header.setContent(
    `{bold}endpoint{/bold}: ${env.SPARQL_ENDPOINT} (${graph.backend.technology})  {bold}graph{/bold}: ${graph.uri ?? '(default)'}\n` +
      `{bold}model{/bold}: ${model.frameworkName}  {bold}classes{/bold}: ${model.classes.length}  {bold}properties{/bold}: ${model.properties.length}`
  );
}

function setDetailForProperty(p?: Property): void {
  if (!p) {
    detail.setContent('');
    return;
  }
  detail.setContent(
    `{bold}property{/bold}: ${p.uri}\n` +
      `{bold}label{/bold}: ${p.getText()}\n` +
      `{bold}domain{/bold}: ${p.domain?.getText() ?? '(unknown)'}\n` +
      `{bold}range{/bold}: ${p.range?.getText() ?? '(unknown)'}\n` +
      `{bold}card of{/bold}: ${p.cardOf?.uri ?? '-'}\n` +
      `{bold}count{/bold}: ${p.minCount}..${p.maxCount ?? '*'}${p.isMandatory() ? ' (mandatory)' : ''}\n` +
      `{bold}order{/bold}: ${p.order ?? '-'}`
  );
}

function showPropertiesOf(c?: Resource): void {
  shownProps = c ? model.properties.filter((p) => p.domain?.uri === c.uri) : [];
  propList.setItems(shownProps.length ? shownProps.map((p) => `${p.getText()} → ${p.range?.getText() ?? '?'}`) : ['(no properties)']);
  propList.select(0);
  setDetailForProperty(shownProps[0]);
}

function syncFromSelection(): void {
  showPropertiesOf(shownClasses[classList.selected]);
}

async function refresh(): Promise<void> {
  if (isRefreshing) return;
  isRefreshing = true;
  try {
    classList.setItems(['(loading…)']);
    screen.render();

    await model.update();
    shownClasses = model.classes.filter((c) => opts.datatypes || c.classUri !== 'rdfs:Datatype');
    classList.setItems(shownClasses.length ? shownClasses.map((c) => c.getText()) : ['(no classes)']);
    classList.select(0);
    showPropertiesOf(shownClasses[0]);
  } catch (e) {
    log.log(`{red-fg}ERROR{/red-fg}: ${e instanceof Error ? e.message : String(e)}`);
    classList.setItems(['(error)']);
  } finally {
    setHeader();
    isRefreshing = false;
    screen.render();
  }
}

// list 'select' only fires on enter, so follow the cursor keys instead
const NAV_KEYS = new Set(['up', 'down', 'k', 'j', 'pageup', 'pagedown', 'home', 'end']);

classList.on('keypress', (_ch, key) => {
  if (!key || !NAV_KEYS.has(key.name)) return;
  setImmediate(() => {
    syncFromSelection();
    screen.render();
  });
});

propList.on('keypress', (_ch, key) => {
  if (!key || !NAV_KEYS.has(key.name)) return;
  setImmediate(() => {
    setDetailForProperty(shownProps[propList.selected]);
    screen.render();
  });
});

classList.on('click', () => {
  setImmediate(() => {
    syncFromSelection();
    screen.render();
  });
});

screen.key(['q', 'C-c'], () => process.exit(0));

screen.key(['tab'], () => {
  if (screen.focused === classList) propList.focus();
  else classList.focus();
  screen.render();
});

screen.key(['r'], async () => {
  log.log('refresh');
  await refresh();
});

log.log('loading schema…');
await refresh();
classList.focus();
screen.render();
