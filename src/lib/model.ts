import { MultipleMatchError } from './errors.js';
import type { NamedGraph } from './graph.js';
import { componentLogger } from './logger.js';
import { XSD, type Prefix, type PrefixRegistry } from './prefix.js';
import { Property } from './property.js';
import { classesQuery, propertiesQuery, type DiscoveryVocabulary } from './queries.js';
import { Resource } from './resource.js';
import type { SparqlRow } from './sparql/http.js';

const log = componentLogger('model');

export const CLASS_CLASS = 'owl:Class';
export const DATATYPE_CLASS = 'rdfs:Datatype';

const VALUE_CLASSES: readonly [uri: string, label: string][] = [
  ['xsd:string', 'String'],
  ['xsd:integer', 'Integer'],
  ['xsd:decimal', 'Decimal'],
  ['xsd:float', 'Float'],
  ['xsd:double', 'Double'],
  ['xsd:boolean', 'Boolean'],
  ['xsd:dateTime', 'Date Time'],
  ['xsd:date', 'Date'],
  ['xsd:time', 'Time'],
  ['xsd:gYear', 'G Year'],
  ['xsd:gMonth', 'G Month'],
  ['xsd:gDay', 'G Day'],
  ['xsd:gYearMonth', 'G Year Month'],
  ['xsd:gMonthDay', 'G Month Day'],
  ['xsd:duration', 'Duration'],
  ['xsd:dayTimeDuration', 'Day Time Duration'],
  ['xsd:yearMonthDuration', 'Year Month Duration'],
  ['xsd:hexBinary', 'Hexadecimal Binary'],
  ['xsd:base64Binary', 'Base64 Binary'],
  ['xsd:anyURI', 'Any URI'],
  ['xsd:language', 'Language'],
  ['rdf:langString', 'Language String'],
  ['rdf:HTML', 'HTML']
];

export type ModelBinding =
  | { kind: 'bound'; graph: NamedGraph; prefixes: PrefixRegistry }
  | { kind: 'unbound' };

export type ModelSnapshot = {
  readonly classes: readonly Resource[];
  readonly properties: readonly Property[];
};

const EMPTY: ModelSnapshot = Object.freeze({ classes: [], properties: [] });

type ModelConstructor<M> = new (binding: ModelBinding, vocabulary?: Partial<DiscoveryVocabulary>) => M;

/**
 * Classes and properties as the data uses them: a class is anything used as a type,
 * a property is any predicate, with the subject's type as domain and the object's
 * type (or datatype) as range.
 *
 * `classes` and `properties` are a snapshot taken by `update()`, replaced as a whole
 * and never kept in sync with later writes to the store.
 */
export class SchemaModel {
  readonly frameworkName: string = 'No Framework';
  readonly vocabulary: DiscoveryVocabulary;

  private currentBinding: ModelBinding;
  private snapshot: ModelSnapshot = EMPTY;

  constructor(binding: ModelBinding, vocabulary: Partial<DiscoveryVocabulary> = {}) {
    this.currentBinding = binding;
    this.vocabulary = {
      typeProperty: vocabulary.typeProperty ?? 'rdf:type',
      labelProperty: vocabulary.labelProperty ?? 'rdfs:label',
      commentProperty: vocabulary.commentProperty ?? 'rdfs:comment'
    };
  }

  static bound<M extends SchemaModel>(
    this: ModelConstructor<M>,
    graph: NamedGraph,
    prefixes: PrefixRegistry = graph.prefixes,
    vocabulary?: Partial<DiscoveryVocabulary>
  ): M {
    return new this({ kind: 'bound', graph, prefixes }, vocabulary);
  }

  static unbound<M extends SchemaModel>(this: ModelConstructor<M>, vocabulary?: Partial<DiscoveryVocabulary>): M {
    return new this({ kind: 'unbound' }, vocabulary);
  }

  get binding(): ModelBinding {
    return this.currentBinding;
  }

  get classes(): readonly Resource[] {
    return this.snapshot.classes;
  }

  get properties(): readonly Property[] {
    return this.snapshot.properties;
  }

  /**
   * Rebinds when a graph (or only prefixes) is given, then takes a fresh snapshot.
   * An unbound model ends up empty.
   */
  async update(graph?: NamedGraph, prefixes?: PrefixRegistry): Promise<void> {
    if (graph) {
      this.currentBinding = { kind: 'bound', graph, prefixes: prefixes ?? graph.prefixes };
    } else if (prefixes && this.currentBinding.kind === 'bound') {
      this.currentBinding = { ...this.currentBinding, prefixes };
    }

    if (this.currentBinding.kind === 'unbound') {
      this.snapshot = EMPTY;
      return;
    }

    const classes = await this.discoverClasses();
    const properties = await this.discoverProperties(classes);
    this.snapshot = Object.freeze({ classes: Object.freeze(classes), properties: Object.freeze(properties) });
    log.debug({ framework: this.frameworkName, classes: classes.length, properties: properties.length }, 'model updated');
  }

  getClasses(): Promise<Resource[]> {
    return this.discoverClasses();
  }

  /** Domains and ranges are resolved against the current `classes` snapshot. */
  getProperties(): Promise<Property[]> {
    return this.discoverProperties(this.classes);
  }

  /** Never misses: an unknown URI gives a bare placeholder Resource. */
  findClass(uri: string): Resource {
    return this.classes.find((c) => c.uri === uri) ?? new Resource(uri);
  }

  /**
   * Every property with that predicate (and domain/range, when given). A predicate
   * can legitimately show up several times; with no match a placeholder is returned.
   */
  findProperties(uri: string, domainUri?: string, rangeUri?: string): Property[] {
    const found = this.properties.filter(
      (p) =>
        p.uri === uri &&
        (!domainUri || p.domain?.uri === domainUri) &&
        (!rangeUri || p.range?.uri === rangeUri)
    );
    return found.length > 0 ? found : [new Property(uri)];
  }

  /**
   * The property carrying the cardinality of `uri` (on `cardOfUri`, when given), or
   * null. Two owners mean the graph contradicts itself.
   */
  isPropMandatory(uri: string, cardOfUri?: string): Property | null {
    const selection = this.properties.filter(
      (p) => p.uri === uri && (cardOfUri === undefined || p.cardOf?.uri === cardOfUri)
    );
    if (selection.length > 1) throw new MultipleMatchError(uri, cardOfUri, selection.length);
    return selection[0] ?? null;
  }

  static valueClasses(): Resource[] {
    return VALUE_CLASSES.map(([uri, label]) => new Resource(uri, { label, classUri: DATATYPE_CLASS }));
  }

  protected async discoverClasses(): Promise<Resource[]> {
    const rows = await this.select((scope) => classesQuery(scope, this.renderedVocabulary()));
    const found = rows.map((row) => new Resource(text(row, 'uri'), { label: text(row, 'label'), classUri: CLASS_CLASS }));
    return [...found, ...SchemaModel.valueClasses()];
  }

  protected async discoverProperties(classes: readonly Resource[]): Promise<Property[]> {
    // ranges come back as xsd:* datatypes and need the prefix to be shortened
    this.ensurePrefix(XSD);
    const rows = await this.select((scope) => propertiesQuery(scope, this.renderedVocabulary()));
    return rows.map(
      (row) =>
        new Property(text(row, 'uri'), {
          label: text(row, 'label'),
          domain: resolveClass(classes, text(row, 'domain_class_uri')),
          range: resolveClass(classes, text(row, 'range_class_uri'))
        })
    );
  }

  protected async select(build: (graph: NamedGraph) => string): Promise<SparqlRow[]> {
    const binding = this.currentBinding;
    if (binding.kind === 'unbound') return [];
    return binding.graph.run(build(binding.graph), binding.prefixes);
  }

  protected ensurePrefix(prefix: Prefix): void {
    const binding = this.currentBinding;
    if (binding.kind === 'bound' && !binding.prefixes.has(prefix.short)) binding.prefixes.add(prefix);
  }

  /** Compact names go in as they are; absolute URIs get angle brackets. */
  private renderedVocabulary(): DiscoveryVocabulary {
    const render = (v: string) => (v.startsWith('http') ? `<${v}>` : v);
    return {
      typeProperty: render(this.vocabulary.typeProperty),
      labelProperty: render(this.vocabulary.labelProperty),
      commentProperty: render(this.vocabulary.commentProperty)
    };
  }
}

/** Null for an empty URI, the snapshot entry when there is one, a placeholder otherwise. */
export function resolveClass(classes: readonly Resource[], uri: string): Resource | null {
  if (!uri) return null;
  return classes.find((c) => c.uri === uri) ?? new Resource(uri);
}

export function text(row: SparqlRow, key: string): string {
  const value = row[key];
  return value === undefined ? '' : String(value);
}

export function count(row: SparqlRow, key: string): number | null {
  const value = row[key];
  if (typeof value === 'number') return value;
  if (value === undefined || value === '') return null;
  const n = Number(value);
  return Number.isInteger(n) ? n : null;
}
