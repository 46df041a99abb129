import * as z from 'zod';
import { ConfigError } from './errors.js';

export const PrefixDict = z.object({
  short: z.string(),
  long: z.string()
});
export type PrefixDict = z.infer<typeof PrefixDict>;

/**
 * A short name standing for a namespace stem, e.g. `ex` for `http://ex.org/`.
 */
export class Prefix {
  constructor(
    readonly short: string,
    readonly long: string
  ) {}

  toSparql(): string {
    return `PREFIX ${this.short}: <${this.long}>`;
  }

  toTurtle(): string {
    return `@prefix ${this.short}: <${this.long}> .`;
  }

  /** Replaces the namespace with `short:` when present; angle brackets are dropped in that case. */
  shorten(uri: string): string {
    if (!uri.includes(this.long)) return uri;
    let bare = uri;
    if (bare.startsWith('<')) bare = bare.slice(1);
    if (bare.endsWith('>')) bare = bare.slice(0, -1);
    return bare.replace(this.long, `${this.short}:`);
  }

  lengthen(token: string): string {
    const head = `${this.short}:`;
    return token.startsWith(head) ? this.long + token.slice(head.length) : token;
  }

  toDict(): PrefixDict {
    return { short: this.short, long: this.long };
  }

  static fromDict(obj: unknown): Prefix {
    const parsed = PrefixDict.safeParse(obj);
    if (!parsed.success) {
      throw new ConfigError(`invalid prefix: ${parsed.error.issues.map((i) => i.message).join('; ')}`);
    }
    return new Prefix(parsed.data.short, parsed.data.long);
  }
}

/**
 * Ordered prefixes. Shortening and lengthening fold over the entries in insertion
 * order, so the first registered namespace wins when two overlap.
 */
export class PrefixRegistry implements Iterable<Prefix> {
  private entries: Prefix[];

  constructor(prefixes: Iterable<Prefix> = []) {
    this.entries = [];
    for (const p of prefixes) this.add(p);
  }

  get size(): number {
    return this.entries.length;
  }

  has(short: string): boolean {
    return this.entries.some((p) => p.short === short);
  }

  find(short: string): Prefix | undefined {
    return this.entries.find((p) => p.short === short);
  }

  shorts(): string[] {
    return this.entries.map((p) => p.short);
  }

  shorten(uri: string): string {
    return this.entries.reduce((acc, p) => p.shorten(acc), uri);
  }

  lengthen(token: string): string {
    return this.entries.reduce((acc, p) => p.lengthen(acc), token);
  }

  add(prefix: Prefix): void {
    // `http` would make every absolute URI look like a compact one
    if (prefix.short === 'http' || prefix.short === 'https') {
      throw new ConfigError(`"${prefix.short}" cannot be used as a prefix name`);
    }
    this.entries.push(prefix);
  }

  /** Drops every entry matching the short name or the namespace. */
  remove(short: string, long?: string): void {
    this.entries = this.entries.filter((p) => p.short !== short && p.long !== long);
  }

  clone(): PrefixRegistry {
    return new PrefixRegistry(this.entries);
  }

  toSparql(): string {
    return this.entries.map((p) => p.toSparql()).join('\n');
  }

  toTurtle(): string {
    return this.entries.map((p) => p.toTurtle()).join('\n');
  }

  toDicts(): PrefixDict[] {
    return this.entries.map((p) => p.toDict());
  }

  static fromDicts(objs: readonly unknown[]): PrefixRegistry {
    return new PrefixRegistry(objs.map((o) => Prefix.fromDict(o)));
  }

  [Symbol.iterator](): Iterator<Prefix> {
    return this.entries[Symbol.iterator]();
  }
}

export const RDF = new Prefix('rdf', 'http://www.w3.org/1999/02/22-rdf-syntax-ns#');
export const RDFS = new Prefix('rdfs', 'http://www.w3.org/2000/01/rdf-schema#');
export const OWL = new Prefix('owl', 'http://www.w3.org/2002/07/owl#');
export const XSD = new Prefix('xsd', 'http://www.w3.org/2001/XMLSchema#');
export const SH = new Prefix('sh', 'http://www.w3.org/ns/shacl#');

export type Ontology = {
  name: string;
  prefix: Prefix;
};

export const WELL_KNOWN_ONTOLOGIES: readonly Ontology[] = [
  { name: 'RDF', prefix: RDF },
  { name: 'RDF Schema', prefix: RDFS },
  { name: 'OWL', prefix: OWL },
  { name: 'XML Schema Datatypes', prefix: XSD },
  { name: 'SHACL', prefix: SH }
];

export function defaultPrefixes(): PrefixRegistry {
  return new PrefixRegistry([RDF, RDFS, OWL, XSD]);
}
