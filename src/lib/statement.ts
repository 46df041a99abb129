import * as z from 'zod';
import { Property } from './property.js';
import { parseDict, Resource, termFromDict, type EntityDict, type LiteralDict, type Term } from './resource.js';
import type { PropertyDict } from './property.js';

const StatementDict = z.object({
  subject: z.unknown(),
  predicate: z.unknown(),
  object: z.unknown()
});

export type StatementDict = {
  subject: EntityDict;
  predicate: PropertyDict;
  object: EntityDict | LiteralDict;
};

/** A triple whose three parts are typed model objects, not raw tokens. */
export class Statement {
  constructor(
    readonly subject: Resource,
    readonly predicate: Property,
    readonly object: Term
  ) {}

  toTriple(): [string, string, string | number] {
    const o = this.object.kind === 'literal' ? this.object.value : this.object.uri;
    return [this.subject.uri, this.predicate.uri, o];
  }

  /** A `s p o .` line with every part rendered from its own type. */
  toSparql(knownShortNames: readonly string[] = []): string {
    const [s, p, o] = [this.subject, this.predicate, this.object].map((t) => t.toSparql(knownShortNames));
    return `${s} ${p} ${o} .`;
  }

  toDict(): StatementDict {
    return {
      subject: this.subject.toDict(),
      predicate: this.predicate.toDict(),
      object: this.object.toDict()
    };
  }

  static fromDict(obj: unknown): Statement {
    const d = parseDict(StatementDict, obj, 'statement');
    return new Statement(Resource.fromDict(d.subject), Property.fromDict(d.predicate), termFromDict(d.object));
  }
}
