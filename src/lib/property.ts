import * as z from 'zod';
import { EntityDict, parseDict, Resource } from './resource.js';

export const PropertyDict = z.object({
  uri: z.string(),
  label: z.string().nullish(),
  comment: z.string().nullish(),
  domain: EntityDict.nullish(),
  range: EntityDict.nullish(),
  cardOf: EntityDict.nullish(),
  order: z.number().int().nullish(),
  minCount: z.number().int().nonnegative().nullish(),
  maxCount: z.number().int().nonnegative().nullish()
});
export type PropertyDict = z.input<typeof PropertyDict>;

export type PropertyInit = {
  label?: string | null;
  comment?: string | null;
  domain?: Resource | null;
  range?: Resource | null;
  /** The class the cardinality constraint is attached to. */
  cardOf?: Resource | null;
  order?: number | null;
  minCount?: number | null;
  maxCount?: number | null;
};

export const PROPERTY_CLASS = 'owl:Property';

/**
 * A predicate as used between a domain and a range. The same predicate URI with a
 * different domain or range is a different Property.
 */
export class Property extends Resource {
  readonly domain: Resource | null;
  readonly range: Resource | null;
  readonly cardOf: Resource | null;
  readonly order: number | null;
  readonly minCount: number;
  readonly maxCount: number | null;

  constructor(uri: string, init: PropertyInit = {}) {
    super(uri, { label: init.label, comment: init.comment, classUri: PROPERTY_CLASS });
    this.domain = init.domain ?? null;
    this.range = init.range ?? null;
    this.cardOf = init.cardOf ?? null;
    this.order = init.order ?? null;
    this.minCount = init.minCount ?? 0;
    this.maxCount = init.maxCount ?? null;
  }

  getKey(): string {
    return `${this.domain?.uri ?? 'unknown'}-${this.uri}-${this.range?.uri ?? 'unknown'}`;
  }

  isMandatory(): boolean {
    return this.minCount !== 0;
  }

  override toDict(): PropertyDict {
    const dict: PropertyDict = { uri: this.uri, label: this.label ?? null, comment: this.comment ?? null };
    if (this.domain) dict.domain = this.domain.toDict();
    if (this.range) dict.range = this.range.toDict();
    if (this.cardOf) dict.cardOf = this.cardOf.toDict();
    if (this.order !== null) dict.order = this.order;
    if (this.minCount) dict.minCount = this.minCount;
    if (this.maxCount !== null) dict.maxCount = this.maxCount;
    return dict;
  }

  static override fromDict(obj: unknown): Property {
    const d = parseDict(PropertyDict, obj, 'property');
    const entity = (e: EntityDict | null | undefined) => (e ? Resource.fromDict(e) : null);
    return new Property(d.uri, {
      label: d.label,
      comment: d.comment,
      domain: entity(d.domain),
      range: entity(d.range),
      cardOf: entity(d.cardOf),
      order: d.order,
      minCount: d.minCount,
      maxCount: d.maxCount
    });
  }
}
