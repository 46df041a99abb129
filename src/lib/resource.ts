import * as z from 'zod';
import { ConfigError } from './errors.js';
import { escapeLiteral, iriTerm, isBlankToken } from './util.js';

export const EntityDict = z.object({
  kind: z.enum(['entity', 'blank']).default('entity'),
  uri: z.string(),
  label: z.string().nullish(),
  comment: z.string().nullish(),
  classUri: z.string().nullish()
});
export type EntityDict = z.input<typeof EntityDict>;

export const LiteralDict = z.object({
  kind: z.literal('literal'),
  value: z.union([z.string(), z.number()]),
  datatype: z.string().nullish()
});
export type LiteralDict = z.input<typeof LiteralDict>;

export const TermDict = z.union([LiteralDict, EntityDict]);

export function parseDict<T extends z.ZodTypeAny>(schema: T, obj: unknown, what: string): z.output<T> {
  const parsed = schema.safeParse(obj);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    throw new ConfigError(`invalid ${what}: ${issues}`);
  }
  return parsed.data;
}

export type ResourceInit = {
  label?: string | null;
  comment?: string | null;
  classUri?: string | null;
};

/**
 * An IRI-named entity or a blank node. Empty label/comment/class are stored as absent.
 */
export class Resource {
  readonly label?: string;
  readonly comment?: string;
  readonly classUri?: string;

  constructor(
    readonly uri: string,
    init: ResourceInit = {},
    readonly kind: 'entity' | 'blank' = 'entity'
  ) {
    this.label = init.label || undefined;
    this.comment = init.comment || undefined;
    this.classUri = init.classUri || undefined;
  }

  /** Label when there is one, URI otherwise; `label: comment` on request. */
  getText(withComment = false): string {
    const text = this.label ?? this.uri;
    return withComment && this.comment ? `${text}: ${this.comment}` : text;
  }

  /** The term as it goes into query text. */
  toSparql(knownShortNames: readonly string[] = []): string {
    if (this.kind === 'blank') return isBlankToken(this.uri) ? this.uri : `_:${this.uri}`;
    return iriTerm(this.uri, knownShortNames);
  }

  toDict(): EntityDict {
    const dict: EntityDict = { kind: this.kind, uri: this.uri, label: this.label ?? null };
    if (this.comment) dict.comment = this.comment;
    if (this.classUri) dict.classUri = this.classUri;
    return dict;
  }

  static fromDict(obj: unknown): Resource {
    const d = parseDict(EntityDict, obj, 'resource');
    return new Resource(d.uri, d, d.kind);
  }

  toString(): string {
    return this.uri;
  }
}

export type LiteralValue = string | number;

export class Literal {
  readonly kind = 'literal';

  constructor(
    readonly value: LiteralValue,
    readonly datatype?: string
  ) {}

  getText(): string {
    return String(this.value);
  }

  /** Untyped numbers stay bare; everything else is a quoted string, typed when a datatype is set. */
  toSparql(knownShortNames: readonly string[] = []): string {
    if (typeof this.value === 'number' && !this.datatype) return String(this.value);
    const quoted = `'${escapeLiteral(String(this.value))}'`;
    return this.datatype ? `${quoted}^^${iriTerm(this.datatype, knownShortNames)}` : quoted;
  }

  toDict(): LiteralDict {
    return this.datatype
      ? { kind: 'literal', value: this.value, datatype: this.datatype }
      : { kind: 'literal', value: this.value };
  }

  toString(): string {
    return this.getText();
  }
}

export type Term = Resource | Literal;

export function termFromDict(obj: unknown): Term {
  const d = parseDict(TermDict, obj, 'term');
  if (d.kind === 'literal') return new Literal(d.value, d.datatype ?? undefined);
  return new Resource(d.uri, d, d.kind);
}
