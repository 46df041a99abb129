import { describe, expect, it } from 'vitest';

import { ConfigError } from '../../src/lib/errors.js';
import { Property } from '../../src/lib/property.js';
import { Literal, Resource, termFromDict } from '../../src/lib/resource.js';
import { Statement } from '../../src/lib/statement.js';

describe('Resource', () => {
  it('shows its label, falling back to the URI', () => {
    const labelled = new Resource('ex:a', { label: 'A', comment: 'An a' });
    expect(labelled.getText()).toBe('A');
    expect(labelled.getText(true)).toBe('A: An a');

    const bare = new Resource('ex:b', { label: '', comment: '' });
    expect(bare.label).toBeUndefined();
    expect(bare.getText(true)).toBe('ex:b');
    expect(String(bare)).toBe('ex:b');
  });

  it('converts to and from a dict', () => {
    expect(new Resource('ex:a', { label: 'A', comment: 'An a' }).toDict()).toEqual({
      kind: 'entity',
      uri: 'ex:a',
      label: 'A',
      comment: 'An a'
    });
    expect(new Resource('ex:b').toDict()).toEqual({ kind: 'entity', uri: 'ex:b', label: null });

    const restored = Resource.fromDict({ uri: 'ex:c', label: 'C', classUri: 'owl:Class' });
    expect(restored.kind).toBe('entity');
    expect(restored.getText()).toBe('C');
    expect(restored.classUri).toBe('owl:Class');
  });

  it('rejects a dict without a URI', () => {
    expect(() => Resource.fromDict({ label: 'no uri' })).toThrow(ConfigError);
  });
});

describe('toSparql()', () => {
  it('renders entities, blank nodes and literals', () => {
    expect(new Resource('ex:a').toSparql(['ex'])).toBe('ex:a');
    expect(new Resource('unknown:a').toSparql(['ex'])).toBe('<unknown:a>');
    expect(new Resource('b0', {}, 'blank').toSparql()).toBe('_:b0');
    expect(new Resource('_:b0', {}, 'blank').toSparql()).toBe('_:b0');
    expect(new Literal('http://ex.org/page').toSparql()).toBe("'http://ex.org/page'");
    expect(new Literal("it's").toSparql()).toBe("'it\\'s'");
    expect(new Literal(42).toSparql()).toBe('42');
    expect(new Literal(42, 'xsd:long').toSparql(['xsd'])).toBe("'42'^^xsd:long");
    expect(new Literal('x', 'http://ex.org/dt').toSparql()).toBe("'x'^^<http://ex.org/dt>");
  });

  it('renders a statement line', () => {
    const statement = new Statement(new Resource('ex:a'), new Property('ex:label'), new Literal('0123'));
    expect(statement.toSparql(['ex'])).toBe("ex:a ex:label '0123' .");
  });
});

describe('termFromDict()', () => {
  it('tells literals, entities and blank nodes apart', () => {
    const literal = termFromDict({ kind: 'literal', value: 3, datatype: 'xsd:integer' });
    expect(literal).toBeInstanceOf(Literal);
    expect(literal.getText()).toBe('3');

    const blank = termFromDict({ kind: 'blank', uri: 'b0' });
    expect(blank).toBeInstanceOf(Resource);
    expect(blank.kind).toBe('blank');

    expect(termFromDict({ uri: 'ex:a' }).kind).toBe('entity');
  });
});

describe('Property', () => {
  it('is keyed by domain, predicate and range', () => {
    expect(new Property('ex:p').getKey()).toBe('unknown-ex:p-unknown');
    const typed = new Property('ex:age', { domain: new Resource('ex:Person'), range: new Resource('xsd:integer') });
    expect(typed.getKey()).toBe('ex:Person-ex:age-xsd:integer');
  });

  it('is mandatory when a minimum count is set', () => {
    expect(new Property('ex:p').isMandatory()).toBe(false);
    expect(new Property('ex:p', { minCount: 0 }).isMandatory()).toBe(false);
    expect(new Property('ex:p', { minCount: 1 }).isMandatory()).toBe(true);
  });

  it('carries the property class', () => {
    expect(new Property('ex:p').classUri).toBe('owl:Property');
  });

  it('converts to and from a dict', () => {
    const property = new Property('ex:age', {
      domain: new Resource('ex:Person', { label: 'Person' }),
      minCount: 1,
      maxCount: 1,
      order: 3
    });
    const dict = property.toDict();

    expect(dict).toEqual({
      uri: 'ex:age',
      label: null,
      comment: null,
      domain: { kind: 'entity', uri: 'ex:Person', label: 'Person' },
      order: 3,
      minCount: 1,
      maxCount: 1
    });

    const restored = Property.fromDict(dict);
    expect(restored.domain?.getText()).toBe('Person');
    expect(restored.range).toBeNull();
    expect(restored.isMandatory()).toBe(true);
    expect(restored.toDict()).toEqual(dict);
  });

  it('rejects a negative minimum count', () => {
    expect(() => Property.fromDict({ uri: 'ex:p', minCount: -1 })).toThrow(ConfigError);
  });
});

describe('Statement', () => {
  it('round-trips through a dict', () => {
    const statement = new Statement(new Resource('ex:a'), new Property('ex:age'), new Literal(30, 'xsd:integer'));

    const restored = Statement.fromDict(statement.toDict());

    expect(restored.toTriple()).toEqual(['ex:a', 'ex:age', 30]);
    expect(restored.toDict()).toEqual(statement.toDict());
  });

  it('uses the object URI for entity objects', () => {
    const statement = new Statement(new Resource('ex:a'), new Property('ex:knows'), new Resource('ex:b'));
    expect(statement.toTriple()).toEqual(['ex:a', 'ex:knows', 'ex:b']);
  });
});
