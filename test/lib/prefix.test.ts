import { describe, expect, it } from 'vitest';

import { ConfigError } from '../../src/lib/errors.js';
import { defaultPrefixes, Prefix, PrefixRegistry, XSD } from '../../src/lib/prefix.js';

const ex = new Prefix('ex', 'http://ex.org/');

describe('Prefix', () => {
  it('shortens URIs of its namespace and strips angle brackets', () => {
    expect(ex.shorten('http://ex.org/Thing')).toBe('ex:Thing');
    expect(ex.shorten('<http://ex.org/Thing>')).toBe('ex:Thing');
  });

  it('leaves other URIs untouched', () => {
    expect(ex.shorten('<http://other.org/Thing>')).toBe('<http://other.org/Thing>');
  });

  it('lengthens only a leading short name', () => {
    expect(ex.lengthen('ex:Thing')).toBe('http://ex.org/Thing');
    expect(ex.lengthen('other:ex:Thing')).toBe('other:ex:Thing');
    expect(ex.lengthen('Thing')).toBe('Thing');
  });

  it('round-trips URIs of its namespace', () => {
    for (const uri of ['http://ex.org/Thing', 'http://ex.org/a/b#c', 'http://ex.org/']) {
      expect(ex.lengthen(ex.shorten(uri))).toBe(uri);
    }
    for (const short of ['ex:Thing', 'ex:a_b']) {
      expect(ex.shorten(ex.lengthen(short))).toBe(short);
    }
  });

  it('renders SPARQL and Turtle declarations', () => {
    expect(ex.toSparql()).toBe('PREFIX ex: <http://ex.org/>');
    expect(ex.toTurtle()).toBe('@prefix ex: <http://ex.org/> .');
  });

  it('round-trips through a plain object', () => {
    const back = Prefix.fromDict(ex.toDict());
    expect(back.short).toBe('ex');
    expect(back.long).toBe('http://ex.org/');
  });

  it('rejects malformed objects', () => {
    expect(() => Prefix.fromDict({ short: 'ex' })).toThrow(ConfigError);
  });
});

describe('PrefixRegistry', () => {
  it('lets the first registered namespace win on overlap', () => {
    const registry = new PrefixRegistry([new Prefix('deep', 'http://ex.org/deep/'), ex]);
    expect(registry.shorten('http://ex.org/deep/Thing')).toBe('deep:Thing');

    const reversed = new PrefixRegistry([ex, new Prefix('deep', 'http://ex.org/deep/')]);
    expect(reversed.shorten('http://ex.org/deep/Thing')).toBe('ex:deep/Thing');
  });

  it('passes unregistered URIs through', () => {
    const registry = new PrefixRegistry([ex]);
    expect(registry.shorten('http://nowhere.org/x')).toBe('http://nowhere.org/x');
    expect(registry.lengthen('nowhere:x')).toBe('nowhere:x');
  });

  it('adds, finds and removes entries', () => {
    const registry = new PrefixRegistry([ex]);
    expect(registry.has('xsd')).toBe(false);
    registry.add(XSD);
    expect(registry.has('xsd')).toBe(true);
    expect(registry.find('xsd')).toBe(XSD);
    expect(registry.shorts()).toEqual(['ex', 'xsd']);

    registry.remove('ex');
    expect(registry.shorts()).toEqual(['xsd']);
    expect(registry.size).toBe(1);
  });

  it('refuses http as a short name', () => {
    const registry = new PrefixRegistry();
    expect(() => registry.add(new Prefix('http', 'http://'))).toThrow(ConfigError);
  });

  it('clones without sharing entries', () => {
    const registry = new PrefixRegistry([ex]);
    const copy = registry.clone();
    copy.add(XSD);
    expect(registry.has('xsd')).toBe(false);
    expect(copy.has('xsd')).toBe(true);
  });

  it('declares the usual vocabularies by default', () => {
    expect(defaultPrefixes().shorts()).toEqual(['rdf', 'rdfs', 'owl', 'xsd']);
  });

  it('round-trips through plain objects', () => {
    const registry = PrefixRegistry.fromDicts([{ short: 'ex', long: 'http://ex.org/' }, XSD.toDict()]);
    expect(registry.toDicts()).toEqual([
      { short: 'ex', long: 'http://ex.org/' },
      { short: 'xsd', long: 'http://www.w3.org/2001/XMLSchema#' }
    ]);
  });
});
