import { describe, expect, it } from 'vitest';

import { backendFromEnv, getEnv } from '../src/config.js';
import { ConfigError } from '../src/lib/errors.js';
import { GraphDbBackend } from '../src/lib/sparql/graphdb.js';

describe('getEnv()', () => {
  it('fills in defaults', () => {
    expect(getEnv({})).toEqual({
      SPARQL_TECHNOLOGY: 'Fuseki',
      SPARQL_ENDPOINT: 'http://localhost:3030/ds',
      LOG_LEVEL: 'info'
    });
  });

  it('rejects an unknown technology or a malformed endpoint', () => {
    expect(() => getEnv({ SPARQL_TECHNOLOGY: 'Virtuoso' })).toThrow(ConfigError);
    expect(() => getEnv({ SPARQL_ENDPOINT: 'localhost' })).toThrow(ConfigError);
  });
});

describe('backendFromEnv()', () => {
  it('builds the configured backend', () => {
    const backend = backendFromEnv(
      getEnv({
        SPARQL_TECHNOLOGY: 'GraphDB',
        SPARQL_ENDPOINT: 'http://store.test/repositories/demo',
        SPARQL_USERNAME: 'reader',
        SPARQL_PASSWORD: 'test-secret'
      })
    );

    expect(backend).toBeInstanceOf(GraphDbBackend);
    expect(backend.connection).toEqual({
      url: 'http://store.test/repositories/demo',
      username: 'reader',
      password: 'test-secret',
      name: undefined
    });
  });
});
