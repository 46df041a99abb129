import * as z from 'zod';
import { ConfigError } from '../errors.js';
import { AllegrographBackend } from './allegrograph.js';
import type { Technology, TripleStoreBackend } from './backend.js';
import { FusekiBackend } from './fuseki.js';
import { GenericBackend } from './generic.js';
import { GraphDbBackend, Rdf4jBackend } from './graphdb.js';
import type { Connection } from './http.js';

export const TECHNOLOGIES = ['Generic', 'Allegrograph', 'Fuseki', 'GraphDB', 'RDF4J'] as const satisfies readonly Technology[];

export const BackendDict = z.object({
  technology: z.enum(TECHNOLOGIES),
  url: z.string().url(),
  username: z.string().nullish(),
  password: z.string().nullish(),
  name: z.string().nullish()
});
export type BackendDict = z.infer<typeof BackendDict>;

const constructors: Record<Technology, new (connection: Connection) => TripleStoreBackend> = {
  Generic: GenericBackend,
  Allegrograph: AllegrographBackend,
  Fuseki: FusekiBackend,
  GraphDB: GraphDbBackend,
  RDF4J: Rdf4jBackend
};

export function createBackend(technology: Technology, connection: Connection): TripleStoreBackend {
  return new constructors[technology](connection);
}

export function backendFromDict(obj: unknown): TripleStoreBackend {
  const parsed = BackendDict.safeParse(obj);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`invalid backend configuration: ${issues}`);
  }
  const { technology, url, username, password, name } = parsed.data;
  return createBackend(technology, {
    url,
    username: username ?? undefined,
    password: password ?? undefined,
    name: name ?? undefined
  });
}

export function backendToDict(backend: TripleStoreBackend): BackendDict {
  const { url, username, password, name } = backend.connection;
  return {
    technology: backend.technology,
    url,
    username: username ?? null,
    password: password ?? null,
    name: name ?? null
  };
}
