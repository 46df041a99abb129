export * from './lib/errors.js';
export { logger } from './lib/logger.js';
export * from './lib/prefix.js';
export * from './lib/util.js';
export * from './lib/resource.js';
export * from './lib/property.js';
export * from './lib/statement.js';
export * from './lib/queries.js';
export * from './lib/graph.js';
export * from './lib/model.js';
export * from './lib/shacl.js';
export type { Technology, TripleStoreBackend } from './lib/sparql/backend.js';
export * as sparql from './lib/sparql/client.js';
export * from './lib/sparql/http.js';
export * from './lib/sparql/factory.js';
export { GenericBackend } from './lib/sparql/generic.js';
export { AllegrographBackend, FRANZ_DATASET_OPTION } from './lib/sparql/allegrograph.js';
export { FusekiBackend } from './lib/sparql/fuseki.js';
export { GraphDbBackend, Rdf4jBackend } from './lib/sparql/graphdb.js';
export { getEnv, backendFromEnv, type Env } from './config.js';
