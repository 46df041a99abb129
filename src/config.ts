import * as z from 'zod';
import { ConfigError } from './lib/errors.js';
import { createBackend, TECHNOLOGIES } from './lib/sparql/factory.js';
import type { TripleStoreBackend } from './lib/sparql/backend.js';

const Env = z.object({
  SPARQL_TECHNOLOGY: z.enum(TECHNOLOGIES).default('Fuseki'),
  SPARQL_ENDPOINT: z.string().url().default('http://localhost:3030/ds'),
  SPARQL_USERNAME: z.string().optional(),
  SPARQL_PASSWORD: z.string().optional(),
  SPARQL_GRAPH: z.string().optional(),
  SPARQL_NAME: z.string().optional(),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info')
});
export type Env = z.infer<typeof Env>;

export function getEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = Env.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`invalid environment: ${issues}`);
  }
  return parsed.data;
}

export function backendFromEnv(env: Env = getEnv()): TripleStoreBackend {
  return createBackend(env.SPARQL_TECHNOLOGY, {
    url: env.SPARQL_ENDPOINT,
    username: env.SPARQL_USERNAME,
    password: env.SPARQL_PASSWORD,
    name: env.SPARQL_NAME
  });
}
