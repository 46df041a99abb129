import { backendFromEnv } from '../src/config.js';
import * as client from '../src/lib/sparql/client.js';

await client.run(backendFromEnv(), 'CLEAR ALL');
console.log('OK: cleared all triples');
