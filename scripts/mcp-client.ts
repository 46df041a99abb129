import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StdioClientTransport } from '@modelcontextprotocol/sdk/client/stdio.js';

const SERVER_CMD = 'npx';
const SERVER_ARGS = ['tsx', 'src/mcp/server.ts'];

async function main(): Promise<void> {
  const transport = new StdioClientTransport({ command: SERVER_CMD, args: SERVER_ARGS });
  const client = new Client({ name: 'sparql-schema-client', version: '0.1.0' });

  await client.connect(transport);

  const tools = await client.listTools();
  console.log('tools:', tools.tools.map((t) => t.name).join(', '));

  const ping = await client.callTool({ name: 'ping', arguments: {} });
  console.log('ping:', JSON.stringify(ping, null, 2));

  const classes = await client.callTool({ name: 'listClasses', arguments: { limit: 20 } });
  console.log('listClasses:', JSON.stringify(classes, null, 2));

  const props = await client.callTool({ name: 'listProperties', arguments: { domain: 'https://example.org/people#Person' } });
  console.log('listProperties:', JSON.stringify(props, null, 2));

  const mandatory = await client.callTool({ name: 'isPropMandatory', arguments: { shacl: true, uri: 'https://example.org/people#name', cardOf: 'https://example.org/people#Person' } });
  console.log('isPropMandatory:', JSON.stringify(mandatory, null, 2));

  await client.close();
}

main().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
