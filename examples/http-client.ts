/**
 * Talks to a calculator started with `--mcp --mcp-port 8080`.
 */

import { McpSseClient, errorMessage } from '../src';

const BASE_URL = process.env.MCP_URL ?? 'http://127.0.0.1:8080';

function print(line = ''): void {
  process.stdout.write(`${line}\n`);
}

async function callAndPrint(client: McpSseClient, title: string, name: string, args: Record<string, unknown>): Promise<void> {
  print(`\n=== ${title} ===`);
  const result = await client.callTool(name, args);
  if (result.isError) {
    print(`Error: ${McpSseClient.extractText(result)}`);
  } else {
    print(`Result: ${McpSseClient.extractText(result)}`);
  }
}

async function main(): Promise<void> {
  print(`Connecting to MCP server at ${BASE_URL}...`);
  const client = await McpSseClient.connect(BASE_URL);

  try {
    const info = await client.initialize();
    print(`Connected to ${info.serverInfo.name} ${info.serverInfo.version} (protocol ${info.protocolVersion})`);

    print('\nAvailable tools:');
    for (const tool of await client.listTools()) {
      print(`  ${tool.name}: ${tool.description || 'None'}`);
      print(`    required: ${JSON.stringify(tool.inputSchema.required)}`);
      for (const [prop, shape] of Object.entries(tool.inputSchema.properties)) {
        print(`    ${prop}: ${JSON.stringify(shape)}`);
      }
    }

    await callAndPrint(client, 'add(10, 32)', 'add', { a: 10, b: 32 });
    await callAndPrint(client, 'multiply(7, 6)', 'multiply', { value1: 7, value2: 6 });
    await callAndPrint(client, 'hello(MCP User, excited)', 'hello', { name: 'MCP User', excited: true });
    await callAndPrint(client, 'divide(1, 0)', 'divide', { dividend: 1, divisor: 0 });
  } finally {
    await client.close();
  }

  print('\nAll calls complete.');
}

main().catch((e: unknown) => {
  process.stderr.write(`Client failed: ${errorMessage(e)}\n`);
  process.exit(1);
});
