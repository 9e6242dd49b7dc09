import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadToolContext } from './config';
import { createServer, SERVER_INFO } from './index';

async function main(): Promise<void> {
  const context = await loadToolContext();
  const server = createServer(context);

  process.on('SIGINT', () => {
    void server.close().finally(() => process.exit(0));
  });

  await server.connect(new StdioServerTransport());
  console.error(`${SERVER_INFO.name} MCP server running on stdio`);
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
