import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

export function registerAllResources(server: McpServer): void {
  // vcf://health - liveness, independent of the converter
  server.registerResource('health', 'vcf://health', {
    title: 'Health',
    description: 'Liveness check',
    mimeType: 'application/json',
  }, async (uri) => ({
    contents: [{
      uri: uri.href,
      text: JSON.stringify({ status: 'ok' }),
      mimeType: 'application/json',
    }],
  }));
}
