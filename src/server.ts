import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { registerAllTools } from './tools/index.js';
import { registerAllResources } from './resources/index.js';
import type { AppConfig } from './config.js';
import { logger } from './utils/index.js';

export const SERVER_NAME = 'vcf-normalize-mcp';
export const SERVER_VERSION = '0.1.0';

export function createServer(config: AppConfig): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  registerAllTools(server, config);
  registerAllResources(server);

  logger.info('MCP server created, output dir:', config.outputDir ?? '(beside input)');

  return server;
}
