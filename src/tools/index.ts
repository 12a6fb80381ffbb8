import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { AppConfig } from '../config.js';
import { registerConvertTools } from './convert.js';
import { registerPreviewTool } from './preview.js';

export function registerAllTools(server: McpServer, config: AppConfig): void {
  registerConvertTools(server, config);
  registerPreviewTool(server);
}
