import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { parseVCards } from '../contacts/index.js';
import { errorMessage } from '../utils/index.js';

export function registerPreviewTool(server: McpServer): void {
  server.registerTool('preview_vcards', {
    description: 'Parse vCard text and return the normalized contacts as JSON, without serializing them.',
    inputSchema: {
      vcard: z.string().describe('One or more BEGIN:VCARD ... END:VCARD blocks'),
    },
  }, async ({ vcard }) => {
    try {
      const contacts = parseVCards(vcard);
      return {
        content: [{
          type: 'text' as const,
          text: JSON.stringify({ total: contacts.length, contacts }, null, 2),
        }],
      };
    } catch (err) {
      return {
        content: [{ type: 'text' as const, text: `Error: ${errorMessage(err)}` }],
        isError: true,
      };
    }
  });
}
