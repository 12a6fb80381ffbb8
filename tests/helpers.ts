import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import type { AppConfig } from '../src/config.js';
import { createServer } from '../src/server.js';

/** Join content lines with CRLF, terminating the last one too. */
export function crlf(...lines: string[]): string {
  return lines.map(l => `${l}\r\n`).join('');
}

/** Deterministic UUIDs: ...-000000000001, ...-000000000002, ... */
export function sequentialIds(): () => string {
  let n = 0;
  return () => {
    n++;
    return `00000000-0000-4000-8000-${String(n).padStart(12, '0')}`;
  };
}

export const VCARD_30 = crlf(
  'BEGIN:VCARD',
  'VERSION:3.0',
  'N:Doe;John;;;',
  'FN:John Doe',
  'TEL;TYPE=CELL,HOME: +1 555 0100',
  'EMAIL;TYPE=WORK:john.doe@example.com',
  'ORG:Acme;Sales',
  'END:VCARD',
);

export const VCARD_21 = crlf(
  'BEGIN:VCARD',
  'VERSION:2.1',
  'N;CHARSET=ISO-8859-1:Dör;Jöhn;;;',
  'FN;CHARSET=ISO-8859-1:Jöhn Dör',
  'TEL;HOME: (555) 010-2000 ',
  'TEL;WORK: +1 555 010 2001',
  'EMAIL;INTERNET:john@example.com',
  'EMAIL;INTERNET:john.work@example.com',
  'ORG;CHARSET=ISO-8859-1:Åcme;Sälës',
  'END:VCARD',
);

export const VCARD_NO_NAME = crlf(
  'BEGIN:VCARD',
  'VERSION:3.0',
  'TEL;TYPE=CELL: +44 (0) 20 7946 0000',
  'EMAIL:someone+tag@example.co.uk',
  'END:VCARD',
);

export const VCARD_MULTI = crlf(
  'BEGIN:VCARD', 'VERSION:3.0', 'N:Alpha;Ada;;;', 'FN:Ada Alpha', 'TEL;TYPE=CELL:+1 111 1111', 'END:VCARD',
  'BEGIN:VCARD', 'VERSION:3.0', 'N:Beta;Bob;;;', 'FN:Bob Beta', 'EMAIL:bob@example.com', 'END:VCARD',
);

export interface TestClient {
  client: Client;
  callTool: (name: string, args: Record<string, unknown>) => Promise<{ text: string; isError: boolean }>;
  close: () => Promise<void>;
}

/** Connect an MCP client to a fresh in-process server. */
export async function connectTestClient(config: AppConfig): Promise<TestClient> {
  const server = createServer(config);
  const client = new Client({ name: 'integration-test', version: '1.0.0' });
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);

  return {
    client,
    callTool: async (name, args) => {
      const result = CallToolResultSchema.parse(await client.callTool({ name, arguments: args }));
      const first = result.content[0];
      return {
        text: first?.type === 'text' ? first.text : '',
        isError: result.isError === true,
      };
    },
    close: async () => {
      await client.close();
      await server.close();
    },
  };
}
