import { z } from 'zod';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { AppConfig } from '../config.js';
import { convertVCards } from '../contacts/index.js';
import {
  InputFileError,
  VCARD_MEDIA_TYPE,
  decodeBestEffort,
  errorMessage,
  logger,
  outputFileName,
} from '../utils/index.js';

export function registerConvertTools(server: McpServer, config: AppConfig): void {
  server.registerTool('convert_vcards', {
    description: 'Convert vCard 2.1/3.0/4.0 text into normalized vCard 4.0 text. Every contact gets a fresh UID.',
    inputSchema: {
      vcard: z.string().describe('One or more BEGIN:VCARD ... END:VCARD blocks'),
    },
  }, async ({ vcard }) => {
    try {
      const result = convertVCards(vcard, { foldLines: config.foldLines });
      logger.debug(`convert_vcards: ${result.contacts.length} contact(s)`);
      return {
        content: [{ type: 'text' as const, text: result.vcard }],
      };
    } catch (err) {
      return {
        content: [{ type: 'text' as const, text: `Error: ${errorMessage(err)}` }],
        isError: true,
      };
    }
  });

  server.registerTool('convert_vcard_file', {
    description: 'Convert a .vcf file to vCard 4.0 and write "<name>-4.0.vcf". Returns a conversion summary.',
    inputSchema: {
      filePath: z.string().describe('Path to the .vcf file to convert'),
      outputPath: z.string().optional().describe('Where to write the result (defaults to <name>-4.0.vcf in the output directory)'),
    },
  }, async ({ filePath, outputPath }) => {
    try {
      const bytes = await readInput(filePath);
      const { contacts, vcard } = convertVCards(decodeBestEffort(bytes), { foldLines: config.foldLines });

      const target = outputPath ?? path.join(config.outputDir ?? path.dirname(filePath), outputFileName(filePath));
      await fs.writeFile(target, vcard, 'utf-8');
      const stat = await fs.stat(target);

      logger.info(`Converted ${contacts.length} contact(s) from ${filePath} to ${target}`);

      return {
        content: [{
          type: 'text' as const,
          text: JSON.stringify({
            contacts: contacts.length,
            outputPath: target,
            mediaType: VCARD_MEDIA_TYPE,
            fileSize: stat.size,
            message: `Converted ${contacts.length} contacts from ${filePath}`,
          }, null, 2),
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

async function readInput(filePath: string): Promise<Uint8Array> {
  try {
    return await fs.readFile(filePath);
  } catch (err) {
    throw new InputFileError(filePath, errorMessage(err));
  }
}
