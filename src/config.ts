import * as path from 'node:path';
import * as os from 'node:os';
import * as fs from 'node:fs/promises';
import { z } from 'zod';
import { ConfigError, errorMessage } from './utils/index.js';

export interface AppConfig {
  /** Where converted files go; the input file's directory when unset. */
  outputDir?: string;
  foldLines: boolean;
}

const configFileSchema = z.object({
  outputDir: z.string().min(1).optional(),
  foldLines: z.boolean().optional(),
});

export const DEFAULT_CONFIG_PATH = path.join(os.homedir(), '.vcf-normalize-mcp', 'config.json');

export async function loadConfig(env: NodeJS.ProcessEnv = process.env): Promise<AppConfig> {
  const configPath = env.VCF_NORMALIZE_CONFIG ?? DEFAULT_CONFIG_PATH;
  const file = await readConfigFile(configPath);

  return {
    outputDir: env.VCF_NORMALIZE_OUTPUT_DIR || file.outputDir,
    foldLines: env.VCF_NORMALIZE_FOLD !== undefined ? isTruthy(env.VCF_NORMALIZE_FOLD) : file.foldLines ?? false,
  };
}

async function readConfigFile(configPath: string): Promise<z.infer<typeof configFileSchema>> {
  let raw: string;
  try {
    raw = await fs.readFile(configPath, 'utf-8');
  } catch (err) {
    if (isNotFound(err)) return {};
    throw err;
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(configPath, errorMessage(err));
  }

  const parsed = configFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigError(configPath, parsed.error.issues.map(i => `${i.path.join('.') || '(root)'} ${i.message}`).join('; '));
  }
  return parsed.data;
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

function isTruthy(value: string): boolean {
  return ['1', 'true', 'yes'].includes(value.trim().toLowerCase());
}
