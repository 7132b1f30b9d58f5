import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { ConfigurationError } from '@verita/shared/src/utils/errors.js';
import { validateVerificationConfig } from './validators.js';
import type { VerificationConfig } from './verification-config.schema.js';

export const CONFIG_FILE_NAME = 'verification.json';

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

async function readJsonFile(filePath: string): Promise<unknown> {
  try {
    const content = await readFile(filePath, 'utf-8');
    const parsed: unknown = JSON.parse(content);
    return parsed;
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new ConfigurationError(`Invalid JSON in ${filePath}: ${error.message}`);
    }
    if (errorCode(error) === 'ENOENT') {
      throw new ConfigurationError(`Configuration file not found: ${filePath}`);
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Failed to read configuration file ${filePath}: ${message}`);
  }
}

export async function loadConfig(configDir: string): Promise<VerificationConfig> {
  const raw = await readJsonFile(join(configDir, CONFIG_FILE_NAME));
  return validateVerificationConfig(raw);
}
