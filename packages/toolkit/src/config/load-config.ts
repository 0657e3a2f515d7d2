import { readFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { ConfigurationError, isNodeError } from '../errors.ts';
import { buildResolvedConfig } from './build-resolved-config.ts';
import type { ResolvedToolkitConfig } from './types.ts';
import { validateConfig } from './validate-config.ts';

export const DEFAULT_CONFIG_FILENAME = 'shellfence.config.json';

export interface LoadConfigOptions {
  configPath?: string;
}

/**
 * Reads a JSON config file, validates it and fills in defaults. A relative
 * `source` is resolved against the directory holding the config file.
 */
export async function loadConfig(options?: LoadConfigOptions): Promise<ResolvedToolkitConfig> {
  const configPath = resolve(options?.configPath ?? DEFAULT_CONFIG_FILENAME);
  const text = await readConfigFile(configPath);
  const config = parseConfigFile(text, configPath);

  validateConfig(config);

  return buildResolvedConfig(config, { baseDir: dirname(configPath) });
}

async function readConfigFile(configPath: string): Promise<string> {
  try {
    return await readFile(configPath, 'utf-8');
  } catch (error) {
    if (isNodeError(error) && error.code === 'ENOENT') {
      throw new ConfigurationError(`Config file not found: ${configPath}`);
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Failed to read config file: ${configPath}\n${message}`);
  }
}

function parseConfigFile(text: string, configPath: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Config file is not valid JSON: ${configPath}\n${message}`);
  }
}
