import { readFile } from 'node:fs/promises';
import { ConfigurationError } from '@epirisk/shared/src/utils/errors.js';
import { createChildLogger } from '@epirisk/shared/src/logger.js';
import { validateAppConfig } from './validators.js';
import type { AppConfig } from './app-config.schema.js';

const log = createChildLogger('schemas:config-loader');

async function readJsonFile(filePath: string): Promise<unknown> {
  try {
    const content = await readFile(filePath, 'utf-8');
    return JSON.parse(content) as unknown;
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new ConfigurationError(`Invalid JSON in ${filePath}: ${error.message}`);
    }
    if (error instanceof Error && Reflect.get(error, 'code') === 'ENOENT') {
      throw new ConfigurationError(`Configuration file not found: ${filePath}`);
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Failed to read configuration file ${filePath}: ${message}`);
  }
}

/**
 * Loads and validates the application configuration. Without a path the
 * built-in defaults are returned; `EPIRISK_MOCK_LLM=true` forces the mock
 * provider either way.
 */
export async function loadConfig(filePath?: string): Promise<AppConfig> {
  const raw = filePath ? await readJsonFile(filePath) : {};
  const config = validateAppConfig(raw);

  if (process.env['EPIRISK_MOCK_LLM'] === 'true' && config.llm.provider !== 'mock') {
    log.info('EPIRISK_MOCK_LLM set, overriding LLM provider with mock');
    return { ...config, llm: { ...config.llm, provider: 'mock' } };
  }

  log.debug({ filePath, provider: config.llm.provider }, 'Configuration loaded');
  return config;
}
