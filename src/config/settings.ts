/**
 * PCR Configuration Loader
 *
 * Reads display, chart and sentiment settings from pcr.config.yaml.
 * Lookup order: explicit path, PCR_CONFIG env var, then the working
 * directory and its parent. Falls back to defaults when no file is found
 * or the file does not validate.
 */

import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { parse as parseYaml } from 'yaml';
import { logger } from '../utils/logger.ts';
import { DEFAULT_CONFIG, validatePcrConfig, type PcrConfig } from './schema.ts';

export { pcrConfigSchema, validatePcrConfig, assertValidPcrConfig } from './schema.ts';
export type { PcrConfig } from './schema.ts';

export const CONFIG_FILENAME = 'pcr.config.yaml';

let cachedConfig: PcrConfig | null = null;
let configPath: string | null = null;

function findConfigPath(): string | null {
  const possiblePaths = [
    process.env.PCR_CONFIG,
    join(process.cwd(), CONFIG_FILENAME),
    join(process.cwd(), '..', CONFIG_FILENAME),
  ];

  for (const path of possiblePaths) {
    if (path && existsSync(path)) {
      return path;
    }
  }
  return null;
}

export function loadConfigFile(path: string): PcrConfig {
  let raw: unknown;
  try {
    raw = parseYaml(readFileSync(path, 'utf-8'));
  } catch (error) {
    logger.warn(
      `Could not read ${path} (${error instanceof Error ? error.message : String(error)}), using defaults`
    );
    return DEFAULT_CONFIG;
  }

  const result = validatePcrConfig(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join('.')}: ${i.message}`)
      .join('; ');
    logger.warn(`Invalid ${path} (${issues}), using defaults`);
    return DEFAULT_CONFIG;
  }

  logger.debug(`Loaded PCR config from ${path}`);
  return result.data;
}

/**
 * Load the PCR configuration
 *
 * @param forceReload - Force reload from disk (default: use cache)
 */
export function getPcrConfig(forceReload = false): PcrConfig {
  if (cachedConfig && !forceReload) {
    return cachedConfig;
  }

  const path = configPath ?? findConfigPath();
  if (!path) {
    logger.debug(`${CONFIG_FILENAME} not found, using defaults`);
    cachedConfig = DEFAULT_CONFIG;
    return cachedConfig;
  }

  cachedConfig = loadConfigFile(path);
  return cachedConfig;
}

/**
 * Clear the config cache (useful for testing)
 */
export function clearConfigCache(): void {
  cachedConfig = null;
  configPath = null;
}

/**
 * Set a custom config path (--config)
 */
export function setConfigPath(path: string): void {
  configPath = path;
  cachedConfig = null;
}
