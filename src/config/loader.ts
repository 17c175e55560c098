/**
 * Configuration file loader for tocnav.
 *
 * This module handles loading, parsing and validating YAML configuration files.
 */

import { readFileSync, existsSync } from 'fs';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';
import * as yaml from 'js-yaml';
import { createLogger } from '../utils/logger.js';
import { TocnavConfigSchema } from './types.js';
import type { TocnavConfig, LoadedConfig, ConfigFileInfo, ConfigValidationError } from './types.js';

const logger = createLogger('ConfigLoader');

/**
 * Configuration file names to search for, in priority order.
 */
const CONFIG_FILE_NAMES = [
  'tocnav.config.yaml',
  'tocnav.config.yml',
] as const;

/**
 * Search paths for configuration files.
 */
const SEARCH_PATHS = [
  process.cwd(),
  // Package root, from src/config or dist/config
  resolve(dirname(fileURLToPath(import.meta.url)), '..', '..'),
  process.env.HOME || '',
].filter(Boolean);

/**
 * Find the configuration file in the search paths.
 */
export function findConfigFile(): ConfigFileInfo {
  for (const searchPath of SEARCH_PATHS) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = resolve(searchPath, fileName);
      if (existsSync(filePath)) {
        logger.debug({ filePath }, 'Found configuration file');
        return { path: filePath, exists: true };
      }
    }
  }

  logger.debug('No configuration file found, using defaults');
  return { path: '', exists: false };
}

/**
 * Load, parse and validate the configuration file.
 *
 * An empty, unparsable or invalid file is reported and ignored; defaults
 * apply in that case.
 *
 * @param filePath - Path to the configuration file (optional; TOCNAV_CONFIG, then the search paths)
 *
 * @example
 * ```typescript
 * const config = loadConfigFile();
 * if (config._fromFile) {
 *   console.log(`Loaded from ${config._source}`);
 * }
 * ```
 */
export function loadConfigFile(filePath: string | undefined = process.env.TOCNAV_CONFIG): LoadedConfig {
  const fileInfo = filePath
    ? { path: resolve(filePath), exists: existsSync(resolve(filePath)) }
    : findConfigFile();

  if (!fileInfo.exists) {
    return { _fromFile: false };
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(readFileSync(fileInfo.path, 'utf-8'));
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    logger.warn({ path: fileInfo.path, error: errorMessage }, 'Failed to parse configuration file');
    return { _fromFile: false };
  }

  if (!parsed || typeof parsed !== 'object') {
    logger.warn({ path: fileInfo.path }, 'Configuration file is empty or invalid');
    return { _fromFile: false };
  }

  const result = TocnavConfigSchema.safeParse(parsed);
  if (!result.success) {
    logger.warn(
      { path: fileInfo.path, issues: result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`) },
      'Configuration file failed validation'
    );
    return { _fromFile: false };
  }

  logger.info(
    { path: fileInfo.path, keys: Object.keys(result.data) },
    'Configuration file loaded successfully'
  );

  return {
    ...result.data,
    _source: fileInfo.path,
    _fromFile: true,
  };
}

/**
 * Strip file metadata from a loaded configuration.
 */
export function getConfigFromFile(fileConfig: LoadedConfig): TocnavConfig {
  const { _source, _fromFile, ...config } = fileConfig;
  return config;
}

/**
 * Validate fields that depend on each other.
 *
 * @returns Validation result with errors if any
 */
export function validateRequiredConfig(config: TocnavConfig, env: NodeJS.ProcessEnv = process.env): {
  valid: boolean;
  errors: ConfigValidationError[];
} {
  const errors: ConfigValidationError[] = [];
  const apiKey = config.agent?.apiKey || env.ANTHROPIC_API_KEY;

  if (!apiKey) {
    errors.push({
      field: 'agent.apiKey',
      message: 'No API key configured. Set agent.apiKey in tocnav.config.yaml or ANTHROPIC_API_KEY',
    });
  }

  if (apiKey && !config.agent?.model) {
    errors.push({
      field: 'agent.model',
      message: 'agent.model is required when an API key is configured',
    });
  }

  if (config.agent?.apiBaseUrl && !/^https?:\/\//.test(config.agent.apiBaseUrl)) {
    errors.push({
      field: 'agent.apiBaseUrl',
      message: 'agent.apiBaseUrl must be an http(s) URL',
    });
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}
