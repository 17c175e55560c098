/**
 * Configuration management for tocnav.
 *
 * Settings are read once from tocnav.config.yaml (located through
 * TOCNAV_CONFIG or the loader's search paths) and resolved against the
 * defaults in constants.ts. Components never read Config directly; the
 * composition root passes them the resolved sections.
 */
import path from 'path';
import { createLogger, isLogLevel, type LogLevel } from '../utils/logger.js';
import { loadConfigFile, getConfigFromFile, validateRequiredConfig } from './loader.js';
import { BATCH, COMPLETION, EVALUATION, NAVIGATION, SEARCH, SEGMENTATION, SHELL_TOOL } from './constants.js';
import type { TocnavConfig } from './types.js';

export * from './constants.js';
export * from './types.js';
export * from './loader.js';

const logger = createLogger('Config');

const fileConfig = loadConfigFile();
const fileConfigOnly = getConfigFromFile(fileConfig);

/**
 * Resolved completion agent settings.
 */
export interface ResolvedAgentConfig {
  apiKey: string;
  model: string;
  apiBaseUrl?: string;
  maxIterations: number;
  timeoutMs: number;
  maxRetries: number;
}

export interface ResolvedSegmentationConfig {
  /** Absolute path of the cache file */
  cachePath: string;
  maxChars: number;
  timeoutMs: number;
  maxRetries: number;
}

export interface ResolvedSearchConfig {
  maxCandidates: number;
  snippetChars: number;
  maxEvidence: number;
}

export interface ResolvedEvaluationConfig {
  model: string;
  timeoutMs: number;
  maxRetries: number;
}

export interface ResolvedShellToolConfig {
  allowlist: string[];
  timeoutMs: number;
  maxOutputChars: number;
}

export interface ResolvedLoggingConfig {
  level?: LogLevel;
  file?: string;
  pretty?: boolean;
}

/**
 * Application configuration class with static properties.
 */
export class Config {
  static readonly CONFIG_LOADED = fileConfig._fromFile;
  static readonly CONFIG_SOURCE = fileConfig._source;

  // Resolve to absolute path so relative document paths have a stable base
  private static readonly RAW_WORKSPACE_DIR = fileConfigOnly.workspace?.dir || process.cwd();
  static readonly WORKSPACE_DIR = path.isAbsolute(Config.RAW_WORKSPACE_DIR)
    ? Config.RAW_WORKSPACE_DIR
    : path.resolve(process.cwd(), Config.RAW_WORKSPACE_DIR);

  static readonly ANTHROPIC_API_KEY = fileConfigOnly.agent?.apiKey || process.env.ANTHROPIC_API_KEY || '';
  static readonly MODEL = fileConfigOnly.agent?.model || '';

  /**
   * Get the raw configuration object.
   */
  static getRawConfig(): TocnavConfig {
    return fileConfigOnly;
  }

  /**
   * Check if a configuration file was loaded.
   */
  static hasConfigFile(): boolean {
    return this.CONFIG_LOADED;
  }

  /**
   * Get the workspace directory (absolute).
   */
  static getWorkspaceDir(): string {
    return this.WORKSPACE_DIR;
  }

  /**
   * Resolve a path relative to the workspace directory.
   */
  static resolveWorkspace(relativePath: string): string {
    return path.resolve(this.getWorkspaceDir(), relativePath);
  }

  /**
   * Get completion agent configuration.
   *
   * @throws Error if the API key or model is missing
   */
  static getAgentConfig(): ResolvedAgentConfig {
    const { valid, errors } = validateRequiredConfig(fileConfigOnly);
    if (!valid) {
      const messages = errors.map(e => `  - ${e.field}: ${e.message}`).join('\n');
      logger.error({ errors }, 'Configuration validation failed');
      throw new Error(
        `Configuration validation failed:\n\n${messages}\n\n` +
        'Please update your tocnav.config.yaml file:\n' +
        '  agent:\n' +
        '    apiKey: "your-key"\n' +
        '    model: "your-model"'
      );
    }

    const agent = fileConfigOnly.agent;
    return {
      apiKey: this.ANTHROPIC_API_KEY,
      model: this.MODEL,
      apiBaseUrl: agent?.apiBaseUrl,
      maxIterations: agent?.maxIterations ?? NAVIGATION.MAX_ITERATIONS,
      timeoutMs: agent?.timeoutMs ?? COMPLETION.TIMEOUT_MS,
      maxRetries: agent?.maxRetries ?? COMPLETION.MAX_RETRIES,
    };
  }

  /**
   * Get segmentation configuration with the cache path resolved.
   */
  static getSegmentationConfig(): ResolvedSegmentationConfig {
    const segmentation = fileConfigOnly.segmentation;
    return {
      cachePath: this.resolveWorkspace(segmentation?.cachePath ?? SEGMENTATION.CACHE_PATH),
      maxChars: segmentation?.maxChars ?? SEGMENTATION.MAX_CHARS,
      timeoutMs: segmentation?.timeoutMs ?? SEGMENTATION.TIMEOUT_MS,
      maxRetries: segmentation?.maxRetries ?? SEGMENTATION.MAX_RETRIES,
    };
  }

  static getSearchConfig(): ResolvedSearchConfig {
    const search = fileConfigOnly.search;
    return {
      maxCandidates: search?.maxCandidates ?? SEARCH.MAX_CANDIDATES,
      snippetChars: search?.snippetChars ?? SEARCH.SNIPPET_CHARS,
      maxEvidence: search?.maxEvidence ?? SEARCH.MAX_EVIDENCE,
    };
  }

  static getShellToolConfig(): ResolvedShellToolConfig {
    const shell = fileConfigOnly.tools?.shell;
    return {
      allowlist: shell?.allowlist ?? [...SHELL_TOOL.ALLOWLIST],
      timeoutMs: shell?.timeoutMs ?? SHELL_TOOL.TIMEOUT_MS,
      maxOutputChars: shell?.maxOutputChars ?? SHELL_TOOL.MAX_OUTPUT_CHARS,
    };
  }

  static getBatchConcurrency(): number {
    return fileConfigOnly.batch?.concurrency ?? BATCH.CONCURRENCY;
  }

  /**
   * Get the judge settings. The judge uses the agent's model unless
   * evaluation.model names another.
   */
  static getEvaluationConfig(): ResolvedEvaluationConfig {
    const evaluation = fileConfigOnly.evaluation;
    return {
      model: evaluation?.model ?? this.MODEL,
      timeoutMs: evaluation?.timeoutMs ?? EVALUATION.TIMEOUT_MS,
      maxRetries: evaluation?.maxRetries ?? EVALUATION.MAX_RETRIES,
    };
  }

  /**
   * Get logging configuration. Unknown level names are ignored.
   */
  static getLoggingConfig(): ResolvedLoggingConfig {
    const logging = fileConfigOnly.logging;
    const level = logging?.level?.toLowerCase();
    return {
      level: level && isLogLevel(level) ? level : undefined,
      file: logging?.file,
      pretty: logging?.pretty,
    };
  }
}
