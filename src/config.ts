import { readFileSync } from 'node:fs';
import { z } from 'zod';

import type { CrawlConfig } from './types.js';
import { CONFIG_DEFAULTS } from './types.js';

/**
 * Crawl configuration as accepted from callers: everything except the
 * seed list is optional.
 */
export type UserCrawlConfig = Partial<CrawlConfig> & { startUrls: string[] };

/**
 * Error thrown for configuration that cannot start a crawl.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Config file read from the working directory when none is named. */
export const DEFAULT_CONFIG_FILE = 'config.json';

/** snake_case keys accepted as aliases of their camelCase fields. */
const KEY_ALIASES = new Map([
  ['start_urls', 'startUrls'],
  ['max_depth', 'maxDepth'],
]);

function renameKeyAliases(value: unknown): unknown {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return value;
  }
  return Object.fromEntries(
    Object.entries(value).map(([key, field]) => [KEY_ALIASES.get(key) ?? key, field]),
  );
}

/** Zod schema for a JSON configuration file. */
export const configFileSchema = z.preprocess(
  renameKeyAliases,
  z.object({
    startUrls: z.array(z.string()).default([]),
    maxDepth: z.number().int().min(0).optional(),
    concurrency: z.number().int().min(1).optional(),
    timeoutMs: z.number().int().positive().optional(),
    sameHostOnly: z.boolean().optional(),
    includePatterns: z.array(z.string()).optional(),
    excludePatterns: z.array(z.string()).optional(),
    headers: z.record(z.string()).optional(),
    extraction: z.enum(['main', 'readability']).optional(),
    format: z.enum(['text', 'markdown']).optional(),
    outputDir: z.string().min(1).optional(),
    segmentLimit: z.number().int().min(1).optional(),
    clean: z.boolean().optional(),
  })
  .strict(),
);

export type ConfigFile = z.infer<typeof configFileSchema>;

/**
 * Load and validate a JSON configuration file.
 *
 * @throws ConfigError if the file cannot be read, is not JSON, or does not
 *   match the schema
 */
export function loadConfigFile(filePath: string): ConfigFile {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigError(
      `Cannot read config file "${filePath}": ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(
      `Invalid JSON in config file "${filePath}": ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  const result = configFileSchema.safeParse(json);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid config file "${filePath}": ${details}`);
  }
  return result.data;
}

function isInteger(value: number, min: number): boolean {
  return Number.isInteger(value) && value >= min;
}

/**
 * Validate caller-provided configuration.
 *
 * @throws ConfigError naming the first invalid field
 */
export function validateConfig(userConfig: UserCrawlConfig): void {
  if (!Array.isArray(userConfig.startUrls)) {
    throw new ConfigError('"startUrls" must be an array of URLs');
  }

  const integerFields = [
    ['maxDepth', userConfig.maxDepth, 0],
    ['concurrency', userConfig.concurrency, 1],
    ['segmentLimit', userConfig.segmentLimit, 1],
    ['timeoutMs', userConfig.timeoutMs, 1],
  ] as const;

  for (const [name, value, min] of integerFields) {
    if (value !== undefined && !isInteger(value, min)) {
      throw new ConfigError(
        `"${name}" must be an integer >= ${min}, got ${String(value)}`,
      );
    }
  }

  if (userConfig.outputDir !== undefined && userConfig.outputDir.trim() === '') {
    throw new ConfigError('"outputDir" must be a non-empty path');
  }
}

/**
 * Fill every field the caller left out from CONFIG_DEFAULTS.
 */
export function mergeDefaults(userConfig: UserCrawlConfig): CrawlConfig {
  return {
    ...userConfig,
    maxDepth: userConfig.maxDepth ?? CONFIG_DEFAULTS.maxDepth,
    concurrency: userConfig.concurrency ?? CONFIG_DEFAULTS.concurrency,
    timeoutMs: userConfig.timeoutMs ?? CONFIG_DEFAULTS.timeoutMs,
    sameHostOnly: userConfig.sameHostOnly ?? CONFIG_DEFAULTS.sameHostOnly,
    extraction: userConfig.extraction ?? CONFIG_DEFAULTS.extraction,
    format: userConfig.format ?? CONFIG_DEFAULTS.format,
    outputDir: userConfig.outputDir ?? CONFIG_DEFAULTS.outputDir,
    segmentLimit: userConfig.segmentLimit ?? CONFIG_DEFAULTS.segmentLimit,
    clean: userConfig.clean ?? CONFIG_DEFAULTS.clean,
  };
}

/**
 * Validate and merge the user config into a full CrawlConfig.
 */
export function validateAndMergeConfig(userConfig: UserCrawlConfig): CrawlConfig {
  validateConfig(userConfig);
  return mergeDefaults(userConfig);
}
