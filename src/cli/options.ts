import type { ExtractionStrategy, OutputFormat } from '../types.js';
import { existsSync } from 'node:fs';
import { join } from 'node:path';

import type { ConfigFile, UserCrawlConfig } from '../config.js';
import { ConfigError, DEFAULT_CONFIG_FILE, loadConfigFile } from '../config.js';

/**
 * Raw CLI options as parsed by commander.
 */
export interface CLIOptions {
  config?: string;
  depth?: string;
  concurrency?: string;
  output?: string;
  segments?: string;
  strategy?: string;
  format?: string;
  allHosts?: boolean;
  include?: string[];
  exclude?: string[];
  header?: string[];
  timeout?: string;
  clean?: boolean;
  logFile?: string;
  verbose?: boolean;
  quiet?: boolean;
  dryRun?: boolean;
}

export const EXTRACTION_STRATEGIES: readonly ExtractionStrategy[] = ['main', 'readability'];
export const OUTPUT_FORMATS: readonly OutputFormat[] = ['text', 'markdown'];

function isOneOf<T extends string>(values: readonly T[], value: string): value is T {
  return values.some((candidate) => candidate === value);
}

/**
 * Parse an integer option value.
 *
 * @throws ConfigError if the value is not a base-10 integer
 */
export function parseInteger(value: string, flag: string): number {
  if (!/^-?\d+$/.test(value.trim())) {
    throw new ConfigError(`Invalid value for ${flag}: "${value}" is not an integer`);
  }
  return parseInt(value, 10);
}

/**
 * Parse --header values from "key:value" format into a Record.
 * Splits on the first colon to allow colons in the value.
 *
 * @throws ConfigError if a header has no colon or an empty name
 */
export function parseHeaders(headers: string[]): Record<string, string> {
  const result: Record<string, string> = {};

  for (const header of headers) {
    const colonIndex = header.indexOf(':');
    if (colonIndex === -1) {
      throw new ConfigError(
        `Invalid header format: "${header}". Expected "key:value" format.`,
      );
    }
    const key = header.slice(0, colonIndex).trim();
    const value = header.slice(colonIndex + 1).trim();
    if (!key) {
      throw new ConfigError(
        `Invalid header format: "${header}". Header name cannot be empty.`,
      );
    }
    result[key] = value;
  }

  return result;
}

/**
 * Path of `config.json` in the working directory, if there is one.
 */
export function findDefaultConfigFile(): string | undefined {
  const path = join(process.cwd(), DEFAULT_CONFIG_FILE);
  return existsSync(path) ? path : undefined;
}

/**
 * Build the SDK config from the positional URLs, the optional config
 * file and the CLI flags.
 *
 * Flags override the config file, which overrides the SDK defaults.
 * URLs given on the command line follow the config file's `startUrls`.
 */
export function buildConfig(urls: string[], options: CLIOptions): UserCrawlConfig {
  const configPath = options.config ?? findDefaultConfigFile();
  const fromFile: ConfigFile = configPath
    ? loadConfigFile(configPath)
    : { startUrls: [] };
  const { startUrls: fileUrls, ...fileSettings } = fromFile;

  const config: UserCrawlConfig = {
    ...fileSettings,
    startUrls: [...fileUrls, ...urls],
  };

  // Scope
  if (options.depth !== undefined) {
    config.maxDepth = parseInteger(options.depth, '--depth');
  }
  if (options.allHosts) {
    config.sameHostOnly = false;
  }
  if (options.include !== undefined && options.include.length > 0) {
    config.includePatterns = options.include;
  }
  if (options.exclude !== undefined && options.exclude.length > 0) {
    config.excludePatterns = options.exclude;
  }

  // Fetching
  if (options.concurrency !== undefined) {
    config.concurrency = parseInteger(options.concurrency, '--concurrency');
  }
  if (options.timeout !== undefined) {
    config.timeoutMs = parseInteger(options.timeout, '--timeout');
  }
  if (options.header !== undefined && options.header.length > 0) {
    config.headers = { ...config.headers, ...parseHeaders(options.header) };
  }

  // Extraction
  if (options.strategy !== undefined) {
    if (!isOneOf(EXTRACTION_STRATEGIES, options.strategy)) {
      throw new ConfigError(
        `Invalid extraction strategy "${options.strategy}". Must be one of: ${EXTRACTION_STRATEGIES.join(', ')}`,
      );
    }
    config.extraction = options.strategy;
  }
  if (options.format !== undefined) {
    if (!isOneOf(OUTPUT_FORMATS, options.format)) {
      throw new ConfigError(
        `Invalid output format "${options.format}". Must be one of: ${OUTPUT_FORMATS.join(', ')}`,
      );
    }
    config.format = options.format;
  }

  // Output
  if (options.output !== undefined) {
    config.outputDir = options.output;
  }
  if (options.segments !== undefined) {
    config.segmentLimit = parseInteger(options.segments, '--segments');
  }
  if (options.clean) {
    config.clean = true;
  }

  return config;
}
