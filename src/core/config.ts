/**
 * Configuration loader for the integration-test harness.
 *
 * Loads configuration from a YAML file, validates the structure, applies
 * environment overrides and caches the result per file path.
 */

import { readFile } from 'fs/promises';
import path from 'path';
import { LRUCache } from 'lru-cache';
import yaml from 'js-yaml';
import { z } from 'zod';
import type { Config } from '@shared/types';
import { setupLogger } from '@shared/utils/logger';

const logger = setupLogger('dataprocessing-tests:config');

export const DEFAULT_CONFIG_PATH = './dataprocessing-tests.yaml';

/**
 * Configuration schema validation using Zod.
 *
 * Every field has a default so that an absent file still yields a usable config.
 */
const ConfigSchema = z.object({
  aws: z
    .object({
      region: z.string().min(1).default('us-east-1'),
      profile: z.string().min(1).optional(),
    })
    .default({}),
  server: z
    .object({
      command: z.string().min(1).default('uvx'),
      args: z.array(z.string()).default(['awslabs.aws-dataprocessing-mcp-server@latest']),
      cwd: z.string().optional(),
      env: z.record(z.string()).optional(),
      allowWrite: z.boolean().default(true),
      callTimeoutMs: z.number().int().positive().default(300_000),
    })
    .default({}),
  reports: z
    .object({
      directory: z.string().min(1).default('reports'),
      formats: z.array(z.enum(['markdown', 'json', 'html'])).default(['markdown', 'json', 'html']),
    })
    .default({}),
  groups: z.array(z.string()).optional(),
  cleanup: z
    .object({
      pollIntervalMs: z.number().int().nonnegative().default(1_000),
      maxPollAttempts: z.number().int().positive().default(60),
      sessionSettleMs: z.number().int().nonnegative().default(5_000),
      jobRunSettleMs: z.number().int().nonnegative().default(30_000),
    })
    .default({}),
});

/**
 * Base exception for configuration errors.
 */
export class ConfigError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

/**
 * Raised when the configuration is missing required fields or is invalid.
 */
export class ConfigValidationError extends ConfigError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigValidationError';
  }
}

/**
 * LRU cache for configuration objects, keyed by absolute file path.
 */
const configCache = new LRUCache<string, Config>({
  max: 16,
  ttl: 1000 * 60 * 5, // 5 minutes TTL
});

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function envValue(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

/**
 * Apply environment variable overrides on top of file values.
 */
export function applyEnvOverrides(config: Config, env: NodeJS.ProcessEnv = process.env): Config {
  const serverArgs = envValue(env, 'MCP_SERVER_ARGS');

  return {
    ...config,
    aws: {
      region: envValue(env, 'AWS_REGION') ?? config.aws.region,
      profile: envValue(env, 'AWS_PROFILE') ?? config.aws.profile,
    },
    server: {
      ...config.server,
      command: envValue(env, 'MCP_SERVER_COMMAND') ?? config.server.command,
      args: serverArgs !== undefined ? serverArgs.split(/\s+/) : config.server.args,
      cwd: envValue(env, 'MCP_SERVER_CWD') ?? config.server.cwd,
    },
    reports: {
      ...config.reports,
      directory: envValue(env, 'REPORT_DIR') ?? config.reports.directory,
    },
  };
}

/**
 * Validate a parsed YAML document against the configuration schema.
 *
 * @throws {ConfigValidationError} If fields are missing or have the wrong type
 */
export function parseConfig(document: unknown): Config {
  try {
    return ConfigSchema.parse(document ?? {});
  } catch (error) {
    if (error instanceof z.ZodError) {
      const invalidFields = error.errors.map((e) => e.path.join('.') || '(root)');

      throw new ConfigValidationError(
        `Configuration validation failed. Missing or invalid fields: ${invalidFields.join(', ')}`,
        { cause: error }
      );
    }
    throw new ConfigValidationError(`Configuration validation failed: ${String(error)}`, {
      cause: error,
    });
  }
}

/**
 * Read and validate one file, cached per path. Environment overrides are
 * applied by the caller so that they never end up in the cache.
 */
async function readConfigFile(resolvedPath: string): Promise<Config> {
  const cached = configCache.get(resolvedPath);
  if (cached) {
    logger.debug(`Using cached config for: ${resolvedPath}`);
    return cached;
  }

  logger.info(`Loading config from: ${resolvedPath}`);

  let content: string | undefined;
  try {
    content = await readFile(resolvedPath, 'utf8');
  } catch (error) {
    if (!isMissingFile(error)) {
      throw new ConfigError(`Failed to read config file ${resolvedPath}: ${String(error)}`, {
        cause: error,
      });
    }
    logger.warn({ path: resolvedPath }, 'Config file not found, using defaults');
  }

  let document: unknown = {};
  if (content !== undefined) {
    try {
      document = yaml.load(content);
    } catch (error) {
      throw new ConfigError(
        `Failed to parse YAML configuration from ${resolvedPath}: ${String(error)}`,
        { cause: error }
      );
    }
  }

  const config = parseConfig(document);
  configCache.set(resolvedPath, config);
  return config;
}

/**
 * Loads configuration from a YAML file.
 *
 * The path defaults to `DATAPROCESSING_TESTS_CONFIG` and then to
 * `./dataprocessing-tests.yaml`. A missing file yields the defaults.
 *
 * @param configPath - Optional path to the YAML file
 * @param env - Environment used for overrides
 * @returns Parsed and validated configuration object
 *
 * @throws {ConfigError} If the file cannot be read or parsed
 * @throws {ConfigValidationError} If the configuration is invalid
 */
export async function loadConfig(
  configPath?: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<Config> {
  const resolvedPath = path.resolve(
    configPath ?? envValue(env, 'DATAPROCESSING_TESTS_CONFIG') ?? DEFAULT_CONFIG_PATH
  );

  const config = applyEnvOverrides(await readConfigFile(resolvedPath), env);

  logger.info({ region: config.aws.region, server: config.server.command }, 'Config loaded successfully');
  return config;
}

/**
 * Clears the configuration cache.
 * Useful for testing or forcing a fresh config reload.
 */
export function clearConfigCache(): void {
  configCache.clear();
  logger.debug('Config cache cleared');
}
