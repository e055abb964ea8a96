/**
 * Configuration Loader
 *
 * Loads configuration from YAML files with environment-specific overrides
 */

import { readFileSync, existsSync } from 'node:fs';
import { homedir } from 'node:os';
import { join, dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import * as yaml from 'js-yaml';
import { RuntimeConfigSchema, type RuntimeConfig } from '../types/schemas/config.js';
import { isErrnoException } from '../api/errors.js';
import { CACHE_LOCATION } from './defaults.js';

export type Environment = 'production' | 'development' | 'test';

type ConfigRecord = Record<string, unknown>;

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects. Arrays and scalars in `source` replace those in
 * `target`; `undefined` leaves the target value alone.
 */
export function deepMerge(target: ConfigRecord, source: ConfigRecord): ConfigRecord {
  const output: ConfigRecord = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = output[key];

    if (isRecord(sourceValue) && isRecord(targetValue)) {
      output[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      output[key] = sourceValue;
    }
  }

  return output;
}

/**
 * Find the package root directory by looking for package.json
 */
export function findPackageRoot(): string {
  // Start from current module directory
  let currentDir = dirname(fileURLToPath(import.meta.url));

  // Walk up until we find package.json or reach root
  while (currentDir !== dirname(currentDir)) {
    if (existsSync(join(currentDir, 'package.json'))) {
      return currentDir;
    }
    currentDir = dirname(currentDir);
  }

  // Fallback to cwd if package.json not found
  return process.cwd();
}

/**
 * Load configuration from YAML file, with the `environments` override for
 * `environment` (default: NODE_ENV, then development) merged in.
 *
 * The result is unvalidated; see validateConfig.
 */
export function loadConfig(configPath?: string, environment?: Environment): ConfigRecord {
  // Default config path - use package directory, not user's cwd
  const finalPath = configPath ?? join(findPackageRoot(), 'config', 'runtime.yaml');

  let parsed: unknown;
  try {
    parsed = yaml.load(readFileSync(finalPath, 'utf8'));
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      throw new Error(
        `Configuration file not found: ${finalPath}. ` +
          `Please ensure config/runtime.yaml exists in the project root.`,
        { cause: error }
      );
    }
    throw new Error(`Failed to load configuration: ${String(error)}`, { cause: error });
  }

  if (!isRecord(parsed)) {
    throw new Error(`Failed to load configuration: ${finalPath} is not a YAML mapping`);
  }

  const { environments, ...baseConfig } = parsed;
  const env = environment ?? process.env.NODE_ENV ?? 'development';

  // Apply environment-specific overrides
  if (isRecord(environments)) {
    const key = env === 'production' || env === 'test' ? env : 'development';
    const envConfig = environments[key];
    if (isRecord(envConfig)) {
      return deepMerge(baseConfig, envConfig);
    }
  }

  return baseConfig;
}

/**
 * Validate configuration values
 *
 * @throws {Error} listing every invalid field
 */
export function validateConfig(config: unknown): RuntimeConfig {
  const parseResult = RuntimeConfigSchema.safeParse(config);
  if (!parseResult.success) {
    const errors = parseResult.error.issues.map((issue) => {
      const field = issue.path.length > 0 ? issue.path.join('.') : 'root';
      return `${field} ${issue.message}`;
    });

    throw new Error(`Configuration validation failed:\n${errors.join('\n')}`);
  }
  return parseResult.data;
}

/**
 * Global configuration instance
 */
let globalConfig: RuntimeConfig | null = null;

/**
 * Initialize global configuration
 */
export function initializeConfig(configPath?: string, environment?: Environment): RuntimeConfig {
  globalConfig = validateConfig(loadConfig(configPath, environment));
  return globalConfig;
}

/**
 * Get global configuration
 */
export function getConfig(): RuntimeConfig {
  if (!globalConfig) {
    globalConfig = initializeConfig();
  }
  return globalConfig;
}

/**
 * Reset global configuration (for testing)
 */
export function resetConfig(): void {
  globalConfig = null;
}

export interface CacheLocation {
  cacheRoot: string;
  hubDir: string;
}

function envValue(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name];
  return value !== undefined && value.length > 0 ? value : undefined;
}

/**
 * Resolve the cache root and hub directory.
 *
 * Cache root: explicit > `cache.cache_dir` > HF_HOME > ~/.cache/huggingface.
 * Hub dir: `cache.hub_dir` > HF_HUB_CACHE > `<cacheRoot>/hub`. An explicit
 * cache root ignores HF_HUB_CACHE.
 */
export function resolveCacheLocation(
  explicitCacheDir: string | undefined,
  config: RuntimeConfig,
  env: NodeJS.ProcessEnv = process.env
): CacheLocation {
  const cacheRoot = resolve(
    explicitCacheDir ??
      config.cache.cache_dir ??
      envValue(env, CACHE_LOCATION.HOME_ENV) ??
      join(homedir(), ...CACHE_LOCATION.DEFAULT_HOME_SUBDIR)
  );

  const hubDir =
    config.cache.hub_dir ??
    (explicitCacheDir === undefined ? envValue(env, CACHE_LOCATION.HUB_CACHE_ENV) : undefined) ??
    join(cacheRoot, 'hub');

  return { cacheRoot, hubDir: resolve(hubDir) };
}
