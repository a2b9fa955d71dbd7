/**
 * Configuration Loader
 *
 * Loads reporter configuration from YAML files with environment-specific
 * overrides, then validates the merged result.
 */

import { readFileSync, existsSync } from 'node:fs';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import * as yaml from 'js-yaml';
import { ReporterError } from '../api/errors.js';
import { ReporterConfigSchema, type ReporterConfig } from '../types/schemas/config.js';
import type { LogLevel } from '../utils/logger-helpers.js';

export type Config = ReporterConfig;

export type ConfigEnvironment = 'production' | 'development' | 'test';

type ConfigTree = Record<string, unknown>;

function isPlainObject(value: unknown): value is ConfigTree {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects
 */
function deepMerge(target: ConfigTree, source: ConfigTree): ConfigTree {
  const output: ConfigTree = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = output[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
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
function findPackageRoot(): string {
  let currentDir = dirname(fileURLToPath(import.meta.url));

  while (currentDir !== dirname(currentDir)) {
    if (existsSync(join(currentDir, 'package.json'))) {
      return currentDir;
    }
    currentDir = dirname(currentDir);
  }

  return process.cwd();
}

/**
 * Path of the bundled default configuration.
 */
export function getDefaultConfigPath(): string {
  return join(findPackageRoot(), 'config', 'reporter.yaml');
}

/**
 * Load configuration from YAML file
 *
 * The returned object is merged but not yet validated.
 */
export function loadConfig(configPath?: string, environment?: ConfigEnvironment): ConfigTree {
  const finalPath = configPath ?? getDefaultConfigPath();

  let parsed: unknown;
  try {
    parsed = yaml.load(readFileSync(finalPath, 'utf8'));
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new ReporterError('ConfigError', `Configuration file not found: ${finalPath}`, {
        path: finalPath,
      });
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new ReporterError('ConfigError', `Failed to load configuration: ${reason}`, {
      path: finalPath,
    });
  }

  if (!isPlainObject(parsed)) {
    throw new ReporterError('ConfigError', `Configuration root must be a mapping: ${finalPath}`, {
      path: finalPath,
    });
  }

  const { environments, ...baseConfig } = parsed;
  const env = environment ?? process.env.NODE_ENV ?? 'development';

  if (isPlainObject(environments)) {
    const envConfig = environments[env];
    if (isPlainObject(envConfig)) {
      return deepMerge(baseConfig, envConfig);
    }
  }

  return baseConfig;
}

/**
 * Validate configuration values
 */
export function validateConfig(config: unknown): Config {
  const parseResult = ReporterConfigSchema.safeParse(config);
  if (!parseResult.success) {
    const errors = parseResult.error.issues.map((issue) => {
      const field = issue.path.length > 0 ? issue.path.join('.') : 'root';
      return `${field} ${issue.message}`;
    });

    throw new ReporterError('ConfigError', `Configuration validation failed:\n${errors.join('\n')}`, {
      issues: errors,
    });
  }

  return parseResult.data;
}

/**
 * Global configuration instance
 */
let globalConfig: Config | null = null;

/**
 * Initialize global configuration
 */
export function initializeConfig(configPath?: string, environment?: ConfigEnvironment): Config {
  globalConfig = validateConfig(loadConfig(configPath, environment));
  return globalConfig;
}

/**
 * Get global configuration
 */
export function getConfig(): Config {
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

/**
 * Log level from FAULTLINE_LOG_LEVEL, falling back to the config value.
 */
export function resolveLogLevel(config: Config): LogLevel | 'silent' {
  const fromEnv = process.env.FAULTLINE_LOG_LEVEL?.toLowerCase();
  const parsed = ReporterConfigSchema.shape.logging.shape.level.safeParse(fromEnv);
  return parsed.success ? parsed.data : config.logging.level;
}

/**
 * Component options derived from a validated config (snake_case → camelCase).
 */
export interface ReporterComponentOptions {
  dedup: {
    maxTracked: number;
    ttlSeconds: number;
    versionTag?: string;
  };
  rateLimit: {
    enabled: boolean;
    windowSeconds: number;
    maxPerWindow: number;
    keyPrefix: string;
    tenantId: string;
  };
  logTail: {
    enabled: boolean;
    path?: string;
    lines: number;
    chunkBytes: number;
    maxBytes: number;
  };
  requiredFields: Config['validation']['required_fields'];
  site: {
    id: string;
    url?: string;
    projectRoot?: string;
  };
  app: {
    version: string;
    hostVersion?: string;
    integrations: string[];
  };
}

export function toReporterOptions(config: Config): ReporterComponentOptions {
  return {
    dedup: {
      maxTracked: config.dedup.max_tracked_entries,
      ttlSeconds: config.dedup.track_duration_seconds,
      versionTag: config.dedup.version_tag ?? undefined,
    },
    rateLimit: {
      enabled: config.rate_limit.enabled,
      windowSeconds: config.rate_limit.window_seconds,
      maxPerWindow: config.rate_limit.max_reports_per_window,
      keyPrefix: config.rate_limit.key_prefix,
      tenantId: config.site.id,
    },
    logTail: {
      enabled: config.log_tail.enabled,
      path: config.log_tail.path ?? undefined,
      lines: config.log_tail.lines,
      chunkBytes: config.log_tail.chunk_bytes,
      maxBytes: config.log_tail.max_bytes,
    },
    requiredFields: config.validation.required_fields,
    site: {
      id: config.site.id,
      url: config.site.url ?? undefined,
      projectRoot: config.site.project_root ?? undefined,
    },
    app: {
      version: config.app.version,
      hostVersion: config.app.host_version ?? undefined,
      integrations: config.app.integrations,
    },
  };
}
