/**
 * Configuration management module
 * Handles loading, merging, and validating configuration from multiple sources
 */

import { cosmiconfig } from 'cosmiconfig';
import { parse as parseYaml } from 'yaml';

import { ReleaseError } from '../errors.js';
import { ConfigSchema, type Config } from './schema.js';
import { CONFIG_FILE_NAMES, DEFAULT_CONFIG, ENV_VARS } from './defaults.js';

// Re-export schema types
export * from './schema.js';
export * from './defaults.js';

type ConfigSource = Record<string, unknown>;

export type Environment = Record<string, string | undefined>;

/**
 * Configuration loader using cosmiconfig
 */
const explorer = cosmiconfig('freescribe-release', {
  searchPlaces: CONFIG_FILE_NAMES,
  loaders: {
    '.yaml': (_filepath: string, content: string) => parseYaml(content),
    '.yml': (_filepath: string, content: string) => parseYaml(content),
    noExt: (_filepath: string, content: string) => parseYaml(content),
  },
});

function isRecord(value: unknown): value is ConfigSource {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Load project-specific configuration
 */
async function loadProjectConfig(cwd?: string): Promise<ConfigSource> {
  const result = await explorer.search(cwd);
  if (!result || result.isEmpty) {
    return {};
  }

  const config: unknown = result.config;
  if (!isRecord(config)) {
    throw new ReleaseError('Configuration file must contain a mapping', {
      operation: 'loadConfig',
      filePath: result.filepath,
    });
  }
  return config;
}

/**
 * Load configuration from environment variables
 */
export function loadEnvConfig(env: Environment = process.env): ConfigSource {
  const config: ConfigSource = {};

  const onExisting = env[ENV_VARS.ON_EXISTING];
  if (onExisting) {
    config.release = { on_existing: onExisting };
  }

  const gateLog = env[ENV_VARS.GATE_LOG];
  if (gateLog) {
    config.gate = { log_path: gateLog };
  }

  const model: ConfigSource = {};
  const modelUrl = env[ENV_VARS.MODEL_URL];
  if (modelUrl) model.url = modelUrl;
  const modelPath = env[ENV_VARS.MODEL_PATH];
  if (modelPath) model.path = modelPath;
  if (Object.keys(model).length > 0) {
    config.model = model;
  }

  // owner/repo, as set by GitHub Actions
  const repository = env[ENV_VARS.REPOSITORY];
  if (repository) {
    const [owner, repo, ...rest] = repository.split('/');
    if (owner && repo && rest.length === 0) {
      config.repository = { owner, repo };
    }
  }

  // Verbose/log level
  if (env[ENV_VARS.LOG_LEVEL] === 'debug') {
    config.output = { verbose: true };
  }

  return config;
}

/**
 * Deep merge configuration objects
 */
export function deepMerge<T extends Record<string, unknown>>(target: T, source: Partial<T>): T {
  const result = { ...target };

  for (const key in source) {
    const sourceValue = source[key];
    const targetValue = result[key];

    if (
      sourceValue !== undefined &&
      sourceValue !== null &&
      typeof sourceValue === 'object' &&
      !Array.isArray(sourceValue) &&
      typeof targetValue === 'object' &&
      targetValue !== null &&
      !Array.isArray(targetValue)
    ) {
      result[key] = deepMerge(
        targetValue as Record<string, unknown>,
        sourceValue as Record<string, unknown>
      ) as T[Extract<keyof T, string>];
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue as T[Extract<keyof T, string>];
    }
  }

  return result;
}

/**
 * Merge sources over the defaults and validate the result.
 * Later sources win.
 */
export function resolveConfig(...sources: ConfigSource[]): Config {
  let merged: ConfigSource = { ...DEFAULT_CONFIG };
  for (const source of sources) {
    merged = deepMerge(merged, source);
  }

  const result = ConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ReleaseError(`Invalid configuration: ${issues}`, {
      operation: 'loadConfig',
      context: { issues: result.error.issues.length },
    });
  }

  return result.data;
}

/**
 * Load and merge configuration from all sources
 * Priority: env vars > project config > defaults
 */
export async function loadConfig(cwd?: string, env: Environment = process.env): Promise<Config> {
  const projectConfig = await loadProjectConfig(cwd);
  return resolveConfig(projectConfig, loadEnvConfig(env));
}

/**
 * Get a specific config value by path
 */
export function getConfigValue(config: Config, keyPath: string): unknown {
  let current: unknown = config;

  for (const key of keyPath.split('.')) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[key];
  }

  return current;
}

/**
 * Path of the project config file, or null when only defaults apply
 */
export async function findConfigPath(cwd?: string): Promise<string | null> {
  const result = await explorer.search(cwd);
  return result?.filepath ?? null;
}
