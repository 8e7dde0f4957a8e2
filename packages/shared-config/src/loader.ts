/**
 * Configuration Loader
 *
 * Loads and validates configuration from environment variables.
 * Supports .env files outside production only.
 */

import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { configSchema, type ConfigSchema } from './schema.js';

export type Config = ConfigSchema;

export interface ConfigOptions {
  /**
   * Whether to load .env files (default: true outside production)
   */
  loadEnvFile?: boolean;

  /**
   * Path to .env file (default: searches the working directory)
   */
  envFilePath?: string;

  /**
   * Values applied on top of the environment, e.g. CLI flags
   */
  overrides?: Record<string, string | undefined>;
}

let cachedConfig: Config | null = null;

/**
 * Parse .env file content into key-value pairs
 */
export function parseEnvFile(content: string): Record<string, string> {
  const result: Record<string, string> = {};
  const lines = content.split('\n');

  for (const line of lines) {
    const trimmed = line.trim();

    if (!trimmed || trimmed.startsWith('#')) {
      continue;
    }

    const match = trimmed.match(/^([^#=]+)=(.*)$/);
    if (match && match[1] && match[2] !== undefined) {
      const key = match[1].trim();
      let value = match[2].trim();

      if ((value.startsWith('"') && value.endsWith('"')) ||
          (value.startsWith("'") && value.endsWith("'"))) {
        value = value.slice(1, -1);
      }

      result[key] = value;
    }
  }

  return result;
}

function findEnvFile(startPath: string = process.cwd()): string | null {
  const searchPaths = [
    resolve(startPath, '.env'),
    resolve(startPath, '.env.local'),
  ];

  for (const path of searchPaths) {
    if (existsSync(path)) {
      return path;
    }
  }

  return null;
}

function loadEnvFile(filePath?: string): Record<string, string> {
  const nodeEnv = process.env.NODE_ENV || 'development';

  // Never load .env files in production
  if (nodeEnv === 'production') {
    return {};
  }

  const envPath = filePath || findEnvFile();
  if (!envPath) {
    return {};
  }

  try {
    const content = readFileSync(envPath, 'utf-8');
    return parseEnvFile(content);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return {};
    }
    throw new Error(`Failed to load .env file at ${envPath}: ${error instanceof Error ? error.message : String(error)}`);
  }
}

/**
 * Merge variable sources; later sources win, undefined values are ignored
 */
function mergeEnvVars(...sources: Array<Record<string, string | undefined>>): Record<string, string> {
  const result: Record<string, string> = {};

  for (const source of sources) {
    for (const [key, value] of Object.entries(source)) {
      if (value !== undefined) {
        result[key] = value;
      }
    }
  }

  return result;
}

/**
 * Load and validate configuration
 */
export function loadConfig(options: ConfigOptions = {}): Config {
  const { overrides } = options;

  // Overrides bypass the cache so callers can't see each other's flags
  if (cachedConfig && !overrides) {
    return cachedConfig;
  }

  const isProduction = (process.env.NODE_ENV || 'development') === 'production';
  const { loadEnvFile: shouldLoadEnvFile = !isProduction, envFilePath } = options;

  const envFileVars = shouldLoadEnvFile ? loadEnvFile(envFilePath) : {};

  // process.env takes precedence over .env, overrides over both
  const envVars = mergeEnvVars(envFileVars, process.env, overrides ?? {});

  const parseResult = configSchema.safeParse(envVars);

  if (!parseResult.success) {
    const errors = parseResult.error.errors
      .map((err) => {
        const path = err.path.join('.');
        return `  • ${path || 'root'}: ${err.message}`;
      })
      .join('\n');

    throw new Error(`Invalid configuration:\n${errors}`);
  }

  if (!overrides) {
    cachedConfig = parseResult.data;
  }

  return parseResult.data;
}

/**
 * Print configuration as JSON
 */
export function printConfig(config?: Config): void {
  const configToPrint = config || loadConfig();

  // eslint-disable-next-line no-console
  console.log(JSON.stringify(configToPrint, null, 2));
}

/**
 * Clear cached configuration (useful for testing)
 */
export function clearConfigCache(): void {
  cachedConfig = null;
}

/**
 * Get config value by key (type-safe)
 */
export function getConfigValue<K extends keyof Config>(key: K): Config[K] {
  const config = loadConfig();
  return config[key];
}
